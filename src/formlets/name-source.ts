/**
 * Hands out field names. Immutable: `fresh()` returns the name together with
 * the source to use for the next field.
 */
export class NameSource {
  private constructor(
    private readonly prefix: string,
    private readonly counter: number
  ) {}

  static forForm(formId: string): NameSource {
    return new NameSource(formId, 0);
  }

  fresh(): { readonly name: string; readonly next: NameSource } {
    return {
      name: `${this.prefix}_${this.counter}`,
      next: new NameSource(this.prefix, this.counter + 1),
    };
  }
}
