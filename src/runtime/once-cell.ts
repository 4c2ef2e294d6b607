/**
 * Write-once cell.
 *
 * The initializer runs at most once per cell. A thrown initializer is remembered
 * and rethrown on every later read, so it is never retried.
 */

type CellState<T> =
  | { readonly kind: 'empty' }
  | { readonly kind: 'initializing' }
  | { readonly kind: 'ready'; readonly value: T }
  | { readonly kind: 'failed'; readonly cause: unknown };

export class ReentrantInitializationError extends Error {
  readonly _tag = 'ReentrantInitialization' as const;

  constructor() {
    super('OnceCell initializer re-entered its own cell');
    this.name = 'ReentrantInitializationError';
  }
}

export class OnceCell<T> {
  private state: CellState<T> = { kind: 'empty' };

  get isReady(): boolean {
    return this.state.kind === 'ready';
  }

  getOrInit(init: () => T): T {
    const current = this.state;
    switch (current.kind) {
      case 'ready':
        return current.value;
      case 'failed':
        throw current.cause;
      case 'initializing':
        throw new ReentrantInitializationError();
      case 'empty':
        break;
    }

    this.state = { kind: 'initializing' };
    try {
      const value = init();
      this.state = { kind: 'ready', value };
      return value;
    } catch (cause) {
      this.state = { kind: 'failed', cause };
      throw cause;
    }
  }
}
