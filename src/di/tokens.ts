/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Add @singleton() to your class
 * 3. Register the token in container.ts
 * 4. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  Config: {
    /** Validated application config (AppConfig) */
    App: Symbol('Config.App'),
  },

  Logging: {
    /** Logger factory (ILoggerFactory) */
    Factory: Symbol('Logging.Factory'),
  },

  Forms: {
    /** Form factory using configured defaults */
    Factory: Symbol('Forms.Factory'),
  },
} as const;
