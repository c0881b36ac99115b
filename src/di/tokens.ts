/**
 * Dependency injection tokens, grouped by layer.
 *
 * Tests register values under these tokens before `initializeContainer()`
 * to replace the process-backed defaults.
 */
export const DI = {
  Runtime: {
    /** Environment record resolution starts from (read-only) */
    Env: Symbol('Runtime.Env'),
    /** Platform of the running process */
    HostPlatform: Symbol('Runtime.HostPlatform'),
  },

  Infra: {
    /** Filesystem port */
    FileSystem: Symbol('Infra.FileSystem'),
  },

  Logging: {
    /** pino-backed logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  Config: {
    /** Validated application configuration */
    App: Symbol('Config.App'),
  },
} as const;
