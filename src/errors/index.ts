export type {
  AppError,
  ConfigIssue,
  ConfigError,
  IOError,
  ParseError,
  NotFoundError,
  UnsupportedPlatformError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, errorFields } from './formatter.js';
