export { logger, Logger } from './logger.js';
export type { LogMeta, LoggerOptions } from './logger.js';
export { execAsync, spawnDetached } from './exec.js';
export type { ExecOptions, ExecResult } from './exec.js';
export {
  ErrorHandler,
  IcePanelError,
  CommandNotFoundError,
  CommandFailedError,
  AuthCancelledError,
  UnsupportedEnvironmentError,
  ValidationError,
  NotFoundError,
} from './error-handler.js';
export type { IcePanelErrorCode } from './error-handler.js';
export { ConfigManager } from './config.js';
export type { IcePanelConfig, SessionInfo } from './config.js';
export { FileUtils } from './file-utils.js';
export { Validator } from './validator.js';
export type { IntegerRange } from './validator.js';
export { shellQuote, splitArgs } from './shell.js';
export { deferred } from './async-utils.js';
export type { Deferred } from './async-utils.js';
