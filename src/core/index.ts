/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, symbols, type LogLevel } from './Logger.js';
export {
  ConfigError,
  ResolveError,
  ProviderError,
  ProviderUnreachableError,
  ProtocolError,
  ReconcileError,
  errorMessage,
  type ResolveErrorKind,
  type ReconcileStage,
} from './errors.js';
export { Application, createApplication, type ApplicationOptions } from './Application.js';
