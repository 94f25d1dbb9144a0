export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { startServer } from './server.js';
export type { RunningServer, StartServerOptions } from './server.js';
export {
  handleUpdate,
  handleHealth,
  renderOutcome,
} from './update.js';
export type {
  UpdateRequest,
  UpdateOutcome,
  UpdateDeps,
  RejectReason,
  DynDnsResponse,
} from './update.js';
export { clientAddress, isValidAddress, stripPort } from './address.js';
export type { RequestOrigin } from './address.js';
export { parseBasicAuth, checkBasicAuth } from './auth.js';
export type { BasicAuthCredentials } from './auth.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { ProviderError, RecordNotFoundError } from './errors.js';
export type { RecordProvider, RemoteRecord } from './provider.js';
