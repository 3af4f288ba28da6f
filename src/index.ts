/**
 * tether
 *
 * Keeps a local automation backend alive and surfaces its event stream.
 */

export * from './supervisor/index.js';
export * from './client/api-client.js';
export * from './client/schemas.js';
export * from './config/sidecar-config.js';
export * from './protocol/types.js';
export * from './protocol/stream-url.js';
export * from './protocol/framing.js';
export * from './protocol/dispatcher.js';
export * from './utils/errors.js';
export * from './utils/output-sink.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
