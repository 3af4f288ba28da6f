/**
 * Sidecar Supervisor
 *
 * Exports for the backend process supervisor and event-stream connection.
 */

export * from './supervisor.js';
export * from './process-manager.js';
export * from './health.js';
export * from './connection.js';
export * from './reconnect.js';
export * from './transport.js';
