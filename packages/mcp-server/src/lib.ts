// Library surface, for embedding the bridge in another MCP server.
export { Bridge } from './bridge.js';
export type { BridgeOptions } from './bridge.js';
export { BridgeError } from './errors.js';
export type { BridgeErrorKind } from './errors.js';
export { DEFAULT_GRACE_MS, HostClient } from './host-client.js';
export type { HostClientOptions } from './host-client.js';
export { loadConfig } from './config.js';
export type { BridgeConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export { paramSchema, registerTools, toolShape } from './tools.js';
