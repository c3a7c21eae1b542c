// Lifecycle
export { startAddin } from './addin.js';
export type { AddinHandle, StartOptions } from './addin.js';
export { createAddinContext, serviceCommand } from './context.js';
export type { AddinContext, ContextOptions } from './context.js';

// Configuration + logging
export { DEFAULT_CONFIG, loadConfig } from './config.js';
export type { AddinConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Threading + transport
export { HostMainLoop, LoopStoppedError, MainThreadViolationError } from './main-loop.js';
export { COMMAND_SIGNAL_ID, DispatchSignal, SignalNotRegisteredError } from './dispatch-signal.js';
export type { CommandEvent } from './dispatch-signal.js';
export { ResponseMailbox } from './mailbox.js';
export { MAX_BODY_BYTES, startListener } from './listener.js';
export type { CommandListener } from './listener.js';

// Interpretation
export { CommandInterpreter } from './interpreter.js';
export type { Handler, HandlerContext, HandlerRegistry, HandlerReply, HandlerResult } from './interpreter.js';
export { buildHandlerRegistry } from './handlers/index.js';
