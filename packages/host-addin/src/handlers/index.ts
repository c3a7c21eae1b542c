import { operationNames } from '@cad-relay/protocol';
import type { Handler, HandlerRegistry } from '../interpreter.js';
import { editingHandlers } from './editing.js';
import { introspectionHandlers } from './introspection.js';
import { primitiveHandlers } from './primitives.js';

/** One handler per catalog operation; throws if the two ever drift apart. */
export function buildHandlerRegistry(): HandlerRegistry {
  const registry = new Map<string, Handler>([...primitiveHandlers, ...editingHandlers, ...introspectionHandlers]);
  const missing = operationNames().filter((name) => !registry.has(name));
  if (missing.length > 0) {
    throw new Error(`No handler for operations: [${missing.join(', ')}]`);
  }
  return registry;
}
