import {
  OPERATIONS, TRANSPORT_LENGTH_UNIT, describeError, readString, toHostLength, toTransportLength,
} from '@cad-relay/protocol';
import type { Handler } from '../interpreter.js';
import { plural, snapshotData } from './format.js';

const getState: Handler = (_args, { document }) => {
  const snapshot = document.snapshot();
  return {
    message:
      `${plural(snapshot.bodies.length, 'body', 'bodies')}, ` +
      `undo depth ${snapshot.undoDepth}, redo depth ${snapshot.redoDepth}`,
    data: snapshotData(snapshot),
  };
};

const getApiInfo: Handler = () => ({
  message: `${OPERATIONS.length} operations; lengths in ${TRANSPORT_LENGTH_UNIT}`,
  data: OPERATIONS.map((op) => ({
    name: op.name,
    description: op.description,
    legacy: op.legacy,
    params: op.params.map((p) => ({
      name: p.name,
      kind: p.kind,
      required: p.required,
      ...(p.default !== undefined ? { default: p.default } : {}),
      ...(p.choices ? { choices: p.choices } : {}),
    })),
  })),
});

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function show(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Run a function body with `doc`, `units` and `print` in scope. The return
 * value, when there is one, is appended to the printed output. The body runs
 * synchronously inside the main-loop item; a returned promise is refused.
 */
const executeCode: Handler = (args, { document, config, logger }) => {
  if (!config.allowCodeExecution) {
    throw new Error('Code execution is disabled on this host. Start it with CAD_RELAY_ALLOW_CODE=true to enable it.');
  }
  const code = readString(args, 'code');
  const output: string[] = [];
  const print = (...values: unknown[]): void => {
    output.push(values.map(show).join(' '));
  };
  const units = { fromMm: toHostLength, toMm: toTransportLength };

  logger.warn({ length: code.length }, 'executing user code');
  const fn = new Function('doc', 'units', 'print', code);
  const result: unknown = fn(document, units, print);
  if (isThenable(result)) {
    result.then(undefined, (err: unknown) => {
      logger.warn({ reason: describeError(err) }, 'promise returned by user code rejected');
    });
    throw new Error('Code returned a promise. Only synchronous code runs on the host main thread; drop async and await.');
  }
  if (result !== undefined) output.push(show(result));

  return { message: output.length > 0 ? output.join('\n') : 'Code executed (no output)', data: { output } };
};

export const introspectionHandlers: ReadonlyArray<readonly [string, Handler]> = [
  ['get_state', getState],
  ['get_api_info', getApiInfo],
  ['execute_arbitrary_code', executeCode],
];
