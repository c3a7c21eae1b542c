/**
 * Command codec.
 *
 * Two encodings share one catalog:
 *
 *   legacy      create_cube 10 none xy 0 0 0
 *   structured  {"type":"create_cube","size":10,"plane":"xy","cx":0,"cy":0,"cz":0}
 *
 * Arguments are validated and defaulted in transport units (mm) by
 * normalizeArgs(); decodeCommand() additionally scales lengths to host units.
 */

import { z } from 'zod';
import { BODY_NAME_PATTERN, NO_NAME, findOperation, type OperationSpec, type ParamSpec } from './catalog.js';
import { ProtocolError, describeError } from './errors.js';
import { toHostLength } from './units.js';

export type ArgValue = number | string;
export type CommandArgs = Readonly<Record<string, ArgValue>>;
export type CommandEncoding = 'legacy' | 'structured';

export interface Command {
  readonly operation: string;
  /** Lengths already in host units. */
  readonly args: CommandArgs;
  readonly encoding: CommandEncoding;
}

const structuredHeader = z.object({
  type: z.string({ required_error: 'Structured command needs a "type" field' }).min(1, 'Structured command "type" must not be empty'),
}).passthrough();

/** Look up an operation or throw a ProtocolError naming it. */
export function requireOperation(name: string): OperationSpec {
  const op = findOperation(name);
  if (!op) {
    throw new ProtocolError(`Unknown operation "${name}"`, 'operation');
  }
  return op;
}

// ─── Argument validation ────────────────────────────────────

function isNumeric(kind: ParamSpec['kind']): boolean {
  return kind === 'length' || kind === 'angle';
}

function coerceArg(op: OperationSpec, param: ParamSpec, raw: unknown): ArgValue | undefined {
  if (param.kind === 'name' && (raw === undefined || raw === null || raw === NO_NAME)) {
    return undefined;
  }
  if (raw === undefined || raw === null) {
    if (param.default !== undefined) return param.default;
    if (param.required) {
      throw new ProtocolError(`Missing required argument "${param.name}" for ${op.name}`, param.name);
    }
    return undefined;
  }

  if (isNumeric(param.kind)) {
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new ProtocolError(
        `Argument "${param.name}" of ${op.name} must be a finite number, got ${JSON.stringify(raw)}`,
        param.name,
      );
    }
    if (param.positive && raw <= 0) {
      throw new ProtocolError(`Argument "${param.name}" of ${op.name} must be positive, got ${raw}`, param.name);
    }
    return raw;
  }

  if (typeof raw !== 'string') {
    throw new ProtocolError(
      `Argument "${param.name}" of ${op.name} must be a string, got ${JSON.stringify(raw)}`,
      param.name,
    );
  }

  switch (param.kind) {
    case 'body':
    case 'name':
      if (!BODY_NAME_PATTERN.test(raw)) {
        throw new ProtocolError(
          `Invalid body name "${raw}" for "${param.name}". Use only letters, digits, hyphens, underscores.`,
          param.name,
        );
      }
      return raw;
    case 'choice': {
      const choices: readonly string[] = param.choices ?? [];
      if (!choices.includes(raw)) {
        throw new ProtocolError(
          `Argument "${param.name}" of ${op.name} must be one of [${choices.join(', ')}], got "${raw}"`,
          param.name,
        );
      }
      return raw;
    }
    default:
      return raw;
  }
}

/**
 * Validate raw arguments against the catalog and fill defaults.
 * Unknown argument names are rejected. Values stay in transport units.
 */
export function normalizeArgs(op: OperationSpec, raw: Readonly<Record<string, unknown>>): CommandArgs {
  const known = new Set(op.params.map((p) => p.name));
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      throw new ProtocolError(`Unknown argument "${key}" for ${op.name}`, key);
    }
  }
  const args: Record<string, ArgValue> = {};
  for (const param of op.params) {
    const value = coerceArg(op, param, raw[param.name]);
    if (value !== undefined) args[param.name] = value;
  }
  return args;
}

/** Scale every length argument from transport to host units. */
export function toHostArgs(op: OperationSpec, args: CommandArgs): CommandArgs {
  const scaled: Record<string, ArgValue> = { ...args };
  for (const param of op.params) {
    const value = args[param.name];
    if (param.kind === 'length' && typeof value === 'number') {
      scaled[param.name] = toHostLength(value);
    }
  }
  return scaled;
}

// ─── Encoding ───────────────────────────────────────────────

/** Positional form. `args` must already be normalized. */
export function encodeLegacy(op: OperationSpec, args: CommandArgs): string {
  if (!op.legacy) {
    throw new ProtocolError(`Operation "${op.name}" has no legacy form`, 'operation');
  }
  const tokens = [op.name];
  for (const param of op.params) {
    const value = args[param.name];
    if (value === undefined) {
      if (param.kind === 'name') {
        tokens.push(NO_NAME);
        continue;
      }
      // Only trailing optional params without defaults can be absent.
      break;
    }
    tokens.push(String(value));
  }
  return tokens.join(' ');
}

/** JSON form. `args` must already be normalized. */
export function encodeStructured(op: OperationSpec, args: CommandArgs): string {
  return JSON.stringify({ type: op.name, ...args });
}

/**
 * Validate a call and build its wire string. Operations without a legacy
 * form always go structured.
 */
export function encodeCommand(
  name: string,
  raw: Readonly<Record<string, unknown>>,
  encoding: CommandEncoding = 'structured',
): string {
  const op = requireOperation(name);
  const args = normalizeArgs(op, raw);
  return encoding === 'legacy' && op.legacy ? encodeLegacy(op, args) : encodeStructured(op, args);
}

// ─── Decoding ───────────────────────────────────────────────

function freeze(op: OperationSpec, args: CommandArgs, encoding: CommandEncoding): Command {
  return Object.freeze({ operation: op.name, args: Object.freeze(toHostArgs(op, args)), encoding });
}

function decodeLegacy(text: string): Command {
  const [name = '', ...tokens] = text.split(/\s+/);
  const op = requireOperation(name);
  if (!op.legacy) {
    throw new ProtocolError(`Operation "${name}" is only accepted in the structured form`, 'operation');
  }
  if (tokens.length > op.params.length) {
    throw new ProtocolError(
      `Too many arguments for ${name}: expected at most ${op.params.length}, got ${tokens.length}`,
      'arguments',
    );
  }
  const raw: Record<string, unknown> = {};
  op.params.forEach((param, i) => {
    const token = tokens[i];
    if (token === undefined) return;
    if (isNumeric(param.kind)) {
      const n = Number(token);
      raw[param.name] = Number.isFinite(n) ? n : token;
    } else {
      raw[param.name] = token;
    }
  });
  return freeze(op, normalizeArgs(op, raw), 'legacy');
}

function decodeStructured(text: string): Command {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`Malformed structured command: ${describeError(err)}`, 'command');
  }
  const header = structuredHeader.safeParse(parsed);
  if (!header.success) {
    const issue = header.error.issues[0];
    throw new ProtocolError(issue?.message ?? 'Structured command must be an object with a "type" field', 'type');
  }
  const { type, ...rest } = header.data;
  const op = requireOperation(type);
  return freeze(op, normalizeArgs(op, rest), 'structured');
}

/** Decode either wire form into a frozen, host-unit Command. */
export function decodeCommand(text: string): Command {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new ProtocolError('Empty command', 'command');
  }
  return trimmed.startsWith('{') ? decodeStructured(trimmed) : decodeLegacy(trimmed);
}

// ─── Typed argument readers ─────────────────────────────────

export function readNumber(args: CommandArgs, name: string): number {
  const value = args[name];
  if (typeof value !== 'number') {
    throw new ProtocolError(`Argument "${name}" is missing or not a number`, name);
  }
  return value;
}

export function readString(args: CommandArgs, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new ProtocolError(`Argument "${name}" is missing or not a string`, name);
  }
  return value;
}

export function readOptionalString(args: CommandArgs, name: string): string | undefined {
  const value = args[name];
  return typeof value === 'string' ? value : undefined;
}

export function readChoice<T extends string>(args: CommandArgs, name: string, choices: readonly T[]): T {
  const value = readString(args, name);
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new ProtocolError(`Argument "${name}" must be one of [${choices.join(', ')}], got "${value}"`, name);
  }
  return match;
}
