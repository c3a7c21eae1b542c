// Catalog
export {
  OPERATIONS, PLANES, AXES, EDGE_FILTERS, COMBINE_OPERATIONS,
  BODY_NAME_PATTERN, NO_NAME,
  findOperation, operationNames,
} from './catalog.js';
export type {
  ParamKind, ParamSpec, OperationSpec,
  PlaneName, AxisName, EdgeFilter, CombineOperationName,
} from './catalog.js';

// Codec
export {
  decodeCommand, encodeCommand, encodeLegacy, encodeStructured,
  normalizeArgs, toHostArgs, requireOperation,
  readNumber, readString, readOptionalString, readChoice,
} from './command.js';
export type { ArgValue, Command, CommandArgs, CommandEncoding } from './command.js';

// Units
export {
  MM_PER_HOST_UNIT, TRANSPORT_LENGTH_UNIT, HOST_LENGTH_UNIT,
  toHostLength, toTransportLength, formatLength,
} from './units.js';

// Wire
export {
  COMMAND_PATH, HEALTH_PATH, DEFAULT_HOST, DEFAULT_PORT, DEFAULT_REQUEST_TIMEOUT_MS,
  commandRequestSchema, commandResponseSchema, responseStatusSchema, healthResponseSchema,
  success, failure, timedOut,
} from './wire.js';
export type { CommandRequest, CommandResponse, ResponseStatus } from './wire.js';

// Errors
export { ProtocolError, describeError } from './errors.js';
