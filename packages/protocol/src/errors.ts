/** Raised for malformed commands, unknown operations and bad arguments. */
export class ProtocolError extends Error {
  /** The command field at fault: "type", "operation", or an argument name. */
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ProtocolError';
    this.field = field;
  }
}

/** Message of any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
