/** What went wrong on the bridge side of a call. */
export type BridgeErrorKind = 'unknown_tool' | 'invalid_args' | 'transport' | 'protocol';

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
  }
}
