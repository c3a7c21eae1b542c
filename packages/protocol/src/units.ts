/**
 * Unit conversion at the decode boundary.
 *
 * Lengths travel in millimetres. The host models in centimetres, so every
 * length argument is divided by this fixed factor when a command is decoded.
 */

export const MM_PER_HOST_UNIT = 10;

export const TRANSPORT_LENGTH_UNIT = 'mm';
export const HOST_LENGTH_UNIT = 'cm';

/** Transport (mm) → host (cm). */
export function toHostLength(mm: number): number {
  return mm / MM_PER_HOST_UNIT;
}

/** Host (cm) → transport (mm), rounded to 6 decimals to hide float noise. */
export function toTransportLength(hostValue: number): number {
  return Math.round(hostValue * MM_PER_HOST_UNIT * 1e6) / 1e6;
}

/** Format a host length as a plain mm number for messages. */
export function formatLength(hostValue: number): string {
  return String(toTransportLength(hostValue));
}
