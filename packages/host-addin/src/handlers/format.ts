// Host lengths → transport (mm) for messages and response data.

import type { BodyReadback, DocumentSnapshot, Vec3 } from '@cad-relay/cad-model';
import { formatLength, toTransportLength } from '@cad-relay/protocol';

export function mm(value: number): string {
  return `${formatLength(value)} mm`;
}

export function point(v: Vec3): string {
  return `(${v.map(formatLength).join(', ')}) mm`;
}

export function plural(n: number, noun: string, nouns = `${noun}s`): string {
  return `${n} ${n === 1 ? noun : nouns}`;
}

function vec(v: Vec3): Vec3 {
  return [toTransportLength(v[0]), toTransportLength(v[1]), toTransportLength(v[2])];
}

export function bodyData(rb: BodyReadback): BodyReadback {
  return {
    ...rb,
    center: vec(rb.center),
    size: vec(rb.size),
    bounds: { min: vec(rb.bounds.min), max: vec(rb.bounds.max) },
    dimensions: Object.fromEntries(
      Object.entries(rb.dimensions).map(([key, value]) => [key, toTransportLength(value)]),
    ),
  };
}

export function snapshotData(snapshot: DocumentSnapshot): DocumentSnapshot {
  return { ...snapshot, bodies: snapshot.bodies.map(bodyData) };
}
