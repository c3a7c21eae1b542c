/**
 * Bodies: immutable solid records held by a CadDocument.
 *
 * Geometry is analytic and shallow: a placement, world-axis extents and an
 * edge table. That is all selection, fillet, transform and combine need.
 * All lengths are host units.
 */

import { type BoundingBox, type Vec3, boundsOf } from './vec3.js';

export type BodyKind =
  | 'cube' | 'box' | 'cylinder' | 'sphere' | 'cone'
  | 'sq_pyramid' | 'tri_pyramid' | 'combined';

export type Plane = 'xy' | 'yz' | 'xz';

export type EdgeKind = 'linear' | 'circular';

export interface Edge {
  id: string;
  kind: EdgeKind;
  /** Fillet radius, once filleted. */
  fillet?: number;
}

export interface Body {
  readonly name: string;
  readonly kind: BodyKind;
  readonly plane: Plane;
  readonly center: Vec3;
  /** Full extents along world X, Y, Z. */
  readonly size: Vec3;
  readonly edges: readonly Edge[];
  /** Construction dimensions as given. Empty for combined bodies. */
  readonly dimensions: Readonly<Record<string, number>>;
}

export type PrimitiveSpec =
  | { kind: 'cube'; size: number }
  | { kind: 'box'; width: number; depth: number; height: number }
  | { kind: 'cylinder'; radius: number; height: number }
  | { kind: 'sphere'; radius: number }
  | { kind: 'cone'; radius: number; height: number }
  | { kind: 'sq_pyramid'; side_length: number; height: number }
  | { kind: 'tri_pyramid'; side_length: number; height: number };

export interface Placement {
  plane: Plane;
  center: Vec3;
}

interface PrimitiveShape {
  /** Extents in the sketch frame: along u, along v, along the plane normal. */
  local: Vec3;
  edges: EdgeKind[];
  dimensions: Record<string, number>;
}

function repeat(kind: EdgeKind, n: number): EdgeKind[] {
  return Array.from({ length: n }, () => kind);
}

function shapeOf(spec: PrimitiveSpec): PrimitiveShape {
  switch (spec.kind) {
    case 'cube':
      return { local: [spec.size, spec.size, spec.size], edges: repeat('linear', 12), dimensions: { size: spec.size } };
    case 'box':
      return {
        local: [spec.width, spec.depth, spec.height],
        edges: repeat('linear', 12),
        dimensions: { width: spec.width, depth: spec.depth, height: spec.height },
      };
    case 'cylinder':
      return {
        local: [2 * spec.radius, 2 * spec.radius, spec.height],
        edges: repeat('circular', 2),
        dimensions: { radius: spec.radius, height: spec.height },
      };
    case 'sphere': {
      const d = 2 * spec.radius;
      return { local: [d, d, d], edges: [], dimensions: { radius: spec.radius } };
    }
    case 'cone':
      return {
        local: [2 * spec.radius, 2 * spec.radius, spec.height],
        edges: repeat('circular', 1),
        dimensions: { radius: spec.radius, height: spec.height },
      };
    case 'sq_pyramid':
      return {
        local: [spec.side_length, spec.side_length, spec.height],
        edges: repeat('linear', 8),
        dimensions: { side_length: spec.side_length, height: spec.height },
      };
    case 'tri_pyramid':
      return {
        local: [spec.side_length, (spec.side_length * Math.sqrt(3)) / 2, spec.height],
        edges: repeat('linear', 6),
        dimensions: { side_length: spec.side_length, height: spec.height },
      };
  }
}

/** Sketch frame (u, v, normal) → world extents. */
function toWorld(local: Vec3, plane: Plane): Vec3 {
  const [u, v, n] = local;
  switch (plane) {
    case 'xy': return [u, v, n];
    case 'yz': return [n, u, v];
    case 'xz': return [u, n, v];
  }
}

export function numberEdges(kinds: readonly EdgeKind[]): Edge[] {
  return kinds.map((kind, i) => ({ id: `e${i + 1}`, kind }));
}

export function createPrimitive(name: string, spec: PrimitiveSpec, placement: Placement): Body {
  const shape = shapeOf(spec);
  return {
    name,
    kind: spec.kind,
    plane: placement.plane,
    center: placement.center,
    size: toWorld(shape.local, placement.plane),
    edges: numberEdges(shape.edges),
    dimensions: shape.dimensions,
  };
}

/** Smallest extent, the upper bound for anything cut into the body. */
export function minExtent(body: Body): number {
  return Math.min(...body.size);
}

// ─── Readback ─────────────────────────────────────────────────

export interface BodyReadback {
  name: string;
  kind: BodyKind;
  plane: Plane;
  center: Vec3;
  size: Vec3;
  bounds: BoundingBox;
  dimensions: Record<string, number>;
  edges: { total: number; linear: number; circular: number; filleted: number };
}

export function readback(body: Body): BodyReadback {
  return {
    name: body.name,
    kind: body.kind,
    plane: body.plane,
    center: [...body.center],
    size: [...body.size],
    bounds: boundsOf(body.center, body.size),
    dimensions: { ...body.dimensions },
    edges: {
      total: body.edges.length,
      linear: body.edges.filter((e) => e.kind === 'linear').length,
      circular: body.edges.filter((e) => e.kind === 'circular').length,
      filleted: body.edges.filter((e) => e.fillet !== undefined).length,
    },
  };
}
