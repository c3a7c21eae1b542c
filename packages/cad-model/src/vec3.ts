/** Minimal 3D vectors as plain tuples. */
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export type Axis = 'x' | 'y' | 'z';

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function axisIndex(axis: Axis): 0 | 1 | 2 {
  return axis === 'x' ? 0 : axis === 'y' ? 1 : 2;
}

/** Snap float noise (e.g. cos 90°) to zero. */
export function clean(v: number): number {
  return Math.abs(v) < 1e-9 ? 0 : v;
}

export function boundsOf(center: Vec3, size: Vec3): BoundingBox {
  return {
    min: [center[0] - size[0] / 2, center[1] - size[1] / 2, center[2] - size[2] / 2],
    max: [center[0] + size[0] / 2, center[1] + size[1] / 2, center[2] + size[2] / 2],
  };
}

export function centerOf(b: BoundingBox): Vec3 {
  return [(b.min[0] + b.max[0]) / 2, (b.min[1] + b.max[1]) / 2, (b.min[2] + b.max[2]) / 2];
}

export function sizeOf(b: BoundingBox): Vec3 {
  return [b.max[0] - b.min[0], b.max[1] - b.min[1], b.max[2] - b.min[2]];
}

export function unionBounds(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    min: [Math.min(a.min[0], b.min[0]), Math.min(a.min[1], b.min[1]), Math.min(a.min[2], b.min[2])],
    max: [Math.max(a.max[0], b.max[0]), Math.max(a.max[1], b.max[1]), Math.max(a.max[2], b.max[2])],
  };
}

/** Overlap of two boxes, or null when they only touch or are apart. */
export function intersectBounds(a: BoundingBox, b: BoundingBox): BoundingBox | null {
  const min: Vec3 = [Math.max(a.min[0], b.min[0]), Math.max(a.min[1], b.min[1]), Math.max(a.min[2], b.min[2])];
  const max: Vec3 = [Math.min(a.max[0], b.max[0]), Math.min(a.max[1], b.max[1]), Math.min(a.max[2], b.max[2])];
  if (min[0] >= max[0] || min[1] >= max[1] || min[2] >= max[2]) return null;
  return { min, max };
}

/** Rotate point p about the line through `center` parallel to `axis`. */
export function rotatePoint(p: Vec3, axis: Axis, degrees: number, center: Vec3): Vec3 {
  const rad = (degrees * Math.PI) / 180;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  const d = sub(p, center);
  let r: Vec3;
  switch (axis) {
    case 'x': r = [d[0], c * d[1] - s * d[2], s * d[1] + c * d[2]]; break;
    case 'y': r = [c * d[0] + s * d[2], d[1], -s * d[0] + c * d[2]]; break;
    case 'z': r = [c * d[0] - s * d[1], s * d[0] + c * d[1], d[2]]; break;
  }
  const out = add(r, center);
  return [clean(out[0]), clean(out[1]), clean(out[2])];
}

/** Extents of an axis-aligned box after rotating it about `axis`. */
export function rotateExtents(size: Vec3, axis: Axis, degrees: number): Vec3 {
  const rad = (degrees * Math.PI) / 180;
  const c = Math.abs(clean(Math.cos(rad)));
  const s = Math.abs(clean(Math.sin(rad)));
  const [sx, sy, sz] = size;
  switch (axis) {
    case 'x': return [sx, c * sy + s * sz, s * sy + c * sz];
    case 'y': return [c * sx + s * sz, sy, s * sx + c * sz];
    case 'z': return [c * sx + s * sy, s * sx + c * sy, sz];
  }
}
