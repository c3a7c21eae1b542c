// Document
export { CadDocument } from './document.js';
export type {
  CadDocumentOptions, CombineOperation, DocumentSnapshot, EdgeSelectionFilter, Selection,
} from './document.js';

// Bodies
export { createPrimitive, readback } from './body.js';
export type { Body, BodyKind, BodyReadback, Edge, EdgeKind, Placement, Plane, PrimitiveSpec } from './body.js';

// Vectors
export type { Axis, BoundingBox, Vec3 } from './vec3.js';
export { boundsOf } from './vec3.js';
