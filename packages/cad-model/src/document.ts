/**
 * CadDocument: the host's in-memory design.
 *
 * Holds named bodies, the current selection and an undo/redo timeline.
 * Every mutation runs the owner guard first (the host passes a main-thread
 * assertion), validates its preconditions, and only then changes state, so
 * a rejected operation leaves the document untouched.
 */

import {
  type Body, type BodyReadback, type Edge, type Placement, type PrimitiveSpec,
  createPrimitive, minExtent, numberEdges, readback,
} from './body.js';
import {
  type Axis, type BoundingBox, type Vec3,
  add, boundsOf, centerOf, intersectBounds, rotateExtents, rotatePoint, sizeOf, unionBounds,
} from './vec3.js';

export type CombineOperation = 'join' | 'cut' | 'intersect';
export type EdgeSelectionFilter = 'all' | 'circular';

export type Selection =
  | { kind: 'none' }
  | { kind: 'bodies'; bodies: readonly string[] }
  | { kind: 'edges'; body: string; edges: readonly string[] };

export interface CadDocumentOptions {
  /** Called with the action name before any mutation; throws to refuse. */
  assertOwner?: (action: string) => void;
  /** Renders host lengths in error messages. */
  formatLength?: (value: number) => string;
}

export interface DocumentSnapshot {
  bodies: BodyReadback[];
  selection: Selection;
  undoDepth: number;
  redoDepth: number;
  history: string[];
}

interface DocumentState {
  bodies: ReadonlyMap<string, Body>;
  nextId: number;
}

interface TimelineEntry {
  label: string;
  state: DocumentState;
}

const NOTHING_SELECTED: Selection = { kind: 'none' };

export class CadDocument {
  private bodies = new Map<string, Body>();
  private nextId = 1;
  private selection: Selection = NOTHING_SELECTED;
  private undoStack: TimelineEntry[] = [];
  private redoStack: TimelineEntry[] = [];
  private readonly assertOwner: (action: string) => void;
  private readonly fmt: (value: number) => string;

  constructor(options: CadDocumentOptions = {}) {
    this.assertOwner = options.assertOwner ?? (() => {});
    this.fmt = options.formatLength ?? ((v) => String(v));
  }

  // ─── Queries ────────────────────────────────────────────────

  get bodyCount(): number {
    return this.bodies.size;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  listBodies(): Body[] {
    return [...this.bodies.values()];
  }

  hasBody(name: string): boolean {
    return this.bodies.has(name);
  }

  /** Retrieve a body or throw a clear error. */
  getBody(name: string): Body {
    const body = this.bodies.get(name);
    if (!body) {
      const available = [...this.bodies.keys()];
      throw new Error(`Body "${name}" not found. Available bodies: [${available.join(', ')}]`);
    }
    return body;
  }

  getSelection(): Selection {
    return this.selection;
  }

  snapshot(): DocumentSnapshot {
    return {
      bodies: this.listBodies().map(readback),
      selection: this.selection,
      undoDepth: this.undoStack.length,
      redoDepth: this.redoStack.length,
      history: this.undoStack.map((entry) => entry.label),
    };
  }

  // ─── Creation ───────────────────────────────────────────────

  addPrimitive(spec: PrimitiveSpec, placement: Placement, name?: string): Body {
    this.assertOwner(`create ${spec.kind}`);
    if (name !== undefined && this.bodies.has(name)) {
      throw new Error(`Body "${name}" already exists. Use a different name.`);
    }
    const id = name ?? this.autoName();
    const body = createPrimitive(id, spec, placement);
    this.commit(`create ${spec.kind} ${id}`, () => {
      this.bodies.set(id, body);
    });
    return body;
  }

  // ─── Selection ──────────────────────────────────────────────

  selectBodies(names: readonly string[]): Selection {
    this.assertOwner('select bodies');
    if (names.length === 0) {
      throw new Error('Select at least one body.');
    }
    for (const name of names) this.getBody(name);
    this.selection = { kind: 'bodies', bodies: [...names] };
    return this.selection;
  }

  selectEdges(bodyName: string, filter: EdgeSelectionFilter): Selection {
    this.assertOwner('select edges');
    const body = this.getBody(bodyName);
    const edges = body.edges.filter((e) => filter === 'all' || e.kind === 'circular');
    if (edges.length === 0) {
      const what = filter === 'all' ? 'edges' : `${filter} edges`;
      throw new Error(`Body "${bodyName}" has no ${what} to select.`);
    }
    this.selection = { kind: 'edges', body: bodyName, edges: edges.map((e) => e.id) };
    return this.selection;
  }

  // ─── Editing ────────────────────────────────────────────────

  /** Fillet the selected edges. Returns the updated body. */
  filletSelection(radius: number): Body {
    this.assertOwner('fillet');
    const sel = this.selection;
    if (sel.kind !== 'edges') {
      throw new Error('Fillet needs selected edges. Use select_edges first.');
    }
    if (radius <= 0) {
      throw new Error(`Fillet radius must be positive, got ${this.fmt(radius)}.`);
    }
    const body = this.getBody(sel.body);
    const limit = minExtent(body) / 2;
    if (radius >= limit) {
      throw new Error(
        `Fillet radius ${this.fmt(radius)} is too large for body "${body.name}" (must be below ${this.fmt(limit)}).`,
      );
    }
    const chosen = new Set(sel.edges);
    const edges: Edge[] = body.edges.map((e) => (chosen.has(e.id) ? { ...e, fillet: radius } : e));
    const updated: Body = { ...body, edges };
    this.commit(`fillet ${body.name}`, () => {
      this.bodies.set(body.name, updated);
    });
    return updated;
  }

  translateSelection(delta: Vec3): Body[] {
    this.assertOwner('move');
    const targets = this.selectedBodies('Move');
    const moved = targets.map((b) => ({ ...b, center: add(b.center, delta) }));
    this.commit(`move ${targets.map((b) => b.name).join(', ')}`, () => {
      for (const b of moved) this.bodies.set(b.name, b);
    });
    return moved;
  }

  rotateSelection(axis: Axis, degrees: number, center: Vec3): Body[] {
    this.assertOwner('rotate');
    const targets = this.selectedBodies('Rotate');
    const rotated = targets.map((b) => ({
      ...b,
      center: rotatePoint(b.center, axis, degrees, center),
      size: rotateExtents(b.size, axis, degrees),
    }));
    this.commit(`rotate ${targets.map((b) => b.name).join(', ')}`, () => {
      for (const b of rotated) this.bodies.set(b.name, b);
    });
    return rotated;
  }

  // ─── Booleans ───────────────────────────────────────────────

  /** Combine the two selected bodies; the first selected is the target. */
  combineSelection(operation: CombineOperation): Body {
    this.assertOwner('combine');
    const sel = this.selection;
    const count = sel.kind === 'bodies' ? sel.bodies.length : 0;
    if (sel.kind !== 'bodies' || count !== 2) {
      throw new Error(
        `Combine needs exactly two selected bodies (target, tool); ${count} selected. Use select_bodies first.`,
      );
    }
    const [target, tool] = sel.bodies;
    return this.combine(target, tool, operation);
  }

  /** Combine tool into target. The tool body is consumed. */
  combine(targetName: string, toolName: string, operation: CombineOperation): Body {
    this.assertOwner('combine');
    if (targetName === toolName) {
      throw new Error(`Cannot combine body "${targetName}" with itself.`);
    }
    const target = this.getBody(targetName);
    const tool = this.getBody(toolName);
    const a = boundsOf(target.center, target.size);
    const b = boundsOf(tool.center, tool.size);

    let bounds: BoundingBox;
    switch (operation) {
      case 'join':
        bounds = unionBounds(a, b);
        break;
      case 'cut':
        bounds = a;
        break;
      case 'intersect': {
        const overlap = intersectBounds(a, b);
        if (!overlap) {
          throw new Error(`Bodies "${targetName}" and "${toolName}" do not overlap; intersect would leave nothing.`);
        }
        bounds = overlap;
        break;
      }
    }

    const result: Body = {
      name: target.name,
      kind: 'combined',
      plane: target.plane,
      center: centerOf(bounds),
      size: sizeOf(bounds),
      edges: numberEdges([...target.edges, ...tool.edges].map((e) => e.kind)),
      dimensions: {},
    };
    this.commit(`${operation} ${targetName} ${toolName}`, () => {
      this.bodies.set(result.name, result);
      this.bodies.delete(toolName);
      this.selection = NOTHING_SELECTED;
    });
    return result;
  }

  // ─── Timeline ───────────────────────────────────────────────

  /** Undo the last operation; returns its label. */
  undo(): string {
    this.assertOwner('undo');
    const entry = this.undoStack.pop();
    if (!entry) throw new Error('Nothing to undo.');
    this.redoStack.push({ label: entry.label, state: this.capture() });
    this.restore(entry.state);
    return entry.label;
  }

  /** Redo the last undone operation; returns its label. */
  redo(): string {
    this.assertOwner('redo');
    const entry = this.redoStack.pop();
    if (!entry) throw new Error('Nothing to redo.');
    this.undoStack.push({ label: entry.label, state: this.capture() });
    this.restore(entry.state);
    return entry.label;
  }

  // ─── Internals ──────────────────────────────────────────────

  private selectedBodies(action: string): Body[] {
    const sel = this.selection;
    if (sel.kind !== 'bodies') {
      throw new Error(`${action} needs selected bodies. Use select_body or select_bodies first.`);
    }
    return sel.bodies.map((name) => this.getBody(name));
  }

  private autoName(): string {
    let id = `Body${this.nextId++}`;
    while (this.bodies.has(id)) id = `Body${this.nextId++}`;
    return id;
  }

  private capture(): DocumentState {
    return { bodies: new Map(this.bodies), nextId: this.nextId };
  }

  private restore(state: DocumentState): void {
    this.bodies = new Map(state.bodies);
    this.nextId = state.nextId;
    this.selection = NOTHING_SELECTED;
  }

  private commit(label: string, mutate: () => void): void {
    const before = this.capture();
    mutate();
    this.undoStack.push({ label, state: before });
    this.redoStack = [];
  }
}
