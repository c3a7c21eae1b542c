import { type Vec3, readback } from '@cad-relay/cad-model';
import {
  AXES, COMBINE_OPERATIONS, EDGE_FILTERS, readChoice, readNumber, readString,
} from '@cad-relay/protocol';
import type { Handler } from '../interpreter.js';
import { bodyData, mm, plural, point } from './format.js';

// ─── Selection ────────────────────────────────────────────────

const selectBody: Handler = (args, { document }) => {
  const name = readString(args, 'body_name');
  return { message: `Selected body "${name}"`, data: document.selectBodies([name]) };
};

const selectBodies: Handler = (args, { document }) => {
  const first = readString(args, 'body_name1');
  const second = readString(args, 'body_name2');
  return {
    message: `Selected bodies "${first}" (target) and "${second}" (tool)`,
    data: document.selectBodies([first, second]),
  };
};

const selectEdges: Handler = (args, { document }) => {
  const name = readString(args, 'body_name');
  const filter = readChoice(args, 'edge_type', EDGE_FILTERS);
  const selection = document.selectEdges(name, filter);
  const count = selection.kind === 'edges' ? selection.edges.length : 0;
  const noun = filter === 'all' ? 'edge' : `${filter} edge`;
  return { message: `Selected ${plural(count, noun)} of "${name}"`, data: selection };
};

// ─── Features and transforms ──────────────────────────────────

const addFillet: Handler = (args, { document }) => {
  const radius = readNumber(args, 'radius');
  const before = document.getSelection();
  const body = document.filletSelection(radius);
  const count = before.kind === 'edges' ? before.edges.length : 0;
  return {
    message: `Filleted ${plural(count, 'edge')} of "${body.name}" with radius ${mm(radius)}`,
    data: bodyData(readback(body)),
  };
};

const moveSelection: Handler = (args, { document }) => {
  const delta: Vec3 = [readNumber(args, 'x_dist'), readNumber(args, 'y_dist'), readNumber(args, 'z_dist')];
  const moved = document.translateSelection(delta);
  return {
    message: `Moved ${plural(moved.length, 'body', 'bodies')} by ${point(delta)}`,
    data: moved.map((b) => bodyData(readback(b))),
  };
};

const rotateSelection: Handler = (args, { document }) => {
  const axis = readChoice(args, 'axis', AXES);
  const angle = readNumber(args, 'angle');
  const center: Vec3 = [readNumber(args, 'cx'), readNumber(args, 'cy'), readNumber(args, 'cz')];
  const rotated = document.rotateSelection(axis, angle, center);
  return {
    message: `Rotated ${plural(rotated.length, 'body', 'bodies')} ${angle} deg about ${axis} through ${point(center)}`,
    data: rotated.map((b) => bodyData(readback(b))),
  };
};

// ─── Booleans ─────────────────────────────────────────────────

const combineSelection: Handler = (args, { document }) => {
  const operation = readChoice(args, 'operation', COMBINE_OPERATIONS);
  const result = document.combineSelection(operation);
  return {
    message: `Combined selected bodies (${operation}); result kept in "${result.name}"`,
    data: bodyData(readback(result)),
  };
};

const combineByName: Handler = (args, { document }) => {
  const target = readString(args, 'target_body');
  const tool = readString(args, 'tool_body');
  const operation = readChoice(args, 'operation', COMBINE_OPERATIONS);
  const result = document.combine(target, tool, operation);
  return {
    message: `Combined "${target}" with "${tool}" (${operation}); result kept in "${result.name}"`,
    data: bodyData(readback(result)),
  };
};

// ─── History ──────────────────────────────────────────────────

const undo: Handler = (_args, { document }) => `Undid ${document.undo()}`;

const redo: Handler = (_args, { document }) => `Redid ${document.redo()}`;

export const editingHandlers: ReadonlyArray<readonly [string, Handler]> = [
  ['select_body', selectBody],
  ['select_bodies', selectBodies],
  ['select_edges', selectEdges],
  ['add_fillet', addFillet],
  ['move_selection', moveSelection],
  ['rotate_selection', rotateSelection],
  ['combine_selection', combineSelection],
  ['combine_by_name', combineByName],
  ['undo', undo],
  ['redo', redo],
];
