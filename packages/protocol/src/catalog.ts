/**
 * Operation catalog: every command the host add-in understands.
 *
 * The same table drives the bridge's tool schemas, the legacy positional
 * grammar (parameter order = argument order) and argument validation on
 * both sides of the wire.
 */

export type ParamKind =
  | 'length'   // mm on the wire, scaled to host units on decode
  | 'angle'    // degrees, never scaled
  | 'body'     // reference to an existing body name
  | 'name'     // optional name for a new body; "none" = auto
  | 'choice'   // one of `choices`
  | 'text';    // free text, structured form only

export interface ParamSpec {
  name: string;
  kind: ParamKind;
  description: string;
  required: boolean;
  default?: number | string;
  choices?: readonly [string, ...string[]];
  /** Reject zero and negative values. */
  positive?: boolean;
}

export interface OperationSpec {
  name: string;
  description: string;
  params: readonly ParamSpec[];
  /** Whether the whitespace-delimited legacy form can carry this operation. */
  legacy: boolean;
}

export const PLANES = ['xy', 'yz', 'xz'] as const;
export const AXES = ['x', 'y', 'z'] as const;
export const EDGE_FILTERS = ['all', 'circular'] as const;
export const COMBINE_OPERATIONS = ['join', 'cut', 'intersect'] as const;

export type PlaneName = (typeof PLANES)[number];
export type AxisName = (typeof AXES)[number];
export type EdgeFilter = (typeof EDGE_FILTERS)[number];
export type CombineOperationName = (typeof COMBINE_OPERATIONS)[number];

/** Body names: letters, digits, hyphens, underscores. */
export const BODY_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Legacy spelling of "no name given". */
export const NO_NAME = 'none';

// ─── Param builders ─────────────────────────────────────────

function length(name: string, description: string, opts: { positive?: boolean; default?: number } = {}): ParamSpec {
  return {
    name,
    kind: 'length',
    description: `${description} (mm)`,
    required: opts.default === undefined,
    default: opts.default,
    positive: opts.positive,
  };
}

function body(name: string, description: string): ParamSpec {
  return { name, kind: 'body', description, required: true };
}

function choice(
  name: string,
  choices: readonly [string, ...string[]],
  description: string,
  fallback?: string,
): ParamSpec {
  return { name, kind: 'choice', description, required: fallback === undefined, default: fallback, choices };
}

/** Trailing `[name|none] [plane] [cx] [cy] [cz]` shared by every primitive. */
const PLACEMENT: readonly ParamSpec[] = [
  {
    name: 'name',
    kind: 'name',
    description: 'Optional body name (letters, digits, hyphens, underscores)',
    required: false,
  },
  choice('plane', PLANES, 'Construction plane', 'xy'),
  length('cx', 'Center X', { default: 0 }),
  length('cy', 'Center Y', { default: 0 }),
  length('cz', 'Center Z', { default: 0 }),
];

// ─── Catalog ────────────────────────────────────────────────

export const OPERATIONS: readonly OperationSpec[] = [
  // Primitives (7)
  {
    name: 'create_cube',
    description: 'Create a cube with the given edge length.',
    params: [length('size', 'Edge length', { positive: true }), ...PLACEMENT],
    legacy: true,
  },
  {
    name: 'create_cylinder',
    description: 'Create a cylinder standing on the construction plane.',
    params: [
      length('radius', 'Radius', { positive: true }),
      length('height', 'Height', { positive: true }),
      ...PLACEMENT,
    ],
    legacy: true,
  },
  {
    name: 'create_box',
    description: 'Create a rectangular box.',
    params: [
      length('width', 'Width', { positive: true }),
      length('depth', 'Depth', { positive: true }),
      length('height', 'Height', { positive: true }),
      ...PLACEMENT,
    ],
    legacy: true,
  },
  {
    name: 'create_sphere',
    description: 'Create a sphere.',
    params: [length('radius', 'Radius', { positive: true }), ...PLACEMENT],
    legacy: true,
  },
  {
    name: 'create_cone',
    description: 'Create a cone with its base on the construction plane.',
    params: [
      length('radius', 'Base radius', { positive: true }),
      length('height', 'Height', { positive: true }),
      ...PLACEMENT,
    ],
    legacy: true,
  },
  {
    name: 'create_sq_pyramid',
    description: 'Create a pyramid with a square base.',
    params: [
      length('side_length', 'Base side length', { positive: true }),
      length('height', 'Height', { positive: true }),
      ...PLACEMENT,
    ],
    legacy: true,
  },
  {
    name: 'create_tri_pyramid',
    description: 'Create a pyramid with an equilateral triangle base.',
    params: [
      length('side_length', 'Base side length', { positive: true }),
      length('height', 'Height', { positive: true }),
      ...PLACEMENT,
    ],
    legacy: true,
  },

  // Selection (3)
  {
    name: 'select_body',
    description: 'Select a single body by name.',
    params: [body('body_name', 'Name of the body to select')],
    legacy: true,
  },
  {
    name: 'select_bodies',
    description: 'Select two bodies by name, e.g. before combine_selection.',
    params: [body('body_name1', 'First body'), body('body_name2', 'Second body')],
    legacy: true,
  },
  {
    name: 'select_edges',
    description: 'Select the edges of a body, e.g. before add_fillet.',
    params: [
      body('body_name', 'Body whose edges are selected'),
      choice('edge_type', EDGE_FILTERS, 'Which edges to select'),
    ],
    legacy: true,
  },

  // Editing (3)
  {
    name: 'add_fillet',
    description: 'Fillet the selected edges. Select edges with select_edges first.',
    params: [length('radius', 'Fillet radius', { positive: true })],
    legacy: true,
  },
  {
    name: 'move_selection',
    description: 'Move the selected bodies. Select bodies with select_body first.',
    params: [length('x_dist', 'X distance'), length('y_dist', 'Y distance'), length('z_dist', 'Z distance')],
    legacy: true,
  },
  {
    name: 'rotate_selection',
    description: 'Rotate the selected bodies about an axis through a center point.',
    params: [
      choice('axis', AXES, 'Rotation axis'),
      { name: 'angle', kind: 'angle', description: 'Rotation angle (degrees)', required: true },
      length('cx', 'Rotation center X'),
      length('cy', 'Rotation center Y'),
      length('cz', 'Rotation center Z'),
    ],
    legacy: true,
  },

  // Booleans (2)
  {
    name: 'combine_selection',
    description: 'Combine the two selected bodies. The first selected body is the target.',
    params: [choice('operation', COMBINE_OPERATIONS, 'join, cut or intersect')],
    legacy: true,
  },
  {
    name: 'combine_by_name',
    description: 'Combine two bodies by name. The target survives, the tool body is consumed.',
    params: [
      body('target_body', 'Body that keeps the result'),
      body('tool_body', 'Body used as the tool'),
      choice('operation', COMBINE_OPERATIONS, 'join, cut or intersect'),
    ],
    legacy: true,
  },

  // History (2)
  { name: 'undo', description: 'Undo the last modeling operation.', params: [], legacy: true },
  { name: 'redo', description: 'Redo the last undone operation.', params: [], legacy: true },

  // Introspection (3)
  {
    name: 'get_state',
    description: 'Report every body, the current selection and the undo/redo depth.',
    params: [],
    legacy: false,
  },
  {
    name: 'get_api_info',
    description: 'List the operations the host add-in accepts, with their parameters.',
    params: [],
    legacy: false,
  },
  {
    name: 'execute_arbitrary_code',
    description:
      'Run a JavaScript function body on the host main thread. `doc` is the CAD document, ' +
      '`units` converts lengths, `print(...)` collects output. Disabled unless the host allows it.',
    params: [{ name: 'code', kind: 'text', description: 'Function body to execute', required: true }],
    legacy: false,
  },
];

const byName = new Map(OPERATIONS.map((op) => [op.name, op]));

export function findOperation(name: string): OperationSpec | undefined {
  return byName.get(name);
}

export function operationNames(): string[] {
  return OPERATIONS.map((op) => op.name);
}
