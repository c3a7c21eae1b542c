import { type Placement, type PrimitiveSpec, readback } from '@cad-relay/cad-model';
import {
  type CommandArgs, PLANES, readChoice, readNumber, readOptionalString,
} from '@cad-relay/protocol';
import type { Handler } from '../interpreter.js';
import { bodyData, mm, point } from './format.js';

type SpecReader = (args: CommandArgs) => PrimitiveSpec;

const PRIMITIVES: ReadonlyArray<readonly [string, SpecReader]> = [
  ['create_cube', (a) => ({ kind: 'cube', size: readNumber(a, 'size') })],
  ['create_cylinder', (a) => ({ kind: 'cylinder', radius: readNumber(a, 'radius'), height: readNumber(a, 'height') })],
  [
    'create_box',
    (a) => ({ kind: 'box', width: readNumber(a, 'width'), depth: readNumber(a, 'depth'), height: readNumber(a, 'height') }),
  ],
  ['create_sphere', (a) => ({ kind: 'sphere', radius: readNumber(a, 'radius') })],
  ['create_cone', (a) => ({ kind: 'cone', radius: readNumber(a, 'radius'), height: readNumber(a, 'height') })],
  [
    'create_sq_pyramid',
    (a) => ({ kind: 'sq_pyramid', side_length: readNumber(a, 'side_length'), height: readNumber(a, 'height') }),
  ],
  [
    'create_tri_pyramid',
    (a) => ({ kind: 'tri_pyramid', side_length: readNumber(a, 'side_length'), height: readNumber(a, 'height') }),
  ],
];

function placementOf(args: CommandArgs): Placement {
  return {
    plane: readChoice(args, 'plane', PLANES),
    center: [readNumber(args, 'cx'), readNumber(args, 'cy'), readNumber(args, 'cz')],
  };
}

function primitive(readSpec: SpecReader): Handler {
  return (args, { document }) => {
    const placement = placementOf(args);
    const body = document.addPrimitive(readSpec(args), placement, readOptionalString(args, 'name'));
    const dims = Object.entries(body.dimensions).map(([key, value]) => `${key} ${mm(value)}`).join(', ');
    return {
      message: `Created ${body.kind} "${body.name}" (${dims}) on ${placement.plane} at ${point(placement.center)}`,
      data: bodyData(readback(body)),
    };
  };
}

export const primitiveHandlers: ReadonlyArray<readonly [string, Handler]> = PRIMITIVES.map(
  ([name, readSpec]) => [name, primitive(readSpec)] as const,
);
