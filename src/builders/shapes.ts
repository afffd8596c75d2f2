/**
 * Factory helpers for building shape descriptors.
 *
 * @module builders/shapes
 */

import type {
  ListShape,
  MapShape,
  ScalarKind,
  ScalarShape,
  Serialization,
  Shape,
  StructureShape,
} from '../types/shape.js';

function scalar(kind: ScalarKind) {
  return (serialization: Serialization = {}): ScalarShape => {
    const shape: ScalarShape = { kind, serialization: Object.freeze({ ...serialization }) };
    return Object.freeze(shape);
  };
}

/**
 * Shape builders. Every builder copies and freezes its inputs.
 *
 * @example
 * ```typescript
 * const output = shapes.structure(
 *   {
 *     QueueUrls: shapes.list(shapes.string({ name: 'QueueUrl' }), { flattened: true }),
 *   },
 *   { resultWrapper: 'ListQueuesResult' }
 * );
 * ```
 */
export const shapes = {
  structure(members: Record<string, Shape>, serialization: Serialization = {}): StructureShape {
    const shape: StructureShape = {
      kind: 'structure',
      members: Object.freeze({ ...members }),
      serialization: Object.freeze({ ...serialization }),
    };
    return Object.freeze(shape);
  },

  list(member: Shape, serialization: Serialization = {}): ListShape {
    const shape: ListShape = { kind: 'list', member, serialization: Object.freeze({ ...serialization }) };
    return Object.freeze(shape);
  },

  map(key: Shape, value: Shape, serialization: Serialization = {}): MapShape {
    const shape: MapShape = {
      kind: 'map',
      key,
      value,
      serialization: Object.freeze({ ...serialization }),
    };
    return Object.freeze(shape);
  },

  string: scalar('string'),
  character: scalar('character'),
  boolean: scalar('boolean'),
  integer: scalar('integer'),
  long: scalar('long'),
  float: scalar('float'),
  double: scalar('double'),
  blob: scalar('blob'),
  timestamp: scalar('timestamp'),
};
