/**
 * Shape-driven recursive decoding.
 *
 * `ShapeDecoder` walks a shape and a decoded-body node together, dispatching
 * on the shape kind. Body formats (XML, JSON) subclass it and supply the
 * per-kind routines; any routine a format leaves alone returns the node as is.
 *
 * @module decoder/dispatch
 */

import type { ListShape, MapShape, ScalarShape, Shape, StructureShape } from '../types/shape.js';
import type { TimestampParser } from '../timestamp/index.js';

/**
 * Decoded value of a structure or map.
 */
export type DecodedMap = Record<string, unknown>;

export abstract class ShapeDecoder<TNode> {
  constructor(protected readonly timestampParser: TimestampParser) {}

  /**
   * Decode a node against a shape.
   */
  decode(shape: Shape, node: TNode): unknown {
    switch (shape.kind) {
      case 'structure':
        return this.decodeStructure(shape, node);
      case 'list':
        return this.decodeList(shape, node);
      case 'map':
        return this.decodeMap(shape, node);
      case 'boolean':
        return this.decodeBoolean(shape, node);
      case 'integer':
      case 'long':
        return this.decodeInteger(shape, node);
      case 'float':
      case 'double':
        return this.decodeFloat(shape, node);
      case 'timestamp':
        return this.decodeTimestamp(shape, node);
      case 'blob':
        return this.decodeBlob(shape, node);
      case 'string':
      case 'character':
        return this.decodeString(shape, node);
      default:
        return this.decodeDefault(node);
    }
  }

  /**
   * Decode a list: each item node isolated by the body format, in order.
   */
  protected decodeList(shape: ListShape, node: TNode): unknown[] {
    return this.listItems(shape, node).map((item) => this.decode(shape.member, item));
  }

  /**
   * Item nodes of a list node.
   */
  protected abstract listItems(shape: ListShape, node: TNode): TNode[];

  /**
   * Decode the declared members of a structure. Absent members are omitted.
   */
  abstract decodeStructure(shape: StructureShape, node: TNode): DecodedMap;

  protected abstract decodeMap(shape: MapShape, node: TNode): DecodedMap;

  protected decodeBoolean(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  protected decodeInteger(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  protected decodeFloat(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  protected decodeTimestamp(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  protected decodeBlob(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  protected decodeString(_shape: ScalarShape, node: TNode): unknown {
    return this.decodeDefault(node);
  }

  /**
   * Store a decoded map entry. Keys come from the wire, so they are defined
   * as own properties rather than assigned.
   */
  protected setEntry(target: DecodedMap, key: unknown, value: unknown): void {
    Object.defineProperty(target, String(key), {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  /**
   * Passthrough for kinds without a dedicated routine.
   */
  protected decodeDefault(node: TNode): unknown {
    return node;
  }
}
