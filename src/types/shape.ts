/**
 * Shape descriptors for response parsing.
 *
 * A shape describes the structure and wire encoding of an expected output
 * value. Shapes are built once, before any parsing, and are treated as
 * read-only by every parser in this package.
 *
 * @module types/shape
 */

/**
 * Scalar shape kinds.
 */
export type ScalarKind =
  | 'string'
  | 'character'
  | 'boolean'
  | 'integer'
  | 'long'
  | 'float'
  | 'double'
  | 'blob'
  | 'timestamp';

/**
 * Every shape kind understood by the decoders.
 */
export type ShapeKind = 'structure' | 'list' | 'map' | ScalarKind;

/**
 * Where a structure member is read from, when it does not come from the body.
 *
 * - `statusCode`: the HTTP status code
 * - `header`: a single response header
 * - `headers`: every header sharing a prefix, collected into a map
 */
export type MemberLocation = 'statusCode' | 'header' | 'headers';

/**
 * Wire serialization details attached to a shape.
 */
export interface Serialization {
  /** Explicit wire name (XML tag, JSON key, header name or header prefix) */
  readonly name?: string;
  /** Non-body location of a structure member */
  readonly location?: MemberLocation;
  /** Repeated list elements appear as siblings without a wrapper element */
  readonly flattened?: boolean;
  /** Member receiving the whole body (top-level output shapes only) */
  readonly payload?: string;
  /** Element wrapping the output structure (top-level output shapes only) */
  readonly resultWrapper?: string;
}

interface BaseShape {
  readonly serialization: Serialization;
}

export interface StructureShape extends BaseShape {
  readonly kind: 'structure';
  /** Members in declaration order */
  readonly members: Readonly<Record<string, Shape>>;
}

export interface ListShape extends BaseShape {
  readonly kind: 'list';
  readonly member: Shape;
}

export interface MapShape extends BaseShape {
  readonly kind: 'map';
  readonly key: Shape;
  readonly value: Shape;
}

export interface ScalarShape extends BaseShape {
  readonly kind: ScalarKind;
}

/**
 * A shape descriptor.
 */
export type Shape = StructureShape | ListShape | MapShape | ScalarShape;
