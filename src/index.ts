/**
 * Shape-driven response parsers for the `query`, `ec2`, `json`,
 * `rest-json` and `rest-xml` wire protocols.
 *
 * @example
 * ```typescript
 * import { createParser, isErrorResult, shapes } from 'protocol-response-parsers';
 *
 * const output = shapes.structure({
 *   TableNames: shapes.list(shapes.string()),
 * });
 *
 * const parser = createParser('json');
 * const result = parser.parse(
 *   {
 *     status: 200,
 *     headers: { 'x-amzn-requestid': 'req-1' },
 *     body: '{"TableNames":["orders"]}',
 *   },
 *   output
 * );
 *
 * if (isErrorResult(result)) {
 *   console.error(result.Error.Code);
 * } else {
 *   console.log(result.TableNames); // ['orders']
 * }
 * ```
 *
 * @module protocol-response-parsers
 */

// Parsers
export { ResponseParser } from './parser.js';
export {
  createParser,
  createParserFromConfig,
  PROTOCOL_PARSERS,
  type ProtocolParserFactory,
} from './protocols/registry.js';
export type { ProtocolContext, ProtocolParser } from './protocols/types.js';
export { QueryParser } from './protocols/query.js';
export { Ec2QueryParser } from './protocols/ec2.js';
export { JsonParser } from './protocols/json.js';
export { RestJsonParser } from './protocols/rest-json.js';
export { RestXmlParser } from './protocols/rest-xml.js';

// Shapes and results
export { shapes } from './builders/shapes.js';
export type {
  ListShape,
  MapShape,
  MemberLocation,
  ScalarKind,
  ScalarShape,
  Serialization,
  Shape,
  ShapeKind,
  StructureShape,
} from './types/shape.js';
export {
  isErrorResult,
  type ErrorDetails,
  type ErrorResponse,
  type HttpResponse,
  type ParsedResponse,
  type ResponseBody,
  type ResponseMetadata,
} from './types/response.js';

// Decoders
export { ShapeDecoder, type DecodedMap } from './decoder/dispatch.js';
export { XmlShapeDecoder, type XmlValue } from './decoder/xml.js';
export { JsonShapeDecoder, parseJsonBody, type JsonValue, type JsonObject } from './decoder/json.js';
export { RestDecoder, type BodyFormat } from './rest/decoder.js';
export { headerMetadata } from './rest/metadata.js';

// XML documents
export { parseXmlDocument, parseXmlBody } from './xml/parser.js';
export {
  buildTagIndex,
  collapseElement,
  localName,
  type CollapsedXml,
  type XmlElement,
} from './xml/element.js';

// Configuration, errors, logging, timestamps
export {
  createDefaultConfig,
  loadConfigFromEnv,
  validateConfig,
  PROTOCOL_NAMES,
  type ParserConfig,
  type ParserOptions,
  type ProtocolName,
} from './config/index.js';
export { ResponseParserError, type ResponseParserErrorKind } from './error/index.js';
export {
  ConsoleLogger,
  NOOP_LOGGER,
  type ConsoleLoggerOptions,
  type LogContext,
  type Logger,
  type LogLevel,
} from './observability/logging.js';
export { parseTimestamp, type TimestampParser } from './timestamp/index.js';
