/**
 * Tests for the query protocol parser
 */

import { describe, it, expect } from 'vitest';
import { QueryParser } from '../query.js';
import { shapes } from '../../builders/shapes.js';
import { NOOP_LOGGER } from '../../observability/logging.js';
import { parseTimestamp } from '../../timestamp/index.js';
import type { HttpResponse } from '../../types/response.js';

const parser = new QueryParser({ timestampParser: parseTimestamp, logger: NOOP_LOGGER });

function response(status: number, body: string, headers: Record<string, string> = {}): HttpResponse {
  return { status, headers, body: new TextEncoder().encode(body) };
}

const listQueuesShape = shapes.structure(
  {
    QueueUrls: shapes.list(shapes.string({ name: 'QueueUrl' }), { flattened: true }),
  },
  { resultWrapper: 'ListQueuesResult' }
);

describe('QueryParser', () => {
  describe('parseSuccess', () => {
    it('should decode members inside the result wrapper', () => {
      const body =
        '<ListQueuesResponse xmlns="http://queue.example.com/doc/2012-11-05/">' +
        '<ListQueuesResult>' +
        '<QueueUrl>https://queue.example.com/1/first</QueueUrl>' +
        '<QueueUrl>https://queue.example.com/1/second</QueueUrl>' +
        '</ListQueuesResult>' +
        '<ResponseMetadata><RequestId>req-1</RequestId></ResponseMetadata>' +
        '</ListQueuesResponse>';

      expect(parser.parseSuccess(response(200, body), listQueuesShape)).toEqual({
        QueueUrls: ['https://queue.example.com/1/first', 'https://queue.example.com/1/second'],
        ResponseMetadata: { RequestId: 'req-1' },
      });
    });

    it('should decode a single flattened item as a list', () => {
      const body =
        '<ListQueuesResponse><ListQueuesResult>' +
        '<QueueUrl>https://queue.example.com/1/only</QueueUrl>' +
        '</ListQueuesResult></ListQueuesResponse>';

      expect(parser.parseSuccess(response(200, body), listQueuesShape)).toEqual({
        QueueUrls: ['https://queue.example.com/1/only'],
        ResponseMetadata: { RequestId: '' },
      });
    });

    it('should keep every field of the metadata block', () => {
      const body =
        '<PutAttributesResponse><ResponseMetadata>' +
        '<RequestId>req-2</RequestId><BoxUsage>0.0000219907</BoxUsage>' +
        '</ResponseMetadata></PutAttributesResponse>';

      expect(parser.parseSuccess(response(200, body), shapes.structure({}))).toEqual({
        ResponseMetadata: { RequestId: 'req-2', BoxUsage: '0.0000219907' },
      });
    });

    it('should fall back to a top-level request id', () => {
      const body = '<OpResponse><RequestId>req-3</RequestId></OpResponse>';

      expect(parser.parseSuccess(response(200, body))).toEqual({
        ResponseMetadata: { RequestId: 'req-3' },
      });
    });

    it('should return no members when the result wrapper is missing', () => {
      const body = '<ListQueuesResponse><Other>x</Other></ListQueuesResponse>';

      expect(parser.parseSuccess(response(200, body), listQueuesShape)).toEqual({
        ResponseMetadata: { RequestId: '' },
      });
    });

    it('should decode typed members', () => {
      const shape = shapes.structure(
        {
          Attributes: shapes.map(shapes.string({ name: 'Name' }), shapes.string({ name: 'Value' }), {
            flattened: true,
            name: 'Attribute',
          }),
          Count: shapes.integer(),
          CreatedAt: shapes.timestamp(),
        },
        { resultWrapper: 'GetQueueAttributesResult' }
      );
      const body =
        '<GetQueueAttributesResponse><GetQueueAttributesResult>' +
        '<Attribute><Name>DelaySeconds</Name><Value>0</Value></Attribute>' +
        '<Attribute><Name>VisibilityTimeout</Name><Value>30</Value></Attribute>' +
        '<Count>2</Count>' +
        '<CreatedAt>2024-01-15T10:30:00Z</CreatedAt>' +
        '</GetQueueAttributesResult></GetQueueAttributesResponse>';

      expect(parser.parseSuccess(response(200, body), shape)).toEqual({
        Attributes: { DelaySeconds: '0', VisibilityTimeout: '30' },
        Count: 2,
        CreatedAt: new Date('2024-01-15T10:30:00.000Z'),
        ResponseMetadata: { RequestId: '' },
      });
    });

    it('should keep large long values exact', () => {
      const shape = shapes.structure({ Size: shapes.long() });

      expect(parser.parseSuccess(response(200, '<R><Size>9007199254740993</Size></R>'), shape)).toEqual({
        Size: 9007199254740993n,
        ResponseMetadata: { RequestId: '' },
      });
    });
  });

  describe('parseError', () => {
    it('should collapse the error element', () => {
      const body =
        '<ErrorResponse>' +
        '<Error><Type>Sender</Type><Code>InvalidInput</Code><Message>bad</Message></Error>' +
        '<RequestId>req-4</RequestId>' +
        '</ErrorResponse>';

      expect(parser.parseError(response(400, body))).toEqual({
        Error: { Type: 'Sender', Code: 'InvalidInput', Message: 'bad' },
        ResponseMetadata: { RequestId: 'req-4' },
      });
    });

    it('should default missing error fields to empty strings', () => {
      const body = '<ErrorResponse><Error><Code>Throttling</Code></Error></ErrorResponse>';

      expect(parser.parseError(response(400, body))).toEqual({
        Error: { Code: 'Throttling', Message: '' },
        ResponseMetadata: { RequestId: '' },
      });
    });

    it('should derive the error from the status when the body is empty', () => {
      expect(parser.parseError(response(503, '', { 'x-amzn-requestid': 'req-5' }))).toEqual({
        Error: { Code: '503', Message: 'Service Unavailable' },
        ResponseMetadata: { RequestId: 'req-5' },
      });
    });
  });
});
