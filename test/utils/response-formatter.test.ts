/**
 * Response Formatter Unit Tests
 * 
 * Tests for response formatting utilities.
 */

import {
  successResponse,
  svgResponse,
  redirectResponse,
  errorResponse,
  generateRequestId,
  generateTimestamp,
} from '../../src/utils/response-formatter';
import {
  HttpStatus,
  ErrorCode,
  SuccessResponse,
  ErrorResponse,
} from '../../src/models/response';

describe('Response Formatter', () => {
  describe('generateRequestId', () => {
    it('should generate a valid UUID v4', () => {
      const requestId = generateRequestId();

      const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
      expect(requestId).toMatch(uuidRegex);
    });

    it('should generate unique IDs', () => {
      expect(generateRequestId()).not.toBe(generateRequestId());
    });
  });

  describe('generateTimestamp', () => {
    it('should generate a valid ISO-8601 timestamp', () => {
      expect(generateTimestamp()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });

  describe('successResponse', () => {
    it('should wrap data in the standard envelope', () => {
      const result = successResponse({ matches: [] }, HttpStatus.OK, 'req-1');

      expect(result.statusCode).toBe(200);
      expect(result.headers).toMatchObject({
        'Content-Type': 'application/json',
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Credentials': 'true',
      });

      const body: SuccessResponse<{ matches: unknown[] }> = JSON.parse(result.body);
      expect(body.request_id).toBe('req-1');
      expect(body.data).toEqual({ matches: [] });
      expect(body.timestamp).toBeDefined();
      expect(result.multiValueHeaders).toBeUndefined();
    });

    it('should generate a request id when none is given', () => {
      const body = JSON.parse(successResponse({}).body);
      expect(body.request_id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should attach cookies as multi-value Set-Cookie headers', () => {
      const result = successResponse({}, HttpStatus.OK, 'req-1', ['a=1; Path=/', 'b=2; Path=/']);

      expect(result.multiValueHeaders).toEqual({ 'Set-Cookie': ['a=1; Path=/', 'b=2; Path=/'] });
    });
  });

  describe('svgResponse', () => {
    it('should return the markup as image/svg+xml without caching', () => {
      const result = svgResponse('<svg></svg>');

      expect(result.statusCode).toBe(200);
      expect(result.body).toBe('<svg></svg>');
      expect(result.headers).toMatchObject({
        'Content-Type': 'image/svg+xml',
        'Cache-Control': 'no-cache',
      });
    });
  });

  describe('redirectResponse', () => {
    it('should answer 302 with a Location header and cookies', () => {
      const result = redirectResponse('/predict', ['session=abc; Path=/']);

      expect(result.statusCode).toBe(302);
      expect(result.body).toBe('');
      expect(result.headers).toMatchObject({ Location: '/predict' });
      expect(result.multiValueHeaders).toEqual({ 'Set-Cookie': ['session=abc; Path=/'] });
    });
  });

  describe('errorResponse', () => {
    it('should build the error envelope', () => {
      const result = errorResponse(
        ErrorCode.VALIDATION_ERROR,
        'Invalid prediction',
        { outcome: 'Must be one of HOME, DRAW, AWAY' },
        'req-2'
      );

      expect(result.statusCode).toBe(400);
      expect(result.headers).toMatchObject({ 'Content-Type': 'application/json' });
      const body: ErrorResponse = JSON.parse(result.body);
      expect(body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid prediction',
        request_id: 'req-2',
        details: { outcome: 'Must be one of HOME, DRAW, AWAY' },
      });
    });

    it('should omit empty details and generate a request id', () => {
      const body = JSON.parse(errorResponse(ErrorCode.NOT_FOUND, 'Match not found').body);

      expect(body.error.details).toBeUndefined();
      expect(body.error.request_id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should derive the status from the code', () => {
      const cases: [ErrorCode, number][] = [
        [ErrorCode.VALIDATION_ERROR, 400],
        [ErrorCode.AUTHENTICATION_ERROR, 401],
        [ErrorCode.NOT_FOUND, 404],
        [ErrorCode.CONFLICT, 409],
        [ErrorCode.INTERNAL_ERROR, 500],
        [ErrorCode.SERVICE_UNAVAILABLE, 503],
      ];

      for (const [code, status] of cases) {
        expect(errorResponse(code, 'message').statusCode).toBe(status);
      }
    });
  });
});
