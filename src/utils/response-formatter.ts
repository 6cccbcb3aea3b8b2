/**
 * Response Formatting Utilities
 *
 * JSON envelopes for pages and errors, SVG for charts and 302 redirects for
 * form posts. Cookies ride along as multi-value Set-Cookie headers.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import {
  ERROR_STATUS,
  ErrorCode,
  ErrorDetails,
  ErrorResponse,
  HttpStatus,
  SuccessResponse,
} from '../models/response';

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Credentials': 'true',
  'Access-Control-Allow-Headers': 'Content-Type,Cookie',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  ...CORS_HEADERS,
};

export function generateRequestId(): string {
  return uuidv4();
}

export function generateTimestamp(): string {
  return new Date().toISOString();
}

function withCookies(response: APIGatewayProxyResult, cookies: string[]): APIGatewayProxyResult {
  return cookies.length > 0
    ? { ...response, multiValueHeaders: { 'Set-Cookie': cookies } }
    : response;
}

/**
 * Wrap a payload in the success envelope
 *
 * @param requestId - Generated when omitted
 * @param cookies - Set-Cookie values to attach
 *
 * @example
 * ```typescript
 * return successResponse({ theme: 'dark', matches }, HttpStatus.OK, requestId);
 * ```
 */
export function successResponse<T>(
  data: T,
  statusCode: HttpStatus = HttpStatus.OK,
  requestId?: string,
  cookies: string[] = []
): APIGatewayProxyResult {
  const response: SuccessResponse<T> = {
    request_id: requestId || generateRequestId(),
    timestamp: generateTimestamp(),
    data,
  };

  return withCookies({ statusCode, headers: JSON_HEADERS, body: JSON.stringify(response) }, cookies);
}

/**
 * Chart markup; never cached since a new snapshot may land any minute
 */
export function svgResponse(svg: string): APIGatewayProxyResult {
  return {
    statusCode: HttpStatus.OK,
    headers: {
      'Content-Type': 'image/svg+xml',
      'Cache-Control': 'no-cache',
      ...CORS_HEADERS,
    },
    body: svg,
  };
}

export function redirectResponse(location: string, cookies: string[] = []): APIGatewayProxyResult {
  return withCookies(
    {
      statusCode: HttpStatus.FOUND,
      headers: { Location: location, ...CORS_HEADERS },
      body: '',
    },
    cookies
  );
}

/**
 * Error envelope; the status comes from the code
 *
 * @param details - Field messages or debug context, omitted when empty
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: unknown,
  requestId?: string
): APIGatewayProxyResult {
  const error: ErrorDetails = {
    code,
    message,
    request_id: requestId || generateRequestId(),
  };
  if (details) {
    error.details = details;
  }

  const response: ErrorResponse = { error };

  return {
    statusCode: ERROR_STATUS[code],
    headers: JSON_HEADERS,
    body: JSON.stringify(response),
  };
}
