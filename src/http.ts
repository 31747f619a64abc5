import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';

export function jsonResponse(
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {}
): APIGatewayProxyResult {
  return rawJsonResponse(statusCode, JSON.stringify(body), headers);
}

/**
 * For bodies assembled from JSON text that must not pass through JSON.parse
 */
export function rawJsonResponse(
  statusCode: number,
  body: string,
  headers: Record<string, string> = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json', ...headers },
    body,
  };
}

/**
 * Header lookup ignoring case; API Gateway passes names through as sent.
 */
export function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Body exactly as received, so the HMAC covers the sender's bytes.
 */
export function rawBody(event: APIGatewayProxyEvent): Buffer {
  if (event.body === null) {
    return Buffer.alloc(0);
  }
  return Buffer.from(event.body, event.isBase64Encoded ? 'base64' : 'utf8');
}
