import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

/**
 * Accepted shape for caller-supplied IDs. Anything else is replaced so the
 * value can be echoed in headers and logs verbatim.
 */
const SAFE_REQUEST_ID = /^[A-Za-z0-9._-]{1,64}$/;

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

export function isRequestIdSafe(value: string): boolean {
  return SAFE_REQUEST_ID.test(value);
}

/**
 * Use the incoming X-Request-Id header when it is safe, otherwise generate one.
 * Wired into Fastify as `genReqId`.
 */
export function resolveRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER_LOWER];
  const incomingId = Array.isArray(raw) ? raw[0] : raw;

  if (typeof incomingId === 'string') {
    const trimmed = incomingId.trim();
    if (isRequestIdSafe(trimmed)) {
      return trimmed;
    }
  }

  return generateRequestId();
}
