import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Honours an inbound `x-request-id` (first value when repeated) and mints a
 * UUID otherwise. Used as Fastify's `genReqId`.
 */
export function resolveRequestId(headers: IncomingHttpHeaders | undefined): string {
  const raw = headers?.[REQUEST_ID_HEADER];
  const existing = Array.isArray(raw) ? raw[0] : raw;
  return existing && existing.trim().length > 0 ? existing.trim() : randomUUID();
}
