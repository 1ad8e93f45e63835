/**
 * JSON request/response helpers for route handlers
 * @internal
 */

import type { OperationResult } from '../types/public-api.js';
import { invalid, ok } from '../utils/errors.js';

/**
 * Create a JSON Response
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Parse a JSON request body. An empty body reads as `{}`.
 */
export async function readJson(request: Request): Promise<OperationResult<unknown>> {
  const text = await request.text();
  if (!text.trim()) return ok({});
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch {
    return invalid('Request body is not valid JSON');
  }
}
