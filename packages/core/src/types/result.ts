/**
 * Explicit success/failure values returned by gateway calls
 */

import type { GatewayError } from '../errors/gateway-error.js';

export type GatewayResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GatewayError };

export function ok<T>(value: T): GatewayResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: GatewayError): GatewayResult<T> {
  return { ok: false, error };
}
