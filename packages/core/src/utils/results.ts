import { wrapError, type GatewayErrorCode } from '../errors/index.js';
import { fail, ok, type GatewayResult } from '../types/index.js';

/**
 * Run a throwing gateway operation and capture its outcome as a result value.
 * Non-gateway errors are wrapped with `defaultCode`.
 */
export async function toResult<T>(
  fn: () => Promise<T>,
  gatewayId: string,
  defaultCode: GatewayErrorCode = 'UNKNOWN'
): Promise<GatewayResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(wrapError(error, gatewayId, defaultCode));
  }
}
