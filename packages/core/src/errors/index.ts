export { GatewayError, wrapError } from './gateway-error.js';
export type { GatewayErrorCode, GatewayErrorDetails } from './gateway-error.js';
