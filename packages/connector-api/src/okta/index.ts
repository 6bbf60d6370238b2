/**
 * Okta Directory
 *
 * Exports for the Okta integration.
 */

export { OktaClient, parseNextLink } from './client.js';
export type { OktaClientConfig, OktaUserStatus, OktaGroup, OktaUser } from './client.js';

export {
  OktaDirectoryGateway,
  createOktaDirectoryGateway,
  isDeprovisioned,
} from './gateway.js';
export type { OktaGatewayConfig } from './gateway.js';
