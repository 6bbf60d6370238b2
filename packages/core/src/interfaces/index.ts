export type {
  GatewayConfig,
  IDirectoryGateway,
  IAccessGateway,
} from './gateway.js';
