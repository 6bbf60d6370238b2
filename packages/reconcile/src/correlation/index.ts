export { IdentityCorrelator } from './identity-correlator.js';
