/**
 * @groupsync/connector-api
 *
 * Directory (Okta) and access (GitLab) gateways over their REST APIs
 */

export * from './okta/index.js';
export * from './gitlab/index.js';
