/**
 * GitLab Access
 *
 * Exports for the GitLab integration.
 */

export { GitLabClient } from './client.js';
export type { GitLabClientConfig, GitLabGroup, GitLabMember } from './client.js';

export {
  GitLabAccessGateway,
  createGitLabAccessGateway,
  selectGroup,
  toDownstreamAccount,
} from './gateway.js';
export type { GitLabGatewayConfig } from './gateway.js';

export {
  GITLAB_ACCESS_LEVELS,
  GITLAB_ACCESS_LEVEL_NAMES,
  isGitLabAccessLevelName,
  resolveAccessLevel,
  accessLevelName,
} from './access-levels.js';
export type { GitLabAccessLevelName } from './access-levels.js';
