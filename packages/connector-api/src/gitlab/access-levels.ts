/**
 * GitLab access levels
 */

export const GITLAB_ACCESS_LEVEL_NAMES = [
  'minimal_access',
  'guest',
  'reporter',
  'developer',
  'maintainer',
  'owner',
] as const;

export type GitLabAccessLevelName = (typeof GITLAB_ACCESS_LEVEL_NAMES)[number];

export const GITLAB_ACCESS_LEVELS = {
  minimal_access: 5,
  guest: 10,
  reporter: 20,
  developer: 30,
  maintainer: 40,
  owner: 50,
} as const satisfies Record<GitLabAccessLevelName, number>;

export function isGitLabAccessLevelName(value: string): value is GitLabAccessLevelName {
  return GITLAB_ACCESS_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Resolve a level given by name (case-insensitive) or number
 */
export function resolveAccessLevel(value: string | number): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  const key = value.trim().toLowerCase();
  return isGitLabAccessLevelName(key) ? GITLAB_ACCESS_LEVELS[key] : null;
}

export function accessLevelName(level: number): string {
  for (const name of GITLAB_ACCESS_LEVEL_NAMES) {
    if (GITLAB_ACCESS_LEVELS[name] === level) return name;
  }
  return String(level);
}
