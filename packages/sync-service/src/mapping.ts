/**
 * Directory-group to access-group naming
 */

export type GroupMappings = Record<string, string>;

/**
 * Name of the access group a directory group maps to: the explicit mapping
 * when there is one, else the directory group name without the prefix.
 * Returns null when nothing is left after stripping the prefix.
 */
export function resolveAccessGroupName(
  directoryGroupName: string,
  prefix: string,
  mappings: GroupMappings = {}
): string | null {
  // Own keys only: names such as `constructor` must not hit Object.prototype.
  const explicit = Object.hasOwn(mappings, directoryGroupName) ? mappings[directoryGroupName] : undefined;
  if (explicit) return explicit;

  const stripped = directoryGroupName.startsWith(prefix)
    ? directoryGroupName.slice(prefix.length)
    : directoryGroupName;
  const name = stripped.trim();
  return name.length > 0 ? name : null;
}
