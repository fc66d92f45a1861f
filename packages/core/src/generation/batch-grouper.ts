import type { Batch, GroupName } from './types';

/**
 * Group predicates in priority order. The first substring match wins, so a
 * path such as `monitor/publisher.py` lands in `publishers`. That ordering
 * can misfile paths that match several groups; it is kept so the same
 * manifest always groups the same way.
 */
const GROUP_RULES: ReadonlyArray<readonly [needle: string, group: GroupName]> = [
  ['docker-compose', 'infrastructure'],
  ['publish', 'publishers'],
  ['consumer', 'consumers'],
  ['monitor', 'monitor'],
];

export const GROUP_ORDER: readonly GroupName[] = [
  'infrastructure',
  'publishers',
  'consumers',
  'monitor',
  'config',
];

export function assignGroup(path: string): GroupName {
  for (const [needle, group] of GROUP_RULES) {
    if (path.includes(needle)) return group;
  }
  return 'config';
}

/**
 * Partitions a manifest into batches in {@link GROUP_ORDER}. Empty groups are
 * omitted and a repeated path is listed once, at its first position.
 */
export function groupManifest(manifest: readonly string[]): Batch[] {
  const members = new Map<GroupName, string[]>(GROUP_ORDER.map((group) => [group, []]));
  const seen = new Set<string>();

  for (const path of manifest) {
    if (seen.has(path)) continue;
    seen.add(path);
    members.get(assignGroup(path))?.push(path);
  }

  return GROUP_ORDER.flatMap((name) => {
    const paths = members.get(name) ?? [];
    return paths.length > 0 ? [{ name, paths }] : [];
  });
}
