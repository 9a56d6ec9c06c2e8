/**
 * Project grouping
 * Partitions conversations into project buckets, most recently active first
 */

import type { Conversation, Project } from './types.js';

/** Bucket for conversations without project metadata; always present */
export const UNASSIGNED_PROJECT = '_Unassigned_';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Display order: updated_at descending (missing dates last), then title, then id
 */
export function compareByRecency(a: Conversation, b: Conversation): number {
  const ta = a.updatedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  const tb = b.updatedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (ta !== tb) return tb > ta ? 1 : -1;
  return compareStrings(a.title, b.title) || compareStrings(a.id, b.id);
}

export function sortByRecency(conversations: readonly Conversation[]): Conversation[] {
  return [...conversations].sort(compareByRecency);
}

interface Bucket {
  id: string;
  name: string;
  key: string;
  members: Conversation[];
}

/**
 * Named projects first, ordered by name then id, followed by the unassigned
 * bucket. Two projects sharing a name get keys suffixed with their id.
 */
function partition(conversations: readonly Conversation[]): Bucket[] {
  const byId = new Map<string, { name: string; members: Conversation[] }>();
  const unassigned: Conversation[] = [];

  for (const conv of conversations) {
    if (conv.projectId === null) {
      unassigned.push(conv);
      continue;
    }
    const bucket = byId.get(conv.projectId);
    if (bucket) bucket.members.push(conv);
    else byId.set(conv.projectId, { name: conv.projectName ?? conv.projectId, members: [conv] });
  }

  const nameCounts = new Map<string, number>();
  for (const { name } of byId.values()) {
    nameCounts.set(name, (nameCounts.get(name) ?? 0) + 1);
  }

  const buckets: Bucket[] = [...byId.entries()]
    .map(([id, { name, members }]) => ({
      id,
      name,
      key: (nameCounts.get(name) ?? 0) > 1 || name === UNASSIGNED_PROJECT ? `${name} (${id})` : name,
      members: sortByRecency(members),
    }))
    .sort((a, b) => compareStrings(a.name, b.name) || compareStrings(a.id, b.id));

  buckets.push({
    id: UNASSIGNED_PROJECT,
    name: UNASSIGNED_PROJECT,
    key: UNASSIGNED_PROJECT,
    members: sortByRecency(unassigned),
  });

  return buckets;
}

/**
 * Project entities, including the unassigned bucket
 */
export function buildProjects(conversations: readonly Conversation[]): Project[] {
  return partition(conversations).map(({ id, name, key, members }) => ({
    id,
    name,
    key,
    conversationIds: members.map(conv => conv.id),
  }));
}

/**
 * Bucket key → conversations (most recently updated first).
 * The unassigned bucket is always present, possibly empty.
 */
export function groupByProject(conversations: readonly Conversation[]): Map<string, Conversation[]> {
  return new Map(partition(conversations).map(bucket => [bucket.key, bucket.members]));
}
