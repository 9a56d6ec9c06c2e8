/**
 * Project grouping tests
 */

import { describe, it, expect } from 'vitest';
import { groupByProject, buildProjects, compareByRecency, UNASSIGNED_PROJECT } from './projects.js';
import type { Conversation } from './types.js';

function conversation(
  id: string,
  updated: string | null,
  project: { id: string; name?: string } | null = null,
  title = id
): Conversation {
  return {
    id,
    title,
    createdAt: null,
    updatedAt: updated ? new Date(updated) : null,
    projectId: project?.id ?? null,
    projectName: project ? project.name ?? project.id : null,
    model: null,
    messages: [],
    systemInstructions: [],
    linearization: 'current-node',
  };
}

describe('groupByProject', () => {
  it('should list the most recently updated conversation first', () => {
    const older = conversation('older', '2024-01-02', { id: 'proj-1' });
    const newer = conversation('newer', '2024-01-05', { id: 'proj-1' });

    const groups = groupByProject([older, newer]);

    expect(groups.get('proj-1')?.map(c => c.id)).toEqual(['newer', 'older']);
  });

  it('should always include the unassigned bucket', () => {
    const groups = groupByProject([conversation('a', '2024-01-01', { id: 'p', name: 'Work' })]);

    expect([...groups.keys()]).toEqual(['Work', UNASSIGNED_PROJECT]);
    expect(groups.get('_Unassigned_')).toEqual([]);
  });

  it('should put conversations without a project in the unassigned bucket', () => {
    const loose = conversation('loose', '2024-01-01');

    expect(groupByProject([loose]).get(UNASSIGNED_PROJECT)).toEqual([loose]);
  });

  it('should partition every conversation exactly once', () => {
    const input = [
      conversation('a', '2024-01-01', { id: 'p1', name: 'Alpha' }),
      conversation('b', '2024-02-01'),
      conversation('c', null, { id: 'p2', name: 'Beta' }),
      conversation('d', '2024-03-01', { id: 'p1', name: 'Alpha' }),
      conversation('e', null),
    ];

    const ids = [...groupByProject(input).values()].flat().map(c => c.id);

    expect(ids).toHaveLength(input.length);
    expect(new Set(ids)).toEqual(new Set(['a', 'b', 'c', 'd', 'e']));
  });

  it('should order buckets by project name with unassigned last', () => {
    const groups = groupByProject([
      conversation('a', null, { id: 'z', name: 'Zeta' }),
      conversation('b', null, { id: 'y', name: 'Alpha' }),
    ]);

    expect([...groups.keys()]).toEqual(['Alpha', 'Zeta', '_Unassigned_']);
  });

  it('should keep projects that share a name apart', () => {
    const groups = groupByProject([
      conversation('a', null, { id: 'p1', name: 'Notes' }),
      conversation('b', null, { id: 'p2', name: 'Notes' }),
    ]);

    expect([...groups.keys()]).toEqual(['Notes (p1)', 'Notes (p2)', '_Unassigned_']);
  });
});

describe('buildProjects', () => {
  it('should hold member ids, not conversations', () => {
    const projects = buildProjects([
      conversation('a', '2024-01-01', { id: 'p1', name: 'Alpha' }),
      conversation('b', '2024-01-03', { id: 'p1', name: 'Alpha' }),
      conversation('c', '2024-01-02'),
    ]);

    expect(projects).toEqual([
      { id: 'p1', name: 'Alpha', key: 'Alpha', conversationIds: ['b', 'a'] },
      { id: '_Unassigned_', name: '_Unassigned_', key: '_Unassigned_', conversationIds: ['c'] },
    ]);
  });
});

describe('compareByRecency', () => {
  it('should sort missing update times last and break ties by title', () => {
    const sorted = [
      conversation('x', null, null, 'X'),
      conversation('b', '2024-01-01', null, 'B'),
      conversation('a', '2024-01-01', null, 'A'),
      conversation('n', '2024-06-01', null, 'N'),
    ].sort(compareByRecency);

    expect(sorted.map(c => c.id)).toEqual(['n', 'a', 'b', 'x']);
  });
});
