/**
 * Linearizer tests
 */

import { describe, it, expect } from 'vitest';
import { linearize, descendLastChild } from './linearize.js';
import { parseGraph } from './parser.js';
import { NodeStore, type MessageNode } from './types.js';
import { makeNode } from '../__fixtures__/records.js';

const placeholder = { kind: 'placeholder', role: 'system', contentParts: [], hidden: true } as const;

function regenerationGraph() {
  // R → A (user) → B (assistant) → {C, D}
  return parseGraph(new NodeStore([
    makeNode('R', null, ['A'], placeholder),
    makeNode('A', 'R', ['B']),
    makeNode('B', 'A', ['C', 'D'], { role: 'assistant' }),
    makeNode('C', 'B', [], { role: 'user' }),
    makeNode('D', 'B', [], { role: 'user' }),
  ]));
}

describe('linearize', () => {
  it('should follow the current node back to the root', () => {
    const thread = linearize(regenerationGraph(), 'D');

    expect(thread.policy).toBe('current-node');
    expect(thread.path).toEqual(['R', 'A', 'B', 'D']);
    expect(thread.nodes.map(n => n.id)).toEqual(['A', 'B', 'D']);
  });

  it('should keep only the regenerated reply the current node points at', () => {
    // R → A (user) → {C, D} (two assistant replies)
    const graph = parseGraph(new NodeStore([
      makeNode('R', null, ['A'], placeholder),
      makeNode('A', 'R', ['C', 'D']),
      makeNode('C', 'A', [], { role: 'assistant' }),
      makeNode('D', 'A', [], { role: 'assistant' }),
    ]));

    expect(linearize(graph, 'D').nodes.map(n => n.id)).toEqual(['A', 'D']);
    expect(linearize(graph, 'C').nodes.map(n => n.id)).toEqual(['A', 'C']);
  });

  it('should fall back to the last child when the current node is missing', () => {
    const thread = linearize(regenerationGraph(), null);

    expect(thread.policy).toBe('last-child');
    expect(thread.path).toEqual(['R', 'A', 'B', 'D']);
  });

  it('should fall back to the last child when the current node does not resolve', () => {
    const thread = linearize(regenerationGraph(), 'does-not-exist');

    expect(thread.policy).toBe('last-child');
    expect(thread.nodes.map(n => n.id)).toEqual(['A', 'B', 'D']);
  });

  it('should honour a current node that is not a leaf', () => {
    const thread = linearize(regenerationGraph(), 'B');

    expect(thread.path).toEqual(['R', 'A', 'B']);
  });

  it('should drop nodes whose content is blank without breaking the path', () => {
    const graph = parseGraph(new NodeStore([
      makeNode('R', null, ['A'], placeholder),
      makeNode('A', 'R', ['B']),
      makeNode('B', 'A', ['C'], { contentParts: ['', '   '] }),
      makeNode('C', 'B'),
    ]));

    const thread = linearize(graph, 'C');

    expect(thread.path).toEqual(['R', 'A', 'B', 'C']);
    expect(thread.nodes.map(n => n.id)).toEqual(['A', 'C']);
  });
});

describe('descendLastChild', () => {
  it('should stop at the root when it has no children', () => {
    const graph = parseGraph(new NodeStore([makeNode('R', null)]));

    expect(descendLastChild(graph)).toEqual(['R']);
  });
});

/**
 * Small deterministic PRNG so generated graphs are reproducible
 */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

function randomTree(seed: number, size: number): MessageNode[] {
  const next = lcg(seed);
  const nodes: MessageNode[] = [makeNode('n0', null, [], placeholder)];
  for (let i = 1; i < size; i++) {
    const parent = nodes[Math.floor(next() * nodes.length)].id;
    nodes.push(makeNode(`n${i}`, parent, [], {
      role: i % 2 === 0 ? 'assistant' : 'user',
      contentParts: next() < 0.2 ? [] : [`message ${i}`],
    }));
  }
  return nodes.map(node => ({
    ...node,
    childrenIds: nodes.filter(other => other.parentId === node.id).map(other => other.id),
  }));
}

describe('linear thread properties', () => {
  for (const seed of [1, 7, 42, 99]) {
    it(`should emit a duplicate-free ancestor chain (seed ${seed})`, () => {
      const graph = parseGraph(new NodeStore(randomTree(seed, 40)));

      for (const leaf of graph.leaves()) {
        const thread = linearize(graph, leaf);
        const ids = thread.nodes.map(n => n.id);

        expect(new Set(ids).size).toBe(ids.length);
        expect(thread.path[0]).toBe('n0');
        expect(thread.path[thread.path.length - 1]).toBe(leaf);

        // every consecutive pair on the path is a real parent → child edge
        for (let i = 1; i < thread.path.length; i++) {
          expect(graph.node(thread.path[i]).parentId).toBe(thread.path[i - 1]);
        }
        // emitted nodes keep path order
        const positions = ids.map(id => thread.path.indexOf(id));
        expect(positions).toEqual([...positions].sort((a, b) => a - b));
      }
    });
  }
});
