/**
 * Search index tests
 */

import { describe, it, expect } from 'vitest';
import { SearchIndex, searchableText } from './text.js';
import type { Conversation, Message } from '../conversation/types.js';

function message(displayText: string, sequenceIndex: number): Message {
  return {
    nodeId: `n${sequenceIndex}`,
    role: sequenceIndex % 2 === 0 ? 'user' : 'assistant',
    displayText,
    timestamp: null,
    sequenceIndex,
    model: null,
  };
}

function conversation(id: string, title: string, updated: string, texts: string[]): Conversation {
  return {
    id,
    title,
    createdAt: null,
    updatedAt: new Date(updated),
    projectId: null,
    projectName: null,
    model: null,
    messages: texts.map(message),
    systemInstructions: [],
    linearization: 'current-node',
  };
}

const conversations = [
  conversation('c1', 'Weekend plans', '2024-03-01', ['Any hiking ideas?', 'Try the coastal trail.']),
  conversation('c2', 'Study notes', '2024-03-03', ['Explain Machine Learning basics', 'It learns patterns from data.']),
  conversation('c3', 'Recipes', '2024-03-02', ['How long to bake bread?', 'About 40 minutes.']),
];

describe('SearchIndex', () => {
  const index = SearchIndex.build(conversations);

  it('should find the one conversation containing the phrase', () => {
    expect(index.query('machine learning')).toEqual(['c2']);
  });

  it('should match titles case-insensitively', () => {
    expect(index.query('WEEKEND')).toEqual(['c1']);
  });

  it('should match substrings inside words', () => {
    expect(index.query('bak')).toEqual(['c3']);
  });

  it('should return matches most recently updated first', () => {
    expect(index.query('ea')).toEqual(['c2', 'c3', 'c1']);
    expect(index.query('?')).toEqual(['c3', 'c1']);
  });

  it('should honour a result limit', () => {
    expect(index.query('?', 1)).toEqual(['c3']);
  });

  it('should return nothing for a limit below one', () => {
    expect(index.query('?', 0)).toEqual([]);
    expect(index.query('?', -3)).toEqual([]);
  });

  it('should keep surrounding spaces in the query', () => {
    expect(index.query('rail')).toEqual(['c1']);
    expect(index.query(' rail')).toEqual([]);
    expect(index.query(' trail')).toEqual(['c1']);
  });

  it('should return the conversations themselves', () => {
    expect(index.matches('bread').map(conv => conv.title)).toEqual(['Recipes']);
    expect(index.matches('bread')[0]).toBe(conversations[2]);
  });

  it('should return nothing for blank queries', () => {
    expect(index.query('')).toEqual([]);
    expect(index.query('   ')).toEqual([]);
  });

  it('should not match across message boundaries', () => {
    expect(index.query('ideas? try')).toEqual([]);
  });

  it('should report its size', () => {
    expect(index.size).toBe(3);
    expect(SearchIndex.empty().size).toBe(0);
  });

  it('should give the same answers when rebuilt', () => {
    expect(SearchIndex.build(conversations).query('a')).toEqual(index.query('a'));
  });
});

describe('searchableText', () => {
  it('should join title and messages in lower case', () => {
    expect(searchableText(conversations[0])).toBe('weekend plans\nany hiking ideas?\ntry the coastal trail.');
  });
});
