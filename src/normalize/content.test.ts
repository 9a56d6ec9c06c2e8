/**
 * Content normalizer tests
 */

import { describe, it, expect } from 'vitest';
import {
  joinContentParts,
  isFilterable,
  classifyNode,
  normalizeThread,
  formatTimestamp,
  formatDate,
  TIME_UNKNOWN,
} from './content.js';
import { makeNode } from '../__fixtures__/records.js';

describe('joinContentParts', () => {
  it('should join parts with single newlines', () => {
    expect(joinContentParts(['first', 'second'])).toBe('first\nsecond');
  });

  it('should skip blank parts', () => {
    expect(joinContentParts(['first', '', '  ', 'second'])).toBe('first\nsecond');
  });

  it('should trim the joined text', () => {
    expect(joinContentParts(['  padded  \n'])).toBe('padded');
  });

  it('should return an empty string for no parts', () => {
    expect(joinContentParts([])).toBe('');
  });
});

describe('classifyNode', () => {
  it('should mark blank and placeholder nodes as empty', () => {
    expect(classifyNode(makeNode('a', null, [], { contentParts: [' '] }))).toBe('empty');
    expect(classifyNode(makeNode('r', null, [], { kind: 'placeholder', contentParts: ['x'] }))).toBe('empty');
    expect(isFilterable(makeNode('b', null, [], { contentParts: [] }))).toBe(true);
  });

  it('should classify tool, hidden and system nodes', () => {
    expect(classifyNode(makeNode('t', null, [], { role: 'tool' }))).toBe('tool');
    expect(classifyNode(makeNode('h', null, [], { role: 'assistant', hidden: true }))).toBe('hidden');
    expect(classifyNode(makeNode('s', null, [], { role: 'system' }))).toBe('system');
  });

  it('should classify user and assistant text as conversational', () => {
    expect(classifyNode(makeNode('u', null, [], { role: 'user' }))).toBe('conversational');
    expect(classifyNode(makeNode('a', null, [], { role: 'assistant' }))).toBe('conversational');
  });
});

describe('normalizeThread', () => {
  it('should keep user and assistant messages with sequence indexes', () => {
    const { messages, systemInstructions } = normalizeThread([
      makeNode('s', null, [], { role: 'system', contentParts: ['Be concise.'] }),
      makeNode('u', 's', [], { role: 'user', contentParts: ['Question', 'continued'], createTime: 1706745600 }),
      makeNode('t', 'u', [], { role: 'tool', contentParts: ['search results'] }),
      makeNode('h', 't', [], { role: 'assistant', hidden: true, contentParts: ['internal call'] }),
      makeNode('a', 'h', [], { role: 'assistant', contentParts: ['Answer'], model: 'gpt-4o' }),
    ]);

    expect(systemInstructions).toEqual(['Be concise.']);
    expect(messages).toEqual([
      {
        nodeId: 'u',
        role: 'user',
        displayText: 'Question\ncontinued',
        timestamp: new Date('2024-02-01T00:00:00.000Z'),
        sequenceIndex: 0,
        model: null,
      },
      {
        nodeId: 'a',
        role: 'assistant',
        displayText: 'Answer',
        timestamp: null,
        sequenceIndex: 1,
        model: 'gpt-4o',
      },
    ]);
  });

  it('should freeze messages', () => {
    const { messages } = normalizeThread([makeNode('u', null)]);

    expect(Object.isFrozen(messages[0])).toBe(true);
  });
});

describe('formatTimestamp', () => {
  it('should format in the given time zone', () => {
    expect(formatTimestamp(new Date('2024-02-01T00:00:00Z'), { timeZone: 'UTC' }))
      .toBe('Feb 01, 2024 12:00 AM');
    expect(formatTimestamp(new Date('2024-02-01T21:25:00Z'), { timeZone: 'UTC' }))
      .toBe('Feb 01, 2024 09:25 PM');
    expect(formatTimestamp(new Date('2024-02-01T00:00:00Z'), { timeZone: 'America/New_York' }))
      .toBe('Jan 31, 2024 07:00 PM');
  });

  it('should render a missing timestamp as unknown', () => {
    expect(formatTimestamp(null)).toBe(TIME_UNKNOWN);
    expect(formatTimestamp(new Date(Number.NaN))).toBe('time unknown');
  });
});

describe('formatDate', () => {
  it('should format a long calendar date', () => {
    expect(formatDate(new Date('2024-02-01T00:00:00Z'), { timeZone: 'UTC' })).toBe('February 01, 2024');
    expect(formatDate(new Date('2024-12-25T12:00:00Z'), { timeZone: 'UTC' })).toBe('December 25, 2024');
  });

  it('should render a missing date as unknown', () => {
    expect(formatDate(null)).toBe('time unknown');
  });
});
