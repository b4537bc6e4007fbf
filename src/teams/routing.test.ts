import { describe, it, expect } from 'vitest';
import { decideNextSpeaker, findHandoffMarker, matchHandoffRule, roundRobinSuccessor } from './routing.js';
import type { TeamSnapshot } from './types.js';
import { createMessageFactory, createTestTeamSnapshot } from '@/testing/fixtures/conversation.js';

const members = ['Researcher', 'Analyst', 'Writer'];

function team(overrides?: Partial<TeamSnapshot>): TeamSnapshot {
  return createTestTeamSnapshot({ members, ...overrides });
}

describe('roundRobinSuccessor', () => {
  it('wraps around the member list', () => {
    expect(roundRobinSuccessor(members, 'Researcher')).toBe('Analyst');
    expect(roundRobinSuccessor(members, 'Writer')).toBe('Researcher');
  });

  it('starts from the first member for an unknown speaker', () => {
    expect(roundRobinSuccessor(members, 'coordinator')).toBe('Researcher');
  });
});

describe('findHandoffMarker', () => {
  it('matches member names case-insensitively', () => {
    expect(findHandoffMarker('Draft is ready. handoff: writer', members)).toBe('Writer');
    expect(findHandoffMarker('HANDOFF: **Analyst**', members)).toBe('Analyst');
  });

  it('ignores markers naming non-members', () => {
    expect(findHandoffMarker('HANDOFF: Nobody', members)).toBeUndefined();
    expect(findHandoffMarker('no marker here', members)).toBeUndefined();
  });
});

describe('matchHandoffRule', () => {
  const rules = [
    { from: 'Researcher', keywords: ['data'], to: 'Analyst' },
    { keywords: ['draft', 'write up'], to: 'Writer' },
  ];

  it('respects the from filter and rule order', () => {
    expect(matchHandoffRule(rules, 'Researcher', 'The DATA is in')?.to).toBe('Analyst');
    expect(matchHandoffRule(rules, 'Writer', 'The data is in')).toBeUndefined();
    expect(matchHandoffRule(rules, 'Analyst', 'Please write up the findings')?.to).toBe('Writer');
  });
});

describe('decideNextSpeaker', () => {
  it('opens with the first member', () => {
    const f = createMessageFactory();
    expect(decideNextSpeaker(team(), [])).toEqual({ type: 'speaker', name: 'Researcher', reason: 'opening' });
    expect(decideNextSpeaker(team(), [f.task('Research X')])).toEqual({
      type: 'speaker',
      name: 'Researcher',
      reason: 'opening',
    });
  });

  it('opens with the lead under coordinator-directed routing', () => {
    const f = createMessageFactory();
    const lead = team({ routing: { type: 'coordinator-directed', lead: 'Analyst' } });
    expect(decideNextSpeaker(lead, [f.task('Research X')])).toEqual({
      type: 'speaker',
      name: 'Analyst',
      reason: 'opening',
    });
  });

  it('cycles round-robin after chat', () => {
    const f = createMessageFactory();
    const messages = [f.task('Research X'), f.chat('Researcher', 'Found it'), f.chat('Analyst', 'Looks right')];
    expect(decideNextSpeaker(team(), messages)).toEqual({ type: 'speaker', name: 'Writer', reason: 'round-robin' });
  });

  it('returns the turn to the requester after a tool result', () => {
    const f = createMessageFactory();
    const task = f.task('Research X');
    const call = f.toolCall('Analyst', 'web_search', { query: 'x' });
    const messages = [task, call, f.toolOk(call, [])];
    expect(decideNextSpeaker(team(), messages)).toEqual({ type: 'speaker', name: 'Analyst', reason: 'tool-result' });
  });

  it('consults the policy after a tool result when configured', () => {
    const f = createMessageFactory();
    const task = f.task('Research X');
    const call = f.toolCall('Analyst', 'web_search', { query: 'x' });
    const messages = [task, call, f.toolOk(call, [])];
    expect(decideNextSpeaker(team({ afterToolResult: 'next-speaker' }), messages)).toEqual({
      type: 'speaker',
      name: 'Writer',
      reason: 'round-robin',
    });
  });

  it('gives a corrected agent another turn', () => {
    const f = createMessageFactory();
    const messages = [f.task('Research X'), f.correction('Researcher', 'Your reply was empty.')];
    expect(decideNextSpeaker(team(), messages)).toEqual({
      type: 'speaker',
      name: 'Researcher',
      reason: 'correction',
    });
  });

  it('asks the lead and then follows its recorded choice', () => {
    const f = createMessageFactory();
    const lead = team({ routing: { type: 'coordinator-directed', lead: 'Analyst' } });
    const afterChat = [f.task('Research X'), f.chat('Analyst', 'Plan: research first')];
    expect(decideNextSpeaker(lead, afterChat)).toEqual({ type: 'ask-lead', lead: 'Analyst', after: 'Analyst' });

    const afterSelection = [...afterChat, f.selection('Researcher', 'Analyst')];
    expect(decideNextSpeaker(lead, afterSelection)).toEqual({
      type: 'speaker',
      name: 'Researcher',
      reason: 'lead-selection',
    });
  });

  it('prefers a handoff marker over rules', () => {
    const f = createMessageFactory();
    const handoff = team({
      routing: { type: 'handoff', rules: [{ keywords: ['data'], to: 'Analyst' }], fallback: 'round-robin' },
    });
    const messages = [f.task('Research X'), f.chat('Researcher', 'The data is here. HANDOFF: Writer')];
    expect(decideNextSpeaker(handoff, messages)).toEqual({ type: 'speaker', name: 'Writer', reason: 'handoff-marker' });
  });

  it('applies handoff rules, then the fallback', () => {
    const f = createMessageFactory();
    const rules = [{ keywords: ['data'], to: 'Writer' }];
    const roundRobin = team({ routing: { type: 'handoff', rules, fallback: 'round-robin' } });
    const sameSpeaker = team({ routing: { type: 'handoff', rules, fallback: 'same-speaker' } });
    const task = f.task('Research X');

    expect(decideNextSpeaker(roundRobin, [task, f.chat('Researcher', 'Here is the data')])).toMatchObject({
      name: 'Writer',
      reason: 'handoff-rule',
    });

    const plain = [task, f.chat('Researcher', 'Still looking')];
    expect(decideNextSpeaker(roundRobin, plain)).toEqual({ type: 'speaker', name: 'Analyst', reason: 'fallback' });
    expect(decideNextSpeaker(sameSpeaker, plain)).toEqual({ type: 'speaker', name: 'Researcher', reason: 'fallback' });
  });

  it('makes the same decision for the same history', () => {
    const f = createMessageFactory();
    const messages = [f.task('Research X'), f.chat('Researcher', 'a'), f.chat('Analyst', 'b')];
    const copy = messages.map((m) => ({ ...m }));
    expect(decideNextSpeaker(team(), copy)).toEqual(decideNextSpeaker(team(), messages));
  });
});
