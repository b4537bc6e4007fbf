import { describe, it, expect } from 'vitest';
import { pickSpeaker } from './speaker-choice.js';

const team = ['Researcher', 'Analyst', 'Tech_Expert', 'Coordinator'];

describe('pickSpeaker', () => {
  it('accepts an exact name regardless of case and punctuation', () => {
    expect(pickSpeaker('analyst.', team)).toBe('Analyst');
    expect(pickSpeaker('  "Researcher"  ', team)).toBe('Researcher');
    expect(pickSpeaker('**Tech_Expert**', team)).toBe('Tech_Expert');
  });

  it('picks the earliest mentioned member', () => {
    expect(pickSpeaker('I think the Analyst should go, then the Researcher.', team)).toBe('Analyst');
  });

  it('ignores names embedded in longer words', () => {
    expect(pickSpeaker('The Analysts agree; Researcher next.', team)).toBe('Researcher');
  });

  it('does not match a name inside a hyphenated longer name', () => {
    expect(pickSpeaker('Dev-Ops next', ['Dev', 'Dev-Ops'])).toBe('Dev-Ops');
  });

  it('returns undefined when no member is named', () => {
    expect(pickSpeaker('Whoever is free.', team)).toBeUndefined();
  });
});
