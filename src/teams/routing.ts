/**
 * Turn-taking. The next speaker is a pure function of the team snapshot and
 * the message sequence, so a resumed task picks exactly the speaker an
 * uninterrupted run would have picked.
 */
import type { ConversationMessage, ToolCallMessage } from '@/core/types.js';
import type { HandoffRule, TeamSnapshot } from './types.js';

export type SpeakerReason =
  | 'opening'
  | 'round-robin'
  | 'tool-result'
  | 'correction'
  | 'lead-selection'
  | 'handoff-marker'
  | 'handoff-rule'
  | 'fallback';

export type SpeakerDecision =
  | { type: 'speaker'; name: string; reason: SpeakerReason }
  /** Coordinator-directed routing: the lead must be asked and its answer recorded. */
  | { type: 'ask-lead'; lead: string; after: string };

type RoutingTeam = Pick<TeamSnapshot, 'members' | 'routing' | 'afterToolResult'>;

const HANDOFF_MARKER = /HANDOFF:\s*\**([A-Za-z][\w-]*)/i;

// ─── Helpers ────────────────────────────────────────────────────

/** Member after `speaker` in team order, wrapping around. */
export function roundRobinSuccessor(members: readonly string[], speaker: string): string {
  const index = members.indexOf(speaker);
  const next = members[(index + 1) % members.length];
  return next ?? speaker;
}

/** Member named by an explicit `HANDOFF: <name>` marker, case-insensitive. */
export function findHandoffMarker(text: string, members: readonly string[]): string | undefined {
  const match = HANDOFF_MARKER.exec(text);
  if (!match?.[1]) return undefined;
  const wanted = match[1].toLowerCase();
  return members.find((m) => m.toLowerCase() === wanted);
}

/** First rule that applies to `speaker` and whose keyword appears in `text`. */
export function matchHandoffRule(
  rules: readonly HandoffRule[],
  speaker: string,
  text: string,
): HandoffRule | undefined {
  const haystack = text.toLowerCase();
  return rules.find(
    (rule) =>
      (rule.from === undefined || rule.from === speaker) &&
      rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase())),
  );
}

function findCall(messages: readonly ConversationMessage[], callId: string): ToolCallMessage | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.kind === 'tool_call' && message.toolCall.id === callId) return message;
  }
  return undefined;
}

// ─── Policy ─────────────────────────────────────────────────────

function applyPolicy(team: RoutingTeam, speaker: string, text: string): SpeakerDecision {
  const { routing, members } = team;

  switch (routing.type) {
    case 'round-robin':
      return { type: 'speaker', name: roundRobinSuccessor(members, speaker), reason: 'round-robin' };

    case 'coordinator-directed':
      return { type: 'ask-lead', lead: routing.lead, after: speaker };

    case 'handoff': {
      const marked = findHandoffMarker(text, members);
      if (marked) return { type: 'speaker', name: marked, reason: 'handoff-marker' };

      const rule = matchHandoffRule(routing.rules, speaker, text);
      if (rule) return { type: 'speaker', name: rule.to, reason: 'handoff-rule' };

      const name = routing.fallback === 'same-speaker' ? speaker : roundRobinSuccessor(members, speaker);
      return { type: 'speaker', name, reason: 'fallback' };
    }
  }
}

/**
 * Decide who acts next given everything recorded so far. The first member
 * opens a task, or the lead under coordinator-directed routing.
 */
export function decideNextSpeaker(team: RoutingTeam, messages: readonly ConversationMessage[]): SpeakerDecision {
  const last = messages.at(-1);
  const opener = team.routing.type === 'coordinator-directed' ? team.routing.lead : team.members[0];

  if (!last || last.kind === 'task') {
    return { type: 'speaker', name: opener ?? '', reason: 'opening' };
  }

  switch (last.kind) {
    case 'speaker_selection':
      return { type: 'speaker', name: last.nextSpeaker, reason: 'lead-selection' };

    case 'correction':
      return { type: 'speaker', name: last.audience, reason: 'correction' };

    case 'tool_call':
      // Only seen mid-dispatch; the requester is still holding the turn
      return { type: 'speaker', name: last.toolCall.requesterAgent, reason: 'tool-result' };

    case 'tool_result': {
      const call = findCall(messages, last.toolResult.callId);
      const requester = call?.toolCall.requesterAgent ?? opener ?? '';
      if (team.afterToolResult === 'same-speaker') {
        return { type: 'speaker', name: requester, reason: 'tool-result' };
      }
      return applyPolicy(team, requester, call?.content ?? '');
    }

    case 'chat':
      return applyPolicy(team, last.sender, last.content);
  }
}
