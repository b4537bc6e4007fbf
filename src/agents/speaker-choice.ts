function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Map a free-text reply to one of `candidates`.
 *
 * An exact (case-insensitive) reply wins. Otherwise the candidate mentioned
 * earliest in the reply is chosen, the longer name winning a tie at the same
 * position. Returns undefined when no candidate is mentioned.
 */
export function pickSpeaker(reply: string, candidates: readonly string[]): string | undefined {
  const bare = reply.trim().replace(/^[\s"'`*]+|[\s"'`*.!]+$/g, '').toLowerCase();
  const exact = candidates.find((name) => name.toLowerCase() === bare);
  if (exact !== undefined) return exact;

  let best: { name: string; index: number } | undefined;
  for (const name of candidates) {
    const match = new RegExp(`(?<![\\w-])${escapeRegExp(name)}(?![\\w-])`, 'i').exec(reply);
    if (!match) continue;
    if (
      best === undefined ||
      match.index < best.index ||
      (match.index === best.index && name.length > best.name.length)
    ) {
      best = { name, index: match.index };
    }
  }
  return best?.name;
}
