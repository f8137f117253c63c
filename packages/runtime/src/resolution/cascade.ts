// Matching cascade - an ordered list of independent strategies tried in turn

/**
 * One matching heuristic. Returns the match, or null to defer to the next strategy.
 */
export type MatchStrategy<TCandidate, TResult> = {
  name: string;
  match(text: string, candidates: readonly TCandidate[]): TResult | null;
};

export type CascadeMatch<TResult> = {
  result: TResult;
  strategy: string;
};

/**
 * Run strategies in order; the first one to return a match wins.
 *
 * @returns The match and the name of the strategy that produced it, or null
 */
export function runCascade<TCandidate, TResult>(
  strategies: readonly MatchStrategy<TCandidate, TResult>[],
  text: string,
  candidates: readonly TCandidate[]
): CascadeMatch<TResult> | null {
  for (const strategy of strategies) {
    const result = strategy.match(text, candidates);
    if (result !== null) {
      return { result, strategy: strategy.name };
    }
  }
  return null;
}
