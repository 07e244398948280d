export type RoundFixpointOptions<N> = Readonly<{
  // Nodes processed in the first round, in order. Duplicates (by key) are dropped.
  initial: readonly N[];
  key: (n: N) => string;

  // Processes one node. Returns the nodes whose state grew; they are processed again next round.
  step: (n: N) => readonly N[];

  // Safety rail against non-convergent step functions.
  maxRounds: number;

  // Called after every round with the 1-based round number.
  onRound?: (round: number) => void;
}>;

export type RoundFixpointResult = Readonly<{
  rounds: number;
  steps: number;
  changedSteps: number;
}>;

// Deterministic round-based fixpoint:
// - Round 1 processes `initial` in order.
// - Round k+1 processes the nodes changed during round k, in the order they first changed.
// - Stops after a round that changes nothing.
export function runRoundFixpoint<N>(opts: RoundFixpointOptions<N>): RoundFixpointResult {
  if (!Number.isSafeInteger(opts.maxRounds) || opts.maxRounds <= 0) {
    throw new Error(`RoundFixpointOptions.maxRounds must be a positive safe integer; got ${opts.maxRounds}`);
  }

  const dedupe = (values: readonly N[]): N[] => {
    const seen = new Set<string>();
    const out: N[] = [];
    for (const v of values) {
      const k = opts.key(v);
      if (seen.has(k)) continue;
      seen.add(k);
      out.push(v);
    }
    return out;
  };

  let current = dedupe(opts.initial);
  let rounds = 0;
  let steps = 0;
  let changedSteps = 0;

  while (current.length > 0) {
    rounds++;
    if (rounds > opts.maxRounds) {
      throw new Error(`Fixpoint exceeded maxRounds=${opts.maxRounds}`);
    }

    const next: N[] = [];
    for (const n of current) {
      steps++;
      const changed = opts.step(n);
      if (changed.length === 0) continue;
      changedSteps++;
      for (const c of changed) next.push(c);
    }

    opts.onRound?.(rounds);
    current = dedupe(next);
  }

  return { rounds, steps, changedSteps };
}
