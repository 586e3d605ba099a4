export type Strategy<TInput, TResult> = (input: TInput) => TResult | null | undefined;
export type AsyncStrategy<TInput, TResult> = (input: TInput) => Promise<TResult | null | undefined>;

/** Runs strategies in order and returns the first non-null result. */
export function firstMatch<TInput, TResult>(
  strategies: ReadonlyArray<Strategy<TInput, TResult>>,
  input: TInput
): TResult | null {
  for (const strategy of strategies) {
    const result = strategy(input);
    if (result !== null && result !== undefined) {
      return result;
    }
  }
  return null;
}

// Sequential on purpose: a later strategy never starts once an earlier one matched.
export async function firstMatchAsync<TInput, TResult>(
  strategies: ReadonlyArray<AsyncStrategy<TInput, TResult>>,
  input: TInput
): Promise<TResult | null> {
  for (const strategy of strategies) {
    const result = await strategy(input);
    if (result !== null && result !== undefined) {
      return result;
    }
  }
  return null;
}

/**
 * Keeps the first item per key, preserving order. Items whose key is null have
 * no identity and are always kept.
 */
export function dedupeBy<T>(items: readonly T[], keyOf: (item: T) => string | null): T[] {
  const seen = new Set<string>();
  const output: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (key !== null) {
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }
    output.push(item);
  }
  return output;
}
