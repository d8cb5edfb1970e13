/**
 * Ordered fallbacks.
 *
 * The site has shipped more than one markup generation for the same
 * content, so most lookups are a list of strategies tried in order.
 */

/** One way of reading something; null when it does not apply. */
export type Strategy<I, O> = (input: I) => O | null;

/** Run strategies in order and return the first non-null result. */
export function firstResult<I, O>(strategies: readonly Strategy<I, O>[], input: I): O | null {
  for (const strategy of strategies) {
    const result = strategy(input);
    if (result !== null) return result;
  }
  return null;
}

/** Treat an empty list as "no result". */
export function nonEmpty<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}
