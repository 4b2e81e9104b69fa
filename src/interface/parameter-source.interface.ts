/**
 * Outcome of looking up one hierarchical path in the parameter store.
 *
 * - `found`: the raw text payload stored at the path
 * - `not-found`: nothing is stored there, which is the normal case for most paths
 * - `error`: the lookup itself failed (network, permissions, throttling)
 */
export type ParameterFetchResult =
  | { status: 'found'; name: string; payload: string }
  | { status: 'not-found' }
  | { status: 'error'; detail: string };

/**
 * Anything that can answer "what is stored at this path?".
 *
 * Implementations own their transport concerns (retries, pooling, caching).
 * They should report failures through an `error` result rather than throw.
 *
 * @example
 * ```typescript
 * class StaticParameterSource implements ParameterSource {
 *   constructor(private readonly entries: Record<string, string>) {}
 *
 *   async fetch(path: string): Promise<ParameterFetchResult> {
 *     const payload = this.entries[path];
 *     return payload === undefined
 *       ? { status: 'not-found' }
 *       : { status: 'found', name: path, payload };
 *   }
 * }
 * ```
 */
export interface ParameterSource {
  fetch(path: string): Promise<ParameterFetchResult>;
}
