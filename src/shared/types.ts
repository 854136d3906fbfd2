/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request-scoped options and the response envelope the catalog service hands
 * to the HTTP layer. Domain entities live under domain/entities.
 */

/** Per-call options accepted by both request paths. */
export interface RequestOptions {
  /** Aborts the in-flight upstream request when fired. */
  signal?: AbortSignal;
}

/**
 * A catalog payload plus the time spent waiting on the upstream service.
 * Mirrors how the controller reports totalTimeMs vs upstreamTimeMs.
 */
export interface TimedResult<T> {
  data: T;
  upstreamTimeMs: number;
}
