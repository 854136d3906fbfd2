/**
 * Query Encoder — SearchRequest → URLSearchParams
 * Layer: Infrastructure
 *
 * Two halves:
 *   - toQueryParams(): the generic field rule. Scalars become one value,
 *     sequences become repeated keys, and anything that formats to an empty
 *     string is dropped rather than sent as `key=`.
 *   - encodeSearchRequest(): the explicit field list for the one request
 *     shape the client sends, in the order the keys appear on the wire.
 *
 * `id` is deliberately absent from the field list: a request carrying an id
 * never reaches the search endpoint.
 */
import type { SearchRequest } from '@domain/entities/SearchRequest';

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | null | undefined | readonly (QueryScalar | null | undefined)[];

function formatScalar(value: QueryScalar): string {
  return String(value);
}

function isSequence(value: QueryValue): value is readonly (QueryScalar | null | undefined)[] {
  return Array.isArray(value);
}

export function toQueryParams(fields: Record<string, QueryValue>): URLSearchParams {
  const params = new URLSearchParams();

  for (const [key, value] of Object.entries(fields)) {
    if (value === null || value === undefined) continue;

    if (isSequence(value)) {
      const formatted: string[] = [];
      for (const element of value) {
        if (element === null || element === undefined) continue;
        const str = formatScalar(element);
        if (str !== '') formatted.push(str);
      }
      for (const str of formatted) params.append(key, str);
      continue;
    }

    const str = formatScalar(value);
    if (str !== '') params.append(key, str);
  }

  return params;
}

/** Zero or negative means "no limit given"; the remote default applies. */
function formatLimit(limit: number | undefined): number | undefined {
  if (limit === undefined || limit <= 0) return undefined;
  return limit;
}

/**
 * The remote API spells booleans as Yes/No. An explicit `false` is sent as
 * `No` (exclude explicit content); leaving the field unset sends nothing.
 */
function formatExplicit(explicit: boolean | undefined): string | undefined {
  if (explicit === undefined) return undefined;
  return explicit ? 'Yes' : 'No';
}

export function encodeSearchRequest(request: SearchRequest): URLSearchParams {
  return toQueryParams({
    term: request.term,
    country: request.country,
    media: request.media,
    entity: request.entity,
    attribute: request.attribute,
    lang: request.lang,
    limit: formatLimit(request.limit),
    version: request.version,
    explicit: formatExplicit(request.explicit),
  });
}
