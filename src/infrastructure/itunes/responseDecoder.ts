/**
 * Response Decoder — Raw Body → SearchResult
 * Layer: Infrastructure
 *
 * TypeScript types vanish at runtime, so the upstream payload is checked with
 * Zod before anything downstream trusts it. Missing keys are fine (the
 * service omits what does not apply to an item); a key present with the wrong
 * type is a shape mismatch. Unknown keys are stripped.
 *
 * A JSON `null` counts as absent: null keys are dropped before the schema
 * runs, so `"trackPrice":null` leaves the field unset and `"results":null`
 * falls back to the empty list.
 *
 * Both failure modes (not JSON, wrong shape) surface as DecodeError.
 */
import type { SearchResult } from '@domain/entities/SearchResult';
import { DecodeError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

function dropNullKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== null));
}

const resultItemFields = z.object({
  kind: z.string().optional(),
  trackId: z.number().int().nonnegative().optional(),
  collectionId: z.number().int().nonnegative().optional(),
  artistName: z.string().optional(),
  trackPrice: z.number().optional(),
  country: z.string().optional(),
  currency: z.string().optional(),
  collectionName: z.string().optional(),
  primaryGenreName: z.string().optional(),
  trackName: z.string().optional(),
  trackCensoredName: z.string().optional(),
  trackNumber: z.number().int().nonnegative().optional(),
  trackTimeMillis: z.number().int().nonnegative().optional(),
  trackViewUrl: z.string().optional(),
  collectionPrice: z.number().optional(),
  collectionViewUrl: z.string().optional(),
  artistViewUrl: z.string().optional(),
  previewUrl: z.string().optional(),
  isStreamable: z.boolean().optional(),
  artworkUrl100: z.string().optional(),
  artworkUrl60: z.string().optional(),
  artworkUrl30: z.string().optional(),
});

const resultItemSchema = z.preprocess(dropNullKeys, resultItemFields);

export const searchResultSchema = z.preprocess(
  dropNullKeys,
  z.object({
    resultCount: z.number().int().nonnegative().default(0),
    results: z.array(resultItemSchema).default([]),
  }),
);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function decodeSearchResult(body: string): SearchResult {
  let payload: unknown;
  try {
    payload = JSON.parse(body.trim());
  } catch (err) {
    throw new DecodeError(err instanceof Error ? err.message : 'body is not valid JSON');
  }

  const parsed = searchResultSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DecodeError(describeIssues(parsed.error));
  }
  return parsed.data;
}
