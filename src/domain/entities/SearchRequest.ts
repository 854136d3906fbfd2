/**
 * Search Request — What the Caller Wants Found
 * Layer: Domain
 *
 * Mirrors the query keys of the iTunes search endpoint: term, country, media,
 * entity, attribute, lang, limit, version, explicit and id. Every field is
 * optional; an absent field never reaches the query string.
 *
 * `id` switches the request into a lookup: when it is non-empty the client
 * calls the lookup endpoint and ignores every other field.
 */
import type { ENTITIES, MEDIA_TYPES } from '@shared/constants';

export type Entity = (typeof ENTITIES)[keyof typeof ENTITIES];
export type Media = (typeof MEDIA_TYPES)[number];

/** Two-letter ISO 3166-1 store code, e.g. "us" or "GB". */
export type Country = string;
/** Attribute to search against, e.g. "songTerm" or "artistTerm". */
export type Attribute = string;
/** Result language, e.g. "en_us" or "ja_jp". */
export type Language = string;

export interface SearchRequest {
  term?: string;
  country?: Country;
  media?: Media;
  entity?: Entity;
  attribute?: Attribute;
  lang?: Language;
  limit?: number;
  version?: string;
  explicit?: boolean;
  id?: string;
}
