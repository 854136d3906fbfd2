/**
 * Request Schemas — Catalog Endpoints
 * Layer: Interfaces (HTTP)
 *
 * Query strings arrive as strings (or string arrays when a key repeats), so
 * these schemas coerce and bound them before a SearchRequest is built.
 * Empty strings are treated as "not given", matching how the encoder drops
 * empty values.
 */
import { ENTITIES, MAX_SEARCH_LIMIT, MEDIA_TYPES } from '@shared/constants';
import { z } from 'zod/v4';

const ENTITY_VALUES = Object.values(ENTITIES);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

function blankToUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

export const searchQuerySchema = z.object({
  term: optionalText,
  country: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z]{2}$/, { message: 'country must be a two-letter ISO country code' })
      .optional(),
  ),
  media: z.preprocess(
    blankToUndefined,
    z.enum(MEDIA_TYPES, { message: `media must be one of: ${MEDIA_TYPES.join(', ')}` }).optional(),
  ),
  entity: z.preprocess(
    blankToUndefined,
    z
      .enum(ENTITY_VALUES, { message: `entity must be one of: ${ENTITY_VALUES.join(', ')}` })
      .optional(),
  ),
  attribute: optionalText,
  lang: optionalText,
  limit: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ message: 'limit must be a number' })
      .int({ message: 'limit must be an integer' })
      .min(1, { message: 'limit must be at least 1' })
      .max(MAX_SEARCH_LIMIT, { message: `limit must be at most ${MAX_SEARCH_LIMIT}` })
      .optional(),
  ),
  version: optionalText,
  explicit: z.preprocess(
    blankToUndefined,
    z
      .enum(['Yes', 'No', 'yes', 'no', 'true', 'false'], {
        message: 'explicit must be Yes or No',
      })
      .transform((value) => value === 'Yes' || value === 'yes' || value === 'true')
      .optional(),
  ),
  id: optionalText,
});

export type SearchQueryInput = z.infer<typeof searchQuerySchema>;

export const lookupParamsSchema = z.object({
  id: z.string().trim().min(1, { message: 'id is required' }),
});
