/**
 * Request schemas
 *
 * Query strings arrive as text and are coerced; bodies are strict and
 * reject unknown fields. Batch filters are parsed into the closed
 * MovieFilter model here, so nothing but known conditions reaches the store.
 */

import { z } from 'zod';
import {
  FieldCondition,
  MovieFilter,
  isEmptyFilter,
  isFilterableField,
} from '@mflix/domain';

// ==================== Query strings ====================

/** Empty query parameters (`?year=`) count as absent */
function blankToUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());

const optionalInteger = z.preprocess(blankToUndefined, z.coerce.number().int().optional());

function pageLimit(max: number, fallback: number) {
  return z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(max).default(fallback)
  );
}

const skip = z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0));

export const listMoviesQuerySchema = z.object({
  q: optionalText,
  title: optionalText,
  genre: optionalText,
  year: optionalInteger,
  minRating: optionalNumber,
  maxRating: optionalNumber,
  limit: pageLimit(100, 20),
  skip,
  sortBy: z.preprocess(blankToUndefined, z.string().default('title')),
  sortOrder: z.preprocess(blankToUndefined, z.string().default('asc')),
});

export const compoundSearchQuerySchema = z.object({
  plot: optionalText,
  fullplot: optionalText,
  directors: optionalText,
  writers: optionalText,
  cast: optionalText,
  limit: pageLimit(100, 20),
  skip,
  searchOperator: z.preprocess(blankToUndefined, z.string().default('must')),
});

export const vectorSearchQuerySchema = z.object({
  q: z
    .string({ required_error: 'Query parameter "q" is required' })
    .trim()
    .min(1, 'Query parameter "q" is required'),
  limit: pageLimit(50, 10),
});

export const commentReportQuerySchema = z
  .object({
    movie_id: optionalText,
    limit: pageLimit(50, 10),
  })
  .transform(({ movie_id, limit }) => ({ movieId: movie_id, limit }));

export const directorReportQuerySchema = z.object({
  limit: pageLimit(100, 20),
});

export const idParamsSchema = z.object({
  id: z.string(),
});

// ==================== Movie bodies ====================

export const movieInputSchema = z
  .object({
    title: z.string({ required_error: 'title is required' }).min(1),
    year: z.number().int().optional(),
    plot: z.string().optional(),
    fullplot: z.string().optional(),
    genres: z.array(z.string()).optional(),
    directors: z.array(z.string()).optional(),
    writers: z.array(z.string()).optional(),
    cast: z.array(z.string()).optional(),
    countries: z.array(z.string()).optional(),
    languages: z.array(z.string()).optional(),
    rated: z.string().optional(),
    runtime: z.number().int().optional(),
    poster: z.string().optional(),
  })
  .strict();

export const movieChangesSchema = movieInputSchema
  .partial()
  .strict()
  .refine((changes) => Object.keys(changes).length > 0, {
    message: 'No valid fields provided for update.',
  });

export const movieBatchSchema = z
  .array(movieInputSchema, {
    required_error: 'Request body must be a non-empty list of movies.',
    invalid_type_error: 'Request body must be a non-empty list of movies.',
  })
  .min(1, 'Request body must be a non-empty list of movies.');

// ==================== Batch filters ====================

const filterScalar = z.union([z.string(), z.number(), z.boolean()]);

const rangeOperators = z
  .object({
    $gt: z.number().optional(),
    $gte: z.number().optional(),
    $lt: z.number().optional(),
    $lte: z.number().optional(),
  })
  .strict()
  .refine(
    (range) =>
      range.$gt !== undefined ||
      range.$gte !== undefined ||
      range.$lt !== undefined ||
      range.$lte !== undefined,
    { message: 'A range needs at least one of $gt, $gte, $lt, $lte' }
  );

/**
 * One field condition in wire form:
 *   1999                          equals
 *   { "$in": ["Drama", "Crime"] } in
 *   { "$gte": 7, "$lt": 9 }       range
 *   { "$regex": "^The", "$options": "i" }
 */
export const fieldConditionSchema: z.ZodType<FieldCondition, z.ZodTypeDef, unknown> = z.union([
  filterScalar.transform((value): FieldCondition => ({ kind: 'equals', value })),
  z
    .object({ $in: z.array(filterScalar).min(1) })
    .strict()
    .transform((condition): FieldCondition => ({ kind: 'in', values: condition.$in })),
  rangeOperators.transform(
    (range): FieldCondition => ({
      kind: 'range',
      gt: range.$gt,
      gte: range.$gte,
      lt: range.$lt,
      lte: range.$lte,
    })
  ),
  z
    .object({ $regex: z.string().min(1), $options: z.enum(['', 'i']).optional() })
    .strict()
    .transform(
      (condition): FieldCondition => ({
        kind: 'regex',
        pattern: condition.$regex,
        caseInsensitive: condition.$options === 'i',
      })
    ),
]);

/** `_id` accepts one identifier or `{ "$in": [...] }` */
const idSelectorSchema = z.union([
  z.string().transform((id) => [id]),
  z
    .object({ $in: z.array(z.string()).min(1) })
    .strict()
    .transform((selector) => selector.$in),
]);

export const FILTER_REQUIRED_MESSAGE = 'Filter object is required and cannot be empty.';

export const movieFilterSchema: z.ZodType<MovieFilter, z.ZodTypeDef, unknown> = z
  .record(z.unknown(), {
    required_error: FILTER_REQUIRED_MESSAGE,
    invalid_type_error: FILTER_REQUIRED_MESSAGE,
  })
  .transform((raw, ctx): MovieFilter => {
    const filter: MovieFilter = { fields: {} };

    for (const [key, value] of Object.entries(raw)) {
      if (key === '_id') {
        const ids = idSelectorSchema.safeParse(value);
        if (ids.success) {
          filter.ids = ids.data;
        } else {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: '_id must be an identifier or { "$in": [identifiers] }',
          });
        }
        continue;
      }

      if (!isFilterableField(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Field '${key}' cannot be used in a filter`,
        });
        continue;
      }

      const condition = fieldConditionSchema.safeParse(value);
      if (condition.success) {
        filter.fields[key] = condition.data;
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unsupported condition for '${key}'`,
        });
      }
    }

    return filter;
  })
  .refine((filter) => !isEmptyFilter(filter), { message: FILTER_REQUIRED_MESSAGE });

export const BATCH_UPDATE_REQUIRED_MESSAGE = 'Both filter and update objects are required';

export const batchUpdateBodySchema = z
  .object(
    {
      filter: movieFilterSchema,
      update: movieChangesSchema,
    },
    {
      required_error: BATCH_UPDATE_REQUIRED_MESSAGE,
      invalid_type_error: BATCH_UPDATE_REQUIRED_MESSAGE,
    }
  )
  .strict();

export const batchDeleteBodySchema = z
  .object(
    {
      filter: movieFilterSchema,
    },
    {
      required_error: FILTER_REQUIRED_MESSAGE,
      invalid_type_error: FILTER_REQUIRED_MESSAGE,
    }
  )
  .strict();

// ==================== Error formatting ====================

/**
 * One line per issue, prefixed with the offending path
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}
