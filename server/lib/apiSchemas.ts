/**
 * Zod schemas for Yahoo Finance responses.
 *
 * These validate payload shape at the system boundary. Array entries are
 * nullable because the chart endpoint pads missing bars with null.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Chart  (v8/finance/chart/{symbol})
// ---------------------------------------------------------------------------

const nullableNumberArray = z.array(z.number().nullable());

const ChartQuoteSchema = z
  .object({
    open: nullableNumberArray.optional(),
    high: nullableNumberArray.optional(),
    low: nullableNumberArray.optional(),
    close: nullableNumberArray.optional(),
    volume: nullableNumberArray.optional(),
  })
  .passthrough();

const ChartResultSchema = z
  .object({
    meta: z
      .object({
        symbol: z.string().optional(),
        gmtoffset: z.number().optional(),
        exchangeTimezoneName: z.string().optional(),
      })
      .passthrough(),
    timestamp: z.array(z.number()).optional(),
    indicators: z
      .object({
        quote: z.array(ChartQuoteSchema).optional(),
        adjclose: z.array(z.object({ adjclose: nullableNumberArray.optional() }).passthrough()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const ChartResponseSchema = z
  .object({
    chart: z
      .object({
        result: z.array(ChartResultSchema).nullable().optional(),
        error: z
          .object({ code: z.string().optional(), description: z.string().optional() })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type ChartResult = z.infer<typeof ChartResultSchema>;

// ---------------------------------------------------------------------------
// Search  (v1/finance/search): news items
// ---------------------------------------------------------------------------

const NewsItemSchema = z
  .object({
    uuid: z.string(),
    title: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    publisher: z.string().optional(),
    link: z.string().optional(),
    providerPublishTime: z.number().optional(),
    displayTime: z.number().optional(),
    type: z.string().optional(),
    isPremium: z.boolean().optional(),
    isHosted: z.boolean().optional(),
    thumbnail: z
      .object({
        resolutions: z.array(z.object({ url: z.string() }).passthrough()).optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export const SearchResponseSchema = z
  .object({
    news: z.array(NewsItemSchema).optional(),
  })
  .passthrough();

export type NewsItem = z.infer<typeof NewsItemSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; issues: string[] };

/** Validate a parsed JSON payload against a schema, reporting the first few issues. */
export function validateApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): ValidationResult<T> {
  const result = schema.safeParse(payload);
  if (result.success) return { ok: true, data: result.data };
  return {
    ok: false,
    issues: result.error.issues.slice(0, 3).map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}
