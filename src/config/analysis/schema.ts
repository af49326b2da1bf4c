/**
 * Analysis configuration schema definition.
 *
 * The analysis configuration names the dataset columns the pipeline reads,
 * the placeholder labels removed from rankings, the stop-word list, and
 * the presentation limits handed to the renderer. It is validated once and
 * then frozen for the lifetime of a run; changing any value means starting
 * a new run.
 */

import { z } from "zod";

/**
 * Dataset column names the pipeline reads.
 * Columns are optional in the data itself; naming one here does not
 * require it to exist.
 */
/** Inclusive bounds on the number of sample rows shown. */
export const SAMPLE_SIZE_RANGE = { min: 5, max: 50 } as const;

export const FieldNamesSchema = z
  .object({
    /** Publication date column */
    date: z.string().min(1).describe("Column holding the publication date"),

    /** Journal column, ranked in the top-journals view */
    journal: z.string().min(1).describe("Column holding the journal name"),

    /** Free-text column used for word frequencies */
    title: z.string().min(1).describe("Column holding the paper title"),

    /** Substring identifying the source column (matched case-insensitively) */
    sourceHint: z
      .string()
      .min(1)
      .describe("Case-insensitive substring that identifies the source column"),
  })
  .strict();

export type FieldNames = z.infer<typeof FieldNamesSchema>;

/**
 * Year bounds used when deriving the default year range.
 */
export const YearBoundsSchema = z
  .object({
    /** Observed minimum years below this are replaced by fallbackMin */
    floor: z.number().int(),
    /** Observed maximum years above this are replaced by fallbackMax */
    ceiling: z.number().int(),
    fallbackMin: z.number().int(),
    fallbackMax: z.number().int(),
  })
  .strict()
  .superRefine((bounds, ctx) => {
    if (bounds.floor > bounds.ceiling) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["floor"],
        message: `floor (${bounds.floor}) must not exceed ceiling (${bounds.ceiling})`,
      });
    }
    if (bounds.fallbackMin > bounds.fallbackMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fallbackMin"],
        message: `fallbackMin (${bounds.fallbackMin}) must not exceed fallbackMax (${bounds.fallbackMax})`,
      });
    }
  });

export type YearBounds = z.infer<typeof YearBoundsSchema>;

/**
 * Complete analysis configuration.
 */
export const AnalysisConfigSchema = z
  .object({
    fields: FieldNamesSchema,

    /** Labels excluded from category rankings (imputation sentinels) */
    placeholders: z
      .array(z.string())
      .describe("Category labels that never appear in rankings"),

    /** Tokens excluded from word frequencies; compared lowercased */
    stopWords: z
      .array(z.string().min(1))
      .describe("Function words and domain noise terms removed before counting"),

    minTokenLength: z
      .number()
      .int()
      .min(1)
      .describe("Shortest token length, in characters, kept by the tokenizer"),

    /** Choices offered for the top-journals view */
    topNOptions: z.array(z.number().int().min(1)).min(1),

    /** Selected top-journals size; must be one of topNOptions */
    topN: z.number().int().min(1),

    /** Rows in the ranked word table */
    wordTableSize: z.number().int().min(1),

    /** Rows in the word bar chart (a prefix of the word table) */
    wordChartSize: z.number().int().min(1),

    /** Most words placed in the frequency-weighted cloud */
    cloudMaxWords: z.number().int().min(1),

    yearBounds: YearBoundsSchema,

    /** Columns shown in the sample view, when present */
    sampleColumns: z.array(z.string().min(1)),

    sampleSize: z.number().int().min(SAMPLE_SIZE_RANGE.min).max(SAMPLE_SIZE_RANGE.max),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!config.topNOptions.includes(config.topN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["topN"],
        message: `topN (${config.topN}) must be one of: ${config.topNOptions.join(", ")}`,
      });
    }
    if (config.wordChartSize > config.wordTableSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["wordChartSize"],
        message: `wordChartSize (${config.wordChartSize}) must not exceed wordTableSize (${config.wordTableSize})`,
      });
    }
  });

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
