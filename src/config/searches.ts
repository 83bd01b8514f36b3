import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

/** Browse condition ids per named condition filter. */
export const CONDITION_IDS = {
  new: ['1000'],
  new_open_box: ['1000', '1500'],
  refurbished: ['2000', '2500'],
  used: ['3000', '4000', '5000', '6000'],
  used_good: ['3000', '4000', '5000'],
  any_not_broken: ['1000', '1500', '2000', '2500', '3000', '4000', '5000', '6000'],
} as const;

export const searchConditionSchema = z.enum([
  'any',
  'new',
  'new_open_box',
  'refurbished',
  'used',
  'used_good',
  'any_not_broken',
]);

export type SearchCondition = z.infer<typeof searchConditionSchema>;

const wordList = z
  .array(z.string().trim().min(1))
  .default([])
  .transform((words) => words.map((w) => w.toLowerCase()));

export const searchSpecSchema = z
  .object({
    name: z.string().trim().min(1),
    query: z.string().trim().min(1),
    minPrice: z.number().nonnegative().default(0),
    maxPrice: z.number().positive().optional(),
    currency: z.string().length(3).default('USD'),
    condition: searchConditionSchema.default('any'),
    includeAuctions: z.boolean().default(false),
    freeShippingOnly: z.boolean().default(false),
    excludeWords: wordList,
    requiredWords: wordList,
    categoryId: z.string().optional(),
    enabled: z.boolean().default(true),
  })
  .refine((s) => s.maxPrice === undefined || s.minPrice <= s.maxPrice, {
    message: 'minPrice must not exceed maxPrice',
    path: ['maxPrice'],
  });

export type SearchSpec = Readonly<z.infer<typeof searchSpecSchema>>;

export const searchesFileSchema = z
  .object({
    searches: z.array(searchSpecSchema).min(1),
  })
  .superRefine((file, ctx) => {
    const names = new Set<string>();
    file.searches.forEach((spec, i) => {
      if (names.has(spec.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate search name '${spec.name}'`,
          path: ['searches', i, 'name'],
        });
      }
      names.add(spec.name);
    });
  });

/**
 * Validate a parsed searches document. Specs come back frozen: they are read-only
 * for the whole run.
 */
export function parseSearchSpecs(json: unknown): SearchSpec[] {
  const parsed = searchesFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid searches configuration', issues);
  }
  return parsed.data.searches.map((spec) => Object.freeze(spec));
}

export async function loadSearchSpecs(filePath: string): Promise<SearchSpec[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read searches file ${filePath}: ${getErrorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Searches file ${filePath} is not valid JSON: ${getErrorMessage(error)}`);
  }

  return parseSearchSpecs(json);
}
