import { z } from 'zod';

export const CITATION_STYLES = ['apa', 'ieee', 'mla'] as const;

export type CitationStyle = (typeof CITATION_STYLES)[number];

export const DEFAULT_CITATION_STYLE: CitationStyle = 'apa';

const STYLE_SET = new Set<string>(CITATION_STYLES);

export const isCitationStyle = (value: unknown): value is CitationStyle =>
  typeof value === 'string' && STYLE_SET.has(value);

/**
 * Unknown style values degrade to APA instead of failing. Callers that want
 * strictness validate at their own boundary with `citationStyleSchema`.
 */
export const resolveStyle = (style: unknown): CitationStyle =>
  isCitationStyle(style) ? style : DEFAULT_CITATION_STYLE;

export const citationStyleSchema = z.enum(CITATION_STYLES);

const nonBlank = (field: string) => z.string().regex(/\S/, `${field} must not be blank`);

// Snapshots key records by id in a plain object, where `__proto__` cannot be an own key.
const citationIdSchema = nonBlank('id').refine((value) => value !== '__proto__', 'id must not be "__proto__"');

export const citationRecordSchema = z.object({
  id: citationIdSchema,
  author: nonBlank('author'),
  title: nonBlank('title'),
  year: z.number().int(),
  source: nonBlank('source'),
  doi: z.string().nullable()
});

export const citationInputSchema = citationRecordSchema.extend({
  id: citationIdSchema.optional(),
  doi: z.string().nullable().optional()
});

export type CitationRecord = Readonly<z.infer<typeof citationRecordSchema>>;

export type CitationInput = z.input<typeof citationInputSchema>;

export interface AddCitationResult {
  citationId: string;
  /** False when the input matched an existing record and was discarded. */
  created: boolean;
}

export interface CitationStoreSnapshot {
  style: CitationStyle;
  order: string[];
  citations: Record<string, CitationRecord>;
}
