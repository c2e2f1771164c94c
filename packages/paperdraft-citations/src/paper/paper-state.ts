import { z } from 'zod';
import { CitationStore } from '../citations/citation-store.js';
import { citationRecordSchema, citationStyleSchema } from '../citations/types.js';

export const SECTION_TYPES = [
  'abstract',
  'introduction',
  'literature_review',
  'methodology',
  'results',
  'discussion',
  'conclusion'
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export interface OutlineSection {
  sectionType: SectionType;
  title: string;
  keyPoints: string[];
  subsections: OutlineSection[];
}

const outlineSectionSchema: z.ZodType<OutlineSection, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    sectionType: z.enum(SECTION_TYPES),
    title: z.string(),
    keyPoints: z.array(z.string()),
    subsections: z.array(outlineSectionSchema).default([])
  })
);

export const paperOutlineSchema = z.object({
  topic: z.string(),
  sections: z.array(outlineSectionSchema)
});

export const sectionContentSchema = z.object({
  sectionType: z.enum(SECTION_TYPES),
  title: z.string(),
  content: z.string(),
  citations: z.array(z.string()).default([])
});

/**
 * JSON snapshot of a paper in progress. `citationOrder` is optional only so
 * that files written before it existed still load.
 */
export const paperStateSchema = z.object({
  title: z.string().default(''),
  author: z.string().default(''),
  topic: z.string().default(''),
  outline: paperOutlineSchema.nullable().default(null),
  sections: z.record(sectionContentSchema).default({}),
  citations: z.record(citationRecordSchema).default({}),
  citationOrder: z.array(z.string()).optional(),
  citationStyle: citationStyleSchema.default('apa')
});

export type PaperOutline = z.infer<typeof paperOutlineSchema>;
export type SectionContent = z.infer<typeof sectionContentSchema>;
export type PaperState = z.infer<typeof paperStateSchema>;

export type PaperDetails = Omit<PaperState, 'citations' | 'citationOrder' | 'citationStyle'>;

export const emptyPaperDetails = (): PaperDetails => ({
  title: '',
  author: '',
  topic: '',
  outline: null,
  sections: {}
});

export const citationStoreFromState = (state: PaperState): CitationStore =>
  CitationStore.fromSnapshot({
    style: state.citationStyle,
    order: state.citationOrder,
    citations: state.citations
  });

export const paperDetailsFromState = (state: PaperState): PaperDetails => ({
  title: state.title,
  author: state.author,
  topic: state.topic,
  outline: state.outline,
  sections: state.sections
});

export const toPaperState = (details: PaperDetails, store: CitationStore): PaperState => {
  const snapshot = store.toSnapshot();
  return {
    ...details,
    citations: snapshot.citations,
    citationOrder: snapshot.order,
    citationStyle: snapshot.style
  };
};
