import type { CitationStore } from './citation-store.js';

export interface CitedSection {
  title: string;
  citations: string[];
}

export interface CitationAuditResult {
  citedCount: number;
  referenceCount: number;
  /** Ids cited by a section that the store does not hold, with the sections citing them. */
  missingReferences: Array<{ citationId: string; sections: string[] }>;
  /** Stored ids that no section cites, in insertion order. */
  uncitedReferences: string[];
}

export const auditCitations = (sections: CitedSection[], store: CitationStore): CitationAuditResult => {
  const citedBy = new Map<string, string[]>();

  for (const section of sections) {
    for (const citationId of new Set(section.citations)) {
      const titles = citedBy.get(citationId) ?? [];
      titles.push(section.title);
      citedBy.set(citationId, titles);
    }
  }

  const missingReferences = [...citedBy.entries()]
    .filter(([citationId]) => !store.has(citationId))
    .map(([citationId, titles]) => ({ citationId, sections: titles }));

  return {
    citedCount: citedBy.size,
    referenceCount: store.size,
    missingReferences,
    uncitedReferences: store.ids().filter((citationId) => !citedBy.has(citationId))
  };
};
