import { Cite } from '@citation-js/core';
import '@citation-js/plugin-csl';
import '@citation-js/plugin-bibtex';
import type { CitationRecord } from './types.js';
import { splitAuthors } from './utils.js';

interface CslName {
  family: string;
  given: string;
}

const toCslName = (name: string): CslName => {
  const commaIndex = name.indexOf(',');
  if (commaIndex > 0) {
    return {
      family: name.slice(0, commaIndex).trim(),
      given: name.slice(commaIndex + 1).trim()
    };
  }

  const parts = name.split(/\s+/);
  const family = parts.length > 1 ? parts[parts.length - 1] ?? name : name;
  const given = parts.length > 1 ? parts.slice(0, -1).join(' ') : '';
  return { family, given };
};

export const toCsl = (record: CitationRecord): Record<string, unknown> => ({
  id: record.id,
  type: 'article-journal',
  DOI: record.doi ?? undefined,
  title: record.title,
  author: splitAuthors(record.author).map(toCslName),
  issued: {
    'date-parts': [[record.year]]
  },
  'container-title': record.source
});

/** Drops braces that would close or leave open a BibTeX `{...}` field early. */
export const balanceBraces = (value: string): string => {
  const kept: string[] = [];
  const open: number[] = [];

  for (const char of value) {
    if (char === '{') {
      open.push(kept.length);
    } else if (char === '}') {
      if (open.length === 0) {
        continue;
      }
      open.pop();
    }
    kept.push(char);
  }

  const unmatched = new Set(open);
  return kept.filter((_, index) => !unmatched.has(index)).join('');
};

/** Plain `@article` entry used when citation-js cannot format a record. */
export const minimalBibtexEntry = (record: CitationRecord): string => {
  const key = (splitAuthors(record.author)[0] ?? 'work').replace(/[^a-zA-Z0-9]/g, '') + String(record.year);
  const field = (name: string, value: string) => `  ${name}={${balanceBraces(value)}}`;
  const fields = [
    field('author', record.author),
    field('title', record.title),
    field('journal', record.source),
    field('year', String(record.year)),
    ...(record.doi ? [field('doi', record.doi)] : [])
  ];

  return `@article{${key},\n${fields.join(',\n')}\n}`;
};

export const formatBibtexEntry = (record: CitationRecord): string => {
  try {
    return new Cite([toCsl(record)]).format('bibtex').trim();
  } catch {
    return minimalBibtexEntry(record);
  }
};

/** BibTeX for export metadata. Unlike the bibliography styles, this carries the DOI. */
export const exportBibtex = (records: CitationRecord[]): string =>
  records.map((record) => formatBibtexEntry(record)).join('\n\n');
