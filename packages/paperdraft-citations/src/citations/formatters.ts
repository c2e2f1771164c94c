import type { CitationRecord, CitationStyle } from './types.js';

const stripTrailingPeriods = (value: string): string => value.replace(/\.+$/, '');

/**
 * Formats one bibliography line. `position` is the record's 1-based place in
 * insertion order and only appears in IEEE output. The DOI is never printed.
 */
export const formatBibliographyEntry = (
  record: CitationRecord,
  style: CitationStyle,
  position: number
): string => {
  switch (style) {
    case 'ieee':
      return `[${position}] ${record.author}, "${record.title}," ${record.source}, ${record.year}.`;
    case 'mla':
      return `${stripTrailingPeriods(record.author)}. "${record.title}." ${record.source}, ${record.year}.`;
    case 'apa':
    default:
      return `${record.author} (${record.year}). ${record.title}. ${record.source}.`;
  }
};

export const formatInlineMarker = (record: CitationRecord, style: CitationStyle, position: number): string => {
  switch (style) {
    case 'ieee':
      return `[${position}]`;
    case 'mla':
      return `(${record.author} ${record.year})`;
    case 'apa':
    default:
      return `(${record.author}, ${record.year})`;
  }
};
