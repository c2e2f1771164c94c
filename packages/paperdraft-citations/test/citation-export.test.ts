import { describe, expect, it } from 'vitest';
import { auditCitations } from '../src/citations/citation-audit.js';
import { CitationStore } from '../src/citations/citation-store.js';
import {
  balanceBraces,
  exportBibtex,
  formatBibtexEntry,
  minimalBibtexEntry,
  toCsl
} from '../src/citations/bibtex-export.js';
import type { CitationRecord } from '../src/citations/types.js';

const withDoi: CitationRecord = {
  id: 'c2',
  author: 'Doe, A.',
  title: 'Neural Network Optimization',
  year: 2022,
  source: 'Machine Learning Conference',
  doi: '10.1234/example'
};

const withoutDoi: CitationRecord = {
  id: 'c1',
  author: 'Smith, J. and Jane Roe',
  title: 'Deep Learning Advances',
  year: 2023,
  source: 'Journal of AI Research',
  doi: null
};

describe('bibtex-export', () => {
  it('maps records to CSL-JSON with split author names', () => {
    expect(toCsl(withoutDoi)).toEqual({
      id: 'c1',
      type: 'article-journal',
      DOI: undefined,
      title: 'Deep Learning Advances',
      author: [
        { family: 'Smith', given: 'J.' },
        { family: 'Roe', given: 'Jane' }
      ],
      issued: { 'date-parts': [[2023]] },
      'container-title': 'Journal of AI Research'
    });
  });

  it('keeps the DOI that bibliography styles leave out', () => {
    const entry = formatBibtexEntry(withDoi);

    expect(entry).toMatch(/^@article\{/);
    expect(entry).toContain('10.1234/example');
  });

  it('omits the doi field when the record has none', () => {
    expect(formatBibtexEntry(withoutDoi)).not.toMatch(/doi\s*=/);
  });

  it('writes one entry per record', () => {
    const bibtex = exportBibtex([withoutDoi, withDoi]);

    expect(bibtex.match(/@article\{/g)).toHaveLength(2);
    expect(exportBibtex([])).toBe('');
  });

  it('drops braces that would unbalance a field value', () => {
    expect(balanceBraces('Sets {A} and }B{ {C')).toBe('Sets {A} and B C');
    expect(balanceBraces('{{nested}}')).toBe('{{nested}}');
    expect(balanceBraces('}{')).toBe('');
  });

  it('writes a minimal entry with balanced field values', () => {
    const entry = minimalBibtexEntry({
      ...withDoi,
      title: 'Closing} early {and open',
      source: 'Proceedings of {ICML}'
    });

    expect(entry).toBe(
      [
        '@article{DoeA2022,',
        '  author={Doe, A.},',
        '  title={Closing early and open},',
        '  journal={Proceedings of {ICML}},',
        '  year={2022},',
        '  doi={10.1234/example}',
        '}'
      ].join('\n')
    );
  });
});

describe('citation-audit', () => {
  it('reports cited ids missing from the store and stored ids nobody cites', () => {
    const store = new CitationStore();
    store.addCitation(withoutDoi);
    store.addCitation(withDoi);
    store.addCitation({ id: 'c3', author: 'Lee, K.', title: 'Graph Methods', year: 2021, source: 'Data Letters' });

    const result = auditCitations(
      [
        { title: 'Introduction', citations: ['c1', 'ghost', 'c1'] },
        { title: 'Methodology', citations: ['ghost', 'c3'] },
        { title: 'Conclusion', citations: [] }
      ],
      store
    );

    expect(result).toEqual({
      citedCount: 3,
      referenceCount: 3,
      missingReferences: [{ citationId: 'ghost', sections: ['Introduction', 'Methodology'] }],
      uncitedReferences: ['c2']
    });
  });

  it('reports every stored citation as uncited when there are no sections', () => {
    const store = new CitationStore();
    store.addCitation(withDoi);

    expect(auditCitations([], store)).toEqual({
      citedCount: 0,
      referenceCount: 1,
      missingReferences: [],
      uncitedReferences: ['c2']
    });
  });
});
