import { CitationNotFoundError, CitationValidationError, toValidationIssues } from './errors.js';
import { formatBibliographyEntry, formatInlineMarker } from './formatters.js';
import {
  citationInputSchema,
  citationRecordSchema,
  DEFAULT_CITATION_STYLE,
  resolveStyle,
  type AddCitationResult,
  type CitationInput,
  type CitationRecord,
  type CitationStoreSnapshot,
  type CitationStyle
} from './types.js';
import { makeStableId } from './utils.js';

interface StoreState {
  readonly records: ReadonlyMap<string, CitationRecord>;
  readonly order: readonly string[];
}

export interface CitationStoreOptions {
  style?: CitationStyle;
}

export interface RestorableSnapshot {
  style?: CitationStyle;
  order?: string[];
  citations: Record<string, unknown>;
}

const EMPTY_STATE: StoreState = {
  records: new Map(),
  order: []
};

/**
 * Append-only store of citation records for one paper.
 *
 * Records and insertion order live in a single immutable state object that
 * `add` replaces wholesale, so a reader holds either the state before an add
 * or the state after it.
 */
export class CitationStore {
  private state: StoreState = EMPTY_STATE;
  private currentStyle: CitationStyle;

  constructor(options: CitationStoreOptions = {}) {
    this.currentStyle = options.style ?? DEFAULT_CITATION_STYLE;
  }

  static fromSnapshot(snapshot: RestorableSnapshot): CitationStore {
    const store = new CitationStore({ style: snapshot.style });
    const records = new Map<string, CitationRecord>();

    for (const [key, value] of Object.entries(snapshot.citations)) {
      const parsed = citationRecordSchema.safeParse(value);
      if (!parsed.success) {
        throw new CitationValidationError(
          `Invalid citation record "${key}" in snapshot.`,
          toValidationIssues(parsed.error.issues)
        );
      }

      if (parsed.data.id !== key) {
        throw new CitationValidationError(`Citation key "${key}" does not match record id "${parsed.data.id}".`, [
          { path: `citations.${key}.id`, message: 'must equal its key' }
        ]);
      }

      records.set(key, Object.freeze({ ...parsed.data }));
    }

    // Snapshots written before the order was persisted fall back to key order.
    // Integer-like keys ("2", "10") enumerate first and ascending, not in file order.
    const order = snapshot.order ?? [...records.keys()];
    const seen = new Set<string>();
    for (const id of order) {
      if (seen.has(id)) {
        throw new CitationValidationError(`Citation order lists "${id}" more than once.`, [
          { path: 'order', message: `duplicate id ${id}` }
        ]);
      }
      if (!records.has(id)) {
        throw new CitationValidationError(`Citation order references unknown id "${id}".`, [
          { path: 'order', message: `unknown id ${id}` }
        ]);
      }
      seen.add(id);
    }

    const unordered = [...records.keys()].filter((id) => !seen.has(id));
    if (unordered.length > 0) {
      throw new CitationValidationError('Citation records are missing from the order.', [
        { path: 'order', message: `missing ids ${unordered.join(', ')}` }
      ]);
    }

    store.state = { records, order: [...order] };
    return store;
  }

  get style(): CitationStyle {
    return this.currentStyle;
  }

  /** Changes the style used by `getInlineMarker`. Insertion order is untouched. */
  setStyle(style: CitationStyle): void {
    this.currentStyle = style;
  }

  get size(): number {
    return this.state.order.length;
  }

  has(citationId: string): boolean {
    return this.state.records.has(citationId);
  }

  get(citationId: string): CitationRecord | undefined {
    return this.state.records.get(citationId);
  }

  ids(): string[] {
    return [...this.state.order];
  }

  list(): CitationRecord[] {
    const { records, order } = this.state;
    return order.flatMap((id) => {
      const record = records.get(id);
      return record ? [record] : [];
    });
  }

  /** Exact, case-sensitive match on author, title and year. */
  findDuplicate(candidate: Pick<CitationRecord, 'author' | 'title' | 'year'>): string | null {
    for (const record of this.list()) {
      if (
        record.author === candidate.author &&
        record.title === candidate.title &&
        record.year === candidate.year
      ) {
        return record.id;
      }
    }

    return null;
  }

  add(input: CitationInput): AddCitationResult {
    const parsed = citationInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new CitationValidationError('Invalid citation metadata.', toValidationIssues(parsed.error.issues));
    }

    const candidate = parsed.data;
    const duplicateId = this.findDuplicate(candidate);
    if (duplicateId !== null) {
      return { citationId: duplicateId, created: false };
    }

    const { records, order } = this.state;
    const requestedId =
      candidate.id ?? makeStableId([candidate.author, candidate.title, String(candidate.year)], 'cite');
    const citationId = this.nextFreeId(requestedId);

    const record: CitationRecord = Object.freeze({
      id: citationId,
      author: candidate.author,
      title: candidate.title,
      year: candidate.year,
      source: candidate.source,
      doi: candidate.doi ?? null
    });

    const nextRecords = new Map(records);
    nextRecords.set(citationId, record);
    this.state = {
      records: nextRecords,
      order: [...order, citationId]
    };

    return { citationId, created: true };
  }

  /** Stores a citation unless an equivalent one exists, and returns the id to cite it by. */
  addCitation(input: CitationInput): string {
    return this.add(input).citationId;
  }

  bibliographyEntries(style: CitationStyle = DEFAULT_CITATION_STYLE): string[] {
    const resolved = resolveStyle(style);
    return this.list().map((record, index) => formatBibliographyEntry(record, resolved, index + 1));
  }

  generateBibliography(style: CitationStyle = DEFAULT_CITATION_STYLE): string {
    return this.bibliographyEntries(style).join('\n');
  }

  getInlineMarker(citationId: string): string {
    const { records, order } = this.state;
    const record = records.get(citationId);
    if (!record) {
      throw new CitationNotFoundError(citationId);
    }

    return formatInlineMarker(record, resolveStyle(this.currentStyle), order.indexOf(citationId) + 1);
  }

  toSnapshot(): CitationStoreSnapshot {
    const { records, order } = this.state;
    const citations: Record<string, CitationRecord> = {};
    for (const id of order) {
      const record = records.get(id);
      if (record) {
        citations[id] = { ...record };
      }
    }

    return {
      style: this.currentStyle,
      order: [...order],
      citations
    };
  }

  private nextFreeId(requestedId: string): string {
    if (!this.state.records.has(requestedId)) {
      return requestedId;
    }

    let suffix = 2;
    while (this.state.records.has(`${requestedId}_${suffix}`)) {
      suffix += 1;
    }

    return `${requestedId}_${suffix}`;
  }
}
