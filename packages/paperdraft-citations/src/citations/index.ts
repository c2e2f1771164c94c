export { CitationStore, type CitationStoreOptions, type RestorableSnapshot } from './citation-store.js';
export { auditCitations, type CitationAuditResult, type CitedSection } from './citation-audit.js';
export { exportBibtex, formatBibtexEntry } from './bibtex-export.js';
export {
  CitationError,
  CitationNotFoundError,
  CitationValidationError,
  PaperStateError,
  SessionNotFoundError
} from './errors.js';
export { formatBibliographyEntry, formatInlineMarker } from './formatters.js';
export {
  CITATION_STYLES,
  DEFAULT_CITATION_STYLE,
  isCitationStyle,
  resolveStyle,
  type AddCitationResult,
  type CitationInput,
  type CitationRecord,
  type CitationStoreSnapshot,
  type CitationStyle
} from './types.js';
