import type { ZodIssue } from 'zod';

export class CitationError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'CitationError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export const toValidationIssues = (issues: ZodIssue[]): ValidationIssue[] =>
  issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message
  }));

/** Malformed or incomplete citation input. Nothing is committed when this is thrown. */
export class CitationValidationError extends CitationError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message, { issues });
    this.name = 'CitationValidationError';
  }
}

export class CitationNotFoundError extends CitationError {
  constructor(public readonly citationId: string) {
    super(`Citation ID not found: ${citationId}`, { citationId });
    this.name = 'CitationNotFoundError';
  }
}

export class SessionNotFoundError extends CitationError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export type PaperStateErrorCode = 'not_found' | 'invalid' | 'write_failed';

export class PaperStateError extends CitationError {
  constructor(
    message: string,
    public readonly code: PaperStateErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message, { code, ...(details ?? {}) });
    this.name = 'PaperStateError';
  }
}
