import { randomUUID } from 'node:crypto';
import { CitationStore } from '../citations/citation-store.js';
import { SessionNotFoundError } from '../citations/errors.js';
import type { CitationStyle } from '../citations/types.js';
import { Logger } from '../core/logger.js';
import {
  citationStoreFromState,
  emptyPaperDetails,
  paperDetailsFromState,
  toPaperState,
  type PaperDetails,
  type PaperState
} from '../paper/paper-state.js';

export interface PaperSession {
  sessionId: string;
  createdAt: string;
  lastSeenAt: number;
  details: PaperDetails;
  citations: CitationStore;
}

export interface SessionManagerOptions {
  maxSessions: number;
  defaultStyle: CitationStyle;
}

export interface SessionSummary {
  sessionId: string;
  createdAt: string;
  citationCount: number;
  citationStyle: CitationStyle;
}

/**
 * Owns one paper session (and so one citation store) per session id.
 * Mutations go through `runExclusive`, which runs at most one task per
 * session at a time.
 */
export class SessionManager {
  private readonly sessions = new Map<string, PaperSession>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly options: SessionManagerOptions,
    private readonly logger: Logger
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  createSession(): PaperSession {
    this.evictIfFull();

    const now = Date.now();
    const session: PaperSession = {
      sessionId: randomUUID(),
      createdAt: new Date(now).toISOString(),
      lastSeenAt: now,
      details: emptyPaperDetails(),
      citations: new CitationStore({ style: this.options.defaultStyle })
    };

    this.sessions.set(session.sessionId, session);
    this.logger.debug('Created paper session', {
      sessionId: session.sessionId,
      openSessions: this.sessions.size
    });

    return session;
  }

  getSession(sessionId: string): PaperSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    session.lastSeenAt = Date.now();
    return session;
  }

  deleteSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    this.logger.debug('Deleted paper session', {
      sessionId,
      openSessions: this.sessions.size
    });
  }

  listSessions(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => ({
      sessionId: session.sessionId,
      createdAt: session.createdAt,
      citationCount: session.citations.size,
      citationStyle: session.citations.style
    }));
  }

  /**
   * Runs `task` after every earlier task for the same session has settled.
   * The session is looked up when the task starts, so a task queued behind
   * `restoreSession` sees the restored state.
   */
  async runExclusive<T>(sessionId: string, task: (session: PaperSession) => T | Promise<T>): Promise<T> {
    this.getSession(sessionId);

    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => task(this.getSession(sessionId)));
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(sessionId) === settled) {
        this.queues.delete(sessionId);
      }
    }
  }

  toPaperState(sessionId: string): PaperState {
    const session = this.getSession(sessionId);
    return toPaperState(session.details, session.citations);
  }

  /** Replaces a session's paper details and citation store. Throws before touching the session if `state` is inconsistent. */
  restoreSession(sessionId: string, state: PaperState): PaperSession {
    const session = this.getSession(sessionId);
    const citations = citationStoreFromState(state);

    session.details = paperDetailsFromState(state);
    session.citations = citations;

    this.logger.debug('Restored paper session', {
      sessionId,
      citationCount: citations.size
    });

    return session;
  }

  private evictIfFull(): void {
    if (this.sessions.size < this.options.maxSessions) {
      return;
    }

    let oldest: PaperSession | null = null;
    for (const session of this.sessions.values()) {
      if (!oldest || session.lastSeenAt < oldest.lastSeenAt) {
        oldest = session;
      }
    }

    if (oldest) {
      this.sessions.delete(oldest.sessionId);
      this.logger.warn('Evicted least recently used paper session to respect session limit', {
        maxSessions: this.options.maxSessions,
        evictedSessionId: oldest.sessionId
      });
    }
  }
}
