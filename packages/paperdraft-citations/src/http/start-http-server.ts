import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { z } from 'zod';
import { auditCitations } from '../citations/citation-audit.js';
import { exportBibtex } from '../citations/bibtex-export.js';
import {
  CitationError,
  CitationNotFoundError,
  CitationValidationError,
  PaperStateError,
  SessionNotFoundError,
  toValidationIssues
} from '../citations/errors.js';
import { CITATION_STYLES, citationStyleSchema, DEFAULT_CITATION_STYLE } from '../citations/types.js';
import type { AppConfig } from '../config.js';
import { Logger } from '../core/logger.js';
import type { StateManager } from '../paper/state-manager.js';
import type { SessionManager } from '../session/session-manager.js';

export interface HttpDependencies {
  sessions: SessionManager;
  stateManager: StateManager;
}

interface HttpAppRuntime {
  app: Hono;
  shutdown: () => Promise<void>;
}

const addCitationBodySchema = z.object({
  citation_id: z.string().optional(),
  author: z.string(),
  title: z.string(),
  year: z.number().int(),
  source: z.string(),
  doi: z.string().nullable().optional()
});

const styleBodySchema = z.object({
  style: citationStyleSchema
});

const filePathBodySchema = z.object({
  file_path: z.string().min(1)
});

const errorBody = (error: string, message: string, details: Record<string, unknown> = {}) => ({
  error,
  message,
  details
});

const statusForError = (error: CitationError): number => {
  if (error instanceof CitationValidationError) {
    return 422;
  }
  if (error instanceof SessionNotFoundError || error instanceof CitationNotFoundError) {
    return 404;
  }
  if (error instanceof PaperStateError) {
    return error.code === 'write_failed' ? 500 : 400;
  }
  return 500;
};

const readJsonBody = async <T>(request: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> => {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new CitationValidationError('Invalid JSON request body.', [{ path: '(root)', message: 'expected JSON' }]);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new CitationValidationError('Invalid request body.', toValidationIssues(parsed.error.issues));
  }

  return parsed.data;
};

const isAuthorized = (authorization: string | undefined, config: AppConfig): boolean => {
  if (!config.apiKey) {
    return true;
  }

  if (!authorization || !authorization.startsWith('Bearer ')) {
    return false;
  }

  const token = authorization.slice('Bearer '.length).trim();
  return token.length > 0 && token === config.apiKey;
};

export const createHttpApp = (
  config: AppConfig,
  { sessions, stateManager }: HttpDependencies,
  logger: Logger
): HttpAppRuntime => {
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof CitationError) {
      const status = statusForError(error);
      if (status >= 500) {
        logger.error('Citation request failed', {
          path: c.req.path,
          error: error.message
        });
      } else {
        logger.debug('Citation request rejected', {
          path: c.req.path,
          status,
          error: error.name
        });
      }

      return Response.json(errorBody(error.name, error.message, error.details), { status });
    }

    logger.error('Unhandled HTTP runtime error', {
      path: c.req.path,
      error: error instanceof Error ? error.message : String(error)
    });

    return Response.json(errorBody('InternalServerError', 'Internal server error'), { status: 500 });
  });

  app.notFound((c) => c.json(errorBody('NotFound', 'Not found'), 404));

  app.get('/', (c) =>
    c.json({
      name: config.serverName,
      version: config.serverVersion,
      api: '/api/v1',
      health: config.healthPath,
      citationStyles: CITATION_STYLES
    })
  );

  app.get(config.healthPath, (c) =>
    c.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      serverName: config.serverName,
      serverVersion: config.serverVersion,
      openSessions: sessions.size,
      timestamp: new Date().toISOString()
    })
  );

  app.use('/api/*', async (c, next) => {
    if (!isAuthorized(c.req.header('authorization'), config)) {
      return c.json(errorBody('Unauthorized', 'Unauthorized'), 401);
    }

    await next();
  });

  app.post('/api/v1/sessions', (c) => {
    const session = sessions.createSession();
    return c.json({ session_id: session.sessionId }, 201);
  });

  app.get('/api/v1/sessions', (c) => c.json({ sessions: sessions.listSessions() }));

  app.delete('/api/v1/sessions/:sessionId', async (c) => {
    const sessionId = c.req.param('sessionId');
    await sessions.runExclusive(sessionId, () => undefined);
    sessions.deleteSession(sessionId);
    return c.json({ message: `Session deleted: ${sessionId}` });
  });

  app.post('/api/v1/sessions/:sessionId/citations', async (c) => {
    const sessionId = c.req.param('sessionId');
    sessions.getSession(sessionId);
    const body = await readJsonBody(c.req.raw, addCitationBodySchema);

    const result = await sessions.runExclusive(sessionId, (session) =>
      session.citations.add({
        id: body.citation_id,
        author: body.author,
        title: body.title,
        year: body.year,
        source: body.source,
        doi: body.doi
      })
    );

    return c.json({ citation_id: result.citationId, created: result.created }, result.created ? 201 : 200);
  });

  app.get('/api/v1/sessions/:sessionId/citations', (c) => {
    const store = sessions.getSession(c.req.param('sessionId')).citations;
    return c.json({ citation_style: store.style, citations: store.list() });
  });

  app.get('/api/v1/sessions/:sessionId/citations/audit', (c) => {
    const session = sessions.getSession(c.req.param('sessionId'));
    return c.json(auditCitations(Object.values(session.details.sections), session.citations));
  });

  app.get('/api/v1/sessions/:sessionId/citations/:citationId/marker', (c) => {
    const store = sessions.getSession(c.req.param('sessionId')).citations;
    const citationId = c.req.param('citationId');
    return c.json({ citation_id: citationId, style: store.style, marker: store.getInlineMarker(citationId) });
  });

  app.put('/api/v1/sessions/:sessionId/citation-style', async (c) => {
    const sessionId = c.req.param('sessionId');
    sessions.getSession(sessionId);
    const { style } = await readJsonBody(c.req.raw, styleBodySchema);
    await sessions.runExclusive(sessionId, (session) => session.citations.setStyle(style));
    return c.json({ citation_style: style });
  });

  app.get('/api/v1/sessions/:sessionId/bibliography', (c) => {
    const store = sessions.getSession(c.req.param('sessionId')).citations;
    const requested = c.req.query('style');

    // The formatter degrades unknown styles to APA; the API rejects them instead.
    const parsed = citationStyleSchema.safeParse(requested || DEFAULT_CITATION_STYLE);
    if (!parsed.success) {
      return c.json(
        errorBody(
          'InvalidCitationStyle',
          `Invalid citation style: '${String(requested)}'. Valid styles: ${CITATION_STYLES.join(', ')}`,
          { style: requested }
        ),
        400
      );
    }

    const entries = store.bibliographyEntries(parsed.data);
    return c.json({ bibliography: entries.join('\n'), style: parsed.data, entries });
  });

  app.get('/api/v1/sessions/:sessionId/bibtex', (c) => {
    const store = sessions.getSession(c.req.param('sessionId')).citations;
    return c.text(exportBibtex(store.list()));
  });

  app.post('/api/v1/sessions/:sessionId/save', async (c) => {
    const sessionId = c.req.param('sessionId');
    sessions.getSession(sessionId);
    const { file_path } = await readJsonBody(c.req.raw, filePathBodySchema);

    const written = await sessions.runExclusive(sessionId, () =>
      stateManager.saveState(sessions.toPaperState(sessionId), file_path)
    );

    logger.info('Saved paper state', { sessionId, filePath: written });
    return c.json({ message: `State saved to ${written}` });
  });

  app.post('/api/v1/sessions/:sessionId/load', async (c) => {
    const sessionId = c.req.param('sessionId');
    sessions.getSession(sessionId);
    const { file_path } = await readJsonBody(c.req.raw, filePathBodySchema);

    const session = await sessions.runExclusive(sessionId, async () => {
      const state = await stateManager.loadState(file_path);
      return sessions.restoreSession(sessionId, state);
    });

    logger.info('Loaded paper state', { sessionId, citationCount: session.citations.size });
    return c.json({ message: `State loaded from ${stateManager.resolvePath(file_path)}` });
  });

  return {
    app,
    shutdown: async () => {
      for (const summary of sessions.listSessions()) {
        await sessions.runExclusive(summary.sessionId, () => undefined);
      }
    }
  };
};

export const startHttpServer = (config: AppConfig, dependencies: HttpDependencies, logger: Logger) => {
  const runtime = createHttpApp(config, dependencies, logger);

  const server = serve(
    {
      fetch: runtime.app.fetch,
      port: config.port,
      hostname: config.host
    },
    (info) => {
      logger.info('Paperdraft HTTP API listening', {
        host: config.host,
        port: info.port,
        health: config.healthPath
      });
    }
  );

  const shutdown = (signal: string) => {
    logger.info('Shutting down HTTP API', { signal });
    server.close();
    runtime.shutdown().catch((error: unknown) => {
      logger.error('HTTP shutdown did not drain cleanly', {
        error: error instanceof Error ? error.message : String(error)
      });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
};
