import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { auditCitations } from '../citations/citation-audit.js';
import { exportBibtex } from '../citations/bibtex-export.js';
import { CitationError } from '../citations/errors.js';
import { CITATION_STYLES, DEFAULT_CITATION_STYLE } from '../citations/types.js';
import type { AppConfig } from '../config.js';
import { Logger } from '../core/logger.js';
import type { StateManager } from '../paper/state-manager.js';
import type { SessionManager } from '../session/session-manager.js';

const toToolResult = (payload: Record<string, unknown>): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  structuredContent: payload
});

const toToolError = (error: unknown): CallToolResult => {
  const fallbackMessage = 'Unknown paperdraft error.';

  if (error instanceof CitationError) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message,
        details: error.details ?? {}
      }
    };
  }

  if (error instanceof Error) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message,
        details: {}
      }
    };
  }

  return {
    isError: true,
    content: [{ type: 'text', text: fallbackMessage }],
    structuredContent: {
      error: 'UnknownError',
      message: fallbackMessage,
      details: {}
    }
  };
};

const sessionIdSchema = z.string().min(1).describe('Paper session id returned by create_session.');
const styleSchema = z.enum(CITATION_STYLES);

export interface PaperdraftMcpDependencies {
  sessions: SessionManager;
  stateManager: StateManager;
}

export const createPaperdraftMcpServer = (
  config: AppConfig,
  { sessions, stateManager }: PaperdraftMcpDependencies,
  logger: Logger
): McpServer => {
  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
      title: 'Paperdraft Citations'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const fail = (tool: string, error: unknown, context: Record<string, unknown> = {}): CallToolResult => {
    logger.warn('Citation tool failed', {
      tool,
      ...context,
      error: error instanceof Error ? error.message : String(error)
    });
    return toToolError(error);
  };

  server.registerTool(
    'create_session',
    {
      title: 'Create Paper Session',
      description: 'Start a paper session with its own empty citation store.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: false
      },
      inputSchema: {
        citation_style: styleSchema.optional().describe('Initial style for inline markers.')
      }
    },
    async ({ citation_style }): Promise<CallToolResult> => {
      try {
        const session = sessions.createSession();
        if (citation_style) {
          session.citations.setStyle(citation_style);
        }

        return toToolResult({
          session_id: session.sessionId,
          citation_style: session.citations.style
        });
      } catch (error) {
        return fail('create_session', error);
      }
    }
  );

  server.registerTool(
    'delete_session',
    {
      title: 'Delete Paper Session',
      description: 'Discard a paper session and every citation it holds.',
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema
      }
    },
    async ({ session_id }): Promise<CallToolResult> => {
      try {
        await sessions.runExclusive(session_id, () => undefined);
        sessions.deleteSession(session_id);
        return toToolResult({ session_id, deleted: true });
      } catch (error) {
        return fail('delete_session', error, { session_id });
      }
    }
  );

  server.registerTool(
    'add_citation',
    {
      title: 'Add Citation',
      description:
        'Register a citation. A citation matching an existing one on author, title and year is discarded and the existing id is returned.',
      annotations: {
        readOnlyHint: false,
        idempotentHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        citation_id: z.string().optional().describe('Preferred id. The store may return a different one.'),
        author: z.string().describe('Author line, typically "Surname, I."'),
        title: z.string(),
        year: z.number().int(),
        source: z.string().describe('Journal, venue or publisher.'),
        doi: z.string().optional()
      }
    },
    async ({ session_id, citation_id, author, title, year, source, doi }): Promise<CallToolResult> => {
      try {
        const result = await sessions.runExclusive(session_id, (session) =>
          session.citations.add({ id: citation_id, author, title, year, source, doi })
        );

        return toToolResult({
          citation_id: result.citationId,
          created: result.created
        });
      } catch (error) {
        return fail('add_citation', error, { session_id, citation_id });
      }
    }
  );

  server.registerTool(
    'list_citations',
    {
      title: 'List Citations',
      description: 'List stored citations in insertion order.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema
      }
    },
    async ({ session_id }): Promise<CallToolResult> => {
      try {
        const store = sessions.getSession(session_id).citations;
        return toToolResult({
          citation_style: store.style,
          citations: store.list()
        });
      } catch (error) {
        return fail('list_citations', error, { session_id });
      }
    }
  );

  server.registerTool(
    'generate_bibliography',
    {
      title: 'Generate Bibliography',
      description: 'Render one reference line per stored citation, in insertion order.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        style: styleSchema.default(DEFAULT_CITATION_STYLE)
      }
    },
    async ({ session_id, style }): Promise<CallToolResult> => {
      try {
        const store = sessions.getSession(session_id).citations;
        const entries = store.bibliographyEntries(style);
        return {
          content: [{ type: 'text', text: entries.join('\n') }],
          structuredContent: {
            style,
            bibliography: entries.join('\n'),
            entries
          }
        };
      } catch (error) {
        return fail('generate_bibliography', error, { session_id, style });
      }
    }
  );

  server.registerTool(
    'get_inline_marker',
    {
      title: 'Get Inline Marker',
      description: "In-text citation token for a stored citation, in the session's current style.",
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        citation_id: z.string().min(1)
      }
    },
    async ({ session_id, citation_id }): Promise<CallToolResult> => {
      try {
        const store = sessions.getSession(session_id).citations;
        const marker = store.getInlineMarker(citation_id);
        return {
          content: [{ type: 'text', text: marker }],
          structuredContent: {
            citation_id,
            style: store.style,
            marker
          }
        };
      } catch (error) {
        return fail('get_inline_marker', error, { session_id, citation_id });
      }
    }
  );

  server.registerTool(
    'set_citation_style',
    {
      title: 'Set Citation Style',
      description: 'Change the style used for inline markers. Citation order is unaffected.',
      annotations: {
        readOnlyHint: false,
        idempotentHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        style: styleSchema
      }
    },
    async ({ session_id, style }): Promise<CallToolResult> => {
      try {
        await sessions.runExclusive(session_id, (session) => session.citations.setStyle(style));
        return toToolResult({ session_id, citation_style: style });
      } catch (error) {
        return fail('set_citation_style', error, { session_id, style });
      }
    }
  );

  server.registerTool(
    'export_bibtex',
    {
      title: 'Export BibTeX',
      description: 'Export stored citations as BibTeX, including DOIs.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema
      }
    },
    async ({ session_id }): Promise<CallToolResult> => {
      try {
        const bibtex = exportBibtex(sessions.getSession(session_id).citations.list());
        return {
          content: [{ type: 'text', text: bibtex }],
          structuredContent: { bibtex }
        };
      } catch (error) {
        return fail('export_bibtex', error, { session_id });
      }
    }
  );

  server.registerTool(
    'audit_citations',
    {
      title: 'Audit Citations',
      description:
        'Compare the citation ids used by paper sections against the store: ids cited but never registered, and citations no section uses.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema
      }
    },
    async ({ session_id }): Promise<CallToolResult> => {
      try {
        const session = sessions.getSession(session_id);
        const result = auditCitations(Object.values(session.details.sections), session.citations);
        return toToolResult({ ...result });
      } catch (error) {
        return fail('audit_citations', error, { session_id });
      }
    }
  );

  server.registerTool(
    'save_paper_state',
    {
      title: 'Save Paper State',
      description: 'Write the paper state, including citations and their order, to a JSON file.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        file_path: z.string().min(1).describe('Path inside the configured state directory, relative to it.')
      }
    },
    async ({ session_id, file_path }): Promise<CallToolResult> => {
      try {
        const written = await sessions.runExclusive(session_id, () =>
          stateManager.saveState(sessions.toPaperState(session_id), file_path)
        );
        return toToolResult({ message: `State saved to ${written}`, file_path: written });
      } catch (error) {
        return fail('save_paper_state', error, { session_id, file_path });
      }
    }
  );

  server.registerTool(
    'load_paper_state',
    {
      title: 'Load Paper State',
      description: "Replace the session's paper state and citations with a previously saved JSON file.",
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        openWorldHint: false
      },
      inputSchema: {
        session_id: sessionIdSchema,
        file_path: z.string().min(1)
      }
    },
    async ({ session_id, file_path }): Promise<CallToolResult> => {
      try {
        const session = await sessions.runExclusive(session_id, async () => {
          const state = await stateManager.loadState(file_path);
          return sessions.restoreSession(session_id, state);
        });

        return toToolResult({
          message: `State loaded from ${stateManager.resolvePath(file_path)}`,
          citation_count: session.citations.size,
          citation_style: session.citations.style
        });
      } catch (error) {
        return fail('load_paper_state', error, { session_id, file_path });
      }
    }
  );

  return server;
};
