import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import type { TodoOutlineConfig } from './config.js';
import { parseTodayOption } from './config.js';
import {
  checkFile,
  closeDocument,
  completeDocument,
  documentDiagnostics,
  documentTasks,
  editDocument,
  formatDocument,
  formatFile,
  openDocument,
} from './todo/api.js';
import type { CalendarDate } from './todo/model.js';
import { DocumentStore } from './todo/session.js';

export const SERVER_NAME = 'todo-outline-mcp';
export const SERVER_VERSION = '0.1.0';

const statsSchema = z.object({
  total: z.number(),
  todo: z.number(),
  doing: z.number(),
  done: z.number(),
  cancelled: z.number(),
});

const summarySchema = {
  uri: z.string(),
  version: z.number().int().positive(),
  etag: z.string(),
  stats: statsSchema,
};

const diagnosticSchema = z.object({
  severity: z.enum(['error', 'warning', 'information']),
  code: z.enum(['OVERDUE', 'DUE_TODAY', 'DUE_SOON']),
  message: z.string(),
  line: z.number().int().nonnegative(),
  node: z.number().int().nonnegative(),
  dueDate: z.string(),
  daysOverdue: z.number().int().positive().optional(),
  source: z.string(),
});

const positionSchema = z.object({
  line: z.number().int().nonnegative(),
  character: z.number().int().nonnegative(),
});

function optionalToday(value: string | undefined): CalendarDate | undefined {
  return value === undefined ? undefined : parseTodayOption(value);
}

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `doc.*` operates on documents opened in this server's session store.
 * - `file.*` reads (and optionally rewrites) files under `config.rootDir`.
 *
 * Each server owns its own `DocumentStore`; documents live until `doc.close`
 * or until the process exits.
 */
export function createMcpServer(
  config: TodoOutlineConfig,
  store: DocumentStore = new DocumentStore()
): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'doc.open',
    {
      title: 'Open a document',
      description:
        'Open (or re-open) an outline document from text. Later doc.* calls address it by uri.',
      inputSchema: {
        uri: z.string().min(1),
        text: z.string(),
      },
      outputSchema: summarySchema,
    },
    async ({ uri, text }) => {
      const { version, etag, stats } = openDocument(store, { uri, text });
      const result = { uri, version, etag, stats };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'doc.edit',
    {
      title: 'Edit a document',
      description:
        'Replace lines [startLine, endLine) (0-based, end exclusive) with text. Use ifMatch with the last etag to reject stale edits.',
      inputSchema: {
        uri: z.string().min(1),
        startLine: z.number().int().nonnegative(),
        endLine: z.number().int().nonnegative(),
        text: z.string(),
        ifMatch: z.string().optional(),
      },
      outputSchema: summarySchema,
    },
    async ({ uri, startLine, endLine, text, ifMatch }) => {
      const { version, etag, stats } = editDocument(store, {
        uri,
        startLine,
        endLine,
        text,
        ifMatch,
      });
      const result = { uri, version, etag, stats };
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  server.registerTool(
    'doc.close',
    {
      title: 'Close a document',
      description: 'Drop an open document. Returns closed=false when the uri was not open.',
      inputSchema: { uri: z.string().min(1) },
      outputSchema: { closed: z.boolean() },
    },
    async ({ uri }) => {
      const { closed } = closeDocument(store, { uri });
      return {
        content: [{ type: 'text', text: JSON.stringify({ closed }, null, 2) }],
        structuredContent: { closed },
      };
    }
  );

  server.registerTool(
    'doc.tasks',
    {
      title: 'List tasks',
      description: 'Return the resolved tasks of an open document in tree or flat view.',
      inputSchema: {
        uri: z.string().min(1),
        view: z.enum(['tree', 'flat']).optional(),
      },
      outputSchema: {
        tasks: z.array(z.any()),
        etag: z.string(),
      },
    },
    async ({ uri, view }) => {
      const { tasks, etag } = documentTasks(store, { uri, view });
      return {
        content: [{ type: 'text', text: JSON.stringify({ tasks, etag }, null, 2) }],
        structuredContent: { tasks, etag },
      };
    }
  );

  server.registerTool(
    'doc.format',
    {
      title: 'Format a document',
      description:
        'Render the canonical text of an open document. mode=normalized also drops overridden and redundant tokens. The session is not modified.',
      inputSchema: {
        uri: z.string().min(1),
        mode: z.enum(['raw', 'normalized']).optional(),
      },
      outputSchema: {
        text: z.string(),
        etag: z.string(),
      },
    },
    async ({ uri, mode }) => {
      const { text, etag } = formatDocument(store, { uri, mode });
      return {
        content: [{ type: 'text', text }],
        structuredContent: { text, etag },
      };
    }
  );

  server.registerTool(
    'doc.complete',
    {
      title: 'Complete at a position',
      description:
        'Suggest categories after "[", tags after "@" and due dates after "(" at a 0-based line/character position.',
      inputSchema: {
        uri: z.string().min(1),
        line: z.number().int().nonnegative(),
        character: z.number().int().nonnegative(),
        today: z.string().optional(),
      },
      outputSchema: {
        items: z.array(
          z.object({
            kind: z.enum(['category', 'tag', 'due']),
            label: z.string(),
            insertText: z.string(),
            detail: z.string().optional(),
            range: z.object({ start: positionSchema, end: positionSchema }),
          })
        ),
      },
    },
    async ({ uri, line, character, today }) => {
      const { items } = completeDocument(config, store, {
        uri,
        line,
        character,
        today: optionalToday(today),
      });
      return {
        content: [{ type: 'text', text: JSON.stringify({ items }, null, 2) }],
        structuredContent: { items },
      };
    }
  );

  server.registerTool(
    'doc.diagnostics',
    {
      title: 'Due-date diagnostics',
      description:
        'Report overdue tasks (error), tasks due today (warning) and tasks due within 7 days (information) of an open document.',
      inputSchema: {
        uri: z.string().min(1),
        today: z.string().optional(),
      },
      outputSchema: {
        diagnostics: z.array(diagnosticSchema),
        today: z.string(),
      },
    },
    async ({ uri, today }) => {
      const result = documentDiagnostics(config, store, { uri, today: optionalToday(today) });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { diagnostics: result.diagnostics, today: result.today },
      };
    }
  );

  server.registerTool(
    'file.format',
    {
      title: 'Format a file',
      description:
        'Format a file under the root directory. Dry run unless write=true; ifMatch guards the write.',
      inputSchema: {
        path: z.string().min(1),
        mode: z.enum(['raw', 'normalized']).optional(),
        write: z.boolean().optional(),
        ifMatch: z.string().optional(),
      },
      outputSchema: {
        path: z.string(),
        changed: z.boolean(),
        etag: z.string(),
        text: z.string(),
      },
    },
    async ({ path, mode, write, ifMatch }) => {
      const result = await formatFile(config, { path, mode, write, ifMatch });
      const structured = {
        path: result.path,
        changed: result.changed,
        etag: result.etag,
        text: result.text,
      };
      return {
        content: [{ type: 'text', text: JSON.stringify(structured, null, 2) }],
        structuredContent: structured,
      };
    }
  );

  server.registerTool(
    'file.check',
    {
      title: 'Check a file',
      description: 'Due-date diagnostics for a file under the root directory.',
      inputSchema: {
        path: z.string().min(1),
        today: z.string().optional(),
      },
      outputSchema: {
        diagnostics: z.array(diagnosticSchema),
        today: z.string(),
      },
    },
    async ({ path, today }) => {
      const result = await checkFile(config, { path, today: optionalToday(today) });
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        structuredContent: { diagnostics: result.diagnostics, today: result.today },
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * stdout belongs to the transport; the startup notice goes to stderr.
 */
export async function runStdioServer(config: TodoOutlineConfig): Promise<void> {
  const server = createMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.stderr.write(`${SERVER_NAME} ${SERVER_VERSION} serving ${config.rootDir}\n`);
}
