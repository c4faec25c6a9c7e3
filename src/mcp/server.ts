/**
 * MCP tool surface.
 *
 * Exposes render_pdf and render_docx on a low-level MCP Server and serves it
 * over the streamable HTTP transport in stateless mode: every POST /mcp gets
 * a fresh server and transport, torn down when the response closes. Tool
 * arguments reach the handler unvalidated; it owns every input check.
 */

import { Request, Response, Router } from 'express';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { Logger, logger as rootLogger } from '../logger';
import { RenderToolHandler } from '../tools/render-tools';
import { DocxToolResult, PdfToolResult, toDocxToolResult, toPdfToolResult } from '../tools/results';
import { RENDER_DOCX_INPUT_SCHEMA, RENDER_PDF_INPUT_SCHEMA } from '../tools/schemas';

export const SERVER_INFO = {
  name: 'md-render-service',
  version: '0.1.0',
};

export const RENDER_PDF_TOOL = 'render_pdf';
export const RENDER_DOCX_TOOL = 'render_docx';

const TOOLS: Tool[] = [
  {
    name: RENDER_PDF_TOOL,
    title: 'Render PDF',
    description:
      'Generate a PDF document from markdown content. ' +
      'Returns a download URL for the generated PDF file. ' +
      "Supports three styles: 'default' (professional blue accents), " +
      "'modern' (clean contemporary design), 'minimal' (elegant serif).",
    inputSchema: RENDER_PDF_INPUT_SCHEMA,
  },
  {
    name: RENDER_DOCX_TOOL,
    title: 'Render DOCX',
    description:
      'Generate a DOCX (Word) document from markdown content. ' +
      'Returns a download URL for the generated DOCX file.',
    inputSchema: RENDER_DOCX_INPUT_SCHEMA,
  },
];

function toCallToolResult(result: PdfToolResult | DocxToolResult): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(result) }],
    structuredContent: result,
    isError: !result.success,
  };
}

/** Build an MCP server exposing both render tools backed by `handler`. */
export function createMcpServer(handler: RenderToolHandler): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    switch (name) {
      case RENDER_PDF_TOOL:
        return toCallToolResult(toPdfToolResult(await handler.renderPdf(args)));
      case RENDER_DOCX_TOOL:
        return toCallToolResult(toDocxToolResult(await handler.renderDocx(args)));
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  });

  return server;
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null });
}

/** Express routes for the streamable HTTP endpoint, mounted at /mcp. */
export function createMcpRoutes(handler: RenderToolHandler, log: Logger = rootLogger): Router {
  const router = Router();
  const mcpLog = log.child({ module: 'mcp' });

  router.post('/', async (req: Request, res: Response) => {
    const server = createMcpServer(handler);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
        mcpLog.warn('Failed to close MCP transport', { err });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      mcpLog.error('MCP request failed', { err });
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  });

  // Stateless mode keeps no sessions to stream to or terminate.
  const methodNotAllowed = (_req: Request, res: Response) => {
    jsonRpcError(res, 405, -32000, 'Method not allowed.');
  };
  router.get('/', methodNotAllowed);
  router.delete('/', methodNotAllowed);

  return router;
}
