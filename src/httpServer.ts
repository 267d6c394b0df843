import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError, ValidationError } from "./domain/errors.js";
import { jsonText } from "./tools/toolResult.js";
import { createLogger } from "./utils/logger.js";
import { APP_NAME, APP_VERSION } from "./version.js";

export const MCP_PATH = "/mcp";

export interface HttpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

const logger = createLogger("http");

export async function runHttpServer(
  host: string,
  port: number,
  serverFactory: () => McpServer,
): Promise<() => Promise<void>> {
  const sessions = new Map<string, HttpSession>();

  const httpServer = createServer((req, res) => {
    routeRequest(req, res, sessions, serverFactory).catch((error: unknown) => {
      logger.error(`HTTP ${req.method ?? "?"} ${req.url ?? "/"} failed: ${describeError(error)}`);
      if (!res.headersSent) {
        writeJson(res, 500, { error: describeError(error) });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => resolve());
  });

  return async () => {
    for (const [sessionId, session] of sessions) {
      sessions.delete(sessionId);
      await session.transport.close();
      await session.server.close();
    }
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  };
}

export async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: Map<string, HttpSession>,
  serverFactory: () => McpServer,
): Promise<void> {
  const { pathname } = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  if (pathname === "/healthz") {
    writeJson(res, 200, { ok: true, name: APP_NAME, version: APP_VERSION, sessions: sessions.size });
    return;
  }
  if (pathname !== MCP_PATH) {
    writeJson(res, 404, { error: `No route for ${pathname}` });
    return;
  }

  const sessionId = sessionIdOf(req);
  const session = sessionId ? sessions.get(sessionId) : undefined;

  switch (req.method) {
    case "POST": {
      const body = await readJsonBody(req);
      if (session) {
        await session.transport.handleRequest(req, res, body);
      } else if (sessionId) {
        writeRpcError(res, 404, -32001, `Session ${sessionId} not found`);
      } else if (!isInitializeRequest(body)) {
        writeRpcError(res, 400, -32000, "Send an initialize request to open a session");
      } else {
        await openSession(req, res, body, sessions, serverFactory);
      }
      return;
    }
    case "GET":
    case "DELETE":
      if (!session) {
        writeJson(res, 400, { error: "Missing or unknown mcp-session-id" });
        return;
      }
      await session.transport.handleRequest(req, res);
      return;
    default:
      writeJson(res, 405, { error: `Method ${req.method ?? "?"} not allowed` });
  }
}

async function openSession(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: Map<string, HttpSession>,
  serverFactory: () => McpServer,
): Promise<void> {
  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (sessionId) => {
      sessions.set(sessionId, { server, transport });
      logger.debug(`Opened session ${sessionId}`);
    },
  });

  transport.onclose = () => {
    const sessionId = transport.sessionId;
    if (!sessionId || !sessions.delete(sessionId)) {
      return;
    }
    logger.debug(`Closed session ${sessionId}`);
    server.close().catch((error: unknown) => {
      logger.warn(`Failed to close session ${sessionId}: ${describeError(error)}`);
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Request body is not valid JSON: ${describeError(error)}`);
  }
}

function sessionIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers["mcp-session-id"];
  return Array.isArray(header) ? header[0] : header;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(jsonText(payload));
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
