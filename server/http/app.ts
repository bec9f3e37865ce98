import { randomUUID } from "crypto";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { AppConfig, TransportKind } from "../config.js";
import { createAccessLogStream, createLogger } from "../lib/logger.js";

const log = createLogger("HTTP");

export type HttpTransportKind = Exclude<TransportKind, "stdio">;

export interface HttpAppOptions {
  config: Pick<AppConfig, "apiKey" | "webOrigin">;
  transport: HttpTransportKind;
  createServer: () => McpServer;
}

export interface HttpApp {
  app: Express;
  /** Close every open MCP session */
  closeAll(): Promise<void>;
}

/**
 * nosniff, frame DENY, HSTS one year, CSP `default-src 'self'; connect-src *`
 */
export function securityHeaders(): ReturnType<typeof helmet> {
  return helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'self'"],
        connectSrc: ["*"],
      },
    },
    xFrameOptions: { action: "deny" },
    strictTransportSecurity: { maxAge: 31_536_000, includeSubDomains: true },
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });
}

export function healthHandler(options: Pick<HttpAppOptions, "config" | "transport">): RequestHandler {
  return (_req, res) => {
    res.json({
      status: "ok",
      transport: options.transport,
      apiKeyConfigured: Boolean(options.config.apiKey),
      timestamp: new Date().toISOString(),
    });
  };
}

function sessionIdFrom(req: Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return Array.isArray(header) ? header[0] : header;
}

// Express 4 does not forward rejected promises to the error handler
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function mountSse(app: Express, createServer: () => McpServer, sessions: Map<string, SSEServerTransport>) {
  app.get(
    "/sse",
    asyncRoute(async (_req, res) => {
      const transport = new SSEServerTransport("/messages", res);
      sessions.set(transport.sessionId, transport);
      res.on("close", () => {
        sessions.delete(transport.sessionId);
        log.debug("SSE session closed", { sessionId: transport.sessionId });
      });
      log.info("SSE session opened", { sessionId: transport.sessionId });
      await createServer().connect(transport);
    })
  );

  app.post(
    "/messages",
    asyncRoute(async (req, res) => {
      const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : undefined;
      const transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!transport) {
        res.status(400).json({ error: "No SSE session for sessionId" });
        return;
      }
      await transport.handlePostMessage(req, res, req.body);
    })
  );
}

function mountStreamableHttp(
  app: Express,
  createServer: () => McpServer,
  sessions: Map<string, StreamableHTTPServerTransport>
) {
  app.post(
    "/mcp",
    asyncRoute(async (req, res) => {
      const sessionId = sessionIdFrom(req);
      let transport = sessionId ? sessions.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (id) => {
            sessions.set(id, created);
            log.info("MCP session opened", { sessionId: id });
          },
        });
        created.onclose = () => {
          if (created.sessionId) sessions.delete(created.sessionId);
        };
        await createServer().connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({ error: "Bad Request: no valid MCP session" });
        return;
      }
      await transport.handleRequest(req, res, req.body);
    })
  );

  const sessionRequest = asyncRoute(async (req, res) => {
    const sessionId = sessionIdFrom(req);
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).json({ error: "No transport found for session" });
      return;
    }
    await transport.handleRequest(req, res);
  });

  app.get("/mcp", sessionRequest);
  app.delete("/mcp", sessionRequest);
}

export function createHttpApp(options: HttpAppOptions): HttpApp {
  const { config, transport, createServer } = options;
  const app = express();

  app.set("trust proxy", 1);
  app.use(securityHeaders());
  app.use(
    cors({
      origin: config.webOrigin === "*" ? "*" : [config.webOrigin],
      credentials: false,
      exposedHeaders: ["mcp-session-id"],
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(morgan("tiny", { stream: createAccessLogStream(log) }));

  app.get("/health", healthHandler({ config, transport }));

  const limiter = rateLimit({
    windowMs: 60_000,
    limit: 600,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(["/mcp", "/sse", "/messages"], limiter);

  const sseSessions = new Map<string, SSEServerTransport>();
  const httpSessions = new Map<string, StreamableHTTPServerTransport>();

  if (transport === "sse") {
    mountSse(app, createServer, sseSessions);
  } else {
    mountStreamableHttp(app, createServer, httpSessions);
  }

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    log.error("Express error handler", { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: "Internal server error" });
  });

  return {
    app,
    async closeAll() {
      const open = [...sseSessions.values(), ...httpSessions.values()];
      sseSessions.clear();
      httpSessions.clear();
      await Promise.all(open.map((session) => session.close()));
    },
  };
}
