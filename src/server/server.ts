import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { getConfig } from "../config.js";
import { OrchestratorError, PlanningError, ValidationError, errorMessage } from "../errors.js";
import type { Orchestrator, OrchestratorEvent } from "../orchestrator.js";
import { CancelRequestSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { CancelResponse, ErrorBody, HealthResponse } from "./types.js";

const log = createLogger("server");

export type ApiServerOptions = {
  orchestrator: Orchestrator;
  port?: number;
  host?: string;
};

/** Thrown by body parsing; answered with 400. */
class BadRequest extends Error {}

/**
 * JSON API over an Orchestrator, plus a server-sent event stream of task
 * lifecycle events.
 */
export class ApiServer {
  private orchestrator: Orchestrator;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private sseClients = new Set<ServerResponse>();
  private unsubscribe?: () => void;
  private startedAt = Date.now();

  constructor(opts: ApiServerOptions) {
    this.orchestrator = opts.orchestrator;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          json(res, 500, { error: "Internal server error" });
        }
      });
    });
    this.server = server;
    this.unsubscribe = this.orchestrator.subscribe((event) => this.broadcastSSE(event));
    this.startedAt = Date.now();

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`API listening at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    // CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (method === "GET" && pathname === "/api/health") {
        return await this.handleHealth(res);
      }

      if (method === "GET" && pathname === "/api/workers/health") {
        return await this.handleWorkersHealth(res);
      }

      if (method === "GET" && pathname === "/api/events") {
        return this.handleSSE(req, res);
      }

      if (method === "GET" && pathname === "/api/capabilities") {
        return json(res, 200, this.orchestrator.listCapabilities());
      }

      if (method === "POST" && pathname === "/api/chat") {
        return await this.handleChat(req, res);
      }

      if (method === "POST" && pathname === "/api/tasks") {
        return await this.handleSubmitTask(req, res);
      }

      const cancelMatch = pathname.match(/^\/api\/tasks\/([^/]+)\/cancel$/);
      if (method === "POST" && cancelMatch) {
        return await this.handleCancel(req, res, decodeURIComponent(cancelMatch[1]));
      }

      const taskMatch = pathname.match(/^\/api\/tasks\/([^/]+)$/);
      if (method === "GET" && taskMatch) {
        return this.handleGetTask(res, decodeURIComponent(taskMatch[1]));
      }

      const sessionMatch = pathname.match(/^\/api\/sessions\/([^/]+)$/);
      if (method === "GET" && sessionMatch) {
        const limit = Number(url.searchParams.get("limit") ?? Number.NaN);
        return await this.handleGetSession(
          res,
          decodeURIComponent(sessionMatch[1]),
          Number.isInteger(limit) && limit >= 0 ? limit : undefined,
        );
      }
    } catch (err) {
      return this.handleError(res, err);
    }

    json(res, 404, { error: "Not found" });
  }

  private handleError(res: ServerResponse, err: unknown): void {
    if (err instanceof BadRequest) {
      sendError(res, 400, { error: err.message });
      return;
    }
    if (err instanceof ValidationError) {
      sendError(res, 400, { error: err.message, code: err.code, details: err.details });
      return;
    }
    if (err instanceof PlanningError) {
      sendError(res, 422, { error: err.message, code: err.code, details: err.details });
      return;
    }
    if (err instanceof OrchestratorError) {
      sendError(res, 500, { error: err.message, code: err.code });
      return;
    }
    throw err;
  }

  private async handleHealth(res: ServerResponse): Promise<void> {
    const registry = this.orchestrator.registry;
    const body: HealthResponse = {
      ok: true,
      uptimeSeconds: Math.round((Date.now() - this.startedAt) / 1000),
      ...(await this.orchestrator.stats()),
      workers: registry.list().map((w) => ({
        name: w.name,
        capability: w.capability,
        description: w.descriptor.description,
        health: registry.getCachedHealth(w.name),
      })),
    };
    json(res, 200, body);
  }

  private async handleWorkersHealth(res: ServerResponse): Promise<void> {
    const health = await this.orchestrator.registry.checkAllHealth();
    json(res, 200, { workers: health });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private async handleChat(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJson(req);
    const response = await this.orchestrator.submit(body);
    if (response.errorCode === "VALIDATION_FAILED") {
      sendError(res, 400, { error: response.error ?? "Invalid request", code: response.errorCode });
      return;
    }
    json(res, 200, response);
  }

  private async handleSubmitTask(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJson(req);
    const accepted = await this.orchestrator.submitAsync(body);
    json(res, 202, accepted);
  }

  private handleGetTask(res: ServerResponse, taskId: string): void {
    const report = this.orchestrator.getStatus(taskId);
    if (!report) {
      json(res, 404, { error: "Task not found" });
      return;
    }
    json(res, 200, report);
  }

  private async handleCancel(req: IncomingMessage, res: ServerResponse, taskId: string): Promise<void> {
    const raw = await readBody(req);
    let reason: string | undefined;
    if (raw.trim().length > 0) {
      const parsed = CancelRequestSchema.safeParse(parseJson(raw));
      if (!parsed.success) throw new BadRequest(parsed.error.issues.map((i) => i.message).join("; "));
      reason = parsed.data.reason;
    }

    if (!this.orchestrator.getStatus(taskId)) {
      json(res, 404, { error: "Task not found" });
      return;
    }
    const body: CancelResponse = { taskId, cancelled: this.orchestrator.cancel(taskId, reason), reason };
    json(res, 200, body);
  }

  private async handleGetSession(res: ServerResponse, sessionId: string, limit?: number): Promise<void> {
    const view = await this.orchestrator.getSession(sessionId, limit);
    if (!view) {
      json(res, 404, { error: "Session not found" });
      return;
    }
    json(res, 200, view);
  }

  private broadcastSSE(event: OrchestratorEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, status: number, body: ErrorBody): void {
  json(res, status, body);
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequest("Invalid JSON body");
  }
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  return parseJson(await readBody(req));
}
