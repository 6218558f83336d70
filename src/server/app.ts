/**
 * HTTP surface for the narrator.
 * Sessions are created, inspected and advanced one turn at a time.
 */

import express, { Router, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { z } from "zod";
import { BookNotFoundError } from "../books/bookDefinition.js";
import { isTurnError, type TurnErrorCode } from "../turn/errors.js";
import type { TurnService } from "../turn/turnService.js";
import { log } from "../utils/logger.js";

const serverLog = log.withScope("server");

const MAX_ACTION_CHARS = 500;

const startSessionBody = z.object({
  bookId: z.string().trim().min(1),
  character: z
    .object({
      skill: z.number().int().min(1).max(24).optional(),
      stamina: z.number().int().min(1).max(48).optional(),
      luck: z.number().int().min(1).max(24).optional(),
    })
    .optional(),
});

const turnBody = z.object({
  action: z.string().max(MAX_ACTION_CHARS),
});

const STATUS_BY_CODE: Record<TurnErrorCode, number> = {
  session_not_found: 404,
  turn_in_progress: 409,
  session_closed: 410,
  upstream_unavailable: 503,
  state_invariant: 500,
};

class BadRequestError extends Error {}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new BadRequestError(detail);
  }
  return result.data;
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function sendError(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof BadRequestError) {
    res.status(400).json({ error: "bad_request", message: err.message });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "bad_request", message: "Body must be valid JSON" });
    return;
  }
  if (isTurnError(err)) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) serverLog.warn(`${req.method} ${req.path} -> ${status}: ${err.message}`);
    const message = err.code === "state_invariant" ? "The turn could not be applied." : err.message;
    res.status(status).json({ error: err.code, message, retryable: err.retryable });
    return;
  }
  if (err instanceof BookNotFoundError) {
    res.status(404).json({ error: "book_not_found", message: "Unknown book" });
    return;
  }
  serverLog.error(`${req.method} ${req.path} failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  res.status(500).json({ error: "internal", message: "Something went wrong." });
}

function setupRoutes(router: Router, service: TurnService) {
  router.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  router.post(
    "/api/sessions",
    route((req, res) => {
      const body = parseBody(startSessionBody, req.body);
      const session = service.startSession(body.bookId, body.character);
      serverLog.info(`Started session ${session.sessionId}`, { bookId: session.bookId });
      res.status(201).json(session);
    }),
  );

  router.get(
    "/api/sessions/:id",
    route((req, res) => {
      res.json(service.getSession(req.params.id));
    }),
  );

  router.get(
    "/api/sessions/:id/turns",
    route((req, res) => {
      res.json({ turns: service.history(req.params.id) });
    }),
  );

  router.post(
    "/api/sessions/:id/turns",
    route(async (req, res) => {
      const body = parseBody(turnBody, req.body);
      const result = await service.processTurn(req.params.id, body.action);
      res.json(result);
    }),
  );
}

export function createApp(service: TurnService): express.Express {
  const app = express();
  const router = Router();
  app.use(express.json({ limit: "16kb" }));
  setupRoutes(router, service);
  app.use(router);
  app.use(sendError);
  return app;
}

export async function startServer(app: express.Express, port: number): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const httpServer = createServer(app);
    httpServer.once("error", reject);
    httpServer.listen(port, () => {
      const address = httpServer.address();
      const boundPort = typeof address === "object" && address ? address.port : port;
      serverLog.info(`http://localhost:${boundPort}/api/health`);
      resolve(httpServer);
    });
  });
}

export async function stopServer(httpServer: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    httpServer.close((err) => (err ? reject(err) : resolve()));
  });
}
