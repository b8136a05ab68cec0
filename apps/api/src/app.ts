import express from "express";
import cors from "cors";
import type { Router } from "./agents/router";
import type { DocumentStore } from "./services/documents";
import { createLogger } from "./services/log";
import type { RateLimiter } from "./services/rateLimit";
import { addDocumentHandler, clearDocumentsHandler, listDocumentsHandler } from "./routes/documents";
import { routeHandler } from "./routes/route";
import { historyHandler, statsHandler } from "./routes/stats";

const log = createLogger("http");

/**
 * Express API service:
 * - CORS locked to the configured web origin
 * - Rate limiting per IP
 * - Routing, stats and document upload endpoints
 */
export function createApp(deps: {
  router: Router;
  documents: DocumentStore;
  rateLimit: RateLimiter;
  corsOrigin: string;
}) {
  const app = express();

  app.use(
    cors({
      origin: deps.corsOrigin,
      credentials: false
    })
  );

  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use(async (req, res, next) => {
    const ip =
      req.headers["x-forwarded-for"]?.toString().split(",")[0]?.trim() ||
      req.socket.remoteAddress ||
      "unknown";

    try {
      const r = await deps.rateLimit(ip);
      res.setHeader("X-RateLimit-Remaining", String(r.remaining));

      if (!r.allowed) {
        res.status(429).json({ error: "Rate limit exceeded" });
        return;
      }

      next();
    } catch (err) {
      next(err);
    }
  });

  // Express 4 does not forward rejected promises from async handlers.
  const wrap =
    (handler: (req: express.Request, res: express.Response) => unknown) =>
    (req: express.Request, res: express.Response, next: express.NextFunction) => {
      Promise.resolve(handler(req, res)).catch(next);
    };

  app.post("/api/route", wrap(routeHandler(deps.router, deps.documents)));
  app.get("/api/stats", wrap(statsHandler(deps.router)));
  app.get("/api/history", wrap(historyHandler(deps.router)));
  app.post("/api/documents", wrap(addDocumentHandler(deps.documents)));
  app.get("/api/documents", wrap(listDocumentsHandler(deps.documents)));
  app.delete("/api/documents", wrap(clearDocumentsHandler(deps.documents)));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : "Unknown error";
    if (res.headersSent) {
      log.error("Unhandled error after headers sent:", message);
      return;
    }
    res.status(500).json({ error: message });
  });

  return app;
}
