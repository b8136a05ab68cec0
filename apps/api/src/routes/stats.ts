import type { Request, Response } from "express";
import type { Router } from "../agents/router";

/**
 * GET /api/stats
 * Aggregates recomputed from the routing history on every call.
 */
export function statsHandler(router: Pick<Router, "getStats">) {
  return (_req: Request, res: Response) => {
    res.json(router.getStats());
  };
}

/**
 * GET /api/history
 */
export function historyHandler(router: Pick<Router, "getHistory">) {
  return (_req: Request, res: Response) => {
    res.json({ entries: router.getHistory() });
  };
}
