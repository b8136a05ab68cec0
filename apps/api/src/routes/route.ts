import type { Request, Response } from "express";
import { z } from "zod";
import type { Router } from "../agents/router";
import type { DocumentStore } from "../services/documents";

const RouteReqSchema = z.object({
  query: z.string().max(2000),
  // Lets a caller keep uploads out of a single request.
  useDocuments: z.boolean().default(true)
});

/**
 * POST /api/route
 * Classifies the query, retrieves context and returns the routed outcome.
 * Routing itself never fails; only malformed requests get a 400.
 */
export function routeHandler(router: Pick<Router, "route">, documents: DocumentStore) {
  return async (req: Request, res: Response) => {
    const parsed = RouteReqSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
      return;
    }

    const { query, useDocuments } = parsed.data;
    const hasLocalDocuments = useDocuments && documents.hasDocuments();

    const outcome = await router.route({
      query,
      hasLocalDocuments,
      localRetriever: hasLocalDocuments ? documents : null
    });

    res.json(outcome);
  };
}
