import type { Request, Response } from "express";
import { z } from "zod";
import type { DocumentStore } from "../services/documents";

const DocumentReqSchema = z.object({
  sourceId: z.string().min(1).max(300),
  content: z.string().min(1).max(2_000_000),
  page: z.string().max(50).optional()
});

export function addDocumentHandler(documents: DocumentStore) {
  return (req: Request, res: Response) => {
    const parsed = DocumentReqSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
      return;
    }

    const chunks = documents.add(parsed.data);
    res.status(201).json({ sourceId: parsed.data.sourceId, chunks });
  };
}

export function listDocumentsHandler(documents: DocumentStore) {
  return (_req: Request, res: Response) => {
    res.json({ documents: documents.list() });
  };
}

export function clearDocumentsHandler(documents: DocumentStore) {
  return (_req: Request, res: Response) => {
    documents.clear();
    res.status(204).end();
  };
}
