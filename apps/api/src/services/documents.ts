import type { LocalDocument, LocalRetriever } from "../types/routing";

type StoredChunk = { sourceId: string; page?: string; index: number; text: string; tokens: Set<string> };

export function chunkText(text: string, maxLen = 900): string[] {
  const paras = text
    .split(/\n{2,}/g)
    .map((p) => p.trim())
    .filter(Boolean);

  const chunks: string[] = [];
  let buf = "";

  for (const p of paras) {
    const next = buf ? `${buf}\n\n${p}` : p;
    if (next.length > maxLen) {
      if (buf) chunks.push(buf);
      buf = p;
    } else {
      buf = next;
    }
  }
  if (buf) chunks.push(buf);

  // A single paragraph longer than maxLen is hard-split.
  return chunks.flatMap((c) => {
    if (c.length <= maxLen) return [c];
    const parts: string[] = [];
    for (let i = 0; i < c.length; i += maxLen) parts.push(c.slice(i, i + maxLen));
    return parts;
  });
}

export function normalizeTokens(s: string): string[] {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/g)
    .filter((t) => t.length >= 4);
}

/**
 * Share of distinct query tokens present in the chunk.
 */
function overlapScore(queryTokens: Set<string>, chunk: StoredChunk): number {
  if (queryTokens.size === 0) return 0;
  let hit = 0;
  for (const t of queryTokens) if (chunk.tokens.has(t)) hit += 1;
  return hit / queryTokens.size;
}

/**
 * In-memory uploaded-document store. Serves as the LocalRetriever for the
 * HTTP surface; library callers can plug in any other retriever.
 */
export class DocumentStore implements LocalRetriever {
  private chunks: StoredChunk[] = [];

  constructor(private opts: { topK?: number; maxChunkLen?: number } = {}) {}

  add(doc: { sourceId: string; content: string; page?: string }): number {
    this.remove(doc.sourceId);
    const parts = chunkText(doc.content, this.opts.maxChunkLen ?? 900);
    parts.forEach((text, index) => {
      this.chunks.push({
        sourceId: doc.sourceId,
        ...(doc.page ? { page: doc.page } : {}),
        index,
        text,
        tokens: new Set(normalizeTokens(text))
      });
    });
    return parts.length;
  }

  remove(sourceId: string): void {
    this.chunks = this.chunks.filter((c) => c.sourceId !== sourceId);
  }

  clear(): void {
    this.chunks = [];
  }

  hasDocuments(): boolean {
    return this.chunks.length > 0;
  }

  list(): Array<{ sourceId: string; chunks: number }> {
    const counts = new Map<string, number>();
    for (const c of this.chunks) counts.set(c.sourceId, (counts.get(c.sourceId) ?? 0) + 1);
    return [...counts.entries()].map(([sourceId, chunks]) => ({ sourceId, chunks }));
  }

  async getRelevantDocuments(query: string): Promise<LocalDocument[]> {
    const queryTokens = new Set(normalizeTokens(query));

    return this.chunks
      .map((chunk) => ({ chunk, score: overlapScore(queryTokens, chunk) }))
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.opts.topK ?? 4)
      .map(({ chunk }) => ({
        content: chunk.text,
        sourceId: chunk.sourceId,
        ...(chunk.page ? { page: chunk.page } : {}),
        chunk: String(chunk.index)
      }));
  }
}
