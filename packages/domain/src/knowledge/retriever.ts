import type { KnowledgeStore } from "./store";
import { tokenize } from "./tokenize";

export type RetrievalResult = {
  documentId: string;
  score: number;
  /** Share of query tokens found in the document, 0..1. */
  coverage: number;
};

export type TermWeighting = "count" | "idf";

export type RetrieverOptions = {
  weighting?: TermWeighting;
};

type IndexedDocument = {
  id: string;
  tokens: ReadonlySet<string>;
};

export class KnowledgeRetriever {
  private readonly index: IndexedDocument[];
  private readonly documentFrequency = new Map<string, number>();
  private readonly weighting: TermWeighting;

  constructor(store: KnowledgeStore, options: RetrieverOptions = {}) {
    this.weighting = options.weighting ?? "count";
    this.index = store.documents.map((document) => ({
      id: document.id,
      tokens: tokenize([document.title ?? "", document.text, ...document.tags].join(" "))
    }));
    for (const entry of this.index) {
      for (const token of entry.tokens) {
        this.documentFrequency.set(token, (this.documentFrequency.get(token) ?? 0) + 1);
      }
    }
  }

  retrieve(query: string, k: number): RetrievalResult[] {
    if (k <= 0) return [];
    const queryTokens = tokenize(query);
    if (queryTokens.size === 0) return [];

    const scored: Array<RetrievalResult & { position: number }> = [];
    this.index.forEach((entry, position) => {
      let matched = 0;
      let score = 0;
      for (const token of queryTokens) {
        if (!entry.tokens.has(token)) continue;
        matched++;
        score += this.weight(token);
      }
      if (matched > 0) {
        scored.push({ documentId: entry.id, score, coverage: matched / queryTokens.size, position });
      }
    });

    return scored
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, k)
      .map(({ documentId, score, coverage }) => ({ documentId, score, coverage }));
  }

  private weight(token: string): number {
    if (this.weighting === "count") return 1;
    const df = this.documentFrequency.get(token) ?? 1;
    return Math.log(1 + this.index.length / df);
  }
}
