import { RoutingUnavailableError, createLogger } from "@farmdesk/shared";
import { tokenize } from "@farmdesk/domain";
import type { BusinessConfig, KnowledgeDocument, KnowledgeRetriever, KnowledgeStore } from "@farmdesk/domain";
import { invokeWithTimeout } from "../oracle/timeout";
import type { LlmOracle } from "../oracle/types";
import { KNOWLEDGE_PROMPT } from "../prompt/system-prompt";
import { formatSnippet, lowConfidence } from "./replies";
import type { RouteOutcome } from "./types";

export type KnowledgeResponderOptions = {
  topK: number;
  minCoverage: number;
  timeoutMs: number;
};

export function isGrounded(answer: string, documents: readonly KnowledgeDocument[]): boolean {
  const snippetTokens = new Set<string>();
  for (const document of documents) {
    for (const token of tokenize(`${document.title ?? ""} ${document.text}`)) snippetTokens.add(token);
  }
  for (const token of tokenize(answer)) {
    if (snippetTokens.has(token)) return true;
  }
  return false;
}

function snippetContext(documents: readonly KnowledgeDocument[]): string {
  return documents
    .map((document, index) => `[${index + 1}] ${document.title ? `${document.title}: ` : ""}${document.text}`)
    .join("\n");
}

export class KnowledgeResponder {
  private readonly logger = createLogger({ module: "knowledge-responder" });

  constructor(
    private readonly business: BusinessConfig,
    private readonly store: KnowledgeStore,
    private readonly retriever: KnowledgeRetriever,
    private readonly oracle: LlmOracle,
    private readonly options: KnowledgeResponderOptions
  ) {}

  async answer(question: string): Promise<RouteOutcome> {
    const results = this.retriever.retrieve(question, this.options.topK);
    const top = results[0];
    if (!top || top.coverage < this.options.minCoverage) {
      this.logger.info({ coverage: top?.coverage ?? 0 }, "knowledge below coverage threshold");
      return { kind: "fallback", reply: lowConfidence(this.business), reason: "low_confidence" };
    }

    const documents = results.flatMap((result) => {
      const document = this.store.get(result.documentId);
      return document ? [document] : [];
    });
    const sources = documents.map((document) => document.id);
    const best = documents[0];
    if (!best) {
      return { kind: "fallback", reply: lowConfidence(this.business), reason: "low_confidence" };
    }

    try {
      const response = await invokeWithTimeout(
        this.oracle,
        {
          messages: [
            { type: "message", role: "system", content: `${KNOWLEDGE_PROMPT}\n\nSnippets:\n${snippetContext(documents)}` },
            { type: "message", role: "user", content: question }
          ],
          tools: []
        },
        this.options.timeoutMs
      );
      if (response.type === "text" && response.text.trim() && isGrounded(response.text, documents)) {
        return { kind: "knowledge", reply: response.text.trim(), sources, synthesized: true };
      }
      this.logger.warn({ sources, responseType: response.type }, "synthesized answer rejected, using snippet");
    } catch (error) {
      if (!(error instanceof RoutingUnavailableError)) throw error;
      this.logger.warn({ err: error }, "knowledge synthesis unavailable, using snippet");
    }

    return { kind: "knowledge", reply: formatSnippet(best), sources, synthesized: false };
  }
}
