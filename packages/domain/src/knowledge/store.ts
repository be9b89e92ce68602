import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError, createLogger } from "@farmdesk/shared";

export type KnowledgeDocument = Readonly<{
  id: string;
  text: string;
  title?: string;
  url?: string;
  tags: readonly string[];
}>;

export type KnowledgeDocumentInput = {
  id: string;
  text: string;
  title?: string;
  url?: string;
  tags?: readonly string[];
};

const corpusRecordSchema = z
  .object({
    id: z.string().min(1).optional(),
    title: z.string().optional(),
    url: z.string().optional(),
    text: z.string().optional(),
    content: z.string().optional(),
    tags: z.array(z.string()).default([])
  })
  .refine((record) => (record.text ?? record.content ?? "").trim().length > 0, {
    message: "text or content is required"
  });

const logger = createLogger({ module: "knowledge-store" });

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n+/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export class KnowledgeStore {
  private readonly byId: ReadonlyMap<string, KnowledgeDocument>;

  private constructor(readonly documents: readonly KnowledgeDocument[]) {
    this.byId = new Map(documents.map((document) => [document.id, document]));
  }

  static fromDocuments(inputs: readonly KnowledgeDocumentInput[]): KnowledgeStore {
    const seen = new Set<string>();
    const documents = inputs.map((input) => {
      if (seen.has(input.id)) {
        throw new ConfigError(`Duplicate knowledge document id ${input.id}`);
      }
      seen.add(input.id);
      return Object.freeze({
        id: input.id,
        text: input.text,
        ...(input.title ? { title: input.title } : {}),
        ...(input.url ? { url: input.url } : {}),
        tags: Object.freeze([...(input.tags ?? [])])
      });
    });
    return new KnowledgeStore(Object.freeze(documents));
  }

  static parse(corpus: string, source = "inline"): KnowledgeStore {
    const inputs: KnowledgeDocumentInput[] = [];
    const seen = new Set<string>();

    corpus.split(/\r?\n/).forEach((line, index) => {
      const lineNumber = index + 1;
      if (line.trim().length === 0) return;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (error) {
        logger.warn({ source, lineNumber, err: error }, "skipping unparseable corpus line");
        return;
      }
      const record = corpusRecordSchema.safeParse(json);
      if (!record.success) {
        logger.warn({ source, lineNumber, issues: record.error.issues.map((issue) => issue.message) }, "skipping invalid corpus record");
        return;
      }

      const baseId = record.data.id ?? `doc-${lineNumber}`;
      const paragraphs = splitParagraphs(record.data.text ?? record.data.content ?? "");
      paragraphs.forEach((paragraph, position) => {
        const id = paragraphs.length === 1 ? baseId : `${baseId}#${position + 1}`;
        if (seen.has(id)) {
          logger.warn({ source, lineNumber, id }, "skipping duplicate document id");
          return;
        }
        seen.add(id);
        inputs.push({
          id,
          text: paragraph,
          tags: record.data.tags,
          ...(record.data.title ? { title: record.data.title } : {}),
          ...(record.data.url ? { url: record.data.url } : {})
        });
      });
    });

    logger.info({ source, documents: inputs.length }, "knowledge corpus loaded");
    return KnowledgeStore.fromDocuments(inputs);
  }

  static async fromFile(path: string): Promise<KnowledgeStore> {
    const fullPath = resolve(path);
    let corpus: string;
    try {
      corpus = await readFile(fullPath, "utf8");
    } catch (error) {
      throw new ConfigError(`Cannot read knowledge corpus from ${fullPath}`, { cause: error });
    }
    return KnowledgeStore.parse(corpus, fullPath);
  }

  get size(): number {
    return this.documents.length;
  }

  get(id: string): KnowledgeDocument | undefined {
    return this.byId.get(id);
  }
}
