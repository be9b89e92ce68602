import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "@farmdesk/shared";
import { normalizeText } from "@farmdesk/domain";

export const faqEntrySchema = z.object({
  id: z.string().min(1),
  patterns: z.array(z.array(z.string().min(2)).min(1)).min(1),
  answer: z.string().min(1)
});

export const faqFileSchema = z.array(faqEntrySchema);

export type FaqEntry = z.infer<typeof faqEntrySchema>;

export type FaqMatch = { id: string; answer: string };

export class StaticFaq {
  private readonly entries: FaqEntry[];

  constructor(entries: readonly FaqEntry[]) {
    this.entries = entries.map((entry) => ({
      ...entry,
      patterns: entry.patterns.map((pattern) => pattern.map(normalizeText))
    }));
  }

  static async fromFile(path: string): Promise<StaticFaq> {
    const fullPath = resolve(path);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(fullPath, "utf8"));
    } catch (error) {
      throw new ConfigError(`Cannot read FAQ from ${fullPath}`, { cause: error });
    }
    const parsed = faqFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid FAQ file ${fullPath}`, { cause: parsed.error });
    }
    return new StaticFaq(parsed.data);
  }

  match(message: string): FaqMatch | undefined {
    const words = normalizeText(message)
      .split(/[^a-z0-9]+/)
      .filter((word) => word.length > 0);
    const entry = this.entries.find((candidate) =>
      candidate.patterns.some((pattern) => pattern.every((stem) => words.some((word) => word.startsWith(stem))))
    );
    return entry ? { id: entry.id, answer: entry.answer } : undefined;
  }
}
