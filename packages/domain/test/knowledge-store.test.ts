import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ConfigError } from "@farmdesk/shared";
import { KnowledgeStore } from "../src";

describe("KnowledgeStore.parse", () => {
  it("reads one document per line and splits paragraphs", () => {
    const store = KnowledgeStore.parse(
      [
        JSON.stringify({ id: "a", title: "Naslov", url: "https://example.com/a", text: "Prvi odstavek." }),
        "",
        JSON.stringify({ id: "b", content: "Ena.\n\nDve.", tags: ["cenik"] })
      ].join("\n")
    );

    expect(store.documents.map((document) => document.id)).toEqual(["a", "b#1", "b#2"]);
    expect(store.get("a")).toEqual({ id: "a", text: "Prvi odstavek.", title: "Naslov", url: "https://example.com/a", tags: [] });
    expect(store.get("b#2")).toEqual({ id: "b#2", text: "Dve.", tags: ["cenik"] });
  });

  it("skips unparseable and empty records and names anonymous ones by line", () => {
    const store = KnowledgeStore.parse(
      ["{not json", JSON.stringify({ id: "empty", text: "   " }), JSON.stringify({ text: "Brez oznake." })].join("\n")
    );

    expect(store.documents.map((document) => document.id)).toEqual(["doc-3"]);
  });

  it("keeps the first of two records with the same id", () => {
    const store = KnowledgeStore.parse(
      [JSON.stringify({ id: "x", text: "Prvi." }), JSON.stringify({ id: "x", text: "Drugi." })].join("\n")
    );

    expect(store.size).toBe(1);
    expect(store.get("x")?.text).toBe("Prvi.");
  });

  it("freezes loaded documents", () => {
    const store = KnowledgeStore.parse(JSON.stringify({ id: "a", text: "Besedilo." }));
    const document = store.get("a");

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(store.documents)).toBe(true);
  });
});

describe("KnowledgeStore.fromFile", () => {
  it("loads a corpus file", async () => {
    const store = await KnowledgeStore.fromFile(fileURLToPath(new URL("./fixtures/knowledge.jsonl", import.meta.url)));

    expect(store.documents.map((document) => document.id)).toEqual(["lokacija", "cenik#1", "cenik#2", "doc-3"]);
    expect(store.get("cenik#2")?.title).toBe("Cenik");
  });

  it("fails with a configuration error when the file is missing", async () => {
    await expect(KnowledgeStore.fromFile("/nonexistent/knowledge.jsonl")).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("KnowledgeStore.fromDocuments", () => {
  it("rejects duplicate ids", () => {
    expect(() =>
      KnowledgeStore.fromDocuments([
        { id: "a", text: "Ena." },
        { id: "a", text: "Dve." }
      ])
    ).toThrow(ConfigError);
  });
});
