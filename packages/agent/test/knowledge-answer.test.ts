import { describe, expect, it } from "vitest";
import { RoutingUnavailableError } from "@farmdesk/shared";
import { KnowledgeResponder, isGrounded } from "../src";
import { KnowledgeRetriever } from "@farmdesk/domain";
import { ScriptedOracle, TEST_BUSINESS, TEST_KNOWLEDGE, text } from "./fixtures/harness";

const SNIPPET = "Pregled stane 40 EUR, masaža stane 55 EUR.\nVeč: https://example.com/cenik";
const LOW_CONFIDENCE =
  "Na to vprašanje žal nimam zanesljivega odgovora. Za pomoč nas pokličite na 01 000 00 00 ali pišite na info@example.com.";

function responder(oracle: ScriptedOracle) {
  return new KnowledgeResponder(TEST_BUSINESS, TEST_KNOWLEDGE, new KnowledgeRetriever(TEST_KNOWLEDGE), oracle, {
    topK: 4,
    minCoverage: 0.25,
    timeoutMs: 200
  });
}

describe("KnowledgeResponder", () => {
  it("returns a synthesized answer that stays on the snippets", async () => {
    const oracle = new ScriptedOracle([text("Masaža stane 55 EUR.")]);

    await expect(responder(oracle).answer("Koliko stane masaža?")).resolves.toEqual({
      kind: "knowledge",
      reply: "Masaža stane 55 EUR.",
      sources: ["cenik"],
      synthesized: true
    });
  });

  it("falls back to the snippet when the answer shares nothing with it", async () => {
    const oracle = new ScriptedOracle([text("Pokličite nas.")]);

    await expect(responder(oracle).answer("Koliko stane masaža?")).resolves.toEqual({
      kind: "knowledge",
      reply: SNIPPET,
      sources: ["cenik"],
      synthesized: false
    });
  });

  it("falls back to the snippet when the oracle is unavailable", async () => {
    const oracle = new ScriptedOracle([new RoutingUnavailableError("down")]);

    const outcome = await responder(oracle).answer("Koliko stane masaža?");

    expect(outcome).toMatchObject({ kind: "knowledge", reply: SNIPPET, synthesized: false });
  });

  it("declines without calling the oracle when nothing overlaps", async () => {
    const oracle = new ScriptedOracle();

    const outcome = await responder(oracle).answer("Ali sprejemate otroke?");

    expect(outcome).toEqual({ kind: "fallback", reply: LOW_CONFIDENCE, reason: "low_confidence" });
    expect(oracle.requests).toHaveLength(0);
  });

  it("declines when the best match covers too little of the question", async () => {
    const oracle = new ScriptedOracle();

    const outcome = await responder(oracle).answer("Koliko stane zobna ščetka, pasta in nitka?");

    expect(outcome.kind).toBe("fallback");
    expect(oracle.requests).toHaveLength(0);
  });
});

describe("isGrounded", () => {
  it("needs a shared token", () => {
    const cenik = TEST_KNOWLEDGE.get("cenik");
    expect(cenik && isGrounded("Pregled stane 40 EUR", [cenik])).toBe(true);
    expect(cenik && isGrounded("Ne vem.", [cenik])).toBe(false);
  });
});
