import { describe, expect, it } from "vitest";
import { sessionFromRow } from "../src";
import { TEST_NOW } from "./fixtures/harness";

const row = {
  sessionId: "s-1",
  history: [{ role: "user", content: "zdravo", at: "2026-03-01T08:00:00.000Z" }],
  draft: { step: "collect_slot", serviceId: "pregled" },
  createdAt: TEST_NOW,
  updatedAt: TEST_NOW
};

describe("sessionFromRow", () => {
  it("reads the stored history and draft", () => {
    expect(sessionFromRow(row)).toEqual({
      sessionId: "s-1",
      history: [{ role: "user", content: "zdravo", at: "2026-03-01T08:00:00.000Z" }],
      draft: { step: "collect_slot", serviceId: "pregled" },
      createdAt: TEST_NOW,
      updatedAt: TEST_NOW
    });
  });

  it("leaves the draft out when none is stored", () => {
    expect(sessionFromRow({ ...row, draft: null })).not.toHaveProperty("draft");
  });

  it("treats rows with a malformed draft or history as missing", () => {
    expect(sessionFromRow({ ...row, draft: { step: "booking" } })).toBeUndefined();
    expect(sessionFromRow({ ...row, history: [{ role: "system", content: "x" }] })).toBeUndefined();
  });
});
