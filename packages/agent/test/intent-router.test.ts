import { describe, expect, it } from "vitest";
import type { ReservationDraft } from "@farmdesk/shared";
import { ADDRESS_ANSWER, createHarness, text, toolCall } from "./fixtures/harness";

const verifiedDraft: ReservationDraft = {
  step: "await_confirmation",
  serviceId: "pregled",
  date: "2026-03-10",
  time: "09:00",
  name: "Ana Kos",
  phone: "040 123 456",
  verified: { serviceId: "pregled", date: "2026-03-10", time: "09:00", resourceId: "ordinacija" }
};

describe("IntentRouter", () => {
  it("answers the address question from the FAQ without the oracle", async () => {
    const { router, oracle } = createHarness();

    const result = await router.route({ message: "Kje imate ordinacijo?", history: [], draft: undefined });

    expect(result.outcome).toEqual({ kind: "static_faq", reply: ADDRESS_ANSWER, faqId: "address" });
    expect(oracle.requests).toHaveLength(0);
  });

  it("reminds about an open draft after a FAQ answer", async () => {
    const { router } = createHarness();
    const draft: ReservationDraft = { step: "collect_slot", serviceId: "pregled" };

    const result = await router.route({ message: "Kje imate ordinacijo?", history: [], draft });

    expect(result.outcome.reply).toBe(
      `${ADDRESS_ANSWER}\n\nZa nadaljevanje rezervacije: Kateri dan in ob kateri uri bi želeli priti?`
    );
    expect(result.draft).toEqual(draft);
  });

  it("checks a fully specified slot without the oracle", async () => {
    const { router, oracle } = createHarness();

    const result = await router.route({ message: "Rad bi rezerviral pregled 10.3.2026 ob 9:00", history: [], draft: undefined });

    expect(result.outcome.kind).toBe("rule_based");
    expect(result.outcome.reply).toBe(
      "Termin 10. 3. 2026 ob 09:00 (Pregled) je prost. Prosim še za vaše ime in telefonsko številko ali e-naslov."
    );
    expect(result.draft?.step).toBe("collect_contact");
    expect(result.draft?.verified?.resourceId).toBe("ordinacija");
    expect(oracle.requests).toHaveLength(0);
  });

  it("reports a slot outside business hours and forgets it", async () => {
    const { router } = createHarness();

    const result = await router.route({ message: "Rezerviral bi pregled 10.3.2026 ob 13:00", history: [], draft: undefined });

    expect(result.outcome.kind === "rule_based" && result.outcome.availability?.reason).toBe("outside_business_hours");
    expect(result.outcome.reply.startsWith("Termin 10. 3. 2026 ob 13:00 je izven delovnega časa za Pregled.")).toBe(true);
    expect(result.draft).toEqual({ step: "collect_slot", serviceId: "pregled" });
  });

  it("collects contact details, then stores a pending reservation on confirmation", async () => {
    const { router, repo } = createHarness();
    const first = await router.route({ message: "Rad bi rezerviral pregled 10.3.2026 ob 9:00", history: [], draft: undefined });

    const second = await router.route({ message: "Sem Ana Kos, 040 123 456", history: [], draft: first.draft });
    expect(second.outcome.reply).toBe(
      'Povzetek: Pregled, 10. 3. 2026 ob 09:00, Ana Kos (040 123 456). Želite oddati to povpraševanje? Odgovorite z "da" ali "ne".'
    );

    const third = await router.route({ message: "Da", history: [], draft: second.draft, sessionId: "s-1" });
    expect(third.outcome.kind).toBe("reservation");
    expect(third.outcome.reply).toBe(
      "Hvala, vaše povpraševanje za Pregled 10. 3. 2026 ob 09:00 smo prejeli. Rezervacija čaka na potrditev, o odločitvi vas obvestimo."
    );
    expect(third.draft).toBeUndefined();

    const stored = await repo.list({});
    expect(stored).toHaveLength(1);
    expect(stored[0]?.status).toBe("pending");
    expect(stored[0]?.sessionId).toBe("s-1");
  });

  it("offers alternatives when the slot was taken before confirmation", async () => {
    const { router, reservations, repo } = createHarness();
    await reservations.create({ ...verifiedDraft, name: "Eva Horvat", phone: "041 999 888" });

    const result = await router.route({ message: "da", history: [], draft: verifiedDraft });

    expect(result.outcome.kind === "reservation" && result.outcome.reservationId).toBeUndefined();
    expect(result.outcome.reply.startsWith("Izbrani termin medtem ni več prost.")).toBe(true);
    expect(result.draft).toEqual({ step: "collect_slot", serviceId: "pregled", name: "Ana Kos", phone: "040 123 456" });
    expect(await repo.list({})).toHaveLength(1);
  });

  it("checks an availability question that carries no booking word", async () => {
    const { router, oracle } = createHarness();

    const result = await router.route({ message: "Ali je masaža 10.3.2026 ob 14:00 prosta?", history: [], draft: undefined });

    expect(result.outcome.kind).toBe("rule_based");
    expect(result.outcome.reply).toBe(
      "Termin 10. 3. 2026 ob 14:00 (Masaža) je prost. Prosim še za vaše ime in telefonsko številko ali e-naslov."
    );
    expect(result.draft?.verified?.serviceId).toBe("masaza");
    expect(oracle.requests).toHaveLength(0);
  });

  it("answers a price question about another service without touching the verified draft", async () => {
    const { router } = createHarness([text("Masaža stane 55 EUR.")]);
    const draft: ReservationDraft = {
      step: "collect_contact",
      serviceId: "pregled",
      date: "2026-03-10",
      time: "09:00",
      verified: { serviceId: "pregled", date: "2026-03-10", time: "09:00", resourceId: "ordinacija" }
    };

    const result = await router.route({ message: "Koliko stane masaža?", history: [], draft });

    expect(result.outcome.kind).toBe("knowledge");
    expect(result.outcome.reply).toBe(
      "Masaža stane 55 EUR.\n\nZa nadaljevanje rezervacije: Prosim še za vaše ime in telefonsko številko ali e-naslov."
    );
    expect(result.draft).toEqual(draft);
  });

  it("falls back to manual contact when the model claims a taken slot is booked", async () => {
    const claim = text("Termin je prost in rezerviran za vas.");
    const { router, reservations, repo } = createHarness([
      toolCall("c1", "check_availability", { service: "pregled", date: "2026-03-10", time: "09:00" }),
      claim,
      claim,
      claim
    ]);
    await reservations.create({ ...verifiedDraft, name: "Eva Horvat", phone: "041 999 888" });

    const result = await router.route({ message: "Bi se lahko naročil?", history: [], draft: undefined });

    expect(result.outcome.kind === "fallback" && result.outcome.reason).toBe("tool_misuse");
    expect(result.outcome.reply).not.toBe("Termin je prost in rezerviran za vas.");
    expect(await repo.list({})).toHaveLength(1);
  });

  it("does not carry a slot refused by the model's check into the next turn", async () => {
    const { router, reservations, repo } = createHarness([
      toolCall("c1", "check_availability", { service: "pregled", date: "2026-03-10", time: "09:00" }),
      text("Ob 09:00 je zasedeno. Kateri drug čas vam ustreza?"),
      text("Kateri dan in uro bi želeli?")
    ]);
    await reservations.create({ ...verifiedDraft, name: "Eva Horvat", phone: "041 999 888" });
    const draft: ReservationDraft = { step: "collect_service", name: "Ana Kos", phone: "040 123 456" };

    const refused = await router.route({ message: "Lahko ob devetih?", history: [], draft });
    expect(refused.draft).toEqual({ step: "collect_slot", serviceId: "pregled", name: "Ana Kos", phone: "040 123 456" });

    const next = await router.route({ message: "da", history: [], draft: refused.draft });
    expect(next.outcome.reply).toBe("Kateri dan in uro bi želeli?");
    expect(await repo.list({})).toHaveLength(1);
  });

  it("keeps the draft and writes nothing when the oracle times out", async () => {
    const { router, oracle, repo } = createHarness(["hang"], { timeoutMs: 20 });
    const draft: ReservationDraft = { step: "collect_slot", serviceId: "pregled" };

    const result = await router.route({ message: "Kaj pa kdaj drugič?", history: [], draft });

    expect(result.outcome).toEqual({
      kind: "fallback",
      reply: "Oprostite, trenutno ne morem obdelati vašega sporočila. Kateri dan in ob kateri uri bi želeli priti?",
      reason: "routing_unavailable"
    });
    expect(result.draft).toEqual(draft);
    expect(oracle.requests).toHaveLength(1);
    expect(await repo.list({})).toHaveLength(0);
  });

  it("declines off-corpus questions without calling the oracle", async () => {
    const { router, oracle } = createHarness();

    const result = await router.route({ message: "Ali sprejemate otroke?", history: [], draft: undefined });

    expect(result.outcome.kind === "fallback" && result.outcome.reason).toBe("low_confidence");
    expect(oracle.requests).toHaveLength(0);
  });

  it("drops the draft on cancel and on a refused summary", async () => {
    const { router } = createHarness();

    const cancelled = await router.route({ message: "Prekliči", history: [], draft: verifiedDraft });
    const refused = await router.route({ message: "Ne", history: [], draft: verifiedDraft });

    expect(cancelled.draft).toBeUndefined();
    expect(refused.draft).toBeUndefined();
    expect(refused.outcome.kind).toBe("rule_based");
  });

  it("asks for a message when the input is blank", async () => {
    const { router } = createHarness();

    const result = await router.route({ message: "   ", history: [], draft: undefined });

    expect(result.outcome.kind === "fallback" && result.outcome.reason).toBe("empty_message");
  });
});
