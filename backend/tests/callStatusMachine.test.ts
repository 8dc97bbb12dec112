import { afterEach, describe, it, expect, vi } from "vitest";
import { flattenStructuredFields } from "../src/callStatusMachine";
import type { SSEEvent } from "../src/eventBus";
import type { TestHarness } from "./helpers";
import { createHarness, makeLead, missedEvent } from "./helpers";

const LEAD_ID = "00000000-0000-4000-8000-000000000001";
const now = new Date("2026-03-02T10:00:00.000Z");

function endedEvent(endedReason: string, answeredAt?: string) {
  return {
    message: { type: "status-update", status: "ended", endedReason },
    call: { id: "call-abc", answeredAt, metadata: { lead_uuid: LEAD_ID } },
  };
}

describe("CallStatusMachine", () => {
  let harness: TestHarness;

  function setup(overrides: Parameters<typeof makeLead>[0] = {}, env: Record<string, string> = {}) {
    harness = createHarness([makeLead(overrides)], env, { clock: () => now });
    return harness;
  }

  afterEach(async () => {
    await harness.services.stop();
  });

  it("schedules a retry and sends the missed-call email once across replays", async () => {
    const { services, store, conversations, email } = setup();

    const first = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(first).toEqual({
      action: "retry_scheduled",
      leadId: LEAD_ID,
      retryCount: 1,
      nextRetryAt: "2026-03-02T10:30:00.000Z",
    });

    const second = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(second).toEqual({
      action: "retry_scheduled",
      leadId: LEAD_ID,
      retryCount: 2,
      nextRetryAt: "2026-03-03T10:00:00.000Z",
    });

    expect(email.sent).toHaveLength(1);
    expect(email.sent[0]).toEqual({
      to: "asha@example.com",
      subject: `Missed Call Follow-Up Email [Lead:${LEAD_ID}]`,
      body: expect.stringContaining("Hi Asha,"),
      headers: { "X-Lead-UUID": LEAD_ID },
    });
    const entries = await conversations.listByLead(LEAD_ID);
    expect(entries.filter((entry) => entry.channel === "email")).toHaveLength(1);

    const lead = await store.getById(LEAD_ID);
    expect(lead?.emailSent).toBe(true);
    expect(lead?.callStatus).toBe("missed");
    expect(lead?.lastTerminalReason).toBe("missed");
  });

  it("keeps the emailSent flag through a transient store error so a redelivery sends nothing", async () => {
    const { services, store, email, conversations } = setup();
    vi.spyOn(store, "updateFields").mockRejectedValueOnce(new Error("429 rate limited"));

    const first = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(first).toMatchObject({ action: "retry_scheduled", retryCount: 1 });
    expect((await store.getById(LEAD_ID))?.emailSent).toBe(true);

    const replay = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(replay).toMatchObject({ action: "retry_scheduled", retryCount: 2 });
    expect(email.sent).toHaveLength(1);
    expect((await conversations.listByLead(LEAD_ID)).filter((entry) => entry.channel === "email")).toHaveLength(1);
  });

  it("still books the retry when the missed-call email cannot be recorded", async () => {
    const { services, store, conversations } = setup();
    vi.spyOn(conversations, "append").mockRejectedValue(new Error("sheet unavailable"));

    const outcome = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(outcome).toMatchObject({ action: "retry_scheduled", retryCount: 1 });
    const lead = await store.getById(LEAD_ID);
    expect(lead?.callStatus).toBe("missed");
    expect(lead?.retryCount).toBe(1);
  });

  it("spends the last retry and runs the fallback exactly once", async () => {
    const { services, store, whatsapp, email } = setup({ retryCount: 2, callStatus: "initiated" });

    const outcome = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(outcome).toEqual({
      action: "fallback_triggered",
      leadId: LEAD_ID,
      retryCount: 3,
      fallback: { whatsapp: "sent", email: "skipped" },
    });

    const lead = await store.getById(LEAD_ID);
    expect(lead?.retryCount).toBe(3);
    expect(lead?.nextRetryAt).toBeNull();
    expect(lead?.whatsappSent).toBe(true);
    expect(whatsapp.sent).toEqual([
      { to: "+15550000001", template: "missed_call_template", language: "en", params: ["Asha"] },
    ]);

    const replay = await services.machine.handleEvent(missedEvent(LEAD_ID));
    expect(replay).toEqual({
      action: "fallback_triggered",
      leadId: LEAD_ID,
      retryCount: 3,
      fallback: { whatsapp: "skipped", email: "skipped" },
    });
    expect(whatsapp.sent).toHaveLength(1);
    expect(email.sent).toHaveLength(1);
    expect((await store.getById(LEAD_ID))?.retryCount).toBe(3);
  });

  it("marks a lead answered", async () => {
    const { services, store } = setup({ callStatus: "initiated" });
    const outcome = await services.machine.handleEvent(missedEvent(LEAD_ID, "answered"));
    expect(outcome).toEqual({ action: "answered", leadId: LEAD_ID });
    expect((await store.getById(LEAD_ID))?.callStatus).toBe("answered");
  });

  it("routes an ended call that never connected through the missed path", async () => {
    const { services, store } = setup({ callStatus: "initiated" });
    const outcome = await services.machine.handleEvent(endedEvent("customer-ended-call"));
    expect(outcome).toMatchObject({ action: "retry_scheduled", retryCount: 1 });
    expect((await store.getById(LEAD_ID))?.lastTerminalReason).toBe("customer-ended-call");
  });

  it("routes an answered call that ended with no-answer through the missed path", async () => {
    const { services } = setup({ callStatus: "initiated" });
    const outcome = await services.machine.handleEvent(endedEvent("no-answer", "2026-03-02T09:59:00Z"));
    expect(outcome).toMatchObject({ action: "retry_scheduled", retryCount: 1 });
  });

  it("completes an answered call with a neutral reason", async () => {
    const { services, store, email } = setup({ callStatus: "answered" });
    const outcome = await services.machine.handleEvent(endedEvent("customer-ended-call", "2026-03-02T09:59:00Z"));
    expect(outcome).toEqual({ action: "completed", leadId: LEAD_ID });

    const lead = await store.getById(LEAD_ID);
    expect(lead?.callStatus).toBe("completed");
    expect(lead?.lastTerminalReason).toBe("customer-ended-call");
    expect(email.sent).toHaveLength(0);
  });

  it("ignores events it cannot attribute", async () => {
    const { services, store } = setup();
    expect(await services.machine.handleEvent("not json")).toEqual({ action: "ignored", reason: "malformed payload" });
    expect(await services.machine.handleEvent({ message: { type: "status-update", status: "missed" } })).toEqual({
      action: "ignored",
      reason: "missing lead_uuid",
    });
    expect(await services.machine.handleEvent(missedEvent("00000000-0000-4000-8000-00000000ffff"))).toEqual({
      action: "ignored",
      reason: "unknown lead",
      leadId: "00000000-0000-4000-8000-00000000ffff",
    });
    expect(
      await services.machine.handleEvent({ message: { type: "transcript" }, call: { metadata: { lead_uuid: LEAD_ID } } })
    ).toEqual({ action: "ignored", reason: "unhandled event type: transcript", leadId: LEAD_ID });
    expect((await store.getById(LEAD_ID))?.callStatus).toBe("pending");
  });

  it("stores the call report and schedules a requested callback", async () => {
    const { services, store, conversations, events } = setup({ callStatus: "answered" });
    const published: SSEEvent[] = [];
    events.on("event", (event: SSEEvent) => published.push(event));

    const outcome = await services.machine.handleEvent({
      message: {
        type: "end-of-call-report",
        endedReason: "customer-ended-call",
        durationSeconds: 95,
        analysis: {
          summary: "Interested in an MBA. Asked us to call me back tomorrow at 3pm.",
          successEvaluation: true,
          structuredData: { preferredCountry: "Canada", intake: { year: 2027, term: "Fall" }, courses: ["MBA", "MSc"] },
        },
        artifact: { transcript: "AI: Hello\nUser: Hi", recordingUrl: "https://recordings.test/call-abc.mp3" },
      },
      call: { id: "call-abc", metadata: { lead_uuid: LEAD_ID } },
    });

    const expectedCallback = new Date(now);
    expectedCallback.setDate(expectedCallback.getDate() + 1);
    expectedCallback.setHours(15, 0, 0, 0);

    expect(outcome).toEqual({
      action: "report_processed",
      leadId: LEAD_ID,
      callbackAt: expectedCallback.toISOString(),
      followUp: "skipped",
    });

    const lead = await store.getById(LEAD_ID);
    expect(lead?.callStatus).toBe("callback_scheduled");
    expect(lead?.callbackRequestedAt?.toISOString()).toBe(expectedCallback.toISOString());
    expect(lead?.summary).toBe("Interested in an MBA. Asked us to call me back tomorrow at 3pm.");
    expect(lead?.qualification).toBe("true");
    expect(lead?.transcript).toBe("AI: Hello\nUser: Hi");
    expect(lead?.callDurationSeconds).toBe(95);
    expect(lead?.recordingUrl).toBe("https://recordings.test/call-abc.mp3");
    expect(lead?.externalCallId).toBe("call-abc");
    expect(lead?.extra).toEqual({
      preferred_country: "Canada",
      intake_year: "2027",
      intake_term: "Fall",
      courses: "MBA, MSc",
    });

    const entries = await conversations.listByLead(LEAD_ID);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ channel: "call", subject: "Voice call", status: "completed", messageId: "call-abc" });

    expect(services.callbacks.pendingLeadIds()).toEqual([LEAD_ID]);
    expect(published.map((event) => event.type)).toEqual(["LEAD_UPDATED", "CALLBACK_SCHEDULED"]);
  });

  it("fetches the transcript from the gateway and sends the follow-up email", async () => {
    const { services, store, voice, email } = setup({ callStatus: "answered" }, { FOLLOWUP_EMAIL_ENABLED: "true" });
    voice.transcripts.set("call-abc", "AI: Hi there");

    const outcome = await services.machine.handleEvent({
      message: { type: "end-of-call-report", analysis: { summary: "Wants brochures for Germany." } },
      call: { id: "call-abc", metadata: { lead_uuid: LEAD_ID } },
    });

    expect(outcome).toEqual({ action: "report_processed", leadId: LEAD_ID, callbackAt: null, followUp: "sent" });
    const lead = await store.getById(LEAD_ID);
    expect(lead?.callStatus).toBe("completed");
    expect(lead?.transcript).toBe("AI: Hi there");
    expect(lead?.followUpSent).toBe(true);
    expect(email.sent[0].subject).toBe(`Thanks for speaking with us [Lead:${LEAD_ID}]`);
    expect(email.sent[0].body).toBe(
      "Hi Asha,\n\nThanks for taking the time to speak with us today.\n\nHere's a quick recap of what we discussed:\nWants brochures for Germany.\n\nReply to this email if you have any questions.\n\nThanks!"
    );
  });
});

describe("flattenStructuredFields", () => {
  it("snake-cases keys and skips empty values", () => {
    expect(flattenStructuredFields({ budgetRange: "20-30k", notes: null, tags: [], score: 7 })).toEqual({
      budget_range: "20-30k",
      score: "7",
    });
  });
});
