import { afterEach, describe, it, expect, vi } from "vitest";
import { EMAIL_INBOUND_JOB } from "../src/container";
import { addressOf, leadTagFromSubject, replySubject } from "../src/emailInboundPoller";
import { extractEmailBody, GmailEmailClient } from "../src/gateways/gmailEmailClient";
import type { TestHarness } from "./helpers";
import { createHarness, makeLead, silentLogger } from "./helpers";

const LEAD_ID = "00000000-0000-4000-8000-000000000001";
const OTHER_ID = "00000000-0000-4000-8000-000000000002";
const now = new Date("2026-03-02T10:00:00.000Z");

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function encode(text: string): string {
  return Buffer.from(text).toString("base64url");
}

function gmailMessage(id: string, headers: Record<string, string>, body: string) {
  return {
    id,
    threadId: `thread-${id}`,
    snippet: body.slice(0, 20),
    payload: {
      mimeType: "text/plain",
      headers: Object.entries(headers).map(([name, value]) => ({ name, value })),
      body: { data: encode(body) },
    },
  };
}

const fromHeader = {
  id: "m1",
  message: gmailMessage(
    "m1",
    {
      From: "Asha Rao <asha@example.com>",
      Subject: `Re: Missed Call Follow-Up Email [Lead:${LEAD_ID}]`,
      "X-Lead-UUID": LEAD_ID,
      "Message-ID": "<reply-1@mail.test>",
      "In-Reply-To": "<orig-1@mail.test>",
      References: "<orig-1@mail.test>",
    },
    "Please call me tomorrow"
  ),
};

const fromTag = {
  id: "m2",
  message: {
    id: "m2",
    threadId: "thread-m2",
    snippet: "",
    payload: {
      mimeType: "multipart/alternative",
      headers: [
        { name: "from", value: "ravi@example.com" },
        { name: "subject", value: `Re: Hello [Lead:${OTHER_ID}]` },
        { name: "in-reply-to", value: "<orig-2@mail.test>" },
      ],
      parts: [
        { mimeType: "text/html", body: { data: encode("<p>Budget is fine</p>") } },
        { mimeType: "text/plain", body: { data: encode("Budget is fine") } },
      ],
    },
  },
};

const fromSender = {
  id: "m3",
  message: gmailMessage(
    "m3",
    { From: "Ravi Kumar <RAVI@example.com>", Subject: "Re: Hello [Lead:gone-lead]", References: "<orig-3@mail.test>" },
    "Still interested"
  ),
};

const notAReply = {
  id: "m4",
  message: gmailMessage("m4", { From: "asha@example.com", Subject: `Question [Lead:${LEAD_ID}]` }, "New thread"),
};

const stranger = {
  id: "m5",
  message: gmailMessage(
    "m5",
    { From: "stranger@example.com", Subject: "Re: Hi [Lead:not-a-lead]", "In-Reply-To": "<orig-5@mail.test>" },
    "Who is this?"
  ),
};

function gmailStub(mailbox: Array<{ id: string; message: unknown }>) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.includes("/users/me/messages?")) {
      return jsonResponse({ messages: mailbox.map(({ id }) => ({ id, threadId: `thread-${id}` })) });
    }
    const modify = /\/users\/me\/messages\/([^/]+)\/modify$/.exec(url);
    if (modify) {
      return jsonResponse({ id: modify[1], labelIds: ["INBOX"] });
    }
    const found = mailbox.find(({ id }) => url.endsWith(`/users/me/messages/${id}`));
    return found ? jsonResponse(found.message) : jsonResponse({ error: { message: "Not Found" } }, 404);
  });
}

function markedRead(fetchImpl: ReturnType<typeof gmailStub>): string[] {
  return fetchImpl.mock.calls
    .map(([input]) => String(input))
    .filter((url) => url.endsWith("/modify"))
    .map((url) => url.replace("https://gmail.googleapis.com/gmail/v1/users/me/messages/", ""));
}

describe("EmailInboundPoller", () => {
  let harness: TestHarness;

  function setup(mailbox: Array<{ id: string; message: unknown }>, env: Record<string, string> = {}) {
    const fetchImpl = gmailStub(mailbox);
    const inbox = new GmailEmailClient(
      { accessToken: "test-token", from: "team@example.com", replyTo: null, dryRun: false, fetchImpl },
      silentLogger
    );
    harness = createHarness(
      [makeLead(), makeLead({ id: OTHER_ID, displayName: "Ravi Kumar", email: "ravi@example.com", phone: "+15550000002" })],
      env,
      { inbox, clock: () => now }
    );
    return { ...harness, fetchImpl };
  }

  afterEach(async () => {
    await harness.services.stop();
  });

  it("logs replies matched by header, subject tag and sender address", async () => {
    const { services, conversations, email, fetchImpl } = setup([fromHeader, fromTag, fromSender, notAReply, stranger]);

    const summary = await services.inbound.poll();
    expect(summary).toEqual({ fetched: 5, processed: 3, skipped: 1, unmatched: 1, replied: 0, errors: 0 });

    const listUrl = new URL(String(fetchImpl.mock.calls[0][0]));
    expect(listUrl.pathname).toBe("/gmail/v1/users/me/messages");
    expect(listUrl.searchParams.get("q")).toBe('is:unread subject:"[Lead:"');
    expect(listUrl.searchParams.get("maxResults")).toBe("20");

    expect(await conversations.listByLead(LEAD_ID)).toEqual([
      {
        leadId: LEAD_ID,
        channel: "email",
        direction: "in",
        timestamp: now,
        subject: `Re: Missed Call Follow-Up Email [Lead:${LEAD_ID}]`,
        content: "Please call me tomorrow",
        status: "received",
        messageId: "<reply-1@mail.test>",
        metadata: { from: "Asha Rao <asha@example.com>", gmailId: "m1", threadId: "thread-m1" },
      },
    ]);
    const other = await conversations.listByLead(OTHER_ID);
    expect(other.map((entry) => [entry.content, entry.messageId])).toEqual([
      ["Budget is fine", "m2"],
      ["Still interested", "m3"],
    ]);

    expect(markedRead(fetchImpl)).toEqual(["m1/modify", "m2/modify", "m3/modify"]);
    const modifyCall = fetchImpl.mock.calls.find(([input]) => String(input).endsWith("/m1/modify"));
    expect(modifyCall?.[1]?.method).toBe("POST");
    expect(JSON.parse(String(modifyCall?.[1]?.body))).toEqual({ removeLabelIds: ["UNREAD"] });
    expect(email.sent).toHaveLength(0);
  });

  it("answers in the same thread when auto-reply is on", async () => {
    const { services, conversations, email } = setup([fromHeader], { EMAIL_AUTO_REPLY_ENABLED: "true" });

    expect(await services.inbound.poll()).toMatchObject({ processed: 1, replied: 1 });
    expect(email.sent).toEqual([
      {
        to: "asha@example.com",
        subject: `Re: Missed Call Follow-Up Email [Lead:${LEAD_ID}]`,
        body: expect.stringContaining("Hi Asha,\n\nThanks for your message!"),
        headers: {
          "X-Lead-UUID": LEAD_ID,
          "In-Reply-To": "<reply-1@mail.test>",
          References: "<orig-1@mail.test> <reply-1@mail.test>",
        },
        threadId: "thread-m1",
      },
    ]);

    const entries = await conversations.listByLead(LEAD_ID);
    expect(entries.map((entry) => [entry.direction, entry.status, entry.messageId])).toEqual([
      ["in", "received", "<reply-1@mail.test>"],
      ["out", "sent", "email-1"],
    ]);
    expect(entries[1].metadata).toEqual({ kind: "auto_reply", generated: false });
  });

  it("leaves a message unread when it cannot be logged", async () => {
    const { services, conversations, fetchImpl } = setup([fromHeader]);
    vi.spyOn(conversations, "append").mockRejectedValue(new Error("database unavailable"));

    expect(await services.inbound.poll()).toMatchObject({ fetched: 1, processed: 0, errors: 1 });
    expect(markedRead(fetchImpl)).toEqual([]);
  });

  it("surfaces Gmail errors from the search", async () => {
    const { services } = setup([]);
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("invalid_grant", { status: 401 }));
    const inbox = new GmailEmailClient(
      { accessToken: "test-token", from: null, replyTo: null, dryRun: false, fetchImpl },
      silentLogger
    );
    await expect(inbox.listUnread("is:unread", 5)).rejects.toThrow("HTTP 401: invalid_grant");
    expect(services.jobs.status().map((job) => job.name)).not.toContain(EMAIL_INBOUND_JOB);
  });

  it("registers the periodic poll only when enabled", async () => {
    const { services } = setup([], { EMAIL_INBOUND_ENABLED: "true", EMAIL_INBOUND_INTERVAL_SECONDS: "30" });
    expect(services.jobs.status().find((job) => job.name === EMAIL_INBOUND_JOB)).toMatchObject({ intervalMs: 30_000 });
  });
});

describe("inbound email helpers", () => {
  it("reads the lead tag from a subject", () => {
    expect(leadTagFromSubject(`Re: Missed you [Lead:${LEAD_ID}]`)).toBe(LEAD_ID);
    expect(leadTagFromSubject("Re: Missed you [lead: abc ]")).toBe("abc");
    expect(leadTagFromSubject("Re: Missed you")).toBeNull();
  });

  it("extracts bare sender addresses", () => {
    expect(addressOf("Asha Rao <Asha@Example.com>")).toBe("asha@example.com");
    expect(addressOf(" ravi@example.com ")).toBe("ravi@example.com");
  });

  it("prefixes a single Re:", () => {
    expect(replySubject("RE: Missed you")).toBe("Re: Missed you");
    expect(replySubject("Missed you")).toBe("Re: Missed you");
  });

  it("finds plain text in nested parts and falls back to the snippet", () => {
    expect(
      extractEmailBody({
        id: "x",
        payload: {
          mimeType: "multipart/mixed",
          parts: [{ mimeType: "multipart/alternative", parts: [{ mimeType: "text/plain", body: { data: encode("nested") } }] }],
        },
      })
    ).toBe("nested");
    expect(extractEmailBody({ id: "y", snippet: "just the snippet" })).toBe("just the snippet");
  });
});
