import type { Server } from "http";
import { afterEach, describe, it, expect } from "vitest";
import { z } from "zod";
import { createApp } from "../src/app";
import type { TestHarness } from "./helpers";
import { createHarness, makeLead, missedEvent } from "./helpers";

const LEAD_ID = "00000000-0000-4000-8000-000000000001";
const OTHER_ID = "00000000-0000-4000-8000-000000000002";
const PIN = { "x-dashboard-pin": "test-pin" };

const startedSchema = z.object({ ok: z.literal(true), jobId: z.string() }).passthrough();
const leadCreatedSchema = z.object({ ok: z.literal(true), lead: z.object({ id: z.string() }).passthrough() });

interface CallOptions {
  method?: "GET" | "POST" | "DELETE";
  headers?: Record<string, string>;
  body?: unknown;
}

describe("HTTP API", () => {
  let harness: TestHarness;
  let server: Server;
  let baseUrl: string;

  async function serve(env: Record<string, string> = { DASHBOARD_PIN: "test-pin", WEBHOOK_SECRET: "test-secret" }) {
    harness = createHarness([makeLead(), makeLead({ id: OTHER_ID, phone: "+15550000002" })], env);
    server = createApp(harness.services).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
    return harness;
  }

  async function call(path: string, options: CallOptions = {}): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${path}`, {
      method: options.method ?? "GET",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    return { status: response.status, body: await response.json() };
  }

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await harness.services.stop();
  });

  it("rejects webhook deliveries without the shared secret", async () => {
    await serve();
    const response = await call("/webhook/voice", { method: "POST", body: missedEvent(LEAD_ID) });
    expect(response).toEqual({ status: 401, body: { ok: false, error: "Invalid webhook secret" } });
    expect(harness.email.sent).toHaveLength(0);
  });

  it("acknowledges webhook events for unknown leads with 200", async () => {
    await serve();
    const unknown = "00000000-0000-4000-8000-00000000ffff";
    const response = await call("/webhook/voice", {
      method: "POST",
      headers: { "x-vapi-secret": "test-secret" },
      body: missedEvent(unknown),
    });
    expect(response).toEqual({
      status: 200,
      body: { ok: true, action: "ignored", reason: "unknown lead", leadId: unknown },
    });
  });

  it("runs a missed call through the webhook", async () => {
    await serve();
    const response = await call("/webhook/voice", {
      method: "POST",
      headers: { "x-vapi-secret": "test-secret" },
      body: missedEvent(LEAD_ID),
    });
    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ ok: true, action: "retry_scheduled", leadId: LEAD_ID, retryCount: 1 });
  });

  it("starts, reports and cancels a batch job", async () => {
    await serve();
    const started = await call("/batch/start", {
      method: "POST",
      headers: PIN,
      body: { leadIds: [LEAD_ID, OTHER_ID], parallelCalls: 1, intervalSeconds: 60 },
    });
    expect(started.status).toBe(200);
    const { jobId } = startedSchema.parse(started.body);
    expect(started.body).toMatchObject({ message: "Batch call job started", job: { totalLeads: 2, totalBatches: 2 } });

    const active = await call("/batch/status/active", { headers: PIN });
    expect(active).toMatchObject({ status: 200, body: { ok: true, job: { jobId, status: "running" } } });

    const cancelled = await call("/batch/cancel/active", { method: "POST", headers: PIN });
    expect(cancelled).toMatchObject({ status: 200, body: { ok: true, cancelled: true, job: { jobId, status: "cancelled" } } });

    const finished = await harness.services.batch.waitFor(jobId);
    expect(finished?.status).toBe("cancelled");
    expect(await call(`/batch/status/${jobId}`, { headers: PIN })).toMatchObject({
      status: 200,
      body: { job: { status: "cancelled" } },
    });
  });

  it("answers 404 for unknown jobs and leads", async () => {
    await serve();
    expect(await call("/batch/status/no-such-job", { headers: PIN })).toEqual({
      status: 404,
      body: { ok: false, error: "Batch job not found" },
    });
    const missing = "00000000-0000-4000-8000-00000000ffff";
    expect(await call(`/leads/${missing}`, { headers: PIN })).toEqual({
      status: 404,
      body: { ok: false, error: "Lead not found" },
    });
    expect(await call(`/leads/${missing}`, { method: "DELETE", headers: PIN })).toEqual({
      status: 404,
      body: { ok: false, error: "Lead not found" },
    });
  });

  it("validates request bodies", async () => {
    await serve();
    const response = await call("/batch/start", { method: "POST", headers: PIN, body: { leadIds: [] } });
    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ ok: false, error: "Invalid request body" });
    expect(response.body).toHaveProperty("details");
  });

  it("creates a lead and returns it with its conversation history", async () => {
    await serve();
    const created = await call("/leads", {
      method: "POST",
      headers: PIN,
      body: { phone: "+15550000003", displayName: "Ravi Kumar", email: "ravi@example.com" },
    });
    expect(created.status).toBe(201);
    const { lead } = leadCreatedSchema.parse(created.body);
    expect(created.body).toMatchObject({ lead: { phone: "+15550000003", callStatus: "pending", retryCount: 0 } });

    await harness.conversations.append({
      leadId: lead.id,
      channel: "email",
      direction: "in",
      timestamp: new Date("2026-03-02T10:00:00.000Z"),
      subject: "Re: Missed you",
      content: "Call me tomorrow",
      status: "received",
    });

    const fetched = await call(`/leads/${lead.id}`, { headers: PIN });
    expect(fetched).toMatchObject({
      status: 200,
      body: {
        ok: true,
        lead: { id: lead.id, displayName: "Ravi Kumar" },
        conversations: [
          { channel: "email", direction: "in", timestamp: "2026-03-02T10:00:00.000Z", content: "Call me tomorrow" },
        ],
      },
    });
  });

  it("guards dashboard routes with the PIN", async () => {
    await serve();
    expect(await call("/retry-config")).toEqual({ status: 401, body: { ok: false, error: "Invalid PIN" } });
    expect(await call("/retry-config", { headers: { "x-dashboard-pin": "wrong" } })).toEqual({
      status: 401,
      body: { ok: false, error: "Invalid PIN" },
    });
    expect((await call("/retry-config", { headers: PIN })).status).toBe(200);
  });

  it("refuses dashboard routes when no PIN is configured", async () => {
    await serve({});
    expect(await call(`/leads/${LEAD_ID}`, { headers: PIN })).toEqual({
      status: 500,
      body: { ok: false, error: "Server PIN not configured" },
    });
    expect((await call("/health")).status).toBe(200);
  });
});
