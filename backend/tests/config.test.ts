import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.leadStore).toBe("postgres");
    expect(config.port).toBe(4000);
    expect(config.retry).toEqual({ maxRetries: 3, intervals: [0.5, 24], unit: "hours" });
    expect(config.scheduler.callWindow).toBeNull();
    expect(config.scheduler.orchestratorIntervalMs).toBe(60_000);
    expect(config.batch).toEqual({ defaultParallelCalls: 5, defaultIntervalSeconds: 240, callTimeoutMs: 30_000 });
    expect(config.email.dryRun).toBe(true);
    expect(config.whatsapp.dryRun).toBe(false);
    expect(config.endedReasonKeywords.missed).toContain("no-answer");
    expect(config.dashboardPin).toBeNull();
  });

  it("parses retry ladders and keyword lists", () => {
    const config = loadConfig({
      RETRY_INTERVALS: "30, 60",
      RETRY_UNITS: "minutes",
      ENDED_REASON_MISSED_KEYWORDS: " Voicemail , BUSY ",
    });
    expect(config.retry.intervals).toEqual([30, 60]);
    expect(config.retry.unit).toBe("minutes");
    expect(config.endedReasonKeywords.missed).toEqual(["voicemail", "busy"]);
  });

  it("rejects a non-numeric retry ladder", () => {
    expect(() => loadConfig({ RETRY_INTERVALS: "soon,later" })).toThrow(ZodError);
  });

  it("builds a call window only when both bounds are set", () => {
    expect(loadConfig({ CALL_WINDOW_START: "09:00" }).scheduler.callWindow).toBeNull();
    expect(loadConfig({ CALL_WINDOW_START: "09:00", CALL_WINDOW_END: "18:00" }).scheduler.callWindow).toEqual({
      start: "09:00",
      end: "18:00",
      timezone: "Asia/Kolkata",
    });
  });

  it("reads boolean flags and trims the API base URL", () => {
    const config = loadConfig({ WHATSAPP_ENABLE_FALLBACK: "no", EMAIL_DRY_RUN: "0", VAPI_BASE_URL: "https://voice.test/" });
    expect(config.whatsapp.enableFallback).toBe(false);
    expect(config.email.dryRun).toBe(false);
    expect(config.vapi.baseUrl).toBe("https://voice.test");
  });

  it("keeps the inbound email poller off unless enabled", () => {
    expect(loadConfig({}).emailInbound).toEqual({
      enabled: false,
      intervalMs: 60_000,
      query: 'is:unread subject:"[Lead:"',
      maxResults: 20,
      autoReply: false,
    });
    const config = loadConfig({ EMAIL_INBOUND_ENABLED: "true", EMAIL_INBOUND_INTERVAL_SECONDS: "15", EMAIL_AUTO_REPLY_ENABLED: "yes" });
    expect(config.emailInbound).toMatchObject({ enabled: true, intervalMs: 15_000, autoReply: true });
  });
});
