// backend/src/callStatusMachine.ts
// Drives lead status from the voice platform's asynchronous webhook events

import { z } from "zod";
import type { CallbackScheduler } from "./callbackScheduler";
import { detectCallbackIntent, parseCallbackTime } from "./callbackTime";
import type { EndedReasonKeywords } from "./endedReason";
import { classifyEndedCall } from "./endedReason";
import type { EventBus } from "./eventBus";
import type { ChannelOutcome, FallbackResult, FallbackSequencer } from "./fallbackSequencer";
import type { VoiceGateway } from "./gateways/types";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { ConversationLog, LeadRepository } from "./repository/types";
import type { RetryPolicy } from "./retryPolicy";
import type { Lead, LeadUpdate, StructuredFields } from "./types/lead";
import type { RetryOptions } from "./withRetry";
import { withRetry } from "./withRetry";

const metadataSchema = z.object({ lead_uuid: z.string().optional() }).passthrough();

const callSchema = z
  .object({
    id: z.string().optional(),
    answeredAt: z.string().nullish(),
    connectedAt: z.string().nullish(),
    metadata: metadataSchema.nullish(),
  })
  .passthrough();

export const webhookPayloadSchema = z
  .object({
    message: z
      .object({
        type: z.string(),
        status: z.string().optional(),
        endedReason: z.string().nullish(),
        call: callSchema.nullish(),
        analysis: z
          .object({
            summary: z.string().nullish(),
            successEvaluation: z.union([z.string(), z.number(), z.boolean()]).nullish(),
            structuredData: z.record(z.unknown()).nullish(),
          })
          .passthrough()
          .nullish(),
        artifact: z
          .object({ transcript: z.string().nullish(), recordingUrl: z.string().nullish() })
          .passthrough()
          .nullish(),
        durationSeconds: z.number().nullish(),
        recordingUrl: z.string().nullish(),
        summary: z.string().nullish(),
      })
      .passthrough(),
    call: callSchema.nullish(),
  })
  .passthrough();

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;
type WebhookMessage = WebhookPayload["message"];
type WebhookCall = z.infer<typeof callSchema>;

export type WebhookOutcome =
  | { action: "ignored"; reason: string; leadId?: string }
  | { action: "answered"; leadId: string }
  | { action: "completed"; leadId: string }
  | { action: "retry_scheduled"; leadId: string; retryCount: number; nextRetryAt: string | null }
  | { action: "fallback_triggered"; leadId: string; retryCount: number; fallback: FallbackResult }
  | { action: "report_processed"; leadId: string; callbackAt: string | null; followUp: ChannelOutcome };

export interface CallStatusMachineConfig {
  endedReasonKeywords: EndedReasonKeywords;
  callback: { enabled: boolean; keywords: string[] };
}

export interface CallStatusMachineDeps {
  repository: LeadRepository;
  conversations: ConversationLog;
  gateway: VoiceGateway;
  policy: RetryPolicy;
  fallback: FallbackSequencer;
  callbacks: CallbackScheduler;
  events: EventBus;
  log: Logger;
  persistRetry?: RetryOptions;
  clock?: () => Date;
}

function snakeCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^a-zA-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}

/**
 * Flatten scalar analysis fields into column-ready strings.
 * Nested objects are joined with "_", arrays of scalars with ", ".
 */
export function flattenStructuredFields(fields: StructuredFields, prefix = ""): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    const name = snakeCase(prefix ? `${prefix}_${key}` : key);
    if (!name || value === null || value === undefined) continue;

    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      flat[name] = String(value);
    } else if (Array.isArray(value)) {
      const scalars = value.filter(
        (item) => typeof item === "string" || typeof item === "number" || typeof item === "boolean"
      );
      if (scalars.length > 0) flat[name] = scalars.map(String).join(", ");
    } else if (value && typeof value === "object") {
      Object.assign(flat, flattenStructuredFields(Object.fromEntries(Object.entries(value)), name));
    }
  }
  return flat;
}

export function correlationId(payload: WebhookPayload): string | null {
  return payload.call?.metadata?.lead_uuid ?? payload.message.call?.metadata?.lead_uuid ?? null;
}

function callInfo(payload: WebhookPayload): WebhookCall | null {
  return payload.call ?? payload.message.call ?? null;
}

export class CallStatusMachine {
  private readonly clock: () => Date;

  constructor(private readonly config: CallStatusMachineConfig, private readonly deps: CallStatusMachineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Entry point for webhook deliveries. Never throws for unknown leads or
   * unrecognized events; those are logged and dropped.
   */
  async handleEvent(body: unknown): Promise<WebhookOutcome> {
    const parsed = webhookPayloadSchema.safeParse(body);
    if (!parsed.success) {
      this.deps.log.warn("Dropping malformed webhook payload", { issues: parsed.error.issues.length });
      return { action: "ignored", reason: "malformed payload" };
    }

    const payload = parsed.data;
    const leadId = correlationId(payload);
    if (!leadId) {
      this.deps.log.warn("Webhook without lead_uuid", { type: payload.message.type });
      return { action: "ignored", reason: "missing lead_uuid" };
    }

    const lead = await this.deps.repository.getById(leadId);
    if (!lead) {
      this.deps.log.warn("Webhook for unknown lead", { leadId, type: payload.message.type });
      return { action: "ignored", reason: "unknown lead", leadId };
    }

    switch (payload.message.type) {
      case "status-update":
        return this.handleStatusUpdate(lead, payload);
      case "end-of-call-report":
        return this.handleCallReport(lead, payload);
      default:
        return { action: "ignored", reason: `unhandled event type: ${payload.message.type}`, leadId };
    }
  }

  private async handleStatusUpdate(lead: Lead, payload: WebhookPayload): Promise<WebhookOutcome> {
    const { status, endedReason } = payload.message;
    this.deps.log.info("Call status update", { leadId: lead.id, status, endedReason });

    switch (status) {
      case "answered":
        await this.persist(lead.id, { callStatus: "answered" });
        this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "answered" } });
        return { action: "answered", leadId: lead.id };

      case "missed":
      case "failed":
        return this.handleMissedCall(lead, endedReason ?? status);

      case "ended": {
        const call = callInfo(payload);
        const outcome = classifyEndedCall(
          { answeredAt: call?.answeredAt ?? call?.connectedAt ?? null, endedReason },
          this.config.endedReasonKeywords
        );
        if (outcome !== "completed") {
          return this.handleMissedCall(lead, endedReason ?? outcome);
        }
        await this.persist(lead.id, {
          callStatus: "completed",
          nextRetryAt: null,
          lastTerminalReason: endedReason ?? null,
        });
        this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "completed" } });
        return { action: "completed", leadId: lead.id };
      }

      default:
        return { action: "ignored", reason: `unhandled status: ${status ?? "none"}`, leadId: lead.id };
    }
  }

  /**
   * Missed-call path: once-only missed-call email, then retry bookkeeping,
   * then fallback channels when the last allowed attempt has been spent.
   */
  async handleMissedCall(lead: Lead, reason: string | null): Promise<WebhookOutcome> {
    try {
      await this.deps.fallback.sendMissedCallEmail(lead);
    } catch (error) {
      this.deps.log.error("Missed-call email failed", { leadId: lead.id, error: errorMessage(error) });
    }

    const current = (await this.deps.repository.getById(lead.id)) ?? lead;
    const { policy } = this.deps;
    const retryCount = current.retryCount;
    const reasonUpdate: LeadUpdate = reason ? { lastTerminalReason: reason } : {};

    if (policy.canRetry(retryCount)) {
      const nextCount = retryCount + 1;
      const nextRetryAt = policy.nextRetryAt(retryCount, this.clock());
      await this.persist(lead.id, { callStatus: "missed", retryCount: nextCount, nextRetryAt, ...reasonUpdate });
      this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "missed", reason: reason ?? undefined } });

      if (!policy.shouldTriggerFallback(nextCount)) {
        this.deps.log.info("Retry scheduled", {
          leadId: lead.id,
          retryCount: nextCount,
          nextRetryAt: nextRetryAt ? nextRetryAt.toISOString() : null,
        });
        return {
          action: "retry_scheduled",
          leadId: lead.id,
          retryCount: nextCount,
          nextRetryAt: nextRetryAt ? nextRetryAt.toISOString() : null,
        };
      }
      return this.triggerFallback(lead.id, nextCount);
    }

    await this.persist(lead.id, { callStatus: "missed", nextRetryAt: null, ...reasonUpdate });
    this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "missed", reason: reason ?? undefined } });
    return this.triggerFallback(lead.id, retryCount);
  }

  private async triggerFallback(leadId: string, retryCount: number): Promise<WebhookOutcome> {
    const lead = await this.deps.repository.getById(leadId);
    if (!lead) {
      return { action: "ignored", reason: "lead removed before fallback", leadId };
    }
    this.deps.log.info("Retries exhausted, running fallback", { leadId, retryCount });
    const fallback = await this.deps.fallback.runExhausted(lead);
    return { action: "fallback_triggered", leadId, retryCount, fallback };
  }

  private async handleCallReport(lead: Lead, payload: WebhookPayload): Promise<WebhookOutcome> {
    const message = payload.message;
    const analysis = message.analysis;
    const summary = analysis?.summary ?? message.summary ?? "";
    const evaluation = analysis?.successEvaluation;
    const qualification = evaluation === null || evaluation === undefined ? null : String(evaluation);
    const structured: StructuredFields = analysis?.structuredData ?? {};
    const callId = callInfo(payload)?.id ?? null;

    const update: LeadUpdate = {
      callStatus: "completed",
      nextRetryAt: null,
      summary,
      qualification,
      structuredFields: structured,
      extra: flattenStructuredFields(structured),
      callDurationSeconds: message.durationSeconds ?? null,
      recordingUrl: message.recordingUrl ?? message.artifact?.recordingUrl ?? null,
      ...(message.endedReason ? { lastTerminalReason: message.endedReason } : {}),
      ...(callId ? { externalCallId: callId } : {}),
    };
    await this.persist(lead.id, update);

    await this.deps.conversations.append({
      leadId: lead.id,
      channel: "call",
      direction: "out",
      timestamp: this.clock(),
      subject: "Voice call",
      content: summary,
      status: "completed",
      messageId: callId,
      metadata: { qualification, durationSeconds: message.durationSeconds ?? null },
    });
    this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "completed", callId: callId ?? undefined } });

    await this.storeTranscript(lead.id, callId, message);
    const callbackAt = await this.maybeScheduleCallback(lead.id, summary, structured);

    const latest = (await this.deps.repository.getById(lead.id)) ?? lead;
    const followUp = await this.deps.fallback.sendPostCallFollowUp(latest);

    return {
      action: "report_processed",
      leadId: lead.id,
      callbackAt: callbackAt ? callbackAt.toISOString() : null,
      followUp,
    };
  }

  private async storeTranscript(leadId: string, callId: string | null, message: WebhookMessage): Promise<void> {
    try {
      let transcript = message.artifact?.transcript ?? null;
      if (!transcript && callId) {
        transcript = await this.deps.gateway.getTranscript(callId);
      }
      if (transcript) {
        await this.persist(leadId, { transcript });
      }
    } catch (error) {
      this.deps.log.warn("Transcript unavailable", { leadId, callId, error: errorMessage(error) });
    }
  }

  private async maybeScheduleCallback(leadId: string, summary: string, structured: StructuredFields): Promise<Date | null> {
    const { callback } = this.config;
    if (!callback.enabled) return null;

    const text = [summary, ...Object.values(flattenStructuredFields(structured))].join(" ");
    if (!detectCallbackIntent(text, callback.keywords)) return null;

    const { at, rule } = parseCallbackTime(text, this.clock());
    await this.persist(leadId, { callStatus: "callback_scheduled", callbackRequestedAt: at });
    this.deps.callbacks.schedule(leadId, at);
    this.deps.events.publish({
      type: "CALLBACK_SCHEDULED",
      leadId,
      data: { callStatus: "callback_scheduled", callbackAt: at.toISOString(), reason: rule },
    });
    return at;
  }

  private persist(leadId: string, fields: LeadUpdate): Promise<void> {
    return withRetry(() => this.deps.repository.updateFields(leadId, fields), {
      ...this.deps.persistRetry,
      onError: (error, attempt) =>
        this.deps.log.warn("Lead write failed, retrying", { leadId, attempt, error: errorMessage(error) }),
    });
  }
}
