// backend/src/gateways/vapiClient.ts
// Outbound calls through the Vapi REST API
import { z } from "zod";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";
import type { Lead } from "../types/lead";
import type { CallInitiationResult, GatewayCallStatus, VoiceGateway } from "./types";

export interface VapiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  assistantId: string | null;
  phoneNumberId: string | null;
  fetchImpl?: typeof fetch;
  clock?: () => Date;
}

const createdCallSchema = z.object({ id: z.string() }).passthrough();

const callSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    endedReason: z.string().nullish(),
    transcript: z.string().nullish(),
    artifact: z.object({ transcript: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

export function normalizeE164(phone: string): string {
  const trimmed = phone.trim();
  return trimmed.startsWith("+") ? trimmed : `+${trimmed}`;
}

function humanDate(date: Date): string {
  return date.toLocaleDateString("en-US", { weekday: "long", year: "numeric", month: "long", day: "numeric" });
}

export class VapiClient implements VoiceGateway {
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => Date;

  constructor(private readonly options: VapiClientOptions, private readonly log: Logger) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  async initiate(lead: Lead): Promise<CallInitiationResult> {
    const { apiKey, assistantId, phoneNumberId } = this.options;
    if (!apiKey || !assistantId || !phoneNumberId) {
      return { success: false, error: "Vapi credentials not configured" };
    }

    const now = this.clock();
    const payload = {
      assistantId,
      phoneNumberId,
      customer: { number: normalizeE164(lead.phone) },
      metadata: {
        lead_uuid: lead.id,
        initiated_at: now.toISOString(),
        today_iso: now.toISOString().slice(0, 10),
        today_human: humanDate(now),
      },
    };

    try {
      const response = await this.fetchImpl(`${this.options.baseUrl}/call`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(payload),
      });
      const body: unknown = await response.json().catch(() => null);

      if (!response.ok) {
        const detail = body ? JSON.stringify(body) : response.statusText;
        this.log.warn("Vapi call initiation rejected", { leadId: lead.id, status: response.status, detail });
        return { success: false, error: `HTTP ${response.status}: ${detail}` };
      }

      const parsed = createdCallSchema.safeParse(body);
      if (!parsed.success) {
        return { success: false, error: "Vapi response missing call id" };
      }

      this.log.info("Vapi call initiated", { leadId: lead.id, callId: parsed.data.id });
      return { success: true, id: parsed.data.id };
    } catch (error) {
      this.log.error("Vapi call initiation failed", { leadId: lead.id, error: errorMessage(error) });
      return { success: false, error: errorMessage(error) };
    }
  }

  async getStatus(callId: string): Promise<GatewayCallStatus> {
    const call = await this.getCall(callId);
    return { status: (call.status ?? "unknown").toLowerCase(), endedReason: call.endedReason ?? null };
  }

  async getTranscript(callId: string): Promise<string | null> {
    const call = await this.getCall(callId);
    const transcript = call.artifact?.transcript ?? call.transcript ?? null;
    return transcript && transcript.trim() ? transcript : null;
  }

  private async getCall(callId: string) {
    if (!this.options.apiKey) {
      throw new Error("Vapi credentials not configured");
    }
    const response = await this.fetchImpl(`${this.options.baseUrl}/call/${encodeURIComponent(callId)}`, {
      method: "GET",
      headers: this.headers(),
    });
    if (!response.ok) {
      throw new Error(`Vapi GET /call/${callId} failed: HTTP ${response.status}`);
    }
    return callSchema.parse(await response.json());
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiKey ?? ""}`,
      "Content-Type": "application/json",
    };
  }
}
