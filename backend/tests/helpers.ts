import { loadConfig } from "../src/config";
import type { AppConfig } from "../src/config";
import { buildServices } from "../src/container";
import type { ServiceOverrides, Services } from "../src/container";
import { EventBus } from "../src/eventBus";
import type {
  CallInitiationResult,
  EmailGateway,
  EmailMessage,
  GatewayCallStatus,
  SendResult,
  VoiceGateway,
  WhatsAppGateway,
  WhatsAppTemplateMessage,
} from "../src/gateways/types";
import type { Logger } from "../src/logging";
import { InMemoryConversationLog, InMemoryLeadRepository } from "../src/repository/inMemoryLeadRepository";
import type { Lead } from "../src/types/lead";
import { buildLead } from "../src/types/lead";

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function makeLead(overrides: Partial<Lead> = {}): Lead {
  const base = buildLead(
    { phone: "+15550000001", displayName: "Asha Rao", email: "asha@example.com" },
    overrides.id ?? "00000000-0000-4000-8000-000000000001",
    new Date("2026-01-01T00:00:00.000Z")
  );
  return { ...base, ...overrides };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    LEAD_STORE: "memory",
    LEAD_CACHE_TTL_SECONDS: "0",
    VAPI_API_KEY: "test-secret",
    VAPI_ASSISTANT_ID: "assistant-test",
    VAPI_PHONE_NUMBER_ID: "line-test",
    WHATSAPP_TEMPLATE_FALLBACK: "missed_call_template",
    WHATSAPP_DRY_RUN: "true",
    EMAIL_DRY_RUN: "true",
    SCHEDULER_CALL_SPACING_MS: "0",
    ...env,
  });
}

export class FakeVoiceGateway implements VoiceGateway {
  readonly initiated: string[] = [];
  statuses = new Map<string, GatewayCallStatus>();
  transcripts = new Map<string, string>();
  failFor = new Set<string>();
  private counter = 0;
  respond: (lead: Lead) => Promise<CallInitiationResult> = async (lead) => {
    if (this.failFor.has(lead.id)) {
      return { success: false, error: "HTTP 400: invalid number" };
    }
    this.counter++;
    return { success: true, id: `call-${this.counter}` };
  };

  async initiate(lead: Lead): Promise<CallInitiationResult> {
    this.initiated.push(lead.id);
    return this.respond(lead);
  }

  async getStatus(callId: string): Promise<GatewayCallStatus> {
    const status = this.statuses.get(callId);
    if (!status) throw new Error(`unknown call ${callId}`);
    return status;
  }

  async getTranscript(callId: string): Promise<string | null> {
    return this.transcripts.get(callId) ?? null;
  }
}

export class FakeWhatsApp implements WhatsAppGateway {
  readonly sent: WhatsAppTemplateMessage[] = [];
  result: SendResult = { success: true, id: "wa-1", dryRun: false };

  async sendTemplate(message: WhatsAppTemplateMessage): Promise<SendResult> {
    this.sent.push(message);
    return this.result;
  }
}

export class FakeEmail implements EmailGateway {
  readonly sent: EmailMessage[] = [];
  result: SendResult = { success: true, id: "email-1", dryRun: false };

  async send(message: EmailMessage): Promise<SendResult> {
    this.sent.push(message);
    return this.result;
  }
}

export interface TestHarness {
  services: Services;
  store: InMemoryLeadRepository;
  conversations: InMemoryConversationLog;
  voice: FakeVoiceGateway;
  whatsapp: FakeWhatsApp;
  email: FakeEmail;
  events: EventBus;
}

export function createHarness(
  leads: Lead[],
  env: Record<string, string> = {},
  overrides: ServiceOverrides = {}
): TestHarness {
  const store = new InMemoryLeadRepository(leads);
  const conversations = new InMemoryConversationLog();
  const voice = new FakeVoiceGateway();
  const whatsapp = new FakeWhatsApp();
  const email = new FakeEmail();
  const events = new EventBus();

  const services = buildServices(testConfig(env), {
    repository: store,
    conversations,
    voice,
    whatsapp,
    email,
    completer: null,
    events,
    persistRetry: { maxAttempts: 2, baseDelayMs: 1 },
    ...overrides,
  });

  return { services, store, conversations, voice, whatsapp, email, events };
}

export function missedEvent(leadId: string, status = "missed") {
  return {
    message: { type: "status-update", status },
    call: { id: "call-abc", metadata: { lead_uuid: leadId } },
  };
}
