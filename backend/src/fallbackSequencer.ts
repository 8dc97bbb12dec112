// backend/src/fallbackSequencer.ts
// WhatsApp and email outreach once voice retries run out

import type { EventBus } from "./eventBus";
import type { EmailGateway, SendResult, WhatsAppGateway } from "./gateways/types";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { ConversationLog, LeadRepository } from "./repository/types";
import type { FollowUpWriter } from "./services/followUpWriter";
import type { ConversationChannel, ConversationStatus, Lead, LeadUpdate } from "./types/lead";
import { firstName } from "./types/lead";
import type { RetryOptions } from "./withRetry";
import { withRetry } from "./withRetry";

export interface FallbackConfig {
  whatsapp: {
    enableFallback: boolean;
    template: string | null;
    language: string;
  };
  email: {
    subject: string;
    bodyTemplate: string;
    missedCallEnabled: boolean;
    followUpEnabled: boolean;
    followUpSubject: string;
  };
}

export type ChannelOutcome = "sent" | "dry_run" | "failed" | "skipped";

export interface FallbackResult {
  whatsapp: ChannelOutcome;
  email: ChannelOutcome;
}

export interface FallbackDeps {
  repository: LeadRepository;
  conversations: ConversationLog;
  whatsapp: WhatsAppGateway;
  email: EmailGateway;
  followUpWriter: FollowUpWriter;
  events: EventBus;
  log: Logger;
  persistRetry?: RetryOptions;
  clock?: () => Date;
}

export function renderEmailBody(template: string, lead: Pick<Lead, "displayName">): string {
  const name = firstName(lead);
  return template.replace(/\{name\}/g, () => name);
}

export function emailSubject(subject: string, leadId: string): string {
  return `${subject} [Lead:${leadId}]`;
}

function outcomeOf(result: SendResult): ChannelOutcome {
  if (!result.success) return "failed";
  return result.dryRun ? "dry_run" : "sent";
}

/**
 * Fallback channel sequencing. Every send is guarded by a per-lead flag
 * (whatsappSent, emailSent, followUpSent), so replayed events never re-send.
 * A flag is set only after the send reports success (live or dry run).
 */
export class FallbackSequencer {
  private readonly clock: () => Date;

  constructor(private readonly config: FallbackConfig, private readonly deps: FallbackDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Retries exhausted: WhatsApp template first, then the fallback email. */
  async runExhausted(lead: Lead): Promise<FallbackResult> {
    const whatsapp = await this.sendWhatsApp(lead);
    const current = (await this.deps.repository.getById(lead.id)) ?? lead;
    const email = await this.sendOnceOnlyEmail(current);
    this.deps.log.info("Fallback sequence finished", { leadId: lead.id, whatsapp, email });
    return { whatsapp, email };
  }

  /** Missed-call email, sent at most once per lead. */
  async sendMissedCallEmail(lead: Lead): Promise<ChannelOutcome> {
    if (!this.config.email.missedCallEnabled) {
      return "skipped";
    }
    return this.sendOnceOnlyEmail(lead);
  }

  /** Post-success follow-up written from the call summary. */
  async sendPostCallFollowUp(lead: Lead): Promise<ChannelOutcome> {
    const { email } = this.config;
    if (!email.followUpEnabled || lead.followUpSent || !lead.email) {
      return "skipped";
    }

    const written = await this.deps.followUpWriter.write({
      firstName: firstName(lead),
      summary: lead.summary ?? "",
      qualification: lead.qualification,
    });
    const subject = emailSubject(email.followUpSubject, lead.id);
    const result = await this.deps.email.send({
      to: lead.email,
      subject,
      body: written.body,
      headers: { "X-Lead-UUID": lead.id },
    });

    return this.record(lead, "email", result, subject, written.body, { followUpSent: true }, {
      kind: "post_call_follow_up",
      generated: written.generated,
    });
  }

  private async sendWhatsApp(lead: Lead): Promise<ChannelOutcome> {
    const { whatsapp } = this.config;
    const to = lead.whatsappPhone || lead.phone;
    if (!whatsapp.enableFallback || !whatsapp.template || lead.whatsappSent || !to) {
      return "skipped";
    }

    const params = [firstName(lead)];
    const result = await this.deps.whatsapp.sendTemplate({
      to,
      template: whatsapp.template,
      language: whatsapp.language,
      params,
    });

    return this.record(lead, "whatsapp", result, whatsapp.template, `Template ${whatsapp.template} (${params.join(", ")})`, {
      whatsappSent: true,
    }, { language: whatsapp.language, kind: "fallback" });
  }

  private async sendOnceOnlyEmail(lead: Lead): Promise<ChannelOutcome> {
    if (lead.emailSent || !lead.email) {
      return "skipped";
    }

    const subject = emailSubject(this.config.email.subject, lead.id);
    const body = renderEmailBody(this.config.email.bodyTemplate, lead);
    const result = await this.deps.email.send({
      to: lead.email,
      subject,
      body,
      headers: { "X-Lead-UUID": lead.id },
    });

    return this.record(lead, "email", result, subject, body, { emailSent: true }, { kind: "missed_call" });
  }

  private async record(
    lead: Lead,
    channel: Exclude<ConversationChannel, "call">,
    result: SendResult,
    subject: string,
    content: string,
    flag: LeadUpdate,
    metadata: Record<string, unknown>
  ): Promise<ChannelOutcome> {
    const outcome = outcomeOf(result);
    const status: ConversationStatus = outcome === "failed" ? "failed" : outcome === "dry_run" ? "dry_run" : "sent";

    if (result.success) {
      await this.persist(lead.id, "flag write", () => this.deps.repository.updateFields(lead.id, flag));
      this.deps.events.publish({
        type: "FALLBACK_SENT",
        leadId: lead.id,
        data: { channel, dryRun: result.dryRun },
      });
    } else {
      this.deps.log.warn("Fallback send failed", { leadId: lead.id, channel, error: result.error });
    }

    const timestamp = this.clock();
    await this.persist(lead.id, "conversation append", () =>
      this.deps.conversations.append({
        leadId: lead.id,
        channel,
        direction: "out",
        timestamp,
        subject,
        content,
        status,
        messageId: result.success ? result.id : null,
        metadata: result.success ? metadata : { ...metadata, error: result.error },
      })
    );

    return outcome;
  }

  // A send has already happened here; transient store errors must not lose the record of it.
  private persist(leadId: string, what: string, write: () => Promise<void>): Promise<void> {
    return withRetry(write, {
      ...this.deps.persistRetry,
      onError: (error, attempt) =>
        this.deps.log.warn(`Fallback ${what} failed, retrying`, { leadId, attempt, error: errorMessage(error) }),
    });
  }
}
