// backend/src/emailInboundPoller.ts
// Pulls lead replies from the mailbox into the conversation log, optionally answering them

import type { EventBus } from "./eventBus";
import type { EmailGateway, EmailInbox, InboundEmail } from "./gateways/types";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { ConversationLog, LeadRepository } from "./repository/types";
import type { FollowUpWriter } from "./services/followUpWriter";
import type { ConversationStatus, Lead } from "./types/lead";
import { firstName } from "./types/lead";
import type { RetryOptions } from "./withRetry";
import { withRetry } from "./withRetry";

const LEAD_TAG = /\[Lead:\s*([^\]\s]+)\s*\]/i;
const HISTORY_LIMIT = 8;

export interface InboundPollConfig {
  query: string;
  maxResults: number;
  autoReply: boolean;
}

export interface InboundPollSummary {
  fetched: number;
  processed: number;
  skipped: number;
  unmatched: number;
  replied: number;
  errors: number;
}

export interface EmailInboundDeps {
  inbox: EmailInbox;
  email: EmailGateway;
  repository: LeadRepository;
  conversations: ConversationLog;
  followUpWriter: FollowUpWriter;
  events: EventBus;
  log: Logger;
  persistRetry?: RetryOptions;
  clock?: () => Date;
}

export function leadTagFromSubject(subject: string): string | null {
  const match = LEAD_TAG.exec(subject);
  return match ? match[1] : null;
}

/** Bare address from a From header such as `Asha Rao <asha@example.com>`. */
export function addressOf(from: string): string {
  const angled = /<([^>]+)>/.exec(from);
  return (angled ? angled[1] : from).trim().toLowerCase();
}

export function replySubject(subject: string): string {
  return `Re: ${subject.replace(/^\s*re:\s*/i, "")}`;
}

export class EmailInboundPoller {
  private readonly clock: () => Date;

  constructor(private readonly config: InboundPollConfig, private readonly deps: EmailInboundDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * One pass over unread replies. Only messages that are replies and carry the
   * lead header or subject tag are handled; those are marked read once logged,
   * anything that fails stays unread for the next pass.
   */
  async poll(): Promise<InboundPollSummary> {
    const summary: InboundPollSummary = { fetched: 0, processed: 0, skipped: 0, unmatched: 0, replied: 0, errors: 0 };
    const messages = await this.deps.inbox.listUnread(this.config.query, this.config.maxResults);
    summary.fetched = messages.length;

    let leadsByEmail: Map<string, Lead> | undefined;

    for (const message of messages) {
      if (!message.inReplyTo && !message.references) {
        summary.skipped++;
        continue;
      }
      const tag = leadTagFromSubject(message.subject);
      if (!message.leadUuid && !tag) {
        summary.skipped++;
        continue;
      }

      try {
        let lead =
          (message.leadUuid ? await this.deps.repository.getById(message.leadUuid) : null) ??
          (tag ? await this.deps.repository.getById(tag) : null);
        if (!lead) {
          leadsByEmail = leadsByEmail ?? (await this.indexByEmail());
          lead = leadsByEmail.get(addressOf(message.from)) ?? null;
        }
        if (!lead) {
          summary.unmatched++;
          this.deps.log.warn("Unable to match inbound email to a lead", { gmailId: message.id, subject: message.subject });
          continue;
        }

        const replied = await this.handle(lead, message);
        if (replied) summary.replied++;
        await this.deps.inbox.markRead(message.id);
        summary.processed++;
      } catch (error) {
        summary.errors++;
        this.deps.log.error("Inbound email failed", { gmailId: message.id, error: errorMessage(error) });
      }
    }

    if (summary.fetched > 0) {
      this.deps.log.info("Inbound email poll finished", { ...summary });
    }
    return summary;
  }

  private async indexByEmail(): Promise<Map<string, Lead>> {
    const index = new Map<string, Lead>();
    for (const lead of await this.deps.repository.list()) {
      if (lead.email) index.set(lead.email.trim().toLowerCase(), lead);
    }
    return index;
  }

  private async handle(lead: Lead, message: InboundEmail): Promise<boolean> {
    const history = this.config.autoReply ? await this.deps.conversations.listByLead(lead.id) : [];

    await this.persist(lead.id, () =>
      this.deps.conversations.append({
        leadId: lead.id,
        channel: "email",
        direction: "in",
        timestamp: this.clock(),
        subject: message.subject,
        content: message.body,
        status: "received",
        messageId: message.messageId ?? message.id,
        metadata: { from: message.from, gmailId: message.id, threadId: message.threadId },
      })
    );
    this.deps.events.publish({ type: "EMAIL_RECEIVED", leadId: lead.id, data: { channel: "email" } });
    this.deps.log.info("Inbound email logged", { leadId: lead.id, gmailId: message.id });

    if (!this.config.autoReply) return false;
    try {
      return await this.reply(
        lead,
        message,
        history.slice(-HISTORY_LIMIT).map((entry) => `[${entry.channel} ${entry.direction}] ${entry.subject}: ${entry.content}`)
      );
    } catch (error) {
      this.deps.log.error("Auto-reply failed", { leadId: lead.id, error: errorMessage(error) });
      return false;
    }
  }

  private async reply(lead: Lead, message: InboundEmail, history: string[]): Promise<boolean> {
    const to = lead.email ?? addressOf(message.from);
    if (!to.includes("@")) {
      this.deps.log.warn("No reply address for inbound email", { leadId: lead.id });
      return false;
    }

    const written = await this.deps.followUpWriter.writeReply({
      firstName: firstName(lead),
      subject: message.subject,
      inbound: message.body,
      history,
    });
    const subject = replySubject(message.subject);
    const headers: Record<string, string> = { "X-Lead-UUID": lead.id };
    if (message.messageId) {
      headers["In-Reply-To"] = message.messageId;
      headers["References"] = [message.references, message.messageId].filter(Boolean).join(" ");
    }

    const result = await this.deps.email.send({
      to,
      subject,
      body: written.body,
      headers,
      ...(message.threadId ? { threadId: message.threadId } : {}),
    });
    const status: ConversationStatus = !result.success ? "failed" : result.dryRun ? "dry_run" : "sent";

    await this.persist(lead.id, () =>
      this.deps.conversations.append({
        leadId: lead.id,
        channel: "email",
        direction: "out",
        timestamp: this.clock(),
        subject,
        content: written.body,
        status,
        messageId: result.success ? result.id : null,
        metadata: result.success
          ? { kind: "auto_reply", generated: written.generated }
          : { kind: "auto_reply", generated: written.generated, error: result.error },
      })
    );
    return result.success;
  }

  private persist(leadId: string, write: () => Promise<void>): Promise<void> {
    return withRetry(write, {
      ...this.deps.persistRetry,
      onError: (error, attempt) =>
        this.deps.log.warn("Conversation write failed, retrying", { leadId, attempt, error: errorMessage(error) }),
    });
  }
}
