// backend/src/gateways/gmailEmailClient.ts
// Email through the Gmail REST API: sends, and reads replies from the inbox
import { z } from "zod";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";
import type { EmailGateway, EmailInbox, EmailMessage, InboundEmail, SendResult } from "./types";

const GMAIL_API_BASE = "https://gmail.googleapis.com/gmail/v1";

export const DRY_RUN_EMAIL_ID = "DRY_RUN_EMAIL";

export interface GmailEmailOptions {
  accessToken: string | null;
  from: string | null;
  replyTo: string | null;
  dryRun: boolean;
  fetchImpl?: typeof fetch;
}

const sentMessageSchema = z.object({ id: z.string(), threadId: z.string().optional() }).passthrough();

const messageListSchema = z.object({
  messages: z.array(z.object({ id: z.string(), threadId: z.string().optional() })).optional(),
});

const headerSchema = z.object({ name: z.string(), value: z.string() });

export interface GmailMessagePart {
  mimeType?: string;
  headers?: Array<{ name: string; value: string }>;
  body?: { data?: string };
  parts?: GmailMessagePart[];
}

const messagePartSchema: z.ZodType<GmailMessagePart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    headers: z.array(headerSchema).optional(),
    body: z.object({ data: z.string().optional() }).optional(),
    parts: z.array(messagePartSchema).optional(),
  })
);

const gmailMessageSchema = z.object({
  id: z.string(),
  threadId: z.string().optional(),
  snippet: z.string().optional(),
  payload: messagePartSchema.optional(),
});

export type GmailMessage = z.infer<typeof gmailMessageSchema>;

export function getHeader(message: GmailMessage, name: string): string | null {
  const wanted = name.toLowerCase();
  const header = message.payload?.headers?.find((candidate) => candidate.name.toLowerCase() === wanted);
  return header ? header.value : null;
}

function findPlainText(part: GmailMessagePart): string | null {
  if (part.mimeType === "text/plain" && part.body?.data) {
    return part.body.data;
  }
  for (const child of part.parts ?? []) {
    const found = findPlainText(child);
    if (found) return found;
  }
  return null;
}

/**
 * Plain-text body of a message: the payload body, else the first text/plain part, else the snippet.
 */
export function extractEmailBody(message: GmailMessage): string {
  const payload = message.payload;
  if (payload?.body?.data) {
    return Buffer.from(payload.body.data, "base64url").toString("utf-8");
  }
  const part = payload ? findPlainText(payload) : null;
  if (part) {
    return Buffer.from(part, "base64url").toString("utf-8");
  }
  return message.snippet ?? "";
}

export function toInboundEmail(message: GmailMessage): InboundEmail {
  const leadUuid = getHeader(message, "X-Lead-UUID")?.trim();
  return {
    id: message.id,
    threadId: message.threadId ?? null,
    from: getHeader(message, "From") ?? "",
    subject: getHeader(message, "Subject") ?? "",
    messageId: getHeader(message, "Message-ID"),
    inReplyTo: getHeader(message, "In-Reply-To"),
    references: getHeader(message, "References"),
    leadUuid: leadUuid ? leadUuid : null,
    body: extractEmailBody(message),
  };
}

/**
 * Build an RFC 2822 message and encode it as base64url, the shape Gmail's send endpoint takes.
 */
export function buildRawMessage(message: EmailMessage, from: string | null, replyTo: string | null): string {
  const messageParts: string[] = [];

  if (from) messageParts.push(`From: ${from}`);
  messageParts.push(`To: ${message.to}`);
  if (replyTo) messageParts.push(`Reply-To: ${replyTo}`);
  messageParts.push(`Subject: ${message.subject}`);
  for (const [name, value] of Object.entries(message.headers ?? {})) {
    messageParts.push(`${name}: ${value}`);
  }
  messageParts.push("Content-Type: text/plain; charset=utf-8");
  messageParts.push("");
  messageParts.push(message.body);

  return Buffer.from(messageParts.join("\r\n"))
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

export class GmailEmailClient implements EmailGateway, EmailInbox {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GmailEmailOptions, private readonly log: Logger) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(message: EmailMessage): Promise<SendResult> {
    if (this.options.dryRun) {
      this.log.info("Email dry run", { to: message.to, subject: message.subject, headers: message.headers ?? {} });
      return { success: true, id: DRY_RUN_EMAIL_ID, dryRun: true };
    }

    if (!this.options.accessToken) {
      return { success: false, error: "GMAIL_ACCESS_TOKEN not set" };
    }

    try {
      const response = await this.fetchImpl(`${GMAIL_API_BASE}/users/me/messages/send`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.accessToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          raw: buildRawMessage(message, this.options.from, this.options.replyTo),
          ...(message.threadId ? { threadId: message.threadId } : {}),
        }),
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => response.statusText);
        this.log.warn("Gmail send rejected", { to: message.to, status: response.status, detail });
        return { success: false, error: `HTTP ${response.status}: ${detail}` };
      }

      const sent = sentMessageSchema.parse(await response.json());
      this.log.info("Email sent", { to: message.to, messageId: sent.id });
      return { success: true, id: sent.id, dryRun: false };
    } catch (error) {
      this.log.error("Email send failed", { to: message.to, error: errorMessage(error) });
      return { success: false, error: errorMessage(error) };
    }
  }

  /** Unread messages matching a Gmail search query, fetched in full. */
  async listUnread(query: string, maxResults: number): Promise<InboundEmail[]> {
    const params = new URLSearchParams({ q: query, maxResults: String(maxResults) });
    const list = messageListSchema.parse(await this.request(`/users/me/messages?${params}`));
    const ids = (list.messages ?? []).map((message) => message.id);

    const messages = await Promise.all(
      ids.map(async (id) => gmailMessageSchema.parse(await this.request(`/users/me/messages/${encodeURIComponent(id)}`)))
    );
    return messages.map(toInboundEmail);
  }

  async markRead(id: string): Promise<void> {
    await this.request(`/users/me/messages/${encodeURIComponent(id)}/modify`, {
      method: "POST",
      body: JSON.stringify({ removeLabelIds: ["UNREAD"] }),
    });
  }

  private async request(path: string, init: { method?: string; body?: string } = {}): Promise<unknown> {
    if (!this.options.accessToken) {
      throw new Error("GMAIL_ACCESS_TOKEN not set");
    }
    const response = await this.fetchImpl(`${GMAIL_API_BASE}${path}`, {
      method: init.method ?? "GET",
      headers: {
        Authorization: `Bearer ${this.options.accessToken}`,
        "Content-Type": "application/json",
      },
      body: init.body,
    });
    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new Error(`Gmail ${init.method ?? "GET"} ${path} failed: HTTP ${response.status}: ${detail}`);
    }
    return response.json();
  }
}
