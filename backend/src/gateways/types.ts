// backend/src/gateways/types.ts
import type { Lead } from "../types/lead";

export type SendResult =
  | { success: true; id: string; dryRun: boolean }
  | { success: false; error: string };

export type CallInitiationResult = { success: true; id: string } | { success: false; error: string };

export interface GatewayCallStatus {
  status: string;
  endedReason: string | null;
}

export interface VoiceGateway {
  initiate(lead: Lead): Promise<CallInitiationResult>;
  getStatus(callId: string): Promise<GatewayCallStatus>;
  // Best effort: null when the platform has no transcript yet
  getTranscript(callId: string): Promise<string | null>;
}

export interface WhatsAppTemplateMessage {
  to: string;
  template: string;
  language: string;
  params: string[];
}

export interface WhatsAppGateway {
  sendTemplate(message: WhatsAppTemplateMessage): Promise<SendResult>;
}

export interface EmailMessage {
  to: string;
  subject: string;
  body: string;
  headers?: Record<string, string>;
  threadId?: string;
}

export interface EmailGateway {
  send(message: EmailMessage): Promise<SendResult>;
}

/** An unread message pulled from the mailbox, headers already decoded. */
export interface InboundEmail {
  id: string;
  threadId: string | null;
  from: string;
  subject: string;
  messageId: string | null;
  inReplyTo: string | null;
  references: string | null;
  leadUuid: string | null;
  body: string;
}

export interface EmailInbox {
  listUnread(query: string, maxResults: number): Promise<InboundEmail[]>;
  markRead(id: string): Promise<void>;
}
