// backend/src/types/lead.ts

export const CALL_STATUSES = [
  "pending",
  "initiated",
  "answered",
  "missed",
  "failed",
  "completed",
  "callback_scheduled",
  "callback_initiated",
  "callback_failed",
] as const;

export type CallStatus = (typeof CALL_STATUSES)[number];

export function isCallStatus(value: unknown): value is CallStatus {
  return typeof value === "string" && (CALL_STATUSES as readonly string[]).includes(value);
}

export type StructuredFields = Record<string, unknown>;

export interface Lead {
  id: string;
  phone: string;
  whatsappPhone: string | null;
  email: string | null;
  displayName: string;
  partnerTag: string | null;
  callStatus: CallStatus;
  retryCount: number;
  nextRetryAt: Date | null;
  whatsappSent: boolean;
  emailSent: boolean;
  followUpSent: boolean;
  externalCallId: string | null;
  summary: string | null;
  qualification: string | null;
  structuredFields: StructuredFields | null;
  transcript: string | null;
  callDurationSeconds: number | null;
  recordingUrl: string | null;
  lastCallAt: Date | null;
  lastTerminalReason: string | null;
  lastError: string | null;
  callbackRequestedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  // Flattened analysis sub-fields (country, course, intake, ...)
  extra: Record<string, string>;
}

// Fields a single batched write may touch
export type LeadUpdate = Partial<Omit<Lead, "id" | "createdAt" | "updatedAt" | "extra">> & {
  extra?: Record<string, string>;
};

// Intake shape
export type NewLead = Pick<Lead, "phone" | "displayName"> &
  Partial<Pick<Lead, "id" | "whatsappPhone" | "email" | "partnerTag">>;

export interface LeadFilter {
  statuses?: CallStatus[];
  // Only leads whose nextRetryAt is set and <= this instant
  retryDueBy?: Date;
  withExternalCallId?: boolean;
}

export type ConversationChannel = "call" | "whatsapp" | "email";
export type ConversationDirection = "in" | "out";
export type ConversationStatus = "sent" | "dry_run" | "failed" | "completed" | "received";

export interface ConversationEntry {
  leadId: string;
  channel: ConversationChannel;
  direction: ConversationDirection;
  timestamp: Date;
  subject: string;
  content: string;
  status: ConversationStatus;
  messageId?: string | null;
  metadata?: Record<string, unknown>;
}

export function firstName(lead: Pick<Lead, "displayName">): string {
  const first = lead.displayName.trim().split(/\s+/)[0];
  return first ? first : "there";
}

export function buildLead(input: NewLead, id: string, now: Date = new Date()): Lead {
  return {
    id: input.id ?? id,
    phone: input.phone,
    whatsappPhone: input.whatsappPhone ?? null,
    email: input.email ?? null,
    displayName: input.displayName,
    partnerTag: input.partnerTag ?? null,
    callStatus: "pending",
    retryCount: 0,
    nextRetryAt: null,
    whatsappSent: false,
    emailSent: false,
    followUpSent: false,
    externalCallId: null,
    summary: null,
    qualification: null,
    structuredFields: null,
    transcript: null,
    callDurationSeconds: null,
    recordingUrl: null,
    lastCallAt: null,
    lastTerminalReason: null,
    lastError: null,
    callbackRequestedAt: null,
    createdAt: now,
    updatedAt: now,
    extra: {},
  };
}
