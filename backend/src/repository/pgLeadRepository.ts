// backend/src/repository/pgLeadRepository.ts
import type { QueryResultRow } from "pg";
import { z } from "zod";
import type { Database } from "../db";
import type { Logger } from "../logging";
import type { ConversationEntry, Lead, LeadFilter, LeadUpdate, StructuredFields } from "../types/lead";
import { isCallStatus } from "../types/lead";
import type { ConversationLog, LeadRepository } from "./types";

type CoreField = keyof Omit<LeadUpdate, "extra">;

const CORE_COLUMNS: Record<CoreField, string> = {
  phone: "phone",
  whatsappPhone: "whatsapp_phone",
  email: "email",
  displayName: "display_name",
  partnerTag: "partner_tag",
  callStatus: "call_status",
  retryCount: "retry_count",
  nextRetryAt: "next_retry_at",
  whatsappSent: "whatsapp_sent",
  emailSent: "email_sent",
  followUpSent: "follow_up_sent",
  externalCallId: "external_call_id",
  summary: "summary",
  qualification: "qualification",
  structuredFields: "structured_fields",
  transcript: "transcript",
  callDurationSeconds: "call_duration_seconds",
  recordingUrl: "recording_url",
  lastCallAt: "last_call_at",
  lastTerminalReason: "last_terminal_reason",
  lastError: "last_error",
  callbackRequestedAt: "callback_requested_at",
};

const RESERVED_COLUMNS = new Set<string>(["id", "created_at", "updated_at", ...Object.values(CORE_COLUMNS)]);
const EXTRA_COLUMN_NAME = /^[a-z][a-z0-9_]{0,62}$/;
const leadIdSchema = z.string().uuid();

// The id column is UUID; any other string makes Postgres reject the whole statement.
function isLeadId(id: string): boolean {
  return leadIdSchema.safeParse(id).success;
}

function isCoreField(key: string): key is CoreField {
  return Object.prototype.hasOwnProperty.call(CORE_COLUMNS, key);
}

function text(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

function date(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

function num(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function jsonObject(value: unknown): StructuredFields | null {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

export function rowToLead(row: QueryResultRow): Lead {
  const extra: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!RESERVED_COLUMNS.has(column) && value !== null && value !== undefined) {
      extra[column] = String(value);
    }
  }

  const status = row.call_status;
  return {
    id: String(row.id),
    phone: text(row.phone) ?? "",
    whatsappPhone: text(row.whatsapp_phone),
    email: text(row.email),
    displayName: text(row.display_name) ?? "",
    partnerTag: text(row.partner_tag),
    callStatus: isCallStatus(status) ? status : "pending",
    retryCount: num(row.retry_count) ?? 0,
    nextRetryAt: date(row.next_retry_at),
    whatsappSent: row.whatsapp_sent === true,
    emailSent: row.email_sent === true,
    followUpSent: row.follow_up_sent === true,
    externalCallId: text(row.external_call_id),
    summary: text(row.summary),
    qualification: text(row.qualification),
    structuredFields: jsonObject(row.structured_fields),
    transcript: text(row.transcript),
    callDurationSeconds: num(row.call_duration_seconds),
    recordingUrl: text(row.recording_url),
    lastCallAt: date(row.last_call_at),
    lastTerminalReason: text(row.last_terminal_reason),
    lastError: text(row.last_error),
    callbackRequestedAt: date(row.callback_requested_at),
    createdAt: date(row.created_at) ?? new Date(0),
    updatedAt: date(row.updated_at) ?? new Date(0),
    extra,
  };
}

/**
 * Postgres-backed lead store. Extra analysis fields become TEXT columns,
 * created the first time a write mentions them.
 */
export class PgLeadRepository implements LeadRepository {
  private knownColumns: Set<string> | null = null;

  constructor(private readonly db: Database, private readonly log: Logger) {}

  async list(filter: LeadFilter = {}): Promise<Lead[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filter.statuses && filter.statuses.length > 0) {
      params.push(filter.statuses);
      clauses.push(`call_status = ANY($${params.length})`);
    }
    if (filter.retryDueBy) {
      params.push(filter.retryDueBy);
      clauses.push(`next_retry_at IS NOT NULL AND next_retry_at <= $${params.length}`);
    }
    if (filter.withExternalCallId) {
      clauses.push(`external_call_id IS NOT NULL AND external_call_id <> ''`);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = await this.db.query(`SELECT * FROM leads ${where} ORDER BY created_at ASC`, params);
    return rows.map(rowToLead);
  }

  async getById(id: string): Promise<Lead | null> {
    if (!isLeadId(id)) return null;
    const rows = await this.db.query("SELECT * FROM leads WHERE id = $1", [id]);
    return rows.length > 0 ? rowToLead(rows[0]) : null;
  }

  async updateFields(id: string, fields: LeadUpdate): Promise<void> {
    if (!isLeadId(id)) {
      throw new Error(`Lead ${id} not found`);
    }
    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const [key, value] of Object.entries(fields)) {
      if (!isCoreField(key) || value === undefined) continue;
      params.push(key === "structuredFields" && value !== null ? JSON.stringify(value) : value);
      assignments.push(`${CORE_COLUMNS[key]} = $${params.length}`);
    }

    const extra = fields.extra ?? {};
    const extraColumns = await this.ensureExtraColumns(Object.keys(extra));
    for (const column of extraColumns) {
      params.push(extra[column]);
      assignments.push(`"${column}" = $${params.length}`);
    }

    if (assignments.length === 0) return;

    params.push(id);
    const rows = await this.db.query(
      `UPDATE leads SET ${assignments.join(", ")}, updated_at = NOW() WHERE id = $${params.length} RETURNING id`,
      params
    );
    if (rows.length === 0) {
      throw new Error(`Lead ${id} not found`);
    }
  }

  async append(lead: Lead): Promise<void> {
    await this.db.query(
      `INSERT INTO leads (id, phone, whatsapp_phone, email, display_name, partner_tag, call_status,
         retry_count, next_retry_at, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        lead.id,
        lead.phone,
        lead.whatsappPhone,
        lead.email,
        lead.displayName,
        lead.partnerTag,
        lead.callStatus,
        lead.retryCount,
        lead.nextRetryAt,
        lead.createdAt,
        lead.updatedAt,
      ]
    );
  }

  async delete(id: string): Promise<boolean> {
    if (!isLeadId(id)) return false;
    const rows = await this.db.query("DELETE FROM leads WHERE id = $1 RETURNING id", [id]);
    return rows.length > 0;
  }

  private async ensureExtraColumns(keys: string[]): Promise<string[]> {
    const accepted: string[] = [];
    for (const key of keys) {
      if (!EXTRA_COLUMN_NAME.test(key) || RESERVED_COLUMNS.has(key)) {
        this.log.warn("Skipping invalid extra column", { column: key });
        continue;
      }
      accepted.push(key);
    }
    if (accepted.length === 0) return accepted;

    if (!this.knownColumns) {
      const rows = await this.db.query("SELECT column_name FROM information_schema.columns WHERE table_name = 'leads'");
      this.knownColumns = new Set(rows.map((row) => String(row.column_name)));
    }

    for (const column of accepted) {
      if (this.knownColumns.has(column)) continue;
      await this.db.query(`ALTER TABLE leads ADD COLUMN IF NOT EXISTS "${column}" TEXT`);
      this.knownColumns.add(column);
      this.log.info("Added lead column", { column });
    }
    return accepted;
  }
}

export class PgConversationLog implements ConversationLog {
  constructor(private readonly db: Database) {}

  async append(entry: ConversationEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO conversations (lead_id, channel, direction, timestamp, subject, content, status, message_id, metadata)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        entry.leadId,
        entry.channel,
        entry.direction,
        entry.timestamp,
        entry.subject,
        entry.content,
        entry.status,
        entry.messageId ?? null,
        entry.metadata ? JSON.stringify(entry.metadata) : null,
      ]
    );
  }

  async listByLead(leadId: string): Promise<ConversationEntry[]> {
    if (!isLeadId(leadId)) return [];
    const rows = await this.db.query(
      "SELECT * FROM conversations WHERE lead_id = $1 ORDER BY timestamp ASC, id ASC",
      [leadId]
    );
    return rows.map((row) => ({
      leadId: String(row.lead_id),
      channel: row.channel === "whatsapp" || row.channel === "email" ? row.channel : "call",
      direction: row.direction === "in" ? "in" : "out",
      timestamp: date(row.timestamp) ?? new Date(0),
      subject: text(row.subject) ?? "",
      content: text(row.content) ?? "",
      status:
        row.status === "sent" || row.status === "dry_run" || row.status === "failed" || row.status === "received"
          ? row.status
          : "completed",
      messageId: text(row.message_id),
      metadata: jsonObject(row.metadata) ?? undefined,
    }));
  }
}
