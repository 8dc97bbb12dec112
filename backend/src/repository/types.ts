// backend/src/repository/types.ts
import type { ConversationEntry, Lead, LeadFilter, LeadUpdate } from "../types/lead";

/**
 * Row-keyed lead store. Writes are idempotent overwrites; no transactions are assumed.
 */
export interface LeadRepository {
  list(filter?: LeadFilter): Promise<Lead[]>;
  getById(id: string): Promise<Lead | null>;
  // One batched write per call
  updateFields(id: string, fields: LeadUpdate): Promise<void>;
  append(lead: Lead): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export interface ConversationLog {
  append(entry: ConversationEntry): Promise<void>;
  listByLead(leadId: string): Promise<ConversationEntry[]>;
}

export function matchesFilter(lead: Lead, filter: LeadFilter = {}): boolean {
  if (filter.statuses && filter.statuses.length > 0 && !filter.statuses.includes(lead.callStatus)) {
    return false;
  }
  if (filter.retryDueBy) {
    if (!lead.nextRetryAt || lead.nextRetryAt.getTime() > filter.retryDueBy.getTime()) {
      return false;
    }
  }
  if (filter.withExternalCallId && !lead.externalCallId) {
    return false;
  }
  return true;
}

export function applyUpdate(lead: Lead, fields: LeadUpdate, now: Date = new Date()): Lead {
  const { extra, ...core } = fields;
  return {
    ...lead,
    ...core,
    extra: extra ? { ...lead.extra, ...extra } : lead.extra,
    updatedAt: now,
  };
}
