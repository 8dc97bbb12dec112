// backend/src/repository/inMemoryLeadRepository.ts
// Process-local stores, used for LEAD_STORE=memory and in tests
import type { ConversationEntry, Lead, LeadFilter, LeadUpdate } from "../types/lead";
import type { ConversationLog, LeadRepository } from "./types";
import { applyUpdate, matchesFilter } from "./types";

export class InMemoryLeadRepository implements LeadRepository {
  private readonly leads = new Map<string, Lead>();

  constructor(seed: Lead[] = []) {
    for (const lead of seed) {
      this.leads.set(lead.id, structuredClone(lead));
    }
  }

  async list(filter: LeadFilter = {}): Promise<Lead[]> {
    return [...this.leads.values()]
      .filter((lead) => matchesFilter(lead, filter))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((lead) => structuredClone(lead));
  }

  async getById(id: string): Promise<Lead | null> {
    const lead = this.leads.get(id);
    return lead ? structuredClone(lead) : null;
  }

  async updateFields(id: string, fields: LeadUpdate): Promise<void> {
    const lead = this.leads.get(id);
    if (!lead) {
      throw new Error(`Lead ${id} not found`);
    }
    this.leads.set(id, applyUpdate(lead, structuredClone(fields)));
  }

  async append(lead: Lead): Promise<void> {
    if (this.leads.has(lead.id)) {
      throw new Error(`Lead ${lead.id} already exists`);
    }
    this.leads.set(lead.id, structuredClone(lead));
  }

  async delete(id: string): Promise<boolean> {
    return this.leads.delete(id);
  }
}

export class InMemoryConversationLog implements ConversationLog {
  private readonly entries: ConversationEntry[] = [];

  async append(entry: ConversationEntry): Promise<void> {
    this.entries.push(structuredClone(entry));
  }

  async listByLead(leadId: string): Promise<ConversationEntry[]> {
    return this.entries.filter((entry) => entry.leadId === leadId).map((entry) => structuredClone(entry));
  }
}
