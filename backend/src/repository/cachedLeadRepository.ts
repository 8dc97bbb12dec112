// backend/src/repository/cachedLeadRepository.ts
// Short-TTL read cache in front of a quota-limited lead store
import type { Lead, LeadFilter, LeadUpdate } from "../types/lead";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";
import type { LeadRepository } from "./types";
import { applyUpdate } from "./types";

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

// Lists bounded by a due time change key on every sweep, so they are never cached.
function filterKey(filter: LeadFilter): string | null {
  if (filter.retryDueBy) return null;
  return JSON.stringify({
    statuses: filter.statuses ? [...filter.statuses].sort() : null,
    withExternalCallId: filter.withExternalCallId ?? false,
  });
}

/**
 * Serves fresh entries from memory, and stale ones when the store errors.
 * Writes go through to the store first, then merge into the cached lead.
 * Concurrent lookups of the same id share one store read.
 */
export class CachedLeadRepository implements LeadRepository {
  private readonly byId = new Map<string, CacheEntry<Lead | null>>();
  private readonly byFilter = new Map<string, CacheEntry<Lead[]>>();
  private readonly inflight = new Map<string, Promise<Lead | null>>();

  constructor(
    private readonly inner: LeadRepository,
    private readonly ttlMs: number,
    private readonly log: Logger,
    private readonly clock: () => number = Date.now
  ) {}

  async list(filter: LeadFilter = {}): Promise<Lead[]> {
    const key = filterKey(filter);
    const cached = key === null ? undefined : this.byFilter.get(key);
    if (cached && cached.expiresAt > this.clock()) {
      return cached.value.map((lead) => structuredClone(lead));
    }

    try {
      const leads = await this.inner.list(filter);
      const expiresAt = this.clock() + this.ttlMs;
      if (key !== null) {
        this.byFilter.set(key, { value: leads, expiresAt });
      }
      for (const lead of leads) {
        this.byId.set(lead.id, { value: lead, expiresAt });
      }
      return leads.map((lead) => structuredClone(lead));
    } catch (error) {
      if (cached) {
        this.log.warn("Lead store list failed, serving stale cache", { error: errorMessage(error) });
        return cached.value.map((lead) => structuredClone(lead));
      }
      throw error;
    }
  }

  async getById(id: string): Promise<Lead | null> {
    const cached = this.byId.get(id);
    if (cached && cached.expiresAt > this.clock()) {
      return cached.value ? structuredClone(cached.value) : null;
    }

    let pending = this.inflight.get(id);
    if (!pending) {
      pending = this.inner.getById(id).finally(() => this.inflight.delete(id));
      this.inflight.set(id, pending);
    }

    try {
      const lead = await pending;
      this.byId.set(id, { value: lead, expiresAt: this.clock() + this.ttlMs });
      return lead ? structuredClone(lead) : null;
    } catch (error) {
      if (cached) {
        this.log.warn("Lead store read failed, serving stale cache", { leadId: id, error: errorMessage(error) });
        return cached.value ? structuredClone(cached.value) : null;
      }
      throw error;
    }
  }

  async updateFields(id: string, fields: LeadUpdate): Promise<void> {
    await this.inner.updateFields(id, fields);
    const cached = this.byId.get(id);
    if (cached?.value) {
      this.byId.set(id, { value: applyUpdate(cached.value, fields), expiresAt: cached.expiresAt });
    }
    this.byFilter.clear();
  }

  async append(lead: Lead): Promise<void> {
    await this.inner.append(lead);
    this.byId.delete(lead.id);
    this.byFilter.clear();
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.inner.delete(id);
    this.byId.delete(id);
    this.byFilter.clear();
    return deleted;
  }
}
