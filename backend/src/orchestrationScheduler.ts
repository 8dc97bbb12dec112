// backend/src/orchestrationScheduler.ts
// Periodic sweep that calls new leads and leads whose retry time has come

import type { CallPlacer } from "./callPlacer";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { LeadRepository } from "./repository/types";
import type { CallWindow } from "./timeWindow";
import { isWithinCallWindow } from "./timeWindow";
import type { Lead } from "./types/lead";
import { sleep } from "./withRetry";

export interface OrchestrationConfig {
  includeNewLeads: boolean;
  callSpacingMs: number;
  callWindow: CallWindow | null;
}

export interface SweepSummary {
  skipped: "outside_call_window" | null;
  due: number;
  initiated: number;
  failed: number;
  errors: Array<{ leadId: string; error: string }>;
}

export type LeadCallResult = { ok: true; callId: string } | { ok: false; error: string };

export interface OrchestrationDeps {
  repository: LeadRepository;
  placer: CallPlacer;
  log: Logger;
  clock?: () => Date;
}

export class OrchestrationScheduler {
  private readonly clock: () => Date;

  constructor(private readonly config: OrchestrationConfig, private readonly deps: OrchestrationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Leads due now: pending ones, plus missed/failed ones whose retry time has passed. */
  async findDueLeads(now: Date = this.clock()): Promise<Lead[]> {
    const retries = await this.deps.repository.list({ statuses: ["missed", "failed"], retryDueBy: now });
    if (!this.config.includeNewLeads) {
      return retries;
    }
    const fresh = await this.deps.repository.list({ statuses: ["pending"] });
    return [...fresh, ...retries];
  }

  async sweep(): Promise<SweepSummary> {
    const now = this.clock();
    const summary: SweepSummary = { skipped: null, due: 0, initiated: 0, failed: 0, errors: [] };

    if (!isWithinCallWindow(this.config.callWindow, now)) {
      this.deps.log.info("Outside call window, skipping sweep");
      return { ...summary, skipped: "outside_call_window" };
    }

    const leads = await this.findDueLeads(now);
    summary.due = leads.length;
    if (leads.length === 0) {
      return summary;
    }
    this.deps.log.info("Sweep found due leads", { count: leads.length });

    for (const [index, lead] of leads.entries()) {
      if (index > 0 && this.config.callSpacingMs > 0) {
        await sleep(this.config.callSpacingMs);
      }
      const result = await this.callLead(lead);
      if (result.ok) {
        summary.initiated++;
      } else {
        summary.failed++;
        summary.errors.push({ leadId: lead.id, error: result.error });
      }
    }

    this.deps.log.info("Sweep finished", { due: summary.due, initiated: summary.initiated, failed: summary.failed });
    return summary;
  }

  /**
   * Place one call and record the outcome. A gateway rejection leaves
   * status and retryCount untouched; only lastError is written.
   */
  async callLead(lead: Lead): Promise<LeadCallResult> {
    const result = await this.deps.placer.initiate(lead);

    if (!result.success) {
      this.deps.log.warn("Call placement failed", { leadId: lead.id, error: result.error });
      await this.recordError(lead.id, result.error);
      return { ok: false, error: result.error };
    }

    try {
      await this.deps.placer.markInitiated(lead.id, result.id);
    } catch (error) {
      // Status is unchanged, so a later webhook is the only record of this call.
      this.deps.log.error("Call placed but lead write failed", { leadId: lead.id, callId: result.id, error: errorMessage(error) });
    }
    return { ok: true, callId: result.id };
  }

  private async recordError(leadId: string, error: string): Promise<void> {
    try {
      await this.deps.repository.updateFields(leadId, { lastError: error });
    } catch (writeError) {
      this.deps.log.error("Failed to record placement error", { leadId, error: errorMessage(writeError) });
    }
  }
}
