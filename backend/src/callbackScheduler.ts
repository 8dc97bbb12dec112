// backend/src/callbackScheduler.ts
// One-shot callback jobs requested during a call

import type { CallPlacer } from "./callPlacer";
import type { EventBus } from "./eventBus";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { LeadRepository } from "./repository/types";

// setTimeout's ceiling (~24.8 days); longer waits re-arm on wake-up
const MAX_TIMER_MS = 2 ** 31 - 1;

export interface CallbackSchedulerDeps {
  repository: LeadRepository;
  placer: CallPlacer;
  events: EventBus;
  log: Logger;
  clock?: () => Date;
}

export class CallbackScheduler {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly running = new Set<Promise<void>>();
  private readonly clock: () => Date;

  constructor(private readonly deps: CallbackSchedulerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Schedule (or reschedule) the callback for a lead. One job per lead. */
  schedule(leadId: string, at: Date): void {
    this.cancel(leadId);

    const remaining = Math.max(at.getTime() - this.clock().getTime(), 0);
    const delay = Math.min(remaining, MAX_TIMER_MS);
    const timer = setTimeout(() => {
      this.timers.delete(leadId);
      const run: Promise<void> = this.fire(leadId, at, remaining > MAX_TIMER_MS)
        .catch((error) => {
          this.deps.log.error("Callback job failed", { leadId, error: errorMessage(error) });
        })
        .finally(() => {
          this.running.delete(run);
        });
      this.running.add(run);
    }, delay);

    this.timers.set(leadId, timer);
    this.deps.log.info("Callback scheduled", { leadId, at: at.toISOString(), delayMs: delay });
  }

  cancel(leadId: string): boolean {
    const timer = this.timers.get(leadId);
    if (!timer) return false;
    clearTimeout(timer);
    this.timers.delete(leadId);
    return true;
  }

  pendingLeadIds(): string[] {
    return [...this.timers.keys()];
  }

  /** Re-arm jobs for leads still waiting on a callback (timers do not survive restarts). */
  async restore(): Promise<number> {
    const leads = await this.deps.repository.list({ statuses: ["callback_scheduled"] });
    for (const lead of leads) {
      this.schedule(lead.id, lead.callbackRequestedAt ?? this.clock());
    }
    return leads.length;
  }

  async stop(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    await Promise.all([...this.running]);
  }

  private async fire(leadId: string, at: Date, rearm: boolean): Promise<void> {
    if (rearm) {
      this.schedule(leadId, at);
      return;
    }

    const lead = await this.deps.repository.getById(leadId);
    if (!lead || lead.callStatus !== "callback_scheduled") {
      this.deps.log.info("Callback no longer pending, skipping", { leadId, callStatus: lead?.callStatus ?? null });
      return;
    }

    const result = await this.deps.placer.initiate(lead);
    if (result.success) {
      await this.deps.placer.markInitiated(leadId, result.id, "callback_initiated");
      this.deps.log.info("Callback call placed", { leadId, callId: result.id });
      return;
    }

    await this.deps.repository.updateFields(leadId, { callStatus: "callback_failed", lastError: result.error });
    this.deps.events.publish({
      type: "LEAD_UPDATED",
      leadId,
      data: { callStatus: "callback_failed", reason: result.error },
    });
    this.deps.log.warn("Callback call failed", { leadId, error: result.error });
  }
}
