// backend/src/reconciliationSweeper.ts
// Corrects leads stuck in "initiated" when the platform's webhook never arrived

import type { CallStatusMachine } from "./callStatusMachine";
import type { EventBus } from "./eventBus";
import type { VoiceGateway } from "./gateways/types";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { LeadRepository } from "./repository/types";
import type { RetryOptions } from "./withRetry";
import { withRetry } from "./withRetry";

export type ReconciledStatus = "completed" | "missed";

const COMPLETED_STATUSES = new Set(["completed", "ended"]);
const MISSED_STATUSES = new Set(["failed", "busy", "no-answer"]);

/** Map the gateway's call status onto a terminal lead status, or null to leave it alone. */
export function mapGatewayStatus(status: string): ReconciledStatus | null {
  const normalized = status.trim().toLowerCase();
  if (COMPLETED_STATUSES.has(normalized)) return "completed";
  if (MISSED_STATUSES.has(normalized)) return "missed";
  return null;
}

export interface ReconciliationSummary {
  checked: number;
  completed: number;
  missed: number;
  unchanged: number;
  errors: number;
}

export interface ReconciliationDeps {
  repository: LeadRepository;
  gateway: VoiceGateway;
  machine: CallStatusMachine;
  events: EventBus;
  log: Logger;
  persistRetry?: RetryOptions;
}

export class ReconciliationSweeper {
  constructor(private readonly deps: ReconciliationDeps) {}

  async sweep(): Promise<ReconciliationSummary> {
    const summary: ReconciliationSummary = { checked: 0, completed: 0, missed: 0, unchanged: 0, errors: 0 };
    const leads = await this.deps.repository.list({ statuses: ["initiated"], withExternalCallId: true });

    for (const lead of leads) {
      if (!lead.externalCallId) continue;
      summary.checked++;

      try {
        const { status, endedReason } = await this.deps.gateway.getStatus(lead.externalCallId);
        const mapped = mapGatewayStatus(status);

        if (mapped === "completed") {
          await withRetry(
            () =>
              this.deps.repository.updateFields(lead.id, {
                callStatus: "completed",
                nextRetryAt: null,
                lastTerminalReason: endedReason ?? status,
              }),
            {
              ...this.deps.persistRetry,
              onError: (error, attempt) =>
                this.deps.log.warn("Lead write failed, retrying", { leadId: lead.id, attempt, error: errorMessage(error) }),
            }
          );
          this.deps.events.publish({ type: "LEAD_UPDATED", leadId: lead.id, data: { callStatus: "completed", reason: "reconciled" } });
          summary.completed++;
        } else if (mapped === "missed") {
          await this.deps.machine.handleMissedCall(lead, endedReason ?? status);
          summary.missed++;
        } else {
          summary.unchanged++;
        }
      } catch (error) {
        summary.errors++;
        this.deps.log.error("Reconciliation failed for lead", {
          leadId: lead.id,
          callId: lead.externalCallId,
          error: errorMessage(error),
        });
      }
    }

    if (summary.checked > 0) {
      this.deps.log.info("Reconciliation finished", { ...summary });
    }
    return summary;
  }
}
