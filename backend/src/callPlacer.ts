// backend/src/callPlacer.ts
// Shared call placement for sweeps, batches, callbacks and manual calls

import type { EventBus } from "./eventBus";
import type { CallInitiationResult, VoiceGateway } from "./gateways/types";
import type { Logger } from "./logging";
import { errorMessage } from "./logging";
import type { LeadRepository } from "./repository/types";
import type { CallStatus, Lead } from "./types/lead";
import type { RetryOptions } from "./withRetry";
import { withRetry } from "./withRetry";

export const MISSING_PHONE_ERROR = "Lead has no phone number";

export interface CallPlacerDeps {
  gateway: VoiceGateway;
  repository: LeadRepository;
  events: EventBus;
  log: Logger;
  persistRetry?: RetryOptions;
  clock?: () => Date;
}

export class CallPlacer {
  private readonly clock: () => Date;

  constructor(private readonly deps: CallPlacerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Ask the voice gateway for a call. Rejections come back as results, never thrown. */
  async initiate(lead: Lead): Promise<CallInitiationResult> {
    if (!lead.phone || !lead.phone.trim()) {
      return { success: false, error: MISSING_PHONE_ERROR };
    }
    try {
      return await this.deps.gateway.initiate(lead);
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Record a placed call on the lead, retrying transient store errors.
   * Overwrites externalCallId from any earlier attempt.
   */
  async markInitiated(leadId: string, callId: string, status: CallStatus = "initiated"): Promise<void> {
    await withRetry(
      () =>
        this.deps.repository.updateFields(leadId, {
          callStatus: status,
          externalCallId: callId,
          lastCallAt: this.clock(),
          lastError: null,
        }),
      {
        ...this.deps.persistRetry,
        onError: (error, attempt) =>
          this.deps.log.warn("Lead write failed, retrying", {
            leadId,
            attempt,
            error: errorMessage(error),
          }),
      }
    );

    this.deps.events.publish({ type: "CALL_STARTED", leadId, data: { callId, callStatus: status } });
  }
}
