// backend/src/eventBus.ts
import { EventEmitter } from "events";
import type { CallStatus } from "./types/lead";

// Event types
export type EventType =
  | "CALL_STARTED"
  | "LEAD_UPDATED"
  | "FALLBACK_SENT"
  | "CALLBACK_SCHEDULED"
  | "EMAIL_RECEIVED"
  | "BATCH_STARTED"
  | "BATCH_PROGRESS"
  | "BATCH_COMPLETED"
  | "BATCH_CANCELLED";

export interface SSEEvent {
  type: EventType;
  leadId?: string;
  data: {
    callStatus?: CallStatus;
    callId?: string;
    channel?: "whatsapp" | "email";
    dryRun?: boolean;
    callbackAt?: string;
    reason?: string;
    // Batch data (for BATCH_* events)
    batchJobId?: string;
    currentBatch?: number;
    totalBatches?: number;
    initiated?: number;
    succeeded?: number;
    failed?: number;
    progressPercent?: number;
  };
}

// Singleton event bus fanned out to SSE clients
export class EventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100); // Allow many SSE connections
  }

  publish(event: SSEEvent): void {
    this.emit("event", event);
  }
}

export const eventBus = new EventBus();
