import { randomUUID } from "crypto";
import type { CallPlacer } from "../callPlacer";
import type { EventBus } from "../eventBus";
import type { CallInitiationResult } from "../gateways/types";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";
import type { LeadRepository } from "../repository/types";
import { sleep, withTimeout } from "../withRetry";

export type BatchJobStatus = "running" | "completed" | "failed" | "cancelled";

export interface BatchJobRequest {
  leadIds: string[];
  parallelCalls: number;
  intervalSeconds: number;
}

export interface BatchJobSnapshot {
  jobId: string;
  status: BatchJobStatus;
  totalLeads: number;
  parallelCalls: number;
  intervalSeconds: number;
  currentBatch: number;
  totalBatches: number;
  initiated: number;
  succeeded: number;
  failed: number;
  progressPercent: number;
  startedAt: string;
  completedAt: string | null;
  nextBatchAt: string | null;
  currentBatchLeads: string[];
  errors: string[];
}

export interface BatchCallWorkerConfig {
  callTimeoutMs: number;
  maxErrors?: number;
}

export interface BatchCallWorkerDeps {
  repository: LeadRepository;
  placer: CallPlacer;
  events: EventBus;
  log: Logger;
  clock?: () => Date;
  newJobId?: () => string;
}

const DEFAULT_MAX_ERRORS = 10;

export function partition<T>(items: T[], size: number): T[][] {
  if (size < 1) {
    throw new Error("Batch size must be at least 1");
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Progress for one job. All mutation goes through these methods; the event loop
 * serializes them, and snapshot() hands out copies.
 */
class BatchJob {
  status: BatchJobStatus = "running";
  currentBatch = 0;
  initiated = 0;
  succeeded = 0;
  failed = 0;
  completedAt: Date | null = null;
  nextBatchAt: Date | null = null;
  currentBatchLeads: string[] = [];
  done: Promise<void> = Promise.resolve();
  /** Initiations that outlived their timeout and may still place a call. */
  readonly lateCalls: Promise<void>[] = [];
  readonly totalBatches: number;
  private readonly errors: string[] = [];
  private readonly controller = new AbortController();

  constructor(
    readonly jobId: string,
    readonly leadIds: string[],
    readonly parallelCalls: number,
    readonly intervalSeconds: number,
    readonly startedAt: Date,
    private readonly maxErrors: number
  ) {
    this.totalBatches = Math.ceil(leadIds.length / parallelCalls);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.status === "cancelled";
  }

  cancel(): boolean {
    if (this.status !== "running") return false;
    this.status = "cancelled";
    this.controller.abort();
    return true;
  }

  recordError(message: string): void {
    this.errors.push(message);
    if (this.errors.length > this.maxErrors) {
      this.errors.splice(0, this.errors.length - this.maxErrors);
    }
  }

  recordFailure(leadId: string, message: string): void {
    this.failed++;
    this.recordError(`${leadId}: ${message}`);
  }

  snapshot(): BatchJobSnapshot {
    const total = this.leadIds.length;
    const processed = this.succeeded + this.failed;
    return {
      jobId: this.jobId,
      status: this.status,
      totalLeads: total,
      parallelCalls: this.parallelCalls,
      intervalSeconds: this.intervalSeconds,
      currentBatch: this.currentBatch,
      totalBatches: this.totalBatches,
      initiated: this.initiated,
      succeeded: this.succeeded,
      failed: this.failed,
      progressPercent: total > 0 ? Math.round((processed / total) * 100) : 100,
      startedAt: this.startedAt.toISOString(),
      completedAt: this.completedAt ? this.completedAt.toISOString() : null,
      nextBatchAt: this.nextBatchAt ? this.nextBatchAt.toISOString() : null,
      currentBatchLeads: [...this.currentBatchLeads],
      errors: [...this.errors],
    };
  }
}

/**
 * Paced batch campaigns: leads are split into batches of `parallelCalls`,
 * each batch dials concurrently, and the worker waits `intervalSeconds`
 * between batches. Only one job is active at a time.
 */
export class BatchCallWorker {
  private readonly jobs = new Map<string, BatchJob>();
  private activeJobId: string | null = null;
  private readonly clock: () => Date;
  private readonly newJobId: () => string;

  constructor(private readonly config: BatchCallWorkerConfig, private readonly deps: BatchCallWorkerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.newJobId = deps.newJobId ?? randomUUID;
  }

  start(request: BatchJobRequest): BatchJobSnapshot {
    if (request.leadIds.length === 0) {
      throw new Error("leadIds must not be empty");
    }
    if (!Number.isInteger(request.parallelCalls) || request.parallelCalls < 1) {
      throw new Error("parallelCalls must be a positive integer");
    }
    if (request.intervalSeconds < 0) {
      throw new Error("intervalSeconds must not be negative");
    }

    if (this.activeJobId) {
      const previous = this.jobs.get(this.activeJobId);
      if (previous?.cancel()) {
        this.deps.log.info("[BATCH] Cancelling previous job for new start", { jobId: previous.jobId });
      }
    }

    const job = new BatchJob(
      this.newJobId(),
      [...request.leadIds],
      request.parallelCalls,
      request.intervalSeconds,
      this.clock(),
      this.config.maxErrors ?? DEFAULT_MAX_ERRORS
    );
    this.jobs.set(job.jobId, job);
    this.activeJobId = job.jobId;

    this.deps.log.info("[BATCH START]", {
      jobId: job.jobId,
      totalLeads: job.leadIds.length,
      parallelCalls: job.parallelCalls,
      intervalSeconds: job.intervalSeconds,
      totalBatches: job.totalBatches,
    });
    this.publish("BATCH_STARTED", job);

    job.done = this.run(job).catch((error) => {
      job.status = "failed";
      job.completedAt = this.clock();
      job.recordError(`job: ${errorMessage(error)}`);
      this.deps.log.error("[BATCH] Fatal error in batch sequence", { jobId: job.jobId, error: errorMessage(error) });
    });

    return job.snapshot();
  }

  /** Snapshot of a job, or of the active one when `jobId` is "active". */
  getStatus(jobId: string): BatchJobSnapshot | null {
    const id = jobId === "active" ? this.activeJobId : jobId;
    const job = id ? this.jobs.get(id) : undefined;
    return job ? job.snapshot() : null;
  }

  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId === "active" && this.activeJobId ? this.activeJobId : jobId);
    if (!job) return false;
    const cancelled = job.cancel();
    if (cancelled) {
      this.deps.log.info("[BATCH] Cancel requested", { jobId: job.jobId });
    }
    return cancelled;
  }

  /** Resolves once the job's run loop has exited and every timed-out initiation has settled. */
  async waitFor(jobId: string): Promise<BatchJobSnapshot | null> {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    await job.done;
    await Promise.all(job.lateCalls);
    return job.snapshot();
  }

  async stop(): Promise<void> {
    const running = [...this.jobs.values()].filter((job) => job.status === "running");
    for (const job of running) {
      job.cancel();
    }
    await Promise.all(running.map((job) => job.done));
  }

  private async run(job: BatchJob): Promise<void> {
    const batches = partition(job.leadIds, job.parallelCalls);

    for (const [index, batch] of batches.entries()) {
      if (job.isCancelled) break;

      job.currentBatch = index + 1;
      job.currentBatchLeads = batch;
      this.deps.log.info("[BATCH] Starting batch", { jobId: job.jobId, batch: job.currentBatch, size: batch.length });

      await Promise.all(batch.map((leadId) => this.runCall(job, leadId)));
      this.publish("BATCH_PROGRESS", job);

      const isLast = index === batches.length - 1;
      if (!isLast && !job.isCancelled && job.intervalSeconds > 0) {
        const waitMs = job.intervalSeconds * 1000;
        job.nextBatchAt = new Date(this.clock().getTime() + waitMs);
        this.deps.log.info("[RATE LIMIT] Waiting before next batch", { jobId: job.jobId, waitMs });
        await sleep(waitMs, job.signal);
        job.nextBatchAt = null;
      }
    }

    job.completedAt = this.clock();
    job.currentBatchLeads = [];
    if (job.isCancelled) {
      this.deps.log.info("[BATCH] Cancelled", { jobId: job.jobId, ...this.counters(job) });
      this.publish("BATCH_CANCELLED", job);
    } else {
      job.status = "completed";
      this.deps.log.info("[BATCH] Completed", { jobId: job.jobId, ...this.counters(job) });
      this.publish("BATCH_COMPLETED", job);
    }

    if (this.activeJobId === job.jobId) {
      this.activeJobId = null;
    }
  }

  private async runCall(job: BatchJob, leadId: string): Promise<void> {
    if (job.isCancelled) return;
    job.initiated++;

    const pending = this.initiate(leadId);
    let result: CallInitiationResult;
    try {
      result = await withTimeout(
        pending,
        this.config.callTimeoutMs,
        `call initiation timed out after ${this.config.callTimeoutMs}ms`
      );
    } catch (error) {
      job.recordFailure(leadId, errorMessage(error));
      job.lateCalls.push(this.settleLateCall(job, leadId, pending));
      return;
    }

    if (!result.success) {
      this.deps.log.warn("[CALL FAILED]", { jobId: job.jobId, leadId, error: result.error });
      job.recordFailure(leadId, result.error);
      return;
    }

    // Placement and bookkeeping fail independently: the call counts once placed.
    job.succeeded++;
    try {
      await this.deps.placer.markInitiated(leadId, result.id);
    } catch (error) {
      job.recordError(`${leadId}: call ${result.id} placed but lead update failed: ${errorMessage(error)}`);
      this.deps.log.error("[BATCH] Lead update failed after call placement", {
        jobId: job.jobId,
        leadId,
        callId: result.id,
        error: errorMessage(error),
      });
    }
  }

  // A timed-out initiation can still dial; the lead must not stay "pending" behind a live call.
  private async settleLateCall(job: BatchJob, leadId: string, pending: Promise<CallInitiationResult>): Promise<void> {
    const late = await pending;
    if (!late.success) return;
    job.recordError(`${leadId}: call ${late.id} placed after timeout`);
    this.deps.log.warn("[BATCH] Call placed after initiation timeout", { jobId: job.jobId, leadId, callId: late.id });
    try {
      await this.deps.placer.markInitiated(leadId, late.id);
    } catch (error) {
      job.recordError(`${leadId}: call ${late.id} placed but lead update failed: ${errorMessage(error)}`);
      this.deps.log.error("[BATCH] Lead update failed after late call placement", {
        jobId: job.jobId,
        leadId,
        callId: late.id,
        error: errorMessage(error),
      });
    }
  }

  private async initiate(leadId: string): Promise<CallInitiationResult> {
    try {
      const lead = await this.deps.repository.getById(leadId);
      if (!lead) {
        return { success: false, error: "lead not found" };
      }
      return await this.deps.placer.initiate(lead);
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  private counters(job: BatchJob) {
    return { initiated: job.initiated, succeeded: job.succeeded, failed: job.failed };
  }

  private publish(type: "BATCH_STARTED" | "BATCH_PROGRESS" | "BATCH_COMPLETED" | "BATCH_CANCELLED", job: BatchJob) {
    const snapshot = job.snapshot();
    this.deps.events.publish({
      type,
      data: {
        batchJobId: snapshot.jobId,
        currentBatch: snapshot.currentBatch,
        totalBatches: snapshot.totalBatches,
        initiated: snapshot.initiated,
        succeeded: snapshot.succeeded,
        failed: snapshot.failed,
        progressPercent: snapshot.progressPercent,
      },
    });
  }
}
