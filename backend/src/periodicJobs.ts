// backend/src/periodicJobs.ts
// Fixed-interval background jobs with single-instance runs and a misfire grace window

import type { Logger } from "./logging";
import { errorMessage } from "./logging";

export interface PeriodicJobDefinition {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  runOnStart?: boolean;
}

export interface PeriodicJobRunnerOptions {
  misfireGraceMs: number;
  maxWorkers: number;
}

export interface PeriodicJobStatus {
  name: string;
  intervalMs: number;
  running: boolean;
  runs: number;
  skipped: number;
  misfires: number;
  lastRunAt: string | null;
  lastError: string | null;
}

interface JobState {
  definition: PeriodicJobDefinition;
  timer: NodeJS.Timeout | null;
  nextRunAt: number;
  inFlight: Promise<void> | null;
  runs: number;
  skipped: number;
  misfires: number;
  lastRunAt: number | null;
  lastError: string | null;
}

export class PeriodicJobRunner {
  private readonly jobs = new Map<string, JobState>();
  private activeRuns = 0;
  private started = false;

  constructor(
    private readonly options: PeriodicJobRunnerOptions,
    private readonly log: Logger,
    private readonly clock: () => number = Date.now
  ) {}

  register(definition: PeriodicJobDefinition): void {
    if (this.jobs.has(definition.name)) {
      throw new Error(`Job ${definition.name} is already registered`);
    }
    this.jobs.set(definition.name, {
      definition,
      timer: null,
      nextRunAt: 0,
      inFlight: null,
      runs: 0,
      skipped: 0,
      misfires: 0,
      lastRunAt: null,
      lastError: null,
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const state of this.jobs.values()) {
      this.arm(state, state.definition.runOnStart ? 0 : state.definition.intervalMs);
    }
    this.log.info("Periodic jobs started", { jobs: [...this.jobs.keys()] });
  }

  /** Stop scheduling and wait for in-flight runs to finish. */
  async stop(): Promise<void> {
    this.started = false;
    const pending: Promise<void>[] = [];
    for (const state of this.jobs.values()) {
      if (state.timer) clearTimeout(state.timer);
      state.timer = null;
      if (state.inFlight) pending.push(state.inFlight);
    }
    await Promise.all(pending);
    this.log.info("Periodic jobs stopped");
  }

  /** Run a job now unless it is already running; returns the run (or the one in flight). */
  trigger(name: string): Promise<void> {
    const state = this.jobs.get(name);
    if (!state) {
      return Promise.reject(new Error(`Unknown job ${name}`));
    }
    return state.inFlight ?? this.execute(state);
  }

  status(): PeriodicJobStatus[] {
    return [...this.jobs.values()].map((state) => ({
      name: state.definition.name,
      intervalMs: state.definition.intervalMs,
      running: state.inFlight !== null,
      runs: state.runs,
      skipped: state.skipped,
      misfires: state.misfires,
      lastRunAt: state.lastRunAt ? new Date(state.lastRunAt).toISOString() : null,
      lastError: state.lastError,
    }));
  }

  private arm(state: JobState, delayMs: number): void {
    state.nextRunAt = this.clock() + delayMs;
    state.timer = setTimeout(() => this.tick(state), delayMs);
  }

  private tick(state: JobState): void {
    if (!this.started) return;
    const scheduledAt = state.nextRunAt;
    this.arm(state, state.definition.intervalMs);

    const name = state.definition.name;
    const lateness = this.clock() - scheduledAt;
    if (lateness > this.options.misfireGraceMs) {
      state.misfires++;
      this.log.warn("Job run missed its grace window, skipping", { job: name, latenessMs: lateness });
      return;
    }
    if (state.inFlight) {
      state.skipped++;
      this.log.warn("Previous run still in flight, skipping", { job: name });
      return;
    }
    if (this.activeRuns >= this.options.maxWorkers) {
      state.skipped++;
      this.log.warn("All job workers busy, skipping", { job: name, maxWorkers: this.options.maxWorkers });
      return;
    }

    void this.execute(state);
  }

  private execute(state: JobState): Promise<void> {
    const name = state.definition.name;
    this.activeRuns++;
    const startedAt = this.clock();

    const run = Promise.resolve()
      .then(() => state.definition.run())
      .then(() => {
        state.lastError = null;
      })
      .catch((error) => {
        state.lastError = errorMessage(error);
        this.log.error("Job run failed", { job: name, error: state.lastError });
      })
      .finally(() => {
        this.activeRuns--;
        state.runs++;
        state.lastRunAt = startedAt;
        state.inFlight = null;
      });

    state.inFlight = run;
    return run;
  }
}
