// backend/src/container.ts
// Builds the service graph once at startup and owns its lifecycle

import { CallbackScheduler } from "./callbackScheduler";
import { CallPlacer } from "./callPlacer";
import { CallStatusMachine } from "./callStatusMachine";
import type { AppConfig } from "./config";
import type { Database } from "./db";
import { ensureSchema, PgDatabase, testDatabaseConnection } from "./db";
import type { EventBus } from "./eventBus";
import { eventBus } from "./eventBus";
import { EmailInboundPoller } from "./emailInboundPoller";
import { FallbackSequencer } from "./fallbackSequencer";
import { GmailEmailClient } from "./gateways/gmailEmailClient";
import { TwilioWhatsAppClient } from "./gateways/twilioWhatsAppClient";
import type { EmailGateway, EmailInbox, VoiceGateway, WhatsAppGateway } from "./gateways/types";
import { VapiClient } from "./gateways/vapiClient";
import { createLogger } from "./logging";
import { OrchestrationScheduler } from "./orchestrationScheduler";
import { PeriodicJobRunner } from "./periodicJobs";
import { ReconciliationSweeper } from "./reconciliationSweeper";
import { CachedLeadRepository } from "./repository/cachedLeadRepository";
import { InMemoryConversationLog, InMemoryLeadRepository } from "./repository/inMemoryLeadRepository";
import { PgConversationLog, PgLeadRepository } from "./repository/pgLeadRepository";
import type { ConversationLog, LeadRepository } from "./repository/types";
import { RetryPolicy } from "./retryPolicy";
import { BatchCallWorker } from "./services/batchCallWorker";
import { FollowUpWriter, openAiCompleter } from "./services/followUpWriter";
import type { ChatCompleter } from "./services/followUpWriter";
import type { RetryOptions } from "./withRetry";

export interface ServiceOverrides {
  repository?: LeadRepository;
  conversations?: ConversationLog;
  voice?: VoiceGateway;
  whatsapp?: WhatsAppGateway;
  email?: EmailGateway;
  inbox?: EmailInbox;
  completer?: ChatCompleter | null;
  events?: EventBus;
  persistRetry?: RetryOptions;
  clock?: () => Date;
}

export interface Services {
  config: AppConfig;
  repository: LeadRepository;
  conversations: ConversationLog;
  policy: RetryPolicy;
  voice: VoiceGateway;
  fallback: FallbackSequencer;
  placer: CallPlacer;
  callbacks: CallbackScheduler;
  machine: CallStatusMachine;
  scheduler: OrchestrationScheduler;
  reconciliation: ReconciliationSweeper;
  inbound: EmailInboundPoller;
  jobs: PeriodicJobRunner;
  batch: BatchCallWorker;
  events: EventBus;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const ORCHESTRATION_JOB = "orchestration-sweep";
export const RECONCILIATION_JOB = "reconciliation-sweep";
export const EMAIL_INBOUND_JOB = "email-inbound-poll";

function buildStores(config: AppConfig): { repository: LeadRepository; conversations: ConversationLog; db: PgDatabase | null } {
  if (config.leadStore === "memory") {
    return { repository: new InMemoryLeadRepository(), conversations: new InMemoryConversationLog(), db: null };
  }
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not set (or use LEAD_STORE=memory)");
  }
  const db = new PgDatabase(config.databaseUrl, createLogger({ service: "db" }));
  return {
    repository: new PgLeadRepository(db, createLogger({ service: "lead-repository" })),
    conversations: new PgConversationLog(db),
    db,
  };
}

export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const events = overrides.events ?? eventBus;
  const clock = overrides.clock;
  const persistRetry = overrides.persistRetry;

  const stores =
    overrides.repository && overrides.conversations
      ? { repository: overrides.repository, conversations: overrides.conversations, db: null }
      : buildStores(config);
  const db: Database | null = stores.db;

  const repository = new CachedLeadRepository(
    stores.repository,
    config.leadCacheTtlMs,
    createLogger({ service: "lead-cache" })
  );
  const conversations = stores.conversations;
  const policy = new RetryPolicy(config.retry);

  const voice =
    overrides.voice ??
    new VapiClient(
      { ...config.vapi, clock },
      createLogger({ service: "vapi" })
    );
  const whatsapp =
    overrides.whatsapp ??
    new TwilioWhatsAppClient(
      {
        accountSid: config.whatsapp.accountSid,
        authToken: config.whatsapp.authToken,
        from: config.whatsapp.from,
        dryRun: config.whatsapp.dryRun,
      },
      createLogger({ service: "whatsapp" })
    );
  const gmail = new GmailEmailClient(
    {
      accessToken: config.email.accessToken,
      from: config.email.from,
      replyTo: config.email.replyTo,
      dryRun: config.email.dryRun,
    },
    createLogger({ service: "email" })
  );
  const email = overrides.email ?? gmail;
  const inbox = overrides.inbox ?? gmail;

  const completer =
    overrides.completer !== undefined
      ? overrides.completer
      : config.openai.apiKey
        ? openAiCompleter(config.openai.apiKey, config.openai.model)
        : null;
  const followUpWriter = new FollowUpWriter(completer, createLogger({ service: "follow-up-writer" }));

  const fallback = new FallbackSequencer(
    { whatsapp: config.whatsapp, email: config.email },
    {
      repository,
      conversations,
      whatsapp,
      email,
      followUpWriter,
      events,
      log: createLogger({ service: "fallback" }),
      persistRetry,
      clock,
    }
  );

  const placer = new CallPlacer({
    gateway: voice,
    repository,
    events,
    log: createLogger({ service: "call-placer" }),
    persistRetry,
    clock,
  });

  const callbacks = new CallbackScheduler({
    repository,
    placer,
    events,
    log: createLogger({ service: "callbacks" }),
    clock,
  });

  const machine = new CallStatusMachine(
    { endedReasonKeywords: config.endedReasonKeywords, callback: config.callback },
    {
      repository,
      conversations,
      gateway: voice,
      policy,
      fallback,
      callbacks,
      events,
      log: createLogger({ service: "call-status" }),
      persistRetry,
      clock,
    }
  );

  const scheduler = new OrchestrationScheduler(
    {
      includeNewLeads: config.scheduler.includeNewLeads,
      callSpacingMs: config.scheduler.callSpacingMs,
      callWindow: config.scheduler.callWindow,
    },
    { repository, placer, log: createLogger({ service: "orchestrator" }), clock }
  );

  const reconciliation = new ReconciliationSweeper({
    repository,
    gateway: voice,
    machine,
    events,
    log: createLogger({ service: "reconciliation" }),
    persistRetry,
  });

  const inbound = new EmailInboundPoller(
    { query: config.emailInbound.query, maxResults: config.emailInbound.maxResults, autoReply: config.emailInbound.autoReply },
    {
      inbox,
      email,
      repository,
      conversations,
      followUpWriter,
      events,
      log: createLogger({ service: "email-inbound" }),
      persistRetry,
      clock,
    }
  );

  const jobs = new PeriodicJobRunner(
    { misfireGraceMs: config.scheduler.misfireGraceMs, maxWorkers: config.scheduler.maxWorkers },
    createLogger({ service: "jobs" })
  );
  jobs.register({
    name: ORCHESTRATION_JOB,
    intervalMs: config.scheduler.orchestratorIntervalMs,
    run: () => scheduler.sweep(),
  });
  jobs.register({
    name: RECONCILIATION_JOB,
    intervalMs: config.scheduler.reconciliationIntervalMs,
    run: () => reconciliation.sweep(),
  });
  if (config.emailInbound.enabled) {
    jobs.register({
      name: EMAIL_INBOUND_JOB,
      intervalMs: config.emailInbound.intervalMs,
      run: () => inbound.poll(),
    });
  }

  const batch = new BatchCallWorker(
    { callTimeoutMs: config.batch.callTimeoutMs },
    { repository, placer, events, log: createLogger({ service: "batch" }), clock }
  );

  const log = createLogger({ service: "services" });

  return {
    config,
    repository,
    conversations,
    policy,
    voice,
    fallback,
    placer,
    callbacks,
    machine,
    scheduler,
    reconciliation,
    inbound,
    jobs,
    batch,
    events,
    async start() {
      if (db) {
        if (!(await testDatabaseConnection(db, log))) {
          throw new Error("Database connection failed");
        }
        await ensureSchema(db);
      }
      const restored = await callbacks.restore();
      if (restored > 0) {
        log.info("Restored pending callbacks", { count: restored });
      }
      jobs.start();
    },
    async stop() {
      await batch.stop();
      await jobs.stop();
      await callbacks.stop();
      if (stores.db) {
        await stores.db.end();
      }
    },
  };
}
