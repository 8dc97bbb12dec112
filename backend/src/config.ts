// backend/src/config.ts
// Typed runtime configuration parsed from process.env
import { z } from "zod";

export type RetryUnit = "minutes" | "hours";

const DEFAULT_MISSED_KEYWORDS = [
  "no-answer",
  "noanswer",
  "rejected",
  "busy",
  "timeout",
  "cancelled",
  "canceled",
  "unavailable",
  "480",
  "486",
  "487",
];

const DEFAULT_FAILED_KEYWORDS = ["failed", "error", "providerfault", "server-error", "500", "503"];

const DEFAULT_CALLBACK_KEYWORDS = [
  "call back",
  "call me back",
  "callback",
  "call later",
  "call me later",
  "call tomorrow",
  "call me tomorrow",
  "try again later",
  "reach me later",
];

const DEFAULT_EMAIL_BODY =
  "Hi {name},\n\nWe tried reaching you by phone but couldn't get through. " +
  "Reply to this email or let us know a good time to call and we'll get back to you.\n\nThanks!";

function commaList(defaults: string[]) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ""
        ? defaults
        : value
            .split(",")
            .map((item) => item.trim().toLowerCase())
            .filter(Boolean)
    );
}

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
    });
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : null));

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_URL: z.string().default("http://localhost:3000"),
  DASHBOARD_PIN: optionalString,
  WEBHOOK_SECRET: optionalString,

  LEAD_STORE: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: optionalString,
  LEAD_CACHE_TTL_SECONDS: z.coerce.number().min(0).default(5),

  VAPI_API_KEY: optionalString,
  VAPI_BASE_URL: z.string().default("https://api.vapi.ai"),
  VAPI_ASSISTANT_ID: optionalString,
  VAPI_PHONE_NUMBER_ID: optionalString,

  MAX_RETRY_COUNT: z.coerce.number().int().min(0).default(3),
  RETRY_INTERVALS: z
    .string()
    .default("0.5,24")
    .transform((value, ctx) => {
      const ladder = value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
        .map(Number);
      if (ladder.length === 0 || ladder.some((n) => !Number.isFinite(n) || n < 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "RETRY_INTERVALS must be a comma list of non-negative numbers" });
        return z.NEVER;
      }
      return ladder;
    }),
  RETRY_UNITS: z.enum(["minutes", "hours"]).default("hours"),
  ENDED_REASON_MISSED_KEYWORDS: commaList(DEFAULT_MISSED_KEYWORDS),
  ENDED_REASON_FAILED_KEYWORDS: commaList(DEFAULT_FAILED_KEYWORDS),

  ORCHESTRATOR_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  RECONCILIATION_INTERVAL_SECONDS: z.coerce.number().positive().default(300),
  SCHEDULER_MISFIRE_GRACE_SECONDS: z.coerce.number().min(0).default(30),
  SCHEDULER_MAX_WORKERS: z.coerce.number().int().positive().default(3),
  SCHEDULER_INCLUDE_NEW_LEADS: flag(true),
  SCHEDULER_CALL_SPACING_MS: z.coerce.number().int().min(0).default(1000),
  CALL_WINDOW_START: optionalString,
  CALL_WINDOW_END: optionalString,
  CALL_TIMEZONE: z.string().default("Asia/Kolkata"),

  BATCH_DEFAULT_PARALLEL_CALLS: z.coerce.number().int().positive().default(5),
  BATCH_DEFAULT_INTERVAL_SECONDS: z.coerce.number().min(0).default(240),
  BATCH_CALL_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),

  CALLBACK_ENABLED: flag(true),
  CALLBACK_KEYWORDS: commaList(DEFAULT_CALLBACK_KEYWORDS),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_FROM: optionalString,
  WHATSAPP_ENABLE_FALLBACK: flag(true),
  WHATSAPP_TEMPLATE_FALLBACK: optionalString,
  WHATSAPP_LANGUAGE: z.string().default("en"),
  WHATSAPP_DRY_RUN: flag(false),

  EMAIL_DRY_RUN: flag(true),
  GMAIL_ACCESS_TOKEN: optionalString,
  EMAIL_FROM: optionalString,
  EMAIL_REPLY_TO: optionalString,
  EMAIL_SUBJECT: z.string().default("Missed Call Follow-Up Email"),
  EMAIL_TEMPLATE_BODY: z.string().default(DEFAULT_EMAIL_BODY),
  MISSED_CALL_EMAIL_ENABLED: flag(true),
  FOLLOWUP_EMAIL_ENABLED: flag(false),
  FOLLOWUP_EMAIL_SUBJECT: z.string().default("Thanks for speaking with us"),
  EMAIL_INBOUND_ENABLED: flag(false),
  EMAIL_INBOUND_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  EMAIL_INBOUND_QUERY: z.string().default('is:unread subject:"[Lead:"'),
  EMAIL_INBOUND_MAX_RESULTS: z.coerce.number().int().positive().max(500).default(20),
  EMAIL_AUTO_REPLY_ENABLED: flag(false),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4.1"),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  frontendUrl: string;
  dashboardPin: string | null;
  webhookSecret: string | null;
  leadStore: "postgres" | "memory";
  databaseUrl: string | null;
  leadCacheTtlMs: number;
  vapi: {
    apiKey: string | null;
    baseUrl: string;
    assistantId: string | null;
    phoneNumberId: string | null;
  };
  retry: {
    maxRetries: number;
    intervals: number[];
    unit: RetryUnit;
  };
  endedReasonKeywords: {
    missed: string[];
    failed: string[];
  };
  scheduler: {
    orchestratorIntervalMs: number;
    reconciliationIntervalMs: number;
    misfireGraceMs: number;
    maxWorkers: number;
    includeNewLeads: boolean;
    callSpacingMs: number;
    callWindow: { start: string; end: string; timezone: string } | null;
  };
  batch: {
    defaultParallelCalls: number;
    defaultIntervalSeconds: number;
    callTimeoutMs: number;
  };
  callback: {
    enabled: boolean;
    keywords: string[];
  };
  whatsapp: {
    accountSid: string | null;
    authToken: string | null;
    from: string | null;
    enableFallback: boolean;
    template: string | null;
    language: string;
    dryRun: boolean;
  };
  email: {
    dryRun: boolean;
    accessToken: string | null;
    from: string | null;
    replyTo: string | null;
    subject: string;
    bodyTemplate: string;
    missedCallEnabled: boolean;
    followUpEnabled: boolean;
    followUpSubject: string;
  };
  emailInbound: {
    enabled: boolean;
    intervalMs: number;
    query: string;
    maxResults: number;
    autoReply: boolean;
  };
  openai: {
    apiKey: string | null;
    model: string;
  };
}

/**
 * Parse environment variables into a typed config.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const callWindow =
    parsed.CALL_WINDOW_START && parsed.CALL_WINDOW_END
      ? { start: parsed.CALL_WINDOW_START, end: parsed.CALL_WINDOW_END, timezone: parsed.CALL_TIMEZONE }
      : null;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    frontendUrl: parsed.FRONTEND_URL,
    dashboardPin: parsed.DASHBOARD_PIN,
    webhookSecret: parsed.WEBHOOK_SECRET,
    leadStore: parsed.LEAD_STORE,
    databaseUrl: parsed.DATABASE_URL,
    leadCacheTtlMs: parsed.LEAD_CACHE_TTL_SECONDS * 1000,
    vapi: {
      apiKey: parsed.VAPI_API_KEY,
      baseUrl: parsed.VAPI_BASE_URL.replace(/\/+$/, ""),
      assistantId: parsed.VAPI_ASSISTANT_ID,
      phoneNumberId: parsed.VAPI_PHONE_NUMBER_ID,
    },
    retry: {
      maxRetries: parsed.MAX_RETRY_COUNT,
      intervals: parsed.RETRY_INTERVALS,
      unit: parsed.RETRY_UNITS,
    },
    endedReasonKeywords: {
      missed: parsed.ENDED_REASON_MISSED_KEYWORDS,
      failed: parsed.ENDED_REASON_FAILED_KEYWORDS,
    },
    scheduler: {
      orchestratorIntervalMs: parsed.ORCHESTRATOR_INTERVAL_SECONDS * 1000,
      reconciliationIntervalMs: parsed.RECONCILIATION_INTERVAL_SECONDS * 1000,
      misfireGraceMs: parsed.SCHEDULER_MISFIRE_GRACE_SECONDS * 1000,
      maxWorkers: parsed.SCHEDULER_MAX_WORKERS,
      includeNewLeads: parsed.SCHEDULER_INCLUDE_NEW_LEADS,
      callSpacingMs: parsed.SCHEDULER_CALL_SPACING_MS,
      callWindow,
    },
    batch: {
      defaultParallelCalls: parsed.BATCH_DEFAULT_PARALLEL_CALLS,
      defaultIntervalSeconds: parsed.BATCH_DEFAULT_INTERVAL_SECONDS,
      callTimeoutMs: parsed.BATCH_CALL_TIMEOUT_SECONDS * 1000,
    },
    callback: {
      enabled: parsed.CALLBACK_ENABLED,
      keywords: parsed.CALLBACK_KEYWORDS,
    },
    whatsapp: {
      accountSid: parsed.TWILIO_ACCOUNT_SID,
      authToken: parsed.TWILIO_AUTH_TOKEN,
      from: parsed.TWILIO_WHATSAPP_FROM,
      enableFallback: parsed.WHATSAPP_ENABLE_FALLBACK,
      template: parsed.WHATSAPP_TEMPLATE_FALLBACK,
      language: parsed.WHATSAPP_LANGUAGE,
      dryRun: parsed.WHATSAPP_DRY_RUN,
    },
    email: {
      dryRun: parsed.EMAIL_DRY_RUN,
      accessToken: parsed.GMAIL_ACCESS_TOKEN,
      from: parsed.EMAIL_FROM,
      replyTo: parsed.EMAIL_REPLY_TO,
      subject: parsed.EMAIL_SUBJECT,
      bodyTemplate: parsed.EMAIL_TEMPLATE_BODY,
      missedCallEnabled: parsed.MISSED_CALL_EMAIL_ENABLED,
      followUpEnabled: parsed.FOLLOWUP_EMAIL_ENABLED,
      followUpSubject: parsed.FOLLOWUP_EMAIL_SUBJECT,
    },
    emailInbound: {
      enabled: parsed.EMAIL_INBOUND_ENABLED,
      intervalMs: parsed.EMAIL_INBOUND_INTERVAL_SECONDS * 1000,
      query: parsed.EMAIL_INBOUND_QUERY,
      maxResults: parsed.EMAIL_INBOUND_MAX_RESULTS,
      autoReply: parsed.EMAIL_AUTO_REPLY_ENABLED,
    },
    openai: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.OPENAI_MODEL,
    },
  };
}
