// backend/src/app.ts
import express, { Request, Response } from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { Services } from "./container";
import { ApiError, sendError } from "./errors";
import type { SSEEvent } from "./eventBus";
import { createLogger } from "./logging";
import { pinAuthMiddleware } from "./middleware/pinAuth";
import { buildLead } from "./types/lead";

const batchStartSchema = z.object({
  leadIds: z.array(z.string().min(1)).min(1),
  parallelCalls: z.number().int().positive().optional(),
  intervalSeconds: z.number().min(0).optional(),
});

const leadIntakeSchema = z.object({
  id: z.string().uuid().optional(),
  phone: z.string().trim().min(1, "phone is required"),
  displayName: z.string().trim().default(""),
  email: z.string().email().nullish(),
  whatsappPhone: z.string().trim().min(1).nullish(),
  partnerTag: z.string().trim().min(1).nullish(),
});

export function createApp(services: Services) {
  const { config } = services;
  const log = createLogger({ service: "http" });
  const app = express();

  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: true,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "x-dashboard-pin"],
    })
  );
  app.use(express.json({ limit: "2mb" }));

  const requirePin = pinAuthMiddleware(config.dashboardPin);

  // Health check route - must NOT depend on the voice platform or the store
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, jobs: services.jobs.status() });
  });

  // SSE endpoint for real-time updates
  app.get("/events", (req: Request, res: Response) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");

    res.write(`data: ${JSON.stringify({ type: "connected", message: "SSE connection established" })}\n\n`);

    const sendEvent = (event: SSEEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };
    services.events.on("event", sendEvent);

    req.on("close", () => {
      services.events.removeListener("event", sendEvent);
      res.end();
    });
  });

  // Voice platform webhook. Answers 200 for anything it cannot act on so the platform stops redelivering.
  app.post("/webhook/voice", async (req: Request, res: Response) => {
    if (config.webhookSecret && req.headers["x-vapi-secret"] !== config.webhookSecret) {
      return res.status(401).json({ ok: false, error: "Invalid webhook secret" });
    }
    try {
      const outcome = await services.machine.handleEvent(req.body);
      res.json({ ok: true, ...outcome });
    } catch (error) {
      sendError(res, error, "Failed to process webhook event", log);
    }
  });

  app.post("/batch/start", requirePin, async (req: Request, res: Response) => {
    try {
      const body = batchStartSchema.parse(req.body);
      const snapshot = services.batch.start({
        leadIds: body.leadIds,
        parallelCalls: body.parallelCalls ?? config.batch.defaultParallelCalls,
        intervalSeconds: body.intervalSeconds ?? config.batch.defaultIntervalSeconds,
      });
      res.json({ ok: true, message: "Batch call job started", jobId: snapshot.jobId, job: snapshot });
    } catch (error) {
      sendError(res, error, "Failed to start batch call job", log);
    }
  });

  app.get("/batch/status/:jobId", requirePin, (req: Request, res: Response) => {
    const snapshot = services.batch.getStatus(req.params.jobId);
    if (!snapshot) {
      return res.status(404).json({ ok: false, error: "Batch job not found" });
    }
    res.json({ ok: true, job: snapshot });
  });

  app.post("/batch/cancel/:jobId", requirePin, (req: Request, res: Response) => {
    const cancelled = services.batch.cancel(req.params.jobId);
    res.json({ ok: true, cancelled, job: services.batch.getStatus(req.params.jobId) });
  });

  app.post("/leads", requirePin, async (req: Request, res: Response) => {
    try {
      const body = leadIntakeSchema.parse(req.body);
      const lead = buildLead(
        {
          id: body.id,
          phone: body.phone,
          displayName: body.displayName,
          email: body.email ?? null,
          whatsappPhone: body.whatsappPhone ?? null,
          partnerTag: body.partnerTag ?? null,
        },
        randomUUID()
      );
      await services.repository.append(lead);
      res.status(201).json({ ok: true, lead });
    } catch (error) {
      sendError(res, error, "Failed to create lead", log);
    }
  });

  app.get("/leads/:id", requirePin, async (req: Request, res: Response) => {
    try {
      const lead = await services.repository.getById(req.params.id);
      if (!lead) {
        throw new ApiError(404, "Lead not found");
      }
      const conversations = await services.conversations.listByLead(lead.id);
      res.json({ ok: true, lead, conversations });
    } catch (error) {
      sendError(res, error, "Failed to load lead", log);
    }
  });

  app.post("/leads/:id/call", requirePin, async (req: Request, res: Response) => {
    try {
      const lead = await services.repository.getById(req.params.id);
      if (!lead) {
        throw new ApiError(404, "Lead not found");
      }
      const result = await services.scheduler.callLead(lead);
      if (!result.ok) {
        throw new ApiError(502, "Call could not be placed", { reason: result.error });
      }
      res.json({ ok: true, callId: result.callId });
    } catch (error) {
      sendError(res, error, "Failed to place call", log);
    }
  });

  app.delete("/leads/:id", requirePin, async (req: Request, res: Response) => {
    try {
      const deleted = await services.repository.delete(req.params.id);
      if (!deleted) {
        throw new ApiError(404, "Lead not found");
      }
      services.callbacks.cancel(req.params.id);
      res.json({ ok: true, deleted });
    } catch (error) {
      sendError(res, error, "Failed to delete lead", log);
    }
  });

  app.get("/retry-config", requirePin, (_req: Request, res: Response) => {
    res.json({ ok: true, retry: services.policy.describe() });
  });

  return app;
}
