import cors from "cors";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type {
  CreateSessionResponse,
  ErrorResponse,
  HistoryResponse,
  RefinementResponse
} from "@draftcritic/shared";
import { TargetLengthSchema } from "./config/index.js";
import { InvalidInputError, SessionBusyError, SessionNotFoundError } from "./errors.js";
import type { Logger } from "./logging/index.js";
import type { Orchestrator } from "./orchestrator.js";
import { SessionStore } from "./session.js";

const SettingsSchema = z
  .object({
    targetLength: TargetLengthSchema.optional(),
    temperature: z.number().min(0).max(1).optional(),
    maxTokens: z.number().int().positive().optional(),
    critiqueMaxTokens: z.number().int().positive().optional()
  })
  .strict();

const IterationBodySchema = z.object({
  topic: z.string(),
  settings: SettingsSchema.optional()
});

const RefinementBodySchema = IterationBodySchema.extend({
  refinement: z.object({
    qualityThreshold: z.number(),
    maxIterations: z.number().int()
  })
});

export interface AppDependencies {
  orchestrator: Orchestrator;
  logger: Logger;
  fallbackOnly: boolean;
  sessions?: SessionStore;
  /** express.json() body limit */
  bodyLimit?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function requestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === "string" ? value : "";
}

// body-parser errors carry their own status (400 malformed, 413 too large)
function ownClientStatus(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error) {
    const status: unknown = error.status;
    if (typeof status === "number" && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

function statusFor(error: unknown): number {
  if (error instanceof InvalidInputError || error instanceof z.ZodError) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof SessionBusyError) return 409;
  return ownClientStatus(error) ?? 500;
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return `Invalid payload: ${error.issues.map((issue) => `${issue.path.join(".") || "body"} ${issue.message}`).join("; ")}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}

export function createApp({
  orchestrator,
  logger,
  fallbackOnly,
  sessions = new SessionStore(),
  bodyLimit = "1mb"
}: AppDependencies): Express {
  const app = express();
  app.use(cors());

  app.use((req, res, next) => {
    const id = req.header("x-request-id") || uuidv4();
    res.setHeader("x-request-id", id);
    res.locals.requestId = id;
    next();
  });

  app.use(express.json({ limit: bodyLimit }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, provider: orchestrator.providerName, fallbackOnly });
  });

  app.post("/api/sessions", (_req, res) => {
    const session = sessions.create();
    logger.child(requestId(res)).info("Session created", { session: session.id });
    const body: CreateSessionResponse = { sessionId: session.id };
    res.status(201).json(body);
  });

  app.get("/api/sessions/:id/history", (req, res) => {
    const session = sessions.get(req.params.id);
    const body: HistoryResponse = { sessionId: session.id, phase: session.phase, iterations: session.history };
    res.json(body);
  });

  app.delete("/api/sessions/:id", (req, res) => {
    sessions.delete(req.params.id);
    logger.child(requestId(res)).info("Session ended", { session: req.params.id });
    res.status(204).end();
  });

  app.post(
    "/api/sessions/:id/iterations",
    route(async (req, res) => {
      const session = sessions.get(req.params.id);
      const body = IterationBodySchema.parse(req.body);
      const record = await orchestrator.runIteration(session, body.topic, body.settings, logger.child(requestId(res)));
      return res.status(201).json(record);
    })
  );

  app.post(
    "/api/sessions/:id/refinements",
    route(async (req, res) => {
      const session = sessions.get(req.params.id);
      const body = RefinementBodySchema.parse(req.body);
      const outcome = await orchestrator.refine(
        session,
        body.topic,
        body.settings ?? {},
        body.refinement,
        logger.child(requestId(res))
      );
      const response: RefinementResponse = outcome;
      return res.status(201).json(response);
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(error);
    const id = requestId(res);
    const log = logger.child(id);
    if (status === 500) {
      log.error("Request failed", { message: describeError(error) });
    } else {
      log.info("Request rejected", { status, message: describeError(error) });
    }
    const body: ErrorResponse = { error: describeError(error), requestId: id };
    res.status(status).json(body);
  });

  return app;
}
