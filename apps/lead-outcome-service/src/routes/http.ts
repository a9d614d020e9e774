import { Request, Response, RequestHandler } from "express";
import { z, ZodError } from "zod";
import { outcomeStageSchema, replyClassificationSchema } from "../db/rows";
import { errorMessage, OutcomeError } from "../errors";

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const transitionBodySchema = z.object({
  stage: outcomeStageSchema,
  notes: z.string().max(2000).nullish(),
  triggered_by: z.string().min(1).default("user"),
});

export const replyBodySchema = z.object({
  reply_body: z.string().min(1),
  sender_email: z.string().email().nullish(),
});

export const overrideBodySchema = z.object({
  classification: replyClassificationSchema,
  overridden_by: z.string().min(1),
});

export const staleSweepBodySchema = z.object({
  days: z.number().int().positive().optional(),
});

export const scoringConfigUpdateSchema = z
  .object({
    weights: z.record(z.number().positive()).optional(),
    thresholds: z
      .object({
        hot: z.number().min(0).max(100),
        warm: z.number().min(0).max(100),
      })
      .partial()
      .optional(),
    updated_by: z.string().min(1).default("user"),
  })
  .refine((body) => body.weights !== undefined || body.thresholds !== undefined, {
    message: "Provide weights and/or thresholds",
  });

export const feedbackBodySchema = z.object({
  outcome: z.string().min(1),
  lead_score: z.number().min(0).max(100),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// ============================================================================
// ERROR MAPPING
// ============================================================================

export interface HttpError {
  status: number;
  body: { error: string; code?: string; details?: unknown };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: { error: "Invalid request", code: "VALIDATION_ERROR", details: error.flatten() },
    };
  }

  if (error instanceof OutcomeError) {
    const status =
      error.code === "NOT_FOUND"
        ? 404
        : error.code === "INVALID_TRANSITION" || error.code === "STAGE_CONFLICT"
          ? 409
          : 500;
    return { status, body: { error: error.message, code: error.code, details: error.details } };
  }

  return { status: 500, body: { error: errorMessage(error) } };
}

/**
 * Wrap an async route so that thrown errors become JSON responses
 */
export function route(
  scope: string,
  handler: (req: Request, res: Response) => Promise<unknown>
): RequestHandler {
  return (req, res) => {
    void handler(req, res).catch((error: unknown) => {
      const { status, body } = toHttpError(error);
      if (status >= 500) {
        console.error(`[${scope}] Error:`, errorMessage(error));
      }
      if (!res.headersSent) {
        res.status(status).json(body);
      }
    });
  };
}
