/**
 * POST /assist/v1/review-question
 *
 * Reviews a single question and returns the QuestionReview record. Failures
 * propagate to the central error handler, which renders error.v1.
 */

import type { FastifyInstance } from "fastify";
import type { Config } from "../config/index.js";
import { buildReviewQuestionRequest } from "../schemas/review.js";
import { reviewQuestion, type GatewayFactory } from "../services/review-service.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";

export interface ReviewQuestionRouteOptions {
  config: Config;
  gatewayFor: GatewayFactory;
}

export default async function route(app: FastifyInstance, opts: ReviewQuestionRouteOptions) {
  const { config, gatewayFor } = opts;
  const RequestSchema = buildReviewQuestionRequest(config.review.maxQuestionChars);

  app.post("/assist/v1/review-question", async (req, reply) => {
    const parsed = RequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send(zodErrorToErrorV1(parsed.error, req.id));
    }

    const { question, options } = parsed.data;
    const start = Date.now();

    // Whole-request deadline: aborting takes the orchestrator's cancellation path
    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), config.review.deadlineMs);

    try {
      const review = await reviewQuestion(question, {
        config,
        gatewayFor,
        ...(options ? { overrides: options } : {}),
        requestId: req.id,
        signal: controller.signal,
      });

      log.info(
        {
          request_id: req.id,
          question_chars: question.length,
          flags: review.flags,
          latency_ms: Date.now() - start,
        },
        "Question reviewed"
      );
      return reply.send(review);
    } finally {
      clearTimeout(deadline);
    }
  });
}
