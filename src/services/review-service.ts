/**
 * Review service
 *
 * Entry point shared by the HTTP route, the CLI and library callers: builds
 * a fresh orchestrator for one question and runs it.
 */

import type { Config } from "../config/index.js";
import { getGateway } from "../adapters/llm/router.js";
import type { GenerationGateway } from "../adapters/llm/types.js";
import {
  ReviewOrchestrator,
  generationSettingsFromConfig,
  reviewPolicyFromConfig,
} from "../orchestrator/review-orchestrator.js";
import { buildReviewQuestionRequest, type GenerationOverridesT, type QuestionReview } from "../schemas/review.js";

/**
 * Resolve the gateway for a request, given an optional model override.
 */
export type GatewayFactory = (modelOverride?: string) => GenerationGateway;

export function defaultGatewayFactory(cfg: Config): GatewayFactory {
  return (modelOverride) => getGateway(cfg, modelOverride);
}

export interface ReviewQuestionOptions {
  config: Config;
  gatewayFor?: GatewayFactory;
  overrides?: GenerationOverridesT;
  requestId?: string;
  signal?: AbortSignal;
}

/**
 * Review one question with a new orchestrator instance.
 *
 * The question is trimmed and checked against `review.maxQuestionChars`
 * before any generation call.
 *
 * @throws ZodError when the question is blank or too long
 */
export async function reviewQuestion(question: string, opts: ReviewQuestionOptions): Promise<QuestionReview> {
  const { config, overrides = {} } = opts;
  const request = buildReviewQuestionRequest(config.review.maxQuestionChars).parse({ question });
  const gatewayFor = opts.gatewayFor ?? defaultGatewayFactory(config);

  const orchestrator = new ReviewOrchestrator({
    gateway: gatewayFor(overrides.model),
    settings: generationSettingsFromConfig(config, overrides),
    policy: reviewPolicyFromConfig(config),
  });

  return orchestrator.run(request.question, {
    ...(opts.requestId ? { requestId: opts.requestId } : {}),
    ...(opts.signal ? { signal: opts.signal } : {}),
  });
}
