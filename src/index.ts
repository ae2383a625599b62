/**
 * Library entry point
 */

export { reviewQuestion, defaultGatewayFactory } from "./services/review-service.js";
export type { GatewayFactory, ReviewQuestionOptions } from "./services/review-service.js";

export {
  ReviewOrchestrator,
  reviewPolicyFromConfig,
  generationSettingsFromConfig,
} from "./orchestrator/review-orchestrator.js";
export type {
  ReviewState,
  ReviewPolicy,
  ReviewOrchestratorDeps,
  RunOptions,
} from "./orchestrator/review-orchestrator.js";

export {
  ReviewError,
  ConfigurationError,
  GenerationError,
  ValidationError,
  ToolError,
  isReviewError,
} from "./orchestrator/errors.js";
export type { ReviewErrorKind, GenerationFailureReason, ValidationIssue } from "./orchestrator/errors.js";

export { scanForPII, detectPII, passesLuhn } from "./utils/pii-scanner.js";
export type { PIIMatch } from "./utils/pii-scanner.js";
export { validateCandidate, normalizeFlags, truncateAtWordBoundary } from "./validators/review-validator.js";
export type { ValidationResult } from "./validators/review-validator.js";
export { mergeFlags } from "./services/flag-merger.js";

export { OpenAIGateway, createOpenAIClient } from "./adapters/llm/openai.js";
export { AnthropicGateway, createAnthropicClient } from "./adapters/llm/anthropic.js";
export { FixturesGateway } from "./adapters/llm/fixtures.js";
export { getGateway, resolveModel } from "./adapters/llm/router.js";
export type { GenerationGateway, GenerationTurn, GenerationStepRequest, ToolCall } from "./adapters/llm/types.js";

export {
  QuestionReviewSchema,
  GenerationOverrides,
  PII_FLAGS,
  ADVISORY_FLAGS,
  REVIEW_FLAGS,
  LIST_CAPS,
  REWRITE_MAX_CHARS,
} from "./schemas/review.js";
export type { QuestionReview, ReviewFlag, PIIFlag, GenerationOverridesT } from "./schemas/review.js";

export { parseConfig, getConfig, assertProviderCredentials } from "./config/index.js";
export type { Config } from "./config/index.js";

export { toErrorV1 } from "./utils/errors.js";
export type { ErrorCode, ErrorV1 } from "./utils/errors.js";
