#!/usr/bin/env node
/**
 * CLI entry point: `question-review`
 *
 * Reviews one question and prints the QuestionReview JSON on stdout.
 * Failures print an error.v1 document on stderr and exit with code 1.
 *
 * Usage:
 *   question-review "Fix this SQL?"
 *   question-review --provider anthropic --compact How do I rotate logs
 *   question-review            # prompts for the question
 */

import { config as loadDotenv } from "dotenv";
import { Command, CommanderError } from "commander";
import { realpathSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { pathToFileURL } from "node:url";

import { assertProviderCredentials, parseConfig, type Config } from "./config/index.js";
import { buildReviewQuestionRequest } from "./schemas/review.js";
import { reviewQuestion, type GatewayFactory } from "./services/review-service.js";
import { toErrorV1 } from "./utils/errors.js";
import { SERVICE_VERSION } from "./version.js";

// =============================================================================
// I/O
// =============================================================================

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Ask the user for a line of input */
  prompt: (query: string) => Promise<string>;
  env: NodeJS.ProcessEnv;
  /** Tests inject scripted gateways */
  gatewayFor?: GatewayFactory;
}

/**
 * Read one line from `input`. End of input before an answer yields "".
 */
export async function promptLine(
  query: string,
  input: NodeJS.ReadableStream = process.stdin,
  // Prompt on stderr so stdout carries only the review document
  output: NodeJS.WritableStream = process.stderr
): Promise<string> {
  const rl = createInterface({ input, output });
  const closed = new AbortController();
  rl.once("close", () => closed.abort());
  try {
    return await rl.question(query, { signal: closed.signal });
  } catch (error) {
    if (closed.signal.aborted) return "";
    throw error;
  } finally {
    rl.close();
  }
}

function processIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    prompt: (query) => promptLine(query),
    env: process.env,
  };
}

interface CliOptions {
  provider?: string;
  model?: string;
  temperature?: string;
  seed?: string;
  compact: boolean;
}

// =============================================================================
// Main
// =============================================================================

/**
 * Run the CLI against `argv` (arguments after the script name).
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  const program = new Command()
    .name("question-review")
    .description("Review a question: classification, scores, missing info, rewrites and PII flags")
    .version(SERVICE_VERSION)
    .argument("[question...]", "The question to review (prompted for when omitted)")
    .option("--provider <name>", "Generation provider: openai, anthropic or fixtures")
    .option("--model <id>", "Model identifier")
    .option("--temperature <t>", "Sampling temperature (0-2)")
    .option("--seed <n>", "Integer seed for deterministic sampling")
    .option("--compact", "Print compact JSON", false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();
  const argQuestion = program.args.join(" ").trim();

  // ── Configuration (startup failures happen before prompting) ───────────────
  let config: Config;
  try {
    config = parseConfig({
      ...io.env,
      ...(opts.provider !== undefined ? { LLM_PROVIDER: opts.provider } : {}),
      ...(opts.model !== undefined ? { LLM_MODEL: opts.model } : {}),
      ...(opts.temperature !== undefined ? { LLM_TEMPERATURE: opts.temperature } : {}),
      ...(opts.seed !== undefined ? { LLM_SEED: opts.seed } : {}),
    });
    assertProviderCredentials(config);
  } catch (error) {
    io.stderr(JSON.stringify(toErrorV1(error), null, 2));
    return 1;
  }

  // ── Question ───────────────────────────────────────────────────────────────
  const rawQuestion = argQuestion || (await io.prompt("Enter your question: ")).trim();
  if (!rawQuestion) {
    io.stderr("No question provided.");
    return 1;
  }

  const request = buildReviewQuestionRequest(config.review.maxQuestionChars).safeParse({ question: rawQuestion });
  if (!request.success) {
    io.stderr(JSON.stringify(toErrorV1(request.error), null, 2));
    return 1;
  }

  // ── Review ─────────────────────────────────────────────────────────────────
  try {
    const review = await reviewQuestion(request.data.question, {
      config,
      ...(io.gatewayFor ? { gatewayFor: io.gatewayFor } : {}),
    });
    io.stdout(opts.compact ? JSON.stringify(review) : JSON.stringify(review, null, 2));
    return 0;
  } catch (error) {
    io.stderr(JSON.stringify(toErrorV1(error), null, 2));
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  loadDotenv();

  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error("question-review failed:", err);
      process.exitCode = 1;
    });
}
