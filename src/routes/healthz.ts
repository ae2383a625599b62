import type { FastifyInstance } from "fastify";
import type { Config } from "../config/index.js";
import { resolveModel } from "../adapters/llm/router.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

export interface HealthzRouteOptions {
  config: Config;
}

export default async function route(app: FastifyInstance, opts: HealthzRouteOptions) {
  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    provider: opts.config.llm.provider,
    model: resolveModel(opts.config),
  }));
}
