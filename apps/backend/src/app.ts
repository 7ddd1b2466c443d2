import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import fastifyWebsocket from "@fastify/websocket";
import type { ResearchOrchestrator } from "core";
import errors from "./plugins/errors.js";
import rl from "./plugins/rate-limit.js";
import research from "./plugins/research.js";
import researchRoutes from "./routes/research.js";

export interface BuildAppOptions {
  orchestrator?: ResearchOrchestrator; // default: built from env
  logger?: FastifyServerOptions["logger"];
}

/**
 * Build the API without listening, so tests can drive it through inject()
 */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  // Keys and e-mail recipients are redacted
  const app = Fastify({
    logger: options.logger ?? {
      level: process.env.LOG_LEVEL || "info",
      redact: {
        paths: ["req.headers.authorization", "apiKey", "*.apiKey", "to", "*.to"],
        censor: "[REDACTED]",
      },
    },
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: process.env.CORS_ORIGIN || true,
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "Accept", "Origin"],
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
  });

  // Core platform plugins. Registration order matters for dependencies:
  // - errors early to ensure consistent error shaping
  // - rate limiting before the routes that use rlPerRoute
  await app.register(errors);
  await app.register(fastifyWebsocket);
  await app.register(fastifyRateLimit, { global: false });
  await app.register(rl);
  await app.register(research, { orchestrator: options.orchestrator });

  // Business routes
  await app.register(researchRoutes, { prefix: "/api/v1/research" });

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  return app;
}
