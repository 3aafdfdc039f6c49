/**
 * HTTP Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * then the workflow routes. Does not listen; index.ts does that.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerWorkflowRoutes, type AppConfig } from "@curriflow/platform";

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/config"]);

export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const isProd = process.env.NODE_ENV === "production";

  const app = Fastify({
    logger: false, // structured logging comes from the platform
    // Real client IPs behind a reverse proxy, for rate limiting
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // Public routes get a much higher ceiling
  await app.register(rateLimit, {
    max: (req) => {
      if (PUBLIC_PATHS.has(req.url)) return 10_000;
      return config.api.rateLimitMax ?? (isProd ? 100 : 1_000);
    },
    timeWindow: config.api.rateLimitWindowMs,
  });

  // Without CORS_ORIGIN every origin is allowed
  await app.register(cors, {
    origin: config.api.corsOrigin
      ? config.api.corsOrigin.split(",").map((o) => o.trim())
      : true,
    credentials: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
  });

  await registerWorkflowRoutes(app);

  return app;
}
