import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import type { RateLimitOptions } from "@fastify/rate-limit";

declare module "fastify" {
  interface FastifyInstance {
    /**
     * Route-level limit: `{ config: { rateLimit: app.rlPerRoute(10) } }`
     */
    rlPerRoute: (max: number) => RateLimitOptions;
  }
}

export interface RateLimitPluginOptions {
  timeWindow?: string; // default: "1 minute"
}

const rateLimit: FastifyPluginAsync<RateLimitPluginOptions> = async (app, opts) => {
  const timeWindow = opts.timeWindow ?? "1 minute";
  app.decorate("rlPerRoute", (max: number): RateLimitOptions => ({ max, timeWindow }));
};

export default fp(rateLimit, {
  name: "rate-limit-per-route",
  dependencies: ["@fastify/rate-limit"],
});
