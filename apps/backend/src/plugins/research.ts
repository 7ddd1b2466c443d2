import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import {
  ResearchOrchestrator,
  createProvidersFromEnv,
  getConfig,
} from "core";

declare module "fastify" {
  interface FastifyInstance {
    research: ResearchOrchestrator;
  }
}

export interface ResearchPluginOptions {
  orchestrator?: ResearchOrchestrator; // default: built from env + research-config.yaml
}

const research: FastifyPluginAsync<ResearchPluginOptions> = async (app, opts) => {
  let orchestrator = opts.orchestrator;

  if (!orchestrator) {
    const config = getConfig();
    const providers = createProvidersFromEnv(config);
    orchestrator = new ResearchOrchestrator({ ...providers, config });
    app.log.info(
      {
        completion: providers.completionProvider.getName(),
        search: providers.searchProvider.getName(),
        notifier: providers.notifier?.getName() ?? null,
      },
      "Research orchestrator ready"
    );
  }

  app.decorate("research", orchestrator);
};

export default fp(research, { name: "research" });
