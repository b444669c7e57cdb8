import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import type { AggregationRegistry } from "@siltime/integrity-kernel";
import type { EvaluatorConfigV1 } from "./config";
import { registerEvaluatorRoutes } from "./routes";
import { EvaluatorRuntime } from "./runtime";

export type BuildServerOptions = {
  config: EvaluatorConfigV1;
  // Defaults to pino at config.service.log_level.
  logger?: FastifyServerOptions["logger"];
  registry?: AggregationRegistry;
};

export function buildServer(opts: BuildServerOptions): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? { level: opts.config.service.log_level } });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  const runtime = new EvaluatorRuntime(opts.config, app.log, opts.registry);
  registerEvaluatorRoutes(app, runtime);
  return app;
}
