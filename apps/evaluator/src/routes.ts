import type { FastifyInstance } from "fastify";
import type { EvaluatorRuntime } from "./runtime";
import { RequestRejected } from "./runtime";

export function registerEvaluatorRoutes(app: FastifyInstance, runtime: EvaluatorRuntime): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true });
  });

  app.get("/api/sil/bands", async (_req, reply) => {
    return reply.send(runtime.bands());
  });

  app.post("/api/sil/evaluate", async (req, reply) => {
    const out = await runtime.evaluate(req.body ?? {});
    if (!out.ok) return reply.code(out.status).send({ ok: false, failure: out.failure });
    return reply.send({ ok: true, report: out.body });
  });

  app.post("/api/sil/batch", async (req, reply) => {
    try {
      const out = await runtime.batch(req.body ?? {});
      return reply.send({ ok: true, ...out });
    } catch (e) {
      if (e instanceof RequestRejected) {
        return reply.code(e.status).send({ ok: false, error_code: e.error_code, message: e.message });
      }
      throw e;
    }
  });

  app.post("/api/sil/trajectory", async (req, reply) => {
    try {
      const out = await runtime.trajectory(req.body ?? {});
      if (!out.ok) return reply.code(out.status).send({ ok: false, failure: out.failure });
      return reply.send({ ok: true, trajectory: out.body });
    } catch (e) {
      if (e instanceof RequestRejected) {
        return reply.code(e.status).send({ ok: false, error_code: e.error_code, message: e.message });
      }
      throw e;
    }
  });
}
