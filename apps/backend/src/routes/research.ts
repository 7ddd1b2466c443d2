import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { InvalidRequestError, ResearchError, describeError } from "core";

// Research run routes: start, inspect, answer, regenerate, cancel and the
// progress event WebSocket. Engine errors are shaped by the errors plugin.

const startBodySchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  deliver: z.boolean().optional(),
});

const answersBodySchema = z.object({
  answers: z
    .array(
      z.object({
        questionId: z.string().min(1),
        text: z.string(),
      })
    )
    .min(1, "answers must not be empty"),
});

interface RunParams {
  runId: string;
}

/**
 * Parse a request body or throw InvalidRequestError listing the issues
 */
function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ")
    );
  }
  return parsed.data;
}

const routes: FastifyPluginAsync = async (app) => {
  const research = app.research;

  app.post(
    "/",
    { config: { rateLimit: app.rlPerRoute(10) } },
    async (req, rep) => {
      const body = parseBody(startBodySchema, req.body);
      const handle = research.start(body.query, { deliver: body.deliver });
      req.log.info({ runId: handle.runId, traceId: handle.traceId }, "Research run started");
      return rep.status(201).send({ runId: handle.runId, traceId: handle.traceId });
    }
  );

  app.get<{ Params: RunParams }>(
    "/:runId",
    { config: { rateLimit: app.rlPerRoute(60) } },
    async (req, rep) => {
      return rep.status(200).send(research.currentState(req.params.runId));
    }
  );

  app.post<{ Params: RunParams }>(
    "/:runId/answers",
    { config: { rateLimit: app.rlPerRoute(10) } },
    async (req, rep) => {
      const body = parseBody(answersBodySchema, req.body);
      research.supplyAnswers(req.params.runId, body.answers);
      return rep.status(202).send(research.currentState(req.params.runId));
    }
  );

  app.post<{ Params: RunParams }>(
    "/:runId/questions/regenerate",
    { config: { rateLimit: app.rlPerRoute(5) } },
    async (req, rep) => {
      const questions = await research.regenerateQuestions(req.params.runId);
      return rep.status(200).send({ questions });
    }
  );

  app.delete<{ Params: RunParams }>(
    "/:runId",
    { config: { rateLimit: app.rlPerRoute(10) } },
    async (req, rep) => {
      research.cancel(req.params.runId);
      return rep.status(202).send(research.currentState(req.params.runId));
    }
  );

  // Streams each progress event as one JSON text frame, then closes
  app.get<{ Params: RunParams }>(
    "/:runId/events",
    { websocket: true },
    (socket, req) => {
      const streamEvents = async (): Promise<void> => {
        const events = research.events(req.params.runId);
        for await (const event of events) {
          if (socket.readyState !== socket.OPEN) {
            break;
          }
          socket.send(JSON.stringify(event));
        }
        socket.close(1000, "run finished");
      };

      void streamEvents().catch((err: unknown) => {
        const code = err instanceof ResearchError ? err.code : "internal_error";
        req.log.warn({ runId: req.params.runId, error: describeError(err) }, "Event stream failed");
        if (socket.readyState === socket.OPEN) {
          socket.send(JSON.stringify({ error: { code, message: describeError(err) } }));
          socket.close(1011, "event stream failed");
        }
      });
    }
  );
};

export default routes;
