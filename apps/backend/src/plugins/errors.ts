import fp from "fastify-plugin";
import type { FastifyError, FastifyPluginAsync } from "fastify";
import { ResearchError, type ResearchErrorCode } from "core";

/**
 * HTTP status per engine error code
 */
const STATUS_BY_CODE: Record<ResearchErrorCode, number> = {
  invalid_request: 400,
  run_not_found: 404,
  invalid_transition: 409,
  answer_mismatch: 422,
  provider_error: 502,
  delivery_error: 502,
  run_cancelled: 409,
  stream_consumed: 409,
};

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    detail?: string;
  };
}

// Uniform error shape `{ error: { code, message, detail? } }` for every route.
// Detail is only exposed outside production.
const errors: FastifyPluginAsync = async (app) => {
  app.setErrorHandler((err: FastifyError, req, rep) => {
    const isDev = process.env.NODE_ENV !== "production";
    const detail = err.message;

    if (err instanceof ResearchError) {
      const status = STATUS_BY_CODE[err.code];
      req.log.info({ code: err.code, status }, err.message);
      return rep.status(status).send({
        error: { code: err.code, message: err.message },
      } satisfies ErrorBody);
    }

    if (err.statusCode !== undefined && err.statusCode < 500) {
      return rep.status(err.statusCode).send({
        error: {
          code: err.statusCode === 429 ? "rate_limited" : "invalid_request",
          message: err.message,
        },
      } satisfies ErrorBody);
    }

    req.log.error({ detail }, `${req.method} ${req.url} failed`);
    return rep.status(500).send({
      error: {
        code: "internal_error",
        message: "Internal server error",
        ...(isDev ? { detail } : {}),
      },
    } satisfies ErrorBody);
  });

  app.setNotFoundHandler((req, rep) => {
    return rep.status(404).send({
      error: { code: "not_found", message: `Route ${req.method} ${req.url} not found` },
    } satisfies ErrorBody);
  });
};

export default fp(errors, { name: "errors" });
