import { FastifyError, FastifyReply, FastifyRequest } from "fastify";

import { formatError, HTTP_STATUS } from "@/utils/errors";
import { logger } from "@/utils/logger";

export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  const formatted = formatError(error, request.id);

  // Fastify's own client errors (bad JSON, unsupported media type) carry their status.
  if (
    formatted.error.code === "INTERNAL_SERVER_ERROR" &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= HTTP_STATUS.BAD_REQUEST &&
    error.statusCode < HTTP_STATUS.INTERNAL_SERVER_ERROR
  ) {
    formatted.error.statusCode = error.statusCode;
    formatted.error.code = "BAD_REQUEST";
  }

  const statusCode = formatted.error.statusCode;

  if (statusCode >= 500) {
    logger.error("Unhandled server error", {
      error,
      requestId: request.id,
      method: request.method,
      url: request.url,
    });
  } else {
    logger.warn("Request failed", {
      error: formatted.error,
      requestId: request.id,
      method: request.method,
      url: request.url,
    });
  }

  if (!reply.sent) {
    reply.status(statusCode).send(formatted);
  }
}
