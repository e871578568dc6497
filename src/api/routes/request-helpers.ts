import type { FastifyRequest } from "fastify";
import type { z } from "zod";

export const toValidationError = (error: z.ZodError, source: "body" | "query" = "body") => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [source, ...issue.path],
    msg: issue.message
  }))
});

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};
