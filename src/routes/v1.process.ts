import type { FastifyInstance } from "fastify";
import { assertProcessInvariants, mergeProcessData } from "../schemas/process.js";
import { MergeRequest } from "../schemas/api.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

/**
 * POST /v1/process/merge
 *
 * Fold newly supplied step data into an existing process (steps matched
 * by case-insensitive name).
 */
export async function processRoutes(app: FastifyInstance): Promise<void> {
  app.post("/v1/process/merge", async (request, reply) => {
    const parsed = MergeRequest.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const merged = mergeProcessData(parsed.data.base, parsed.data.incoming);
    assertProcessInvariants(merged);
    return reply.send(merged);
  });
}
