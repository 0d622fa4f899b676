import type { FastifyInstance } from "fastify";
import type { PostExtractionEnricher } from "../enrichment/post-extraction.js";
import { assertProcessInvariants } from "../schemas/process.js";
import { EnrichRequest } from "../schemas/api.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

/**
 * POST /v1/enrich
 *
 * Confidence, targeted follow-up questions and (model permitting)
 * improvement suggestions plus a draft analysis for freshly extracted
 * process data.
 */
export async function enrichRoute(app: FastifyInstance, enricher: PostExtractionEnricher): Promise<void> {
  app.post("/v1/enrich", async (request, reply) => {
    const requestId = getRequestId(request);
    const parsed = EnrichRequest.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const { process, ...options } = parsed.data;
    assertProcessInvariants(process);
    const result = await enricher.enrich(process, { ...options, requestId });
    return reply.send(result);
  });
}
