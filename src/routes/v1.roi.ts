import type { FastifyInstance } from "fastify";
import { estimateRoi, expectedValue } from "../analysis/roi.js";
import { assertProcessInvariants } from "../schemas/process.js";
import { RoiRequestBody } from "../schemas/api.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

/**
 * POST /v1/roi - three-point savings estimate for one step
 */
export async function roiRoute(app: FastifyInstance): Promise<void> {
  app.post("/v1/roi", async (request, reply) => {
    const parsed = RoiRequestBody.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
    }

    const { process, ...roiRequest } = parsed.data;
    assertProcessInvariants(process);
    const estimate = estimateRoi(process, roiRequest);
    return reply.send({ ...estimate, expectedValue: expectedValue(estimate) });
  });
}
