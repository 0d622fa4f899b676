/**
 * /v1/analyze - Analysis threads
 *
 * POST /v1/analyze                      start (or restart) a thread
 * POST /v1/analyze/:threadId/continue   answer clarification / add context
 * POST /v1/analyze/:threadId/proceed    continue without new input
 * GET  /v1/analyze/:threadId            stored thread summary
 *
 * Analysis outcomes, including model failures and "no results", are
 * returned as an AnalysisResponse with status 200. Only malformed
 * requests and unknown threads use the error.v1 envelope.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { AgentState, AnalysisOrchestrator, AnalysisResponse } from "../orchestrator/index.js";
import { AnalyzeRequest, ContinueRequest, ThreadParams } from "../schemas/api.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export interface ThreadSummary {
  threadId: string;
  stage: string;
  phase: string;
  needsInput: boolean;
  clarificationQuestions: string[];
  confidence?: number;
  cycleCount: number;
  issueCount: number;
  recommendationCount: number;
  error?: string;
  errorCode?: string;
  reasoningTrace: string[];
}

export function summarizeThread(state: AgentState): ThreadSummary {
  return {
    threadId: state.threadId,
    stage: state.stage,
    phase: state.phase,
    needsInput: state.phase === "awaiting_input",
    clarificationQuestions: state.clarificationQuestions,
    confidence: state.confidence?.score,
    cycleCount: state.cycleCount,
    issueCount: state.insight?.issues.length ?? 0,
    recommendationCount: state.insight?.recommendations.length ?? 0,
    error: state.error,
    errorCode: state.errorCode,
    reasoningTrace: state.reasoningTrace,
  };
}

function send(reply: FastifyReply, request: FastifyRequest, response: AnalysisResponse) {
  if (response.errorCode === "thread_not_found") {
    return reply
      .code(404)
      .send(buildErrorV1("NOT_FOUND", response.message, { thread_id: response.threadId }, getRequestId(request)));
  }
  return reply.send(response);
}

export async function analyzeRoutes(app: FastifyInstance, orchestrator: AnalysisOrchestrator): Promise<void> {
  app.post("/v1/analyze", async (request, reply) => {
    const requestId = getRequestId(request);
    const parsed = AnalyzeRequest.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const response = await orchestrator.analyze(parsed.data, { requestId });
    return send(reply, request, response);
  });

  app.post("/v1/analyze/:threadId/continue", async (request, reply) => {
    const requestId = getRequestId(request);
    const params = ThreadParams.safeParse(request.params);
    const body = ContinueRequest.safeParse(request.body);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }
    if (!body.success) {
      return reply.code(400).send(zodErrorToErrorV1(body.error, requestId));
    }

    const response = await orchestrator.continueConversation(params.data.threadId, body.data.message, { requestId });
    return send(reply, request, response);
  });

  app.post("/v1/analyze/:threadId/proceed", async (request, reply) => {
    const requestId = getRequestId(request);
    const params = ThreadParams.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }

    const response = await orchestrator.proceed(params.data.threadId, { requestId });
    return send(reply, request, response);
  });

  app.get("/v1/analyze/:threadId", async (request, reply) => {
    const requestId = getRequestId(request);
    const params = ThreadParams.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }

    const state = await orchestrator.getThreadState(params.data.threadId);
    if (!state) {
      return reply
        .code(404)
        .send(buildErrorV1("NOT_FOUND", "Thread not found", { thread_id: params.data.threadId }, requestId));
    }
    return reply.send(summarizeThread(state));
  });
}
