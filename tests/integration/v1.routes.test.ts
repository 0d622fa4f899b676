import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { build } from "../../src/server.js";
import { SERVICE_VERSION } from "../../src/version.js";
import { FakeGateway, fakeResolver } from "../helpers/fake-gateway.js";
import { approvalInsight, invoiceApproval, tightConstraints } from "../helpers/process-fixtures.js";

describe("HTTP surface", () => {
  let app: Awaited<ReturnType<typeof build>>;
  let gateway: FakeGateway;

  beforeEach(async () => {
    gateway = new FakeGateway({ structured: [approvalInsight()] });
    app = await build({
      gatewayFor: fakeResolver({ analysis: gateway }).gatewayFor,
      orchestrator: { explanationsEnabled: true, maxCycles: 0, timeoutMs: 5_000 },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /healthz", () => {
    it("reports service, version and the analysis model", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        ok: true,
        service: "process-analysis-service",
        version: SERVICE_VERSION,
        provider: "fixtures",
        model: "fixture-v1",
      });
    });

    it("echoes the incoming request id", async () => {
      const res = await app.inject({ method: "GET", url: "/healthz", headers: { "x-request-id": "req-abc" } });
      expect(res.headers["x-request-id"]).toBe("req-abc");
    });
  });

  describe("POST /v1/analyze", () => {
    it("runs an analysis and stores the thread", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/analyze",
        payload: { process: invoiceApproval(), constraints: tightConstraints(), threadId: "http-1" },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.message).toBe("Analysis complete. Found 1 significant issue, 1 recommendation, 1 area that looks fine.");
      expect(body.threadId).toBe("http-1");
      expect(body.isError).toBe(false);

      const thread = await app.inject({ method: "GET", url: "/v1/analyze/http-1" });
      expect(thread.statusCode).toBe(200);
      expect(thread.json()).toMatchObject({
        threadId: "http-1",
        stage: "done",
        phase: "complete",
        needsInput: false,
        cycleCount: 0,
        issueCount: 1,
        recommendationCount: 1,
      });
    });

    it("rejects a body without steps", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/analyze",
        headers: { "x-request-id": "req-bad" },
        payload: { process: { name: "Onboarding" } },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("BAD_INPUT");
      expect(body.message).toBe("Validation failed");
      expect(body.request_id).toBe("req-bad");
    });

    it("rejects a process with no steps", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/analyze",
        payload: { process: { name: "Onboarding", steps: [] } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        code: "BAD_INPUT",
        message: "Process 'Onboarding' has no steps",
        details: { invariant: "process_has_steps" },
      });
    });
  });

  describe("thread routes", () => {
    it("returns 404 for an unknown thread", async () => {
      const res = await app.inject({ method: "GET", url: "/v1/analyze/missing" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({ code: "NOT_FOUND", details: { thread_id: "missing" } });
    });

    it("returns 404 when continuing an unknown thread", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/analyze/missing/continue",
        payload: { message: "More context" },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json().code).toBe("NOT_FOUND");
    });

    it("answers an empty reply with a 200 error response", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/analyze/any/continue",
        payload: { message: "   " },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ isError: true, errorCode: "empty_input", needsInput: true });
    });

    it("refuses to proceed a finished thread", async () => {
      await app.inject({
        method: "POST",
        url: "/v1/analyze",
        payload: { process: invoiceApproval(), constraints: tightConstraints(), threadId: "http-done" },
      });

      const res = await app.inject({ method: "POST", url: "/v1/analyze/http-done/proceed" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ threadId: "http-done", isError: true, errorCode: "not_awaiting_input", phase: "complete" });
    });

    it("requires a message when continuing", async () => {
      const res = await app.inject({ method: "POST", url: "/v1/analyze/any/continue", payload: {} });
      expect(res.statusCode).toBe(400);
    });
  });

  describe("POST /v1/roi", () => {
    it("returns the three-point estimate with its expected value", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/roi",
        payload: {
          process: invoiceApproval(),
          stepName: "pay vendor",
          suggestionType: "elimination",
          executionsPerYear: 100,
          implementationCost: 3120,
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.pessimistic).toBeCloseTo(3120);
      expect(body.likely).toBeCloseTo(6240);
      expect(body.optimistic).toBeCloseTo(6240);
      expect(body.expectedValue).toBeCloseTo(5720);
      expect(body.paybackMonths).toBeCloseTo(6);
      expect(body.confidence).toBe(0.7);
    });

    it("rejects an unknown suggestion type", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/roi",
        payload: { process: invoiceApproval(), stepName: "Pay vendor", suggestionType: "outsourcing" },
      });
      expect(res.statusCode).toBe(400);
    });
  });

  describe("POST /v1/process/merge", () => {
    it("updates matching steps and appends new ones", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/process/merge",
        payload: {
          base: invoiceApproval(),
          incoming: {
            name: "ignored",
            steps: [
              { stepName: "manager review", costPerInstance: 150 },
              { stepName: "Archive", averageTimeHours: 0.25, dependsOn: ["Pay vendor"] },
            ],
          },
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.name).toBe("Invoice approval");
      expect(body.description).toBe("Supplier invoices from receipt to payment");
      expect(body.steps.map((step: { stepName: string }) => step.stepName)).toEqual([
        "Receive invoice",
        "Manager review",
        "Pay vendor",
        "Archive",
      ]);
      expect(body.steps[1]).toMatchObject({ averageTimeHours: 4, costPerInstance: 150, errorRatePct: 10 });
    });
  });

  describe("POST /v1/enrich", () => {
    it("returns confidence, suggestions and a draft", async () => {
      const explanation = new FakeGateway({ invoke: ["Add an industry."] });
      const analysis = new FakeGateway({ structured: [approvalInsight()] });
      const enrichApp = await build({ gatewayFor: fakeResolver({ explanation, analysis }).gatewayFor });

      try {
        const res = await enrichApp.inject({
          method: "POST",
          url: "/v1/enrich",
          payload: { process: invoiceApproval(), constraints: tightConstraints() },
        });

        expect(res.statusCode).toBe(200);
        const body = res.json();
        expect(body.improvementSuggestions).toBe("Add an industry.");
        expect(body.draftInsight.issues[0].title).toBe("Slow approvals");
        expect(body.targetedQuestions).toEqual([
          "Does this look correct?",
          "What industry are you in? This helps me tailor recommendations.",
        ]);
      } finally {
        await enrichApp.close();
      }
    });
  });
});
