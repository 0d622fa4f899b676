/**
 * Process metrics
 *
 * Computes facts about a process (percentages, counts, dependency reach)
 * for the analysis model to interpret. Nothing here decides whether a
 * number is a problem.
 */

import type { ProcessDataT, ProcessStepT } from "../schemas/process.js";
import { stepKey, totalCost, totalTimeHours } from "../schemas/process.js";

export type StepCategory =
  | "review"
  | "handoff"
  | "processing"
  | "external"
  | "creative"
  | "administrative"
  | "unknown";

export interface StepMetrics {
  stepName: string;
  stepIndex: number;
  timeHours: number;
  timePct: number;
  cost: number;
  costPct: number;
  errorRatePct: number;
  resources: number;
  /** Steps that depend on this one, directly or transitively */
  downstreamCount: number;
  upstreamCount: number;
  isParallelCandidate: boolean;
  category: StepCategory;
  isLongest: boolean;
  isMostExpensive: boolean;
  isHighestError: boolean;
}

export interface PatternMetrics {
  reviewStepCount: number;
  handoffCount: number;
  externalTouchpoints: number;
  creativeStepCount: number;
  reviewPctOfSteps: number;
  timeInReviewsPct: number;
  timeInCreativePct: number;
  sequentialChainLength: number;
  parallelOpportunities: number;
}

export interface ProcessMetrics {
  processName: string;
  totalTimeHours: number;
  totalCost: number;
  stepCount: number;
  steps: StepMetrics[];
  patterns: PatternMetrics;
  hasAllTimes: boolean;
  hasAllCosts: boolean;
  hasErrorRates: boolean;
  hasDependencies: boolean;
}

/**
 * Keyword groups in priority order; first match wins.
 */
const CATEGORY_PATTERNS: ReadonlyArray<[StepCategory, RegExp[]]> = [
  [
    "review",
    [/\breview/, /\bapproval\b/, /\bapprove/, /\bcheck\b/, /\bvalidat/, /\bverif/, /\binspect/, /\bqc\b/, /\bqa\b/],
  ],
  ["external", [/\bclient\b/, /\bcustomer\b/, /\bvendor\b/, /\bexternal\b/, /\bfeedback\b/, /\bhappy\b/]],
  [
    "handoff",
    [/\bsend\b/, /\bsubmit\b/, /\bshare\b/, /\btransfer\b/, /\bforward\b/, /\bdeliver\b/, /\bhandoff\b/, /\bhand off\b/],
  ],
  [
    "creative",
    [/\bdesign\b/, /\bcreate\b/, /\bdevelop\b/, /\bwrite\b/, /\bbuild\b/, /\bsolution\b/, /\bwork on\b/, /\bimplement\b/],
  ],
  ["administrative", [/\binvoice\b/, /\bdocument\b/, /\brecord\b/, /\bfile\b/, /\blog\b/, /\breport\b/]],
  ["processing", [/\bprocess\b/, /\bprepare\b/, /\banalyze\b/, /\bcollect\b/, /\bgather\b/, /\btask\b/]],
];

/**
 * Advisory category hint from the step name.
 */
export function inferStepCategory(stepName: string): StepCategory {
  const lowered = stepName.toLowerCase();
  for (const [category, patterns] of CATEGORY_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(lowered))) {
      return category;
    }
  }
  return "unknown";
}

export type Adjacency = Map<string, string[]>;

/**
 * Direct edges in both directions, keyed by normalized step name.
 * Dangling and duplicate references are dropped.
 */
export function buildAdjacency(steps: readonly ProcessStepT[]): { downstream: Adjacency; upstream: Adjacency } {
  const downstream: Adjacency = new Map();
  const upstream: Adjacency = new Map();
  for (const step of steps) {
    downstream.set(stepKey(step.stepName), []);
    upstream.set(stepKey(step.stepName), []);
  }

  for (const step of steps) {
    const key = stepKey(step.stepName);
    for (const dep of step.dependsOn) {
      const depKey = stepKey(dep);
      const children = downstream.get(depKey);
      const parents = upstream.get(key);
      if (!children || !parents || depKey === key) continue;
      if (!children.includes(key)) children.push(key);
      if (!parents.includes(depKey)) parents.push(depKey);
    }
  }

  return { downstream, upstream };
}

/**
 * Every node reachable from `start`, excluding `start` itself.
 *
 * One visited set is shared across the whole walk, so reconvergent
 * (diamond) paths are expanded once and cycles stop at the first revisit.
 * The walk keeps its own stack; chain depth is bounded only by memory.
 */
export function transitiveClosure(start: string, direct: Adjacency): Set<string> {
  const visited = new Set<string>([start]);
  const reached = new Set<string>();
  const pending = [start];

  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    for (const next of direct.get(node) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      reached.add(next);
      pending.push(next);
    }
  }

  return reached;
}

interface ChainFrame {
  node: string;
  children: readonly string[];
  nextChild: number;
  maxChild: number;
}

/**
 * Longest chain of sequential dependencies, counted in steps.
 *
 * Post-order DFS over an explicit stack. Nodes still on the stack
 * contribute 0 so cyclic data terminates.
 */
export function longestChain(downstream: Adjacency): number {
  const memo = new Map<string, number>();
  const onStack = new Set<string>();
  let longest = 0;

  const frameFor = (node: string): ChainFrame => {
    onStack.add(node);
    return { node, children: downstream.get(node) ?? [], nextChild: 0, maxChild: 0 };
  };

  for (const root of downstream.keys()) {
    if (memo.has(root)) continue;

    const stack: ChainFrame[] = [frameFor(root)];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;

      if (frame.nextChild < frame.children.length) {
        const child = frame.children[frame.nextChild];
        frame.nextChild += 1;
        if (child === undefined || onStack.has(child)) continue;

        const cached = memo.get(child);
        if (cached !== undefined) {
          frame.maxChild = Math.max(frame.maxChild, cached);
        } else {
          stack.push(frameFor(child));
        }
        continue;
      }

      stack.pop();
      onStack.delete(frame.node);
      const length = 1 + frame.maxChild;
      memo.set(frame.node, length);
      longest = Math.max(longest, length);

      const parent = stack[stack.length - 1];
      if (parent !== undefined) {
        parent.maxChild = Math.max(parent.maxChild, length);
      }
    }
  }

  return longest;
}

function percentOf(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function emptyPatterns(): PatternMetrics {
  return {
    reviewStepCount: 0,
    handoffCount: 0,
    externalTouchpoints: 0,
    creativeStepCount: 0,
    reviewPctOfSteps: 0,
    timeInReviewsPct: 0,
    timeInCreativePct: 0,
    sequentialChainLength: 0,
    parallelOpportunities: 0,
  };
}

function calculatePatterns(steps: StepMetrics[], chainLength: number): PatternMetrics {
  if (steps.length === 0) return emptyPatterns();

  const ofCategory = (category: StepCategory) => steps.filter((s) => s.category === category);
  const reviews = ofCategory("review");
  const creative = ofCategory("creative");
  const totalTime = steps.reduce((sum, s) => sum + s.timeHours, 0);
  const sumTime = (list: StepMetrics[]) => list.reduce((sum, s) => sum + s.timeHours, 0);

  return {
    reviewStepCount: reviews.length,
    handoffCount: ofCategory("handoff").length,
    externalTouchpoints: ofCategory("external").length,
    creativeStepCount: creative.length,
    reviewPctOfSteps: percentOf(reviews.length, steps.length),
    timeInReviewsPct: percentOf(sumTime(reviews), totalTime),
    timeInCreativePct: percentOf(sumTime(creative), totalTime),
    sequentialChainLength: chainLength,
    parallelOpportunities: steps.filter((s) => s.isParallelCandidate).length,
  };
}

/**
 * Compute all metrics for a process. Pure; an empty step list yields
 * zeroed metrics.
 */
export function computeProcessMetrics(process: ProcessDataT): ProcessMetrics {
  const { steps } = process;

  if (steps.length === 0) {
    return {
      processName: process.name,
      totalTimeHours: 0,
      totalCost: 0,
      stepCount: 0,
      steps: [],
      patterns: emptyPatterns(),
      hasAllTimes: false,
      hasAllCosts: false,
      hasErrorRates: false,
      hasDependencies: false,
    };
  }

  const totalTime = totalTimeHours(process);
  const cost = totalCost(process);
  const { downstream, upstream } = buildAdjacency(steps);

  const maxTime = Math.max(...steps.map((s) => s.averageTimeHours));
  const maxCost = Math.max(...steps.map((s) => s.costPerInstance));
  const maxError = Math.max(...steps.map((s) => s.errorRatePct));

  const stepMetrics: StepMetrics[] = steps.map((step, index) => {
    const key = stepKey(step.stepName);
    const downstreamCount = transitiveClosure(key, downstream).size;
    return {
      stepName: step.stepName,
      stepIndex: index,
      timeHours: step.averageTimeHours,
      timePct: percentOf(step.averageTimeHours, totalTime),
      cost: step.costPerInstance,
      costPct: percentOf(step.costPerInstance, cost),
      errorRatePct: step.errorRatePct,
      resources: step.resourcesNeeded,
      downstreamCount,
      upstreamCount: transitiveClosure(key, upstream).size,
      isParallelCandidate: downstreamCount === 0,
      category: inferStepCategory(step.stepName),
      isLongest: maxTime > 0 && step.averageTimeHours === maxTime,
      isMostExpensive: maxCost > 0 && step.costPerInstance === maxCost,
      isHighestError: maxError > 0 && step.errorRatePct === maxError,
    };
  });

  return {
    processName: process.name,
    totalTimeHours: totalTime,
    totalCost: cost,
    stepCount: steps.length,
    steps: stepMetrics,
    patterns: calculatePatterns(stepMetrics, longestChain(downstream)),
    hasAllTimes: steps.every((s) => s.averageTimeHours > 0),
    hasAllCosts: steps.every((s) => s.costPerInstance > 0),
    hasErrorRates: steps.some((s) => s.errorRatePct > 0),
    hasDependencies: steps.some((s) => s.dependsOn.length > 0),
  };
}

export function findStepMetrics(metrics: ProcessMetrics, stepName: string): StepMetrics | undefined {
  const key = stepKey(stepName);
  return metrics.steps.find((s) => stepKey(s.stepName) === key);
}

const yesNo = (value: boolean) => (value ? "Yes" : "No");

/**
 * Markdown facts block handed to the analysis model.
 */
export function formatMetricsForLlm(metrics: ProcessMetrics): string {
  const lines = [
    `# Process: ${metrics.processName}`,
    "",
    "## Summary",
    `- Total steps: ${metrics.stepCount}`,
    `- Total time: ${metrics.totalTimeHours.toFixed(1)} hours`,
    `- Total cost: $${metrics.totalCost.toFixed(2)}`,
    "",
    "## Step Details",
    "",
    "| # | Step | Time | Time% | Cost | Cost% | Errors | Resources | Type | Downstream |",
    "|---|------|------|-------|------|-------|--------|-----------|------|------------|",
  ];

  for (const s of metrics.steps) {
    const flags: string[] = [];
    if (s.isLongest) flags.push("longest");
    if (s.isMostExpensive) flags.push("costly");
    if (s.isHighestError) flags.push("error-prone");
    const flagText = flags.length > 0 ? ` (${flags.join(", ")})` : "";

    lines.push(
      `| ${s.stepIndex + 1} | ${s.stepName}${flagText} | ` +
        `${s.timeHours.toFixed(1)}h | ${s.timePct.toFixed(0)}% | ` +
        `$${s.cost.toFixed(0)} | ${s.costPct.toFixed(0)}% | ` +
        `${s.errorRatePct.toFixed(0)}% | ${s.resources} | ` +
        `${s.category} | ${s.downstreamCount} |`
    );
  }

  const p = metrics.patterns;
  lines.push(
    "",
    "## Patterns Detected",
    `- Review steps: ${p.reviewStepCount} (${p.reviewPctOfSteps.toFixed(0)}% of steps)`,
    `- Time in reviews: ${p.timeInReviewsPct.toFixed(0)}%`,
    `- External touchpoints: ${p.externalTouchpoints}`,
    `- Creative work steps: ${p.creativeStepCount} (${p.timeInCreativePct.toFixed(0)}% of time)`,
    `- Longest sequential chain: ${p.sequentialChainLength} steps`,
    `- Parallel opportunities: ${p.parallelOpportunities} steps`,
    "",
    "## Data Quality",
    `- Has all timing data: ${yesNo(metrics.hasAllTimes)}`,
    `- Has all cost data: ${yesNo(metrics.hasAllCosts)}`,
    `- Has error rates: ${yesNo(metrics.hasErrorRates)}`,
    `- Has dependency info: ${yesNo(metrics.hasDependencies)}`
  );

  return lines.join("\n");
}
