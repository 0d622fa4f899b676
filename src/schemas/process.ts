import { z } from "zod";
import { DataInvariantError } from "../utils/errors.js";

/**
 * Upstream dependency names. Accepts a list, or a string separated by
 * ";" (checked first) or ",".
 */
const DependsOn = z
  .union([z.array(z.string()), z.string(), z.null()])
  .optional()
  .transform((value): string[] => {
    if (value === undefined || value === null) return [];
    if (Array.isArray(value)) {
      return value.map((name) => name.trim()).filter((name) => name.length > 0);
    }
    const separator = value.includes(";") ? ";" : ",";
    return value
      .split(separator)
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  });

export const StepGroupType = z.enum(["alternative", "parallel"]);

export const ProcessStep = z.object({
  stepName: z.string().trim().min(1),
  averageTimeHours: z.number().min(0).default(0),
  resourcesNeeded: z.number().int().min(1).default(1),
  errorRatePct: z.number().min(0).max(100).default(0),
  costPerInstance: z.number().min(0).default(0),
  dependsOn: DependsOn,
  groupId: z.string().min(1).optional(),
  groupType: StepGroupType.optional(),
  /** Field names whose values were estimated rather than supplied */
  estimatedFields: z.array(z.string()).default([]),
});

export type ProcessStepT = z.infer<typeof ProcessStep>;
export type ProcessStepInput = z.input<typeof ProcessStep>;

export const ProcessData = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(""),
  steps: z.array(ProcessStep),
});

export type ProcessDataT = z.infer<typeof ProcessData>;
export type ProcessDataInput = z.input<typeof ProcessData>;

export function stepKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Validate raw input into ProcessData.
 *
 * @throws ZodError on field-level validation failures
 * @throws DataInvariantError when there are no steps or step names collide
 */
export function parseProcessData(input: unknown): ProcessDataT {
  const process = ProcessData.parse(input);
  assertProcessInvariants(process);
  return process;
}

export function assertProcessInvariants(process: ProcessDataT): void {
  if (process.steps.length === 0) {
    throw new DataInvariantError(
      `Process '${process.name}' has no steps`,
      "process_has_steps"
    );
  }
  const seen = new Set<string>();
  for (const step of process.steps) {
    const key = stepKey(step.stepName);
    if (seen.has(key)) {
      throw new DataInvariantError(
        `Duplicate step name '${step.stepName}' in process '${process.name}'`,
        "unique_step_names"
      );
    }
    seen.add(key);
  }
}

export function totalTimeHours(process: ProcessDataT): number {
  return process.steps.reduce((sum, step) => sum + step.averageTimeHours, 0);
}

export function totalCost(process: ProcessDataT): number {
  return process.steps.reduce((sum, step) => sum + step.costPerInstance, 0);
}

export function stepNames(process: ProcessDataT): string[] {
  return process.steps.map((step) => step.stepName);
}

/**
 * Case-insensitive step lookup
 */
export function getStep(process: ProcessDataT, name: string): ProcessStepT | undefined {
  const key = stepKey(name);
  return process.steps.find((step) => stepKey(step.stepName) === key);
}

type MergeableField = "averageTimeHours" | "costPerInstance" | "errorRatePct" | "resourcesNeeded" | "dependsOn";

function overwrittenFields(incoming: ProcessStepT): MergeableField[] {
  const fields: MergeableField[] = [];
  if (incoming.averageTimeHours > 0) fields.push("averageTimeHours");
  if (incoming.costPerInstance > 0) fields.push("costPerInstance");
  if (incoming.errorRatePct > 0) fields.push("errorRatePct");
  if (incoming.resourcesNeeded !== 1) fields.push("resourcesNeeded");
  if (incoming.dependsOn.length > 0) fields.push("dependsOn");
  return fields;
}

function mergeStep(existing: ProcessStepT, incoming: ProcessStepT): ProcessStepT {
  const fields = overwrittenFields(incoming);
  const overwritten = new Set<string>(fields);

  const estimatedFields = [
    ...existing.estimatedFields.filter((field) => !overwritten.has(field)),
    ...incoming.estimatedFields.filter((field) => overwritten.has(field)),
  ];

  return {
    ...existing,
    averageTimeHours: overwritten.has("averageTimeHours") ? incoming.averageTimeHours : existing.averageTimeHours,
    costPerInstance: overwritten.has("costPerInstance") ? incoming.costPerInstance : existing.costPerInstance,
    errorRatePct: overwritten.has("errorRatePct") ? incoming.errorRatePct : existing.errorRatePct,
    resourcesNeeded: overwritten.has("resourcesNeeded") ? incoming.resourcesNeeded : existing.resourcesNeeded,
    dependsOn: overwritten.has("dependsOn") ? [...incoming.dependsOn] : [...existing.dependsOn],
    groupId: incoming.groupId ?? existing.groupId,
    groupType: incoming.groupType ?? existing.groupType,
    estimatedFields: [...new Set(estimatedFields)],
  };
}

/**
 * Merge newly supplied process data into an existing process.
 *
 * Steps match by case-insensitive name. Existing order is kept and new
 * steps are appended. Only non-zero / non-default incoming values
 * overwrite existing ones. Neither input is mutated.
 */
export function mergeProcessData(base: ProcessDataT, incoming: ProcessDataT): ProcessDataT {
  const incomingByKey = new Map<string, ProcessStepT>();
  for (const step of incoming.steps) {
    const key = stepKey(step.stepName);
    const previous = incomingByKey.get(key);
    incomingByKey.set(key, previous ? mergeStep(previous, step) : step);
  }

  const merged: ProcessStepT[] = [];
  const placed = new Set<string>();

  for (const step of base.steps) {
    const key = stepKey(step.stepName);
    if (placed.has(key)) continue;
    const update = incomingByKey.get(key);
    merged.push(update ? mergeStep(step, update) : { ...step, dependsOn: [...step.dependsOn] });
    placed.add(key);
  }

  for (const step of incoming.steps) {
    const key = stepKey(step.stepName);
    if (placed.has(key)) continue;
    const update = incomingByKey.get(key);
    if (update) {
      merged.push({ ...update, dependsOn: [...update.dependsOn] });
    }
    placed.add(key);
  }

  return {
    name: base.name,
    description: incoming.description.trim() ? incoming.description : base.description,
    steps: merged,
  };
}
