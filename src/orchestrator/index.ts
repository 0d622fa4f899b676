export {
  AnalysisOrchestrator,
  toResponse,
  type AnalysisResponse,
  type AnalyzeInput,
  type OrchestratorOptions,
  type ResponseErrorCode,
  type RunOptions,
} from "./orchestrator.js";
export { InMemoryCheckpointStore, type CheckpointStore } from "./checkpoint.js";
export { Stage, transition, type StageEvent } from "./machine.js";
export type { AgentState, AnalysisPhase } from "./state.js";
export type { GatewayResolver } from "./stages/types.js";
