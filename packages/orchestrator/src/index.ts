export { Orchestrator, checkOutputLayout, resolveCompilerPath } from "./orchestrator";
export type { BuildReport, OrchestratorOptions } from "./orchestrator";
export { createOrchestrator } from "./create-orchestrator";
export type { CreateOrchestratorOptions } from "./create-orchestrator";
export { EventBus } from "./event-bus";
export type { BusEvent, EventDataMap, EventType } from "./event-bus";
