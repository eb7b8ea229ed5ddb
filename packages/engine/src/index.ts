export { SessionOrchestrator } from "./SessionOrchestrator";
export type { SessionOrchestratorOptions, SubmitResult } from "./SessionOrchestrator";
export type { IGameModule, GameUISpec } from "./interfaces/IGameModule";
