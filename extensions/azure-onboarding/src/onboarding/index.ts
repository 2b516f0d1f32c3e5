export { OnboardingOrchestrator, summarize } from "./orchestrator.js";
export type { OnboardingOrchestratorDeps } from "./orchestrator.js";
export { validateJob } from "./job.js";
export { withRunSession, transcriptFileName } from "./session.js";
export type { RunSession, RunSessionOptions } from "./session.js";
