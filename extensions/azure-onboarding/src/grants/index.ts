export { GrantExecutor, failedOutcome, resolvePrincipal } from "./executor.js";
export type { GrantExecutorDeps, RowLevelError } from "./executor.js";
