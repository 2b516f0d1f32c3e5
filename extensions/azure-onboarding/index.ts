/**
 * Azure RBAC onboarding: grants a new user the roles listed in the permission
 * manifest for their client and position.
 */

export * from "./src/types.js";
export * from "./src/errors.js";
export * from "./src/config.js";
export * from "./src/logging/index.js";
export * from "./src/credentials/index.js";
export * from "./src/scope/index.js";
export * from "./src/manifest/index.js";
export * from "./src/identity/index.js";
export * from "./src/iam/index.js";
export * from "./src/grants/index.js";
export * from "./src/onboarding/index.js";
export * from "./src/report/index.js";
export {
  EXIT_FATAL,
  EXIT_OK,
  EXIT_ROW_FAILURES,
  defaultCliServices,
  registerOnboardingCli,
  runOnboardCommand,
} from "./src/cli.js";
export type { CliContext, OnboardCommandOptions, OnboardingCliServices } from "./src/cli.js";
