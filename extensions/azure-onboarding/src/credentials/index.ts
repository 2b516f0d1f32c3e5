export { AzureCredentialsManager, createCredentialsManagerFromConfig } from "./manager.js";
export type {
  AzureCredentialMethod,
  CredentialsManagerOptions,
  CredentialResolutionResult,
} from "./manager.js";
