export { AzureIAMManager, RoleDefinitionNotFoundError, createIAMManager } from "./manager.js";
export type { PrincipalType, RoleAssigner, RoleAssignment, RoleDefinition } from "./types.js";
