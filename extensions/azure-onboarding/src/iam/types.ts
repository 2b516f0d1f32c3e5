/**
 * Azure IAM / RBAC — Type Definitions
 */

export type PrincipalType = "User" | "Group" | "ServicePrincipal";

export type RoleDefinition = {
  id: string;
  name: string;
  roleName: string;
  roleType: string;
};

export type RoleAssignment = {
  id: string;
  name: string;
  principalId: string;
  principalType?: string;
  roleDefinitionId: string;
  scope: string;
  createdOn?: string;
};

/**
 * Creates one role assignment. A rejection carries the upstream failure
 * (insufficient permission, duplicate assignment, throttling, unknown role).
 */
export interface RoleAssigner {
  assignRole(principalId: string, roleName: string, scope: string): Promise<RoleAssignment>;
}
