/**
 * Azure IAM / RBAC Manager
 *
 * Creates role assignments via @azure/arm-authorization. Role names are
 * looked up as role definitions at the target scope.
 */

import { randomUUID } from "node:crypto";
import type { AuthorizationManagementClient } from "@azure/arm-authorization";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { PrincipalType, RoleAssigner, RoleAssignment, RoleDefinition } from "./types.js";

export class RoleDefinitionNotFoundError extends Error {
  constructor(
    public readonly roleName: string,
    public readonly scope: string,
  ) {
    super(`Role definition '${roleName}' not found at scope ${scope}`);
    this.name = "RoleDefinitionNotFoundError";
  }
}

/** OData string literal: single quotes are doubled. */
function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class AzureIAMManager implements RoleAssigner {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private principalType: PrincipalType;

  constructor(credentialsManager: AzureCredentialsManager, subscriptionId: string, principalType: PrincipalType = "User") {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.principalType = principalType;
  }

  private async getAuthClient() {
    const { AuthorizationManagementClient } = await import("@azure/arm-authorization");
    const { credential } = await this.credentialsManager.getCredential();
    return new AuthorizationManagementClient(credential, this.subscriptionId);
  }

  async getRoleDefinitionByName(roleName: string, scope: string): Promise<RoleDefinition | undefined> {
    return this.findRoleDefinition(await this.getAuthClient(), roleName, scope);
  }

  async assignRole(principalId: string, roleName: string, scope: string): Promise<RoleAssignment> {
    const client = await this.getAuthClient();
    const definition = await this.findRoleDefinition(client, roleName, scope);
    if (!definition) throw new RoleDefinitionNotFoundError(roleName, scope);

    const result = await client.roleAssignments.create(scope, randomUUID(), {
      principalId,
      roleDefinitionId: definition.id,
      principalType: this.principalType,
    });
    return {
      id: result.id ?? "",
      name: result.name ?? "",
      principalId: result.principalId ?? principalId,
      principalType: result.principalType,
      roleDefinitionId: result.roleDefinitionId ?? definition.id,
      scope: result.scope ?? scope,
      createdOn: result.createdOn?.toISOString(),
    };
  }

  private async findRoleDefinition(
    client: AuthorizationManagementClient,
    roleName: string,
    scope: string,
  ): Promise<RoleDefinition | undefined> {
    for await (const rd of client.roleDefinitions.list(scope, { filter: `roleName eq ${odataString(roleName)}` })) {
      if (rd.roleName === roleName && rd.id) {
        return { id: rd.id, name: rd.name ?? "", roleName: rd.roleName, roleType: rd.roleType ?? "" };
      }
    }
    return undefined;
  }
}

export function createIAMManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  principalType?: PrincipalType,
): AzureIAMManager {
  return new AzureIAMManager(credentialsManager, subscriptionId, principalType);
}
