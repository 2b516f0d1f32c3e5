/**
 * Grant Executor
 *
 * Applies one grant request: principal → scope → role assignment. Row-level
 * failures become a Failed outcome; nothing here throws for them.
 */

import {
  MalformedRowError,
  RoleAssignmentFailedError,
  UnknownPrincipalError,
  UnknownResourceTypeError,
  formatErrorMessage,
} from "../errors.js";
import type { IdentityDirectory } from "../identity/directory.js";
import type { RoleAssigner } from "../iam/types.js";
import { createSilentLogger, type OnboardingLogger } from "../logging/logger.js";
import { resolveScope } from "../scope/resolver.js";
import type { GrantFailureReason, GrantOutcome, GrantRequest, PrincipalResolution } from "../types.js";

/**
 * Look up a principal, folding "not found" and lookup errors into an
 * unresolved result.
 */
export async function resolvePrincipal(directory: IdentityDirectory, name: string): Promise<PrincipalResolution> {
  try {
    const id = await directory.resolvePrincipal(name);
    if (id) return { found: true, principalName: name, id };
    return { found: false, principalName: name, detail: new UnknownPrincipalError(name).message };
  } catch (error) {
    return {
      found: false,
      principalName: name,
      detail: new UnknownPrincipalError(name, formatErrorMessage(error)).message,
    };
  }
}

export type RowLevelError =
  | MalformedRowError
  | UnknownPrincipalError
  | UnknownResourceTypeError
  | RoleAssignmentFailedError;

function failureReason(error: RowLevelError): GrantFailureReason {
  if (error instanceof MalformedRowError) return "MalformedRow";
  if (error instanceof UnknownPrincipalError) return "UnknownPrincipal";
  if (error instanceof UnknownResourceTypeError) return "UnknownResourceType";
  return "RoleAssignmentFailed";
}

export function failedOutcome(request: GrantRequest, error: RowLevelError, scope?: string): GrantOutcome {
  return { request, status: "Failed", reason: failureReason(error), detail: error.message, scope };
}

export type GrantExecutorDeps = {
  directory: IdentityDirectory;
  roles: RoleAssigner;
  logger?: OnboardingLogger;
};

export class GrantExecutor {
  private directory: IdentityDirectory;
  private roles: RoleAssigner;
  private logger: OnboardingLogger;

  constructor(deps: GrantExecutorDeps) {
    this.directory = deps.directory;
    this.roles = deps.roles;
    this.logger = deps.logger ?? createSilentLogger();
  }

  /** Resolve the principal for this request alone, then apply it. */
  async execute(request: GrantRequest, userPrincipalName: string, subscriptionId: string): Promise<GrantOutcome> {
    const principal = await resolvePrincipal(this.directory, userPrincipalName);
    return this.apply(request, principal, subscriptionId);
  }

  /** Apply a request with an already-resolved principal. */
  async apply(request: GrantRequest, principal: PrincipalResolution, subscriptionId: string): Promise<GrantOutcome> {
    const outcome = await this.attempt(request, principal, subscriptionId);
    this.report(outcome);
    return outcome;
  }

  private async attempt(
    request: GrantRequest,
    principal: PrincipalResolution,
    subscriptionId: string,
  ): Promise<GrantOutcome> {
    if (!principal.found) {
      return { request, status: "Failed", reason: "UnknownPrincipal", detail: principal.detail };
    }

    const resolution = resolveScope(request.resourceType, subscriptionId, request.resourceGroupName, request.resourceName);
    if (!resolution.ok) {
      return failedOutcome(request, resolution.error);
    }

    const { scope } = resolution;
    try {
      const assignment = await this.roles.assignRole(principal.id, request.role, scope);
      return {
        request,
        status: "Granted",
        detail: `Assigned '${request.role}' to ${principal.principalName} at ${scope}`,
        scope,
        assignmentId: assignment.id || undefined,
      };
    } catch (error) {
      return failedOutcome(request, new RoleAssignmentFailedError(scope, request.role, formatErrorMessage(error)), scope);
    }
  }

  private report(outcome: GrantOutcome): void {
    const { request } = outcome;
    const meta = {
      line: request.line,
      resourceType: request.resourceType,
      resourceName: request.resourceName,
      role: request.role,
      scope: outcome.scope,
    };
    if (outcome.status === "Granted") {
      this.logger.info(outcome.detail, meta);
    } else {
      this.logger.error(`${outcome.reason}: ${outcome.detail}`, meta);
    }
  }
}
