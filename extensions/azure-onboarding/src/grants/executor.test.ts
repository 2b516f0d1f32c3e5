/**
 * Grant Executor — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { GrantExecutor, resolvePrincipal } from "./executor.js";
import type { IdentityDirectory } from "../identity/directory.js";
import type { RoleAssigner } from "../iam/types.js";
import { MemoryTransport, OnboardingLoggerImpl } from "../logging/logger.js";
import type { GrantRequest } from "../types.js";

const SUB = "00000000-0000-0000-0000-000000000000";

const vmRequest: GrantRequest = {
  resourceType: "VirtualMachine",
  resourceName: "VM1",
  role: "Reader",
  resourceGroupName: "RG1",
  line: 3,
};

describe("GrantExecutor", () => {
  const resolve = vi.fn<(name: string) => Promise<string | undefined>>();
  const assignRole = vi.fn<RoleAssigner["assignRole"]>();
  const directory: IdentityDirectory = { resolvePrincipal: resolve };
  const roles: RoleAssigner = { assignRole };
  let memory: MemoryTransport;
  let executor: GrantExecutor;

  beforeEach(() => {
    vi.resetAllMocks();
    memory = new MemoryTransport();
    executor = new GrantExecutor({
      directory,
      roles,
      logger: new OnboardingLoggerImpl({ subsystem: "test", transports: [memory] }),
    });
  });

  it("grants the role at the resolved scope", async () => {
    resolve.mockResolvedValue("U1");
    assignRole.mockResolvedValue({ id: "ra-1", name: "ra-1", principalId: "U1", roleDefinitionId: "rd", scope: "x" });

    const outcome = await executor.execute(vmRequest, "jane.doe@company.com", SUB);

    const scope = `/subscriptions/${SUB}/resourceGroups/RG1/providers/Microsoft.Compute/virtualMachines/VM1`;
    expect(outcome).toEqual({
      request: vmRequest,
      status: "Granted",
      detail: `Assigned 'Reader' to jane.doe@company.com at ${scope}`,
      scope,
      assignmentId: "ra-1",
    });
    expect(resolve).toHaveBeenCalledWith("jane.doe@company.com");
    expect(assignRole).toHaveBeenCalledTimes(1);
    expect(assignRole).toHaveBeenCalledWith("U1", "Reader", scope);
    expect(memory.messages("info")).toEqual([`Assigned 'Reader' to jane.doe@company.com at ${scope}`]);
  });

  it("resolves the principal on every call", async () => {
    resolve.mockResolvedValue("U1");
    assignRole.mockResolvedValue({ id: "ra", name: "ra", principalId: "U1", roleDefinitionId: "rd", scope: "x" });
    await executor.execute(vmRequest, "jane.doe@company.com", SUB);
    await executor.execute(vmRequest, "jane.doe@company.com", SUB);
    expect(resolve).toHaveBeenCalledTimes(2);
  });

  it("fails with UnknownPrincipal and skips the assignment when the user is missing", async () => {
    resolve.mockResolvedValue(undefined);
    const outcome = await executor.execute(vmRequest, "ghost@company.com", SUB);
    expect(outcome).toMatchObject({
      status: "Failed",
      reason: "UnknownPrincipal",
      detail: "Principal ghost@company.com not found in directory",
    });
    expect(assignRole).not.toHaveBeenCalled();
  });

  it("fails with UnknownResourceType for unsupported tags", async () => {
    resolve.mockResolvedValue("U1");
    const outcome = await executor.execute({ ...vmRequest, resourceType: "VM" }, "jane.doe@company.com", SUB);
    expect(outcome).toMatchObject({
      status: "Failed",
      reason: "UnknownResourceType",
      detail: "Unknown resource type: 'VM'",
    });
    expect(outcome.scope).toBeUndefined();
    expect(assignRole).not.toHaveBeenCalled();
  });

  it("surfaces the upstream failure verbatim without retrying", async () => {
    resolve.mockResolvedValue("U1");
    assignRole.mockRejectedValue(
      Object.assign(new Error("The client does not have authorization to perform action."), {
        code: "AuthorizationFailed",
        statusCode: 403,
      }),
    );

    const outcome = await executor.execute(vmRequest, "jane.doe@company.com", SUB);

    const scope = `/subscriptions/${SUB}/resourceGroups/RG1/providers/Microsoft.Compute/virtualMachines/VM1`;
    expect(outcome).toMatchObject({
      status: "Failed",
      reason: "RoleAssignmentFailed",
      scope,
      detail: `Assigning 'Reader' at ${scope} failed: [AuthorizationFailed] (HTTP 403) The client does not have authorization to perform action.`,
    });
    expect(assignRole).toHaveBeenCalledTimes(1);
    expect(memory.entries.map((e) => e.level)).toEqual(["error"]);
  });

  it("applies a pre-resolved principal without a lookup", async () => {
    assignRole.mockResolvedValue({ id: "", name: "", principalId: "U9", roleDefinitionId: "rd", scope: "x" });
    const outcome = await executor.apply(
      { resourceType: "ResourceGroup", resourceName: "RG1", role: "Contributor", resourceGroupName: "", line: 2 },
      { found: true, principalName: "jane.doe@company.com", id: "U9" },
      SUB,
    );
    expect(outcome.status).toBe("Granted");
    expect(outcome.scope).toBe(`/subscriptions/${SUB}/resourceGroups/RG1`);
    expect(outcome.assignmentId).toBeUndefined();
    expect(resolve).not.toHaveBeenCalled();
  });
});

describe("resolvePrincipal", () => {
  it("treats a lookup error as an unresolved principal", async () => {
    const directory: IdentityDirectory = {
      resolvePrincipal: vi.fn().mockRejectedValue(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })),
    };
    await expect(resolvePrincipal(directory, "jane.doe@company.com")).resolves.toEqual({
      found: false,
      principalName: "jane.doe@company.com",
      detail: "Principal jane.doe@company.com could not be resolved: [ECONNRESET] socket hang up",
    });
  });
});
