/**
 * Scope Resolver — Unit Tests
 */

import { describe, it, expect } from "vitest";
import { RESOURCE_TYPES, SCOPE_TEMPLATES, parseResourceType, resolveScope } from "./resolver.js";
import { UnknownResourceTypeError } from "../errors.js";

const SUB = "00000000-0000-0000-0000-000000000000";
const RG_PREFIX = `/subscriptions/${SUB}/resourceGroups/rg-app/providers`;

describe("resolveScope", () => {
  it("uses the resource name as the group for ResourceGroup rows", () => {
    const result = resolveScope("ResourceGroup", SUB, "ignored-rg", "RG1");
    expect(result).toEqual({
      ok: true,
      resourceType: "ResourceGroup",
      scope: `/subscriptions/${SUB}/resourceGroups/RG1`,
    });
  });

  it.each([
    ["StorageAccount", "Microsoft.Storage/storageAccounts/res1"],
    ["VirtualMachine", "Microsoft.Compute/virtualMachines/res1"],
    ["AppService", "Microsoft.Web/sites/res1"],
    ["AzureFunction", "Microsoft.Web/sites/res1/functions"],
    ["KeyVault", "Microsoft.KeyVault/vaults/res1"],
    ["AzureSQLDatabase", "Microsoft.Sql/servers/res1"],
    ["CosmosDB", "Microsoft.DocumentDB/databaseAccounts/res1"],
    ["AKS", "Microsoft.ContainerService/managedClusters/res1"],
    ["LogAnalytics", "Microsoft.OperationalInsights/workspaces/res1"],
    ["APIManagement", "Microsoft.ApiManagement/service/res1"],
    ["ServiceBus", "Microsoft.ServiceBus/namespaces/res1"],
    ["AzureSynapseAnalytics", "Microsoft.Synapse/workspaces/res1"],
    ["DataFactory", "Microsoft.DataFactory/factories/res1"],
    ["AzureBastion", "Microsoft.Network/bastionHosts/res1"],
    ["ContainerRegistry", "Microsoft.ContainerRegistry/registries/res1"],
    ["Network", "Microsoft.Network/virtualNetworks/res1"],
  ])("builds the %s scope", (resourceType, providerPath) => {
    const result = resolveScope(resourceType, SUB, "rg-app", "res1");
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.scope).toBe(`${RG_PREFIX}/${providerPath}`);
  });

  it("has a template for every resource type", () => {
    expect(Object.keys(SCOPE_TEMPLATES).sort()).toEqual([...RESOURCE_TYPES].sort());
  });

  it("reports unknown tags without building a path", () => {
    const result = resolveScope("VM", SUB, "rg-app", "VM1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnknownResourceTypeError);
      expect(result.error.resourceType).toBe("VM");
      expect(result.error.message).toBe("Unknown resource type: 'VM'");
    }
  });

  it("embeds an empty resource group verbatim", () => {
    const result = resolveScope("KeyVault", SUB, "", "kv1");
    expect(result).toEqual({
      ok: true,
      resourceType: "KeyVault",
      scope: `/subscriptions/${SUB}/resourceGroups//providers/Microsoft.KeyVault/vaults/kv1`,
    });
  });

  it("is deterministic", () => {
    const a = resolveScope("CosmosDB", SUB, "rg-data", "cosmos1");
    const b = resolveScope("CosmosDB", SUB, "rg-data", "cosmos1");
    expect(a).toEqual(b);
  });
});

describe("parseResourceType", () => {
  it("matches tags case-insensitively and trims them", () => {
    expect(parseResourceType("virtualmachine")).toBe("VirtualMachine");
    expect(parseResourceType("  AKS ")).toBe("AKS");
    expect(parseResourceType("aks")).toBe("AKS");
  });

  it("returns undefined for unsupported tags", () => {
    expect(parseResourceType("VM")).toBeUndefined();
    expect(parseResourceType("")).toBeUndefined();
  });
});
