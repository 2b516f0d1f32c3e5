/**
 * Scope Resolver
 *
 * Maps a manifest resource-type tag to the ARM scope a role assignment is
 * created at. Pure string construction: no network or disk access.
 */

import { UnknownResourceTypeError } from "../errors.js";

// =============================================================================
// Resource Types
// =============================================================================

export const RESOURCE_TYPES = [
  "ResourceGroup",
  "StorageAccount",
  "VirtualMachine",
  "AppService",
  "AzureFunction",
  "KeyVault",
  "AzureSQLDatabase",
  "CosmosDB",
  "AKS",
  "LogAnalytics",
  "APIManagement",
  "ServiceBus",
  "AzureSynapseAnalytics",
  "DataFactory",
  "AzureBastion",
  "ContainerRegistry",
  "Network",
] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export type ScopeParts = {
  subscriptionId: string;
  resourceGroupName: string;
  resourceName: string;
};

export type ScopeTemplate = (parts: ScopeParts) => string;

export type ScopeResolution =
  | { ok: true; resourceType: ResourceType; scope: string }
  | { ok: false; error: UnknownResourceTypeError };

// =============================================================================
// Scope Templates
// =============================================================================

export function subscriptionScope(subscriptionId: string): string {
  return `/subscriptions/${subscriptionId}`;
}

export function resourceGroupScope(subscriptionId: string, resourceGroupName: string): string {
  return `${subscriptionScope(subscriptionId)}/resourceGroups/${resourceGroupName}`;
}

function providerScope(provider: string, suffix = ""): ScopeTemplate {
  return ({ subscriptionId, resourceGroupName, resourceName }) =>
    `${resourceGroupScope(subscriptionId, resourceGroupName)}/providers/${provider}/${resourceName}${suffix}`;
}

/**
 * One template per resource type. A ResourceGroup row names the group in
 * its ResourceName column; its ResourceGroupName column is not read.
 */
export const SCOPE_TEMPLATES: Readonly<Record<ResourceType, ScopeTemplate>> = {
  ResourceGroup: ({ subscriptionId, resourceName }) => resourceGroupScope(subscriptionId, resourceName),
  StorageAccount: providerScope("Microsoft.Storage/storageAccounts"),
  VirtualMachine: providerScope("Microsoft.Compute/virtualMachines"),
  AppService: providerScope("Microsoft.Web/sites"),
  AzureFunction: providerScope("Microsoft.Web/sites", "/functions"),
  KeyVault: providerScope("Microsoft.KeyVault/vaults"),
  AzureSQLDatabase: providerScope("Microsoft.Sql/servers"),
  CosmosDB: providerScope("Microsoft.DocumentDB/databaseAccounts"),
  AKS: providerScope("Microsoft.ContainerService/managedClusters"),
  LogAnalytics: providerScope("Microsoft.OperationalInsights/workspaces"),
  APIManagement: providerScope("Microsoft.ApiManagement/service"),
  ServiceBus: providerScope("Microsoft.ServiceBus/namespaces"),
  AzureSynapseAnalytics: providerScope("Microsoft.Synapse/workspaces"),
  DataFactory: providerScope("Microsoft.DataFactory/factories"),
  AzureBastion: providerScope("Microsoft.Network/bastionHosts"),
  ContainerRegistry: providerScope("Microsoft.ContainerRegistry/registries"),
  Network: providerScope("Microsoft.Network/virtualNetworks"),
};

const TAG_LOOKUP = new Map<string, ResourceType>(RESOURCE_TYPES.map((t) => [t.toLowerCase(), t]));

// =============================================================================
// Resolution
// =============================================================================

/** Canonical resource type for a manifest tag, matched case-insensitively. */
export function parseResourceType(tag: string): ResourceType | undefined {
  return TAG_LOOKUP.get(tag.trim().toLowerCase());
}

export function resolveScope(
  resourceType: string,
  subscriptionId: string,
  resourceGroupName: string,
  resourceName: string,
): ScopeResolution {
  const canonical = parseResourceType(resourceType);
  if (!canonical) {
    return { ok: false, error: new UnknownResourceTypeError(resourceType) };
  }
  const scope = SCOPE_TEMPLATES[canonical]({ subscriptionId, resourceGroupName, resourceName });
  return { ok: true, resourceType: canonical, scope };
}
