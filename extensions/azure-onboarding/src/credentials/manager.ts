/**
 * Azure Credentials Manager
 *
 * Resolves one @azure/identity TokenCredential per run and hands it to the
 * Graph directory and the authorization client.
 */

import type { TokenCredential } from "@azure/identity";
import type { OnboardingConfig } from "../config.js";

export type AzureCredentialMethod = OnboardingConfig["credentialMethod"];

export type CredentialsManagerOptions = {
  credentialMethod?: AzureCredentialMethod;
  tenantId?: string;
  env?: NodeJS.ProcessEnv;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  tenantId?: string;
};

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private tenantId?: string;
  private env: NodeJS.ProcessEnv;
  private current: CredentialResolutionResult | null = null;

  constructor(options: CredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.method = options.credentialMethod ?? "default";
    this.tenantId = options.tenantId ?? this.env.AZURE_TENANT_ID;
  }

  /**
   * Get the run's credential, creating it on first use.
   */
  async getCredential(): Promise<CredentialResolutionResult> {
    if (!this.current) {
      const credential = await this.createCredential();
      this.current = { credential, method: this.method, tenantId: this.tenantId };
    }
    return this.current;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  private async createCredential(): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (this.method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);

      case "service-principal": {
        const clientId = this.env.AZURE_CLIENT_ID;
        const clientSecret = this.env.AZURE_CLIENT_SECRET;
        if (!this.tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);
    }
  }
}

export function createCredentialsManagerFromConfig(
  config: Pick<OnboardingConfig, "credentialMethod" | "tenantId">,
  env?: NodeJS.ProcessEnv,
): AzureCredentialsManager {
  return new AzureCredentialsManager({
    credentialMethod: config.credentialMethod,
    tenantId: config.tenantId,
    env,
  });
}
