/**
 * Identity Directory
 *
 * Resolves a user principal name to its Entra ID object id through
 * Microsoft Graph.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";

export interface IdentityDirectory {
  /** Object id of the principal, or `undefined` when the directory has no such principal. */
  resolvePrincipal(name: string): Promise<string | undefined>;
}

export const GRAPH_SCOPE = "https://graph.microsoft.com/.default";

export class GraphRequestError extends Error {
  constructor(
    public readonly statusCode: number,
    statusText: string,
    public readonly code?: string,
    detail?: string,
  ) {
    super(`Graph API error: ${statusCode} ${statusText}${detail ? ` - ${detail}` : ""}`);
    this.name = "GraphRequestError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readGraphError(response: Response): Promise<{ code?: string; message?: string }> {
  try {
    const body: unknown = await response.json();
    const error = isRecord(body) ? body.error : undefined;
    if (!isRecord(error)) return {};
    return {
      code: typeof error.code === "string" ? error.code : undefined,
      message: typeof error.message === "string" ? error.message : undefined,
    };
  } catch {
    return {};
  }
}

export class GraphIdentityDirectory implements IdentityDirectory {
  private credentialsManager: AzureCredentialsManager;
  private endpoint: string;

  constructor(credentialsManager: AzureCredentialsManager, endpoint = "https://graph.microsoft.com") {
    this.credentialsManager = credentialsManager;
    this.endpoint = endpoint.replace(/\/+$/, "");
  }

  private async fetchGraph(path: string): Promise<Record<string, unknown> | undefined> {
    const { credential } = await this.credentialsManager.getCredential();
    const token = await credential.getToken(GRAPH_SCOPE);
    if (!token) throw new Error(`No access token issued for ${GRAPH_SCOPE}`);

    const response = await fetch(`${this.endpoint}/v1.0/${path}`, {
      headers: {
        Authorization: `Bearer ${token.token}`,
        "Content-Type": "application/json",
      },
    });
    if (response.status === 404) return undefined;
    if (!response.ok) {
      const error = await readGraphError(response);
      throw new GraphRequestError(response.status, response.statusText, error.code, error.message);
    }
    const body: unknown = await response.json();
    return isRecord(body) ? body : undefined;
  }

  async resolvePrincipal(name: string): Promise<string | undefined> {
    const user = await this.fetchGraph(`users/${encodeURIComponent(name)}?$select=id,userPrincipalName`);
    return typeof user?.id === "string" && user.id ? user.id : undefined;
  }
}
