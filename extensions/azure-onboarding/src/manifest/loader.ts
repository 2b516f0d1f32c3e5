/**
 * Manifest Loader
 *
 * Locates the permission manifest for a (client, position) pair and parses
 * it into grant requests, one entry per data row, in file order.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { MalformedRowError, ManifestInvalidError, ManifestNotFoundError } from "../errors.js";
import type { GrantRequest } from "../types.js";
import { parseCsv } from "./csv.js";

// =============================================================================
// Types
// =============================================================================

export type ManifestEntry =
  | { ok: true; request: GrantRequest }
  | { ok: false; line: number; request: GrantRequest; error: MalformedRowError };

export type Manifest = {
  source: string;
  entries: ManifestEntry[];
};

type ManifestColumn = "ResourceType" | "ResourceName" | "Role" | "ResourceGroupName";

const REQUIRED_COLUMNS: readonly ManifestColumn[] = ["ResourceType", "ResourceName", "Role"];

export const MANIFEST_EXTENSION = ".csv";

// =============================================================================
// Path Resolution
// =============================================================================

export function manifestKey(client: string, position: string): string {
  return `${client}-${position}-Permissions`;
}

export function resolveManifestPath(manifestRoot: string, client: string, position: string): string {
  return path.join(manifestRoot, `${manifestKey(client, position)}${MANIFEST_EXTENSION}`);
}

// =============================================================================
// Parsing
// =============================================================================

function mapHeader(header: string[], source: string): Record<ManifestColumn, number> {
  const index = (column: ManifestColumn) =>
    header.findIndex((h) => h.trim().toLowerCase() === column.toLowerCase());

  const columns: Record<ManifestColumn, number> = {
    ResourceType: index("ResourceType"),
    ResourceName: index("ResourceName"),
    Role: index("Role"),
    ResourceGroupName: index("ResourceGroupName"),
  };

  const missing = REQUIRED_COLUMNS.filter((c) => columns[c] < 0);
  if (missing.length > 0) {
    throw new ManifestInvalidError(source, `header is missing column(s) ${missing.join(", ")}`);
  }
  return columns;
}

/**
 * Parse manifest text. Fields are trimmed; a row that stops short of a
 * column reads that column as empty.
 */
export function parseManifest(text: string, source: string): Manifest {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    throw new ManifestInvalidError(source, "file is empty (a header row is required)");
  }
  const columns = mapHeader(header.fields, source);

  const entries: ManifestEntry[] = [];
  for (const row of rows) {
    const cell = (column: ManifestColumn) => {
      const i = columns[column];
      return i >= 0 ? (row.fields[i] ?? "").trim() : "";
    };

    // A whitespace-only line has no delimiter; a comma-only row is still a row.
    if (row.fields.length === 1 && (row.fields[0] ?? "").trim() === "") continue;

    const request: GrantRequest = {
      resourceType: cell("ResourceType"),
      resourceName: cell("ResourceName"),
      role: cell("Role"),
      resourceGroupName: cell("ResourceGroupName"),
      line: row.line,
    };

    const missing = REQUIRED_COLUMNS.filter((c) => cell(c) === "");
    if (missing.length > 0) {
      entries.push({ ok: false, line: row.line, request, error: new MalformedRowError(row.line, missing) });
    } else {
      entries.push({ ok: true, request });
    }
  }

  return { source, entries };
}

// =============================================================================
// Loading
// =============================================================================

function isMissingFileError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

export async function loadManifest(client: string, position: string, manifestRoot: string): Promise<Manifest> {
  const manifestPath = resolveManifestPath(manifestRoot, client, position);
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) throw new ManifestNotFoundError(manifestPath);
    throw error;
  }
  return parseManifest(text, manifestPath);
}

export class ManifestLoader {
  constructor(private readonly manifestRoot: string) {}

  resolvePath(client: string, position: string): string {
    return resolveManifestPath(this.manifestRoot, client, position);
  }

  load(client: string, position: string): Promise<Manifest> {
    return loadManifest(client, position, this.manifestRoot);
  }
}
