/**
 * Onboarding configuration schema (TypeBox), defaults and source layering.
 *
 * Precedence, lowest first: defaults, JSON config file, environment, flags.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigValidationError } from "./errors.js";

export const configSchema = Type.Object(
  {
    manifestRoot: Type.String({ minLength: 1, description: "Directory holding <client>-<position>-Permissions.csv files" }),
    logDir: Type.String({ minLength: 1, description: "Directory for run transcripts" }),
    credentialMethod: Type.Union(
      [Type.Literal("default"), Type.Literal("cli"), Type.Literal("service-principal"), Type.Literal("managed-identity")],
      { description: "Credential method: default | cli | service-principal | managed-identity" },
    ),
    tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
    identityResolution: Type.Union([Type.Literal("per-job"), Type.Literal("per-request")], {
      description: "Resolve the principal once per run or once per manifest row",
    }),
    principalType: Type.Union([Type.Literal("User"), Type.Literal("Group"), Type.Literal("ServicePrincipal")]),
    graphEndpoint: Type.String({ minLength: 1, description: "Microsoft Graph base URL" }),
    logging: Type.Object({
      level: Type.Union([Type.Literal("debug"), Type.Literal("info"), Type.Literal("warn"), Type.Literal("error")]),
      console: Type.Boolean(),
      transcript: Type.Boolean(),
    }),
  },
  { additionalProperties: false },
);

export type OnboardingConfig = Static<typeof configSchema>;

export type OnboardingConfigOverrides = Partial<Omit<OnboardingConfig, "logging">> & {
  logging?: Partial<OnboardingConfig["logging"]>;
};

export function getDefaultConfig(): OnboardingConfig {
  return {
    manifestRoot: "./manifests",
    logDir: "./logs",
    credentialMethod: "default",
    identityResolution: "per-job",
    principalType: "User",
    graphEndpoint: "https://graph.microsoft.com",
    logging: { level: "info", console: true, transcript: true },
  };
}

// =============================================================================
// Sources
// =============================================================================

/** Overrides read from ONBOARDING_* and AZURE_* environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.ONBOARDING_MANIFEST_ROOT) overrides.manifestRoot = env.ONBOARDING_MANIFEST_ROOT;
  if (env.ONBOARDING_LOG_DIR) overrides.logDir = env.ONBOARDING_LOG_DIR;
  if (env.ONBOARDING_IDENTITY_RESOLUTION) overrides.identityResolution = env.ONBOARDING_IDENTITY_RESOLUTION;
  if (env.AZURE_CREDENTIAL_METHOD) overrides.credentialMethod = env.AZURE_CREDENTIAL_METHOD;
  if (env.AZURE_TENANT_ID) overrides.tenantId = env.AZURE_TENANT_ID;
  if (env.ONBOARDING_LOG_LEVEL) overrides.logging = { level: env.ONBOARDING_LOG_LEVEL };
  return overrides;
}

export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const raw = await readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError([`${filePath}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigValidationError([`${filePath}: expected a JSON object`]);
  }
  return parsed;
}

// =============================================================================
// Merge & Validate
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeLayer(base: Record<string, unknown>, layer: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayer(current, value) : value;
  }
  return merged;
}

export function validateConfig(candidate: unknown): OnboardingConfig {
  if (Check(configSchema, candidate)) return candidate;

  const problems: string[] = [];
  for (const error of Errors(configSchema, candidate)) {
    problems.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new ConfigValidationError(problems.length > 0 ? problems : ["configuration does not match schema"]);
}

/**
 * Merge layers over the defaults and validate the result. Later layers win;
 * `undefined` values leave the earlier value in place.
 */
export function resolveConfig(...layers: Array<Record<string, unknown> | OnboardingConfigOverrides | undefined>): OnboardingConfig {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };
  for (const layer of layers) {
    if (layer) merged = mergeLayer(merged, { ...layer });
  }
  return validateConfig(merged);
}

export async function loadConfig(options: {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Flag values; unvalidated strings are checked against the schema with the rest. */
  overrides?: OnboardingConfigOverrides | Record<string, unknown>;
}): Promise<OnboardingConfig> {
  const fileLayer = options.configFile ? await readConfigFile(options.configFile) : undefined;
  return resolveConfig(fileLayer, configFromEnv(options.env), options.overrides);
}
