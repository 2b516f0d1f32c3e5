/**
 * Azure Onboarding — Error Types
 *
 * Fatal errors abort a run before any grant is attempted. Row errors are
 * captured in that row's outcome and the run continues.
 */

export type OnboardingErrorCode =
  | "InvalidJob"
  | "ConfigValidation"
  | "ManifestNotFound"
  | "ManifestInvalid"
  | "MalformedRow"
  | "UnknownPrincipal"
  | "UnknownResourceType"
  | "RoleAssignmentFailed";

export class OnboardingError extends Error {
  constructor(
    message: string,
    public readonly code: OnboardingErrorCode,
    public readonly fatal: boolean,
  ) {
    super(message);
    this.name = "OnboardingError";
  }
}

// =============================================================================
// Fatal
// =============================================================================

export class InvalidJobError extends OnboardingError {
  constructor(public readonly problems: string[]) {
    super(`Invalid onboarding job: ${problems.join("; ")}`, "InvalidJob", true);
    this.name = "InvalidJobError";
  }
}

export class ConfigValidationError extends OnboardingError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, "ConfigValidation", true);
    this.name = "ConfigValidationError";
  }
}

export class ManifestNotFoundError extends OnboardingError {
  constructor(public readonly manifestPath: string) {
    super(`Permission manifest not found: ${manifestPath}`, "ManifestNotFound", true);
    this.name = "ManifestNotFoundError";
  }
}

export class ManifestInvalidError extends OnboardingError {
  constructor(
    public readonly manifestPath: string,
    reason: string,
  ) {
    super(`Permission manifest ${manifestPath} is invalid: ${reason}`, "ManifestInvalid", true);
    this.name = "ManifestInvalidError";
  }
}

// =============================================================================
// Row-level
// =============================================================================

export class MalformedRowError extends OnboardingError {
  constructor(
    public readonly line: number,
    public readonly missingFields: string[],
  ) {
    super(`Line ${line}: missing ${missingFields.join(", ")}`, "MalformedRow", false);
    this.name = "MalformedRowError";
  }
}

export class UnknownPrincipalError extends OnboardingError {
  constructor(
    public readonly principalName: string,
    detail?: string,
  ) {
    super(
      detail
        ? `Principal ${principalName} could not be resolved: ${detail}`
        : `Principal ${principalName} not found in directory`,
      "UnknownPrincipal",
      false,
    );
    this.name = "UnknownPrincipalError";
  }
}

export class UnknownResourceTypeError extends OnboardingError {
  constructor(public readonly resourceType: string) {
    super(`Unknown resource type: '${resourceType}'`, "UnknownResourceType", false);
    this.name = "UnknownResourceTypeError";
  }
}

export class RoleAssignmentFailedError extends OnboardingError {
  constructor(
    public readonly scope: string,
    public readonly role: string,
    public readonly upstreamDetail: string,
  ) {
    super(`Assigning '${role}' at ${scope} failed: ${upstreamDetail}`, "RoleAssignmentFailed", false);
    this.name = "RoleAssignmentFailedError";
  }
}

// =============================================================================
// Error Formatting
// =============================================================================

function readField(error: object, key: string): unknown {
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * Format an upstream (Azure SDK, Graph, network) error into a single line:
 * `[code] (HTTP status) message`.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (typeof error !== "object") return String(error);

  const code = readField(error, "code");
  const statusCode = readField(error, "statusCode") ?? readField(error, "status");
  const message = readField(error, "message");

  const parts: string[] = [];
  if (typeof code === "string" && code) parts.push(`[${code}]`);
  if ((typeof statusCode === "number" && statusCode) || (typeof statusCode === "string" && statusCode)) {
    parts.push(`(HTTP ${statusCode})`);
  }
  parts.push(typeof message === "string" && message ? message : "Unknown error");

  return parts.join(" ");
}
