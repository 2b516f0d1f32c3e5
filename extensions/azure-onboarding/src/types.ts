/**
 * Azure Onboarding — Shared Types
 *
 * Data model shared by the manifest loader, grant executor and orchestrator.
 */

// =============================================================================
// Onboarding Job
// =============================================================================

/** Parameters of one onboarding run. All fields are non-empty once validated. */
export type OnboardingJob = {
  userPrincipalName: string;
  position: string;
  client: string;
  subscriptionId: string;
};

// =============================================================================
// Grant Requests & Outcomes
// =============================================================================

/**
 * One manifest row. `resourceType` is the raw tag from the file so that an
 * unsupported tag still reaches the scope resolver and is reported there.
 */
export type GrantRequest = Readonly<{
  resourceType: string;
  resourceName: string;
  role: string;
  resourceGroupName: string;
  /** 1-based line number in the manifest file. */
  line: number;
}>;

export type GrantStatus = "Granted" | "Failed";

export type GrantFailureReason =
  | "MalformedRow"
  | "UnknownPrincipal"
  | "UnknownResourceType"
  | "RoleAssignmentFailed";

export type GrantOutcome = {
  request: GrantRequest;
  status: GrantStatus;
  reason?: GrantFailureReason;
  detail: string;
  scope?: string;
  assignmentId?: string;
};

/** Result of resolving the principal once, shared by the rows it applies to. */
export type PrincipalResolution =
  | { found: true; principalName: string; id: string }
  | { found: false; principalName: string; detail: string };

// =============================================================================
// Run Report
// =============================================================================

export type IdentityResolutionMode = "per-job" | "per-request";

export type OnboardingSummary = {
  total: number;
  granted: number;
  failed: number;
};

export type OnboardingReport = {
  jobId: string;
  job: OnboardingJob;
  manifestPath: string;
  status: "Completed";
  startedAt: string;
  completedAt: string;
  outcomes: GrantOutcome[];
  summary: OnboardingSummary;
};
