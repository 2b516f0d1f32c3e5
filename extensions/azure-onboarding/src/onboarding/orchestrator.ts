/**
 * Onboarding Orchestrator
 *
 * Validates the job, loads the manifest, resolves the principal and drives
 * the grant executor over every manifest row in order. Only an invalid job
 * or an unreadable manifest aborts a run; every row gets exactly one outcome.
 */

import { randomUUID } from "node:crypto";
import { GrantExecutor, failedOutcome, resolvePrincipal } from "../grants/executor.js";
import type { IdentityDirectory } from "../identity/directory.js";
import type { RoleAssigner } from "../iam/types.js";
import { createSilentLogger, type OnboardingLogger } from "../logging/logger.js";
import type { ManifestLoader } from "../manifest/loader.js";
import type {
  GrantOutcome,
  IdentityResolutionMode,
  OnboardingJob,
  OnboardingReport,
  OnboardingSummary,
  PrincipalResolution,
} from "../types.js";
import { validateJob } from "./job.js";

export type OnboardingOrchestratorDeps = {
  manifests: Pick<ManifestLoader, "load">;
  directory: IdentityDirectory;
  roles: RoleAssigner;
  logger?: OnboardingLogger;
  identityResolution?: IdentityResolutionMode;
  /** Run id factory; defaults to random UUIDs. */
  newJobId?: () => string;
};

export function summarize(outcomes: GrantOutcome[]): OnboardingSummary {
  const granted = outcomes.filter((o) => o.status === "Granted").length;
  return { total: outcomes.length, granted, failed: outcomes.length - granted };
}

export class OnboardingOrchestrator {
  private manifests: Pick<ManifestLoader, "load">;
  private directory: IdentityDirectory;
  private roles: RoleAssigner;
  private logger: OnboardingLogger;
  private identityResolution: IdentityResolutionMode;
  private newJobId: () => string;

  constructor(deps: OnboardingOrchestratorDeps) {
    this.manifests = deps.manifests;
    this.directory = deps.directory;
    this.roles = deps.roles;
    this.logger = deps.logger ?? createSilentLogger();
    this.identityResolution = deps.identityResolution ?? "per-job";
    this.newJobId = deps.newJobId ?? randomUUID;
  }

  async run(input: Partial<OnboardingJob>): Promise<OnboardingReport> {
    const job = validateJob(input);
    const jobId = this.newJobId();
    const startedAt = new Date().toISOString();
    const log = this.logger.withContext({ jobId });

    log.info(`Onboarding ${job.userPrincipalName} as ${job.position} for ${job.client}`, {
      subscriptionId: job.subscriptionId,
      identityResolution: this.identityResolution,
    });

    const manifest = await this.manifests.load(job.client, job.position);
    log.info(`Loaded ${manifest.entries.length} grant request(s) from ${manifest.source}`);

    const executor = new GrantExecutor({
      directory: this.directory,
      roles: this.roles,
      logger: log.child("grants"),
    });

    let principal: PrincipalResolution | undefined;
    if (this.identityResolution === "per-job") {
      principal = await resolvePrincipal(this.directory, job.userPrincipalName);
      if (principal.found) {
        log.info(`Resolved ${job.userPrincipalName} to ${principal.id}`);
      } else {
        log.error(`${principal.detail}; every grant will fail`);
      }
    }

    const outcomes: GrantOutcome[] = [];
    for (const entry of manifest.entries) {
      if (!entry.ok) {
        const outcome = failedOutcome(entry.request, entry.error);
        log.warn(`MalformedRow: ${outcome.detail}`, { line: entry.line });
        outcomes.push(outcome);
        continue;
      }
      outcomes.push(
        principal
          ? await executor.apply(entry.request, principal, job.subscriptionId)
          : await executor.execute(entry.request, job.userPrincipalName, job.subscriptionId),
      );
    }

    const summary = summarize(outcomes);
    const completedAt = new Date().toISOString();
    const line = `Completed: ${summary.granted} granted, ${summary.failed} failed (${summary.total} total)`;
    if (summary.failed > 0) log.warn(line);
    else log.info(line);

    return {
      jobId,
      job,
      manifestPath: manifest.source,
      status: "Completed",
      startedAt,
      completedAt,
      outcomes,
      summary,
    };
  }
}
