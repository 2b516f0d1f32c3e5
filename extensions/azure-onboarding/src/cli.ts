/**
 * Azure Onboarding — CLI Commands
 *
 * `onboard` grants a new user every role listed in the permission manifest
 * for their client and position.
 */

import type { Command } from "commander";
import { loadConfig, type OnboardingConfig } from "./config.js";
import { createCredentialsManagerFromConfig, type AzureCredentialsManager } from "./credentials/manager.js";
import { OnboardingError, formatErrorMessage } from "./errors.js";
import { createIAMManager } from "./iam/manager.js";
import type { RoleAssigner } from "./iam/types.js";
import { GraphIdentityDirectory, type IdentityDirectory } from "./identity/directory.js";
import { ManifestLoader } from "./manifest/loader.js";
import { validateJob } from "./onboarding/job.js";
import { OnboardingOrchestrator } from "./onboarding/orchestrator.js";
import { withRunSession } from "./onboarding/session.js";
import { formatSummary, writeResultsFile } from "./report/results.js";

export const EXIT_OK = 0;
export const EXIT_ROW_FAILURES = 1;
export const EXIT_FATAL = 2;

export type CliContext = {
  program: Command;
  logger: { info: (msg: string) => void; warn: (msg: string) => void; error: (msg: string) => void };
};

/** Factories for the Azure-facing collaborators; tests swap in fakes. */
export type OnboardingCliServices = {
  createDirectory: (config: OnboardingConfig, credentials: AzureCredentialsManager) => IdentityDirectory;
  createRoleAssigner: (
    config: OnboardingConfig,
    credentials: AzureCredentialsManager,
    subscriptionId: string,
  ) => RoleAssigner;
  env: NodeJS.ProcessEnv;
};

export type OnboardCommandOptions = {
  user: string;
  position: string;
  client: string;
  subscription: string;
  manifestRoot?: string;
  logDir?: string;
  results?: string;
  credentialMethod?: string;
  identityResolution?: string;
  config?: string;
};

export const defaultCliServices: OnboardingCliServices = {
  createDirectory: (config, credentials) => new GraphIdentityDirectory(credentials, config.graphEndpoint),
  createRoleAssigner: (config, credentials, subscriptionId) =>
    createIAMManager(credentials, subscriptionId, config.principalType),
  env: process.env,
};

/**
 * Run one onboarding job from parsed flags and return the process exit code.
 */
export async function runOnboardCommand(
  opts: OnboardCommandOptions,
  ctx: Pick<CliContext, "logger">,
  services: OnboardingCliServices = defaultCliServices,
): Promise<number> {
  try {
    const job = validateJob({
      userPrincipalName: opts.user,
      position: opts.position,
      client: opts.client,
      subscriptionId: opts.subscription,
    });
    const config = await loadConfig({
      configFile: opts.config,
      env: services.env,
      overrides: {
        manifestRoot: opts.manifestRoot,
        logDir: opts.logDir,
        credentialMethod: opts.credentialMethod,
        identityResolution: opts.identityResolution,
      },
    });

    return await withRunSession(
      {
        label: `${job.client}-${job.position}`,
        logDir: config.logDir,
        level: config.logging.level,
        console: config.logging.console,
        transcript: config.logging.transcript,
      },
      async ({ logger, transcriptPath }) => {
        const credentials = createCredentialsManagerFromConfig(config, services.env);
        const orchestrator = new OnboardingOrchestrator({
          manifests: new ManifestLoader(config.manifestRoot),
          directory: services.createDirectory(config, credentials),
          roles: services.createRoleAssigner(config, credentials, job.subscriptionId),
          logger,
          identityResolution: config.identityResolution,
        });

        const report = await orchestrator.run(job);
        if (opts.results) {
          await writeResultsFile(opts.results, report);
          logger.info(`Results written to ${opts.results}`);
        }
        if (transcriptPath) logger.info(`Transcript: ${transcriptPath}`);

        const summary = formatSummary(report);
        if (report.summary.failed > 0) {
          ctx.logger.warn(`Onboarding finished with failures: ${summary}`);
          return EXIT_ROW_FAILURES;
        }
        ctx.logger.info(`Onboarding complete: ${summary}`);
        return EXIT_OK;
      },
    );
  } catch (error) {
    ctx.logger.error(error instanceof OnboardingError ? error.message : formatErrorMessage(error));
    return EXIT_FATAL;
  }
}

export function registerOnboardingCli(
  ctx: CliContext,
  services: OnboardingCliServices = defaultCliServices,
): void {
  ctx.program
    .command("onboard")
    .description("Grant a user the Azure roles listed in their client/position permission manifest")
    .requiredOption("--user <upn>", "User principal name to onboard")
    .requiredOption("--position <position>", "Position, e.g. Developer")
    .requiredOption("--client <client>", "Client the user is assigned to")
    .requiredOption("--subscription <id>", "Target subscription ID")
    .option("--manifest-root <dir>", "Directory holding <client>-<position>-Permissions.csv files")
    .option("--log-dir <dir>", "Directory for run transcripts")
    .option("--results <file>", "Write per-row results as CSV")
    .option("--credential-method <method>", "default | cli | service-principal | managed-identity")
    .option("--identity-resolution <mode>", "per-job | per-request")
    .option("--config <file>", "JSON configuration file")
    .action(async (opts: OnboardCommandOptions) => {
      process.exitCode = await runOnboardCommand(opts, ctx, services);
    });
}
