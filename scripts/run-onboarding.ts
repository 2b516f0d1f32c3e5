#!/usr/bin/env node
/**
 * Standalone runner for the `onboard` command.
 * Usage: npx tsx scripts/run-onboarding.ts onboard --user jane.doe@company.com --position Developer \
 *   --client ClientA --subscription <subscription-id>
 */
import { Command } from "commander";
import { registerOnboardingCli } from "../extensions/azure-onboarding/src/cli.js";

const program = new Command("rbac-onboard");
const ctx = {
  program,
  logger: {
    info: (msg: string) => console.error(msg),
    warn: (msg: string) => console.error(msg),
    error: (msg: string) => console.error(msg),
  },
};
registerOnboardingCli(ctx);
await program.parseAsync(process.argv);
