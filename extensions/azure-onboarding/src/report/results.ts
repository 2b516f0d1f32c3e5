/**
 * Result records: the per-row view of a run, for downstream tooling.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatCsvRow } from "../manifest/csv.js";
import type { GrantFailureReason, GrantStatus, OnboardingReport } from "../types.js";

export type ResultRecord = {
  jobId: string;
  line: number;
  resourceType: string;
  resourceName: string;
  role: string;
  resourceGroupName: string;
  scope: string;
  status: GrantStatus;
  reason: GrantFailureReason | "";
  detail: string;
};

export const RESULT_COLUMNS = [
  "JobId",
  "Line",
  "ResourceType",
  "ResourceName",
  "Role",
  "ResourceGroupName",
  "Scope",
  "Status",
  "Reason",
  "Detail",
] as const;

export function toResultRecords(report: OnboardingReport): ResultRecord[] {
  return report.outcomes.map((outcome) => ({
    jobId: report.jobId,
    line: outcome.request.line,
    resourceType: outcome.request.resourceType,
    resourceName: outcome.request.resourceName,
    role: outcome.request.role,
    resourceGroupName: outcome.request.resourceGroupName,
    scope: outcome.scope ?? "",
    status: outcome.status,
    reason: outcome.reason ?? "",
    detail: outcome.detail,
  }));
}

export function formatResultsCsv(records: ResultRecord[]): string {
  const lines = [formatCsvRow([...RESULT_COLUMNS])];
  for (const r of records) {
    lines.push(
      formatCsvRow([
        r.jobId,
        String(r.line),
        r.resourceType,
        r.resourceName,
        r.role,
        r.resourceGroupName,
        r.scope,
        r.status,
        r.reason,
        r.detail,
      ]),
    );
  }
  return `${lines.join("\n")}\n`;
}

export async function writeResultsFile(filePath: string, report: OnboardingReport): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatResultsCsv(toResultRecords(report)), "utf8");
}

export function formatSummary(report: Pick<OnboardingReport, "summary">): string {
  const { granted, failed, total } = report.summary;
  return `${granted} granted, ${failed} failed (${total} total)`;
}
