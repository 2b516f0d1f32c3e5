/**
 * Onboarding job validation.
 */

import { InvalidJobError } from "../errors.js";
import type { OnboardingJob } from "../types.js";

const JOB_FIELDS = ["userPrincipalName", "position", "client", "subscriptionId"] as const;

const SUBSCRIPTION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** client and position become part of a file name. */
function isSafePathSegment(value: string): boolean {
  return !/[\\/]/.test(value) && !value.includes("..");
}

/**
 * Validate raw job input. Every problem is collected before throwing so the
 * caller sees all of them at once.
 */
export function validateJob(input: Partial<Record<keyof OnboardingJob, string | undefined>>): OnboardingJob {
  const problems: string[] = [];
  const values: Record<keyof OnboardingJob, string> = {
    userPrincipalName: "",
    position: "",
    client: "",
    subscriptionId: "",
  };

  for (const field of JOB_FIELDS) {
    const value = input[field]?.trim() ?? "";
    if (!value) problems.push(`${field} is required`);
    values[field] = value;
  }

  if (values.subscriptionId && !SUBSCRIPTION_ID_PATTERN.test(values.subscriptionId)) {
    problems.push(`subscriptionId '${values.subscriptionId}' is not a subscription GUID`);
  }
  for (const field of ["client", "position"] as const) {
    if (values[field] && !isSafePathSegment(values[field])) {
      problems.push(`${field} '${values[field]}' may not contain path separators or '..'`);
    }
  }

  if (problems.length > 0) throw new InvalidJobError(problems);
  return values;
}
