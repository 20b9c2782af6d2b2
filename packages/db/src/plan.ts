import {
  DEFAULT_DATABASE,
  DEFAULT_EXTENSION,
  DEFAULT_ROLE,
  IDENTIFIER_PATTERN,
  MAX_IDENTIFIER_LENGTH,
  ValidationError,
} from "@cml-bootstrap/utils";
import { z } from "zod";

export interface BootstrapPlan {
  extension: string;
  database: string;
  role: string;
}

export const DEFAULT_PLAN: Readonly<BootstrapPlan> = Object.freeze({
  extension: DEFAULT_EXTENSION,
  database: DEFAULT_DATABASE,
  role: DEFAULT_ROLE,
});

// Names are emitted as quoted identifiers, so the character set has to keep
// double quotes out.
export const identifierSchema = z
  .string()
  .min(1, "Must not be empty")
  .max(MAX_IDENTIFIER_LENGTH, `Must be at most ${MAX_IDENTIFIER_LENGTH} characters`)
  .regex(
    IDENTIFIER_PATTERN,
    "Must start with a letter or underscore and contain only letters, digits, _, $ or -",
  );

const planSchema = z.object({
  extension: identifierSchema.default(DEFAULT_EXTENSION),
  database: identifierSchema.default(DEFAULT_DATABASE),
  role: identifierSchema.default(DEFAULT_ROLE),
});

export function issueDetails(issues: z.ZodIssue[]): Record<string, string[]> {
  const details: Record<string, string[]> = {};
  for (const issue of issues) {
    const path = issue.path.join(".");
    if (!details[path]) details[path] = [];
    details[path].push(issue.message);
  }
  return details;
}

export function parsePlan(input: Partial<BootstrapPlan> = {}): BootstrapPlan {
  const result = planSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError("Invalid bootstrap plan", issueDetails(result.error.issues));
  }
  return result.data;
}
