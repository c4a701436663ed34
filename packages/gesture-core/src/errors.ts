import type { ZodIssue } from "zod";

function describeIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "value"}: ${issue.message}`)
    .join("; ");
}

export class InvalidInputError extends Error {
  constructor(readonly issues: readonly ZodIssue[]) {
    super(`Invalid landmark set: ${describeIssues(issues)}`);
    this.name = "InvalidInputError";
  }
}

export class ConfigurationError extends Error {
  constructor(readonly issues: readonly ZodIssue[]) {
    super(`Invalid configuration: ${describeIssues(issues)}`);
    this.name = "ConfigurationError";
  }
}
