/**
 * Errors raised by the dataset layer. Neither class is ever retried.
 */

import type { ConfigValidationIssue } from "../config/pipeline/loader.js";

export type ValidationIssue = ConfigValidationIssue;

/**
 * The ingested dataset is unusable (no columns, ragged columns, duplicate names).
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * A value handed to a store, registry or stage failed validation.
 */
export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
