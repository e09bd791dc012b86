/**
 * Discipline profile loader and validator.
 *
 * Responsible for:
 * - Validating raw profile input against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing the profile so no stage can mutate a heuristic table
 */

import type { ZodIssue } from "zod";
import { DisciplineProfileSchema, type DisciplineProfile } from "./schema.js";

/**
 * Structured validation error for a discipline profile.
 */
export class DisciplineProfileError extends Error {
  public readonly issues: ProfileValidationIssue[];

  constructor(message: string, issues: ProfileValidationIssue[]) {
    super(message);
    this.name = "DisciplineProfileError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Discipline profile validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ProfileValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

export function formatZodIssues(zodIssues: ZodIssue[]): ProfileValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load a discipline profile.
 *
 * @param input - Raw profile object (defaults are applied for optional tables)
 * @returns Validated and frozen profile
 * @throws DisciplineProfileError if validation fails
 */
export function loadDisciplineProfile(input: unknown): Readonly<DisciplineProfile> {
  const result = DisciplineProfileSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new DisciplineProfileError(
      `Invalid discipline profile: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate a discipline profile without loading it.
 */
export function validateDisciplineProfile(input: unknown): {
  success: boolean;
  profile?: DisciplineProfile;
  errors?: ProfileValidationIssue[];
} {
  const result = DisciplineProfileSchema.safeParse(input);

  if (result.success) {
    return { success: true, profile: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
