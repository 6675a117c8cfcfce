import type { ZodError } from "zod";

export type PamphletErrorKind = "InvalidConfiguration" | "DecodeFailure";

export class PamphletError extends Error {
  readonly kind: PamphletErrorKind;
  readonly issues: string[];

  constructor(kind: PamphletErrorKind, message: string, issues: string[] = []) {
    super(message);
    this.name = "PamphletError";
    this.kind = kind;
    this.issues = issues;
  }
}

export function isPamphletError(error: unknown): error is PamphletError {
  return error instanceof PamphletError;
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function invalidConfiguration(message: string, error?: ZodError): PamphletError {
  return new PamphletError("InvalidConfiguration", message, error ? formatZodIssues(error) : []);
}
