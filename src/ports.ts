/**
 * @module ports
 *
 * Port types for dependency injection, and every error the core reports.
 *
 * Errors are plain `_type`-tagged records returned inside `Result`s; the
 * collaborator layer decides how to present them to users.
 *
 * @example
 * ```ts
 * import type { Env } from "@civicpulse/core/ports";
 *
 * // Fixed clock for deterministic tests
 * const env: Env = { now: () => "2024-01-01T00:00:00.000Z" };
 * ```
 */

import type { IssueId, IssueStatus } from "./adt.ts";

/** A single field-level problem found while validating a draft. */
export type FieldIssue = Readonly<{ field: string; reason: string }>;

/** Error: malformed submission (missing or oversized field). */
export type ValidationError = Readonly<
  { _type: "ValidationError"; issues: readonly FieldIssue[] }
>;

/** Error: the referenced issue identifier is unknown. */
export type NotFoundError = Readonly<{ _type: "NotFound"; id: string }>;

/** Error: the requested status change is not allowed by the workflow. */
export type InvalidTransitionError = Readonly<
  {
    _type: "InvalidTransition";
    id: IssueId;
    from: IssueStatus;
    to: IssueStatus;
  }
>;

/** Discriminated union of every error the core can return. */
export type CoreError =
  | ValidationError
  | NotFoundError
  | InvalidTransitionError;

/** Environment port providing timestamp generation. */
export type Env = Readonly<{ now: () => string }>;

/** Default environment backed by the system clock. */
export const systemEnv: Env = { now: () => new Date().toISOString() };

/** Renders a core error as a single human-readable line. */
export function describeError(e: CoreError): string {
  switch (e._type) {
    case "ValidationError":
      return `invalid submission: ${
        e.issues.map((i) => `${i.field} ${i.reason}`).join("; ")
      }`;
    case "NotFound":
      return `issue ${e.id} not found`;
    case "InvalidTransition":
      return `issue ${e.id} cannot move from ${e.from} to ${e.to}`;
  }
}

/** Message of anything a callback threw, including values with no string form. */
export function describeThrown(thrown: unknown): string {
  try {
    return thrown instanceof Error ? thrown.message : String(thrown);
  } catch {
    return Object.prototype.toString.call(thrown);
  }
}
