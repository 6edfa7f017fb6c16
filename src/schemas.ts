import {
  array,
  maxLength,
  minLength,
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  string,
  trim,
} from "valibot";
import type { InferInput, InferOutput } from "valibot";
import { ISSUE_CATEGORIES, ISSUE_PRIORITIES } from "./adt.ts";
import type { FieldIssue } from "./ports.ts";
import type { Result } from "./result.ts";
import { err, ok } from "./result.ts";

function requiredText(max: number) {
  return pipe(
    string("is required"),
    trim(),
    minLength(1, "is required"),
    maxLength(max, `cannot exceed ${max} characters`),
  );
}

export const IssueDraftSchema = object({
  title: requiredText(200),
  description: optional(
    pipe(
      string("must be a string"),
      trim(),
      maxLength(1000, "cannot exceed 1000 characters"),
    ),
    "",
  ),
  category: picklist(ISSUE_CATEGORIES, "must be a known category"),
  priority: optional(
    picklist(ISSUE_PRIORITIES, "must be a known priority"),
    "Medium",
  ),
  location: requiredText(300),
  userId: requiredText(200),
  attachments: optional(array(string("must be a reference string")), []),
});

/** Issue submission as handed over by the page layer. */
export type IssueDraft = InferInput<typeof IssueDraftSchema>;

/** Draft after trimming and defaulting. */
export type ValidIssueDraft = InferOutput<typeof IssueDraftSchema>;

/**
 * Validates and normalizes a draft, collecting one entry per failing field.
 */
export function parseIssueDraft(
  draft: unknown,
): Result<ValidIssueDraft, readonly FieldIssue[]> {
  const parsed = safeParse(IssueDraftSchema, draft, { abortPipeEarly: true });
  if (parsed.success) return ok(parsed.output);

  return err(parsed.issues.map((issue) => ({
    field: issue.path?.map((p) => String(p.key)).join(".") ?? "draft",
    reason: issue.message,
  })));
}
