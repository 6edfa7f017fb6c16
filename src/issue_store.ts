/**
 * @module issue_store
 *
 * Canonical in-memory collection of issues.
 *
 * The store only validates and keeps records. Indexing, gamification and
 * notification are composed around it by the lifecycle coordinator.
 *
 * @example
 * ```ts
 * import { makeIssueStore } from "@civicpulse/core/issue_store";
 *
 * const store = makeIssueStore();
 * const created = store.create({
 *   title: "Burst pipe",
 *   category: "WaterSupply",
 *   location: "North Road",
 *   userId: "u-1",
 * });
 * ```
 */

import type { Issue, IssueId } from "./adt.ts";
import { isIssueId, newIssueId } from "./id.ts";
import type { Env, NotFoundError, ValidationError } from "./ports.ts";
import { systemEnv } from "./ports.ts";
import type { Result } from "./result.ts";
import { err, ok } from "./result.ts";
import { parseIssueDraft } from "./schemas.ts";
import type { IssueDraft } from "./schemas.ts";

export type IssueStoreOptions = Readonly<{ env?: Env }>;

export type IssueStore = Readonly<{
  /**
   * Validates the draft, assigns a fresh id, stamps the submission time and
   * stores it as Open with zero awarded points.
   */
  create: (draft: IssueDraft) => Result<Issue, ValidationError>;
  get: (id: string) => Result<Issue, NotFoundError>;
  /**
   * Replaces the stored record wholesale. Reserved for the lifecycle
   * coordinator; fails for ids the store never issued.
   */
  update: (issue: Issue) => Result<Issue, NotFoundError>;
  /** Snapshot of every issue; order undefined. */
  listAll: () => readonly Issue[];
  /** Every id ever issued. */
  getExistingIds: () => ReadonlySet<IssueId>;
  size: () => number;
}>;

export function makeIssueStore(opts: IssueStoreOptions = {}): IssueStore {
  const env = opts.env ?? systemEnv;
  const issues = new Map<IssueId, Issue>();
  const issued = new Set<IssueId>();
  let sequence = 0;

  function create(draft: IssueDraft): Result<Issue, ValidationError> {
    const parsed = parseIssueDraft(draft);
    if (!parsed.ok) {
      return err({ _type: "ValidationError", issues: parsed.error });
    }

    const d = parsed.value;
    const now = env.now();
    const id = newIssueId(
      `${d.title}|${d.userId}|${now}|${sequence++}`,
      issued,
    );

    const issue: Issue = {
      id,
      title: d.title,
      description: d.description,
      category: d.category,
      priority: d.priority,
      status: "Open",
      location: d.location,
      userId: d.userId,
      submittedAt: now,
      attachments: [...d.attachments],
      awardedPoints: 0,
    };

    issued.add(id);
    issues.set(id, issue);
    return ok(issue);
  }

  function get(id: string): Result<Issue, NotFoundError> {
    const issue = isIssueId(id) ? issues.get(id) : undefined;
    return issue ? ok(issue) : err({ _type: "NotFound", id });
  }

  function update(issue: Issue): Result<Issue, NotFoundError> {
    if (!issues.has(issue.id)) return err({ _type: "NotFound", id: issue.id });
    issues.set(issue.id, issue);
    return ok(issue);
  }

  return {
    create,
    get,
    update,
    listAll: () => [...issues.values()],
    getExistingIds: () => new Set(issued),
    size: () => issues.size,
  };
}
