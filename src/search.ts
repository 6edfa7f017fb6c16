/**
 * @module search
 *
 * Filtered issue listing backed by the secondary indexes.
 *
 * Indexed dimensions are intersected first; user and text filters are then
 * applied to the (usually small) candidate set.
 *
 * @example
 * ```ts
 * import { searchIssues } from "@civicpulse/core/search";
 *
 * const urgentRoads = searchIssues(store, indexes, {
 *   category: "Roads",
 *   priority: "Critical",
 *   status: "Open",
 * });
 * ```
 */

import type {
  Issue,
  IssueCategory,
  IssueId,
  IssuePriority,
  IssueStatus,
  LocationZone,
  UserId,
} from "./adt.ts";
import { ISSUE_PRIORITIES } from "./adt.ts";
import type { IssueStore } from "./issue_store.ts";
import type { SecondaryIndexes } from "./secondary_indexes.ts";
import { sortByKeys } from "./sort.ts";

/** Filter criteria; every present field must match. */
export type IssueFilter = Readonly<
  {
    category?: IssueCategory;
    priority?: IssuePriority;
    status?: IssueStatus;
    zone?: LocationZone;
    userId?: UserId;
    /** Case-insensitive match against title and description */
    text?: string;
  }
>;

function intersect(
  acc: ReadonlySet<IssueId> | undefined,
  next: ReadonlySet<IssueId>,
): ReadonlySet<IssueId> {
  if (!acc) return next;
  const res = new Set<IssueId>();
  for (const id of acc) if (next.has(id)) res.add(id);
  return res;
}

/** Most urgent first, then most points, then newest. */
export function rankIssues(issues: readonly Issue[]): Issue[] {
  return sortByKeys(
    issues,
    { by: (i) => ISSUE_PRIORITIES.indexOf(i.priority), direction: "desc" },
    { by: (i) => i.awardedPoints, direction: "desc" },
    { by: (i) => i.submittedAt, direction: "desc" },
  );
}

export function searchIssues(
  store: IssueStore,
  indexes: SecondaryIndexes,
  f: IssueFilter = {},
): readonly Issue[] {
  let ids: ReadonlySet<IssueId> | undefined;
  if (f.category) ids = intersect(ids, indexes.byCategory(f.category));
  if (f.priority) ids = intersect(ids, indexes.byPriority(f.priority));
  if (f.status) ids = intersect(ids, indexes.byStatus(f.status));
  if (f.zone) ids = intersect(ids, indexes.byLocationZone(f.zone));

  const candidates: Issue[] = [];
  if (ids) {
    for (const id of ids) {
      const found = store.get(id);
      if (found.ok) candidates.push(found.value);
    }
  } else {
    candidates.push(...store.listAll());
  }

  const t = f.text?.trim().toLowerCase();
  return rankIssues(candidates.filter((i) => {
    if (f.userId !== undefined && i.userId !== f.userId) return false;
    if (
      t &&
      !(i.title.toLowerCase().includes(t) ||
        i.description.toLowerCase().includes(t))
    ) return false;
    return true;
  }));
}
