/**
 * Consistency verification between the store, the secondary indexes and
 * the progress ledger. Use it in tests and health checks to detect drift.
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
import {
  ISSUE_CATEGORIES,
  ISSUE_PRIORITIES,
  ISSUE_STATUSES,
  LOCATION_ZONES,
} from "./adt.ts";
import type { IssueStore } from "./issue_store.ts";
import type { ProgressLedger } from "./progress.ts";
import type { SecondaryIndexes } from "./secondary_indexes.ts";

export type IndexDimension = "category" | "priority" | "status" | "zone";

export type ConsistencyIssue =
  | { type: "MissingFromIndex"; dimension: IndexDimension; issueId: IssueId }
  | {
    type: "DuplicateInIndex";
    dimension: IndexDimension;
    issueId: IssueId;
    keys: string[];
  }
  | {
    type: "WrongBucket";
    dimension: IndexDimension;
    issueId: IssueId;
    expected: string;
    actual: string;
  }
  | { type: "UnknownIndexEntry"; dimension: IndexDimension; issueId: IssueId }
  | { type: "PointsMismatch"; userId: UserId; recorded: number; expected: number }
  | { type: "HistoryMismatch"; userId: UserId; recorded: number; expected: number };

export type ConsistencyReport = {
  readonly healthy: boolean;
  readonly issues: readonly ConsistencyIssue[];
  readonly stats: {
    readonly totalIssues: number;
    readonly totalUsers: number;
  };
};

type Dimension<K extends string> = Readonly<{
  name: IndexDimension;
  keys: readonly K[];
  bucket: (key: K) => ReadonlySet<IssueId>;
  expected: (issue: Issue) => K;
}>;

function checkDimension<K extends string>(
  dim: Dimension<K>,
  issues: ReadonlyMap<IssueId, Issue>,
  out: ConsistencyIssue[],
): void {
  const membership = new Map<IssueId, K[]>();
  for (const key of dim.keys) {
    for (const id of dim.bucket(key)) {
      const keys = membership.get(id) ?? [];
      keys.push(key);
      membership.set(id, keys);
    }
  }

  for (const [id, issue] of issues) {
    const keys = membership.get(id) ?? [];
    const expected = dim.expected(issue);
    const [only] = keys;
    if (only === undefined) {
      out.push({ type: "MissingFromIndex", dimension: dim.name, issueId: id });
    } else if (keys.length > 1) {
      out.push({
        type: "DuplicateInIndex",
        dimension: dim.name,
        issueId: id,
        keys: [...keys],
      });
    } else if (only !== expected) {
      out.push({
        type: "WrongBucket",
        dimension: dim.name,
        issueId: id,
        expected,
        actual: only,
      });
    }
  }

  for (const id of membership.keys()) {
    if (!issues.has(id)) {
      out.push({ type: "UnknownIndexEntry", dimension: dim.name, issueId: id });
    }
  }
}

/**
 * Checks that every issue sits in exactly one, correct bucket per index
 * dimension and that each user's points and history match their issues.
 */
export function verifyConsistency(deps: {
  store: IssueStore;
  indexes: SecondaryIndexes;
  ledger: ProgressLedger;
}): ConsistencyReport {
  const { store, indexes, ledger } = deps;
  const issues = new Map(store.listAll().map((i) => [i.id, i]));
  const out: ConsistencyIssue[] = [];

  checkDimension<IssueCategory>({
    name: "category",
    keys: ISSUE_CATEGORIES,
    bucket: indexes.byCategory,
    expected: (i) => i.category,
  }, issues, out);
  checkDimension<IssuePriority>({
    name: "priority",
    keys: ISSUE_PRIORITIES,
    bucket: indexes.byPriority,
    expected: (i) => i.priority,
  }, issues, out);
  checkDimension<IssueStatus>({
    name: "status",
    keys: ISSUE_STATUSES,
    bucket: indexes.byStatus,
    expected: (i) => i.status,
  }, issues, out);
  checkDimension<LocationZone>({
    name: "zone",
    keys: LOCATION_ZONES,
    bucket: indexes.byLocationZone,
    expected: (i) => indexes.zoneOf(i.location),
  }, issues, out);

  const byUser = new Map<UserId, Issue[]>();
  for (const issue of issues.values()) {
    const list = byUser.get(issue.userId) ?? [];
    list.push(issue);
    byUser.set(issue.userId, list);
  }

  const progress = ledger.all();
  for (const p of progress) {
    const own = byUser.get(p.userId) ?? [];
    const expectedPoints = own.reduce((sum, i) => sum + i.awardedPoints, 0);
    if (p.points !== expectedPoints) {
      out.push({
        type: "PointsMismatch",
        userId: p.userId,
        recorded: p.points,
        expected: expectedPoints,
      });
    }
    if (p.reportsSubmitted !== own.length) {
      out.push({
        type: "HistoryMismatch",
        userId: p.userId,
        recorded: p.reportsSubmitted,
        expected: own.length,
      });
    }
  }

  return {
    healthy: out.length === 0,
    issues: out,
    stats: { totalIssues: issues.size, totalUsers: progress.length },
  };
}
