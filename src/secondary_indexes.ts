import type {
  Issue,
  IssueCategory,
  IssueId,
  IssuePriority,
  IssueStatus,
  LocationZone,
} from "./adt.ts";
import { ISSUE_STATUSES } from "./adt.ts";
import type { ZoneResolver } from "./zones.ts";
import { keywordZoneResolver } from "./zones.ts";

/**
 * Secondary indexes over the issue set, one bucket map per dimension.
 *
 * Indexes do not watch the store: the lifecycle coordinator pairs every
 * store mutation with exactly one call here. Lookups return copies, and an
 * empty set for keys without entries.
 */
export type SecondaryIndexes = Readonly<{
  /** Files the issue under its category, priority, zone and Open status. */
  onIssueCreated: (issue: Issue) => void;
  /** Moves the issue between status buckets; other dimensions are untouched. */
  onStatusChanged: (issue: Issue, from: IssueStatus, to: IssueStatus) => void;
  byCategory: (category: IssueCategory) => ReadonlySet<IssueId>;
  byPriority: (priority: IssuePriority) => ReadonlySet<IssueId>;
  byStatus: (status: IssueStatus) => ReadonlySet<IssueId>;
  byLocationZone: (zone: LocationZone) => ReadonlySet<IssueId>;
  /** The resolver the zone index was built with. */
  zoneOf: ZoneResolver;
  /** Bucket sizes per key, for reporting. */
  counts: () => IndexCounts;
}>;

export type IndexCounts = Readonly<{
  byCategory: ReadonlyMap<IssueCategory, number>;
  byPriority: ReadonlyMap<IssuePriority, number>;
  byStatus: ReadonlyMap<IssueStatus, number>;
  byLocationZone: ReadonlyMap<LocationZone, number>;
}>;

export type SecondaryIndexOptions = Readonly<{ zoneOf?: ZoneResolver }>;

function addTo<K>(index: Map<K, Set<IssueId>>, key: K, id: IssueId): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = new Set();
    index.set(key, bucket);
  }
  bucket.add(id);
}

function lookup<K>(
  index: ReadonlyMap<K, ReadonlySet<IssueId>>,
  key: K,
): ReadonlySet<IssueId> {
  return new Set(index.get(key));
}

function sizes<K>(index: ReadonlyMap<K, ReadonlySet<IssueId>>): Map<K, number> {
  const res = new Map<K, number>();
  for (const [key, ids] of index) {
    if (ids.size > 0) res.set(key, ids.size);
  }
  return res;
}

export function makeSecondaryIndexes(
  opts: SecondaryIndexOptions = {},
): SecondaryIndexes {
  const zoneOf = opts.zoneOf ?? keywordZoneResolver;
  const byCategory = new Map<IssueCategory, Set<IssueId>>();
  const byPriority = new Map<IssuePriority, Set<IssueId>>();
  const byStatus = new Map<IssueStatus, Set<IssueId>>();
  const byZone = new Map<LocationZone, Set<IssueId>>();

  return {
    onIssueCreated: (issue) => {
      addTo(byCategory, issue.category, issue.id);
      addTo(byPriority, issue.priority, issue.id);
      addTo(byZone, zoneOf(issue.location), issue.id);
      addTo(byStatus, "Open", issue.id);
    },

    onStatusChanged: (issue, from, to) => {
      byStatus.get(from)?.delete(issue.id);
      // Keep exactly one status bucket per id even if `from` was stale.
      for (const status of ISSUE_STATUSES) {
        if (status !== to) byStatus.get(status)?.delete(issue.id);
      }
      addTo(byStatus, to, issue.id);
    },

    byCategory: (category) => lookup(byCategory, category),
    byPriority: (priority) => lookup(byPriority, priority),
    byStatus: (status) => lookup(byStatus, status),
    byLocationZone: (zone) => lookup(byZone, zone),
    zoneOf,

    counts: () => ({
      byCategory: sizes(byCategory),
      byPriority: sizes(byPriority),
      byStatus: sizes(byStatus),
      byLocationZone: sizes(byZone),
    }),
  };
}
