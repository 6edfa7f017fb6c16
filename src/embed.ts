/**
 * @module embed
 *
 * High-level embedded SDK: the composition root wiring store, indexes,
 * dispatcher, progress ledger and coordinator into one object with
 * process-wide lifetime.
 *
 * @example
 * ```ts
 * import { makeCivicPulse } from "@civicpulse/core/embed";
 *
 * const sdk = makeCivicPulse();
 * sdk.subscribe("BadgeEarned", (e) => console.log(e.earned.badge.name));
 * await sdk.submitIssue({
 *   title: "Overflowing bins",
 *   category: "WasteManagement",
 *   location: "South Market",
 *   userId: "u-7",
 * });
 * const top = sdk.leaderboard();
 * ```
 */

import type {
  Issue,
  IssueStatus,
  StatusChange,
  UserId,
  UserProgress,
} from "./adt.ts";
import { loadConfig } from "./config.ts";
import type { Config } from "./config.ts";
import { makeNotificationDispatcher } from "./dispatcher.ts";
import type { NotificationDispatcher } from "./dispatcher.ts";
import type { ConsistencyReport } from "./integrity.ts";
import { makeIssueStore } from "./issue_store.ts";
import { makeIssueLifecycle } from "./lifecycle.ts";
import type { SubmissionResult, TransitionError } from "./lifecycle.ts";
import { makeNotificationFeed } from "./notification_feed.ts";
import type { NotificationFeed } from "./notification_feed.ts";
import type { ObservabilityHook } from "./observability.ts";
import type { Env, NotFoundError, ValidationError } from "./ports.ts";
import { systemEnv } from "./ports.ts";
import { badgeStats, gamificationMetrics, leaderboard } from "./reports.ts";
import type {
  BadgeStats,
  GamificationMetrics,
  LeaderboardEntry,
} from "./reports.ts";
import type { Result } from "./result.ts";
import type { IssueDraft } from "./schemas.ts";
import { searchIssues } from "./search.ts";
import type { IssueFilter } from "./search.ts";
import { makeSecondaryIndexes } from "./secondary_indexes.ts";
import type { ZoneResolver } from "./zones.ts";

export type EmbedOptions = Readonly<{
  /** Custom clock for deterministic timestamps */
  clock?: () => string;
  /** Location-to-zone heuristic (defaults to keyword matching) */
  zoneOf?: ZoneResolver;
  observability?: ObservabilityHook;
  /**
   * Settings; read from the environment when omitted. A given `logLevel`
   * applies to this instance's loggers only.
   */
  config?: Config;
  /** Attach the in-process notification inbox (defaults to true) */
  notificationFeed?: boolean;
}>;

export type CivicPulse = Readonly<{
  submitIssue: (
    draft: IssueDraft,
  ) => Promise<Result<SubmissionResult, ValidationError>>;
  transitionStatus: (
    id: string,
    status: IssueStatus,
  ) => Promise<Result<Issue, TransitionError>>;
  getIssue: (id: string) => Result<Issue, NotFoundError>;
  timeline: (id: string) => Result<readonly StatusChange[], NotFoundError>;
  searchIssues: (filter?: IssueFilter) => readonly Issue[];
  progressOf: (userId: UserId) => UserProgress | undefined;
  leaderboard: (top?: number) => readonly LeaderboardEntry[];
  badgeStats: (userId: UserId) => BadgeStats;
  metrics: () => GamificationMetrics;
  subscribe: NotificationDispatcher["subscribe"];
  verifyConsistency: () => ConsistencyReport;
  /** Present unless disabled through `notificationFeed: false`. */
  notifications?: NotificationFeed;
}>;

export function makeCivicPulse(opts: EmbedOptions = {}): CivicPulse {
  const env: Env = opts.clock ? { now: opts.clock } : systemEnv;
  const config = opts.config ?? loadConfig();
  const logLevel = opts.config?.logLevel;

  const store = makeIssueStore({ env });
  const indexes = makeSecondaryIndexes(
    opts.zoneOf ? { zoneOf: opts.zoneOf } : {},
  );
  const dispatcher = makeNotificationDispatcher(
    logLevel !== undefined ? { logLevel } : {},
  );
  const notifications = opts.notificationFeed === false
    ? undefined
    : makeNotificationFeed(dispatcher);

  const lifecycle = makeIssueLifecycle({
    store,
    indexes,
    dispatcher,
    env,
    ...(opts.observability && { observability: opts.observability }),
    ...(logLevel !== undefined && { logLevel }),
  });

  return {
    submitIssue: lifecycle.submitIssue,
    transitionStatus: lifecycle.transitionStatus,
    getIssue: lifecycle.getIssue,
    timeline: lifecycle.timeline,
    searchIssues: (filter) => searchIssues(store, indexes, filter),
    progressOf: lifecycle.progressOf,
    leaderboard: (top) =>
      leaderboard(lifecycle.allProgress(), top ?? config.leaderboardSize),
    badgeStats: (userId) => badgeStats(lifecycle.progressOf(userId)),
    metrics: () =>
      gamificationMetrics(
        lifecycle.allProgress(),
        store.size(),
        indexes.counts(),
      ),
    subscribe: dispatcher.subscribe,
    verifyConsistency: lifecycle.verifyConsistency,
    ...(notifications && { notifications }),
  };
}
