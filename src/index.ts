/**
 * @module @civicpulse/core
 *
 * CivicPulse - issue lifecycle, secondary indexing and gamification engine
 * for municipal issue reporting.
 *
 * This module provides the main entry point, exposing:
 * - `civicpulse.make()` - Composition root with smart defaults
 * - `civicpulse.lifecycle` - Coordinator and workflow rules
 * - `civicpulse.gamification` - Pure point, level and badge rules
 * - `civicpulse.indexes` / `civicpulse.search` - Secondary indexes and queries
 * - `civicpulse.reports` - Leaderboard, badge stats, program metrics
 * - `civicpulse.infra` - Observability, logging, configuration
 *
 * All types are re-exported for convenience.
 */

import { makeCivicPulse } from "./embed.ts";
import type { CivicPulse, EmbedOptions } from "./embed.ts";
import { makeIssueStore } from "./issue_store.ts";
import type { IssueStore, IssueStoreOptions } from "./issue_store.ts";
import { makeSecondaryIndexes } from "./secondary_indexes.ts";
import type {
  IndexCounts,
  SecondaryIndexes,
  SecondaryIndexOptions,
} from "./secondary_indexes.ts";
import {
  DEFAULT_ZONE_RULES,
  keywordZoneResolver,
  makeKeywordZoneResolver,
} from "./zones.ts";
import type { ZoneResolver, ZoneRule } from "./zones.ts";
import {
  compareLevels,
  evaluateBadges,
  levelForPoints,
  pointsForSubmission,
} from "./gamification.ts";
import type { BadgeEvaluation } from "./gamification.ts";
import { BADGE_CATALOG, findBadge } from "./badges.ts";
import { makeNotificationDispatcher } from "./dispatcher.ts";
import type {
  DispatcherOptions,
  DispatchReport,
  EventHandler,
  NotificationDispatcher,
} from "./dispatcher.ts";
import {
  canTransition,
  makeIssueLifecycle,
  STATUS_TRANSITIONS,
} from "./lifecycle.ts";
import type {
  IssueLifecycle,
  LifecycleOptions,
  SubmissionResult,
  TransitionError,
} from "./lifecycle.ts";
import { makeProgressLedger } from "./progress.ts";
import type { ProgressLedger, SubmissionDelta } from "./progress.ts";
import { makeNotificationFeed } from "./notification_feed.ts";
import type {
  Notification,
  NotificationFeed,
  NotificationStats,
} from "./notification_feed.ts";
import { rankIssues, searchIssues } from "./search.ts";
import type { IssueFilter } from "./search.ts";
import { badgeStats, gamificationMetrics, leaderboard } from "./reports.ts";
import type {
  BadgeStanding,
  BadgeStats,
  GamificationMetrics,
  LeaderboardEntry,
} from "./reports.ts";
import { verifyConsistency } from "./integrity.ts";
import type { ConsistencyIssue, ConsistencyReport } from "./integrity.ts";
import {
  instrument,
  loggingObservability,
  MetricsAggregator,
  noopObservability,
} from "./observability.ts";
import type {
  ObservabilityHook,
  OperationMetrics,
  OperationSummary,
} from "./observability.ts";
import { loadConfig } from "./config.ts";
import type { Config, LogLevel } from "./config.ts";
import { createLogger, setLogLevel } from "./logger.ts";
import type { Logger } from "./logger.ts";
import { sortByKey, sortByKeys } from "./sort.ts";
import { describeError, describeThrown, systemEnv } from "./ports.ts";
import type {
  CoreError,
  Env,
  FieldIssue,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from "./ports.ts";
import type { IssueDraft } from "./schemas.ts";
import type {
  Badge,
  BadgeCriteria,
  BadgeEarned,
  BadgeId,
  BadgeKind,
  DomainEvent,
  DomainEventKind,
  EarnedBadge,
  Issue,
  IssueCategory,
  IssueId,
  IssuePriority,
  IssueResolved,
  IssueStatus,
  IssueStatusChanged,
  IssueSubmitted,
  Level,
  LocationZone,
  StatusChange,
  UserId,
  UserProgress,
} from "./adt.ts";
import {
  andThen,
  err,
  isErr,
  isOk,
  map,
  mapErr,
  match,
  ok,
  unwrap,
  unwrapOr,
} from "./result.ts";
import type { Err, Ok, Result } from "./result.ts";

/**
 * The main CivicPulse namespace providing access to all library functionality.
 *
 * @example
 * ```ts
 * import { civicpulse } from "@civicpulse/core";
 *
 * const sdk = civicpulse.make();
 * const submitted = await sdk.submitIssue({
 *   title: "Pothole on Main Road",
 *   category: "Roads",
 *   priority: "High",
 *   location: "North Main Road",
 *   userId: "u-1",
 * });
 *
 * if (submitted.ok) {
 *   console.log(submitted.value.pointsAwarded); // 25
 *   await sdk.transitionStatus(submitted.value.issue.id, "InProgress");
 * }
 * ```
 */
export const civicpulse = {
  make: makeCivicPulse,
  store: makeIssueStore,
  indexes: {
    make: makeSecondaryIndexes,
    zones: {
      keyword: keywordZoneResolver,
      fromRules: makeKeywordZoneResolver,
      defaultRules: DEFAULT_ZONE_RULES,
    },
  },
  gamification: {
    pointsForSubmission,
    levelForPoints,
    compareLevels,
    evaluateBadges,
    catalog: BADGE_CATALOG,
    findBadge,
    ledger: makeProgressLedger,
  },
  dispatcher: makeNotificationDispatcher,
  lifecycle: {
    make: makeIssueLifecycle,
    transitions: STATUS_TRANSITIONS,
    canTransition,
    verifyConsistency,
  },
  notifications: makeNotificationFeed,
  search: {
    searchIssues,
    rankIssues,
  },
  reports: {
    leaderboard,
    badgeStats,
    gamificationMetrics,
  },
  result: {
    ok,
    err,
    andThen,
    isOk,
    isErr,
    map,
    mapErr,
    match,
    unwrap,
    unwrapOr,
  },
  infra: {
    env: systemEnv,
    describeError,
    describeThrown,
    config: loadConfig,
    setLogLevel,
    logger: createLogger,
    sort: { byKey: sortByKey, byKeys: sortByKeys },
    observability: {
      instrument,
      logging: loggingObservability,
      metrics: MetricsAggregator,
      noop: noopObservability,
    },
  },
} as const;

export type {
  Badge,
  BadgeCriteria,
  BadgeEarned,
  BadgeEvaluation,
  BadgeId,
  BadgeKind,
  BadgeStanding,
  BadgeStats,
  CivicPulse,
  Config,
  ConsistencyIssue,
  ConsistencyReport,
  CoreError,
  DispatcherOptions,
  DispatchReport,
  DomainEvent,
  DomainEventKind,
  EarnedBadge,
  EmbedOptions,
  Env,
  Err,
  EventHandler,
  FieldIssue,
  GamificationMetrics,
  IndexCounts,
  InvalidTransitionError,
  Issue,
  IssueCategory,
  IssueDraft,
  IssueFilter,
  IssueId,
  IssueLifecycle,
  IssuePriority,
  IssueResolved,
  IssueStatus,
  IssueStatusChanged,
  IssueStore,
  IssueStoreOptions,
  IssueSubmitted,
  LeaderboardEntry,
  Level,
  LifecycleOptions,
  LocationZone,
  Logger,
  LogLevel,
  NotFoundError,
  Notification,
  NotificationDispatcher,
  NotificationFeed,
  NotificationStats,
  ObservabilityHook,
  Ok,
  OperationMetrics,
  OperationSummary,
  ProgressLedger,
  Result,
  SecondaryIndexes,
  SecondaryIndexOptions,
  StatusChange,
  SubmissionDelta,
  SubmissionResult,
  TransitionError,
  UserId,
  UserProgress,
  ValidationError,
  ZoneResolver,
  ZoneRule,
};
