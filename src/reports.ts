/**
 * @module reports
 *
 * Read-only views over user progress: leaderboard, badge statistics and
 * program-wide gamification metrics.
 */

import type {
  Badge,
  EarnedBadge,
  IssueCategory,
  Level,
  UserId,
  UserProgress,
} from "./adt.ts";
import { BADGE_CATALOG } from "./badges.ts";
import type { IndexCounts } from "./secondary_indexes.ts";
import { sortByKey, sortByKeys } from "./sort.ts";

export type LeaderboardEntry = Readonly<{
  rank: number;
  userId: UserId;
  points: number;
  level: Level;
  reportsSubmitted: number;
  issuesResolved: number;
  badgeCount: number;
  lastActiveAt: string;
}>;

/** Ranks by points, then reports submitted, then user id. */
export function leaderboard(
  progress: readonly UserProgress[],
  top: number,
): readonly LeaderboardEntry[] {
  return sortByKeys(
    progress,
    { by: (p) => p.points, direction: "desc" },
    { by: (p) => p.reportsSubmitted, direction: "desc" },
    { by: (p) => p.userId },
  ).slice(0, Math.max(0, top)).map((p, index) => ({
    rank: index + 1,
    userId: p.userId,
    points: p.points,
    level: p.level,
    reportsSubmitted: p.reportsSubmitted,
    issuesResolved: p.issuesResolved,
    badgeCount: p.badges.length,
    lastActiveAt: p.lastActiveAt,
  }));
}

/** A catalog badge annotated with whether the user holds it. */
export type BadgeStanding = Readonly<{
  badge: Badge;
  earned: boolean;
  earnedAt?: string;
}>;

export type BadgeStats = Readonly<{
  totalBadges: number;
  earnedBadges: number;
  lockedBadges: number;
  pointsFromBadges: number;
  /** 0-100, rounded to two decimals. */
  completionPercentage: number;
  /** Up to three most recently earned, newest first. */
  recentBadges: readonly EarnedBadge[];
  standings: readonly BadgeStanding[];
}>;

/**
 * Summarizes a user's badges against the full catalog. Users without
 * progress get the catalog with everything locked.
 */
export function badgeStats(
  progress: UserProgress | undefined,
  catalog: readonly Badge[] = BADGE_CATALOG,
): BadgeStats {
  const held = new Map(
    (progress?.badges ?? []).map((e) => [e.badge.id, e]),
  );
  const standings = catalog.map((badge): BadgeStanding => {
    const e = held.get(badge.id);
    return e ? { badge, earned: true, earnedAt: e.earnedAt } : {
      badge,
      earned: false,
    };
  });

  const earned = [...held.values()];
  const total = catalog.length;
  return {
    totalBadges: total,
    earnedBadges: earned.length,
    lockedBadges: total - earned.length,
    pointsFromBadges: earned.reduce((sum, e) => sum + e.badge.pointsValue, 0),
    completionPercentage: total > 0
      ? Math.round((earned.length / total) * 10000) / 100
      : 0,
    recentBadges: sortByKey(earned, (e) => e.earnedAt, "desc").slice(0, 3),
    standings,
  };
}

export type GamificationMetrics = Readonly<{
  totalUsers: number;
  totalIssues: number;
  totalPointsAwarded: number;
  totalBadgesEarned: number;
  averageIssuesPerUser: number;
  averagePointsPerUser: number;
  levelDistribution: Readonly<Record<Level, number>>;
  categoryDistribution: ReadonlyMap<IssueCategory, number>;
}>;

export function gamificationMetrics(
  progress: readonly UserProgress[],
  totalIssues: number,
  counts: IndexCounts,
): GamificationMetrics {
  const levelDistribution: Record<Level, number> = {
    Bronze: 0,
    Silver: 0,
    Gold: 0,
    Platinum: 0,
    Diamond: 0,
  };
  let points = 0;
  let badges = 0;
  for (const p of progress) {
    levelDistribution[p.level]++;
    points += p.points;
    badges += p.badges.length;
  }

  const users = progress.length;
  return {
    totalUsers: users,
    totalIssues,
    totalPointsAwarded: points,
    totalBadgesEarned: badges,
    averageIssuesPerUser: users > 0 ? totalIssues / users : 0,
    averagePointsPerUser: users > 0 ? points / users : 0,
    levelDistribution,
    categoryDistribution: counts.byCategory,
  };
}
