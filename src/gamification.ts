/**
 * @module gamification
 *
 * Pure scoring rules: points per submission, levels, and badge evaluation
 * over a user's issue history. Nothing here performs I/O or keeps state.
 *
 * @example
 * ```ts
 * import { evaluateBadges, levelForPoints, pointsForSubmission } from "@civicpulse/core/gamification";
 *
 * pointsForSubmission({ priority: "Critical", attachments: ["a.jpg"] }); // 35
 * levelForPoints(260); // "Gold"
 * const { newlyEarned } = evaluateBadges(history, new Set(["FirstReport"]));
 * ```
 */

import type {
  Badge,
  BadgeCriteria,
  BadgeId,
  EarnedBadge,
  Issue,
  IssuePriority,
  Level,
} from "./adt.ts";
import { LEVELS } from "./adt.ts";
import { BADGE_CATALOG } from "./badges.ts";
import { sortByKey } from "./sort.ts";

export const BASE_POINTS = 10;
export const ATTACHMENT_BONUS = 5;

export const PRIORITY_BONUS: Readonly<Record<IssuePriority, number>> = {
  Low: 5,
  Medium: 10,
  High: 15,
  Critical: 20,
};

/** Minimum points per level, highest first. */
export const LEVEL_THRESHOLDS: readonly Readonly<
  { level: Level; minPoints: number }
>[] = [
  { level: "Diamond", minPoints: 1000 },
  { level: "Platinum", minPoints: 500 },
  { level: "Gold", minPoints: 250 },
  { level: "Silver", minPoints: 100 },
];

/** Base points plus priority bonus plus a flat bonus for any attachment. */
export function pointsForSubmission(
  issue: Pick<Issue, "priority" | "attachments">,
): number {
  return BASE_POINTS + PRIORITY_BONUS[issue.priority] +
    (issue.attachments.length > 0 ? ATTACHMENT_BONUS : 0);
}

export function levelForPoints(points: number): Level {
  return LEVEL_THRESHOLDS.find((t) => points >= t.minPoints)?.level ??
    "Bronze";
}

/** Orders levels Bronze < Silver < Gold < Platinum < Diamond. */
export function compareLevels(a: Level, b: Level): number {
  return LEVELS.indexOf(a) - LEVELS.indexOf(b);
}

export function matchesCriteria(issue: Issue, criteria: BadgeCriteria): boolean {
  if (criteria.categories && !criteria.categories.includes(issue.category)) {
    return false;
  }
  if (criteria.priority && issue.priority !== criteria.priority) return false;
  if (criteria.withAttachments && issue.attachments.length === 0) return false;
  return true;
}

export type BadgeEvaluation = Readonly<{
  /** Every badge the history qualifies for, ordered by earn time. */
  earned: readonly EarnedBadge[];
  /** Subset of `earned` absent from the previously recorded set. */
  newlyEarned: readonly EarnedBadge[];
}>;

/**
 * Returns the issue that brings `badge` to its threshold, if any.
 * `history` must already be in submission order.
 */
function thresholdIssue(
  history: readonly Issue[],
  badge: Badge,
): Issue | undefined {
  let count = 0;
  for (const issue of history) {
    if (!matchesCriteria(issue, badge.criteria)) continue;
    count++;
    if (count === badge.requiredCount) return issue;
  }
  return undefined;
}

/**
 * Evaluates every badge independently over a user's complete history.
 *
 * The earn time of a count-N badge is the submission time of the Nth
 * qualifying issue, so re-evaluating the same history always yields the
 * same timestamps.
 */
export function evaluateBadges(
  history: readonly Issue[],
  previouslyEarned: ReadonlySet<BadgeId> = new Set(),
  catalog: readonly Badge[] = BADGE_CATALOG,
): BadgeEvaluation {
  const ordered = sortByKey(history, (i) => i.submittedAt);
  const earned: EarnedBadge[] = [];

  for (const badge of catalog) {
    const issue = thresholdIssue(ordered, badge);
    if (issue) {
      earned.push({ badge, earnedAt: issue.submittedAt, issueId: issue.id });
    }
  }

  const byTime = sortByKey(earned, (e) => e.earnedAt);
  return {
    earned: byTime,
    newlyEarned: byTime.filter((e) => !previouslyEarned.has(e.badge.id)),
  };
}
