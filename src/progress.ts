import type {
  BadgeId,
  EarnedBadge,
  Issue,
  Level,
  UserId,
  UserProgress,
} from "./adt.ts";
import { evaluateBadges, levelForPoints } from "./gamification.ts";
import { sortByKey } from "./sort.ts";

/** What one submission changed for its user. */
export type SubmissionDelta = Readonly<{
  pointsAwarded: number;
  newlyEarned: readonly EarnedBadge[];
  previousLevel: Level;
  progress: UserProgress;
}>;

/**
 * Per-user gamification state, created lazily on a user's first submission.
 * Points only grow and earned badges are never dropped.
 */
export type ProgressLedger = Readonly<{
  get: (userId: UserId) => UserProgress | undefined;
  /** Adds the issue's awarded points, appends it to history, re-evaluates badges. */
  recordSubmission: (issue: Issue) => SubmissionDelta;
  /** Counts a resolution towards the submitter; no points or badges change. */
  recordResolution: (issue: Issue) => UserProgress | undefined;
  all: () => readonly UserProgress[];
}>;

type ProgressRecord = {
  readonly userId: UserId;
  points: number;
  readonly badges: Map<BadgeId, EarnedBadge>;
  readonly history: Issue[];
  issuesResolved: number;
  lastActiveAt: string;
};

function snapshot(r: ProgressRecord): UserProgress {
  return {
    userId: r.userId,
    points: r.points,
    level: levelForPoints(r.points),
    badges: sortByKey([...r.badges.values()], (b) => b.earnedAt),
    reportsSubmitted: r.history.length,
    issuesResolved: r.issuesResolved,
    history: r.history.map((i) => i.id),
    lastActiveAt: r.lastActiveAt,
  };
}

export function makeProgressLedger(): ProgressLedger {
  const records = new Map<UserId, ProgressRecord>();

  function recordSubmission(issue: Issue): SubmissionDelta {
    let record = records.get(issue.userId);
    if (!record) {
      record = {
        userId: issue.userId,
        points: 0,
        badges: new Map(),
        history: [],
        issuesResolved: 0,
        lastActiveAt: issue.submittedAt,
      };
      records.set(issue.userId, record);
    }

    const previousLevel = levelForPoints(record.points);
    record.points += issue.awardedPoints;
    record.history.push(issue);
    if (issue.submittedAt > record.lastActiveAt) {
      record.lastActiveAt = issue.submittedAt;
    }

    const { newlyEarned } = evaluateBadges(
      record.history,
      new Set(record.badges.keys()),
    );
    for (const earned of newlyEarned) record.badges.set(earned.badge.id, earned);

    return {
      pointsAwarded: issue.awardedPoints,
      newlyEarned,
      previousLevel,
      progress: snapshot(record),
    };
  }

  function recordResolution(issue: Issue): UserProgress | undefined {
    const record = records.get(issue.userId);
    if (!record) return undefined;
    record.issuesResolved++;
    return snapshot(record);
  }

  return {
    get: (userId) => {
      const record = records.get(userId);
      return record ? snapshot(record) : undefined;
    },
    recordSubmission,
    recordResolution,
    all: () => [...records.values()].map(snapshot),
  };
}
