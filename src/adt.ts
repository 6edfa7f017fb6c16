/** Branded string type for issue IDs (format: `iss-*`). */
export type IssueId = `iss-${string}`;

/** Opaque identifier of the submitting user, supplied by the session layer. */
export type UserId = string;

/** Closed set of municipal service categories. */
export const ISSUE_CATEGORIES = [
  "WaterSupply",
  "Electricity",
  "Roads",
  "WasteManagement",
  "PublicSafety",
  "ParksAndRecreation",
  "BuildingPermits",
  "Other",
] as const;

/** Municipal service category of an issue. */
export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

/** Priorities in ascending order of urgency. */
export const ISSUE_PRIORITIES = ["Low", "Medium", "High", "Critical"] as const;

/** Issue urgency, ordered Low < Medium < High < Critical. */
export type IssuePriority = (typeof ISSUE_PRIORITIES)[number];

/** Workflow states, in lifecycle order. */
export const ISSUE_STATUSES = [
  "Open",
  "InProgress",
  "Resolved",
  "Closed",
] as const;

/** Issue workflow states. */
export type IssueStatus = (typeof ISSUE_STATUSES)[number];

/** Coarse geographic buckets derived from free-text locations. */
export const LOCATION_ZONES = [
  "Central",
  "North",
  "South",
  "East",
  "West",
  "Other",
] as const;

export type LocationZone = (typeof LOCATION_ZONES)[number];

/** Reporter levels in ascending order. */
export const LEVELS = [
  "Bronze",
  "Silver",
  "Gold",
  "Platinum",
  "Diamond",
] as const;

export type Level = (typeof LEVELS)[number];

/**
 * A municipal problem report.
 *
 * Issues are immutable values - the store replaces records wholesale.
 */
export type Issue = Readonly<{
  /** Unique issue identifier. */
  id: IssueId;
  /** Short summary of the problem. */
  title: string;
  /** Free-text description (may be empty). */
  description: string;
  category: IssueCategory;
  priority: IssuePriority;
  status: IssueStatus;
  /** Free-text location, e.g. "12 North Street". */
  location: string;
  /** Submitting user. */
  userId: UserId;
  /** ISO timestamp of submission. */
  submittedAt: string;
  /** ISO timestamp set on entering Resolved or Closed; never cleared. */
  resolvedAt?: string;
  /** Attachment references stored by the upload collaborator. */
  attachments: readonly string[];
  /** Points awarded at submission; fixed afterwards. */
  awardedPoints: number;
}>;

/** Identifier of a badge definition, e.g. `FirstReport` or `CategorySpecialist:Roads`. */
export type BadgeId = string;

/** Badge families; category badges share a kind across categories. */
export type BadgeKind =
  | "FirstReport"
  | "CommunityHelper"
  | "ConsistentReporter"
  | "CommunityChampion"
  | "MediaContributor"
  | "EmergencyResponder"
  | "CategorySpecialist"
  | "CategoryChampion";

/**
 * Which issues count towards a badge. Every present field must match;
 * an empty criteria object matches every issue.
 */
export type BadgeCriteria = Readonly<{
  categories?: readonly IssueCategory[];
  priority?: IssuePriority;
  withAttachments?: boolean;
}>;

/** Immutable achievement definition. */
export type Badge = Readonly<{
  id: BadgeId;
  name: string;
  description: string;
  kind: BadgeKind;
  criteria: BadgeCriteria;
  /** Inclusive number of matching issues needed to earn the badge. */
  requiredCount: number;
  pointsValue: number;
}>;

/** A badge held by a user, stamped with the submission that earned it. */
export type EarnedBadge = Readonly<{
  badge: Badge;
  /** Submission time of the issue that first satisfied the threshold. */
  earnedAt: string;
  /** Issue that first satisfied the threshold. */
  issueId: IssueId;
}>;

/** Derived gamification state for one user. */
export type UserProgress = Readonly<{
  userId: UserId;
  /** Cumulative points; only ever increases. */
  points: number;
  /** Always `levelForPoints(points)`. */
  level: Level;
  /** Earned badges ordered by earn time; never shrinks. */
  badges: readonly EarnedBadge[];
  reportsSubmitted: number;
  issuesResolved: number;
  /** Submitted issue ids in submission order. */
  history: readonly IssueId[];
  /** ISO timestamp of the latest submission. */
  lastActiveAt: string;
}>;

/** One entry in an issue's status timeline. */
export type StatusChange = Readonly<{
  from: IssueStatus | null;
  to: IssueStatus;
  at: string;
}>;

/** Event: a new issue was accepted. */
export type IssueSubmitted = Readonly<{
  _type: "IssueSubmitted";
  at: string;
  issue: Issue;
  pointsAwarded: number;
}>;

/** Event: an issue moved between workflow states. */
export type IssueStatusChanged = Readonly<{
  _type: "IssueStatusChanged";
  at: string;
  issue: Issue;
  from: IssueStatus;
  to: IssueStatus;
}>;

/** Event: a user crossed a badge threshold. */
export type BadgeEarned = Readonly<{
  _type: "BadgeEarned";
  at: string;
  userId: UserId;
  earned: EarnedBadge;
}>;

/** Event: an issue entered the Resolved state. */
export type IssueResolved = Readonly<{
  _type: "IssueResolved";
  at: string;
  issue: Issue;
}>;

/** Discriminated union of all domain events. */
export type DomainEvent =
  | IssueSubmitted
  | IssueStatusChanged
  | BadgeEarned
  | IssueResolved;

export type DomainEventKind = DomainEvent["_type"];

/** Narrows a domain event union to one variant. */
export type EventOf<K extends DomainEventKind> = Extract<
  DomainEvent,
  { _type: K }
>;
