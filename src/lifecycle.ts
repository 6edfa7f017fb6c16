/**
 * @module lifecycle
 *
 * Issue lifecycle coordinator.
 *
 * Composes the store, the secondary indexes, the progress ledger and the
 * dispatcher into two operations: submitting an issue and moving it through
 * the workflow. Each operation runs as one exclusive section, so index and
 * gamification updates for a user are never interleaved with another
 * operation. Steps are not rolled back if a later one throws.
 *
 * @example
 * ```ts
 * import { makeIssueLifecycle } from "@civicpulse/core/lifecycle";
 *
 * const lifecycle = makeIssueLifecycle({ store, indexes, dispatcher });
 * const submitted = await lifecycle.submitIssue({
 *   title: "Streetlight out",
 *   category: "Electricity",
 *   priority: "High",
 *   location: "East Avenue",
 *   userId: "u-42",
 * });
 * if (submitted.ok) {
 *   await lifecycle.transitionStatus(submitted.value.issue.id, "InProgress");
 * }
 * ```
 */

import type {
  DomainEvent,
  EarnedBadge,
  Issue,
  IssueId,
  IssueStatus,
  Level,
  StatusChange,
  UserId,
  UserProgress,
} from "./adt.ts";
import type { NotificationDispatcher } from "./dispatcher.ts";
import { pointsForSubmission } from "./gamification.ts";
import type { LogLevel } from "./config.ts";
import type { ConsistencyReport } from "./integrity.ts";
import { verifyConsistency } from "./integrity.ts";
import type { IssueStore } from "./issue_store.ts";
import { createLogger } from "./logger.ts";
import { makeMutex } from "./mutex.ts";
import type { ObservabilityHook } from "./observability.ts";
import { instrument, noopObservability } from "./observability.ts";
import type {
  Env,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from "./ports.ts";
import { systemEnv } from "./ports.ts";
import type { ProgressLedger } from "./progress.ts";
import { makeProgressLedger } from "./progress.ts";
import type { Result } from "./result.ts";
import { err, ok } from "./result.ts";
import type { IssueDraft } from "./schemas.ts";
import type { SecondaryIndexes } from "./secondary_indexes.ts";

/** Allowed targets per status. Nothing ever returns to Open. */
export const STATUS_TRANSITIONS: Readonly<
  Record<IssueStatus, readonly IssueStatus[]>
> = {
  Open: ["InProgress", "Resolved"],
  InProgress: ["Resolved", "Closed"],
  Resolved: ["Closed"],
  Closed: [],
};

export function canTransition(from: IssueStatus, to: IssueStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

function isResolution(status: IssueStatus): boolean {
  return status === "Resolved" || status === "Closed";
}

/** What a single submission produced; points and badges are not cumulative. */
export type SubmissionResult = Readonly<{
  issue: Issue;
  pointsAwarded: number;
  badgesEarned: readonly EarnedBadge[];
  /** The submitter's state after this submission. */
  progress: UserProgress;
  /** Present when the submission moved the user up a level. */
  levelUp?: Readonly<{ from: Level; to: Level }>;
}>;

export type TransitionError = NotFoundError | InvalidTransitionError;

export type LifecycleOptions = Readonly<{
  store: IssueStore;
  indexes: SecondaryIndexes;
  dispatcher: NotificationDispatcher;
  ledger?: ProgressLedger;
  env?: Env;
  observability?: ObservabilityHook;
  /** Pins this coordinator's log level; the process-wide one otherwise. */
  logLevel?: LogLevel;
}>;

export type IssueLifecycle = Readonly<{
  submitIssue: (
    draft: IssueDraft,
  ) => Promise<Result<SubmissionResult, ValidationError>>;
  transitionStatus: (
    id: string,
    to: IssueStatus,
  ) => Promise<Result<Issue, TransitionError>>;
  getIssue: (id: string) => Result<Issue, NotFoundError>;
  timeline: (id: string) => Result<readonly StatusChange[], NotFoundError>;
  progressOf: (userId: UserId) => UserProgress | undefined;
  allProgress: () => readonly UserProgress[];
  verifyConsistency: () => ConsistencyReport;
}>;

export function makeIssueLifecycle(opts: LifecycleOptions): IssueLifecycle {
  const { store, indexes, dispatcher } = opts;
  const env = opts.env ?? systemEnv;
  const hook = opts.observability ?? noopObservability;
  const ledger = opts.ledger ?? makeProgressLedger();
  const mutex = makeMutex();
  const log = createLogger("lifecycle", opts.logLevel);
  const timelines = new Map<IssueId, StatusChange[]>();

  function emit(event: DomainEvent): void {
    const report = dispatcher.dispatch(event);
    hook.onEvent?.(event, report);
  }

  function submitLocked(
    draft: IssueDraft,
  ): Result<SubmissionResult, ValidationError> {
    const created = store.create(draft);
    if (!created.ok) {
      log.warn("Issue submission rejected", {
        issues: created.error.issues,
      });
      return created;
    }

    indexes.onIssueCreated(created.value);

    const pointsAwarded = pointsForSubmission(created.value);
    const updated = store.update({ ...created.value, awardedPoints: pointsAwarded });
    if (!updated.ok) {
      throw new Error(`issue ${created.value.id} missing right after creation`);
    }
    const issue = updated.value;
    timelines.set(issue.id, [{ from: null, to: "Open", at: issue.submittedAt }]);

    const delta = ledger.recordSubmission(issue);

    for (const earned of delta.newlyEarned) {
      emit({ _type: "BadgeEarned", at: env.now(), userId: issue.userId, earned });
    }
    emit({ _type: "IssueSubmitted", at: env.now(), issue, pointsAwarded });

    const level = delta.progress.level;
    log.info("Issue submitted", {
      id: issue.id,
      userId: issue.userId,
      pointsAwarded,
      badges: delta.newlyEarned.map((e) => e.badge.id),
    });

    return ok({
      issue,
      pointsAwarded,
      badgesEarned: delta.newlyEarned,
      progress: delta.progress,
      ...(level !== delta.previousLevel && {
        levelUp: { from: delta.previousLevel, to: level },
      }),
    });
  }

  function transitionLocked(
    id: string,
    to: IssueStatus,
  ): Result<Issue, TransitionError> {
    const found = store.get(id);
    if (!found.ok) return found;

    const current = found.value;
    const from = current.status;
    if (!canTransition(from, to)) {
      log.warn("Status transition rejected", { id: current.id, from, to });
      return err({ _type: "InvalidTransition", id: current.id, from, to });
    }

    const now = env.now();
    const resolvesNow = isResolution(to) && current.resolvedAt === undefined;
    const next: Issue = {
      ...current,
      status: to,
      ...(resolvesNow && { resolvedAt: now }),
    };

    const updated = store.update(next);
    if (!updated.ok) return updated;

    indexes.onStatusChanged(next, from, to);
    timelines.get(next.id)?.push({ from, to, at: now });
    if (resolvesNow) ledger.recordResolution(next);

    emit({ _type: "IssueStatusChanged", at: now, issue: next, from, to });
    if (to === "Resolved") {
      emit({ _type: "IssueResolved", at: now, issue: next });
    }

    log.info("Issue status changed", { id: next.id, from, to });
    return ok(next);
  }

  return {
    submitIssue: (draft) =>
      instrument(
        "submitIssue",
        () => mutex.runExclusive(() => submitLocked(draft)),
        hook,
      ),

    transitionStatus: (id, to) =>
      instrument(
        "transitionStatus",
        () => mutex.runExclusive(() => transitionLocked(id, to)),
        hook,
        { id, to },
      ),

    getIssue: (id) => store.get(id),

    timeline: (id) => {
      const found = store.get(id);
      if (!found.ok) return found;
      return ok([...(timelines.get(found.value.id) ?? [])]);
    },

    progressOf: (userId) => ledger.get(userId),
    allProgress: () => ledger.all(),
    verifyConsistency: () => verifyConsistency({ store, indexes, ledger }),
  };
}
