/**
 * @module notification_feed
 *
 * User-facing notification inbox built on top of the dispatcher. It is an
 * ordinary subscriber: the core never depends on it, and removing it leaves
 * submissions and transitions untouched.
 */

import type { DomainEvent, DomainEventKind, UserId } from "./adt.ts";
import type { NotificationDispatcher } from "./dispatcher.ts";
import { newId } from "./id.ts";
import type { NotFoundError } from "./ports.ts";
import type { Result } from "./result.ts";
import { err, ok } from "./result.ts";
import { sortByKey } from "./sort.ts";

export type NotificationId = `ntf-${string}`;

export type Notification = Readonly<{
  id: NotificationId;
  userId: UserId;
  kind: DomainEventKind;
  title: string;
  message: string;
  createdAt: string;
  read: boolean;
}>;

export type NotificationStats = Readonly<{ total: number; unread: number }>;

export type NotificationFeed = Readonly<{
  /** Newest first. */
  forUser: (
    userId: UserId,
    opts?: Readonly<{ unreadOnly?: boolean; limit?: number }>,
  ) => readonly Notification[];
  markRead: (
    userId: UserId,
    id: string,
  ) => Result<Notification, NotFoundError>;
  /** Returns how many notifications changed. */
  markAllRead: (userId: UserId) => number;
  stats: (userId: UserId) => NotificationStats;
  /** Removes every subscription the feed registered. */
  detach: () => void;
}>;

type Draft = Readonly<{ userId: UserId; title: string; message: string }>;

/** Text shown to the user for each event. */
export function describeEvent(event: DomainEvent): Draft {
  switch (event._type) {
    case "IssueSubmitted":
      return {
        userId: event.issue.userId,
        title: "Issue reported",
        message:
          `Your report "${event.issue.title}" was submitted and earned ${event.pointsAwarded} points.`,
      };
    case "BadgeEarned":
      return {
        userId: event.userId,
        title: "Badge earned!",
        message: `You earned the ${event.earned.badge.name} badge.`,
      };
    case "IssueStatusChanged":
      return {
        userId: event.issue.userId,
        title: "Issue status updated",
        message:
          `"${event.issue.title}" moved from ${event.from} to ${event.to}.`,
      };
    case "IssueResolved":
      return {
        userId: event.issue.userId,
        title: "Issue resolved",
        message: `"${event.issue.title}" has been resolved. Thank you for reporting it.`,
      };
  }
}

export function makeNotificationFeed(
  dispatcher: NotificationDispatcher,
): NotificationFeed {
  const inboxes = new Map<UserId, Notification[]>();
  const issued = new Set<string>();
  let sequence = 0;

  function record(event: DomainEvent): void {
    const draft = describeEvent(event);
    const id = newId(
      "ntf",
      `${draft.userId}|${event._type}|${event.at}|${sequence++}`,
      issued,
    );
    issued.add(id);
    const inbox = inboxes.get(draft.userId) ?? [];
    inbox.push({ id, kind: event._type, createdAt: event.at, read: false, ...draft });
    inboxes.set(draft.userId, inbox);
  }

  const unsubscribers = [
    dispatcher.subscribe("IssueSubmitted", record),
    dispatcher.subscribe("BadgeEarned", record),
    dispatcher.subscribe("IssueStatusChanged", record),
    dispatcher.subscribe("IssueResolved", record),
  ];

  function markRead(
    userId: UserId,
    id: string,
  ): Result<Notification, NotFoundError> {
    const inbox = inboxes.get(userId) ?? [];
    const idx = inbox.findIndex((n) => n.id === id);
    const current = inbox[idx];
    if (!current) return err({ _type: "NotFound", id });
    const updated = { ...current, read: true };
    inbox[idx] = updated;
    return ok(updated);
  }

  return {
    forUser: (userId, opts = {}) => {
      const inbox = inboxes.get(userId) ?? [];
      // Reverse first so equal timestamps still list the latest first.
      const newest = sortByKey([...inbox].reverse(), (n) => n.createdAt, "desc");
      const visible = opts.unreadOnly ? newest.filter((n) => !n.read) : newest;
      return opts.limit !== undefined ? visible.slice(0, opts.limit) : visible;
    },
    markRead,
    markAllRead: (userId) => {
      const inbox = inboxes.get(userId) ?? [];
      let changed = 0;
      inbox.forEach((n, idx) => {
        if (!n.read) {
          inbox[idx] = { ...n, read: true };
          changed++;
        }
      });
      return changed;
    },
    stats: (userId) => {
      const inbox = inboxes.get(userId) ?? [];
      return {
        total: inbox.length,
        unread: inbox.filter((n) => !n.read).length,
      };
    },
    detach: () => unsubscribers.forEach((off) => off()),
  };
}
