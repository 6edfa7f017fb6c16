/**
 * @module dispatcher
 *
 * In-process fan-out of domain events to registered observers.
 *
 * Handlers run synchronously in registration order. A throwing handler is
 * logged and skipped; the remaining handlers still run and the operation
 * that raised the event is unaffected.
 *
 * @example
 * ```ts
 * import { makeNotificationDispatcher } from "@civicpulse/core/dispatcher";
 *
 * const dispatcher = makeNotificationDispatcher();
 * const unsubscribe = dispatcher.subscribe("BadgeEarned", (e) => {
 *   console.log(`${e.userId} earned ${e.earned.badge.name}`);
 * });
 * ```
 */

import type { DomainEvent, DomainEventKind, EventOf } from "./adt.ts";
import type { LogLevel } from "./config.ts";
import { createLogger } from "./logger.ts";
import { describeThrown } from "./ports.ts";

export type EventHandler<K extends DomainEventKind> = (event: EventOf<K>) => void;

/** Outcome of delivering one event. */
export type DispatchReport = Readonly<{
  kind: DomainEventKind;
  delivered: number;
  failed: number;
}>;

export type NotificationDispatcher = Readonly<{
  /** Registers a handler; returns a function that removes it again. */
  subscribe: <K extends DomainEventKind>(
    kind: K,
    handler: EventHandler<K>,
  ) => () => void;
  dispatch: (event: DomainEvent) => DispatchReport;
  handlerCount: (kind: DomainEventKind) => number;
}>;

export type DispatcherOptions = Readonly<{
  /** Pins this dispatcher's log level; the process-wide one otherwise. */
  logLevel?: LogLevel;
}>;

type Subscription = Readonly<{ invoke: (event: DomainEvent) => void }>;

function isEventOf<K extends DomainEventKind>(
  event: DomainEvent,
  kind: K,
): event is EventOf<K> {
  return event._type === kind;
}

export function makeNotificationDispatcher(
  opts: DispatcherOptions = {},
): NotificationDispatcher {
  const log = createLogger("dispatcher", opts.logLevel);
  const subscriptions = new Map<DomainEventKind, Subscription[]>();

  function subscribe<K extends DomainEventKind>(
    kind: K,
    handler: EventHandler<K>,
  ): () => void {
    const sub: Subscription = {
      invoke: (event) => {
        if (isEventOf(event, kind)) handler(event);
      },
    };
    const list = subscriptions.get(kind) ?? [];
    list.push(sub);
    subscriptions.set(kind, list);

    return () => {
      const current = subscriptions.get(kind);
      if (!current) return;
      const idx = current.indexOf(sub);
      if (idx >= 0) current.splice(idx, 1);
    };
  }

  function dispatch(event: DomainEvent): DispatchReport {
    // Snapshot so handlers that (un)subscribe mid-dispatch don't skew order.
    const handlers = [...(subscriptions.get(event._type) ?? [])];
    let failed = 0;

    handlers.forEach((sub, position) => {
      try {
        sub.invoke(event);
      } catch (error) {
        failed++;
        log.error("Event handler failed", {
          event: event._type,
          position,
          reason: describeThrown(error),
        });
      }
    });

    log.debug("Event dispatched", {
      event: event._type,
      handlers: handlers.length,
      failed,
    });

    return {
      kind: event._type,
      delivered: handlers.length - failed,
      failed,
    };
  }

  return {
    subscribe,
    dispatch,
    handlerCount: (kind) => subscriptions.get(kind)?.length ?? 0,
  };
}
