import { afterEach, expect, test, vi } from "vitest";
import type { DomainEvent, Issue } from "../src/adt.ts";
import { makeNotificationDispatcher } from "../src/dispatcher.ts";
import { getLogLevel, setLogLevel } from "../src/logger.ts";

const issue: Issue = {
  id: "iss-abc123",
  title: "Broken streetlight",
  description: "",
  category: "Electricity",
  priority: "High",
  status: "Open",
  location: "East Avenue",
  userId: "u-1",
  submittedAt: "2024-01-01T00:00:00.000Z",
  attachments: [],
  awardedPoints: 25,
};

const submitted: DomainEvent = {
  _type: "IssueSubmitted",
  at: "2024-01-01T00:00:00.000Z",
  issue,
  pointsAwarded: 25,
};

const initialLevel = getLogLevel();

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel(initialLevel);
});

test("Dispatcher - handlers run in registration order", () => {
  const dispatcher = makeNotificationDispatcher();
  const calls: string[] = [];
  dispatcher.subscribe("IssueSubmitted", () => calls.push("first"));
  dispatcher.subscribe("IssueSubmitted", () => calls.push("second"));
  dispatcher.subscribe("IssueSubmitted", () => calls.push("third"));

  const report = dispatcher.dispatch(submitted);

  expect(calls).toEqual(["first", "second", "third"]);
  expect(report).toEqual({ kind: "IssueSubmitted", delivered: 3, failed: 0 });
});

test("Dispatcher - only handlers of the event kind are invoked", () => {
  const dispatcher = makeNotificationDispatcher();
  const seen: string[] = [];
  dispatcher.subscribe("IssueResolved", (e) => seen.push(e.issue.id));
  dispatcher.subscribe("IssueSubmitted", (e) => seen.push(`${e.pointsAwarded}`));

  dispatcher.dispatch(submitted);

  expect(seen).toEqual(["25"]);
});

test("Dispatcher - no handlers is not an error", () => {
  const dispatcher = makeNotificationDispatcher();
  expect(dispatcher.dispatch(submitted)).toEqual({
    kind: "IssueSubmitted",
    delivered: 0,
    failed: 0,
  });
});

test("Dispatcher - a throwing handler is logged and skipped", () => {
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  const dispatcher = makeNotificationDispatcher();
  const calls: string[] = [];
  dispatcher.subscribe("IssueSubmitted", () => calls.push("before"));
  dispatcher.subscribe("IssueSubmitted", () => {
    throw new Error("mailer offline");
  });
  dispatcher.subscribe("IssueSubmitted", () => calls.push("after"));

  const report = dispatcher.dispatch(submitted);

  expect(calls).toEqual(["before", "after"]);
  expect(report).toEqual({ kind: "IssueSubmitted", delivered: 2, failed: 1 });
  expect(errorSpy).toHaveBeenCalledTimes(1);

  const line = String(errorSpy.mock.calls[0]?.[0]);
  expect(JSON.parse(line)).toMatchObject({
    level: "ERROR",
    message: "Event handler failed",
    context: { event: "IssueSubmitted", position: 1, reason: "mailer offline" },
  });
});

test("Dispatcher - a thrown value with no string form is still isolated", () => {
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  const dispatcher = makeNotificationDispatcher();
  const calls: string[] = [];
  dispatcher.subscribe("IssueSubmitted", () => {
    throw Object.create(null);
  });
  dispatcher.subscribe("IssueSubmitted", () => calls.push("next"));

  const report = dispatcher.dispatch(submitted);

  expect(calls).toEqual(["next"]);
  expect(report).toEqual({ kind: "IssueSubmitted", delivered: 1, failed: 1 });
  expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
    context: { position: 0, reason: "[object Object]" },
  });
});

test("Dispatcher - a pinned log level ignores the process-wide one", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  setLogLevel("INFO");
  const pinned = makeNotificationDispatcher({ logLevel: "DEBUG" });

  pinned.dispatch(submitted);
  makeNotificationDispatcher().dispatch(submitted);

  expect(logSpy).toHaveBeenCalledTimes(1);
  expect(getLogLevel()).toBe("INFO");
});

test("Dispatcher - unsubscribe removes only that handler", () => {
  const dispatcher = makeNotificationDispatcher();
  const calls: string[] = [];
  const off = dispatcher.subscribe("IssueSubmitted", () => calls.push("a"));
  dispatcher.subscribe("IssueSubmitted", () => calls.push("b"));

  off();
  off();
  dispatcher.dispatch(submitted);

  expect(calls).toEqual(["b"]);
  expect(dispatcher.handlerCount("IssueSubmitted")).toBe(1);
});

test("Dispatcher - subscribing during dispatch affects the next event only", () => {
  const dispatcher = makeNotificationDispatcher();
  const calls: string[] = [];
  dispatcher.subscribe("IssueSubmitted", () => {
    calls.push("outer");
    dispatcher.subscribe("IssueSubmitted", () => calls.push("inner"));
  });

  dispatcher.dispatch(submitted);
  expect(calls).toEqual(["outer"]);

  dispatcher.dispatch(submitted);
  expect(calls).toEqual(["outer", "outer", "inner"]);
});

test("Dispatcher - debug line is written only at DEBUG level", () => {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  const dispatcher = makeNotificationDispatcher();

  setLogLevel("INFO");
  dispatcher.dispatch(submitted);
  expect(logSpy).not.toHaveBeenCalled();

  setLogLevel("DEBUG");
  dispatcher.dispatch(submitted);
  expect(logSpy).toHaveBeenCalledTimes(1);
  expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toMatchObject({
    level: "DEBUG",
    message: "Event dispatched",
    context: { event: "IssueSubmitted", handlers: 0, failed: 0 },
  });
});
