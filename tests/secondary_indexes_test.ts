import { expect, test } from "vitest";
import type { Issue } from "../src/adt.ts";
import { makeSecondaryIndexes } from "../src/secondary_indexes.ts";
import { keywordZoneResolver, makeKeywordZoneResolver } from "../src/zones.ts";

function issue(id: `iss-${string}`, over: Partial<Issue> = {}): Issue {
  return {
    id,
    title: "Pothole",
    description: "",
    category: "Roads",
    priority: "Medium",
    status: "Open",
    location: "North Road",
    userId: "u-1",
    submittedAt: "2024-01-01T00:00:00.000Z",
    attachments: [],
    awardedPoints: 20,
    ...over,
  };
}

// ===== Zones =====

test("Zones - keyword resolver matches case-insensitively", () => {
  expect(keywordZoneResolver("12 NORTH Street")).toBe("North");
  expect(keywordZoneResolver("Downtown market")).toBe("Central");
  expect(keywordZoneResolver("Southgate")).toBe("South");
  expect(keywordZoneResolver("East Avenue")).toBe("East");
  expect(keywordZoneResolver("westfield")).toBe("West");
});

test("Zones - first matching rule wins", () => {
  expect(keywordZoneResolver("City Hall, North Wing")).toBe("Central");
});

test("Zones - unmatched and empty locations fall back to Other", () => {
  expect(keywordZoneResolver("Harbour Road")).toBe("Other");
  expect(keywordZoneResolver("")).toBe("Other");
});

test("Zones - custom rules", () => {
  const zoneOf = makeKeywordZoneResolver([
    { zone: "West", keywords: ["Harbour"] },
  ]);
  expect(zoneOf("old harbour pier")).toBe("West");
  expect(zoneOf("North Road")).toBe("Other");
});

// ===== Indexes =====

test("SecondaryIndexes - created issue lands in every dimension", () => {
  const indexes = makeSecondaryIndexes();
  indexes.onIssueCreated(issue("iss-a"));

  expect([...indexes.byCategory("Roads")]).toEqual(["iss-a"]);
  expect([...indexes.byPriority("Medium")]).toEqual(["iss-a"]);
  expect([...indexes.byStatus("Open")]).toEqual(["iss-a"]);
  expect([...indexes.byLocationZone("North")]).toEqual(["iss-a"]);
});

test("SecondaryIndexes - unknown keys return an empty set", () => {
  const indexes = makeSecondaryIndexes();
  expect(indexes.byCategory("Electricity").size).toBe(0);
  expect(indexes.byStatus("Closed").size).toBe(0);
  expect(indexes.byLocationZone("Other").size).toBe(0);
});

test("SecondaryIndexes - lookups return copies", () => {
  const indexes = makeSecondaryIndexes();
  indexes.onIssueCreated(issue("iss-a"));

  const bucket = indexes.byCategory("Roads");
  indexes.onIssueCreated(issue("iss-b"));

  expect(bucket.size).toBe(1);
  expect(indexes.byCategory("Roads").size).toBe(2);
});

test("SecondaryIndexes - status change moves the id between buckets", () => {
  const indexes = makeSecondaryIndexes();
  const a = issue("iss-a");
  indexes.onIssueCreated(a);

  indexes.onStatusChanged({ ...a, status: "InProgress" }, "Open", "InProgress");

  expect(indexes.byStatus("Open").size).toBe(0);
  expect([...indexes.byStatus("InProgress")]).toEqual(["iss-a"]);
  expect([...indexes.byCategory("Roads")]).toEqual(["iss-a"]);
  expect([...indexes.byPriority("Medium")]).toEqual(["iss-a"]);
});

test("SecondaryIndexes - stale from status still leaves a single bucket", () => {
  const indexes = makeSecondaryIndexes();
  const a = issue("iss-a");
  indexes.onIssueCreated(a);

  indexes.onStatusChanged({ ...a, status: "Resolved" }, "InProgress", "Resolved");

  expect(indexes.byStatus("Open").size).toBe(0);
  expect(indexes.byStatus("InProgress").size).toBe(0);
  expect([...indexes.byStatus("Resolved")]).toEqual(["iss-a"]);
});

test("SecondaryIndexes - uses the injected zone resolver", () => {
  const indexes = makeSecondaryIndexes({ zoneOf: () => "East" });
  indexes.onIssueCreated(issue("iss-a"));

  expect(indexes.zoneOf("anything")).toBe("East");
  expect([...indexes.byLocationZone("East")]).toEqual(["iss-a"]);
  expect(indexes.byLocationZone("North").size).toBe(0);
});

test("SecondaryIndexes - counts report non-empty buckets", () => {
  const indexes = makeSecondaryIndexes();
  const a = issue("iss-a");
  indexes.onIssueCreated(a);
  indexes.onIssueCreated(
    issue("iss-b", { category: "Electricity", location: "Harbour" }),
  );
  indexes.onStatusChanged({ ...a, status: "Resolved" }, "Open", "Resolved");

  const counts = indexes.counts();
  expect([...counts.byCategory]).toEqual([["Roads", 1], ["Electricity", 1]]);
  expect([...counts.byPriority]).toEqual([["Medium", 2]]);
  expect([...counts.byStatus]).toEqual([["Open", 1], ["Resolved", 1]]);
  expect([...counts.byLocationZone]).toEqual([["North", 1], ["Other", 1]]);
});
