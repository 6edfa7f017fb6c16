import { expect, test } from "vitest";
import { makeIssueStore } from "../src/issue_store.ts";
import type { IssueDraft } from "../src/schemas.ts";
import { describeError } from "../src/ports.ts";

const testEnv = { now: () => "2024-01-01T00:00:00.000Z" };

const draft: IssueDraft = {
  title: "Burst pipe",
  description: "Water everywhere",
  category: "WaterSupply",
  priority: "High",
  location: "12 North Street",
  userId: "u-1",
  attachments: ["photo-1.jpg"],
};

test("IssueStore - create stores an Open issue with a fresh id", () => {
  const store = makeIssueStore({ env: testEnv });
  const result = store.create(draft);

  expect(result.ok).toBe(true);
  if (result.ok) {
    const issue = result.value;
    expect(issue.id.startsWith("iss-")).toBe(true);
    expect(issue.status).toBe("Open");
    expect(issue.submittedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(issue.awardedPoints).toBe(0);
    expect(issue.resolvedAt).toBeUndefined();
    expect(issue.attachments).toEqual(["photo-1.jpg"]);
    expect(store.get(issue.id)).toEqual({ ok: true, value: issue });
  }
});

test("IssueStore - create trims text and applies defaults", () => {
  const store = makeIssueStore({ env: testEnv });
  const result = store.create({
    title: "  Fallen tree  ",
    category: "ParksAndRecreation",
    location: " Central Park ",
    userId: "u-2",
  });

  expect(result.ok).toBe(true);
  if (result.ok) {
    expect(result.value.title).toBe("Fallen tree");
    expect(result.value.location).toBe("Central Park");
    expect(result.value.description).toBe("");
    expect(result.value.priority).toBe("Medium");
    expect(result.value.attachments).toEqual([]);
  }
});

test("IssueStore - identical drafts get distinct ids", () => {
  const store = makeIssueStore({ env: testEnv });
  const ids = new Set<string>();
  for (let i = 0; i < 50; i++) {
    const result = store.create(draft);
    if (result.ok) ids.add(result.value.id);
  }

  expect(ids.size).toBe(50);
  expect(store.size()).toBe(50);
  expect(store.getExistingIds().size).toBe(50);
});

test("IssueStore - ids are reproducible under a fixed clock", () => {
  const idsOf = () => {
    const store = makeIssueStore({ env: testEnv });
    return [store.create(draft), store.create(draft)].map((r) =>
      r.ok ? r.value.id : ""
    );
  };

  const first = idsOf();
  expect(first[0]).not.toBe(first[1]);
  expect(idsOf()).toEqual(first);
});

test("IssueStore - rejects missing title and blank location", () => {
  const store = makeIssueStore({ env: testEnv });
  const result = store.create({
    title: "",
    category: "Roads",
    location: "   ",
    userId: "u-1",
  });

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toEqual({
      _type: "ValidationError",
      issues: [
        { field: "title", reason: "is required" },
        { field: "location", reason: "is required" },
      ],
    });
    expect(describeError(result.error)).toBe(
      "invalid submission: title is required; location is required",
    );
  }
  expect(store.size()).toBe(0);
});

test("IssueStore - rejects oversized title", () => {
  const store = makeIssueStore({ env: testEnv });
  const result = store.create({ ...draft, title: "x".repeat(201) });

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.issues).toEqual([
      { field: "title", reason: "cannot exceed 200 characters" },
    ]);
  }
});

test("IssueStore - accepts a title of exactly 200 characters", () => {
  const store = makeIssueStore({ env: testEnv });
  expect(store.create({ ...draft, title: "x".repeat(200) }).ok).toBe(true);
});

test("IssueStore - get of an unknown id is NotFound", () => {
  const store = makeIssueStore({ env: testEnv });
  expect(store.get("iss-nothing")).toEqual({
    ok: false,
    error: { _type: "NotFound", id: "iss-nothing" },
  });
  expect(store.get("not-an-issue-id")).toEqual({
    ok: false,
    error: { _type: "NotFound", id: "not-an-issue-id" },
  });
});

test("IssueStore - update replaces the record wholesale", () => {
  const store = makeIssueStore({ env: testEnv });
  const created = store.create(draft);
  expect(created.ok).toBe(true);
  if (!created.ok) return;

  const updated = store.update({ ...created.value, status: "InProgress" });
  expect(updated.ok).toBe(true);

  const fetched = store.get(created.value.id);
  expect(fetched.ok && fetched.value.status).toBe("InProgress");
  expect(store.listAll()).toHaveLength(1);
});

test("IssueStore - update of an unknown issue fails", () => {
  const store = makeIssueStore({ env: testEnv });
  const other = makeIssueStore({ env: testEnv }).create(draft);
  expect(other.ok).toBe(true);
  if (!other.ok) return;

  expect(store.update(other.value)).toEqual({
    ok: false,
    error: { _type: "NotFound", id: other.value.id },
  });
  expect(store.size()).toBe(0);
});
