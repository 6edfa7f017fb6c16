/**
 * @module badges
 *
 * Static badge catalog. Definitions are immutable; only the per-user earned
 * set changes, and that lives in the progress ledger.
 */

import type { Badge, BadgeId, IssueCategory } from "./adt.ts";
import { ISSUE_CATEGORIES } from "./adt.ts";

const CATEGORY_LABELS: Record<IssueCategory, string> = {
  WaterSupply: "Water Supply",
  Electricity: "Electricity",
  Roads: "Roads",
  WasteManagement: "Waste Management",
  PublicSafety: "Public Safety",
  ParksAndRecreation: "Parks and Recreation",
  BuildingPermits: "Building Permits",
  Other: "Other",
};

export function categorySpecialistId(category: IssueCategory): BadgeId {
  return `CategorySpecialist:${category}`;
}

const MILESTONES: readonly Badge[] = [
  {
    id: "FirstReport",
    name: "First Responder",
    description: "Submitted your first municipal issue report",
    kind: "FirstReport",
    criteria: {},
    requiredCount: 1,
    pointsValue: 25,
  },
  {
    id: "CommunityHelper",
    name: "Community Helper",
    description: "Reported 3 or more municipal issues",
    kind: "CommunityHelper",
    criteria: {},
    requiredCount: 3,
    pointsValue: 50,
  },
  {
    id: "ConsistentReporter",
    name: "Consistent Reporter",
    description: "Reported 5 or more municipal issues",
    kind: "ConsistentReporter",
    criteria: {},
    requiredCount: 5,
    pointsValue: 100,
  },
  {
    id: "CommunityChampion",
    name: "Community Champion",
    description: "Reported 10 or more municipal issues",
    kind: "CommunityChampion",
    criteria: {},
    requiredCount: 10,
    pointsValue: 200,
  },
  {
    id: "MediaContributor",
    name: "Media Contributor",
    description: "Submitted a report with photos or videos",
    kind: "MediaContributor",
    criteria: { withAttachments: true },
    requiredCount: 1,
    pointsValue: 40,
  },
  {
    id: "EmergencyResponder",
    name: "Emergency Responder",
    description: "Reported a critical priority issue",
    kind: "EmergencyResponder",
    criteria: { priority: "Critical" },
    requiredCount: 1,
    pointsValue: 75,
  },
];

const SPECIALISTS: readonly Badge[] = ISSUE_CATEGORIES.map((category): Badge => ({
  id: categorySpecialistId(category),
  name: `${CATEGORY_LABELS[category]} Specialist`,
  description: `Reported 2 or more ${CATEGORY_LABELS[category]} issues`,
  kind: "CategorySpecialist",
  criteria: { categories: [category] },
  requiredCount: 2,
  pointsValue: 30,
}));

const CHAMPIONS: readonly Badge[] = [
  {
    id: "WaterSaver",
    name: "Water Saver",
    description: "Reported 3 or more water supply issues",
    kind: "CategoryChampion",
    criteria: { categories: ["WaterSupply"] },
    requiredCount: 3,
    pointsValue: 60,
  },
  {
    id: "PowerSaver",
    name: "Power Saver",
    description: "Reported 3 or more electricity issues",
    kind: "CategoryChampion",
    criteria: { categories: ["Electricity"] },
    requiredCount: 3,
    pointsValue: 60,
  },
  {
    id: "RoadWarrior",
    name: "Road Warrior",
    description: "Reported 3 or more roads and infrastructure issues",
    kind: "CategoryChampion",
    criteria: { categories: ["Roads"] },
    requiredCount: 3,
    pointsValue: 60,
  },
  {
    id: "EcoGuardian",
    name: "Eco Guardian",
    description: "Reported 3 or more environmental issues",
    kind: "CategoryChampion",
    criteria: { categories: ["WasteManagement", "ParksAndRecreation"] },
    requiredCount: 3,
    pointsValue: 70,
  },
];

/** Every badge a user can earn, in display order. */
export const BADGE_CATALOG: readonly Badge[] = [
  ...MILESTONES,
  ...SPECIALISTS,
  ...CHAMPIONS,
];

const BY_ID: ReadonlyMap<BadgeId, Badge> = new Map(
  BADGE_CATALOG.map((b) => [b.id, b]),
);

export function findBadge(id: BadgeId): Badge | undefined {
  return BY_ID.get(id);
}
