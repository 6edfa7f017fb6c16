import type { LocationZone } from "./adt.ts";

/** Maps a free-text location to a zone. Must be total and pure. */
export type ZoneResolver = (location: string) => LocationZone;

/** Keyword rule: any keyword found in the lower-cased location selects the zone. */
export type ZoneRule = Readonly<{
  zone: LocationZone;
  keywords: readonly string[];
}>;

/** Rules are tried in order; the first hit wins. */
export const DEFAULT_ZONE_RULES: readonly ZoneRule[] = [
  { zone: "Central", keywords: ["central", "city", "downtown", "cbd"] },
  { zone: "North", keywords: ["north"] },
  { zone: "South", keywords: ["south"] },
  { zone: "East", keywords: ["east"] },
  { zone: "West", keywords: ["west"] },
];

/**
 * Builds a resolver from keyword rules using case-insensitive substring
 * matching. Locations that match no rule land in "Other".
 */
export function makeKeywordZoneResolver(
  rules: readonly ZoneRule[],
): ZoneResolver {
  const lowered = rules.map((r) => ({
    zone: r.zone,
    keywords: r.keywords.map((k) => k.toLowerCase()),
  }));
  return (location) => {
    const l = location.toLowerCase();
    const hit = lowered.find((r) => r.keywords.some((k) => l.includes(k)));
    return hit?.zone ?? "Other";
  };
}

export const keywordZoneResolver: ZoneResolver = makeKeywordZoneResolver(
  DEFAULT_ZONE_RULES,
);
