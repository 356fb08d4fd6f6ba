import { InstalledEntry, PackageKind, PreReleaseCandidates, UNKNOWN_VERSION } from "../types.js";

export const PRE_RELEASE_QUALIFIERS = [
  "beta",
  "alpha",
  "nightly",
  "insider",
  "preview",
  "dev",
  "next",
  "canary",
  "edge"
] as const;

const SUFFIX_RE = new RegExp(`^(@|-)(${PRE_RELEASE_QUALIFIERS.join("|")})`);

export interface CorrelatedEntry extends InstalledEntry {
  preReleaseName: string;
  preReleaseVersion: string;
  preReleaseKind?: PackageKind;
}

/**
 * A candidate belongs to `name` when it starts with exactly that name and the
 * remainder opens with a separator followed by a known qualifier.
 * "foo" matches "foo-beta" and "foo@nightly" but not "foobar-beta".
 */
export function matchesPreRelease(name: string, candidate: string): boolean {
  if (!name || !candidate.startsWith(name)) {
    return false;
  }
  return SUFFIX_RE.test(candidate.slice(name.length));
}

/**
 * Picks at most one candidate for `name`: the shortest remainder wins, ties go
 * to the byte-wise smaller candidate, so the result never depends on the order
 * the candidates were enumerated in.
 */
export function pickPreRelease(name: string, candidates: Iterable<string>): string | undefined {
  let best: string | undefined;
  for (const candidate of candidates) {
    if (!matchesPreRelease(name, candidate)) {
      continue;
    }
    if (
      best === undefined ||
      candidate.length < best.length ||
      (candidate.length === best.length && candidate < best)
    ) {
      best = candidate;
    }
  }
  return best;
}

export function correlate(entries: readonly InstalledEntry[], candidates: PreReleaseCandidates): CorrelatedEntry[] {
  return entries.map((entry) => {
    const preReleaseName = pickPreRelease(entry.name, candidates.keys()) ?? "";
    const preReleaseKind = preReleaseName ? candidates.get(preReleaseName) : undefined;
    return {
      ...entry,
      preReleaseName,
      preReleaseVersion: "",
      ...(preReleaseKind ? { preReleaseKind } : {})
    };
  });
}

/** Distinct matched candidate names, for a single batched metadata lookup. */
export function collectLookupNames(entries: readonly CorrelatedEntry[]): string[] {
  const names = new Set<string>();
  for (const entry of entries) {
    if (entry.preReleaseName) {
      names.add(entry.preReleaseName);
    }
  }
  return [...names].sort(compareBytes);
}

export function applyPreReleaseVersions(
  entries: readonly CorrelatedEntry[],
  metadata: ReadonlyMap<string, string>
): CorrelatedEntry[] {
  return entries.map((entry) => {
    if (!entry.preReleaseName) {
      return entry;
    }
    return { ...entry, preReleaseVersion: metadata.get(entry.preReleaseName) ?? UNKNOWN_VERSION };
  });
}

export function compareBytes(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
