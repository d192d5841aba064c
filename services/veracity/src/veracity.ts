import type {
  AnalysisOutcome,
  AnalysisResults,
  PackageStatistics,
  VeracityChecks,
  VeracityLevel,
} from "./types.js";

export function fromBooleans(provenance: boolean, reproducible: boolean): VeracityLevel {
  if (provenance && reproducible) {
    return { kind: "two-factors" };
  }
  if (provenance) {
    return { kind: "single-factor", factor: "provenance-attested" };
  }
  if (reproducible) {
    return { kind: "single-factor", factor: "reproducible-builds" };
  }
  return { kind: "not-available" };
}

export function toBooleans(level: VeracityLevel): [provenance: boolean, reproducible: boolean] {
  switch (level.kind) {
    case "not-available":
      return [false, false];
    case "single-factor":
      return level.factor === "provenance-attested" ? [true, false] : [false, true];
    case "two-factors":
      return [true, true];
  }
}

export function levelOf(checks: VeracityChecks): VeracityLevel {
  return fromBooleans(checks.provenanceEvidence !== undefined, checks.reproducibilityEvidence !== undefined);
}

export function levelRank(level: VeracityLevel): number {
  switch (level.kind) {
    case "not-available":
      return 0;
    case "single-factor":
      return 1;
    case "two-factors":
      return 2;
  }
}

export function describeChecks(checks: VeracityChecks): string {
  const [provenance, reproducible] = toBooleans(levelOf(checks));
  if (provenance && reproducible) {
    return "trusted publishing; reproducible builds";
  }
  if (provenance) {
    return "trusted publishing";
  }
  if (reproducible) {
    return "reproducible builds";
  }
  return "none";
}

export function computeStatistics(outcomes: readonly AnalysisOutcome[]): PackageStatistics {
  return outcomes.reduce<PackageStatistics>(
    (acc, { checks }) => ({
      total: acc.total + 1,
      provenanceAttested: acc.provenanceAttested + (checks?.provenanceEvidence ? 1 : 0),
      reproducibleBuilds: acc.reproducibleBuilds + (checks?.reproducibilityEvidence ? 1 : 0),
    }),
    { total: 0, provenanceAttested: 0, reproducibleBuilds: 0 },
  );
}

export function buildResults(outcomes: readonly AnalysisOutcome[]): AnalysisResults {
  const snapshot = outcomes.map((outcome) => ({ ...outcome }));
  return {
    statistics: computeStatistics(snapshot),
    outcomes: snapshot,
  };
}

export function percentage(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Number(((part / total) * 100).toFixed(2));
}
