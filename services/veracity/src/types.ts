export interface PackageIdentity {
  readonly name: string;
  readonly version: string;
}

export type VeracityFactor = "provenance-attested" | "reproducible-builds";

export type VeracityLevel =
  | { kind: "not-available" }
  | { kind: "single-factor"; factor: VeracityFactor }
  | { kind: "two-factors" };

/** Absent evidence means the factor was checked and not found. */
export interface VeracityChecks {
  provenanceEvidence?: string;
  reproducibilityEvidence?: string;
}

/** `checks` is undefined only when evaluating the package failed. */
export interface AnalysisOutcome {
  package: PackageIdentity;
  checks?: VeracityChecks;
}

export interface PackageStatistics {
  total: number;
  provenanceAttested: number;
  reproducibleBuilds: number;
}

export interface AnalysisResults {
  statistics: PackageStatistics;
  outcomes: AnalysisOutcome[];
}

export type InquireCoverage = "small" | "medium" | "large" | "huge";

export interface EcosystemInquiringResults {
  coverage: InquireCoverage;
  totalCratesInquired: number;
  totalCratesWithProvenance: number;
  totalCratesWithReproducibility: number;
  presenceOfProvenance: number;
  presenceOfReproducibility: number;
  outcomes: AnalysisOutcome[];
}

export interface FactorChecker {
  check(identity: PackageIdentity): Promise<string | undefined>;
}

export interface VeracityAnalysis {
  analyse(identity: PackageIdentity): Promise<VeracityChecks>;
}
