import { toPackageUrl } from "../purl.js";
import type { AnalysisOutcome, PackageIdentity, PackageStatistics, VeracityChecks, VeracityLevel } from "../types.js";
import { describeChecks, levelOf } from "../veracity.js";

export class CheckResponseDto {
  package!: string;
  level!: VeracityLevel;
  summary!: string;
  provenanceEvidence?: string;
  reproducibilityEvidence?: string;
}

/** `failed` packages could not be evaluated, which differs from `checked` with no evidence. */
export class PackageReportDto {
  package!: string;
  status!: "checked" | "failed";
  summary?: string;
  provenanceEvidence?: string;
  reproducibilityEvidence?: string;
}

export class AnalyseResponseDto {
  statistics!: PackageStatistics;
  packages!: PackageReportDto[];
}

export class InquireResponseDto {
  coverage!: string;
  totalCratesInquired!: number;
  totalCratesWithProvenance!: number;
  totalCratesWithReproducibility!: number;
  presenceOfProvenance!: number;
  presenceOfReproducibility!: number;
  packages!: PackageReportDto[];
}

export function toCheckResponse(identity: PackageIdentity, checks: VeracityChecks): CheckResponseDto {
  return {
    package: toPackageUrl(identity),
    level: levelOf(checks),
    summary: describeChecks(checks),
    provenanceEvidence: checks.provenanceEvidence,
    reproducibilityEvidence: checks.reproducibilityEvidence,
  };
}

export function toPackageReport(outcome: AnalysisOutcome): PackageReportDto {
  const purl = toPackageUrl(outcome.package);
  if (!outcome.checks) {
    return { package: purl, status: "failed" };
  }
  return {
    package: purl,
    status: "checked",
    summary: describeChecks(outcome.checks),
    provenanceEvidence: outcome.checks.provenanceEvidence,
    reproducibilityEvidence: outcome.checks.reproducibilityEvidence,
  };
}
