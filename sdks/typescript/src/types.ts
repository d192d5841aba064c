export type VeracityFactor = 'provenance-attested' | 'reproducible-builds';

export type VeracityLevel =
  | { kind: 'not-available' }
  | { kind: 'single-factor'; factor: VeracityFactor }
  | { kind: 'two-factors' };

export type InquireCoverage = 'small' | 'medium' | 'large' | 'huge';

export interface CheckResponse {
  package: string;
  level: VeracityLevel;
  summary: string;
  provenanceEvidence?: string;
  reproducibilityEvidence?: string;
}

export interface PackageReport {
  package: string;
  status: 'checked' | 'failed';
  summary?: string;
  provenanceEvidence?: string;
  reproducibilityEvidence?: string;
}

export interface PackageStatistics {
  total: number;
  provenanceAttested: number;
  reproducibleBuilds: number;
}

export interface AnalyseResponse {
  statistics: PackageStatistics;
  packages: PackageReport[];
}

export interface InquireResponse {
  coverage: InquireCoverage;
  totalCratesInquired: number;
  totalCratesWithProvenance: number;
  totalCratesWithReproducibility: number;
  presenceOfProvenance: number;
  presenceOfReproducibility: number;
  packages: PackageReport[];
}
