// src/modules/public/coverage.policy.ts
// Default coverage rules for the public coverage check. The service depends on
// the CoveragePolicy shape only, so a storefront-specific policy can replace it.

import type { CoverageAssessment, CoverageTerms } from "./publicWarranty.types";

export interface CoveragePolicy {
  readonly terms: CoverageTerms;
  assess(issueType: string): CoverageAssessment;
}

export type CoveragePolicyConfig = {
  excludedIssueTypes: readonly string[];
  uncoveredEstimate: number;
  terms: CoverageTerms;
};

export const DEFAULT_COVERAGE_TERMS: CoverageTerms = {
  coverageType: "comprehensive",
  coveredComponents: ["hardware", "software", "battery", "screen"],
  excludedComponents: ["water_damage", "physical_abuse"],
  repairCoverage: true,
  replacementCoverage: true,
  laborCoverage: true,
  partsCoverage: true,
  terms: ["Must provide proof of purchase", "Damage must be reported within 30 days"],
};

export const DEFAULT_COVERAGE_POLICY_CONFIG: CoveragePolicyConfig = {
  excludedIssueTypes: ["water_damage", "physical_abuse"],
  uncoveredEstimate: 150,
  terms: DEFAULT_COVERAGE_TERMS,
};

const COVERED: Omit<CoverageAssessment, "estimatedCost"> = {
  covered: true,
  coverageType: "full",
  message: "This issue is fully covered under your warranty",
  recommendations: ["Contact authorized service center", "Backup your data before repair"],
  nextSteps: ["Submit warranty claim", "Schedule repair appointment"],
};

const NOT_COVERED: Omit<CoverageAssessment, "estimatedCost"> = {
  covered: false,
  coverageType: "not_covered",
  message: "This issue is not covered under your warranty",
  recommendations: [
    "Consider extended warranty for future coverage",
    "Review warranty terms and conditions",
  ],
  nextSteps: [
    "Contact customer service for paid repair options",
    "Get quote from authorized service center",
  ],
};

export class DefaultCoveragePolicy implements CoveragePolicy {
  readonly terms: CoverageTerms;

  constructor(private readonly config: CoveragePolicyConfig = DEFAULT_COVERAGE_POLICY_CONFIG) {
    this.terms = config.terms;
  }

  assess(issueType: string): CoverageAssessment {
    const excluded = this.config.excludedIssueTypes.includes(issueType.trim().toLowerCase());
    return excluded
      ? { ...NOT_COVERED, estimatedCost: this.config.uncoveredEstimate }
      : { ...COVERED, estimatedCost: 0 };
  }
}
