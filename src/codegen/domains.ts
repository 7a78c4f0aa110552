/**
 * Domain profiles
 *
 * Some domains pull their data from one section of a long document (a table
 * inside a filing, the claims of a patent). Their profile names the headings
 * that open the section and the keywords that confirm or reject a match.
 */

export interface DomainProfile {
  domain: string;
  /** Whether extraction starts by locating a sub-section */
  locatesSection: boolean;
  /** Regular expression sources, matched case-insensitively */
  sectionMarkers: string[];
  requiredKeywords: string[];
  rejectedKeywords: string[];
  guidance: string[];
}

const PROFILES: DomainProfile[] = [
  {
    domain: "compensation",
    locatesSection: true,
    sectionMarkers: ["summary\\s+compensation\\s+table", "executive\\s+compensation"],
    requiredKeywords: ["Salary", "Total"],
    rejectedKeywords: ["Director Compensation", "Grants of Plan-Based Awards"],
    guidance: [
      "Only read the Summary Compensation Table; ignore director compensation and award grant tables.",
      "Amounts are in US dollars unless the table says otherwise.",
    ],
  },
  {
    domain: "tax",
    locatesSection: true,
    sectionMarkers: ["provision\\s+for\\s+income\\s+taxes", "income\\s+tax(es)?\\s+expense"],
    requiredKeywords: ["Current", "Deferred"],
    rejectedKeywords: ["Unrecognized Tax Benefits"],
    guidance: ["Report current and deferred components separately when both are shown."],
  },
  {
    domain: "patent",
    locatesSection: true,
    sectionMarkers: ["what\\s+is\\s+claimed\\s+is", "^\\s*claims\\s*$"],
    requiredKeywords: ["claim"],
    rejectedKeywords: [],
    guidance: ["Independent claims do not refer to another claim."],
  },
  {
    domain: "filing",
    locatesSection: true,
    sectionMarkers: ["item\\s+7\\.?\\s", "management'?s\\s+discussion\\s+and\\s+analysis"],
    requiredKeywords: [],
    rejectedKeywords: ["Table of Contents"],
    guidance: ["Prefer figures for the most recent fiscal year."],
  },
];

const GENERIC: DomainProfile = {
  domain: "generic",
  locatesSection: false,
  sectionMarkers: [],
  requiredKeywords: [],
  rejectedKeywords: [],
  guidance: [],
};

export function domainProfile(domain: string): DomainProfile {
  const key = domain.trim().toLowerCase();
  return PROFILES.find((p) => p.domain === key) ?? { ...GENERIC, domain: key || GENERIC.domain };
}

export function knownDomains(): string[] {
  return PROFILES.map((p) => p.domain);
}
