import { z } from "zod";

export const Industry = z.enum([
  "financial_services",
  "healthcare",
  "manufacturing",
  "retail",
  "technology",
  "government",
  "education",
  "other",
]);

export const CompanySize = z.enum(["startup", "small", "mid_market", "enterprise"]);

export const RegulatoryEnvironment = z.enum(["minimal", "moderate", "strict", "highly_regulated"]);

/**
 * Facts about the business used to tailor recommendations.
 */
export const BusinessProfile = z.object({
  industry: Industry.optional(),
  /** Free-text industry when `industry` is "other" */
  customIndustry: z.string().default(""),
  companySize: CompanySize.optional(),
  regulatoryEnvironment: RegulatoryEnvironment.default("moderate"),
  typicalConstraints: z.array(z.string()).default([]),
  preferredFrameworks: z.array(z.string()).default([]),
  previousImprovements: z.array(z.string()).default([]),
  rejectedApproaches: z.array(z.string()).default([]),
  notes: z.string().default(""),
});

export type BusinessProfileT = z.infer<typeof BusinessProfile>;
export type BusinessProfileInput = z.input<typeof BusinessProfile>;

export function industryLabel(profile: BusinessProfileT): string | undefined {
  if (profile.customIndustry.trim()) return profile.customIndustry.trim();
  return profile.industry;
}

/**
 * Append user-supplied context to the profile notes, creating a
 * minimal profile when none exists yet.
 */
export function withAppendedNotes(profile: BusinessProfileT | undefined, text: string): BusinessProfileT {
  if (!profile) {
    return BusinessProfile.parse({ notes: text });
  }
  const notes = profile.notes ? `${profile.notes}\n${text}` : text;
  return { ...profile, notes };
}
