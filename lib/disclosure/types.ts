export const DISCLOSURE_LOCATIONS = ['beginning', 'middle', 'end', 'nowhere'] as const;
export const CONTENT_INTENTS = ['informative', 'persuasive', 'mixed'] as const;

export type DisclosureLocation = (typeof DISCLOSURE_LOCATIONS)[number];
export type ContentIntent = (typeof CONTENT_INTENTS)[number];

export interface DisclosureAssessment {
  found: boolean;
  location: DisclosureLocation;
  intent: ContentIntent;
  confidence: number;     // 0.0 - 1.0
  rawReasoning: string;
  providerUsed: string;   // provider id, or 'multiple' when several are configured
}
