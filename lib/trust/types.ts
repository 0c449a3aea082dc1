import { ContentIntent, DisclosureLocation } from '../disclosure/types';

export type TrustScore = 'red' | 'yellow' | 'green';

export interface TrustVerdict {
  score: TrustScore;
  reasons: string[];  // never empty
  summary: string;
}

export interface AggregatorInput {
  affiliateCount: number;
  disclosureFound: boolean;
  disclosureLocation: DisclosureLocation;
  contentIntent: ContentIntent;

  // summary only
  disclosureAssessed?: boolean;  // false when no provider answered
  affiliateDomains?: string[];
  confidence?: number;
  rawReasoning?: string;
}
