export type NetworkId = 'amazon' | 'shareasale' | 'cj_affiliate' | 'ebay' | 'clickbank';

export interface NetworkRule {
  readonly networkId: NetworkId;
  readonly displayName: string;
  readonly patterns: readonly RegExp[];  // case-insensitive, first match wins
}

export interface AffiliateMatch {
  networkId: NetworkId;
  displayName: string;
  matchedUrl: string;
}

export interface ScanResult {
  found: boolean;
  networks: string[];     // display names, first-seen order
  totalMatches: number;
  uniqueUrls: number;
  sampleUrls: string[];   // max 5, truncated to 100 chars + '...'
  allMatches: AffiliateMatch[];
  diagnostic?: string;
}
