import { AnalysisContext } from '../context';
import { extractLinks, normalizeUrl } from './links';
import { matchNetwork } from './patterns';
import { AffiliateMatch, ScanResult } from './types';

const MAX_SAMPLE_URLS = 5;
const MAX_SAMPLE_LENGTH = 100;

export function emptyScanResult(diagnostic?: string): ScanResult {
  const result: ScanResult = {
    found: false,
    networks: [],
    totalMatches: 0,
    uniqueUrls: 0,
    sampleUrls: [],
    allMatches: [],
  };
  if (diagnostic !== undefined) {
    result.diagnostic = diagnostic;
  }
  return result;
}

export class AffiliateScanner {
  constructor(private readonly context: AnalysisContext) {}

  /** Never throws; internal faults come back as an empty result with a diagnostic. */
  detect(html: unknown): ScanResult {
    const { logger } = this.context;

    if (typeof html !== 'string' || html.trim().length === 0) {
      return emptyScanResult();
    }

    try {
      const links = extractLinks(html, (source, error) => {
        logger.warn(`Link extraction (${source}) failed:`, error);
      });
      logger.debug(`Extracted ${links.length} candidate links`);

      const matches: AffiliateMatch[] = [];
      for (const link of links) {
        const match = this.classify(link);
        if (match) matches.push(match);
      }

      return this.summarize(matches);
    } catch (error) {
      logger.error('Affiliate scan failed:', error);
      return emptyScanResult(error instanceof Error ? error.message : String(error));
    }
  }

  private classify(link: string): AffiliateMatch | null {
    try {
      return matchNetwork(normalizeUrl(link));
    } catch (error) {
      this.context.logger.warn(`Skipping link ${link.slice(0, MAX_SAMPLE_LENGTH)}:`, error);
      return null;
    }
  }

  private summarize(matches: AffiliateMatch[]): ScanResult {
    const networks = [...new Set(matches.map(match => match.displayName))];
    const uniqueUrls = [...new Set(matches.map(match => match.matchedUrl))];

    return {
      found: matches.length > 0,
      networks,
      totalMatches: matches.length,
      uniqueUrls: uniqueUrls.length,
      sampleUrls: uniqueUrls.slice(0, MAX_SAMPLE_URLS).map(truncateUrl),
      allMatches: matches,
    };
  }
}

export function truncateUrl(url: string): string {
  return url.length > MAX_SAMPLE_LENGTH ? `${url.slice(0, MAX_SAMPLE_LENGTH)}...` : url;
}

export * from './types';
export { AFFILIATE_NETWORKS, matchNetwork } from './patterns';
export { extractLinks, normalizeUrl } from './links';
