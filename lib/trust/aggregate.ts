import { DisclosureAssessment } from '../disclosure/types';
import { ScanResult } from '../scanner/types';
import { AggregatorInput, TrustScore, TrustVerdict } from './types';

const MAX_SUMMARY_DOMAINS = 3;
const MAX_REASONING_LENGTH = 500;

/**
 * Rule tiers are checked red, then yellow, then green. The first tier with any
 * matching rule decides the score, and every matching rule in that tier
 * contributes a reason.
 */
export function aggregate(input: AggregatorInput): TrustVerdict {
  const { affiliateCount, disclosureFound, disclosureLocation, contentIntent } = input;

  const red: string[] = [];
  if (affiliateCount > 3 && !disclosureFound) {
    red.push(`high number of affiliate links (${affiliateCount}) with no disclosure`);
  }
  if (contentIntent === 'persuasive' && !disclosureFound) {
    red.push('persuasive sales content with no disclosure');
  }
  if (affiliateCount > 5) {
    red.push(`very high number of affiliate links (${affiliateCount})`);
  }
  if (red.length > 0) {
    return verdict('red', red, input);
  }

  const yellow: string[] = [];
  if (affiliateCount >= 1 && affiliateCount <= 3 && !disclosureFound) {
    yellow.push(`some affiliate links (${affiliateCount}) with no disclosure`);
  }
  if (contentIntent === 'mixed' && !disclosureFound) {
    yellow.push('mixed content intent with no disclosure');
  }
  if (affiliateCount > 0 && disclosureFound && (disclosureLocation === 'middle' || disclosureLocation === 'end')) {
    yellow.push(`affiliate links disclosed only at the ${disclosureLocation}, not the beginning`);
  }
  if (yellow.length > 0) {
    return verdict('yellow', yellow, input);
  }

  const green: string[] = [];
  if (affiliateCount === 0) {
    green.push('no affiliate links detected');
  }
  if (disclosureFound && disclosureLocation === 'beginning') {
    green.push(`clear disclosure at the beginning covering ${affiliateCount} affiliate link(s)`);
  }
  if (green.length === 0) {
    green.push('minimal risk factors detected');
  }
  return verdict('green', green, input);
}

export function toAggregatorInput(scan: ScanResult, disclosure: DisclosureAssessment): AggregatorInput {
  return {
    affiliateCount: scan.totalMatches,
    disclosureFound: disclosure.found,
    disclosureLocation: disclosure.location,
    contentIntent: disclosure.intent,
    affiliateDomains: affiliateDomains(scan),
    confidence: disclosure.confidence,
    rawReasoning: disclosure.rawReasoning,
  };
}

export function affiliateDomains(scan: ScanResult): string[] {
  const domains = new Set<string>();
  for (const match of scan.allMatches) {
    const host = hostnameOf(match.matchedUrl);
    if (host) domains.add(host);
  }
  return [...domains];
}

export function buildSummary(score: TrustScore, reasons: string[], input: AggregatorInput): string {
  const lines: string[] = [`Trust Score: ${score.toUpperCase()}`, 'Primary Factors:'];
  for (const reason of reasons) {
    lines.push(`  - ${reason}`);
  }

  lines.push('', 'Affiliate Analysis:', `  - Affiliate Links: ${input.affiliateCount}`);
  const domains = input.affiliateDomains ?? [];
  if (input.affiliateCount > 0 && domains.length > 0) {
    const shown = domains.slice(0, MAX_SUMMARY_DOMAINS).join(', ');
    lines.push(`  - Affiliate Domains: ${shown}${domains.length > MAX_SUMMARY_DOMAINS ? '...' : ''}`);
  }

  if (input.disclosureAssessed === false) {
    lines.push('', 'Disclosure Analysis: unavailable');
    return lines.join('\n');
  }

  lines.push('', 'Disclosure Analysis:', `  - Disclosure Found: ${input.disclosureFound ? 'Yes' : 'No'}`);
  if (input.disclosureFound) {
    lines.push(`  - Disclosure Location: ${input.disclosureLocation}`);
  }
  lines.push(`  - Content Intent: ${input.contentIntent}`);
  lines.push(`  - Analysis Confidence: ${((input.confidence ?? 0) * 100).toFixed(1)}%`);

  const reasoning = input.rawReasoning ?? '';
  if (reasoning.length > 0 && reasoning.length < MAX_REASONING_LENGTH) {
    lines.push('', `LLM Insights: ${reasoning}`);
  }

  return lines.join('\n');
}

function verdict(score: TrustScore, reasons: string[], input: AggregatorInput): TrustVerdict {
  return { score, reasons, summary: buildSummary(score, reasons, input) };
}

function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}
