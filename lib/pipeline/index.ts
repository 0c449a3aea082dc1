import { AnalysisContext, createContext } from '../context';
import { DisclosureAnalyzer } from '../disclosure';
import { DisclosureAnalysisError } from '../disclosure/errors';
import { DisclosureAssessment } from '../disclosure/types';
import { AffiliateScanner } from '../scanner';
import { ScanResult } from '../scanner/types';
import { htmlToCleanText } from '../text/html-to-text';
import { aggregate, buildSummary, toAggregatorInput } from '../trust/aggregate';
import { TrustScore, TrustVerdict } from '../trust/types';

export const PARTIAL_DISCLOSURE_REASON = 'partial analysis: disclosure and intent could not be assessed';
export const PARTIAL_SCAN_REASON = 'partial analysis: affiliate link scan did not complete';

// Stand-in used for aggregation when the analyzer produced nothing.
const UNASSESSED: Readonly<DisclosureAssessment> = {
  found: false,
  location: 'nowhere',
  intent: 'informative',
  confidence: 0,
  rawReasoning: '',
  providerUsed: 'none',
};

export interface PipelineReport {
  scan: ScanResult;
  disclosure: DisclosureAssessment | null;
  verdict: TrustVerdict;
  degraded: boolean;
  failure?: DisclosureAnalysisError;
}

export interface PipelineOptions {
  scanner?: AffiliateScanner;
  analyzer?: DisclosureAnalyzer;
}

export class TrustPipeline {
  private readonly scanner: AffiliateScanner;
  private readonly analyzer: DisclosureAnalyzer;

  constructor(
    private readonly context: AnalysisContext,
    options: PipelineOptions = {}
  ) {
    this.scanner = options.scanner ?? new AffiliateScanner(context);
    this.analyzer = options.analyzer ?? new DisclosureAnalyzer(context);
  }

  async run(html: unknown, preferredProvider?: string): Promise<PipelineReport> {
    const { logger } = this.context;

    const scan = this.scanner.detect(html);
    const analysis = await this.analyzer.safeAnalyze(htmlToCleanText(html), preferredProvider);

    const disclosure = analysis.success ? analysis.data : null;
    const input = toAggregatorInput(scan, disclosure ?? UNASSESSED);
    const verdict = aggregate(input);

    const partialReasons: string[] = [];
    if (scan.diagnostic !== undefined) {
      partialReasons.push(PARTIAL_SCAN_REASON);
    }
    if (!analysis.success) {
      logger.error('Disclosure analysis failed, degrading verdict:', analysis.error.message);
      partialReasons.push(PARTIAL_DISCLOSURE_REASON);
    }

    if (partialReasons.length === 0) {
      return { scan, disclosure, verdict, degraded: false };
    }

    const score: TrustScore = verdict.score === 'red' ? 'red' : 'yellow';
    const reasons = [...verdict.reasons, ...partialReasons];
    const degraded: PipelineReport = {
      scan,
      disclosure,
      verdict: {
        score,
        reasons,
        summary: buildSummary(score, reasons, { ...input, disclosureAssessed: analysis.success }),
      },
      degraded: true,
    };
    if (!analysis.success) {
      degraded.failure = analysis.error;
    }
    return degraded;
  }
}

export async function runPipeline(html: unknown, context: AnalysisContext = createContext()): Promise<TrustVerdict> {
  const report = await new TrustPipeline(context).run(html);
  return report.verdict;
}
