export { createContext } from './context';
export type { AnalysisContext, Logger } from './context';
export { loadConfig } from './config';
export type { AnalyzerConfig } from './config';

export { AffiliateScanner, emptyScanResult } from './scanner';
export type { AffiliateMatch, NetworkRule, ScanResult } from './scanner/types';

export { DisclosureAnalyzer } from './disclosure';
export type { SafeAnalyzeResult } from './disclosure';
export {
  AllProvidersFailedError,
  DisclosureAnalysisError,
  NoProviderConfiguredError,
  ResponseValidationError,
} from './disclosure/errors';
export type { ContentIntent, DisclosureAssessment, DisclosureLocation } from './disclosure/types';

export { PROVIDERS, availableProviders, describeProviders } from './providers/registry';

export { aggregate, buildSummary, toAggregatorInput } from './trust/aggregate';
export type { AggregatorInput, TrustScore, TrustVerdict } from './trust/types';

export { htmlToCleanText } from './text/html-to-text';
export { TrustPipeline, runPipeline } from './pipeline';
export type { PipelineReport } from './pipeline';
