import { AnalyzerConfig, loadConfig } from './config';

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface AnalysisContext {
  readonly logger: Logger;
  readonly config: AnalyzerConfig;
}

export function createContext(overrides: Partial<AnalysisContext> = {}): AnalysisContext {
  const logger = overrides.logger ?? console;
  return Object.freeze({
    logger,
    config: overrides.config ?? loadConfig(process.env, logger),
  });
}
