import { AnalysisContext } from '../context';
import { chatCompletions } from '../providers/chat-completions';
import { PROVIDERS, availableProviders, resolveProviders } from '../providers/registry';
import { CompletionOptions, CompletionProvider } from '../providers/types';
import { AllProvidersFailedError, DisclosureAnalysisError, NoProviderConfiguredError } from './errors';
import { buildDisclosureMessages } from './prompt';
import { DisclosureResponse, parseDisclosureResponse } from './schema';
import { DisclosureAssessment } from './types';

export const COMPLETION_OPTIONS: CompletionOptions = Object.freeze({
  temperature: 0.1,
  maxTokens: 1000,
  timeoutMs: 30_000,
});

export type SafeAnalyzeResult =
  | { success: true; data: DisclosureAssessment }
  | { success: false; error: DisclosureAnalysisError };

export class DisclosureAnalyzer {
  constructor(
    private readonly context: AnalysisContext,
    private readonly transport: CompletionProvider = chatCompletions
  ) {}

  async analyze(cleanText: string, preferredProvider?: string): Promise<DisclosureAssessment> {
    const { logger, config } = this.context;
    const configured = availableProviders(config.credentials);

    if (configured.length === 0) {
      throw new NoProviderConfiguredError(PROVIDERS.map(p => p.credentialEnv));
    }

    const candidates = resolveProviders(
      config.credentials,
      preferredProvider ?? config.preferredProvider
    );
    const messages = buildDisclosureMessages(cleanText);

    let lastError: unknown;
    for (const provider of candidates) {
      let content: string;
      try {
        logger.info(`Trying provider: ${provider.id}`);
        content = await this.transport.complete(provider, messages, COMPLETION_OPTIONS);
      } catch (error) {
        lastError = error;
        logger.warn(`Provider ${provider.id} failed:`, error instanceof Error ? error.message : error);
        continue;
      }

      // A bad answer from a provider that did respond is final; it does not fall through.
      const response = this.validate(provider.id, content);

      return {
        found: response.disclosure_found,
        location: response.disclosure_location,
        intent: response.content_intent,
        confidence: response.confidence_score,
        rawReasoning: response.reasoning,
        providerUsed: configured.length > 1 ? 'multiple' : configured[0],
      };
    }

    throw new AllProvidersFailedError(candidates.map(p => p.id), lastError);
  }

  private validate(providerId: string, content: string): DisclosureResponse {
    try {
      return parseDisclosureResponse(content);
    } catch (error) {
      this.context.logger.error(`Rejected ${providerId} response:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }

  async safeAnalyze(cleanText: string, preferredProvider?: string): Promise<SafeAnalyzeResult> {
    try {
      return { success: true, data: await this.analyze(cleanText, preferredProvider) };
    } catch (error) {
      if (error instanceof DisclosureAnalysisError) {
        return { success: false, error };
      }
      throw error;
    }
  }
}

export * from './errors';
export * from './types';
