import { vi } from 'vitest';
import { AnalyzerConfig } from '../lib/config';
import { AnalysisContext, createContext } from '../lib/context';
import { ChatMessage, CompletionOptions, CompletionProvider, ResolvedProvider } from '../lib/providers/types';

export function testLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function testContext(config: Partial<AnalyzerConfig> = {}): {
  context: AnalysisContext;
  logger: ReturnType<typeof testLogger>;
} {
  const logger = testLogger();
  const context = createContext({
    logger,
    config: { credentials: {}, ...config },
  });
  return { context, logger };
}

export function disclosureJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    disclosure_found: true,
    disclosure_location: 'beginning',
    content_intent: 'informative',
    confidence_score: 0.95,
    reasoning: 'Disclosed up front.',
    ...overrides,
  });
}

/** Scripted stand-in for the chat completions transport, keyed by provider id. */
export class ScriptedTransport implements CompletionProvider {
  readonly calls: Array<{ providerId: string; messages: ChatMessage[]; options: CompletionOptions }> = [];

  constructor(private readonly script: Record<string, string | Error>) {}

  async complete(provider: ResolvedProvider, messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    this.calls.push({ providerId: provider.id, messages, options });
    const reply = this.script[provider.id];
    if (reply === undefined) {
      throw new Error(`no scripted reply for ${provider.id}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
