export type ProviderId = 'deepseek' | 'groq';

export interface ProviderDescriptor {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly endpointUrl: string;
  readonly modelId: string;
}

export interface ResolvedProvider extends ProviderDescriptor {
  readonly credential: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  response_format: { type: 'json_object' };
}

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface CompletionProvider {
  complete(
    provider: ResolvedProvider,
    messages: ChatMessage[],
    options: CompletionOptions
  ): Promise<string>;
}
