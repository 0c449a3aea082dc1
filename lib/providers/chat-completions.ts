import { z } from 'zod';
import { buildHeaders } from './registry';
import {
  ChatCompletionRequest,
  ChatMessage,
  CompletionOptions,
  CompletionProvider,
  ResolvedProvider,
} from './types';

const completionEnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

export class ProviderRequestError extends Error {
  constructor(
    readonly providerId: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderRequestError';
  }
}

/**
 * OpenAI-compatible `/chat/completions` transport. One attempt per call; any
 * network error, timeout, non-2xx status or unusable envelope is surfaced as a
 * ProviderRequestError so the caller can move on to the next provider.
 */
export class ChatCompletionsClient implements CompletionProvider {
  async complete(
    provider: ResolvedProvider,
    messages: ChatMessage[],
    options: CompletionOptions
  ): Promise<string> {
    const requestBody: ChatCompletionRequest = {
      model: provider.modelId,
      messages,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      response_format: { type: 'json_object' },
    };

    let response: Response;
    try {
      response = await fetch(provider.endpointUrl, {
        method: 'POST',
        headers: buildHeaders(provider.id, provider.credential),
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      const reason = isTimeout(error)
        ? `timed out after ${options.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      throw new ProviderRequestError(provider.id, `${provider.displayName} request failed: ${reason}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => response.statusText);
      throw new ProviderRequestError(
        provider.id,
        `${provider.displayName} API error (${response.status}): ${errorText}`,
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ProviderRequestError(provider.id, `${provider.displayName} returned a non-JSON body`, response.status, {
        cause: error,
      });
    }

    const envelope = completionEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ProviderRequestError(provider.id, `No completion in ${provider.displayName} response`, response.status, {
        cause: envelope.error,
      });
    }

    return envelope.data.choices[0].message.content;
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export const chatCompletions = new ChatCompletionsClient();
