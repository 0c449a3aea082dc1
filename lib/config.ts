import { z } from 'zod';
import type { Logger } from './context';
import { PROVIDERS, ProviderId, isProviderId } from './providers/registry';

const PLACEHOLDER = /^your[-_].*[-_]here$/i;

const credentialSchema = z
  .string()
  .optional()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed && !PLACEHOLDER.test(trimmed) ? trimmed : undefined;
  });

const envSchema = z.object({
  DEEPSEEK_API_KEY: credentialSchema,
  GROQ_API_KEY: credentialSchema,
  PREFERRED_LLM_PROVIDER: z
    .string()
    .optional()
    .transform(value => value?.trim().toLowerCase() || undefined),
});

export interface AnalyzerConfig {
  readonly credentials: Readonly<Partial<Record<ProviderId, string>>>;
  readonly preferredProvider?: ProviderId;
}

// An unknown preferred provider is ignored, never fatal.
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger: Logger = console): AnalyzerConfig {
  const parsed = envSchema.parse(env);

  const credentials: Partial<Record<ProviderId, string>> = {};
  for (const provider of PROVIDERS) {
    const credential = parsed[provider.credentialEnv];
    if (credential) {
      credentials[provider.id] = credential;
    }
  }

  const preferred = parsed.PREFERRED_LLM_PROVIDER;
  if (preferred !== undefined && !isProviderId(preferred)) {
    logger.warn(
      `Ignoring PREFERRED_LLM_PROVIDER=${preferred}; expected one of: ${PROVIDERS.map(p => p.id).join(', ')}`
    );
  }

  return Object.freeze({
    credentials: Object.freeze(credentials),
    preferredProvider: preferred !== undefined && isProviderId(preferred) ? preferred : undefined,
  });
}
