import { ProviderDescriptor, ProviderId, ResolvedProvider } from './types';

export type { ProviderId };
export type CredentialEnv = 'DEEPSEEK_API_KEY' | 'GROQ_API_KEY';

export interface RegisteredProvider extends ProviderDescriptor {
  readonly credentialEnv: CredentialEnv;
}

// Declaration order is the fallback order.
export const PROVIDERS: readonly RegisteredProvider[] = Object.freeze([
  {
    id: 'deepseek',
    displayName: 'DeepSeek',
    endpointUrl: 'https://api.deepseek.com/v1/chat/completions',
    modelId: 'deepseek-chat',
    credentialEnv: 'DEEPSEEK_API_KEY',
  },
  {
    id: 'groq',
    displayName: 'Groq',
    endpointUrl: 'https://api.groq.com/openai/v1/chat/completions',
    modelId: 'llama-3.1-8b-instant',
    credentialEnv: 'GROQ_API_KEY',
  },
] satisfies RegisteredProvider[]);

export function isProviderId(value: string): value is ProviderId {
  return PROVIDERS.some(provider => provider.id === value);
}

export function buildHeaders(providerId: ProviderId, credential: string): Record<string, string> {
  switch (providerId) {
    case 'deepseek':
    case 'groq':
      return {
        'Authorization': `Bearer ${credential}`,
        'Content-Type': 'application/json',
      };
  }
}

export type ProviderCredentials = Readonly<Partial<Record<ProviderId, string>>>;

/**
 * Credentialed providers in attempt order: the preferred one first when it has
 * a credential, then the rest in declaration order. Providers without a
 * credential are left out entirely.
 */
export function resolveProviders(
  credentials: ProviderCredentials,
  preferred?: string
): ResolvedProvider[] {
  const resolved: ResolvedProvider[] = [];

  const preferredProvider = PROVIDERS.find(provider => provider.id === preferred);
  const preferredCredential = preferredProvider ? credentials[preferredProvider.id] : undefined;
  if (preferredProvider && preferredCredential) {
    resolved.push({ ...toDescriptor(preferredProvider), credential: preferredCredential });
  }

  for (const provider of PROVIDERS) {
    const credential = credentials[provider.id];
    if (!credential || resolved.some(entry => entry.id === provider.id)) continue;
    resolved.push({ ...toDescriptor(provider), credential });
  }

  return resolved;
}

export function availableProviders(credentials: ProviderCredentials): ProviderId[] {
  return PROVIDERS.filter(provider => Boolean(credentials[provider.id])).map(provider => provider.id);
}

export interface ProviderStatus {
  id: ProviderId;
  displayName: string;
  credentialEnv: CredentialEnv;
  configured: boolean;
  preview: string | null;
}

export function describeProviders(credentials: ProviderCredentials): ProviderStatus[] {
  return PROVIDERS.map(provider => {
    const credential = credentials[provider.id];
    return {
      id: provider.id,
      displayName: provider.displayName,
      credentialEnv: provider.credentialEnv,
      configured: Boolean(credential),
      preview: credential ? maskCredential(credential) : null,
    };
  });
}

export function maskCredential(credential: string): string {
  return credential.length > 14 ? `${credential.slice(0, 10)}...${credential.slice(-4)}` : '***';
}

function toDescriptor(provider: RegisteredProvider): ProviderDescriptor {
  return {
    id: provider.id,
    displayName: provider.displayName,
    endpointUrl: provider.endpointUrl,
    modelId: provider.modelId,
  };
}
