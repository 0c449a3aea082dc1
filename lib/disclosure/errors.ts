export class DisclosureAnalysisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DisclosureAnalysisError';
  }
}

export class NoProviderConfiguredError extends DisclosureAnalysisError {
  constructor(readonly expectedEnv: string[]) {
    super(`No LLM providers configured. Set at least one of: ${expectedEnv.join(', ')}`);
    this.name = 'NoProviderConfiguredError';
  }
}

export class AllProvidersFailedError extends DisclosureAnalysisError {
  constructor(
    readonly attempted: string[],
    readonly lastError: unknown
  ) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All providers failed (${attempted.join(', ')}). Last error: ${detail}`, { cause: lastError });
    this.name = 'AllProvidersFailedError';
  }
}

export class ResponseValidationError extends DisclosureAnalysisError {
  constructor(
    message: string,
    readonly rawResponse: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResponseValidationError';
  }
}
