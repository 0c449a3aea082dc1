import { z } from 'zod';
import { CONTENT_INTENTS, DISCLOSURE_LOCATIONS } from './types';
import { ResponseValidationError } from './errors';

export const disclosureResponseSchema = z.object({
  disclosure_found: z.boolean(),
  disclosure_location: z.enum(DISCLOSURE_LOCATIONS),
  content_intent: z.enum(CONTENT_INTENTS),
  confidence_score: z.number().min(0).max(1),
  reasoning: z.string(),
});

export type DisclosureResponse = z.infer<typeof disclosureResponseSchema>;

export function parseDisclosureResponse(raw: string): DisclosureResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ResponseValidationError(
      `Invalid JSON response from LLM: ${error instanceof Error ? error.message : String(error)}`,
      raw,
      { cause: error }
    );
  }

  const result = disclosureResponseSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ResponseValidationError(`LLM response failed validation: ${details}`, raw, {
      cause: result.error,
    });
  }

  return result.data;
}
