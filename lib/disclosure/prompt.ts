import { ChatMessage } from '../providers/types';

export const MAX_ANALYZED_CHARS = 8000;

export const SYSTEM_PROMPT =
  'You are an analyst who identifies sponsorship and affiliate disclosures and judges content intent. ' +
  'Answer with a single JSON object and nothing else.';

export function buildDisclosurePrompt(cleanText: string): string {
  const text = cleanText.slice(0, MAX_ANALYZED_CHARS);

  return `Assess the text below for sponsorship or affiliate disclosures and for its overall intent.

TEXT:
${text}

DISCLOSURE:
- A disclosure is an explicit statement that the author is paid, sponsored, partnered, or earns a commission from links or products.
- Typical wording includes "sponsored", "affiliate", "paid", "commission", "partner", "advertisement".
- Location is "beginning" (first 20% of the text), "middle" (20-80%), "end" (last 20%), or "nowhere".

INTENT:
- "informative": educational, factual or news-like, with no real sales pressure.
- "persuasive": written to sell or to push the reader toward a purchase.
- "mixed": both of the above.

Respond with exactly this JSON object:
{
  "disclosure_found": true or false,
  "disclosure_location": "beginning" | "middle" | "end" | "nowhere",
  "content_intent": "informative" | "persuasive" | "mixed",
  "confidence_score": number between 0.0 and 1.0,
  "reasoning": "short explanation"
}

When no disclosure is present, disclosure_found is false and disclosure_location is "nowhere".
Judge only the text provided.`;
}

export function buildDisclosureMessages(cleanText: string): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildDisclosurePrompt(cleanText) },
  ];
}
