/**
 * Prompt templates sent to the quality models
 */

import { HIGH_QUALITY_PHRASE, LOW_QUALITY_PHRASE } from './ResponseParser.js';

export const QUALITY_PROMPT = `Review the following document content and decide whether it is of ${LOW_QUALITY_PHRASE} or ${HIGH_QUALITY_PHRASE}.
Low quality means the content is mostly meaningless, garbled or unrelated words and sentences (for example a failed OCR scan).
High quality means the content is clear, organized and meaningful.
Evaluate step by step:
1. Check basic indicators such as grammar and coherence.
2. Assess the overall organization and meaningfulness of the content.
3. Make a final determination.
Respond strictly with "${LOW_QUALITY_PHRASE}" or "${HIGH_QUALITY_PHRASE}".
Content:
`;

export function buildTitlePrompt(content: string): string {
  return `You write short, meaningful document titles.
Read the content below and answer with a concise title that summarizes it, at most 100 characters.
Answer with the title only, without explanation or quotes.

Content:
${content}
`;
}
