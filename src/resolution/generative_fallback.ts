/**
 * Asks a generative model for the official filing name behind a query.
 * The answer is only a guess: callers verify it against the registry.
 */

import { createChildLogger } from '@/utils/logger';
import type { CompletionProvider } from '@/providers/types';

const logger = createChildLogger('generative_fallback');

export const UNKNOWN_ANSWER = 'UNKNOWN';

export function buildIdentifyPrompt(query: string): string {
  return `The user is searching for a publicly traded US company: "${query}"

What is the official legal name of the company they're looking for, as it would appear in SEC filings?

Consider:
- Brand names vs parent companies (Google → Alphabet Inc., Facebook/Instagram → Meta Platforms, Inc.)
- Common abbreviations (AWS → Amazon.com, Inc.)
- Typos and misspellings
- The company must be publicly traded on a US exchange

Respond with ONLY the company's official SEC filing name, nothing else.
If you cannot determine the company, respond with "${UNKNOWN_ANSWER}".`;
}

/** First line of the reply with surrounding quotes removed; null for a decline */
export function parseIdentifyResponse(text: string): string | null {
  const firstLine = text.trim().split(/\r?\n/, 1)[0] ?? '';
  const name = firstLine.trim().replace(/^["'`]+|["'`]+$/g, '').trim();
  if (!name) return null;
  if (name.replace(/[."]/g, '').toUpperCase() === UNKNOWN_ANSWER) return null;
  return name;
}

export interface GenerativeFallbackOptions {
  maxTokens?: number;
}

export class GenerativeFallback {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: GenerativeFallbackOptions = {}
  ) {}

  async identify(query: string): Promise<string | null> {
    const response = await this.provider.complete(buildIdentifyPrompt(query), {
      maxTokens: this.options.maxTokens ?? 50,
      metadata: { task: 'ticker_lookup' },
    });

    const name = parseIdentifyResponse(response);
    logger.debug({ query, guess: name }, name ? 'Model suggested a name' : 'Model declined');
    return name;
  }
}
