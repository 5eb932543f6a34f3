/**
 * Retrieval collaborator: ranked knowledge snippets used to ground generation.
 * Results only improve prompts; an empty list never blocks a stage.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import knowledgeBaseData from '../data/knowledge-base.json' with { type: 'json' };
import { logger } from '../utils/logger.js';
import { normalizeText } from '../utils/sanitize.js';

export interface RetrievedSnippet {
  id: string;
  source: string;
  text: string;
  score: number;
}

export interface Retriever {
  readonly name: string;
  retrieve(query: string, limit: number): Promise<RetrievedSnippet[]>;
}

const KnowledgeSnippetSchema = z.object({
  id: z.string().min(1),
  source: z.string(),
  text: z.string().min(1),
});

export const KnowledgeBaseSchema = z.object({
  snippets: z.array(KnowledgeSnippetSchema),
});

export type KnowledgeSnippet = z.infer<typeof KnowledgeSnippetSchema>;

const STOP_WORDS = new Set([
  'a', 'ao', 'as', 'com', 'da', 'das', 'de', 'do', 'dos', 'e', 'em', 'na', 'nas', 'no', 'nos',
  'o', 'os', 'ou', 'para', 'pela', 'pelo', 'por', 'que', 'se', 'um', 'uma', 'sua', 'seu',
]);

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 3 && !STOP_WORDS.has(token));
}

export class EmptyRetriever implements Retriever {
  readonly name = 'empty';

  async retrieve(_query: string, _limit: number): Promise<RetrievedSnippet[]> {
    return [];
  }
}

/**
 * Token-overlap ranking over a small in-memory corpus
 */
export class KeywordRetriever implements Retriever {
  readonly name = 'keyword';
  private readonly index: Array<{ snippet: KnowledgeSnippet; tokens: Set<string> }>;

  constructor(snippets: readonly KnowledgeSnippet[]) {
    this.index = snippets.map((snippet) => ({ snippet, tokens: new Set(tokenize(snippet.text)) }));
  }

  async retrieve(query: string, limit: number): Promise<RetrievedSnippet[]> {
    const queryTokens = new Set(tokenize(query));
    if (queryTokens.size === 0 || limit <= 0) return [];

    const seen = new Set<string>();
    const items: RetrievedSnippet[] = [];
    for (const { snippet, tokens } of this.index) {
      if (seen.has(snippet.id)) continue;
      seen.add(snippet.id);

      let hits = 0;
      for (const token of queryTokens) {
        if (tokens.has(token)) hits++;
      }
      if (hits === 0) continue;

      items.push({ ...snippet, score: hits / queryTokens.size });
    }

    return items.sort((a, b) => b.score - a.score).slice(0, limit);
  }
}

/**
 * Load the corpus from a JSON file, or the bundled one when no path is given.
 * An unreadable file yields an empty corpus.
 */
export function loadKnowledgeBase(path: string | null): KnowledgeSnippet[] {
  if (path === null) {
    return KnowledgeBaseSchema.parse(knowledgeBaseData).snippets;
  }

  try {
    const parsed = KnowledgeBaseSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (parsed.success) return parsed.data.snippets;
    logger.warn('Knowledge base file has invalid structure', undefined, { path, issues: parsed.error.issues.length });
  } catch (error) {
    logger.warn('Knowledge base file could not be read', error, { path });
  }
  return [];
}

/**
 * Retrieve without ever failing the caller
 */
export async function safeRetrieve(retriever: Retriever, query: string, limit: number): Promise<RetrievedSnippet[]> {
  try {
    return await retriever.retrieve(query, limit);
  } catch (error) {
    logger.warn('Retrieval failed, continuing without grounding', error, { retriever: retriever.name });
    return [];
  }
}
