/**
 * Response payload guard
 *
 * Every generated stage payload passes through here before it reaches the
 * session. The guard parses the generator output, strips disallowed content
 * (forbidden section titles, onboarding filler, command syntax) and backfills
 * from static templates parameterized by the necessity whenever the minimum
 * content is not met.
 */

import { z } from 'zod';
import fallbackRequirementsData from '../data/fallback-requirements.json' with { type: 'json' };
import fallbackStrategiesData from '../data/fallback-strategies.json' with { type: 'json' };
import { StrategySchema, type Strategy } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { alignText, compilePhrases, normalizeText, truncate } from '../utils/sanitize.js';
import { stripNumbering } from './requirements-engine.js';

export const MIN_REQUIREMENTS = 8;
export const MIN_STRATEGIES = 2;

export const BLOCKED_TITLES: readonly string[] = ['justificativa', 'nota técnica', 'descrição da necessidade'];

export const ONBOARDING_PHRASES: readonly string[] = [
  'vamos começar',
  'posso seguir',
  'posso avançar',
  'vamos lá',
  'seja bem-vindo',
];

export const EMPTY_TEXT_FALLBACK =
  'Para não te deixar sem base, segue uma síntese e próximos passos temporários. Se preferir, me diga e eu detalho mais ou ajusto a direção.';

export const FALLBACK_LEGAL_BASIS = 'Lei nº 14.133/2021 (Nova Lei de Licitações e Contratos Administrativos)';

const COMMAND_SYNTAX_PATTERN = /\b(?:adicionar|remover|editar)\s*:/gi;

const ONBOARDING_PATTERNS = compilePhrases(ONBOARDING_PHRASES);

/** A line that is only a blocked title, optionally as a markdown heading or bold label */
const BLOCKED_TITLE_LINE_PATTERNS: readonly RegExp[] = BLOCKED_TITLES.map(
  (title) => new RegExp(`^[#*\\s\\d.]*${normalizeText(title)}\\b[^\\w]*(?:da contratacao)?[*:\\s-]*`)
);

const QUESTION_START_PATTERN = /^(?:qual|quais|por que|o que|voce|podemos|deseja|gostaria)\b/;

const FallbackRequirementsSchema = z.object({
  intro: z.string(),
  rationale: z.string(),
  requirements: z.array(z.string()).min(MIN_REQUIREMENTS),
});

const FallbackStrategiesSchema = z.object({
  intro: z.string(),
  strategies: z.array(StrategySchema).min(MIN_STRATEGIES),
});

const fallbackRequirements = FallbackRequirementsSchema.parse(fallbackRequirementsData);
const fallbackStrategies = FallbackStrategiesSchema.parse(fallbackStrategiesData);

/**
 * Generator output shape requested for the requirements stage
 */
const GeneratedRequirementsSchema = z.object({
  intro: z.string().optional(),
  requirements: z
    .array(z.union([z.string(), z.object({ text: z.string() }).passthrough()]))
    .optional(),
  rationale: z.string().optional(),
});

const GeneratedStrategySchema = z.object({
  title: z.string(),
  whenIndicated: z.string().optional(),
  pros: z.array(z.string()).optional(),
  cons: z.array(z.string()).optional(),
  affectedRequirements: z.array(z.number()).optional(),
});

const GeneratedStrategiesSchema = z.object({
  intro: z.string().optional(),
  strategies: z.array(z.unknown()).optional(),
});

const GeneratedSummarySchema = z.object({
  summary: z.string(),
});

export interface RequirementsPayload {
  intro: string;
  requirements: string[];
  rationale: string;
  backfilled: boolean;
}

export interface RewritePayload {
  requirements: string[];
  backfilled: boolean;
}

export interface StrategiesPayload {
  intro: string;
  strategies: Strategy[];
  backfilled: boolean;
}

export interface TextPayload {
  text: string;
  backfilled: boolean;
}

function fill(template: string, necessity: string, maxLength: number): string {
  const base = necessity.trim() ? truncate(necessity.trim(), maxLength) : 'contratação';
  return template.replace(/\{necessity\}/g, base);
}

/**
 * First JSON object in the text, fenced or bare. Null when nothing parses.
 */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidate = fenced?.[1] ?? text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  try {
    return JSON.parse(candidate.slice(start, end + 1));
  } catch (error) {
    logger.debug('Generated payload is not valid JSON', error);
    return null;
  }
}

/**
 * Remove blocked title lines, sentences with onboarding filler, and command syntax
 */
export function stripDisallowed(text: string): string {
  const lines = text.split(/\r?\n/).map((line) => {
    const { display, folded } = alignText(line);
    const titleMatch = BLOCKED_TITLE_LINE_PATTERNS.map((pattern) => pattern.exec(folded)).find(
      (match) => match !== null
    );
    // A heading line disappears; a labelled line keeps its content
    const withoutTitle = titleMatch ? display.slice(titleMatch[0].length) : display;

    const sentences = withoutTitle.split(/(?<=[.!?])\s+/).filter((sentence) => {
      const foldedSentence = normalizeText(sentence);
      return !ONBOARDING_PATTERNS.some((pattern) => pattern.test(foldedSentence));
    });

    return sentences.join(' ').replace(COMMAND_SYNTAX_PATTERN, '').replace(/[ \t]{2,}/g, ' ').trim();
  });

  return lines.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

export function isQuestion(statement: string): boolean {
  const trimmed = statement.trim();
  return trimmed.endsWith('?') || QUESTION_START_PATTERN.test(normalizeText(trimmed));
}

/**
 * Clean a candidate requirement: no numbering, no attached justification, no disallowed content
 */
export function cleanRequirement(raw: string): string {
  const withoutNumber = stripNumbering(raw);
  const [head = ''] = withoutNumber.split(/\s*[-(–]?\s*justificativa\s*:/i);
  return stripDisallowed(head).replace(/\s+/g, ' ').trim();
}

function candidateRequirements(raw: string): { intro: string; rationale: string; items: string[] } {
  const parsed = GeneratedRequirementsSchema.safeParse(extractJsonObject(raw));
  if (parsed.success && parsed.data.requirements) {
    return {
      intro: parsed.data.intro ?? '',
      rationale: parsed.data.rationale ?? '',
      items: parsed.data.requirements.map((item) => (typeof item === 'string' ? item : item.text)),
    };
  }

  // Plain text: numbered or bulleted lines are the candidates
  const items = raw
    .split(/\r?\n/)
    .filter((line) => /^\s*(?:(?:R\s?)?\d{1,3}\s*[.):\-–]|[-*•])\s+/i.test(line));
  return { intro: '', rationale: '', items };
}

/**
 * Requirements payload with at least MIN_REQUIREMENTS numbered, statements that are not questions.
 */
export function guardRequirementsPayload(raw: string, necessity: string): RequirementsPayload {
  const candidate = candidateRequirements(raw);

  const seen = new Set<string>();
  const requirements: string[] = [];
  for (const item of candidate.items) {
    const text = cleanRequirement(item);
    const key = normalizeText(text);
    if (text.length < 3 || isQuestion(text) || seen.has(key)) continue;
    seen.add(key);
    requirements.push(text);
  }

  let backfilled = false;
  if (requirements.length === 0) {
    requirements.push(...fallbackRequirements.requirements.map((template) => fill(template, necessity, 60)));
    backfilled = true;
  } else if (requirements.length < MIN_REQUIREMENTS) {
    for (const template of fallbackRequirements.requirements) {
      if (requirements.length >= MIN_REQUIREMENTS) break;
      const text = fill(template, necessity, 60);
      if (seen.has(normalizeText(text))) continue;
      seen.add(normalizeText(text));
      requirements.push(text);
    }
    backfilled = true;
  }

  const intro = stripDisallowed(candidate.intro) || fill(fallbackRequirements.intro, necessity, 80);
  const rationale = stripDisallowed(candidate.rationale) || fallbackRequirements.rationale;

  if (backfilled) {
    logger.info('Requirements payload backfilled from template', {
      generatedCount: candidate.items.length,
      finalCount: requirements.length,
    });
  }

  return { intro, requirements, rationale, backfilled };
}

/**
 * Exactly `count` new requirement texts, none repeating the current list.
 * Shortfalls come from the templates, then from a numbered placeholder.
 */
export function guardRewritePayload(
  raw: string,
  necessity: string,
  existing: readonly string[],
  count: number
): RewritePayload {
  const taken = new Set(existing.map(normalizeText));
  const requirements: string[] = [];
  const accept = (text: string): void => {
    const key = normalizeText(text);
    if (requirements.length >= count || text.length < 3 || isQuestion(text) || taken.has(key)) return;
    taken.add(key);
    requirements.push(text);
  };

  for (const item of candidateRequirements(raw).items) {
    accept(cleanRequirement(item));
  }
  const generatedCount = requirements.length;

  for (const template of fallbackRequirements.requirements) {
    accept(fill(template, necessity, 60));
  }
  while (requirements.length < count) {
    requirements.push(`Requisito complementar ${existing.length + requirements.length + 1} a detalhar`);
  }

  const backfilled = generatedCount < count;
  if (backfilled) {
    logger.info('Rewritten requirements backfilled from template', { generatedCount, requested: count });
  }
  return { requirements, backfilled };
}

function toStrategy(value: unknown): Strategy | null {
  const parsed = GeneratedStrategySchema.safeParse(value);
  if (!parsed.success) return null;
  const title = stripDisallowed(parsed.data.title);
  const pros = (parsed.data.pros ?? []).map(stripDisallowed).filter((p) => p.length > 0);
  const cons = (parsed.data.cons ?? []).map(stripDisallowed).filter((c) => c.length > 0);
  if (!title || pros.length === 0 || cons.length === 0) return null;
  return {
    title,
    whenIndicated: stripDisallowed(parsed.data.whenIndicated ?? ''),
    pros,
    cons,
    affectedRequirements: (parsed.data.affectedRequirements ?? []).filter((n) => Number.isInteger(n)),
  };
}

/**
 * Strategies payload with at least MIN_STRATEGIES strategies, each with pros and cons
 */
export function guardStrategiesPayload(raw: string, necessity: string): StrategiesPayload {
  const parsed = GeneratedStrategiesSchema.safeParse(extractJsonObject(raw));
  const generated = parsed.success ? parsed.data.strategies ?? [] : [];

  const strategies: Strategy[] = [];
  const titles = new Set<string>();
  for (const item of generated) {
    const strategy = toStrategy(item);
    if (strategy && !titles.has(normalizeText(strategy.title))) {
      titles.add(normalizeText(strategy.title));
      strategies.push(strategy);
    }
  }

  let backfilled = false;
  if (strategies.length < MIN_STRATEGIES) {
    const templates = fallbackStrategies.strategies.map((strategy) => ({
      ...strategy,
      whenIndicated: fill(strategy.whenIndicated, necessity, 50),
    }));
    if (strategies.length === 0) {
      strategies.push(...templates);
    } else {
      for (const template of templates) {
        if (strategies.length >= MIN_STRATEGIES) break;
        if (titles.has(normalizeText(template.title))) continue;
        strategies.push(template);
      }
    }
    backfilled = true;
    logger.info('Strategies payload backfilled from template', { generatedCount: generated.length });
  }

  const intro = (parsed.success ? stripDisallowed(parsed.data.intro ?? '') : '') || fallbackStrategies.intro;
  return { intro, strategies, backfilled };
}

/**
 * Executive summary: generated text when usable, otherwise a short template
 */
export function guardSummaryPayload(raw: string, necessity: string): TextPayload {
  const parsed = GeneratedSummarySchema.safeParse(extractJsonObject(raw));
  const candidate = parsed.success ? parsed.data.summary : raw.trim().startsWith('{') ? '' : raw;
  const text = stripDisallowed(candidate);
  if (text.length > 0) {
    return { text, backfilled: false };
  }
  return {
    text: `Necessidade: ${necessity.trim()}\n\nRequisitos e estratégias consolidados estão em elaboração.`,
    backfilled: true,
  };
}

/**
 * Any free text shown to the user is never empty
 */
export function ensureText(text: string): string {
  const cleaned = stripDisallowed(text);
  return cleaned.length > 0 ? cleaned : EMPTY_TEXT_FALLBACK;
}
