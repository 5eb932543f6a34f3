/**
 * Answer parsers for the strategy, quantity/value and installment interview steps.
 */

import type { InstallmentDecision, QuantityValueItem, Strategy } from '../types/index.js';
import { alignText, compilePhrases, matchesAny, normalizeText } from '../utils/sanitize.js';
import type { Interpretation } from './interview-interpreters.js';
import { isUserConfirmed } from './stage-machine.js';
import { isUncertainValue } from './intents.js';

// ── Solution strategies ─────────────────────────────────────────────

export type StrategyIntent = 'select' | 'accept_recommended' | 'unclear';

export interface StrategyPayload {
  titles: string[];
}

export const JACCARD_THRESHOLD = 0.4;

const STOP_WORDS = new Set([
  'a', 'o', 'as', 'os', 'de', 'da', 'do', 'das', 'dos', 'e', 'em', 'com', 'por', 'para', 'um', 'uma',
  'quero', 'prefiro', 'escolho', 'opcao', 'estrategia', 'vamos', 'pela', 'pelo', 'na', 'no',
]);

export const STRATEGY_QUESTION =
  'Qual estratégia você prefere? Responda com o número (ex.: 1 ou 1 e 3) ou com o nome da estratégia.';

function words(folded: string): Set<string> {
  return new Set(
    folded
      .split(/[^a-z0-9]+/)
      .filter((word) => word.length >= 3 && !STOP_WORDS.has(word))
  );
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/** Title without a trailing parenthetical, folded */
function foldedTitle(title: string): string {
  return normalizeText(title.replace(/\([^)]*\)\s*$/, ''));
}

function selectedByNumber(folded: string, count: number): number[] {
  const picks = new Set<number>();
  for (const match of folded.matchAll(/\b(\d{1,2})\b/g)) {
    const n = Number(match[1]);
    if (n >= 1 && n <= count) picks.add(n);
  }
  return [...picks].sort((a, b) => a - b);
}

function selectedByTitle(folded: string, options: readonly Strategy[]): number[] {
  const messageWords = words(folded);

  const substring = options
    .map((option, index) => ({ index, title: foldedTitle(option.title) }))
    .filter(({ title }) => title.length > 0 && (folded.includes(title) || (folded.length >= 4 && title.includes(folded))))
    .map(({ index }) => index + 1);
  if (substring.length > 0) return substring;

  let bestIndex = 0;
  let bestScore = 0;
  for (const [index, option] of options.entries()) {
    const score = jaccard(messageWords, words(foldedTitle(option.title)));
    if (score >= JACCARD_THRESHOLD && score > bestScore) {
      bestIndex = index + 1;
      bestScore = score;
    }
  }
  return bestIndex > 0 ? [bestIndex] : [];
}

/**
 * Resolve the user's choice among the offered strategies
 */
export function selectStrategies(
  userText: string,
  options: readonly Strategy[]
): Interpretation<StrategyIntent, StrategyPayload> {
  const { folded } = alignText(userText);

  let picks = selectedByNumber(folded, options.length);
  if (picks.length === 0) picks = selectedByTitle(folded, options);

  const titles = picks
    .map((n) => options[n - 1]?.title)
    .filter((title): title is string => title !== undefined);

  if (titles.length > 0) {
    return {
      intent: 'select',
      message: `Estratégia registrada: ${titles.join('; ')}.`,
      payload: { titles },
    };
  }

  const recommended = options[0];
  if (recommended && isUserConfirmed(userText)) {
    return {
      intent: 'accept_recommended',
      message: `Estratégia recomendada registrada: ${recommended.title}.`,
      payload: { titles: [recommended.title] },
    };
  }

  return { intent: 'unclear', message: STRATEGY_QUESTION, payload: { titles: [] } };
}

// ── Quantity and value ──────────────────────────────────────────────

export type QuantityValueIntent = 'estimate' | 'uncertain' | 'unclear';

export interface QuantityValuePayload {
  item?: QuantityValueItem | undefined;
}

const QUANTITY_PATTERN =
  /(\d{1,3}(?:\.\d{3})+|\d+(?:,\d+)?)\s*(unidades?|licencas?|veiculos?|meses|mes|horas?|postos?|usuarios?|equipamentos?|itens|item)\b/;

const VALUE_PATTERN =
  /r\$\s*(\d{1,3}(?:\.\d{3})+(?:,\d+)?|\d+(?:,\d+)?)(?:\s*(milhoes|milhao|mil|mi|k)\b)?/;

const PER_UNIT_PATTERNS = compilePhrases(['cada', 'unitário', 'por unidade', 'por item']);

const PERIOD_YEAR = /\b(?:por|ao|\/)\s*ano\b|\banual\b/;
const PERIOD_MONTH = /\b(?:por|ao|\/)\s*mes\b|\bmensal\b/;

const MULTIPLIERS: Readonly<Record<string, number>> = {
  mil: 1_000,
  k: 1_000,
  mi: 1_000_000,
  milhao: 1_000_000,
  milhoes: 1_000_000,
};

export const QUANTITY_VALUE_QUESTION =
  'Qual a quantidade estimada e o valor de referência? Exemplo: 20 veículos, R$ 3.500 por mês cada. Se ainda não souber, diga "não sei".';

/**
 * Parse a Brazilian-formatted number: "1.234,56" → 1234.56
 */
export function parseBrazilianNumber(raw: string): number {
  return Number(raw.replace(/\./g, '').replace(',', '.'));
}

export function parseQuantityValue(
  userText: string,
  description: string
): Interpretation<QuantityValueIntent, QuantityValuePayload> {
  const { display, folded } = alignText(userText);

  const quantityMatch = QUANTITY_PATTERN.exec(folded);
  const valueMatch = VALUE_PATTERN.exec(folded);

  if (!quantityMatch && !valueMatch) {
    if (isUncertainValue(userText)) {
      return { intent: 'uncertain', message: 'Estimativa ainda não disponível.', payload: {} };
    }
    return { intent: 'unclear', message: QUANTITY_VALUE_QUESTION, payload: {} };
  }

  const item: QuantityValueItem = { description };

  if (quantityMatch?.[1] && quantityMatch[2]) {
    item.quantity = parseBrazilianNumber(quantityMatch[1]);
    const unitStart = quantityMatch.index + quantityMatch[0].length - quantityMatch[2].length;
    item.unit = display.slice(unitStart, unitStart + quantityMatch[2].length);
  }

  if (valueMatch?.[1]) {
    const multiplier = valueMatch[2] ? MULTIPLIERS[valueMatch[2]] ?? 1 : 1;
    const amount = parseBrazilianNumber(valueMatch[1]) * multiplier;
    if (matchesAny(folded, PER_UNIT_PATTERNS)) {
      item.unitValue = amount;
    } else {
      item.totalValue = amount;
    }
  }

  if (PERIOD_YEAR.test(folded)) {
    item.period = 'ano';
  } else if (PERIOD_MONTH.test(folded)) {
    item.period = 'mes';
  }

  return { intent: 'estimate', message: 'Estimativa de quantidade e valor registrada.', payload: { item } };
}

// ── Installment ─────────────────────────────────────────────────────

export type InstallmentIntent = 'installment' | 'unclear';

export interface InstallmentPayload {
  decision: InstallmentDecision;
  justification: string;
}

const INSTALLMENT_SKIP = compilePhrases(['pular', 'prefiro não informar', 'sem informação', 'não informar']);
const INSTALLMENT_NO = compilePhrases(['não', 'sem parcelamento']);
const INSTALLMENT_YES = compilePhrases(['sim', 'haverá', 'terá', 'será', 'parcelar']);
const INSTALLMENT_SPLIT = compilePhrases(['lote', 'lotes', 'fase', 'fases', 'região', 'regiões', 'etapa', 'etapas']);

export const INSTALLMENT_QUESTION =
  'Haverá parcelamento do objeto (por exemplo, em lotes, fases ou regiões)? Responda sim ou não e, se possível, justifique.';

const DECISION_MESSAGES: Readonly<Record<InstallmentDecision, string>> = {
  sim: 'Registrado: haverá parcelamento.',
  nao: 'Registrado: não haverá parcelamento.',
  nao_informado: 'Registrado: parcelamento não informado.',
  pendente: 'Decisão sobre parcelamento marcada como pendente.',
};

/** Longer answers are kept verbatim as the justification */
function justificationOf(display: string): string {
  return display.split(/\s+/).length > 2 ? display : '';
}

export function parseInstallment(userText: string): Interpretation<InstallmentIntent, InstallmentPayload> {
  const { display, folded } = alignText(userText);

  if (folded.length === 0) {
    return { intent: 'unclear', message: INSTALLMENT_QUESTION, payload: { decision: 'nao_informado', justification: '' } };
  }

  const resolve = (decision: InstallmentDecision, justification: string): Interpretation<InstallmentIntent, InstallmentPayload> => ({
    intent: 'installment',
    message: DECISION_MESSAGES[decision],
    payload: { decision, justification },
  });

  if (matchesAny(folded, INSTALLMENT_SKIP)) return resolve('nao_informado', '');
  if (matchesAny(folded, INSTALLMENT_NO)) return resolve('nao', justificationOf(display));
  if (matchesAny(folded, INSTALLMENT_YES)) return resolve('sim', justificationOf(display));
  if (matchesAny(folded, INSTALLMENT_SPLIT)) return resolve('sim', display);

  return resolve('nao_informado', display);
}
