/**
 * Stage state machine
 *
 * Fixed adjacency map over the conversation stages. No stage change happens
 * without an explicit confirmation signal, with two exceptions: the
 * refine_requirements self-loop (edits) and the forced
 * suggest_requirements → refine_requirements edge.
 */

import { ConversationStageSchema, type ConversationStage } from '../types/index.js';
import { compilePhrases, matchesAny, normalizeText } from '../utils/sanitize.js';

export const CONVERSATION_STAGES: readonly ConversationStage[] = ConversationStageSchema.options;

export const STAGE_TRANSITIONS: Readonly<Record<ConversationStage, readonly ConversationStage[]>> = {
  collect_need: ['suggest_requirements'],
  suggest_requirements: ['refine_requirements'],
  refine_requirements: ['refine_requirements', 'confirm_requirements'],
  confirm_requirements: ['generate_document'],
  generate_document: ['preview'],
  preview: ['finalize'],
  finalize: [],
};

/**
 * Edges taken regardless of message content
 */
const FORCED_EDGES: ReadonlyArray<readonly [ConversationStage, ConversationStage]> = [
  ['suggest_requirements', 'refine_requirements'],
];

export const CONFIRMATION_PHRASES: readonly string[] = [
  'ok',
  'seguir',
  'prosseguir',
  'manter',
  'aceito',
  'acordado',
  'concordo',
  'fechou',
  'pode gerar',
  'pode seguir',
  'segue',
  'confirmo',
  'confirmado',
  'confirmar',
  'aprovado',
  'aprovada',
  'aprove',
  'pode prosseguir',
  'pode continuar',
  'sem alterações',
  'sem ajustes',
  'manter assim',
  'está bom',
  'tá bom',
  'pode manter',
  'perfeito',
  'correto',
  'certo',
];

const CONFIRMATION_PATTERNS = compilePhrases(CONFIRMATION_PHRASES);

export interface TransitionCheck {
  allowed: boolean;
  reason: string | null;
}

/**
 * Whole-word, case and diacritic insensitive match against the confirmation vocabulary
 */
export function isUserConfirmed(userText: string): boolean {
  if (!userText) return false;
  return matchesAny(normalizeText(userText), CONFIRMATION_PATTERNS);
}

export function isForcedEdge(from: ConversationStage, to: ConversationStage): boolean {
  return FORCED_EDGES.some(([a, b]) => a === from && b === to);
}

/**
 * Stage reached unconditionally from `stage`, if any
 */
export function forcedNextStage(stage: ConversationStage): ConversationStage | null {
  const edge = FORCED_EDGES.find(([from]) => from === stage);
  return edge ? edge[1] : null;
}

/**
 * The single forward successor of a stage (self-loops excluded)
 */
export function nextStage(stage: ConversationStage): ConversationStage | null {
  return STAGE_TRANSITIONS[stage].find((candidate) => candidate !== stage) ?? null;
}

export function isTerminal(stage: ConversationStage): boolean {
  return STAGE_TRANSITIONS[stage].length === 0;
}

/**
 * Validate a stage change. A refusal is not a failure: the caller keeps the
 * current stage and shows `reason` to the user.
 */
export function validateTransition(
  from: ConversationStage,
  to: ConversationStage,
  userConfirmed: boolean
): TransitionCheck {
  if (!STAGE_TRANSITIONS[from].includes(to)) {
    return { allowed: false, reason: `Transição não permitida de ${from} para ${to}` };
  }

  if (from === to || isForcedEdge(from, to)) {
    return { allowed: true, reason: null };
  }

  if (!userConfirmed) {
    return { allowed: false, reason: 'Transição requer confirmação explícita do usuário' };
  }

  return { allowed: true, reason: null };
}

/**
 * Document generation is only reachable from confirm_requirements with an explicit confirmation
 */
export function canGenerate(stage: ConversationStage, userConfirmed: boolean): TransitionCheck {
  if (stage !== 'confirm_requirements') {
    return {
      allowed: false,
      reason: `Geração de ETP só é permitida no estado 'confirm_requirements'. Estado atual: ${stage}`,
    };
  }

  if (!userConfirmed) {
    return { allowed: false, reason: 'Geração de ETP requer confirmação explícita do usuário' };
  }

  return { allowed: true, reason: null };
}
