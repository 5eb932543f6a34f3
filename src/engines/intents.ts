/**
 * Free-form conversational intents shared by the stage handlers.
 */

import { compilePhrases, matchesAny, normalizeText } from '../utils/sanitize.js';

const VAGUE_ACK_PATTERN =
  /^(?:ok|okay|vamos|pode seguir|continuar|continua|segue|blz|beleza|ta bom|esta bom|certo|uai|partiu|entendido|perfeito|manda|show)[\s.!,]*$/;

const UNCERTAIN_PATTERNS = compilePhrases([
  'não sei',
  'desconheço',
  'não tenho certeza',
  'não tenho ideia',
  'não tenho noção',
  'sem noção',
  'sem ideia',
  'sem base',
  'difícil estimar',
  'não faço ideia',
  'por enquanto nada',
]);

const PENDING_REQUEST_PATTERNS = compilePhrases([
  'deixar pendente',
  'deixa pendente',
  'deixe pendente',
  'aceito pendente',
  'registre pendente',
  'registrar pendente',
  'marque pendente',
  'marcar pendente',
  'marque como pendente',
  'fica pendente',
]);

const GENERATE_REQUEST_PATTERNS = compilePhrases([
  'pode gerar',
  'gerar etp',
  'gerar o etp',
  'gere o etp',
  'gera o etp',
  'gerar documento',
  'gerar o documento',
  'gere o documento',
]);

/**
 * A bare acknowledgement with no content of its own ("ok", "beleza", "pode seguir")
 */
export function isVagueAck(userText: string): boolean {
  return VAGUE_ACK_PATTERN.test(normalizeText(userText));
}

/**
 * The user says they do not know the value being asked for
 */
export function isUncertainValue(userText: string): boolean {
  return matchesAny(normalizeText(userText), UNCERTAIN_PATTERNS);
}

export function isExplicitPendingRequest(userText: string): boolean {
  return matchesAny(normalizeText(userText), PENDING_REQUEST_PATTERNS);
}

/**
 * The user asks for the document to be generated now
 */
export function isGenerateRequest(userText: string): boolean {
  return matchesAny(normalizeText(userText), GENERATE_REQUEST_PATTERNS);
}
