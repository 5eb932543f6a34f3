/**
 * Decision arbitration
 *
 * Offers exactly three numbered options for a single pending decision and
 * resolves the next message against it before any other interpreter runs.
 */

import type { ConversationStage, InterviewStep, PendingDecision, Session } from '../types/index.js';
import { compilePhrases, matchesAny, normalizeText } from '../utils/sanitize.js';
import { isExplicitPendingRequest } from './intents.js';

export const PENDING_MARKER = 'PENDENTE';

export const DECISION_OPTIONS = [
  'Aceitar a proposta',
  'Deixar como pendente',
  'Discutir mais antes de decidir',
] as const;

export type DecisionAction = 'accept' | 'pendente' | 'debate' | 'unclear';

interface OutcomeBase {
  decision: PendingDecision;
  session: Session;
  message: string;
}

/**
 * A resolved decision carries the answer to record: the proposal on accept,
 * the pending marker on pendente.
 */
export type DecisionOutcome =
  | (OutcomeBase & { action: 'accept'; value: string })
  | (OutcomeBase & { action: 'pendente'; value: string })
  | (OutcomeBase & { action: 'debate'; value: null })
  | (OutcomeBase & { action: 'unclear'; value: null });

const OPTION_PATTERN = /^(?:opcao\s*|op\.?\s*|alternativa\s*)?([123])(?:\b|$)/;

const PENDING_PATTERNS = compilePhrases(['pendente', 'depois', 'adiar', 'mais tarde', 'deixa para depois']);

const DEBATE_PATTERNS = compilePhrases([
  'debate',
  'debater',
  'discutir',
  'conversar',
  'explicar',
  'explique',
  'dúvida',
  'mais detalhes',
  'por que',
]);

const ACCEPT_PATTERNS = compilePhrases([
  'aceito',
  'aceitar',
  'aceita',
  'concordo',
  'sim',
  'pode ser',
  'ok',
  'confirmo',
  'de acordo',
]);

export const UNCLEAR_DECISION_MESSAGE =
  'Não consegui identificar sua escolha. Responda 1 para aceitar a proposta, 2 para deixar pendente ou 3 para discutir mais, ou reformule sua resposta.';

/**
 * Render the numbered options for a decision
 */
export function formatDecisionPrompt(prompt: string, proposal: string): string {
  const options = DECISION_OPTIONS.map((label, index) => `${index + 1}. ${label}`).join('\n');
  return `${prompt}\n\n**Proposta:** ${proposal}\n\n**Opções:**\n${options}\n\nResponda com 1, 2 ou 3.`;
}

/**
 * Open a pending decision. Replaces any decision already pending.
 */
export function askDecision(
  session: Session,
  prompt: string,
  proposal: string,
  stage: ConversationStage,
  step?: InterviewStep
): { session: Session; message: string } {
  const pendingDecision: PendingDecision = step === undefined
    ? { prompt, proposal, stage }
    : { prompt, proposal, stage, step };
  return {
    session: { ...session, pendingDecision },
    message: formatDecisionPrompt(prompt, proposal),
  };
}

function classify(userText: string): DecisionAction {
  const folded = normalizeText(userText);

  const option = OPTION_PATTERN.exec(folded);
  if (option) {
    if (option[1] === '1') return 'accept';
    if (option[1] === '2') return 'pendente';
    return 'debate';
  }

  if (isExplicitPendingRequest(userText) || matchesAny(folded, PENDING_PATTERNS)) return 'pendente';
  if (matchesAny(folded, DEBATE_PATTERNS)) return 'debate';
  if (matchesAny(folded, ACCEPT_PATTERNS)) return 'accept';
  return 'unclear';
}

/**
 * Resolve a message against the pending decision.
 * Returns null when nothing is pending, so normal interpretation runs.
 * An unclear reply keeps the decision pending.
 */
export function consumeDecision(session: Session, userText: string): DecisionOutcome | null {
  const decision = session.pendingDecision;
  if (!decision) return null;

  const action = classify(userText);
  const cleared: Session = { ...session, pendingDecision: null };

  switch (action) {
    case 'accept':
      return {
        action,
        value: decision.proposal,
        decision,
        session: cleared,
        message: `Registrado: ${decision.proposal}`,
      };
    case 'pendente':
      return {
        action,
        value: PENDING_MARKER,
        decision,
        session: cleared,
        message: 'Registrado como pendente. Você poderá completar esse ponto depois.',
      };
    case 'debate':
      return {
        action,
        value: null,
        decision,
        session: cleared,
        message: 'Certo, vamos discutir. Conte o que você pensa sobre esse ponto ou o que gostaria de ajustar na proposta.',
      };
    case 'unclear':
      return {
        action,
        value: null,
        decision,
        session,
        message: UNCLEAR_DECISION_MESSAGE,
      };
  }
}
