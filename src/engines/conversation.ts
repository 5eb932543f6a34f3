/**
 * Conversation engine
 *
 * One call to `processMessage` handles one user turn through an ordered pipeline:
 *
 *   decision-check → global intents → stage handler → persist → response
 *
 * Stage handlers are looked up by stage name, and interview steps inside
 * `generate_document` by step name. Handlers take a session value and return
 * a new one; nothing is written until the whole turn succeeds.
 */

import {
  ProcessMessageInputSchema,
  type ConversationStage,
  type InterviewStep,
  type PendingDecision,
  type ProcessMessageResult,
  type Requirement,
  type Session,
  type StoredDocument,
  type Strategy,
  type StructuredDelta,
} from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { generateId, isValidSessionId } from '../utils/id.js';
import { logger } from '../utils/logger.js';
import { sanitizeString, truncate } from '../utils/sanitize.js';
import {
  buildRequirementRewritePrompt,
  buildRequirementsPrompt,
  buildStrategiesPrompt,
  buildSummaryPrompt,
} from '../prompts/index.js';
import {
  parseInstallment,
  parseQuantityValue,
  selectStrategies,
  INSTALLMENT_QUESTION,
  QUANTITY_VALUE_QUESTION,
  STRATEGY_QUESTION,
} from './answer-parsers.js';
import { interpretRequirementCommand } from './command-interpreter.js';
import { askDecision, consumeDecision, PENDING_MARKER } from './decision-arbitration.js';
import { assembleFromSession, assembleSections, partsFromSession, renderMarkdown } from './document-assembler.js';
import { generateWithFallback, type GenerationOutcome, type Generator } from './generator.js';
import { isExplicitPendingRequest, isGenerateRequest, isUncertainValue, isVagueAck } from './intents.js';
import {
  interpretLegalBasis,
  interpretPca,
  interpretPriceResearch,
  LEGAL_BASIS_QUESTION,
  PCA_QUESTION,
  PRICE_RESEARCH_QUESTION,
} from './interview-interpreters.js';
import {
  FALLBACK_LEGAL_BASIS,
  guardRequirementsPayload,
  guardRewritePayload,
  guardStrategiesPayload,
  guardSummaryPayload,
  EMPTY_TEXT_FALLBACK,
} from './payload-guard.js';
import { applyCommand, fromStatements, rewriteAt } from './requirements-engine.js';
import { safeRetrieve, type Retriever } from './retriever.js';
import { canGenerate, isUserConfirmed, validateTransition } from './stage-machine.js';

/**
 * Persistence consumed by the engine
 */
export interface SessionStore {
  getSession(sessionId: string): Session | null;
  saveSession(session: Session): void;
  saveDocument(document: StoredDocument): void;
}

export interface ConversationEngineOptions {
  store: SessionStore;
  generator: Generator;
  retriever: Retriever;
  /** Timeout for conversational generation (requirements, strategies) */
  shortTimeoutMs: number;
  /** Timeout for the final synthesis (summary) */
  longTimeoutMs: number;
  now?: () => Date;
}

interface Turn {
  session: Session;
  message: string;
}

type StageHandler = (session: Session, text: string) => Promise<Turn>;
type StepHandler = (session: Session, text: string) => Promise<Turn>;

export const INTERVIEW_STEPS: readonly InterviewStep[] = [
  'solution_strategies',
  'pca',
  'legal_basis',
  'quantity_value',
  'price_research',
  'installment',
  'summary',
];

export const NECESSITY_QUESTION =
  'Descreva a necessidade da contratação: o que precisa ser contratado e qual problema isso resolve.';

export const GENERATOR_NOTICE =
  'Observação: o gerador de texto não está configurado; o conteúdo acima foi preparado a partir de modelos padrão.';

const EDIT_HINT =
  'Você pode remover, editar, reescrever, reordenar ou adicionar requisitos (ex.: "remover 2 e 4", "trocar 3: novo texto", "melhorar 5", "reordenar 3, 1, 2", "adicionar: novo requisito") ou dizer "ok" para confirmar.';

const CONFIRM_HINT = 'Posso iniciar a elaboração do ETP com esses requisitos? Responda "confirmo" para seguir ou indique ajustes.';

const SUMMARY_HINT = 'Confirma o resumo? Diga "ok" para ver a prévia do documento ou escreva o texto que deseja usar no lugar.';

const PREVIEW_HINT = 'Esta é a prévia do ETP. Diga "confirmo" para finalizar ou "nova necessidade" para recomeçar.';

export const FINALIZED_MESSAGE =
  'Este ETP já foi finalizado. Para iniciar outro, diga "nova necessidade: descrição da nova contratação".';

/**
 * Fresh session for an id seen for the first time
 */
export function newSession(sessionId: string, now: Date): Session {
  const timestamp = now.toISOString();
  return {
    sessionId,
    stage: 'collect_need',
    necessity: null,
    requirements: [],
    requirementsLocked: false,
    answers: {},
    pendingDecision: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function formatRequirements(requirements: readonly Requirement[]): string {
  return requirements.map((req) => `${req.id}. ${req.text}`).join('\n');
}

function join(...parts: string[]): string {
  return parts.filter((part) => part.trim().length > 0).join('\n\n');
}

function nextStepOf(step: InterviewStep): InterviewStep | null {
  const index = INTERVIEW_STEPS.indexOf(step);
  return INTERVIEW_STEPS[index + 1] ?? null;
}

/**
 * Changed fields between two snapshots of a session
 */
export function diffSession(before: Session | null, after: Session): StructuredDelta {
  const delta: StructuredDelta = {};
  const changed = (a: unknown, b: unknown): boolean => JSON.stringify(a) !== JSON.stringify(b);

  if (!before || before.stage !== after.stage) delta.stage = after.stage;
  if (!before || before.necessity !== after.necessity) delta.necessity = after.necessity;
  if (!before || changed(before.requirements, after.requirements)) delta.requirements = after.requirements;
  if (!before || before.requirementsLocked !== after.requirementsLocked) delta.requirementsLocked = after.requirementsLocked;
  if (!before || changed(before.answers, after.answers)) delta.answers = after.answers;
  if (!before || changed(before.pendingDecision, after.pendingDecision)) delta.pendingDecision = after.pendingDecision;
  return delta;
}

export class ConversationEngine {
  private readonly store: SessionStore;
  private readonly generator: Generator;
  private readonly retriever: Retriever;
  private readonly shortTimeoutMs: number;
  private readonly longTimeoutMs: number;
  private readonly now: () => Date;

  private readonly stageHandlers: Readonly<Record<ConversationStage, StageHandler>>;
  private readonly stepHandlers: Readonly<Record<InterviewStep, StepHandler>>;

  constructor(options: ConversationEngineOptions) {
    this.store = options.store;
    this.generator = options.generator;
    this.retriever = options.retriever;
    this.shortTimeoutMs = options.shortTimeoutMs;
    this.longTimeoutMs = options.longTimeoutMs;
    this.now = options.now ?? (() => new Date());

    this.stageHandlers = {
      collect_need: (session, text) => this.handleCollectNeed(session, text),
      suggest_requirements: (session, text) => this.handleSuggestRequirements(session, text),
      refine_requirements: (session, text) => this.handleRefineRequirements(session, text),
      confirm_requirements: (session, text) => this.handleConfirmRequirements(session, text),
      generate_document: (session, text) => this.handleGenerateDocument(session, text),
      preview: (session, text) => this.handlePreview(session, text),
      finalize: async (session) => ({ session, message: FINALIZED_MESSAGE }),
    };

    this.stepHandlers = {
      solution_strategies: (session, text) => this.stepStrategies(session, text),
      pca: (session, text) => this.stepPca(session, text),
      legal_basis: (session, text) => this.stepLegalBasis(session, text),
      quantity_value: (session, text) => this.stepQuantityValue(session, text),
      price_research: (session, text) => this.stepPriceResearch(session, text),
      installment: (session, text) => this.stepInstallment(session, text),
      summary: (session, text) => this.stepSummary(session, text),
    };
  }

  /**
   * Process one user turn. Empty text and malformed ids are rejected with a
   * ValidationError; any other fault becomes an unsuccessful result with the
   * stored session untouched.
   */
  async processMessage(sessionId: string | undefined, userText: string): Promise<ProcessMessageResult> {
    const input = ProcessMessageInputSchema.safeParse({ sessionId, text: userText });
    if (!input.success) {
      throw ValidationError.fromZodError(input.error);
    }
    if (sessionId !== undefined && !isValidSessionId(sessionId)) {
      throw new ValidationError(`Invalid session id: ${sessionId}`);
    }

    const id = sessionId ?? generateId('etp');
    const text = sanitizeString(input.data.text);
    logger.updateContext({ sessionId: id });

    let stage: ConversationStage = 'collect_need';
    try {
      const stored = this.store.getSession(id);
      const session = stored ?? newSession(id, this.now());
      stage = session.stage;
      logger.updateContext({ stage });

      const turn = await this.runPipeline(session, text);
      const updated: Session = { ...turn.session, updatedAt: this.now().toISOString() };
      this.store.saveSession(updated);

      if (updated.stage !== stage) {
        logger.info('Stage transition', { from: stage, to: updated.stage });
      }

      return {
        success: true,
        sessionId: id,
        aiResponseText: turn.message.trim() || EMPTY_TEXT_FALLBACK,
        stage: updated.stage,
        structuredDelta: diffSession(stored, updated),
      };
    } catch (error) {
      logger.error('Failed to process message', error, { stage });
      const reason = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        sessionId: id,
        aiResponseText: `Ocorreu um erro ao processar sua solicitação: ${reason}. Por favor, tente novamente.`,
        stage,
        structuredDelta: {},
      };
    }
  }

  private async runPipeline(session: Session, text: string): Promise<Turn> {
    const phases: ReadonlyArray<(current: Session, message: string) => Promise<Turn | null>> = [
      (current, message) => this.decisionPhase(current, message),
      (current, message) => this.globalIntentPhase(current, message),
    ];

    for (const phase of phases) {
      const turn = await phase(session, text);
      if (turn) return turn;
    }

    return this.stageHandlers[session.stage](session, text);
  }

  // ── Pipeline phases ───────────────────────────────────────────────

  private async decisionPhase(session: Session, text: string): Promise<Turn | null> {
    const outcome = consumeDecision(session, text);
    if (!outcome) return null;

    logger.debug('Pending decision resolved', undefined, { action: outcome.action, step: outcome.decision.step });

    if (outcome.action === 'unclear' || outcome.action === 'debate') {
      return { session: outcome.session, message: outcome.message };
    }

    const applied = this.applyDecision(outcome.session, outcome.decision, outcome.value);
    const step = outcome.decision.step;
    const next = step ? nextStepOf(step) : null;
    if (!next) {
      return { session: applied, message: outcome.message };
    }
    const entered = await this.enterStep(applied, next);
    return { session: entered.session, message: join(outcome.message, entered.message) };
  }

  private async globalIntentPhase(session: Session, text: string): Promise<Turn | null> {
    const interpretation = interpretRequirementCommand(text, session.requirements.length);
    if (interpretation.command.type === 'restart_necessity') {
      logger.info('Necessity restarted', { from: session.stage });
      const reset: Session = {
        ...newSession(session.sessionId, new Date(session.createdAt)),
        updatedAt: session.updatedAt,
      };
      const payload = interpretation.command.payload;
      if (payload) {
        return this.handleCollectNeed(reset, payload);
      }
      return { session: reset, message: `Certo, vamos recomeçar. ${NECESSITY_QUESTION}` };
    }

    // suggest_requirements always takes its forced edge first
    const gated = session.stage !== 'confirm_requirements' && session.stage !== 'suggest_requirements';
    if (gated && isGenerateRequest(text)) {
      return this.rejectGeneration(session, text);
    }

    return null;
  }

  private rejectGeneration(session: Session, text: string): Turn {
    const check = canGenerate(session.stage, isUserConfirmed(text));
    logger.debug('Generation request rejected', undefined, { reason: check.reason });
    return { session, message: check.reason ?? CONFIRM_HINT };
  }

  // ── Stage handlers ────────────────────────────────────────────────

  private async handleCollectNeed(session: Session, text: string): Promise<Turn> {
    if (isVagueAck(text) || text.length < 5) {
      return { session, message: NECESSITY_QUESTION };
    }

    const check = validateTransition('collect_need', 'suggest_requirements', true);
    if (!check.allowed) {
      return { session, message: check.reason ?? NECESSITY_QUESTION };
    }

    const necessity = session.necessity ?? text;
    const generated = await this.generateRequirements(session, necessity);
    return {
      session: { ...generated.session, necessity, stage: 'suggest_requirements' },
      message: generated.message,
    };
  }

  private async handleSuggestRequirements(session: Session, text: string): Promise<Turn> {
    // Forced edge: the message is then read as a refinement command
    const check = validateTransition('suggest_requirements', 'refine_requirements', false);
    if (!check.allowed) {
      return { session, message: check.reason ?? EDIT_HINT };
    }
    const refining: Session = { ...session, stage: 'refine_requirements' };
    if (isGenerateRequest(text)) {
      return this.rejectGeneration(refining, text);
    }
    return this.handleRefineRequirements(refining, text);
  }

  private async handleRefineRequirements(session: Session, text: string): Promise<Turn> {
    const { command, clarification } = interpretRequirementCommand(text, session.requirements.length);
    logger.debug('Command classified', undefined, { type: command.type, targets: command.targets });

    switch (command.type) {
      case 'remove':
      case 'remove_one':
      case 'keep_only':
      case 'reorder':
      case 'append_one':
      case 'edit':
      case 'replace_one': {
        if (clarification) {
          return { session, message: clarification };
        }
        if ((command.type === 'edit' || command.type === 'replace_one') && !command.payload?.trim()) {
          return this.rewriteRequirements(session, command.targets);
        }
        const requirements = applyCommand(command, session.requirements);
        return {
          session: { ...session, requirements, requirementsLocked: false },
          message: join('Requisitos atualizados:', formatRequirements(requirements), EDIT_HINT),
        };
      }

      case 'regenerate_all': {
        const necessity = session.necessity ?? text;
        return this.generateRequirements(session, necessity);
      }

      case 'accept_all':
      case 'confirm': {
        const check = validateTransition(session.stage, 'confirm_requirements', true);
        if (!check.allowed) {
          return { session, message: check.reason ?? CONFIRM_HINT };
        }
        return {
          session: { ...session, stage: 'confirm_requirements', requirementsLocked: true },
          message: join('Requisitos confirmados:', formatRequirements(session.requirements), CONFIRM_HINT),
        };
      }

      case 'restart_necessity':
      case 'unclear':
        return { session, message: clarification ?? EDIT_HINT };
    }
  }

  private async handleConfirmRequirements(session: Session, text: string): Promise<Turn> {
    const { command, clarification } = interpretRequirementCommand(text, session.requirements.length);

    if (command.type === 'confirm' || command.type === 'accept_all') {
      const check = canGenerate(session.stage, isUserConfirmed(text));
      if (!check.allowed) {
        return { session, message: check.reason ?? CONFIRM_HINT };
      }
      const started: Session = { ...session, stage: 'generate_document', requirementsLocked: true };
      return this.enterStep(started, 'solution_strategies');
    }

    // Edits stay in this stage; the list must be confirmed again
    if (command.type !== 'unclear' && command.type !== 'restart_necessity') {
      const turn = await this.handleRefineRequirements(session, text);
      return { session: { ...turn.session, stage: session.stage }, message: turn.message.replace(EDIT_HINT, CONFIRM_HINT) };
    }

    return { session, message: clarification ? join(clarification, CONFIRM_HINT) : CONFIRM_HINT };
  }

  private async handleGenerateDocument(session: Session, text: string): Promise<Turn> {
    const step = session.answers.step ?? 'solution_strategies';
    logger.updateContext({ stage: `generate_document/${step}` });
    return this.stepHandlers[step](session, text);
  }

  private async handlePreview(session: Session, text: string): Promise<Turn> {
    const check = validateTransition('preview', 'finalize', isUserConfirmed(text));
    if (!check.allowed) {
      return { session, message: PREVIEW_HINT };
    }

    const sections = assembleFromSession(session);
    const document: StoredDocument = {
      id: generateId('doc'),
      sessionId: session.sessionId,
      sections,
      createdAt: this.now().toISOString(),
    };
    this.store.saveDocument(document);
    logger.info('Document finalized', { documentId: document.id, sections: Object.keys(sections).length });

    return {
      session: { ...session, stage: 'finalize' },
      message: `ETP finalizado. O documento ${document.id} foi registrado com ${Object.keys(sections).length} seções.`,
    };
  }

  // ── Interview steps ───────────────────────────────────────────────

  /**
   * Move to an interview step and return its opening message. Steps whose
   * content is generated (strategies, summary) generate on entry.
   */
  private async enterStep(session: Session, step: InterviewStep): Promise<Turn> {
    const moved: Session = { ...session, answers: { ...session.answers, step } };
    logger.debug('Interview step entered', undefined, { step });

    switch (step) {
      case 'solution_strategies':
        return this.generateStrategies(moved);
      case 'pca':
        return { session: moved, message: PCA_QUESTION };
      case 'legal_basis':
        return { session: moved, message: LEGAL_BASIS_QUESTION };
      case 'quantity_value':
        return { session: moved, message: QUANTITY_VALUE_QUESTION };
      case 'price_research':
        return { session: moved, message: PRICE_RESEARCH_QUESTION };
      case 'installment':
        return { session: moved, message: INSTALLMENT_QUESTION };
      case 'summary':
        return this.generateSummary(moved);
    }
  }

  private async advance(session: Session, from: InterviewStep, message: string): Promise<Turn> {
    const next = nextStepOf(from);
    if (!next) return { session, message };
    const entered = await this.enterStep(session, next);
    return { session: entered.session, message: join(message, entered.message) };
  }

  private async stepStrategies(session: Session, text: string): Promise<Turn> {
    const options = session.answers.strategies?.options ?? [];
    const recommended = options[0];

    if (recommended && isUncertainValue(text)) {
      return askDecision(
        session,
        'Sem problema. Posso registrar a estratégia recomendada.',
        recommended.title,
        'generate_document',
        'solution_strategies'
      );
    }

    const selection = selectStrategies(text, options);
    if (selection.intent === 'unclear') {
      return { session, message: join(selection.message, formatStrategies(options)) };
    }

    const updated = this.withAnswers(session, {
      strategies: { options, chosen: selection.payload.titles },
    });
    return this.advance(updated, 'solution_strategies', selection.message);
  }

  private async stepPca(session: Session, text: string): Promise<Turn> {
    if (isExplicitPendingRequest(text)) {
      return this.advance(this.withAnswers(session, { pca: { status: 'pendente' } }), 'pca', 'PCA marcado como pendente.');
    }

    const result = interpretPca(text);
    switch (result.intent) {
      case 'pca_unknown':
        return askDecision(
          session,
          'Sem a informação do PCA, posso registrar que não foi informado.',
          'PCA não informado pelo usuário.',
          'generate_document',
          'pca'
        );
      case 'pca_no':
      case 'pca_yes':
      case 'pca_details': {
        const status = result.payload.status ?? 'sim';
        const pca = result.payload.details ? { status, details: result.payload.details } : { status };
        return this.advance(this.withAnswers(session, { pca }), 'pca', result.message);
      }
      case 'proceed': {
        const pca = session.answers.pca ?? { status: 'desconhecido' as const };
        return this.advance(this.withAnswers(session, { pca }), 'pca', result.message);
      }
      case 'unclear':
        return { session, message: result.message };
    }
  }

  private async stepLegalBasis(session: Session, text: string): Promise<Turn> {
    const current = session.answers.legalBasis ?? { references: [], notes: [] };
    const proposeFallback = (): Turn =>
      askDecision(
        session,
        'Posso registrar a base legal geral das contratações públicas.',
        FALLBACK_LEGAL_BASIS,
        'generate_document',
        'legal_basis'
      );

    if (isExplicitPendingRequest(text)) {
      const legalBasis = { references: [...current.references, PENDING_MARKER], notes: current.notes };
      return this.advance(this.withAnswers(session, { legalBasis }), 'legal_basis', 'Base legal marcada como pendente.');
    }

    if (isUncertainValue(text)) {
      return proposeFallback();
    }

    const result = interpretLegalBasis(text);
    switch (result.intent) {
      case 'legal_basis_set': {
        const reference = result.payload.reference ?? text;
        const legalBasis = { references: [...current.references, reference], notes: current.notes };
        return { session: this.withAnswers(session, { legalBasis }), message: result.message };
      }
      case 'legal_basis_notes': {
        const note = result.payload.note ?? text;
        const legalBasis = { references: current.references, notes: [...current.notes, note] };
        return { session: this.withAnswers(session, { legalBasis }), message: result.message };
      }
      case 'finalize':
        if (current.references.length === 0) return proposeFallback();
        return this.advance(session, 'legal_basis', result.message);
      case 'unclear':
        return { session, message: result.message };
    }
  }

  private async stepQuantityValue(session: Session, text: string): Promise<Turn> {
    const current = session.answers.quantityValue ?? { items: [], pending: false };

    if (isExplicitPendingRequest(text)) {
      const quantityValue = { items: current.items, pending: true };
      return this.advance(this.withAnswers(session, { quantityValue }), 'quantity_value', 'Estimativa marcada como pendente.');
    }

    const description = session.necessity ? truncate(session.necessity, 60) : 'Objeto da contratação';
    const result = parseQuantityValue(text, description);

    switch (result.intent) {
      case 'estimate': {
        const items = result.payload.item ? [...current.items, result.payload.item] : current.items;
        const quantityValue = { items, pending: false };
        return {
          session: this.withAnswers(session, { quantityValue }),
          message: `${result.message} Informe outro item ou diga "seguir" para continuar.`,
        };
      }
      case 'uncertain':
        return askDecision(
          session,
          'Sem uma estimativa agora, posso registrá-la como pendente.',
          'Estimativa pendente, a ser definida após a pesquisa de preços.',
          'generate_document',
          'quantity_value'
        );
      case 'unclear':
        if (current.items.length > 0 && isUserConfirmed(text)) {
          return this.advance(session, 'quantity_value', 'Estimativa registrada.');
        }
        return { session, message: result.message };
    }
  }

  private async stepPriceResearch(session: Session, text: string): Promise<Turn> {
    const current = session.answers.priceResearch ?? { evidenceLinks: [], done: false };

    if (isExplicitPendingRequest(text)) {
      return this.advance(
        this.withAnswers(session, { priceResearch: { ...current, done: true } }),
        'price_research',
        'Pesquisa de preços marcada como pendente.'
      );
    }

    const result = interpretPriceResearch(text);
    const merged = {
      ...current,
      ...(result.payload.method !== undefined ? { method: result.payload.method } : {}),
      ...(result.payload.supplierCount !== undefined ? { supplierCount: result.payload.supplierCount } : {}),
      evidenceLinks: [...current.evidenceLinks, ...result.payload.links],
    };

    switch (result.intent) {
      case 'supplier_count':
      case 'link_evidence':
      case 'method_select':
        return {
          session: this.withAnswers(session, { priceResearch: merged }),
          message: `${result.message} Algo mais? Diga "concluído" para seguir.`,
        };
      case 'mark_done':
        return this.advance(
          this.withAnswers(session, { priceResearch: { ...merged, done: true } }),
          'price_research',
          result.message
        );
      case 'unclear':
        return { session, message: result.message };
    }
  }

  private async stepInstallment(session: Session, text: string): Promise<Turn> {
    if (isExplicitPendingRequest(text)) {
      return this.advance(
        this.withAnswers(session, { installment: { decision: 'pendente', justification: '' } }),
        'installment',
        'Decisão sobre parcelamento marcada como pendente.'
      );
    }

    if (isUncertainValue(text)) {
      return askDecision(
        session,
        'Sem informação sobre o parcelamento, posso registrar a proposta padrão.',
        'Não haverá parcelamento do objeto.',
        'generate_document',
        'installment'
      );
    }

    const result = parseInstallment(text);
    if (result.intent === 'unclear') {
      return { session, message: result.message };
    }
    return this.advance(this.withAnswers(session, { installment: result.payload }), 'installment', result.message);
  }

  private async stepSummary(session: Session, text: string): Promise<Turn> {
    if (isUserConfirmed(text)) {
      const check = validateTransition('generate_document', 'preview', true);
      if (!check.allowed) {
        return { session, message: check.reason ?? SUMMARY_HINT };
      }
      const confirmed = this.withAnswers(session, { summaryConfirmed: true });
      const preview = renderMarkdown(assembleFromSession(confirmed));
      return { session: { ...confirmed, stage: 'preview' }, message: join(preview, PREVIEW_HINT) };
    }

    // A longer reply replaces the summary text
    if (text.split(/\s+/).length >= 5) {
      return {
        session: this.withAnswers(session, { summary: text }),
        message: join('Resumo atualizado:', text, SUMMARY_HINT),
      };
    }

    return { session, message: SUMMARY_HINT };
  }

  // ── Generation ────────────────────────────────────────────────────

  private async generateRequirements(session: Session, necessity: string): Promise<Turn> {
    const snippets = await safeRetrieve(this.retriever, necessity, 3);
    const prompt = buildRequirementsPrompt(necessity, snippets);
    const outcome = await generateWithFallback(this.generator, {
      ...prompt,
      temperature: 0.3,
      timeoutMs: this.shortTimeoutMs,
    });

    const payload = guardRequirementsPayload(outcome.text, necessity);
    const requirements = fromStatements(payload.requirements);
    const updated: Session = { ...session, requirements, requirementsLocked: false };

    return this.withNotice(
      updated,
      outcome,
      join(payload.intro, formatRequirements(requirements), payload.rationale, EDIT_HINT)
    );
  }

  /**
   * New wording for the targeted requirements only; the rest of the list is untouched
   */
  private async rewriteRequirements(session: Session, targets: readonly number[]): Promise<Turn> {
    const necessity = session.necessity ?? '';
    const snippets = await safeRetrieve(this.retriever, necessity, 3);
    const prompt = buildRequirementRewritePrompt(necessity, session.requirements, targets, snippets);
    const outcome = await generateWithFallback(this.generator, {
      ...prompt,
      temperature: 0.5,
      timeoutMs: this.shortTimeoutMs,
    });

    const payload = guardRewritePayload(
      outcome.text,
      necessity,
      session.requirements.map((req) => req.text),
      targets.length
    );
    const requirements = rewriteAt(session.requirements, targets, payload.requirements);
    logger.debug('Requirements rewritten', undefined, { targets, backfilled: payload.backfilled });

    const ids = targets.map((target) => `R${target}`).join(', ');
    return this.withNotice(
      { ...session, requirements, requirementsLocked: false },
      outcome,
      join(`Nova redação para ${ids}:`, formatRequirements(requirements), EDIT_HINT)
    );
  }

  private async generateStrategies(session: Session): Promise<Turn> {
    const necessity = session.necessity ?? '';
    const snippets = await safeRetrieve(this.retriever, necessity, 3);
    const prompt = buildStrategiesPrompt(necessity, session.requirements, snippets);
    const outcome = await generateWithFallback(this.generator, {
      ...prompt,
      temperature: 0.4,
      timeoutMs: this.shortTimeoutMs,
    });

    const payload = guardStrategiesPayload(outcome.text, necessity);
    const updated = this.withAnswers(session, { strategies: { options: payload.strategies, chosen: [] } });

    return this.withNotice(updated, outcome, join(payload.intro, formatStrategies(payload.strategies), STRATEGY_QUESTION));
  }

  private async generateSummary(session: Session): Promise<Turn> {
    const parts = partsFromSession(session);
    const sections = assembleSections(parts);
    const strategies = session.answers.strategies;

    const prompt = buildSummaryPrompt({
      necessity: session.necessity ?? '',
      requirements: session.requirements,
      strategies: strategies ? strategies.options.filter((option) => strategies.chosen.includes(option.title)) : [],
      pca: parts.pcaText ?? '',
      legalBasis: session.answers.legalBasis?.references ?? [],
      estimate: sections['6_estimativa_valor'] ?? sections['4_estimativa_quantidades'] ?? '',
      priceResearch: parts.marketResearch ?? '',
      installment: sections['8_justificativa_parcelamento'] ?? '',
    });
    const outcome = await generateWithFallback(this.generator, {
      ...prompt,
      temperature: 0.3,
      timeoutMs: this.longTimeoutMs,
    });

    const payload = guardSummaryPayload(outcome.text, session.necessity ?? '');
    const updated = this.withAnswers(session, { summary: payload.text, summaryConfirmed: false });
    return this.withNotice(updated, outcome, join('Resumo executivo:', payload.text, SUMMARY_HINT));
  }

  /**
   * Append the missing-generator notice the first time content is backfilled
   */
  private withNotice(session: Session, outcome: GenerationOutcome, message: string): Turn {
    if (!outcome.fellBack || this.generator.isAvailable() || session.answers.generatorNoticeShown) {
      return { session, message };
    }
    return {
      session: this.withAnswers(session, { generatorNoticeShown: true }),
      message: join(message, GENERATOR_NOTICE),
    };
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private withAnswers(session: Session, changes: Partial<Session['answers']>): Session {
    return { ...session, answers: { ...session.answers, ...changes } };
  }

  /**
   * Record the structured answer for a resolved decision: the accepted proposal or the pending marker
   */
  private applyDecision(session: Session, decision: PendingDecision, value: string): Session {
    const pending = value === PENDING_MARKER;
    switch (decision.step) {
      case 'solution_strategies': {
        const options = session.answers.strategies?.options ?? [];
        return this.withAnswers(session, { strategies: { options, chosen: [value] } });
      }
      case 'pca':
        return this.withAnswers(session, { pca: { status: pending ? 'pendente' : 'desconhecido' } });
      case 'legal_basis': {
        const current = session.answers.legalBasis ?? { references: [], notes: [] };
        return this.withAnswers(session, {
          legalBasis: { references: [...current.references, value], notes: current.notes },
        });
      }
      case 'quantity_value': {
        const items = session.answers.quantityValue?.items ?? [];
        return this.withAnswers(session, { quantityValue: { items, pending: true } });
      }
      case 'installment':
        return this.withAnswers(session, {
          installment: { decision: pending ? 'pendente' : 'nao', justification: '' },
        });
      case 'price_research':
      case 'summary':
      case undefined:
        return session;
    }
  }
}

export function formatStrategies(strategies: readonly Strategy[]): string {
  return strategies
    .map((strategy, index) => {
      const lines = [`${index + 1}. **${strategy.title}**${index === 0 ? ' (recomendada)' : ''}`];
      if (strategy.whenIndicated) lines.push(`   Quando é indicada: ${strategy.whenIndicated}`);
      if (strategy.pros.length > 0) lines.push(`   Vantagens: ${strategy.pros.join('; ')}`);
      if (strategy.cons.length > 0) lines.push(`   Desvantagens: ${strategy.cons.join('; ')}`);
      return lines.join('\n');
    })
    .join('\n\n');
}
