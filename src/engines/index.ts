/**
 * Engines Index
 *
 * Conversation core and its collaborators.
 */

export {
  ConversationEngine,
  newSession,
  diffSession,
  formatRequirements,
  formatStrategies,
  INTERVIEW_STEPS,
  NECESSITY_QUESTION,
  GENERATOR_NOTICE,
  FINALIZED_MESSAGE,
  type SessionStore,
  type ConversationEngineOptions,
} from './conversation.js';

export {
  CONVERSATION_STAGES,
  STAGE_TRANSITIONS,
  CONFIRMATION_PHRASES,
  isUserConfirmed,
  validateTransition,
  canGenerate,
  forcedNextStage,
  nextStage,
  isTerminal,
  type TransitionCheck,
} from './stage-machine.js';

export {
  interpretRequirementCommand,
  parseCommand,
  extractTargets,
  extractOrder,
  DEFAULT_CLARIFICATION,
  type CommandInterpretation,
} from './command-interpreter.js';

export { renumber, fromStatements, applyCommand, rewriteAt, isListEdit, isSequentiallyNumbered } from './requirements-engine.js';

export {
  PENDING_MARKER,
  DECISION_OPTIONS,
  askDecision,
  consumeDecision,
  formatDecisionPrompt,
  type DecisionOutcome,
} from './decision-arbitration.js';

export {
  MIN_REQUIREMENTS,
  MIN_STRATEGIES,
  FALLBACK_LEGAL_BASIS,
  EMPTY_TEXT_FALLBACK,
  guardRequirementsPayload,
  guardRewritePayload,
  guardStrategiesPayload,
  guardSummaryPayload,
  ensureText,
} from './payload-guard.js';

export { assembleSections, assembleFromSession, partsFromSession, renderMarkdown, orderedSectionKeys } from './document-assembler.js';

export { interpretPca, interpretPriceResearch, interpretLegalBasis, type Interpretation } from './interview-interpreters.js';

export { selectStrategies, parseQuantityValue, parseInstallment, parseBrazilianNumber } from './answer-parsers.js';

export {
  AnthropicGenerator,
  FallbackGenerator,
  generateWithFallback,
  type Generator,
  type GenerationRequest,
  type GenerationOutcome,
} from './generator.js';

export { KeywordRetriever, EmptyRetriever, loadKnowledgeBase, safeRetrieve, type Retriever, type RetrievedSnippet } from './retriever.js';

export { LLMClient, GenerationError, GenerationErrorCode, DEFAULT_MODEL, type LLMClientConfig } from './llm-client.js';
