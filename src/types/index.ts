/**
 * Type definitions shared across the server.
 */

export {
  type ConversationStage,
  type InterviewStep,
  type Requirement,
  type CommandType,
  type Command,
  type Strategy,
  type PcaStatus,
  type PriceMethod,
  type InstallmentDecision,
  type QuantityValueItem,
  type Answers,
  type PendingDecision,
  type Session,
  type StructuredDelta,
  type ProcessMessageResult,
  type ProcessMessageInput,
  ConversationStageSchema,
  InterviewStepSchema,
  RequirementSchema,
  CommandTypeSchema,
  CommandSchema,
  StrategySchema,
  PcaStatusSchema,
  PriceMethodSchema,
  InstallmentDecisionSchema,
  QuantityValueItemSchema,
  AnswersSchema,
  PendingDecisionSchema,
  SessionSchema,
  ProcessMessageInputSchema,
} from './session.js';

export {
  type DocSectionKey,
  type LegalNorm,
  type EstimateItem,
  type EtpParts,
  type SectionMap,
  type StoredDocument,
  DocSectionKeySchema,
  SECTION_TITLES,
  LegalNormSchema,
  EstimateItemSchema,
  EtpPartsSchema,
  StoredDocumentSchema,
} from './document.js';
