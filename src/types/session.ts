import { z } from 'zod';

/**
 * Conversation stages, in flow order
 */
export const ConversationStageSchema = z.enum([
  'collect_need',
  'suggest_requirements',
  'refine_requirements',
  'confirm_requirements',
  'generate_document',
  'preview',
  'finalize',
]);

export type ConversationStage = z.infer<typeof ConversationStageSchema>;

/**
 * Interview steps walked while the session sits in `generate_document`
 */
export const InterviewStepSchema = z.enum([
  'solution_strategies',
  'pca',
  'legal_basis',
  'quantity_value',
  'price_research',
  'installment',
  'summary',
]);

export type InterviewStep = z.infer<typeof InterviewStepSchema>;

/**
 * A numbered requirement. Identity is positional: ids are always R1..Rk.
 * The schema is strict so no extra field (such as a justification) survives a round trip.
 */
export const RequirementSchema = z
  .object({
    id: z.string().regex(/^R[1-9]\d*$/),
    text: z.string(),
  })
  .strict();

export type Requirement = z.infer<typeof RequirementSchema>;

export const CommandTypeSchema = z.enum([
  'accept_all',
  'replace_one',
  'remove_one',
  'remove',
  'append_one',
  'regenerate_all',
  'keep_only',
  'reorder',
  'restart_necessity',
  'confirm',
  'edit',
  'unclear',
]);

export type CommandType = z.infer<typeof CommandTypeSchema>;

/**
 * Structured edit produced from a user message.
 * `targets` are 1-based positions in the list as it was when the message was read;
 * for `reorder` they are the new order as written by the user.
 */
export const CommandSchema = z.object({
  type: CommandTypeSchema,
  targets: z.array(z.number().int().positive()),
  payload: z.string().nullable(),
});

export type Command = z.infer<typeof CommandSchema>;

export const StrategySchema = z.object({
  title: z.string().min(1),
  whenIndicated: z.string(),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
  affectedRequirements: z.array(z.number().int()),
});

export type Strategy = z.infer<typeof StrategySchema>;

export const PcaStatusSchema = z.enum(['sim', 'nao', 'desconhecido', 'pendente']);
export type PcaStatus = z.infer<typeof PcaStatusSchema>;

export const PriceMethodSchema = z.enum([
  'painel_de_precos',
  'cotacoes_fornecedores',
  'historico_contratos',
  'marketplace',
]);
export type PriceMethod = z.infer<typeof PriceMethodSchema>;

export const InstallmentDecisionSchema = z.enum(['sim', 'nao', 'nao_informado', 'pendente']);
export type InstallmentDecision = z.infer<typeof InstallmentDecisionSchema>;

export const QuantityValueItemSchema = z.object({
  description: z.string(),
  quantity: z.number().nonnegative().optional(),
  unit: z.string().optional(),
  unitValue: z.number().nonnegative().optional(),
  totalValue: z.number().nonnegative().optional(),
  period: z.enum(['ano', 'mes']).optional(),
});

export type QuantityValueItem = z.infer<typeof QuantityValueItemSchema>;

/**
 * Per-stage answer bag
 */
export const AnswersSchema = z.object({
  step: InterviewStepSchema.optional(),
  strategies: z
    .object({
      options: z.array(StrategySchema),
      chosen: z.array(z.string()),
    })
    .optional(),
  pca: z
    .object({
      status: PcaStatusSchema,
      details: z.string().optional(),
    })
    .optional(),
  legalBasis: z
    .object({
      references: z.array(z.string()),
      notes: z.array(z.string()),
    })
    .optional(),
  quantityValue: z
    .object({
      items: z.array(QuantityValueItemSchema),
      pending: z.boolean(),
    })
    .optional(),
  priceResearch: z
    .object({
      method: PriceMethodSchema.optional(),
      supplierCount: z.number().int().nonnegative().optional(),
      evidenceLinks: z.array(z.string()),
      done: z.boolean(),
    })
    .optional(),
  installment: z
    .object({
      decision: InstallmentDecisionSchema,
      justification: z.string(),
    })
    .optional(),
  summary: z.string().optional(),
  summaryConfirmed: z.boolean().optional(),
  generatorNoticeShown: z.boolean().optional(),
});

export type Answers = z.infer<typeof AnswersSchema>;

/**
 * Single-slot arbitration state. Present only while a numbered choice is awaited.
 */
export const PendingDecisionSchema = z.object({
  prompt: z.string(),
  proposal: z.string(),
  stage: ConversationStageSchema,
  step: InterviewStepSchema.optional(),
});

export type PendingDecision = z.infer<typeof PendingDecisionSchema>;

export const SessionSchema = z.object({
  sessionId: z.string().min(1),
  stage: ConversationStageSchema,
  necessity: z.string().nullable(),
  requirements: z.array(RequirementSchema),
  requirementsLocked: z.boolean(),
  answers: AnswersSchema,
  pendingDecision: PendingDecisionSchema.nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type Session = z.infer<typeof SessionSchema>;

/**
 * Fields reported back to the caller when a turn changes them
 */
export type StructuredDelta = Partial<
  Pick<Session, 'stage' | 'necessity' | 'requirements' | 'requirementsLocked' | 'answers' | 'pendingDecision'>
>;

export interface ProcessMessageResult {
  success: boolean;
  sessionId: string;
  aiResponseText: string;
  stage: ConversationStage;
  structuredDelta: StructuredDelta;
}

/**
 * Input accepted by the message operation
 */
export const ProcessMessageInputSchema = z.object({
  sessionId: z.string().min(1).max(200).optional(),
  text: z.string().max(10000).refine((value) => value.trim().length > 0, {
    message: 'text must be a non-empty message',
  }),
});

export type ProcessMessageInput = z.infer<typeof ProcessMessageInputSchema>;
