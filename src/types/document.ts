import { z } from 'zod';

/**
 * Section keys of the final document, in output order
 */
export const DocSectionKeySchema = z.enum([
  '1_introducao',
  '2_4_descricao_necessidade',
  '2_5_previsao_pca',
  '3_1_requisitos_tecnicos',
  '3_3_requisitos_normativos',
  '4_estimativa_quantidades',
  '5_levantamento_mercado',
  '6_estimativa_valor',
  '7_solucao_como_um_todo',
  '8_justificativa_parcelamento',
]);

export type DocSectionKey = z.infer<typeof DocSectionKeySchema>;

export const SECTION_TITLES: Readonly<Record<DocSectionKey, string>> = {
  '1_introducao': '1. Introdução',
  '2_4_descricao_necessidade': '2.4 Descrição da necessidade',
  '2_5_previsao_pca': '2.5 Previsão no Plano de Contratações Anual',
  '3_1_requisitos_tecnicos': '3.1 Requisitos técnicos',
  '3_3_requisitos_normativos': '3.3 Requisitos normativos',
  '4_estimativa_quantidades': '4. Estimativa das quantidades',
  '5_levantamento_mercado': '5. Levantamento de mercado',
  '6_estimativa_valor': '6. Estimativa do valor da contratação',
  '7_solucao_como_um_todo': '7. Descrição da solução como um todo',
  '8_justificativa_parcelamento': '8. Justificativa para o parcelamento ou não',
};

export const LegalNormSchema = z.object({
  ref: z.string(),
  applies: z.string(),
});

export type LegalNorm = z.infer<typeof LegalNormSchema>;

export const EstimateItemSchema = z.object({
  description: z.string(),
  quantity: z.string(),
  unitValue: z.string().optional(),
});

export type EstimateItem = z.infer<typeof EstimateItemSchema>;

/**
 * Accumulated stage data, the only input of the document assembler
 */
export const EtpPartsSchema = z.object({
  executiveSummary: z.string().optional(),
  necessityText: z.string().optional(),
  pcaText: z.string().optional(),
  requirements: z.array(z.string()).optional(),
  legalNorms: z.array(LegalNormSchema).optional(),
  estimateItems: z.array(EstimateItemSchema).optional(),
  marketResearch: z.string().optional(),
  methodology: z.string().optional(),
  recommendation: z.string().optional(),
  installmentDecision: z.string().optional(),
  installmentText: z.string().optional(),
});

export type EtpParts = z.infer<typeof EtpPartsSchema>;

export type SectionMap = Partial<Record<DocSectionKey, string>>;

export const StoredDocumentSchema = z.object({
  id: z.string(),
  sessionId: z.string(),
  sections: z.record(DocSectionKeySchema, z.string()),
  createdAt: z.string().datetime(),
});

export type StoredDocument = z.infer<typeof StoredDocumentSchema>;
