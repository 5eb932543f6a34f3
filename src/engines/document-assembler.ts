/**
 * Document assembler
 *
 * The single place where accumulated stage data becomes document sections.
 * A section is emitted only when its source field is non-empty.
 */

import {
  DocSectionKeySchema,
  SECTION_TITLES,
  type DocSectionKey,
  type EstimateItem,
  type EtpParts,
  type QuantityValueItem,
  type SectionMap,
  type Session,
} from '../types/index.js';
import { PENDING_MARKER } from './decision-arbitration.js';

const PRICE_METHOD_LABELS: Readonly<Record<string, string>> = {
  painel_de_precos: 'Painel de Preços',
  cotacoes_fornecedores: 'Cotações com fornecedores',
  historico_contratos: 'Histórico de contratações anteriores',
  marketplace: 'Pesquisa em marketplace',
};

const PCA_LABELS: Readonly<Record<string, string>> = {
  sim: 'A contratação está prevista no Plano de Contratações Anual.',
  nao: 'A contratação não está prevista no Plano de Contratações Anual.',
  desconhecido: 'PCA não informado pelo usuário.',
  pendente: 'Previsão no PCA pendente de confirmação.',
};

const INSTALLMENT_LABELS: Readonly<Record<string, string>> = {
  sim: 'Haverá parcelamento do objeto.',
  nao: 'Não haverá parcelamento do objeto.',
  nao_informado: 'Parcelamento não informado.',
  pendente: 'Decisão sobre parcelamento pendente.',
};

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function estimateLines(items: readonly EstimateItem[], withValue: boolean): string {
  return items
    .map((item) => {
      const amount = withValue && nonEmpty(item.unitValue) ? `${item.quantity} x ${item.unitValue}` : item.quantity;
      return `- ${item.description}: ${amount}`;
    })
    .join('\n');
}

/**
 * Map populated accumulator fields onto named sections, in document order
 */
export function assembleSections(parts: EtpParts): SectionMap {
  const sections: SectionMap = {};

  if (nonEmpty(parts.executiveSummary)) {
    sections['1_introducao'] = parts.executiveSummary.trim();
  }

  if (nonEmpty(parts.necessityText)) {
    sections['2_4_descricao_necessidade'] = parts.necessityText.trim();
  }

  if (nonEmpty(parts.pcaText)) {
    sections['2_5_previsao_pca'] = parts.pcaText.trim();
  }

  const requirements = (parts.requirements ?? []).filter(nonEmpty);
  if (requirements.length > 0) {
    sections['3_1_requisitos_tecnicos'] = requirements.join('\n');
  }

  const norms = (parts.legalNorms ?? []).filter((norm) => nonEmpty(norm.ref));
  if (norms.length > 0) {
    sections['3_3_requisitos_normativos'] = norms.map((norm) => `- ${norm.ref}: ${norm.applies}`.trim()).join('\n');
  }

  const items = (parts.estimateItems ?? []).filter((item) => nonEmpty(item.description));
  if (items.length > 0) {
    sections['4_estimativa_quantidades'] = estimateLines(items, false);
  }

  if (nonEmpty(parts.marketResearch)) {
    sections['5_levantamento_mercado'] = parts.marketResearch.trim();
  }

  const valued = items.filter((item) => nonEmpty(item.unitValue));
  if (items.length > 0 || nonEmpty(parts.methodology)) {
    const table = estimateLines(valued.length > 0 ? valued : items, true);
    const methodology = nonEmpty(parts.methodology) ? `\n\nMetodologia: ${parts.methodology.trim()}` : '';
    sections['6_estimativa_valor'] = `${table}${methodology}`.trim();
  }

  if (nonEmpty(parts.recommendation)) {
    sections['7_solucao_como_um_todo'] = parts.recommendation.trim();
  }

  if (nonEmpty(parts.installmentDecision) || nonEmpty(parts.installmentText)) {
    sections['8_justificativa_parcelamento'] = `${parts.installmentDecision ?? ''}\n${parts.installmentText ?? ''}`.trim();
  }

  return sections;
}

/**
 * Section keys present in the map, in document order
 */
export function orderedSectionKeys(sections: SectionMap): DocSectionKey[] {
  return DocSectionKeySchema.options.filter((key) => nonEmpty(sections[key]));
}

export function renderMarkdown(sections: SectionMap, title = 'Estudo Técnico Preliminar'): string {
  const body = orderedSectionKeys(sections)
    .map((key) => `## ${SECTION_TITLES[key]}\n\n${sections[key] ?? ''}`)
    .join('\n\n');
  return body ? `# ${title}\n\n${body}\n` : `# ${title}\n`;
}

function formatNumber(value: number): string {
  return value.toLocaleString('pt-BR', { maximumFractionDigits: 2 });
}

function formatCurrency(value: number): string {
  return `R$ ${value.toLocaleString('pt-BR', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function toEstimateItem(item: QuantityValueItem): EstimateItem {
  const quantity = item.quantity !== undefined
    ? `${formatNumber(item.quantity)}${item.unit ? ` ${item.unit}` : ''}`
    : 'a definir';
  const unitValue = item.unitValue !== undefined
    ? formatCurrency(item.unitValue)
    : item.totalValue !== undefined
      ? `${formatCurrency(item.totalValue)} (valor total${item.period ? ` por ${item.period === 'ano' ? 'ano' : 'mês'}` : ''})`
      : undefined;
  return unitValue === undefined
    ? { description: item.description, quantity }
    : { description: item.description, quantity, unitValue };
}

/**
 * Project a session onto the assembler input. Interview answers marked as
 * pending are carried as such so the document shows what is still open.
 */
export function partsFromSession(session: Session): EtpParts {
  const { answers } = session;
  const parts: EtpParts = {};

  if (answers.summary) parts.executiveSummary = answers.summary;
  if (session.necessity) parts.necessityText = session.necessity;

  if (answers.pca) {
    const label = PCA_LABELS[answers.pca.status] ?? '';
    parts.pcaText = answers.pca.details ? `${label}\n${answers.pca.details}`.trim() : label;
  }

  if (session.requirements.length > 0) {
    parts.requirements = session.requirements.map((req) => `${req.id}. ${req.text}`);
  }

  if (answers.legalBasis && answers.legalBasis.references.length > 0) {
    const notes = answers.legalBasis.notes.join(' ');
    parts.legalNorms = answers.legalBasis.references.map((ref) => ({ ref, applies: notes || 'aplica' }));
  }

  if (answers.quantityValue && answers.quantityValue.items.length > 0) {
    parts.estimateItems = answers.quantityValue.items.map(toEstimateItem);
  }

  const research = answers.priceResearch;
  if (research) {
    const lines: string[] = [];
    if (research.method) lines.push(`Método: ${PRICE_METHOD_LABELS[research.method] ?? research.method}`);
    if (research.supplierCount !== undefined) lines.push(`Fornecedores consultados: ${research.supplierCount}`);
    if (research.evidenceLinks.length > 0) lines.push(`Evidências: ${research.evidenceLinks.join(', ')}`);
    if (lines.length > 0) parts.marketResearch = lines.join('\n');
    if (research.method) {
      parts.methodology = `${PRICE_METHOD_LABELS[research.method] ?? research.method}${
        research.supplierCount !== undefined ? `, com ${research.supplierCount} fornecedores consultados` : ''
      }`;
    }
  }

  const strategies = answers.strategies;
  if (strategies) {
    const chosen = strategies.options.filter((option) => strategies.chosen.includes(option.title));
    if (chosen.length > 0) {
      parts.recommendation = chosen
        .map((option) => `${option.title}. ${option.whenIndicated}`.trim())
        .join('\n');
    } else if (strategies.chosen.includes(PENDING_MARKER)) {
      parts.recommendation = 'Estratégia de contratação pendente de definição.';
    }
  }

  if (answers.installment) {
    parts.installmentDecision = INSTALLMENT_LABELS[answers.installment.decision] ?? '';
    if (answers.installment.justification) parts.installmentText = answers.installment.justification;
  }

  return parts;
}

/**
 * Sections of the document for the current state of a session
 */
export function assembleFromSession(session: Session): SectionMap {
  return assembleSections(partsFromSession(session));
}
