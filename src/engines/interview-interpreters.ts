/**
 * Interview interpreters for the budget plan (PCA), price research and legal basis steps.
 *
 * Each one is a pure cascade over the folded message returning
 * `{ intent, message, payload }`, and falls back to `unclear` when nothing matches.
 * Keyword lists are kept literal: uncertainty is tested before negation so
 * "não sei" never reads as "não".
 */

import type { PcaStatus, PriceMethod } from '../types/index.js';
import { alignText, compilePhrases, matchesAny } from '../utils/sanitize.js';

export interface Interpretation<TIntent extends string, TPayload> {
  intent: TIntent;
  message: string;
  payload: TPayload;
}

// ── PCA ─────────────────────────────────────────────────────────────

export type PcaIntent = 'pca_unknown' | 'pca_no' | 'pca_yes' | 'pca_details' | 'proceed' | 'unclear';

export interface PcaPayload {
  status?: PcaStatus | undefined;
  details?: string | undefined;
}

const PCA_UNKNOWN = compilePhrases(['não sei', 'desconheço', 'incerto', 'não tenho']);

const PCA_NO: readonly RegExp[] = [
  /\bnao\s+esta\s+(?:previsto\s+)?no\s+pca\b/,
  /\bnao\s+consta\s+no\s+pca\b/,
  /\bnao\s+previst[oa]\b/,
  /\bsem\s+pca\b/,
];

const PCA_YES = compilePhrases(['sim', 'está no pca', 'previsto no pca', 'prevista no pca', 'conforme pca', 'consta no pca']);

const PCA_DETAIL_MARKERS = compilePhrases(['nº', 'n°', 'no.', 'número', 'ano', 'item', 'itens', 'capítulo', 'seção']);

const PROCEED = compilePhrases(['seguir', 'prosseguir', 'pode continuar', 'avançar']);

export const PCA_QUESTION =
  'A contratação está prevista no Plano de Contratações Anual (PCA)? Responda sim, não ou não sei e, se possível, informe o número do item.';

export function interpretPca(userText: string): Interpretation<PcaIntent, PcaPayload> {
  const { display, folded } = alignText(userText);

  if (matchesAny(folded, PCA_UNKNOWN)) {
    return { intent: 'pca_unknown', message: 'PCA não informado pelo usuário.', payload: { status: 'desconhecido' } };
  }

  const negated = PCA_NO.some((pattern) => pattern.test(folded))
    || (/\bnao\b/.test(folded) && /\bpca\b/.test(folded));
  if (negated) {
    return {
      intent: 'pca_no',
      message: 'Registrado: a contratação não está prevista no PCA.',
      payload: { status: 'nao' },
    };
  }

  const hasDetails = matchesAny(folded, PCA_DETAIL_MARKERS);

  if (!hasDetails && matchesAny(folded, PCA_YES)) {
    return {
      intent: 'pca_yes',
      message: 'Registrado: a contratação está prevista no PCA.',
      payload: { status: 'sim' },
    };
  }

  if (hasDetails) {
    return {
      intent: 'pca_details',
      message: 'Registrado: previsão no PCA com os detalhes informados.',
      payload: { status: 'sim', details: display },
    };
  }

  if (matchesAny(folded, PROCEED)) {
    return { intent: 'proceed', message: 'Certo, seguindo.', payload: {} };
  }

  return { intent: 'unclear', message: PCA_QUESTION, payload: {} };
}

// ── Price research ──────────────────────────────────────────────────

export type PriceResearchIntent = 'supplier_count' | 'link_evidence' | 'method_select' | 'mark_done' | 'unclear';

export interface PriceResearchPayload {
  supplierCount?: number | undefined;
  links: string[];
  method?: PriceMethod | undefined;
}

const SUPPLIER_WORDS = /\b(?:fornecedor|fornecedores|empresa|empresas|cotacao|cotacoes)\b/;

const METHOD_RULES: ReadonlyArray<{ patterns: RegExp[]; method: PriceMethod }> = [
  { patterns: compilePhrases(['painel de preços', 'painel']), method: 'painel_de_precos' },
  { patterns: compilePhrases(['cotação', 'cotações', 'fornecedor', 'fornecedores']), method: 'cotacoes_fornecedores' },
  { patterns: compilePhrases(['histórico', 'pregão anterior', 'contratações anteriores']), method: 'historico_contratos' },
  { patterns: compilePhrases(['marketplace']), method: 'marketplace' },
];

const METHOD_LABELS: Readonly<Record<PriceMethod, string>> = {
  painel_de_precos: 'Painel de Preços',
  cotacoes_fornecedores: 'cotações com fornecedores',
  historico_contratos: 'histórico de contratações',
  marketplace: 'marketplace',
};

const RESEARCH_DONE = compilePhrases(['concluído', 'concluída', 'finalizei', 'terminei', 'pronto', 'seguir', 'prosseguir']);

export const PRICE_RESEARCH_QUESTION =
  'Como foi ou será feita a pesquisa de preços? Informe o método (painel de preços, cotações com fornecedores, histórico de contratações ou marketplace), quantos fornecedores foram consultados e links de evidência, se houver. Quando terminar, diga "concluído".';

export function interpretPriceResearch(userText: string): Interpretation<PriceResearchIntent, PriceResearchPayload> {
  const { display, folded } = alignText(userText);

  const links = display.match(/https?:\/\/\S+/g) ?? [];
  const countMatch = SUPPLIER_WORDS.test(folded) ? /\b(\d{1,3})\b/.exec(folded.replace(/https?:\/\/\S+/g, ' ')) : null;
  const supplierCount = countMatch ? Number(countMatch[1]) : undefined;
  const method = METHOD_RULES.find((rule) => matchesAny(folded, rule.patterns))?.method;

  const payload: PriceResearchPayload = { links, supplierCount, method };

  if (supplierCount !== undefined) {
    return { intent: 'supplier_count', message: `Registrado: ${supplierCount} fornecedores consultados.`, payload };
  }

  if (links.length > 0) {
    return {
      intent: 'link_evidence',
      message: `Registrado: ${links.length} ${links.length === 1 ? 'link' : 'links'} de evidência.`,
      payload,
    };
  }

  if (method) {
    return { intent: 'method_select', message: `Método de pesquisa registrado: ${METHOD_LABELS[method]}.`, payload };
  }

  if (matchesAny(folded, RESEARCH_DONE)) {
    return { intent: 'mark_done', message: 'Pesquisa de preços concluída.', payload };
  }

  return { intent: 'unclear', message: PRICE_RESEARCH_QUESTION, payload };
}

// ── Legal basis ─────────────────────────────────────────────────────

export type LegalBasisIntent = 'legal_basis_set' | 'legal_basis_notes' | 'finalize' | 'unclear';

export interface LegalBasisPayload {
  reference?: string | undefined;
  note?: string | undefined;
}

const LEGAL_REFERENCE = compilePhrases(['lei', 'art.', 'artigo', 'inciso', 'decreto', 'portaria', 'estatuto', 'instrução normativa']);
const LEGAL_NOTE = compilePhrases(['observação', 'nota', 'comentário']);
const LEGAL_FINALIZE = compilePhrases(['finalizar', 'encerrar', 'concluído', 'concluída', 'seguir']);

export const LEGAL_BASIS_QUESTION =
  'Quais normas fundamentam a contratação? Informe leis, decretos ou artigos (ex.: Lei 14.133/2021, art. 18) ou diga "não sei" para receber uma proposta.';

function afterLabel(display: string): string {
  const colon = display.indexOf(':');
  const value = colon >= 0 ? display.slice(colon + 1).trim() : display;
  return value.length > 0 ? value : display;
}

export function interpretLegalBasis(userText: string): Interpretation<LegalBasisIntent, LegalBasisPayload> {
  const { display, folded } = alignText(userText);

  if (matchesAny(folded, LEGAL_REFERENCE)) {
    return {
      intent: 'legal_basis_set',
      message: `Base legal registrada: ${display}. Informe outra norma, uma observação, ou diga "seguir" para continuar.`,
      payload: { reference: display },
    };
  }

  if (matchesAny(folded, LEGAL_NOTE)) {
    return {
      intent: 'legal_basis_notes',
      message: 'Observação registrada. Diga "seguir" quando a base legal estiver completa.',
      payload: { note: afterLabel(display) },
    };
  }

  if (matchesAny(folded, LEGAL_FINALIZE)) {
    return { intent: 'finalize', message: 'Base legal concluída.', payload: {} };
  }

  return { intent: 'unclear', message: LEGAL_BASIS_QUESTION, payload: {} };
}
