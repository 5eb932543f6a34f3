/**
 * Prompt builders for the generation collaborator.
 *
 * Each builder returns a `{ systemPrompt, userPrompt }` pair asking for a
 * strict JSON shape. Whatever comes back still goes through the payload guard.
 */

import type { Requirement, Strategy } from '../types/index.js';
import type { RetrievedSnippet } from '../engines/retriever.js';

export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}

export const SYSTEM_PROMPT = `Você é um consultor especializado em contratações públicas brasileiras (Lei nº 14.133/2021) que ajuda servidores a elaborar o Estudo Técnico Preliminar (ETP).
Responda sempre em português do Brasil, com linguagem técnica e objetiva.
Nunca inclua títulos de seção como "Justificativa", "Nota técnica" ou "Descrição da necessidade".
Nunca use frases de abertura como "Vamos começar" ou "Posso seguir".
Responda apenas com o objeto JSON solicitado, sem texto fora dele.`;

function groundingBlock(snippets: readonly RetrievedSnippet[]): string {
  if (snippets.length === 0) return '';
  const lines = snippets.map((snippet) => `- [${snippet.source}] ${snippet.text}`).join('\n');
  return `\n## REFERÊNCIAS\n${lines}\n`;
}

function requirementLines(requirements: readonly Requirement[]): string {
  return requirements.map((req) => `${req.id}. ${req.text}`).join('\n');
}

/**
 * Requirements suggested right after the necessity is captured
 */
export function buildRequirementsPrompt(necessity: string, snippets: readonly RetrievedSnippet[]): PromptPair {
  return {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: `## NECESSIDADE DA CONTRATAÇÃO
${necessity}
${groundingBlock(snippets)}
## SUA TAREFA
Sugira de 8 a 12 requisitos técnicos para a contratação.

- Cada requisito é uma afirmação objetiva e verificável, nunca uma pergunta
- Não inclua justificativa junto ao requisito
- Não numere os requisitos

## FORMATO DE SAÍDA
\`\`\`json
{
  "intro": "uma frase contextualizando os requisitos",
  "requirements": ["requisito 1", "requisito 2"],
  "rationale": "uma frase sobre o critério usado"
}
\`\`\``,
  };
}

/**
 * New wording for selected requirements, keeping the rest of the list
 */
export function buildRequirementRewritePrompt(
  necessity: string,
  requirements: readonly Requirement[],
  targets: readonly number[],
  snippets: readonly RetrievedSnippet[]
): PromptPair {
  const ids = targets.map((target) => `R${target}`).join(', ');
  return {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: `## NECESSIDADE DA CONTRATAÇÃO
${necessity}

## LISTA ATUAL
${requirementLines(requirements)}
${groundingBlock(snippets)}
## SUA TAREFA
Reescreva ${ids} com uma redação nova, diferente da atual e dos demais itens da lista.
Devolva exatamente ${targets.length} item(ns), na ordem ${ids}.

- Cada item é uma afirmação objetiva e verificável, nunca uma pergunta
- Não inclua justificativa junto ao item
- Não numere os itens

## FORMATO DE SAÍDA
\`\`\`json
{
  "requirements": ["nova redação"]
}
\`\`\``,
  };
}

/**
 * Solution strategies offered at the start of the interview
 */
export function buildStrategiesPrompt(
  necessity: string,
  requirements: readonly Requirement[],
  snippets: readonly RetrievedSnippet[]
): PromptPair {
  return {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: `## NECESSIDADE DA CONTRATAÇÃO
${necessity}

## REQUISITOS CONFIRMADOS
${requirementLines(requirements)}
${groundingBlock(snippets)}
## SUA TAREFA
Apresente de 2 a 4 estratégias de contratação possíveis (por exemplo, aquisição, locação, serviço por desempenho, registro de preços).
Para cada estratégia informe quando é indicada, vantagens, desvantagens e os números dos requisitos mais afetados.
A primeira estratégia deve ser a recomendada.

## FORMATO DE SAÍDA
\`\`\`json
{
  "intro": "uma frase de contexto",
  "strategies": [
    {
      "title": "nome da estratégia",
      "whenIndicated": "quando é indicada",
      "pros": ["vantagem"],
      "cons": ["desvantagem"],
      "affectedRequirements": [1, 2]
    }
  ]
}
\`\`\``,
  };
}

export interface SummaryContext {
  necessity: string;
  requirements: readonly Requirement[];
  strategies: readonly Strategy[];
  pca: string;
  legalBasis: readonly string[];
  estimate: string;
  priceResearch: string;
  installment: string;
}

/**
 * Executive summary over everything collected so far
 */
export function buildSummaryPrompt(context: SummaryContext): PromptPair {
  const strategies = context.strategies.map((strategy) => `- ${strategy.title}`).join('\n') || '- (pendente)';
  const legal = context.legalBasis.map((ref) => `- ${ref}`).join('\n') || '- (pendente)';

  return {
    systemPrompt: SYSTEM_PROMPT,
    userPrompt: `## NECESSIDADE
${context.necessity}

## REQUISITOS
${requirementLines(context.requirements)}

## ESTRATÉGIA ESCOLHIDA
${strategies}

## PLANO DE CONTRATAÇÕES ANUAL
${context.pca || '(pendente)'}

## BASE LEGAL
${legal}

## ESTIMATIVA DE QUANTIDADE E VALOR
${context.estimate || '(pendente)'}

## PESQUISA DE PREÇOS
${context.priceResearch || '(pendente)'}

## PARCELAMENTO
${context.installment || '(pendente)'}

## SUA TAREFA
Redija um resumo executivo do estudo em 2 ou 3 parágrafos curtos. Itens marcados como pendentes devem ser mencionados como pendentes.

## FORMATO DE SAÍDA
\`\`\`json
{
  "summary": "texto do resumo"
}
\`\`\``,
  };
}
