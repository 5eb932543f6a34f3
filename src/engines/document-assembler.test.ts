import { describe, it, expect } from 'vitest';
import type { EtpParts, Session } from '../types/index.js';
import { newSession } from './conversation.js';
import { assembleFromSession, assembleSections, orderedSectionKeys, renderMarkdown } from './document-assembler.js';
import { renumber } from './requirements-engine.js';

const FULL_PARTS: EtpParts = {
  executiveSummary: 'Resumo.',
  necessityText: 'Locação de veículos',
  pcaText: 'Prevista.',
  requirements: ['R1. A', 'R2. B'],
  legalNorms: [{ ref: 'Lei 14.133/2021', applies: 'aplica' }],
  estimateItems: [{ description: 'Veículos', quantity: '20 veículos', unitValue: 'R$ 12.500,00' }],
  marketResearch: 'Método: Painel de Preços',
  methodology: 'Painel de Preços',
  recommendation: 'Locação.',
  installmentDecision: 'Não haverá parcelamento do objeto.',
  installmentText: 'Objeto indivisível.',
};

describe('document-assembler', () => {
  it('assembles every section from a populated accumulator', () => {
    const sections = assembleSections(FULL_PARTS);

    expect(orderedSectionKeys(sections)).toEqual([
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
    expect(sections['3_1_requisitos_tecnicos']).toBe('R1. A\nR2. B');
    expect(sections['3_3_requisitos_normativos']).toBe('- Lei 14.133/2021: aplica');
    expect(sections['4_estimativa_quantidades']).toBe('- Veículos: 20 veículos');
    expect(sections['6_estimativa_valor']).toBe('- Veículos: 20 veículos x R$ 12.500,00\n\nMetodologia: Painel de Preços');
    expect(sections['8_justificativa_parcelamento']).toBe('Não haverá parcelamento do objeto.\nObjeto indivisível.');
  });

  it('assembles nothing from an empty accumulator', () => {
    const sections = assembleSections({});
    expect(sections).toEqual({});
    expect(renderMarkdown(sections)).toBe('# Estudo Técnico Preliminar\n');
  });

  it('skips whitespace-only fields', () => {
    expect(assembleSections({ necessityText: '   ', requirements: ['  '], executiveSummary: '' })).toEqual({});
  });

  it('emits the value section from the methodology alone', () => {
    expect(assembleSections({ methodology: 'Painel de Preços' })).toEqual({
      '6_estimativa_valor': 'Metodologia: Painel de Preços',
    });
  });

  it('lists unvalued items in the value section', () => {
    const sections = assembleSections({ estimateItems: [{ description: 'Postos', quantity: '4 postos', unitValue: '' }] });
    expect(sections['4_estimativa_quantidades']).toBe('- Postos: 4 postos');
    expect(sections['6_estimativa_valor']).toBe('- Postos: 4 postos');
  });

  it('renders only the populated sections', () => {
    expect(renderMarkdown(assembleSections({ necessityText: 'Locação de veículos' }))).toBe(
      '# Estudo Técnico Preliminar\n\n## 2.4 Descrição da necessidade\n\nLocação de veículos\n'
    );
  });

  it('projects a completed session onto the sections', () => {
    const session: Session = {
      ...newSession('etp-doc', new Date('2026-03-01T10:00:00Z')),
      stage: 'preview',
      necessity: 'Locação de 20 veículos',
      requirements: renumber([{ text: 'Ar-condicionado' }, { text: 'GPS' }]),
      requirementsLocked: true,
      answers: {
        strategies: {
          options: [{ title: 'Locação', whenIndicated: 'Uso contínuo', pros: ['a'], cons: ['b'], affectedRequirements: [] }],
          chosen: ['Locação'],
        },
        pca: { status: 'sim', details: 'Item 42 do PCA 2026' },
        legalBasis: { references: ['Lei nº 14.133/2021'], notes: [] },
        quantityValue: {
          items: [{ description: 'Locação de veículos', quantity: 20, unit: 'veículos', unitValue: 12500, period: 'mes' }],
          pending: false,
        },
        priceResearch: {
          method: 'painel_de_precos',
          supplierCount: 3,
          evidenceLinks: ['https://example.gov.br/cotacao'],
          done: true,
        },
        installment: { decision: 'nao', justification: 'Objeto indivisível' },
        summary: 'Resumo executivo.',
      },
    };

    expect(assembleFromSession(session)).toEqual({
      '1_introducao': 'Resumo executivo.',
      '2_4_descricao_necessidade': 'Locação de 20 veículos',
      '2_5_previsao_pca': 'A contratação está prevista no Plano de Contratações Anual.\nItem 42 do PCA 2026',
      '3_1_requisitos_tecnicos': 'R1. Ar-condicionado\nR2. GPS',
      '3_3_requisitos_normativos': '- Lei nº 14.133/2021: aplica',
      '4_estimativa_quantidades': '- Locação de veículos: 20 veículos',
      '5_levantamento_mercado':
        'Método: Painel de Preços\nFornecedores consultados: 3\nEvidências: https://example.gov.br/cotacao',
      '6_estimativa_valor':
        '- Locação de veículos: 20 veículos x R$ 12.500,00\n\nMetodologia: Painel de Preços, com 3 fornecedores consultados',
      '7_solucao_como_um_todo': 'Locação. Uso contínuo',
      '8_justificativa_parcelamento': 'Não haverá parcelamento do objeto.\nObjeto indivisível',
    });
  });

  it('shows pending answers and total values', () => {
    const session: Session = {
      ...newSession('etp-pending', new Date('2026-03-01T10:00:00Z')),
      answers: {
        strategies: { options: [], chosen: ['PENDENTE'] },
        quantityValue: { items: [{ description: 'Serviço', totalValue: 120000, period: 'ano' }], pending: false },
      },
    };

    const sections = assembleFromSession(session);
    expect(sections['7_solucao_como_um_todo']).toBe('Estratégia de contratação pendente de definição.');
    expect(sections['4_estimativa_quantidades']).toBe('- Serviço: a definir');
    expect(sections['6_estimativa_valor']).toBe('- Serviço: a definir x R$ 120.000,00 (valor total por ano)');
  });
});
