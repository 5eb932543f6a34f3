/**
 * End-to-end conversation without a configured generator: every generated
 * payload comes from the templates and the flow still reaches a finalized ETP.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConversationEngine,
  DEFAULT_CLARIFICATION,
  EmptyRetriever,
  FallbackGenerator,
  FINALIZED_MESSAGE,
  GENERATOR_NOTICE,
  NECESSITY_QUESTION,
} from '../../src/engines/index.js';
import { MemoryStore, Storage } from '../../src/storage/index.js';
import { PCA_QUESTION } from '../../src/engines/interview-interpreters.js';
import { ValidationError } from '../../src/utils/errors.js';
import type { ProcessMessageResult } from '../../src/types/index.js';

const NEED = 'Locação de veículos para a fiscalização ambiental';
const SESSION = 'etp-e2e-fallback';

describe('full flow on fallback templates', () => {
  let store: MemoryStore;
  let engine: ConversationEngine;

  async function say(text: string): Promise<ProcessMessageResult> {
    const result = await engine.processMessage(SESSION, text);
    expect(result.success).toBe(true);
    return result;
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    store = new MemoryStore();
    engine = new ConversationEngine({
      store,
      generator: new FallbackGenerator(),
      retriever: new EmptyRetriever(),
      shortTimeoutMs: 1000,
      longTimeoutMs: 1000,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('goes from the necessity to a finalized document', async () => {
    const first = await say(NEED);
    expect(first.stage).toBe('suggest_requirements');
    expect(first.aiResponseText).toContain(GENERATOR_NOTICE);
    expect(first.structuredDelta.necessity).toBe(NEED);
    expect(first.structuredDelta.requirements).toHaveLength(12);
    const suggested = first.structuredDelta.requirements ?? [];

    const removed = await say('remover 2 e 4');
    expect(removed.stage).toBe('refine_requirements');
    expect(Object.keys(removed.structuredDelta)).toEqual(['stage', 'requirements']);
    expect(removed.structuredDelta.requirements).toHaveLength(10);
    expect(removed.structuredDelta.requirements?.[1]).toEqual({ id: 'R2', text: suggested[2]?.text });
    expect(removed.aiResponseText.startsWith('Requisitos atualizados:')).toBe(true);

    const confirmed = await say('ok');
    expect(confirmed.stage).toBe('confirm_requirements');
    expect(confirmed.structuredDelta.requirementsLocked).toBe(true);

    const started = await say('confirmo');
    expect(started.stage).toBe('generate_document');
    expect(started.aiResponseText).toContain('1. **Contrato por Desempenho (Performance-Based)** (recomendada)');
    expect(started.aiResponseText).not.toContain(GENERATOR_NOTICE);

    const strategy = await say('1');
    expect(strategy.aiResponseText).toContain(PCA_QUESTION);
    expect(strategy.structuredDelta.answers?.strategies?.chosen).toEqual([
      'Contrato por Desempenho (Performance-Based)',
    ]);

    expect((await say('Sim, item 42 do PCA 2026')).structuredDelta.answers?.step).toBe('legal_basis');
    expect((await say('Lei 14.133/2021, art. 18')).structuredDelta.answers?.legalBasis?.references).toEqual([
      'Lei 14.133/2021, art. 18',
    ]);
    expect((await say('seguir')).structuredDelta.answers?.step).toBe('quantity_value');

    const estimate = await say('20 veículos, R$ 35.000 por mês cada');
    expect(estimate.structuredDelta.answers?.quantityValue?.items).toEqual([
      { description: NEED, quantity: 20, unit: 'veículos', unitValue: 35000, period: 'mes' },
    ]);
    expect((await say('seguir')).structuredDelta.answers?.step).toBe('price_research');

    expect((await say('consultamos 3 fornecedores')).structuredDelta.answers?.priceResearch).toEqual({
      method: 'cotacoes_fornecedores',
      supplierCount: 3,
      evidenceLinks: [],
      done: false,
    });
    expect((await say('concluído')).structuredDelta.answers?.step).toBe('installment');

    const summary = await say('Não, o objeto é indivisível');
    expect(summary.structuredDelta.answers?.step).toBe('summary');
    expect(summary.aiResponseText).toContain('Resumo executivo:');

    const preview = await say('ok');
    expect(preview.stage).toBe('preview');
    expect(preview.aiResponseText.startsWith('# Estudo Técnico Preliminar')).toBe(true);

    const finalized = await say('confirmo');
    expect(finalized.stage).toBe('finalize');
    expect(finalized.aiResponseText).toMatch(/^ETP finalizado\. O documento doc-\S+ foi registrado com 10 seções\.$/);

    const [document] = store.listDocuments();
    expect(document?.sessionId).toBe(SESSION);
    expect(document?.sections).toMatchObject({
      '1_introducao': `Necessidade: ${NEED}\n\nRequisitos e estratégias consolidados estão em elaboração.`,
      '2_4_descricao_necessidade': NEED,
      '2_5_previsao_pca': 'A contratação está prevista no Plano de Contratações Anual.\nSim, item 42 do PCA 2026',
      '3_3_requisitos_normativos': '- Lei 14.133/2021, art. 18: aplica',
      '4_estimativa_quantidades': `- ${NEED}: 20 veículos`,
      '5_levantamento_mercado': 'Método: Cotações com fornecedores\nFornecedores consultados: 3',
      '6_estimativa_valor':
        `- ${NEED}: 20 veículos x R$ 35.000,00\n\nMetodologia: Cotações com fornecedores, com 3 fornecedores consultados`,
      '8_justificativa_parcelamento': 'Não haverá parcelamento do objeto.\nNão, o objeto é indivisível',
    });
    expect(document?.sections['3_1_requisitos_tecnicos']?.split('\n')).toHaveLength(10);
    expect(document?.sections['7_solucao_como_um_todo']?.startsWith('Contrato por Desempenho (Performance-Based). ')).toBe(true);

    const after = await say('obrigado');
    expect(after.stage).toBe('finalize');
    expect(after.aiResponseText).toBe(FINALIZED_MESSAGE);
  });

  it('asks again for a vague necessity', async () => {
    const result = await say('ok');
    expect(result.stage).toBe('collect_need');
    expect(result.aiResponseText).toBe(NECESSITY_QUESTION);
  });

  it('refuses to generate before the requirements are confirmed', async () => {
    await say(NEED);
    const result = await say('gerar o documento');
    expect(result.stage).toBe('refine_requirements');
    expect(result.structuredDelta).toEqual({ stage: 'refine_requirements' });
    expect(result.aiResponseText).toBe(
      "Geração de ETP só é permitida no estado 'confirm_requirements'. Estado atual: refine_requirements"
    );
  });

  it('moves to refinement on an unclear reply to the suggestions', async () => {
    await say(NEED);
    const result = await say('hmm');
    expect(result.stage).toBe('refine_requirements');
    expect(result.aiResponseText).toBe(DEFAULT_CLARIFICATION);
  });

  it('asks for valid numbers when a target is past the end of the list', async () => {
    await say(NEED);
    const result = await say('remover R20');
    expect(result.structuredDelta).toEqual({ stage: 'refine_requirements' });
    expect(result.aiResponseText).toBe(
      'Não existe R20 na lista atual, que vai de R1 a R12. Informe números entre 1 e 12.'
    );
    expect(store.getSession(SESSION)?.requirements).toHaveLength(12);
  });

  it('reorders the named requirements to the top', async () => {
    const suggested = (await say(NEED)).structuredDelta.requirements ?? [];
    const result = await say('reordenar 3, 1, 2');
    const texts = (result.structuredDelta.requirements ?? []).map((req) => req.text);
    expect(texts).toHaveLength(12);
    expect(texts.slice(0, 4)).toEqual([suggested[2]?.text, suggested[0]?.text, suggested[1]?.text, suggested[3]?.text]);
    expect(result.structuredDelta.requirements?.[0]?.id).toBe('R1');
  });

  it('rewrites only the targeted requirement on an edit without text', async () => {
    await say(NEED);
    const removed = (await say('remover 2 e 4')).structuredDelta.requirements ?? [];
    const result = await say('melhorar o último');
    const rewritten = result.structuredDelta.requirements ?? [];

    expect(result.aiResponseText.startsWith('Nova redação para R10:')).toBe(true);
    expect(rewritten).toHaveLength(10);
    expect(rewritten.slice(0, 9)).toEqual(removed.slice(0, 9));
    expect(rewritten[9]).toEqual({
      id: 'R10',
      text: 'Garantir conformidade com Lei 14.133/2021, legislação aplicável e normas técnicas do setor',
    });
  });

  it('keeps edits in the confirmation stage', async () => {
    await say(NEED);
    await say('ok');
    const edited = await say('remover 1');
    expect(edited.stage).toBe('confirm_requirements');
    expect(edited.structuredDelta.requirements).toHaveLength(11);
    expect(edited.structuredDelta.requirementsLocked).toBe(false);
  });

  it('restarts with a new necessity from any stage', async () => {
    await say(NEED);
    await say('ok');
    const restarted = await say('nova necessidade: Serviço de limpeza predial');
    expect(restarted.stage).toBe('suggest_requirements');
    expect(restarted.structuredDelta.necessity).toBe('Serviço de limpeza predial');
    expect(restarted.structuredDelta.requirementsLocked).toBe(false);
    expect(restarted.aiResponseText).toContain(GENERATOR_NOTICE);
  });

  it('rejects an empty message', async () => {
    await expect(engine.processMessage(SESSION, '   ')).rejects.toBeInstanceOf(ValidationError);
    expect(store.getSession(SESSION)).toBeNull();
  });

  it('reports a storage failure without changing the stage', async () => {
    await say(NEED);
    vi.spyOn(store, 'saveSession').mockImplementation(() => {
      throw new Error('disco cheio');
    });

    const result = await engine.processMessage(SESSION, 'remover 2');
    expect(result).toEqual({
      success: false,
      sessionId: SESSION,
      aiResponseText: 'Ocorreu um erro ao processar sua solicitação: disco cheio. Por favor, tente novamente.',
      stage: 'suggest_requirements',
      structuredDelta: {},
    });
    expect(store.getSession(SESSION)?.requirements).toHaveLength(12);
  });
});

describe('full flow on SQLite storage', () => {
  let storage: Storage;
  let engine: ConversationEngine;

  async function say(text: string): Promise<ProcessMessageResult> {
    const result = await engine.processMessage(SESSION, text);
    expect(result.success).toBe(true);
    return result;
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    storage = new Storage(':memory:');
    engine = new ConversationEngine({
      store: storage,
      generator: new FallbackGenerator(),
      retriever: new EmptyRetriever(),
      shortTimeoutMs: 1000,
      longTimeoutMs: 1000,
    });
  });

  afterEach(() => {
    storage.close();
    vi.restoreAllMocks();
  });

  it('keeps the finalized document after the session is saved again', async () => {
    await say(NEED);
    await say('ok');
    await say('confirmo');
    await say('2');
    await say('sim');
    for (let i = 0; i < 4; i++) {
      await say('deixar pendente');
    }
    expect((await say('ok')).stage).toBe('preview');

    const finalized = await say('confirmo');
    expect(finalized.stage).toBe('finalize');
    const id = /documento (doc-\S+) foi registrado/.exec(finalized.aiResponseText)?.[1];
    expect(id).toBeDefined();

    expect(storage.getLatestDocumentForSession(SESSION)?.id).toBe(id);
    await say('obrigado');
    expect(storage.getLatestDocumentForSession(SESSION)?.id).toBe(id);
    expect(storage.getSession(SESSION)?.stage).toBe('finalize');
    expect(storage.getStats()).toEqual({ sessions: 1, documents: 1 });
  });
});
