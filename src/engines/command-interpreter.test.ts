import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLARIFICATION,
  extractOrder,
  extractTargets,
  interpretRequirementCommand,
  parseCommand,
} from './command-interpreter.js';

describe('command-interpreter', () => {
  describe('classification table', () => {
    it.each([
      ['ajustar o último', 5, { type: 'edit', targets: [5], payload: null }],
      ['remover 2 e 4', 5, { type: 'remove', targets: [2, 4], payload: null }],
      ['trocar 3: novo texto aqui', 5, { type: 'edit', targets: [3], payload: 'novo texto aqui' }],
      ['pode manter', 5, { type: 'confirm', targets: [], payload: null }],
      ['nova necessidade: gestão de frota', 5, { type: 'restart_necessity', targets: [], payload: 'gestão de frota' }],
      ['manter apenas 1 e 3', 5, { type: 'keep_only', targets: [1, 3], payload: null }],
    ] as const)('"%s" on %i items', (text, length, expected) => {
      expect(parseCommand(text, length)).toEqual({ ...expected, targets: [...expected.targets] });
    });
  });

  it('reads an edit without new text as a rewrite of the targets', () => {
    expect(interpretRequirementCommand('ajustar o último', 5)).toEqual({
      command: { type: 'edit', targets: [5], payload: null },
      clarification: null,
    });
    expect(parseCommand('melhorar 2 e 4', 5)).toEqual({ type: 'edit', targets: [2, 4], payload: null });
  });

  it('takes edit targets only from the text before the new wording', () => {
    expect(parseCommand('trocar 3 para exigir 2 anos de experiência', 5)).toEqual({
      type: 'edit',
      targets: [3],
      payload: 'exigir 2 anos de experiência',
    });
    expect(parseCommand('trocar 2: prazo de 3 dias úteis', 5)).toEqual({
      type: 'edit',
      targets: [2],
      payload: 'prazo de 3 dias úteis',
    });
  });

  it('asks which item gets the new text when several are named', () => {
    expect(interpretRequirementCommand('trocar 2 e 3 para garantia de 12 meses', 5)).toEqual({
      command: { type: 'unclear', targets: [], payload: null },
      clarification:
        'Qual requisito deve receber o novo texto: R2 ou R3? Indique apenas um, por exemplo: trocar 2: novo texto.',
    });
  });

  it('names the missing item when a reference is past the end of the list', () => {
    expect(interpretRequirementCommand('remover R9', 5)).toEqual({
      command: { type: 'unclear', targets: [], payload: null },
      clarification: 'Não existe R9 na lista atual, que vai de R1 a R5. Informe números entre 1 e 5.',
    });
    expect(interpretRequirementCommand('remover 2 a 40', 5).clarification).toBe(
      'Não existe R40 na lista atual, que vai de R1 a R5. Informe números entre 1 e 5.'
    );
    expect(interpretRequirementCommand('trocar R7: novo texto', 5).clarification).toBe(
      'Não existe R7 na lista atual, que vai de R1 a R5. Informe números entre 1 e 5.'
    );
    expect(interpretRequirementCommand('remover R1', 0).clarification).toBe(
      'Não existe R1: a lista de requisitos está vazia.'
    );
  });

  it('reads a new order in the sequence written', () => {
    expect(parseCommand('reordenar 3, 1, 2', 5)).toEqual({ type: 'reorder', targets: [3, 1, 2], payload: null });
    expect(parseCommand('nova ordem: R2 R1', 5)).toEqual({ type: 'reorder', targets: [2, 1], payload: null });
  });

  it('asks for the order when fewer than two positions are given', () => {
    expect(interpretRequirementCommand('reordenar os requisitos', 5)).toEqual({
      command: { type: 'unclear', targets: [], payload: null },
      clarification: 'Informe a nova ordem dos requisitos, por exemplo: reordenar 3, 1, 2.',
    });
    expect(interpretRequirementCommand('reordenar 2, 9', 5).clarification).toBe(
      'Não existe R9 na lista atual, que vai de R1 a R5. Informe números entre 1 e 5.'
    );
  });

  it('captures the clause after "para" as the edit payload', () => {
    expect(parseCommand('mudar o 2 para Garantia mínima de 36 meses', 8)).toEqual({
      type: 'edit',
      targets: [2],
      payload: 'Garantia mínima de 36 meses',
    });
  });

  it('captures the add payload after the filler words', () => {
    expect(parseCommand('adicionar requisito sobre suporte 24h', 8)).toEqual({
      type: 'append_one',
      targets: [],
      payload: 'suporte 24h',
    });
  });

  it('takes the add payload after a colon verbatim', () => {
    expect(parseCommand('incluir: Treinamento para 10 servidores', 8).payload).toBe('Treinamento para 10 servidores');
  });

  it('asks which items to remove when none are named', () => {
    expect(interpretRequirementCommand('remover', 8)).toEqual({
      command: { type: 'unclear', targets: [], payload: null },
      clarification: 'Quais requisitos você quer remover? Informe os números, por exemplo: remover 2 e 4.',
    });
  });

  it('ranks remove above edit in the same message', () => {
    expect(parseCommand('remover o 3 e trocar o 4', 5).type).toBe('remove');
  });

  it('recognizes regenerate and accept-all phrases', () => {
    expect(parseCommand('refaz tudo', 8).type).toBe('regenerate_all');
    expect(parseCommand('Aceito todos', 8).type).toBe('accept_all');
  });

  it('falls back to a specific clarifying question', () => {
    expect(interpretRequirementCommand('o que significa isso?', 8)).toEqual({
      command: { type: 'unclear', targets: [], payload: null },
      clarification: DEFAULT_CLARIFICATION,
    });
  });

  describe('extractTargets', () => {
    it('reads R-prefixed ids', () => {
      expect(extractTargets('remover r2 e r10', 12)).toEqual([2, 10]);
    });

    it('expands ranges as written', () => {
      expect(extractTargets('remover 2 a 4', 5)).toEqual([2, 3, 4]);
      expect(extractTargets('remover 4-7', 5)).toEqual([4, 5, 6, 7]);
    });

    it('resolves ordinals against the current length', () => {
      expect(extractTargets('o penultimo', 5)).toEqual([4]);
      expect(extractTargets('o primeiro e o ultimo', 7)).toEqual([1, 7]);
    });

    it('ignores bare numbers beyond the list', () => {
      expect(extractTargets('remover 7', 5)).toEqual([]);
    });
  });

  describe('extractOrder', () => {
    it('keeps the written order and drops repeats', () => {
      expect(extractOrder('reordenar r4, 2, 4 e 1')).toEqual([4, 2, 1]);
    });
  });
});
