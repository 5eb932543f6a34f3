import { describe, it, expect } from 'vitest';
import {
  CONVERSATION_STAGES,
  STAGE_TRANSITIONS,
  canGenerate,
  forcedNextStage,
  isTerminal,
  isUserConfirmed,
  nextStage,
  validateTransition,
} from './stage-machine.js';

describe('stage-machine', () => {
  describe('isUserConfirmed', () => {
    it.each(['ok', 'Pode seguir', 'CONFIRMO', 'está bom', 'ta bom', 'Perfeito!', 'sem alterações, pode gerar'])(
      'recognizes "%s"',
      (text) => {
        expect(isUserConfirmed(text)).toBe(true);
      }
    );

    it.each(['', 'remover o 3', 'incerto', 'tokens', 'quero trocar o requisito 2'])('rejects "%s"', (text) => {
      expect(isUserConfirmed(text)).toBe(false);
    });
  });

  describe('validateTransition', () => {
    it('refuses edges outside the adjacency map', () => {
      expect(validateTransition('collect_need', 'preview', true)).toEqual({
        allowed: false,
        reason: 'Transição não permitida de collect_need para preview',
      });
    });

    it('allows the forced suggest → refine edge without confirmation', () => {
      expect(validateTransition('suggest_requirements', 'refine_requirements', false)).toEqual({
        allowed: true,
        reason: null,
      });
    });

    it('allows the refine self-loop without confirmation', () => {
      expect(validateTransition('refine_requirements', 'refine_requirements', false).allowed).toBe(true);
    });

    it('requires confirmation for every other forward edge', () => {
      expect(validateTransition('refine_requirements', 'confirm_requirements', false)).toEqual({
        allowed: false,
        reason: 'Transição requer confirmação explícita do usuário',
      });
      expect(validateTransition('refine_requirements', 'confirm_requirements', true).allowed).toBe(true);
      expect(validateTransition('preview', 'finalize', true).allowed).toBe(true);
    });

    it('never leaves finalize', () => {
      for (const stage of CONVERSATION_STAGES) {
        expect(validateTransition('finalize', stage, true).allowed).toBe(false);
      }
    });
  });

  describe('canGenerate', () => {
    it('is only allowed from confirm_requirements', () => {
      expect(canGenerate('refine_requirements', true)).toEqual({
        allowed: false,
        reason: "Geração de ETP só é permitida no estado 'confirm_requirements'. Estado atual: refine_requirements",
      });
    });

    it('requires confirmation', () => {
      expect(canGenerate('confirm_requirements', false)).toEqual({
        allowed: false,
        reason: 'Geração de ETP requer confirmação explícita do usuário',
      });
      expect(canGenerate('confirm_requirements', true)).toEqual({ allowed: true, reason: null });
    });
  });

  describe('graph helpers', () => {
    it('reports the forced successor', () => {
      expect(forcedNextStage('suggest_requirements')).toBe('refine_requirements');
      expect(forcedNextStage('collect_need')).toBeNull();
    });

    it('walks the forward chain in flow order', () => {
      const chain: string[] = [];
      let stage = nextStage('collect_need');
      while (stage) {
        chain.push(stage);
        stage = nextStage(stage);
      }
      expect(chain).toEqual([
        'suggest_requirements',
        'refine_requirements',
        'confirm_requirements',
        'generate_document',
        'preview',
        'finalize',
      ]);
    });

    it('has finalize as the only terminal stage', () => {
      expect(CONVERSATION_STAGES.filter(isTerminal)).toEqual(['finalize']);
      expect(Object.keys(STAGE_TRANSITIONS)).toHaveLength(CONVERSATION_STAGES.length);
    });
  });
});
