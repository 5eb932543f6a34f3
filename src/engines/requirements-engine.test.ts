import { describe, it, expect } from 'vitest';
import type { Command, Requirement } from '../types/index.js';
import {
  APPEND_PLACEHOLDER,
  applyCommand,
  fromStatements,
  isListEdit,
  isSequentiallyNumbered,
  renumber,
  rewriteAt,
  stripNumbering,
} from './requirements-engine.js';

const list = (...texts: string[]): Requirement[] => renumber(texts.map((text) => ({ text })));

const cmd = (type: Command['type'], targets: number[] = [], payload: string | null = null): Command => ({
  type,
  targets,
  payload,
});

describe('requirements-engine', () => {
  const base = list('a', 'b', 'c', 'd', 'e');

  it('removes targets and renumbers', () => {
    expect(applyCommand(cmd('remove', [2, 4]), base)).toEqual([
      { id: 'R1', text: 'a' },
      { id: 'R2', text: 'c' },
      { id: 'R3', text: 'e' },
    ]);
  });

  it('treats out-of-range targets as a no-op', () => {
    expect(applyCommand(cmd('remove_one', [9]), base)).toEqual(base);
    expect(applyCommand(cmd('replace_one', [0], 'x'), base)).toEqual(base);
  });

  it('keeps only the targets', () => {
    expect(applyCommand(cmd('keep_only', [1, 3]), base).map((r) => r.text)).toEqual(['a', 'c']);
  });

  it('moves the named positions to the front in the order given', () => {
    expect(applyCommand(cmd('reorder', [3, 1]), base).map((r) => r.text)).toEqual(['c', 'a', 'b', 'd', 'e']);
    expect(applyCommand(cmd('reorder', [5, 9, 5]), base)).toEqual(list('e', 'a', 'b', 'c', 'd'));
    expect(isListEdit(cmd('reorder', [2, 1]))).toBe(true);
  });

  it('rewrites several positions at once', () => {
    expect(rewriteAt(base, [2, 4], ['x', 'y'])).toEqual(list('a', 'x', 'c', 'y', 'e'));
    expect(rewriteAt(base, [2], [])).toEqual(base);
  });

  it('appends the payload or a placeholder', () => {
    expect(applyCommand(cmd('append_one', [], ' f '), base).at(-1)).toEqual({ id: 'R6', text: 'f' });
    expect(applyCommand(cmd('append_one'), []).at(-1)).toEqual({ id: 'R1', text: APPEND_PLACEHOLDER });
  });

  it('replaces text at the target and ignores an empty payload', () => {
    expect(applyCommand(cmd('edit', [2], 'novo'), base)[1]).toEqual({ id: 'R2', text: 'novo' });
    expect(applyCommand(cmd('edit', [2], '   '), base)).toEqual(base);
  });

  it('leaves the list alone for non-editing commands', () => {
    for (const type of ['accept_all', 'confirm', 'regenerate_all', 'restart_necessity', 'unclear'] as const) {
      const result = applyCommand(cmd(type), base);
      expect(result).toEqual(base);
      expect(result).not.toBe(base);
      expect(isListEdit(cmd(type))).toBe(false);
    }
  });

  it('keeps ids sequential across any sequence of edits', () => {
    const steps: Command[] = [
      cmd('remove', [1]),
      cmd('append_one', [], 'x'),
      cmd('remove', [2, 3]),
      cmd('edit', [1], 'y'),
      cmd('keep_only', [1, 2]),
      cmd('remove', [1, 2]),
      cmd('append_one', [], 'z'),
    ];
    let current = base;
    for (const step of steps) {
      current = applyCommand(step, current);
      expect(isSequentiallyNumbered(current)).toBe(true);
    }
    expect(current).toEqual([{ id: 'R1', text: 'z' }]);
  });

  it('strips list markers from generated lines', () => {
    expect(stripNumbering('R3 - Garantia de 12 meses')).toBe('Garantia de 12 meses');
    expect(stripNumbering('2) Suporte técnico')).toBe('Suporte técnico');
    expect(stripNumbering('• Treinamento')).toBe('Treinamento');
    expect(fromStatements(['1. a', '  ', '- b'])).toEqual(list('a', 'b'));
  });
});
