/**
 * Requirements engine
 *
 * Pure list operations over numbered requirements. After every operation the
 * list satisfies `list[i].id === 'R' + (i + 1)`. Out-of-range targets and empty
 * replacement text are no-ops.
 */

import type { Command, Requirement } from '../types/index.js';

export const APPEND_PLACEHOLDER = 'Novo requisito a detalhar';

/** Leading list markers: "1.", "R2 -", "3)", "- ", "• " */
const NUMBERING_PATTERN = /^\s*(?:(?:R\s?)?\d{1,3}\s*[.):\-–]\s*|[-*•]\s+)/i;

export function renumber(items: ReadonlyArray<{ text: string }>): Requirement[] {
  return items.map((item, index) => ({ id: `R${index + 1}`, text: item.text }));
}

/**
 * Strip list numbering from a raw line
 */
export function stripNumbering(line: string): string {
  return line.replace(NUMBERING_PATTERN, '').trim();
}

/**
 * Build a numbered list from plain statements, dropping blanks
 */
export function fromStatements(statements: readonly string[]): Requirement[] {
  return renumber(
    statements
      .map(stripNumbering)
      .filter((text) => text.length > 0)
      .map((text) => ({ text }))
  );
}

function inRange(target: number, length: number): boolean {
  return Number.isInteger(target) && target >= 1 && target <= length;
}

/**
 * Apply a command to the list and return the new list. Commands that do not
 * edit the list (confirmations, regeneration, restart, unclear) return the input unchanged.
 */
export function applyCommand(command: Command, current: readonly Requirement[]): Requirement[] {
  switch (command.type) {
    case 'remove':
    case 'remove_one': {
      const drop = new Set(command.targets.filter((t) => inRange(t, current.length)));
      if (drop.size === 0) return renumber(current);
      return renumber(current.filter((_item, index) => !drop.has(index + 1)));
    }

    case 'keep_only': {
      const keep = new Set(command.targets.filter((t) => inRange(t, current.length)));
      if (keep.size === 0) return renumber(current);
      return renumber(current.filter((_item, index) => keep.has(index + 1)));
    }

    case 'append_one': {
      const text = command.payload?.trim() || APPEND_PLACEHOLDER;
      return renumber([...current, { text }]);
    }

    case 'reorder': {
      // Named positions first, in the order given; the rest keep their relative order
      const order = command.targets.filter((t, index, all) => inRange(t, current.length) && all.indexOf(t) === index);
      const named = order.flatMap((target) => current.slice(target - 1, target));
      const rest = current.filter((_item, index) => !order.includes(index + 1));
      return renumber([...named, ...rest]);
    }

    case 'edit':
    case 'replace_one': {
      const target = command.targets[0];
      const text = command.payload?.trim() ?? '';
      if (target === undefined || !inRange(target, current.length) || text.length === 0) {
        return renumber(current);
      }
      return renumber(current.map((item, index) => (index + 1 === target ? { text } : item)));
    }

    case 'accept_all':
    case 'confirm':
    case 'regenerate_all':
    case 'restart_necessity':
    case 'unclear':
      return [...current];
  }
}

/**
 * Put new texts at the given positions, in order. Positions without a text stay as they are.
 */
export function rewriteAt(
  current: readonly Requirement[],
  targets: readonly number[],
  texts: readonly string[]
): Requirement[] {
  return targets.reduce<Requirement[]>(
    (list, target, index) => applyCommand({ type: 'edit', targets: [target], payload: texts[index] ?? null }, list),
    renumber(current)
  );
}

/**
 * Whether a command changes the list contents
 */
export function isListEdit(command: Command): boolean {
  return ['remove', 'remove_one', 'keep_only', 'reorder', 'append_one', 'edit', 'replace_one'].includes(command.type);
}

/**
 * Whether ids are exactly R1..Rk in order
 */
export function isSequentiallyNumbered(list: readonly Requirement[]): boolean {
  return list.every((item, index) => item.id === `R${index + 1}`);
}
