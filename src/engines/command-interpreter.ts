/**
 * Requirement command interpreter
 *
 * Priority cascade over the folded message, first match wins:
 * restart necessity > remove > keep only > reorder > edit > add > regenerate > accept/confirm > unclear.
 * Targets are resolved against the list length at the moment the message is read.
 * An edit without new text asks for the targeted items to be rewritten.
 */

import type { Command } from '../types/index.js';
import {
  alignText,
  compilePhrases,
  firstMatch,
  matchesAny,
  type AlignedText,
} from '../utils/sanitize.js';
import { CONFIRMATION_PHRASES } from './stage-machine.js';

const RESTART_PATTERNS: readonly RegExp[] = [
  /nova\s*necessidade/,
  /trocar\s*a\s*necessidade/,
  /mudar\s*a\s*necessidade/,
  /na\s*verdade\s*a\s*necessidade\s*e\b/,
  /mudou\s*a\s*necessidade/,
  /preciso\s*trocar\s*a\s*necessidade/,
];

const REMOVE_PATTERNS = compilePhrases([
  'remover', 'remova', 'remove',
  'tirar', 'tire', 'tira',
  'excluir', 'exclua', 'exclui',
  'deletar', 'delete', 'deleta',
  'retirar', 'retire', 'retira',
  'apagar', 'apague', 'apaga',
]);

const KEEP_ONLY_PATTERNS = compilePhrases([
  'manter apenas', 'manter somente', 'manter só', 'só manter',
  'mantenha apenas', 'mantenha somente', 'mantenha só',
  'deixar apenas', 'deixar somente', 'deixe apenas', 'deixe somente',
]);

const REORDER_PATTERNS = compilePhrases([
  'reordenar', 'reordene', 'reordena',
  'reorganizar', 'reorganize',
  'nova ordem', 'mudar a ordem', 'alterar a ordem', 'trocar a ordem', 'inverter a ordem',
]);

const EDIT_PATTERNS = compilePhrases([
  'alterar', 'altere', 'modificar', 'modifique',
  'trocar', 'troque', 'troca',
  'mudar', 'mude', 'muda',
  'editar', 'edite',
  'ajustar', 'ajuste', 'ajusta',
  'substituir', 'substitua',
  'melhorar', 'melhore',
  'reescrever', 'reescreva',
]);

const ADD_PATTERNS = compilePhrases([
  'adicionar', 'adicione', 'adiciona',
  'incluir', 'inclua', 'inclui',
  'acrescentar', 'acrescente', 'acrescenta',
  'novo requisito', 'mais um',
]);

const REGENERATE_PATTERNS = compilePhrases([
  'refaz tudo', 'refazer tudo', 'refaça tudo',
  'gera tudo de novo', 'gerar tudo de novo', 'gere tudo de novo',
  'gerar novamente', 'novos requisitos',
]);

const ACCEPT_ALL_PATTERNS = compilePhrases([
  'aceito todos', 'aceitar todos', 'aceito tudo', 'aprovo todos', 'todos aprovados',
]);

const CONFIRM_PATTERNS = compilePhrases(CONFIRMATION_PHRASES);

/** Filler between an add verb and the requirement content */
const ADD_FILLER_PATTERN =
  /^(?:(?:um|uma|o|a|mais)\s+)?(?:(?:novo|nova)\s+)?(?:(?:requisito|item)s?\s*)?(?:(?:sobre|de|para|que)\s+)?/;

const ORDINALS: ReadonlyArray<{ pattern: RegExp; resolve: (length: number) => number }> = [
  { pattern: /\bpenultim[oa]\b/, resolve: (length) => length - 1 },
  { pattern: /\bultim[oa]\b/, resolve: (length) => length },
  { pattern: /\bprimeir[oa]\b/, resolve: () => 1 },
  { pattern: /\bsegund[oa]\b/, resolve: () => 2 },
  { pattern: /\bterceir[oa]\b/, resolve: () => 3 },
];

const EDIT_CONNECTOR = /\b(?:para|por|com)\s+/;

export const DEFAULT_CLARIFICATION =
  'Não entendi completamente. Você quer confirmar os requisitos atuais, fazer alguma alteração, ou tem alguma dúvida sobre eles?';

export interface CommandInterpretation {
  command: Command;
  /** Specific question to ask when the command cannot be applied as is */
  clarification: string | null;
}

/**
 * Resolve requirement positions mentioned in folded text: R<n>, ranges
 * ("2-4", "2 a 4"), ordinal words, and bare integers no greater than the list length.
 * R<n> and ranges are kept as written, even past the end of the list.
 */
export function extractTargets(folded: string, listLength: number): number[] {
  const found = new Set<number>();
  let rest = folded;

  rest = rest.replace(/\br(\d{1,3})\b/g, (_match, n: string) => {
    const value = Number(n);
    if (value >= 1) found.add(value);
    return ' ';
  });

  rest = rest.replace(/\b(\d{1,3})\s*(?:-|a|ate)\s*(\d{1,3})\b/g, (match, a: string, b: string) => {
    const from = Number(a);
    const to = Number(b);
    if (from < 1 || from > to) return match;
    for (let i = from; i <= to; i++) found.add(i);
    return ' ';
  });

  if (listLength > 0) {
    for (const ordinal of ORDINALS) {
      if (ordinal.pattern.test(rest)) {
        const value = ordinal.resolve(listLength);
        if (value >= 1 && value <= listLength) found.add(value);
        rest = rest.replace(ordinal.pattern, ' ');
      }
    }
  }

  for (const match of rest.matchAll(/\b(\d{1,3})\b/g)) {
    const value = Number(match[1]);
    if (value >= 1 && value <= listLength) found.add(value);
  }

  return [...found].sort((a, b) => a - b);
}

/**
 * Positions in the order they are written ("3, 1, 2" or "R3 R1 R2"), without repeats
 */
export function extractOrder(folded: string): number[] {
  const order: number[] = [];
  for (const match of folded.matchAll(/\br?(\d{1,3})\b/g)) {
    const value = Number(match[1]);
    if (value >= 1 && !order.includes(value)) order.push(value);
  }
  return order;
}

function labelOf(targets: readonly number[]): string {
  const ids = targets.map((target) => `R${target}`);
  const last = ids.pop();
  return ids.length > 0 ? `${ids.join(', ')} ou ${last}` : last ?? '';
}

/**
 * Question for references past the end of the list, or null when every target exists
 */
function outOfRangeQuestion(targets: readonly number[], listLength: number): string | null {
  const beyond = targets.filter((target) => target > listLength);
  if (beyond.length === 0) return null;
  const highest = Math.max(...beyond);
  if (listLength === 0) {
    return `Não existe R${highest}: a lista de requisitos está vazia.`;
  }
  return `Não existe R${highest} na lista atual, que vai de R1 a R${listLength}. Informe números entre 1 e ${listLength}.`;
}

function afterColon(text: AlignedText): string | null {
  const colon = text.display.indexOf(':');
  if (colon < 0) return null;
  const value = text.display.slice(colon + 1).trim();
  return value.length > 0 ? value : null;
}

/**
 * Where the targets of an edit end: the first colon, or the connector that opens the new text
 */
function editTargetsEnd(text: AlignedText, verbEnd: number): number {
  const colon = text.folded.indexOf(':');
  const connector = EDIT_CONNECTOR.exec(text.folded.slice(verbEnd));
  const bounds = [colon, connector ? verbEnd + connector.index : -1].filter((index) => index >= 0);
  return bounds.length > 0 ? Math.min(...bounds) : text.folded.length;
}

function clauseAfterConnector(text: AlignedText, fromIndex: number, connector: RegExp): string | null {
  const match = connector.exec(text.folded.slice(fromIndex));
  if (!match) return null;
  const value = text.display.slice(fromIndex + match.index + match[0].length).trim();
  return value.length > 0 ? value : null;
}

function editPayload(text: AlignedText, verbEnd: number): string | null {
  return afterColon(text) ?? clauseAfterConnector(text, verbEnd, EDIT_CONNECTOR);
}

function addPayload(text: AlignedText, verbEnd: number): string | null {
  const colonValue = afterColon(text);
  if (colonValue) return colonValue;
  const remainderStart = verbEnd + (text.folded.slice(verbEnd).length - text.folded.slice(verbEnd).trimStart().length);
  const filler = ADD_FILLER_PATTERN.exec(text.folded.slice(remainderStart));
  const start = remainderStart + (filler ? filler[0].length : 0);
  const value = text.display.slice(start).replace(/^[\s,.-]+/, '').trim();
  return value.length > 0 ? value : null;
}

function restartPayload(text: AlignedText, matchEnd: number): string | null {
  const colonValue = afterColon(text);
  if (colonValue) return colonValue;
  const remainder = text.display.slice(matchEnd).replace(/^[\s:,.-]+/, '');
  const folded = text.folded.slice(text.folded.length - remainder.length);
  const lead = /^(?:(?:e|eh|sera|para)\s+)/.exec(folded);
  const value = (lead ? remainder.slice(lead[0].length) : remainder).trim();
  return value.length >= 3 ? value : null;
}

function command(type: Command['type'], targets: number[] = [], payload: string | null = null): Command {
  return { type, targets, payload };
}

function unclear(clarification: string): CommandInterpretation {
  return { command: command('unclear'), clarification };
}

function targeted(
  type: Command['type'],
  targets: number[],
  listLength: number,
  missingQuestion: string
): CommandInterpretation {
  if (targets.length === 0) return unclear(missingQuestion);
  const outOfRange = outOfRangeQuestion(targets, listLength);
  if (outOfRange) return unclear(outOfRange);
  return { command: command(type, targets), clarification: null };
}

/**
 * Classify a message against the current requirement list, with the question
 * to ask when the message is not actionable.
 */
export function interpretRequirementCommand(userText: string, listLength: number): CommandInterpretation {
  const text = alignText(userText);
  const folded = text.folded;

  for (const pattern of RESTART_PATTERNS) {
    const match = pattern.exec(folded);
    if (match) {
      return {
        command: command('restart_necessity', [], restartPayload(text, match.index + match[0].length)),
        clarification: null,
      };
    }
  }

  if (matchesAny(folded, REMOVE_PATTERNS)) {
    return targeted(
      'remove',
      extractTargets(folded, listLength),
      listLength,
      'Quais requisitos você quer remover? Informe os números, por exemplo: remover 2 e 4.'
    );
  }

  if (matchesAny(folded, KEEP_ONLY_PATTERNS)) {
    return targeted(
      'keep_only',
      extractTargets(folded, listLength),
      listLength,
      'Quais requisitos devo manter? Informe os números, por exemplo: manter apenas 1 e 3.'
    );
  }

  if (matchesAny(folded, REORDER_PATTERNS)) {
    const order = extractOrder(folded);
    return targeted(
      'reorder',
      order.length >= 2 ? order : [],
      listLength,
      'Informe a nova ordem dos requisitos, por exemplo: reordenar 3, 1, 2.'
    );
  }

  const editVerb = firstMatch(folded, EDIT_PATTERNS);
  if (editVerb) {
    const verbEnd = editVerb.index + editVerb[0].length;
    const interpretation = targeted(
      'edit',
      extractTargets(folded.slice(0, editTargetsEnd(text, verbEnd)), listLength),
      listLength,
      'Qual requisito você quer alterar? Informe o número e o novo texto, por exemplo: trocar 3: novo texto.'
    );
    if (interpretation.clarification) return interpretation;

    const targets = interpretation.command.targets;
    const payload = editPayload(text, verbEnd);
    if (payload && targets.length > 1) {
      return unclear(
        `Qual requisito deve receber o novo texto: ${labelOf(targets)}? Indique apenas um, por exemplo: trocar ${targets[0] ?? 1}: novo texto.`
      );
    }
    return { command: command('edit', targets, payload), clarification: null };
  }

  const addVerb = firstMatch(folded, ADD_PATTERNS);
  if (addVerb) {
    return {
      command: command('append_one', [], addPayload(text, addVerb.index + addVerb[0].length)),
      clarification: null,
    };
  }

  if (matchesAny(folded, REGENERATE_PATTERNS)) {
    return { command: command('regenerate_all'), clarification: null };
  }

  if (matchesAny(folded, ACCEPT_ALL_PATTERNS)) {
    return { command: command('accept_all'), clarification: null };
  }

  if (matchesAny(folded, CONFIRM_PATTERNS)) {
    return { command: command('confirm'), clarification: null };
  }

  return unclear(DEFAULT_CLARIFICATION);
}

export function parseCommand(userText: string, listLength: number): Command {
  return interpretRequirementCommand(userText, listLength).command;
}
