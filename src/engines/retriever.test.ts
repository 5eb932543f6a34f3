import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EmptyRetriever,
  KeywordRetriever,
  loadKnowledgeBase,
  safeRetrieve,
  tokenize,
  type Retriever,
} from './retriever.js';

const corpus = [
  { id: 'a', source: 'teste', text: 'Manutenção preventiva de veículos oficiais' },
  { id: 'b', source: 'teste', text: 'Limpeza predial com fornecimento de materiais' },
  { id: 'c', source: 'teste', text: 'Locação de veículos com manutenção inclusa e rastreamento' },
];

describe('tokenize', () => {
  it('folds accents and drops stop words and short tokens', () => {
    expect(tokenize('Locação de Veículos para a SEDE')).toEqual(['locacao', 'veiculos', 'sede']);
  });
});

describe('KeywordRetriever', () => {
  it('ranks by the share of query tokens found', async () => {
    const retriever = new KeywordRetriever(corpus);
    const results = await retriever.retrieve('locação de veículos com rastreamento', 5);
    expect(results.map((r) => [r.id, r.score])).toEqual([
      ['c', 1],
      ['a', 1 / 3],
    ]);
  });

  it('honors the limit', async () => {
    const retriever = new KeywordRetriever(corpus);
    const results = await retriever.retrieve('manutenção veículos', 1);
    expect(results).toHaveLength(1);
  });

  it('returns nothing for a query without usable tokens', async () => {
    const retriever = new KeywordRetriever(corpus);
    expect(await retriever.retrieve('de a o', 5)).toEqual([]);
    expect(await retriever.retrieve('veículos', 0)).toEqual([]);
  });

  it('skips duplicate ids', async () => {
    const retriever = new KeywordRetriever([...corpus, { id: 'a', source: 'dup', text: 'veículos' }]);
    const results = await retriever.retrieve('veículos', 5);
    expect(results.filter((r) => r.id === 'a')).toHaveLength(1);
  });
});

describe('loadKnowledgeBase', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads the bundled corpus', async () => {
    const snippets = loadKnowledgeBase(null);
    expect(snippets.length).toBeGreaterThan(0);

    const results = await new KeywordRetriever(snippets).retrieve('gestão de frota', 3);
    expect(results[0]?.id).toBe('kb-frota');
    expect(results[0]?.score).toBe(1);
  });

  it('reads a corpus file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'etp-kb-'));
    try {
      const path = join(dir, 'kb.json');
      writeFileSync(path, JSON.stringify({ snippets: [{ id: 'x', source: 's', text: 'texto' }] }));
      expect(loadKnowledgeBase(path)).toEqual([{ id: 'x', source: 's', text: 'texto' }]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('yields an empty corpus for a missing or malformed file', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const dir = mkdtempSync(join(tmpdir(), 'etp-kb-'));
    try {
      const path = join(dir, 'kb.json');
      writeFileSync(path, JSON.stringify({ items: [] }));
      expect(loadKnowledgeBase(path)).toEqual([]);
      expect(loadKnowledgeBase(join(dir, 'missing.json'))).toEqual([]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('safeRetrieve', () => {
  it('swallows retriever failures into an empty list', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failing: Retriever = {
      name: 'failing',
      retrieve: async () => {
        throw new Error('offline');
      },
    };
    expect(await safeRetrieve(failing, 'veículos', 3)).toEqual([]);
    expect(await safeRetrieve(new EmptyRetriever(), 'veículos', 3)).toEqual([]);
    vi.restoreAllMocks();
  });
});
