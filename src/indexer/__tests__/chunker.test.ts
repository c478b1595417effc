/**
 * Chunker Module Tests
 *
 * Tests for splitting knowledge resources into passages:
 * - Resource-specific splitters (opn, annexes, glossary, decree)
 * - Generic fallback and warnings
 * - Long passage splitting and deterministic ids
 */

import { describe, it, expect } from 'vitest';

import {
  chunkKnowledgeResources,
  chunkId,
  metadataFrom,
  renderBody,
  splitText,
  estimateTokens,
} from '../chunker/index.js';

describe('splitText', () => {
  it('splits at the last space before the limit', () => {
    expect(splitText('ena dva tri', 7)).toEqual(['ena dva', 'tri']);
  });

  it('prefers a line break over a space', () => {
    expect(splitText('ab cd\nef gh', 8)).toEqual(['ab cd', 'ef gh']);
  });

  it('cuts hard when there is no break', () => {
    expect(splitText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('trims short text and drops empty text', () => {
    expect(splitText('  kratko  ')).toEqual(['kratko']);
    expect(splitText('')).toEqual([]);
  });
});

describe('estimateTokens', () => {
  it('estimates about four characters per token', () => {
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('metadataFrom', () => {
  it('reads citation fields in priority order', () => {
    expect(
      metadataFrom({ enota_urejanja: 'BE-3', eup: 'XX-1', raba: 'SS', stran: 12, leto: '2020' })
    ).toEqual({ zone_unit: 'BE-3', land_use: 'SS', page: '12', year: '2020' });
  });

  it('skips blank values and non-objects', () => {
    expect(metadataFrom({ namenska_raba: '  ', podrobnejsa_namenska_raba: 'CU' })).toEqual({
      land_use: 'CU',
    });
    expect(metadataFrom('besedilo')).toEqual({});
    expect(metadataFrom(null)).toEqual({});
  });
});

describe('renderBody', () => {
  it('keeps strings and serializes everything else', () => {
    expect(renderBody('  Odmik 4 m. ')).toBe('Odmik 4 m.');
    expect(renderBody({ fz: 0.4 })).toBe('{"fz":0.4}');
    expect(renderBody(undefined)).toBe('');
  });
});

describe('chunkId', () => {
  it('is a stable hex digest that depends on every part', () => {
    const id = chunkId('opn', '84. člen', 'Odmik');
    expect(id).toMatch(/^[0-9a-f]{64}$/);
    expect(chunkId('opn', '84. člen', 'Odmik')).toBe(id);
    expect(chunkId('opn', '85. člen', 'Odmik')).not.toBe(id);
    expect(chunkId('uredba', '84. člen', 'Odmik')).not.toBe(id);
  });
});

describe('chunkKnowledgeResources', () => {
  it('splits the municipal plan by section and article', () => {
    const result = chunkKnowledgeResources([
      {
        name: 'opn',
        payload: {
          '1. poglavje': { '84. člen': 'Odmik od parcelne meje je najmanj 4 m.' },
          uvod: 'Splošno.',
        },
      },
    ]);

    expect(result.warnings).toEqual([]);
    expect(result.bySource).toEqual({ opn: 2 });
    expect(result.chunks.map(({ key, content, metadata }) => ({ key, content, metadata }))).toEqual([
      {
        key: '1. poglavje.84. člen',
        content:
          'Vir: opn, Razdelek: 1. poglavje, Ključ: 84. člen\n\nOdmik od parcelne meje je najmanj 4 m.',
        metadata: { article: '84. člen' },
      },
      {
        key: 'uvod',
        content: 'Vir: opn, Razdelek: uvod\n\nSplošno.',
        metadata: { article: 'uvod' },
      },
    ]);
  });

  it('derives ids from source, key and content', () => {
    const [chunk] = chunkKnowledgeResources([{ name: 'uredba', payload: { '5. člen': 'Besedilo.' } }])
      .chunks;

    expect(chunk).toEqual({
      id: chunkId('uredba', '5. člen', 'Vir: uredba, Razdelek: 5. člen\n\nBesedilo.'),
      source: 'uredba',
      key: '5. člen',
      content: 'Vir: uredba, Razdelek: 5. člen\n\nBesedilo.',
      metadata: { article: '5. člen' },
    });
  });

  it('keys annex 1 objects by id or position', () => {
    const { chunks } = chunkKnowledgeResources([
      { name: 'priloga1', payload: { objects: [{ title: 'Ograja' }, { id: 7, title: 'Nadstrešek' }] } },
    ]);

    expect(chunks.map((c) => c.key)).toEqual(['objekt_1', 'objekt_7']);
    expect(chunks[0]?.content).toBe('Vir: priloga1, Objekt: Ograja\n\n{"title":"Ograja"}');
  });

  it('keys annex 2 rows by zoning unit with citation metadata', () => {
    const { chunks } = chunkKnowledgeResources([
      {
        name: 'priloga2',
        payload: {
          table_entries: [{ naselje: 'Bevke', enota_urejanja: 'BE-3', namenska_raba: 'SSe', fz: 0.4 }],
        },
      },
    ]);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.key).toBe('BE-3');
    expect(chunks[0]?.content).toBe(
      'Vir: priloga2, Naselje: Bevke, Enota: BE-3\n\n' +
        '{"naselje":"Bevke","enota_urejanja":"BE-3","namenska_raba":"SSe","fz":0.4}'
    );
    expect(chunks[0]?.metadata).toEqual({ zone_unit: 'BE-3', land_use: 'SSe' });
  });

  it('splits annexes 3 and 4 from one resource', () => {
    const { chunks } = chunkKnowledgeResources([
      {
        name: 'priloga3-4',
        payload: {
          priloga3: { entries: [{ urejevalna_enota: 'LJ-12', ime_naselja: 'Ljubljana' }] },
          priloga4: [{ enote_urejanja_prostora: 'LJ-13', ime_naselja: 'Ljubljana' }],
        },
      },
    ]);

    expect(chunks.map((c) => [c.key, c.metadata.zone_unit])).toEqual([
      ['p3_LJ-12', 'LJ-12'],
      ['p4_LJ-13', 'LJ-13'],
    ]);
  });

  it('keys glossary entries by term', () => {
    const { chunks } = chunkKnowledgeResources([
      { name: 'izrazi', payload: { terms: [{ term: 'Faktor zazidanosti', definition: 'Razmerje.' }] } },
    ]);

    expect(chunks[0]?.key).toBe('Faktor zazidanosti');
    expect(chunks[0]?.content).toBe(
      'Vir: izrazi, Izraz: Faktor zazidanosti\n\n{"term":"Faktor zazidanosti","definition":"Razmerje."}'
    );
    expect(chunks[0]?.metadata).toEqual({});
  });

  it('splits unknown resources by key, item or as a whole', () => {
    const { chunks, warnings } = chunkKnowledgeResources([
      { name: 'custom', payload: { a: 'Prvo.', b: null } },
      { name: 'seznam', payload: [{ eup: 'KR-1' }] },
      { name: 'opomba', payload: 'Besedilo.' },
    ]);

    expect(warnings).toEqual([]);
    expect(chunks.map((c) => c.content)).toEqual([
      'Vir: custom, Ključ: a\n\nPrvo.',
      'Vir: seznam, Vnos: 1\n\n{"eup":"KR-1"}',
      'Vir: opomba\n\nBesedilo.',
    ]);
    expect(chunks[1]?.metadata).toEqual({ zone_unit: 'KR-1' });
  });

  it('warns and falls back when a known resource has an unexpected shape', () => {
    const { chunks, warnings } = chunkKnowledgeResources([
      { name: 'priloga2', payload: { table_entries: 'manjka' } },
    ]);

    expect(warnings).toEqual(['priloga2: unexpected structure, split by top-level key']);
    expect(chunks.map((c) => c.content)).toEqual(['Vir: priloga2, Ključ: table_entries\n\nmanjka']);
  });

  it('warns about resources without passages', () => {
    const result = chunkKnowledgeResources([{ name: 'opn', payload: {} }]);

    expect(result.chunks).toEqual([]);
    expect(result.warnings).toEqual(['opn: no passages found']);
    expect(result.bySource).toEqual({ opn: 0 });
  });

  it('keeps an identical passage once', () => {
    const resource = { name: 'uredba', payload: { '5. člen': 'Besedilo.' } };
    const result = chunkKnowledgeResources([resource, resource]);

    expect(result.chunks).toHaveLength(1);
    expect(result.warnings).toEqual([]);
  });

  it('splits long passages into numbered parts that repeat the header', () => {
    // Header "Vir: opn, Razdelek: s, Ključ: k" is 31 characters, leaving 9 for the body
    const { chunks } = chunkKnowledgeResources(
      [{ name: 'opn', payload: { s: { k: 'aaaa bbbb cccc' } } }],
      { maxChars: 42 }
    );

    expect(chunks.map((c) => [c.key, c.content])).toEqual([
      ['s.k#1', 'Vir: opn, Razdelek: s, Ključ: k\n\naaaa bbbb'],
      ['s.k#2', 'Vir: opn, Razdelek: s, Ključ: k\n\ncccc'],
    ]);
  });
});
