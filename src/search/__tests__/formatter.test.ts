import { describe, it, expect } from 'vitest';

import {
  formatCitation,
  formatRowsForDisplay,
  formatScore,
  renderContext,
  summarizeText,
} from '../formatter.js';
import type { Row } from '../types.js';

function row(id: string, extra: Partial<Row> = {}): Row {
  return { id, text: '', relevanceScore: 0, raw: {}, ...extra };
}

describe('summarizeText', () => {
  it('collapses whitespace', () => {
    expect(summarizeText('a \n\t b')).toBe('a b');
  });

  it('cuts at the last word boundary', () => {
    expect(summarizeText('ena dva tri', 9)).toBe('ena dva…');
  });

  it('cuts mid-word when there is no boundary', () => {
    expect(summarizeText('abcdefghij', 4)).toBe('abcd…');
  });

  it('leaves short text untouched', () => {
    expect(summarizeText('ena dva', 7)).toBe('ena dva');
  });
});

describe('formatCitation', () => {
  it('lists present fields in a fixed order', () => {
    const citation = formatCitation(
      row('a', {
        year: '2021',
        landUse: 'SSe',
        zoneUnit: 'LJ-12',
        page: '4',
        paragraph: '2',
        article: '84. člen',
        source: 'OPN',
      })
    );

    expect(citation).toBe(
      'source: OPN, article: 84. člen, paragraph: 2, page: 4, zone unit: LJ-12, land use: SSe, year: 2021'
    );
  });

  it('marks rows without citation fields', () => {
    expect(formatCitation(row('a'))).toBe('source: unknown');
  });
});

describe('renderContext', () => {
  it('renders nothing for no rows', () => {
    expect(renderContext([])).toBe('');
  });

  it('numbers rows under the header', () => {
    const text = renderContext([
      row('1', { source: 'OPN', article: '84. člen', zoneUnit: 'LJ-12', text: 'Odmik  je\n4 m.' }),
      row('2', { text: 'Streha.' }),
    ]);

    expect(text).toBe(
      'Relevant rules/citations:\n' +
        '1. source: OPN, article: 84. člen, zone unit: LJ-12 — Odmik je 4 m.\n' +
        '2. source: unknown — Streha.'
    );
  });

  it('keeps the separator for rows without text', () => {
    expect(renderContext([row('1', { source: 'Uredba' }), row('2', { text: '  \n ' })])).toBe(
      'Relevant rules/citations:\n1. source: Uredba —\n2. source: unknown —'
    );
  });

  it('honours header and snippet length', () => {
    const text = renderContext([row('1', { source: 'OPN', text: 'ena dva tri' })], {
      header: 'Pravila:',
      maxChars: 9,
    });

    expect(text).toBe('Pravila:\n1. source: OPN — ena dva…');
  });
});

describe('formatRowsForDisplay', () => {
  it('shows score, citation and snippet', () => {
    const text = formatRowsForDisplay([
      row('1', { relevanceScore: 0.8421, source: 'OPN', text: 'Odmik 4 m.' }),
      row('2', { relevanceScore: 0.1 }),
    ]);

    expect(text).toBe('[0.842] source: OPN\n  Odmik 4 m.\n\n[0.100] source: unknown');
  });

  it('formats scores with three decimals', () => {
    expect(formatScore(1)).toBe('1.000');
  });
});
