/**
 * Unit tests for context assembly
 */

import { buildContextBlock, formatProvenanceHeader } from '../src/contextBuilder';

describe('Context Builder Module', () => {
  it('should prefix each chunk with its provenance header, blank-line separated', () => {
    const context = buildContextBlock([
      { text: 'An estimand has four attributes.', source: 'ich_e9.pdf', chunkIndex: 3 },
      { text: 'Intercurrent events occur after treatment initiation.', source: 'ich_e9.pdf', chunkIndex: 7 }
    ]);

    expect(context).toBe(
      '[Source: ich_e9.pdf | chunk 3]\nAn estimand has four attributes.\n\n' +
      '[Source: ich_e9.pdf | chunk 7]\nIntercurrent events occur after treatment initiation.'
    );
  });

  it('should keep the order received', () => {
    const context = buildContextBlock([
      { text: 'b', source: 'fda.pdf', chunkIndex: 9 },
      { text: 'a', source: 'ich_e6.pdf', chunkIndex: 1 }
    ]);

    expect(context.indexOf('[Source: fda.pdf | chunk 9]')).toBeLessThan(
      context.indexOf('[Source: ich_e6.pdf | chunk 1]')
    );
  });

  it('should keep chunk text as-is', () => {
    const context = buildContextBlock([{ text: '  padded\n', source: 'a.pdf', chunkIndex: 0 }]);

    expect(context).toBe('[Source: a.pdf | chunk 0]\n  padded\n');
  });

  it('should return an empty string for no chunks', () => {
    expect(buildContextBlock([])).toBe('');
  });

  it('should format a single header', () => {
    expect(formatProvenanceHeader({ text: '', source: 'ich_e6.pdf', chunkIndex: 0 }))
      .toBe('[Source: ich_e6.pdf | chunk 0]');
  });
});
