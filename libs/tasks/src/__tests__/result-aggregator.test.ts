import { ResultAggregator } from '../result-aggregator';

describe('ResultAggregator', () => {
  it('joins pages in order and counts them', () => {
    expect(ResultAggregator.aggregate(['Invoice 42', '', 'Total 10.00'])).toEqual({
      pages: ['Invoice 42', '', 'Total 10.00'],
      fullText: 'Invoice 42\n\nTotal 10.00',
      pagesProcessed: 3,
    });
  });

  it('produces an empty result for zero pages', () => {
    expect(ResultAggregator.aggregate([])).toEqual({
      pages: [],
      fullText: '',
      pagesProcessed: 0,
    });
  });

  it('does not alias the input array', () => {
    const input = ['a'];
    const result = ResultAggregator.aggregate(input);
    input.push('b');
    expect(result.pages).toEqual(['a']);
  });

  describe('fromUnknown', () => {
    it('accepts a consistent result', () => {
      const stored = { pages: ['a', 'b'], fullText: 'a\nb', pagesProcessed: 2 };
      expect(ResultAggregator.fromUnknown(stored)).toEqual(stored);
    });

    it('rejects non-string pages', () => {
      expect(
        ResultAggregator.fromUnknown({ pages: [1], fullText: '1', pagesProcessed: 1 }),
      ).toBeNull();
    });

    it('rejects a full text that does not match the pages', () => {
      expect(
        ResultAggregator.fromUnknown({ pages: ['a'], fullText: 'b', pagesProcessed: 1 }),
      ).toBeNull();
    });

    it('rejects non-objects', () => {
      expect(ResultAggregator.fromUnknown('a\nb')).toBeNull();
      expect(ResultAggregator.fromUnknown(null)).toBeNull();
    });
  });
});
