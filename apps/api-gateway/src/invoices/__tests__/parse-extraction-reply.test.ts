import { firstBalancedObject, parseExtractionReply } from '../extraction/parse-extraction-reply';

describe('parseExtractionReply', () => {
  it('reads the known fields and stringifies non-string values', () => {
    const fields = parseExtractionReply(
      '{"invoice_number":"INV-1","total_amount":120.5,"tax_amount":null,"notes":"dropped"}',
    );

    expect(fields).toEqual({
      invoice_number: 'INV-1',
      invoice_date: '',
      vendor_name: '',
      customer_name: '',
      total_amount: '120.5',
      tax_amount: '',
    });
  });

  it('salvages the first object from a chatty reply', () => {
    const fields = parseExtractionReply('Here you go: {"vendor_name":"Acme {Ltd}"} hope it helps');
    expect(fields.vendor_name).toBe('Acme {Ltd}');
  });

  it('encodes nested values as JSON', () => {
    const fields = parseExtractionReply('{"customer_name":{"first":"Ann"}}');
    expect(fields.customer_name).toBe('{"first":"Ann"}');
  });

  it.each([['no json here'], ['[1,2]'], ['{"invoice_number": "1"'], ['']])(
    'returns empty fields for %j',
    (reply) => {
      expect(Object.values(parseExtractionReply(reply))).toEqual(['', '', '', '', '', '']);
    },
  );
});

describe('firstBalancedObject', () => {
  it('ignores braces and escaped quotes inside strings', () => {
    expect(firstBalancedObject('{"b":"x\\"}"} tail')).toBe('{"b":"x\\"}"}');
  });

  it('returns null when the object never closes', () => {
    expect(firstBalancedObject('text {"a": {"b": 1}')).toBeNull();
  });
});
