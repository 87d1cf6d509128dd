import { lineTotal, parsePrice, sumTotals, toPence } from '../money';

describe('money helpers', () => {
  test('line totals are exact to the penny', () => {
    expect(lineTotal(9.5, 2)).toBe(19);
    expect(lineTotal(0.1, 3)).toBe(0.3);
    expect(toPence(4.35)).toBe(435);
  });

  test('sums without floating point drift', () => {
    expect(sumTotals([0.1, 0.2])).toBe(0.3);
    expect(sumTotals([])).toBe(0);
  });

  test.each([
    [9.99, 9.99],
    ['9.99', 9.99],
    ['£12.50', 12.5],
    ['9,99', 9.99],
    [' 7 ', 7],
  ])('parses %p as %p', (input, expected) => {
    expect(parsePrice(input)).toBe(expected);
  });

  test.each([['abc'], [''], ['-1'], [-2], [Number.NaN], [null]])('rejects %p', (input) => {
    expect(parsePrice(input)).toBeNull();
  });
});
