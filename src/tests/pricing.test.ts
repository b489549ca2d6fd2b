import { ValidationError } from '../errors';
import { caught } from './__mocks__/helpers';
import { computePrice, multiplierFor, priceBreakdown, tierOf } from '../services/pricing';

describe('pricing: computePrice', () => {
  test('guest pays daily rate times calendar days', () => {
    expect(computePrice('2024-01-01', '2024-01-04', 100, 'guest')).toBe(300);
  });

  test('registered client gets the 0.94 multiplier', () => {
    expect(computePrice('2024-01-01', '2024-01-04', 100, 'registered_client')).toBeCloseTo(282, 10);
  });

  test('registered price is exactly 0.94 times the guest price', () => {
    const cases: Array<[string, string, number]> = [
      ['2024-01-01', '2024-01-04', 100],
      ['2024-02-27', '2024-03-02', 37.5],
      ['2023-12-30', '2024-01-02', 219.99]
    ];
    for (const [start, end, rate] of cases) {
      const guest = computePrice(start, end, rate, 'guest');
      expect(computePrice(start, end, rate, 'registered_client')).toBe(0.94 * guest);
    }
  });

  test('is pure: same inputs give the same output', () => {
    const a = computePrice('2024-05-01', '2024-05-11', 55.5, 'registered_client');
    const b = computePrice('2024-05-01', '2024-05-11', 55.5, 'registered_client');
    expect(a).toBe(b);
  });

  test('unknown tier falls back to full price', () => {
    expect(computePrice('2024-01-01', '2024-01-03', 80, 'admin')).toBe(160);
    expect(computePrice('2024-01-01', '2024-01-03', 80, 'gold')).toBe(160);
    expect(multiplierFor('toString')).toBe(1);
  });

  test('counts calendar days across a leap day and a month boundary', () => {
    expect(priceBreakdown('2024-02-28', '2024-03-01', 10, 'guest').days).toBe(2);
    expect(priceBreakdown('2023-02-28', '2023-03-01', 10, 'guest').days).toBe(1);
  });

  test('a single day rental costs one daily rate', () => {
    expect(computePrice('2024-06-10', '2024-06-11', 64.25, 'guest')).toBe(64.25);
  });

  test('no rounding is applied', () => {
    expect(computePrice('2024-01-01', '2024-01-02', 33.333, 'guest')).toBe(33.333);
  });

  test.each([
    ['2024-01-05', '2024-01-01'],
    ['2024-01-01', '2024-01-01']
  ])('rejects %s -> %s as inverted_range', (start, end) => {
    const err = caught(() => computePrice(start, end, 100, 'guest'));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: 'inverted_range' });
  });

  test.each(['2024/01/01', '2024-1-01', '2024-02-30', 'yesterday', ''])('rejects %p as bad_date_format', (bad) => {
    expect(caught(() => computePrice(bad, '2024-12-31', 100, 'guest'))).toMatchObject({ code: 'bad_date_format' });
  });

  test.each([0, -10, Number.NaN, Number.POSITIVE_INFINITY])('rejects daily rate %p', (rate) => {
    expect(caught(() => computePrice('2024-01-01', '2024-01-02', rate, 'guest'))).toMatchObject({ code: 'bad_rate' });
  });
});

describe('pricing: priceBreakdown and tiers', () => {
  test('breakdown carries the discount percent', () => {
    expect(priceBreakdown('2024-01-01', '2024-01-04', 100, 'registered_client')).toMatchObject({
      days: 3,
      dailyRate: 100,
      tier: 'registered_client',
      multiplier: 0.94,
      discountPercent: 6
    });
    expect(priceBreakdown('2024-01-01', '2024-01-04', 100, 'guest').discountPercent).toBe(0);
  });

  test('tierOf maps users to tiers', () => {
    expect(tierOf()).toBe('guest');
    expect(tierOf({ role: 'client' })).toBe('registered_client');
    expect(tierOf({ role: 'admin' })).toBe('admin');
  });
});
