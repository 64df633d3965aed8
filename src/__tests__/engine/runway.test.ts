import {
  collectPoints,
  createHomeSaleEvent,
  depletionMonth,
  homeSaleApplied,
  runway,
  runwaySeries,
  yearsFunded,
} from '../../engine/runway';
import { ValidationError } from '../../utils/errors';

describe('createHomeSaleEvent', () => {
  it('should net costs out of the sale price', () => {
    expect(createHomeSaleEvent(300000, 50000, 6)).toEqual({
      month: 6,
      salePrice: 300000,
      costs: 50000,
      netProceeds: 250000,
    });
  });

  it('should not let net proceeds go negative', () => {
    expect(createHomeSaleEvent(100000, 120000, 0).netProceeds).toBe(0);
  });

  it('should reject a fractional or negative month', () => {
    expect(() => createHomeSaleEvent(100000, 0, 1.5)).toThrow(ValidationError);
    expect(() => createHomeSaleEvent(100000, 0, -1)).toThrow(ValidationError);
  });
});

describe('runway', () => {
  it('should return the non-depleting sentinel when income covers cost', () => {
    expect(runway(3000, 2000, 12000)).toEqual({ kind: 'non_depleting', monthlyShortfall: 0, startingBalance: 12000 });
  });

  it('should treat equal income and cost as non-depleting', () => {
    expect(runway(2500, 2500, 0).kind).toBe('non_depleting');
  });

  it('should deplete assets by the monthly shortfall', () => {
    const result = runway(2000, 3000, 12000);
    expect(result.kind).toBe('depleting');
    expect(result.monthlyShortfall).toBe(1000);

    const points = collectPoints(result);
    expect(points).toHaveLength(13);
    expect(points[0]).toEqual({ month: 0, balance: 12000 });
    expect(points[6]).toEqual({ month: 6, balance: 6000 });
    expect(points[12]).toEqual({ month: 12, balance: 0 });
    expect(depletionMonth(result)).toBe(12);
  });

  it('should be depleted at month 0 without assets', () => {
    const result = runway(0, 1000, 0);
    expect(collectPoints(result)).toEqual([{ month: 0, balance: 0 }]);
    expect(depletionMonth(result)).toBe(0);
  });

  it('should add home sale proceeds in the sale month', () => {
    const sale = createHomeSaleEvent(4000, 1000, 3);
    const result = runway(0, 1000, 5000, sale);
    const points = collectPoints(result);
    expect(points[2]).toEqual({ month: 2, balance: 3000 });
    expect(points[3]).toEqual({ month: 3, balance: 5000, events: ['home_sale:3000'] });
    expect(depletionMonth(result)).toBe(8);
  });

  it('should add a month-0 sale to the starting balance', () => {
    const sale = createHomeSaleEvent(5000, 0, 0);
    const result = runway(0, 1000, 0, sale);
    expect(collectPoints(result, 1)).toEqual([{ month: 0, balance: 5000, events: ['home_sale:5000'] }]);
    expect(depletionMonth(result)).toBe(5);
  });

  it('should stop at depletion even with a later sale pending', () => {
    const sale = createHomeSaleEvent(100000, 0, 5);
    const result = runway(0, 1000, 2000, sale);
    expect(collectPoints(result)).toHaveLength(3);
    expect(depletionMonth(result)).toBe(2);
  });

  it('should stop at the horizon when assets last', () => {
    const result = runway(0, 1000, 1000000);
    const points = collectPoints(result);
    expect(points).toHaveLength(361);
    expect(points[360]).toEqual({ month: 360, balance: 640000 });
    expect(depletionMonth(result)).toBeNull();
  });

  it('should honour a custom horizon', () => {
    const result = runway(0, 1000, 100000, null, { horizonMonths: 12 });
    expect(collectPoints(result)).toHaveLength(13);
  });

  it('should round the shortfall to cents', () => {
    expect(runway(1000.004, 2000, 0).monthlyShortfall).toBe(1000);
  });

  it('should reject negative amounts', () => {
    expect(() => runway(-1, 1000, 0)).toThrow('Monthly income must be a non-negative number, got -1');
    expect(() => runway(0, 1000, -5)).toThrow(ValidationError);
  });

  it('should reject a horizon below one month', () => {
    expect(() => runway(0, 1000, 0, null, { horizonMonths: 0 })).toThrow(ValidationError);
  });
});

describe('runwaySeries', () => {
  it('should restart from month 0 on every iteration', () => {
    const series = runwaySeries(3000, 1000, null, 360);
    const first = Array.from(series);
    const second = Array.from(series);
    expect(first).toEqual(second);
    expect(first.map((p) => p.balance)).toEqual([3000, 2000, 1000, 0]);
  });

  it('should produce points lazily', () => {
    const iterator = runwaySeries(1000000, 1, null, 1000000)[Symbol.iterator]();
    iterator.next();
    expect(iterator.next().value).toEqual({ month: 1, balance: 999999 });
  });
});

describe('yearsFunded', () => {
  it('should convert the depletion month to years', () => {
    expect(yearsFunded(runway(2000, 3000, 12000))).toEqual({ years: 1, capped: false });
    expect(yearsFunded(runway(0, 1000, 18000))).toEqual({ years: 1.5, capped: false });
  });

  it('should cap runways that never deplete', () => {
    expect(yearsFunded(runway(3000, 2000, 0))).toEqual({ years: 30, capped: true });
  });

  it('should cap runways that outlast the horizon', () => {
    expect(yearsFunded(runway(0, 1000, 1000000))).toEqual({ years: 30, capped: true });
  });

  it('should cap at a custom limit', () => {
    expect(yearsFunded(runway(0, 1000, 24000), 1)).toEqual({ years: 1, capped: true });
  });

  it('should report zero years when already depleted', () => {
    expect(yearsFunded(runway(0, 1000, 0))).toEqual({ years: 0, capped: false });
  });
});

describe('collectPoints', () => {
  it('should return a single flat point for a non-depleting runway', () => {
    expect(collectPoints(runway(3000, 2000, 5000))).toEqual([{ month: 0, balance: 5000 }]);
  });

  it('should respect the limit', () => {
    expect(collectPoints(runway(0, 1000, 10000), 3).map((p) => p.month)).toEqual([0, 1, 2]);
  });
});

describe('homeSaleApplied', () => {
  it('should be true when the sale month is reached', () => {
    expect(homeSaleApplied(runway(0, 1000, 5000, createHomeSaleEvent(4000, 1000, 3)))).toBe(true);
  });

  it('should be false when assets run out before the sale', () => {
    const result = runway(0, 1000, 0, createHomeSaleEvent(100000, 0, 3));
    expect(depletionMonth(result)).toBe(0);
    expect(homeSaleApplied(result)).toBe(false);
  });

  it('should be false without a sale or a shortfall', () => {
    expect(homeSaleApplied(runway(0, 1000, 5000))).toBe(false);
    expect(homeSaleApplied(runway(3000, 2000, 0, createHomeSaleEvent(5000, 0, 1)))).toBe(false);
  });
});
