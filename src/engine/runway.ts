import {
  DepletingRunway,
  HomeSaleEvent,
  RunwayOptions,
  RunwayPoint,
  RunwayResult,
} from "../models/RunwaySeries";
import { DEFAULT_DISPLAY_CAP_YEARS, DEFAULT_RUNWAY_HORIZON_MONTHS } from "../utils/constants";
import { ValidationError } from "../utils/errors";
import { roundToCents } from "../utils/math";
import { monthsToYears } from "../utils/time";

/**
 * Build a home sale event. Net proceeds never go below zero.
 *
 * @param salePrice - Expected sale price
 * @param costs - Selling fees, repairs, liens and mortgage payoff combined
 * @param month - Month index at which the proceeds become available
 */
export function createHomeSaleEvent(salePrice: number, costs: number, month: number): HomeSaleEvent {
  if (!Number.isInteger(month) || month < 0) {
    throw new ValidationError(`Home sale month must be a whole number of months, got ${month}`, "home_sale_month");
  }
  return {
    month,
    salePrice,
    costs,
    netProceeds: roundToCents(Math.max(0, salePrice - costs)),
  };
}

function requireAmount(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Month-by-month balances, produced lazily. Each iteration starts again from
 * month 0, so the series can be consumed any number of times.
 *
 * Month 0 is the starting balance (plus proceeds of a month-0 sale). From
 * month 1 on, sale proceeds due that month are added before the month's
 * shortfall is deducted. The series ends at the first balance <= 0 or at the
 * horizon.
 */
export function runwaySeries(
  startingBalance: number,
  monthlyShortfall: number,
  homeSale: HomeSaleEvent | null,
  horizonMonths: number = DEFAULT_RUNWAY_HORIZON_MONTHS
): Iterable<RunwayPoint> {
  return {
    *[Symbol.iterator](): Generator<RunwayPoint> {
      let balance = startingBalance;
      for (let month = 0; month <= horizonMonths; month++) {
        const events: string[] = [];
        if (homeSale && homeSale.month === month) {
          balance += homeSale.netProceeds;
          events.push(`home_sale:${homeSale.netProceeds}`);
        }
        if (month > 0) {
          balance = roundToCents(balance - monthlyShortfall);
        }
        yield events.length > 0 ? { month, balance, events } : { month, balance };
        if (balance <= 0) {
          return;
        }
      }
    },
  };
}

/**
 * Project how long liquid assets last.
 *
 * The monthly shortfall is max(0, cost - income). When income covers cost
 * the result is the non-depleting sentinel and no series is produced.
 */
export function runway(
  totalMonthlyIncome: number,
  totalMonthlyCost: number,
  liquidAssets: number,
  homeSale?: HomeSaleEvent | null,
  options: RunwayOptions = {}
): RunwayResult {
  requireAmount("Monthly income", totalMonthlyIncome);
  requireAmount("Monthly cost", totalMonthlyCost);
  requireAmount("Liquid assets", liquidAssets);
  const horizonMonths = options.horizonMonths ?? DEFAULT_RUNWAY_HORIZON_MONTHS;
  if (!Number.isInteger(horizonMonths) || horizonMonths < 1) {
    throw new ValidationError(`Runway horizon must be at least 1 month, got ${horizonMonths}`);
  }

  const shortfall = roundToCents(Math.max(0, totalMonthlyCost - totalMonthlyIncome));
  if (shortfall === 0) {
    return { kind: "non_depleting", monthlyShortfall: 0, startingBalance: liquidAssets };
  }

  const sale = homeSale ?? null;
  const result: DepletingRunway = {
    kind: "depleting",
    monthlyShortfall: shortfall,
    startingBalance: liquidAssets,
    horizonMonths,
    homeSale: sale,
    series: runwaySeries(liquidAssets, shortfall, sale, horizonMonths),
  };
  return result;
}

/**
 * First month with a balance at or below zero, or null when assets never
 * run out within the horizon.
 */
export function depletionMonth(result: RunwayResult): number | null {
  if (result.kind === "non_depleting") {
    return null;
  }
  for (const point of result.series) {
    if (point.balance <= 0) {
      return point.month;
    }
  }
  return null;
}

/**
 * Whether a scheduled home sale's proceeds entered the series. A sale due
 * after the depletion month never does.
 */
export function homeSaleApplied(result: RunwayResult): boolean {
  if (result.kind === "non_depleting" || result.homeSale === null) {
    return false;
  }
  const month = depletionMonth(result);
  return month === null || result.homeSale.month <= month;
}

export interface YearsFunded {
  years: number;
  capped: boolean;
}

/**
 * Years until depletion, capped for display. Non-depleting runways and
 * runways that outlast the horizon report the cap.
 */
export function yearsFunded(result: RunwayResult, capYears: number = DEFAULT_DISPLAY_CAP_YEARS): YearsFunded {
  const month = depletionMonth(result);
  if (month === null) {
    return { years: capYears, capped: true };
  }
  const years = monthsToYears(month);
  if (years >= capYears) {
    return { years: capYears, capped: true };
  }
  return { years: Math.round(years * 100) / 100, capped: false };
}

/**
 * Materialize up to `limit` points of a runway; the non-depleting sentinel
 * yields a single flat point.
 */
export function collectPoints(result: RunwayResult, limit: number = Number.POSITIVE_INFINITY): RunwayPoint[] {
  if (result.kind === "non_depleting") {
    return [{ month: 0, balance: result.startingBalance }];
  }
  const points: RunwayPoint[] = [];
  for (const point of result.series) {
    if (points.length >= limit) {
      break;
    }
    points.push(point);
  }
  return points;
}
