/**
 * Asset runway data structures
 */

export interface RunwayPoint {
  month: number;
  balance: number;
  events?: string[]; // e.g. ["home_sale:85000"]
}

export interface HomeSaleEvent {
  month: number;
  salePrice: number;
  costs: number; // selling fees, repairs, liens and mortgage payoff
  netProceeds: number;
}

export interface RunwayOptions {
  horizonMonths?: number;
}

export interface NonDepletingRunway {
  kind: "non_depleting";
  monthlyShortfall: 0;
  startingBalance: number;
}

export interface DepletingRunway {
  kind: "depleting";
  monthlyShortfall: number;
  startingBalance: number;
  horizonMonths: number;
  homeSale: HomeSaleEvent | null;
  series: Iterable<RunwayPoint>; // lazy and restartable
}

export type RunwayResult = NonDepletingRunway | DepletingRunway;
