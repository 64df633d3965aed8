import { ResolvedSchema } from "../models/Schema";
import { PlanSummary, RunwaySummary } from "../models/PlanSummary";
import { RunwayResult } from "../models/RunwaySeries";
import { enforceModelBounds, householdCost } from "../engine/costModel";
import {
  coverageRatio,
  homeSaleFromState,
  householdIncome,
  liquidAssets,
  monthlyGap,
} from "../engine/affordability";
import { collectPoints, depletionMonth, homeSaleApplied, runway, yearsFunded } from "../engine/runway";
import { InputState } from "../state/inputState";
import { isPersonBIncluded, personName } from "../state/selectors";
import { RawFieldValue } from "../utils/validation";

/**
 * Planning context shared by every session of one resolved schema.
 */
interface PlanningContext {
  schema: ResolvedSchema;
}

/**
 * Turns session values into a plan summary.
 *
 * The pipeline is: income (needed for income-tested VA benefits) → household
 * cost breakdown → liquid assets and home sale → runway. Every call
 * recomputes from the state it is given; the planner keeps no session data.
 */
export class CarePlanner {
  private context: PlanningContext;

  constructor(schema: ResolvedSchema) {
    this.context = { schema };
  }

  getSchema(): ResolvedSchema {
    return this.context.schema;
  }

  /**
   * New session seeded with schema defaults
   */
  createState(): InputState {
    return InputState.fromSchema(this.context.schema);
  }

  /**
   * Build a fresh session from flat values and plan it. Invalid values are
   * replaced by defaults and reported in `flaggedFields`.
   */
  planFromValues(values: Record<string, RawFieldValue>): PlanSummary {
    const state = this.createState();
    state.setMany(values);
    return this.plan(state);
  }

  /**
   * Plan a session. Values outside what the cost formulas accept are reset
   * to their defaults and reported in `flaggedFields`.
   */
  plan(state: InputState): PlanSummary {
    const { settings } = state.getSchema();
    enforceModelBounds(state);

    const income = householdIncome(state);
    const costs = householdCost(state, { countableIncome: income.total });
    const assets = liquidAssets(state);
    const homeSale = homeSaleFromState(state);

    const result = runway(income.total, costs.householdTotal, assets.total, homeSale, {
      horizonMonths: settings.runwayHorizonMonths,
    });

    return {
      names: {
        A: personName(state, "A"),
        B: isPersonBIncluded(state) ? personName(state, "B") : null,
      },
      costs,
      income,
      assets,
      homeSale,
      monthlyGap: monthlyGap(costs.householdTotal, income.total),
      coverageRatio: coverageRatio(income.total, costs.householdTotal),
      runway: this.summarizeRunway(result, settings.displayCapYears),
      flaggedFields: state.flaggedFields(),
    };
  }

  private summarizeRunway(result: RunwayResult, capYears: number): RunwaySummary {
    const funded = yearsFunded(result, capYears);
    return {
      kind: result.kind,
      monthlyShortfall: result.monthlyShortfall,
      depletionMonth: depletionMonth(result),
      homeSaleApplied: homeSaleApplied(result),
      yearsFunded: funded.years,
      yearsFundedCapped: funded.capped,
      points: collectPoints(result),
    };
  }
}
