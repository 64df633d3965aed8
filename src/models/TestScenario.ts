/**
 * Scenario schema for exercising the planner end to end.
 *
 * Scenarios carry flat field values, the same shape as a saved plan, so they
 * can be fed to CarePlanner.planFromValues or written out as plan files.
 */
import { RawFieldValue } from "../utils/validation";

export type HouseholdProfileType = "single" | "couple";

export type CareSettingType = "stay_home" | "in_home" | "facility" | "mixed";

export type FundingProfileType = "income_covers" | "depleting" | "home_sale";

export interface ScenarioClassification {
  household: HouseholdProfileType;
  careSetting: CareSettingType;
  funding: FundingProfileType;
}

export type EdgeCaseTag = "va_shared_benefit" | "shared_unit" | "sale_after_depletion" | "beyond_horizon";

export interface CareTestScenario {
  id: string;
  name: string;
  classification: ScenarioClassification;
  description: string;
  inputs: Record<string, RawFieldValue>;

  /**
   * `expectDepletion` describes the intent of the scenario,
   * not what the planner computes.
   */
  meta: {
    expectDepletion: boolean;
    notes?: string;
    edgeTags?: EdgeCaseTag[];
  };
}
