import { CareTestScenario } from "../models/TestScenario";

// Household personas (rough US figures): a widowed retiree on Social
// Security, a couple with a pension, a veteran couple selling the house.

export const careScenarios: CareTestScenario[] = [
  {
    id: "single_stay_home_covered",
    name: "Single retiree staying home",
    classification: { household: "single", careSetting: "stay_home", funding: "income_covers" },
    description: "No paid care; Social Security and a pension cover the home costs.",
    inputs: {
      name_a: "Alex",
      care_type_a: "none",
      ss_a: 2100,
      pension_a: 900,
      mortgage: 800,
      utilities: 250,
      medicare: 175,
      cash_savings: 40000,
    },
    meta: { expectDepletion: false },
  },
  {
    id: "single_in_home_depleting",
    name: "Single retiree with part-time in-home care",
    classification: { household: "single", careSetting: "in_home", funding: "depleting" },
    description: "Six hours a day, five days a week of in-home care drawn from savings.",
    inputs: {
      name_a: "Alex",
      care_type_a: "in_home",
      hours_per_day_a: 6,
      days_per_week_a: 5,
      mobility_a: "walker",
      ss_a: 1900,
      cash_savings: 60000,
      ira_total: 45000,
      home_mod_cost: 4800,
      home_mod_months: 24,
    },
    meta: { expectDepletion: true },
  },
  {
    id: "couple_facility_shared_unit",
    name: "Couple sharing an assisted living unit",
    classification: { household: "couple", careSetting: "facility", funding: "home_sale" },
    description: "Both move into one unit; the house sells after six months.",
    inputs: {
      name_a: "Sam",
      name_b: "Jo",
      include_person_b: true,
      care_type_a: "assisted_living",
      care_type_b: "assisted_living",
      room_type_a: "one_bedroom",
      room_type_b: "one_bedroom",
      share_one_unit: true,
      home_plan: "sell",
      home_sale_price: 420000,
      home_mortgage_payoff: 60000,
      home_selling_costs: 25000,
      home_sale_month: 6,
      ss_a: 2300,
      ss_b: 1500,
      pension_a: 1200,
      cash_savings: 35000,
    },
    meta: { expectDepletion: true, edgeTags: ["shared_unit"] },
  },
  {
    id: "veteran_couple_memory_care",
    name: "Veteran couple, one in memory care",
    classification: { household: "couple", careSetting: "mixed", funding: "depleting" },
    description: "Both partners reference the same VA household benefit; it is deducted once.",
    inputs: {
      name_a: "Pat",
      name_b: "Lee",
      include_person_b: true,
      care_type_a: "memory_care",
      care_level_a: "high",
      mobility_a: "wheelchair",
      chronic_a: "some",
      care_type_b: "none",
      va_category_a: "veteran_with_spouse",
      va_category_b: "veteran_with_spouse",
      ss_a: 1800,
      ss_b: 900,
      brokerage_taxable: 150000,
      cash_savings: 30000,
    },
    meta: { expectDepletion: true, edgeTags: ["va_shared_benefit"] },
  },
];
