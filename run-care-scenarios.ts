import * as fs from "fs";
import * as path from "path";
import { CarePlanner } from "./src/planner/carePlanner";
import { loadResolvedSchema } from "./src/schema/schemaResolver";
import { careScenarios } from "./src/testScenarios/careScenarios";
import { CareTestScenario } from "./src/models/TestScenario";
import { PlanSummary } from "./src/models/PlanSummary";
import { loadConfig } from "./src/utils/config";
import { formatCurrency } from "./src/utils/format";

interface ScenarioRunResult {
  scenario: CareTestScenario;
  summary: PlanSummary;
}

/**
 * Run every care scenario and generate a markdown report under docs/.
 *
 * Usage:
 *   npx ts-node run-care-scenarios.ts
 */

function renderRow({ scenario, summary }: ScenarioRunResult): string {
  const runway =
    summary.runway.kind === "non_depleting"
      ? "never"
      : summary.runway.depletionMonth === null
        ? `> ${summary.runway.yearsFunded}y`
        : `month ${summary.runway.depletionMonth}`;
  const expected = scenario.meta.expectDepletion ? "depletes" : "covered";
  return `| ${scenario.name} | ${formatCurrency(summary.costs.householdTotal)} | ${formatCurrency(
    summary.income.total
  )} | ${formatCurrency(summary.monthlyGap)} | ${runway} | ${expected} |`;
}

const config = loadConfig();
const planner = new CarePlanner(loadResolvedSchema(config.schemaPath, config.overlayPath ?? undefined));

const runs: ScenarioRunResult[] = careScenarios.map((scenario) => ({
  scenario,
  summary: planner.planFromValues(scenario.inputs),
}));

const lines = [
  "# Care scenarios",
  "",
  "| Scenario | Monthly cost | Income | Gap | Assets run out | Intent |",
  "|----------|--------------|--------|-----|----------------|--------|",
  ...runs.map(renderRow),
  "",
];

const docsDir = path.resolve("docs");
fs.mkdirSync(docsDir, { recursive: true });
fs.writeFileSync(path.join(docsDir, "care-scenarios.md"), lines.join("\n"));
console.log(lines.join("\n"));
console.log(`Report written to ${path.join(docsDir, "care-scenarios.md")}`);
