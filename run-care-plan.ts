import * as fs from "fs";
import { CarePlanner } from "./src/planner/carePlanner";
import { loadResolvedSchema } from "./src/schema/schemaResolver";
import { loadConfig } from "./src/utils/config";
import { errorMessage } from "./src/utils/errors";
import { formatCurrency } from "./src/utils/format";
import { formatMonthIndex } from "./src/utils/time";

/**
 * Plan a saved plan file and write the summary to care-plan-output.json
 * (generated in project root).
 * Usage: npx ts-node run-care-plan.ts [plan-file]
 * Default input: example-plan.json
 */
const inputPath = process.argv[2] ?? "example-plan.json";

let planner: CarePlanner;
try {
  const config = loadConfig();
  planner = new CarePlanner(loadResolvedSchema(config.schemaPath, config.overlayPath ?? undefined));
} catch (err) {
  console.error(`Failed to load schema: ${errorMessage(err)}`);
  process.exit(1);
}

const state = planner.createState();
try {
  const { ignoredKeys } = state.loadFromFile(inputPath);
  if (ignoredKeys.length > 0) {
    console.warn(`Ignoring unknown fields: ${ignoredKeys.join(", ")}`);
  }
} catch (err) {
  console.error(`Failed to load plan "${inputPath}": ${errorMessage(err)}`);
  process.exit(1);
}

const summary = planner.plan(state);

console.log(`Plan for ${summary.names.A}${summary.names.B ? ` and ${summary.names.B}` : ""}`);
for (const person of summary.costs.persons) {
  console.log(`  Care for ${person.name} (${person.careType}): ${formatCurrency(person.grossCost)}`);
}
console.log(`  Total monthly cost: ${formatCurrency(summary.costs.householdTotal)}`);
console.log(`  Household income:  ${formatCurrency(summary.income.total)}`);
console.log(`  Monthly gap:        ${formatCurrency(summary.monthlyGap)}`);
console.log(`  Liquid assets:      ${formatCurrency(summary.assets.total)}`);
if (summary.runway.kind === "non_depleting") {
  console.log("  Income covers costs; assets are not drawn down.");
} else if (summary.runway.depletionMonth === null) {
  console.log(`  Assets last beyond ${summary.runway.yearsFunded} years.`);
} else {
  console.log(`  Assets run out at ${formatMonthIndex(summary.runway.depletionMonth)} (${summary.runway.yearsFunded} years).`);
}

fs.writeFileSync("care-plan-output.json", JSON.stringify(summary, null, 2));
console.log("\nSummary saved to care-plan-output.json");
