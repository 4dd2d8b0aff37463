import * as fs from "fs";
import * as path from "path";
import { LadderPlanner } from "./src/planner/ladderPlanner";
import { LadderError } from "./src/engine/errors";

/**
 * Build a gilt ladder from a request file and write the plan as JSON.
 * Usage: npx ts-node run-ladder.ts [input-file] [output-file]
 * Defaults: example-request.json, ladder-output.json
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputPath = process.argv[3] ?? "ladder-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

let planner: LadderPlanner;
try {
  planner = LadderPlanner.fromRequest(inputData);
} catch (err) {
  if (err instanceof LadderError) {
    console.error(`${err.name}: ${err.message}`);
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
    process.exit(1);
  }
  throw err;
}

console.log("Building ladder...");
const plan = planner.plan();
fs.writeFileSync(outputPath, JSON.stringify(plan, null, 2));
console.log(`Ladder output saved to ${outputPath}`);

console.log(
  `\n${plan.rungs.length} rungs, £${plan.totalAllocated.toFixed(2)} allocated, ` +
    `£${plan.projectedAnnualIncome.toFixed(2)} projected income (${plan.incomeGap.status}), ` +
    `tax drag ${plan.estimatedTaxDrag.toFixed(1)}%, ` +
    `net income ${plan.tax.netPercentOfTarget.toFixed(1)}% of target`
);
