import * as fs from "fs";
import * as path from "path";
import { calculateAll } from "./src/engine/roiCalculator";
import { createAssumptions } from "./src/models/Assumptions";
import { getAvailableIndustries, getIndustryBenchmarkDso } from "./src/models/IndustryBenchmark";
import { DEFAULT_INPUT_FILE } from "./src/utils/constants";
import { formatRoiSummary } from "./src/utils/format";
import { RoiRequestSchema } from "./src/utils/validation";

/**
 * Print an ROI summary for the inputs in a JSON file shaped like example-request.json.
 * Usage: npx ts-node run-roi.ts [input-file]
 */
const inputPath = process.argv[2] ?? DEFAULT_INPUT_FILE;

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const parsed = RoiRequestSchema.safeParse(inputData);
if (!parsed.success) {
  console.error(`Input file "${inputPath}" is invalid:`);
  for (const issue of parsed.error.issues) {
    console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
  }
  process.exit(1);
}

console.log("Available industries with benchmark data:");
for (const industry of getAvailableIndustries()) {
  console.log(`  - ${industry}: ${getIndustryBenchmarkDso(industry)} days DSO`);
}
console.log();

try {
  const { inputs } = parsed.data;
  const results = calculateAll(inputs, createAssumptions(parsed.data.assumptions));
  for (const line of formatRoiSummary(inputs, results)) {
    console.log(line);
  }
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`ROI calculation failed: ${message}`);
  process.exit(1);
}
