import * as fs from "fs";
import * as path from "path";
import { runSimulation, withDefaults } from "../simulator/forexSimulator";
import { generateForexGraphHTML } from "../utils/graphGenerator";
import { formatNumber, formatTableValue } from "../utils/format";
import { InvalidInputError } from "../utils/errors";
import { isPlainObject } from "../utils/validation";
import { SimulationResult } from "../models/SimulationResult";

export const DEFAULT_INPUT_FILE = "example-request.json";
export const DEFAULT_OUTPUT_DIR = "graphs";
export const GRAPH_FILE_NAME = "forex-simulation.html";

/**
 * Runs a simulation from an input file, prints the results table and writes the chart
 * to <output-dir>/forex-simulation.html.
 *
 * @param args - [input-file, output-dir], both optional
 * @returns Process exit code: 0 on success, 1 when the input cannot be read, parsed or validated
 */
export function runSimulationCli(args: string[]): number {
  const inputPath = path.resolve(args[0] ?? DEFAULT_INPUT_FILE);
  const outputDir = path.resolve(args[1] ?? DEFAULT_OUTPUT_DIR);

  let inputData: unknown;
  try {
    inputData = JSON.parse(fs.readFileSync(inputPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
    return 1;
  }

  if (!isPlainObject(inputData)) {
    console.error("Input file must contain a JSON object with simulation inputs.");
    return 1;
  }

  console.log(`Using input: ${inputPath}\n`);

  let simulation: SimulationResult;
  try {
    simulation = runSimulation(withDefaults(inputData));
  } catch (err) {
    if (err instanceof InvalidInputError) {
      console.error("Invalid simulation inputs:");
      err.issues.forEach((issue) => console.error(`  - ${issue}`));
      return 1;
    }
    throw err;
  }

  const { inputs, recommendation } = simulation;

  console.log("Simulation parameters:");
  console.log(`  Budget:                       ${formatNumber(inputs.budget, 2)}`);
  console.log(`  Direct rate:                  ${formatNumber(inputs.directRate, 4)}`);
  console.log(`  Home→intermediate rate:       ${formatNumber(inputs.homeToIntermediateRate, 4)}`);
  console.log(
    `  Intermediate→foreign range:   ${formatNumber(inputs.rateRange.min, 2)} – ${formatNumber(inputs.rateRange.max, 2)}`
  );

  console.log(`\nResults at midpoint rate ${formatNumber(simulation.midpointRate, 2)}:`);
  for (const row of simulation.resultsTable) {
    console.log(`  ${row.scenario.padEnd(38)} ${formatTableValue(row).padStart(14)}`);
  }

  if (recommendation.betterRoute === "tie") {
    console.log("\nBoth routes yield the same amount.");
  } else {
    console.log(
      `\nThe ${recommendation.betterRoute} route yields ${formatNumber(recommendation.advantage, 2)} more foreign units.`
    );
  }

  generateForexGraphHTML(simulation, path.join(outputDir, GRAPH_FILE_NAME));
  console.log("\nSimulation complete!");
  return 0;
}
