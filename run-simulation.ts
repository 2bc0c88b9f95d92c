import { runSimulationCli } from "./src/cli/simulate";

/**
 * Run a forex route simulation, print the results table and write the chart.
 * Usage: npx ts-node run-simulation.ts [input-file] [output-dir]
 * Default input: example-request.json, default output dir: graphs
 */
process.exitCode = runSimulationCli(process.argv.slice(2));
