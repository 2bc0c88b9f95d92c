import { ComparisonResult } from "../models/ComparisonResult";
import { ResultsTable } from "../models/ResultsTable";
import { SimulationResult } from "../models/SimulationResult";
import { compareRoutes, recommendRoute } from "../engine/comparator";
import { generateCurveFor } from "../engine/curveGenerator";
import { CurveInputsSchema, isPlainObject, parseInputs } from "../utils/validation";
import { midpoint } from "../utils/math";
import { DEFAULT_SIMULATION_INPUTS } from "../utils/constants";

/**
 * Simulation inputs as received from a request body or input file, before validation.
 */
export interface PartialSimulationInputs {
  budget?: unknown;
  directRate?: unknown;
  homeToIntermediateRate?: unknown;
  rateRange?: unknown;
}

export type UncheckedSimulationInputs = Required<PartialSimulationInputs>;

/**
 * Fills absent fields from DEFAULT_SIMULATION_INPUTS. Values that are present
 * (null included) are kept as-is, valid or not; a rateRange that is not an
 * object is passed through for validation to reject.
 */
export function withDefaults(partial: PartialSimulationInputs = {}): UncheckedSimulationInputs {
  const defaults = DEFAULT_SIMULATION_INPUTS;
  const { rateRange } = partial;

  return {
    budget: partial.budget === undefined ? defaults.budget : partial.budget,
    directRate: partial.directRate === undefined ? defaults.directRate : partial.directRate,
    homeToIntermediateRate:
      partial.homeToIntermediateRate === undefined
        ? defaults.homeToIntermediateRate
        : partial.homeToIntermediateRate,
    rateRange:
      rateRange === undefined
        ? { ...defaults.rateRange }
        : isPlainObject(rateRange)
          ? {
              min: rateRange.min === undefined ? defaults.rateRange.min : rateRange.min,
              max: rateRange.max === undefined ? defaults.rateRange.max : rateRange.max,
            }
          : rateRange,
  };
}

/**
 * Rows of the results table, in display order.
 */
export function buildResultsTable(comparison: ComparisonResult): ResultsTable {
  return [
    { scenario: "Foreign via direct route", value: comparison.directYield, kind: "amount" },
    { scenario: "Foreign via intermediate route", value: comparison.indirectYield, kind: "amount" },
    { scenario: "Break-even direct rate", value: comparison.breakEvenDirectRate, kind: "rate" },
    {
      scenario: "Break-even intermediate→foreign rate",
      value: comparison.breakEvenIntermediateToForeignRate,
      kind: "rate",
    },
  ];
}

/**
 * Runs one simulation: validates once, compares the routes at the midpoint of the
 * rate range for the results table, then generates the curve over the full range.
 *
 * @throws InvalidInputError when inputs fail validation; nothing is computed in that case
 */
export function runSimulation(input: unknown): SimulationResult {
  const inputs = parseInputs(CurveInputsSchema, input);
  const { budget, directRate, homeToIntermediateRate, rateRange } = inputs;

  const midpointRate = midpoint(rateRange.min, rateRange.max);
  const comparison = compareRoutes({
    budget,
    directRate,
    homeToIntermediateRate,
    intermediateToForeignRate: midpointRate,
  });
  const curve = generateCurveFor(inputs);

  return {
    inputs,
    midpointRate,
    comparison,
    recommendation: recommendRoute(comparison),
    resultsTable: buildResultsTable(comparison),
    curve,
  };
}
