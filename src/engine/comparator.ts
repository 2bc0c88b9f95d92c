import { ComparisonInputs } from "../models/ConversionInputs";
import { ComparisonResult, RouteRecommendation } from "../models/ComparisonResult";
import { ComparisonInputsSchema, parseInputs } from "../utils/validation";
import { isRelativelyClose } from "../utils/math";
import { YIELD_TIE_TOLERANCE } from "../utils/constants";

/**
 * Direct vs indirect route comparison.
 *
 * Direct:   budget / directRate
 * Indirect: (budget / homeToIntermediateRate) × intermediateToForeignRate
 */

/**
 * Computes both route yields and break-even figures for already-validated inputs.
 */
export function compareRoutes(inputs: ComparisonInputs): ComparisonResult {
  const { budget, directRate, homeToIntermediateRate, intermediateToForeignRate } = inputs;

  const directYield = budget / directRate;
  const intermediateAmount = budget / homeToIntermediateRate;
  const indirectYield = intermediateAmount * intermediateToForeignRate;

  // Direct rate at which the direct route would match the indirect route's yield
  const breakEvenDirectRate = indirectYield > 0 ? budget / indirectYield : null;

  return {
    directYield,
    intermediateAmount,
    indirectYield,
    breakEvenDirectRate,
    breakEvenIntermediateToForeignRate: homeToIntermediateRate / directRate,
  };
}

/**
 * Compares the direct home→foreign route against the home→intermediate→foreign route
 * at one intermediate→foreign rate.
 *
 * @param budget - Amount in home currency
 * @param directRate - Home units per foreign unit
 * @param homeToIntermediateRate - Home units per intermediate unit
 * @param intermediateToForeignRate - Foreign units per intermediate unit
 * @throws InvalidInputError when budget or either fixed rate is not a positive finite number
 *
 * @example
 * ```ts
 * compare(100000, 1.41, 89.1, 72.5).breakEvenIntermediateToForeignRate // ≈ 63.19
 * ```
 */
export function compare(
  budget: number,
  directRate: number,
  homeToIntermediateRate: number,
  intermediateToForeignRate: number
): ComparisonResult {
  const inputs = parseInputs(ComparisonInputsSchema, {
    budget,
    directRate,
    homeToIntermediateRate,
    intermediateToForeignRate,
  });
  return compareRoutes(inputs);
}

/**
 * Picks the route that yields more foreign currency.
 * Yields within YIELD_TIE_TOLERANCE of each other are a tie.
 */
export function recommendRoute(result: ComparisonResult): RouteRecommendation {
  const { directYield, indirectYield } = result;
  const advantage = Math.abs(directYield - indirectYield);

  if (isRelativelyClose(directYield, indirectYield, YIELD_TIE_TOLERANCE)) {
    return { betterRoute: "tie", advantage, advantagePercent: 0 };
  }

  const betterRoute = indirectYield > directYield ? "indirect" : "direct";
  const losingYield = betterRoute === "indirect" ? directYield : indirectYield;

  return {
    betterRoute,
    advantage,
    advantagePercent: losingYield > 0 ? (advantage / losingYield) * 100 : null,
  };
}
