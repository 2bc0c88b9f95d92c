/**
 * Comparison result data structures
 */

export interface ComparisonResult {
  directYield: number; // foreign units via the direct route
  intermediateAmount: number; // intermediate units after the first leg
  indirectYield: number; // foreign units via the intermediate currency
  breakEvenDirectRate: number | null; // null when indirectYield <= 0
  breakEvenIntermediateToForeignRate: number;
}

export type BetterRoute = "direct" | "indirect" | "tie";

export interface RouteRecommendation {
  betterRoute: BetterRoute;
  advantage: number; // absolute difference in foreign units
  advantagePercent: number | null; // relative to the losing route; null if that yield is not positive
}
