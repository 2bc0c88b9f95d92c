/**
 * Input data structures for route comparison
 */

export interface RateRange {
  min: number; // foreign units per intermediate unit
  max: number;
}

export interface ConversionInputs {
  budget: number; // home currency units
  directRate: number; // home units per foreign unit
  homeToIntermediateRate: number; // home units per intermediate unit
}

export interface ComparisonInputs extends ConversionInputs {
  intermediateToForeignRate: number; // foreign units per intermediate unit
}

export interface CurveInputs extends ConversionInputs {
  rateRange: RateRange;
}

/**
 * Inputs collected by the simulation runner. Same shape as CurveInputs:
 * the representative rate for the comparison is derived from the range.
 */
export type SimulationInputs = CurveInputs;
