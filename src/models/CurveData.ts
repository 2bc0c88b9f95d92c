import { RateRange } from "./ConversionInputs";

/**
 * Curve data structures for charting indirect yield against the
 * intermediate→foreign rate.
 */

export interface CurveSample {
  rate: number;
  indirectYield: number;
}

export interface CurveData {
  directYield: number; // constant across the range
  samples: CurveSample[];
  breakEvenRate: number; // may fall outside rateRange
  rateRange: RateRange;
}

/**
 * Receives the three pieces of a comparison chart. Implementations decide
 * how (or whether) to render them.
 */
export interface CurveSink {
  directReference(directYield: number): void;
  indirectSeries(samples: Iterable<CurveSample>): void;
  breakEvenMarker(rate: number): void;
}
