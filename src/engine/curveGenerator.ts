import { CurveInputs, RateRange } from "../models/ConversionInputs";
import { CurveData, CurveSample, CurveSink } from "../models/CurveData";
import { CurveInputsSchema, parseInputs } from "../utils/validation";
import { linspace } from "../utils/math";
import { CURVE_SAMPLE_COUNT } from "../utils/constants";

/**
 * Lazily yields (rate, indirectYield) pairs across the range.
 * indirectYield is linear in the rate: (budget / homeToIntermediateRate) × rate.
 */
export function* curveSamples(
  budget: number,
  homeToIntermediateRate: number,
  rateRange: RateRange
): Generator<CurveSample> {
  const intermediateAmount = budget / homeToIntermediateRate;
  for (const rate of linspace(rateRange.min, rateRange.max, CURVE_SAMPLE_COUNT)) {
    yield { rate, indirectYield: intermediateAmount * rate };
  }
}

/**
 * Builds curve data for already-validated inputs.
 */
export function generateCurveFor(inputs: CurveInputs): CurveData {
  const { budget, directRate, homeToIntermediateRate, rateRange } = inputs;

  return {
    directYield: budget / directRate,
    samples: Array.from(curveSamples(budget, homeToIntermediateRate, rateRange)),
    // Reported even when it lies outside rateRange
    breakEvenRate: homeToIntermediateRate / directRate,
    rateRange: { min: rateRange.min, max: rateRange.max },
  };
}

/**
 * Generates the indirect-yield curve over an intermediate→foreign rate range,
 * together with the constant direct yield and the break-even rate.
 *
 * @param rateRange - Closed interval sampled at CURVE_SAMPLE_COUNT points; min may equal max
 * @throws InvalidInputError when any value is not positive or min exceeds max
 */
export function generateCurve(
  budget: number,
  directRate: number,
  homeToIntermediateRate: number,
  rateRange: RateRange
): CurveData {
  const inputs = parseInputs(CurveInputsSchema, {
    budget,
    directRate,
    homeToIntermediateRate,
    rateRange,
  });
  return generateCurveFor(inputs);
}

/**
 * Hands a curve to a sink: direct reference line, indirect series, then break-even marker.
 */
export function emitCurve(curve: CurveData, sink: CurveSink): void {
  sink.directReference(curve.directYield);
  sink.indirectSeries(curve.samples);
  sink.breakEvenMarker(curve.breakEvenRate);
}
