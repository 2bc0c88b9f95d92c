import { SimulationInputs } from "../models/ConversionInputs";

/**
 * Shared constants for route comparison.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Number of evenly spaced rates sampled across the requested range (endpoints included). */
export const CURVE_SAMPLE_COUNT = 100;

/** Route yields within this relative difference are reported as a tie. */
export const YIELD_TIE_TOLERANCE = 1e-9;

/** Inputs the simulation starts from when the caller leaves a field out. */
export const DEFAULT_SIMULATION_INPUTS: SimulationInputs = {
  budget: 100000,
  directRate: 1.41,
  homeToIntermediateRate: 89.1,
  rateRange: { min: 60.0, max: 85.0 },
};
