import { Router, Request, Response } from "express";
import { compare, recommendRoute } from "../engine/comparator";
import { generateCurve } from "../engine/curveGenerator";
import { runSimulation, withDefaults } from "../simulator/forexSimulator";
import { buildForexGraphHTML } from "../utils/graphGenerator";
import { InvalidInputError } from "../utils/errors";
import { isPlainObject } from "../utils/validation";
import { DEFAULT_SIMULATION_INPUTS } from "../utils/constants";

const router = Router();

/**
 * Request body for POST /api/compare.
 * Fields are passed through unchecked; compare() validates them.
 */
interface CompareRequest {
  budget: number;
  directRate: number;
  homeToIntermediateRate: number;
  intermediateToForeignRate: number;
}

/**
 * Request body for POST /api/curve.
 */
interface CurveRequest {
  budget: number;
  directRate: number;
  homeToIntermediateRate: number;
  rateRange: { min: number; max: number };
}

/**
 * Fills absent fields of an object body from the defaults; anything else is
 * left for validation to reject.
 */
function simulationInputsFrom(body: unknown): unknown {
  return isPlainObject(body) ? withDefaults(body) : body;
}

/**
 * Sends 400 for invalid input and 500 for anything else.
 */
function handleError(res: Response, context: string, error: unknown): void {
  if (error instanceof InvalidInputError) {
    res.status(400).json({
      error: "Invalid input",
      issues: error.issues,
    });
    return;
  }
  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * GET /api/compare
 * Get information about the compare endpoint
 */
router.get("/compare", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Compare direct and intermediate routes at one intermediate→foreign rate",
    endpoint: "/api/compare",
    requiredFields: ["budget", "directRate", "homeToIntermediateRate", "intermediateToForeignRate"],
    note: "breakEvenDirectRate is null when the intermediate route yields nothing.",
  });
});

/**
 * POST /api/compare
 * Compare both routes at a single intermediate→foreign rate
 */
router.post("/compare", (req: Request, res: Response) => {
  try {
    const { budget, directRate, homeToIntermediateRate, intermediateToForeignRate } =
      req.body as CompareRequest;

    const comparison = compare(budget, directRate, homeToIntermediateRate, intermediateToForeignRate);

    res.json({
      comparison,
      recommendation: recommendRoute(comparison),
    });
  } catch (error) {
    handleError(res, "comparison", error);
  }
});

/**
 * POST /api/curve
 * Sample the intermediate route yield across a rate range
 */
router.post("/curve", (req: Request, res: Response) => {
  try {
    const { budget, directRate, homeToIntermediateRate, rateRange } = req.body as CurveRequest;

    res.json(generateCurve(budget, directRate, homeToIntermediateRate, rateRange));
  } catch (error) {
    handleError(res, "curve generation", error);
  }
});

/**
 * POST /api/simulate
 * Full simulation: midpoint comparison, results table and curve.
 * Missing fields fall back to the defaults.
 */
router.post("/simulate", (req: Request, res: Response) => {
  try {
    const inputs = simulationInputsFrom(req.body);
    res.json(runSimulation(inputs));
  } catch (error) {
    handleError(res, "simulation", error);
  }
});

/**
 * POST /api/simulate/chart
 * Same as /simulate, rendered as a standalone HTML page
 */
router.post("/simulate/chart", (req: Request, res: Response) => {
  try {
    const inputs = simulationInputsFrom(req.body);
    res.type("html").send(buildForexGraphHTML(runSimulation(inputs)));
  } catch (error) {
    handleError(res, "chart generation", error);
  }
});

/**
 * GET /api/defaults
 * Default simulation inputs
 */
router.get("/defaults", (req: Request, res: Response) => {
  res.json(DEFAULT_SIMULATION_INPUTS);
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Forex Route Simulation API",
    version: "1.0.0",
    endpoints: {
      compare: "POST /api/compare - Compare routes at one intermediate→foreign rate",
      curve: "POST /api/curve - Intermediate route yield across a rate range",
      simulate: "POST /api/simulate - Midpoint comparison, results table and curve",
      chart: "POST /api/simulate/chart - Simulation rendered as an HTML chart",
      defaults: "GET /api/defaults - Default simulation inputs",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
