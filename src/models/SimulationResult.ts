import { SimulationInputs } from "./ConversionInputs";
import { ComparisonResult, RouteRecommendation } from "./ComparisonResult";
import { CurveData } from "./CurveData";
import { ResultsTable } from "./ResultsTable";

export interface SimulationResult {
  inputs: SimulationInputs;
  midpointRate: number; // representative rate used for the comparison
  comparison: ComparisonResult;
  recommendation: RouteRecommendation;
  resultsTable: ResultsTable;
  curve: CurveData;
}
