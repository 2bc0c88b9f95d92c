import { CurveSample, CurveSink } from "../models/CurveData";
import { SimulationResult } from "../models/SimulationResult";
import { emitCurve } from "../engine/curveGenerator";
import { formatNumber, formatTableValue } from "./format";
import * as fs from "fs";
import * as path from "path";

export interface ChartPoint {
  x: number;
  y: number;
}

export interface ChartDataset {
  label: string;
  data: ChartPoint[];
  borderColor: string;
  borderDash: number[];
  borderWidth: number;
  pointRadius: number;
  fill: false;
}

/**
 * Collects a curve as Chart.js line datasets.
 * Reference lines are drawn as two-point segments spanning the extent of the
 * other series, so no annotation plugin is needed.
 */
export class ChartDatasetSink implements CurveSink {
  private directYield: number | null = null;
  private series: ChartPoint[] = [];
  private breakEvenRate: number | null = null;

  directReference(directYield: number): void {
    this.directYield = directYield;
  }

  indirectSeries(samples: Iterable<CurveSample>): void {
    this.series = Array.from(samples, (s) => ({ x: s.rate, y: s.indirectYield }));
  }

  breakEvenMarker(rate: number): void {
    this.breakEvenRate = rate;
  }

  datasets(): ChartDataset[] {
    const xs = this.series.map((p) => p.x);
    const ys = this.series.map((p) => p.y);
    if (this.breakEvenRate !== null) xs.push(this.breakEvenRate);
    if (this.directYield !== null) ys.push(this.directYield);

    const xMin = Math.min(...xs);
    const xMax = Math.max(...xs);
    const yMin = Math.min(...ys);
    const yMax = Math.max(...ys);

    const datasets: ChartDataset[] = [];

    if (this.directYield !== null) {
      datasets.push({
        label: `Direct route (${Math.round(this.directYield)})`,
        data: [
          { x: xMin, y: this.directYield },
          { x: xMax, y: this.directYield },
        ],
        borderColor: "#ef4444",
        borderDash: [8, 4],
        borderWidth: 2,
        pointRadius: 0,
        fill: false,
      });
    }

    if (this.series.length > 0) {
      datasets.push({
        label: "Via intermediate currency",
        data: this.series,
        borderColor: "#3b82f6",
        borderDash: [],
        borderWidth: 2,
        pointRadius: 0,
        fill: false,
      });
    }

    if (this.breakEvenRate !== null) {
      datasets.push({
        label: `Break-even intermediate→foreign: ${this.breakEvenRate.toFixed(2)}`,
        data: [
          { x: this.breakEvenRate, y: yMin },
          { x: this.breakEvenRate, y: yMax },
        ],
        borderColor: "#10b981",
        borderDash: [2, 4],
        borderWidth: 2,
        pointRadius: 0,
        fill: false,
      });
    }

    return datasets;
  }
}

/**
 * Build a standalone HTML page with the results table and a Chart.js comparison graph
 */
export function buildForexGraphHTML(simulation: SimulationResult): string {
  const { inputs, curve, recommendation } = simulation;

  const sink = new ChartDatasetSink();
  emitCurve(curve, sink);
  const datasets = sink.datasets();

  const breakEvenInRange =
    curve.breakEvenRate >= curve.rateRange.min && curve.breakEvenRate <= curve.rateRange.max;

  const verdict =
    recommendation.betterRoute === "tie"
      ? "Both routes yield the same amount at the midpoint rate."
      : `The ${recommendation.betterRoute} route yields ${formatNumber(recommendation.advantage, 2)} more foreign units at the midpoint rate.`;

  const tableRows = simulation.resultsTable
    .map(
      (row) => `
                <tr><td>${row.scenario}</td><td class="value">${formatTableValue(row)}</td></tr>`
    )
    .join("");

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Forex Route Simulation</title>
    <script src="https://cdn.jsdelivr.net/npm/chart.js@4.4.0/dist/chart.umd.min.js"></script>
    <style>
        body {
            font-family: Arial, sans-serif;
            margin: 20px;
            background-color: #f5f5f5;
        }
        .container {
            max-width: 1000px;
            margin: 0 auto;
            background-color: white;
            padding: 20px;
            border-radius: 8px;
            box-shadow: 0 2px 4px rgba(0,0,0,0.1);
        }
        h1 {
            color: #333;
            margin-bottom: 10px;
        }
        .metadata {
            background-color: #f9f9f9;
            padding: 15px;
            border-radius: 4px;
            margin-bottom: 20px;
        }
        .metadata h2 {
            margin-top: 0;
            font-size: 18px;
            color: #555;
        }
        .metadata-grid {
            display: grid;
            grid-template-columns: repeat(auto-fit, minmax(200px, 1fr));
            gap: 10px;
        }
        .metadata-label {
            font-weight: bold;
            color: #666;
            font-size: 12px;
        }
        .metadata-value {
            color: #333;
            font-size: 16px;
            margin-top: 4px;
        }
        table {
            border-collapse: collapse;
            width: 100%;
        }
        td {
            padding: 8px;
            border-bottom: 1px solid #eee;
        }
        td.value {
            text-align: right;
            font-family: monospace;
        }
        .chart-container {
            position: relative;
            height: 450px;
            margin-top: 20px;
        }
        .legend {
            margin-top: 20px;
            padding: 15px;
            background-color: #f9f9f9;
            border-radius: 4px;
        }
    </style>
</head>
<body>
    <div class="container">
        <h1>Direct vs Intermediate Route</h1>

        <div class="metadata">
            <h2>Simulation Parameters</h2>
            <div class="metadata-grid">
                <div>
                    <div class="metadata-label">Budget</div>
                    <div class="metadata-value">${formatNumber(inputs.budget, 2)}</div>
                </div>
                <div>
                    <div class="metadata-label">Direct Rate</div>
                    <div class="metadata-value">${formatNumber(inputs.directRate, 4)}</div>
                </div>
                <div>
                    <div class="metadata-label">Home→Intermediate Rate</div>
                    <div class="metadata-value">${formatNumber(inputs.homeToIntermediateRate, 4)}</div>
                </div>
                <div>
                    <div class="metadata-label">Intermediate→Foreign Range</div>
                    <div class="metadata-value">${formatNumber(curve.rateRange.min, 2)} – ${formatNumber(curve.rateRange.max, 2)}</div>
                </div>
            </div>
        </div>

        <h2>Results (midpoint rate ${formatNumber(simulation.midpointRate, 2)})</h2>
        <table>${tableRows}
        </table>
        <p>${verdict}</p>

        <div class="chart-container">
            <canvas id="forexChart"></canvas>
        </div>

        <div class="legend">
            ${
              breakEvenInRange
                ? `Above the break-even rate of ${formatNumber(curve.breakEvenRate, 2)} the intermediate route yields more.`
                : `The break-even rate of ${formatNumber(curve.breakEvenRate, 2)} lies outside the plotted range.`
            }
        </div>
    </div>

    <script>
        const ctx = document.getElementById('forexChart').getContext('2d');

        new Chart(ctx, {
            type: 'line',
            data: {
                datasets: ${JSON.stringify(datasets)}
            },
            options: {
                responsive: true,
                maintainAspectRatio: false,
                plugins: {
                    title: {
                        display: true,
                        text: 'Direct vs Intermediate Route Comparison',
                        font: {
                            size: 18
                        }
                    },
                    legend: {
                        display: true,
                        position: 'top'
                    }
                },
                scales: {
                    x: {
                        type: 'linear',
                        title: {
                            display: true,
                            text: 'Intermediate → Foreign exchange rate'
                        }
                    },
                    y: {
                        title: {
                            display: true,
                            text: 'Foreign currency obtained'
                        }
                    }
                }
            }
        });
    </script>
</body>
</html>`;
}

/**
 * Generate HTML file with the comparison graph for a simulation
 */
export function generateForexGraphHTML(simulation: SimulationResult, outputPath: string): void {
  const html = buildForexGraphHTML(simulation);

  // Ensure output directory exists
  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(outputPath, html, "utf-8");
  console.log(`Graph generated: ${outputPath}`);
}
