/**
 * Results table shown next to the chart
 */

export interface ResultsTableRow {
  scenario: string;
  value: number | null;
  kind: "amount" | "rate"; // amounts are foreign currency units, rates are exchange rates
}

export type ResultsTable = ResultsTableRow[];
