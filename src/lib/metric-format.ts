import { isDefinedMetric, type Metric } from "@/lib/efficiency";

export const UNDEFINED_METRIC_LABEL = "N/A";

/** "93.3%"; "N/A" when the ratio is undefined */
export function formatEfficiency(value: Metric, decimals = 1): string {
  if (!isDefinedMetric(value)) return UNDEFINED_METRIC_LABEL;
  return `${value.toFixed(decimals)}%`;
}

/** "12,345" */
export function formatCount(value: number): string {
  return value.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

/** "41.5" */
export function formatAverage(value: number): string {
  return value.toFixed(1);
}
