import type { MetricSnapshot } from "../core/registry.js";
import type { SeriesSnapshot } from "../core/metric.js";
import { decodeLabels } from "../core/metric.js";

function escapeLabel(v: string): string {
  return v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function formatLabels(labels: Record<string, string>): string {
  const pairs = Object.entries(labels).map(([k, v]) => `${k}="${escapeLabel(v)}"`);
  return pairs.length > 0 ? `{${pairs.join(",")}}` : "";
}

function writeSeries(lines: string[], series: SeriesSnapshot, type: "counter" | "gauge") {
  if (series.help) lines.push(`# HELP ${series.name} ${series.help}`);
  lines.push(`# TYPE ${series.name} ${type}`);
  for (const [key, value] of series.values) {
    lines.push(`${series.name}${formatLabels(decodeLabels(key, series.labelKeys))} ${value}`);
  }
}

/** Prometheus text exposition format (v0.0.4). */
export function prometheusText(snap: MetricSnapshot): string {
  const lines: string[] = [];
  for (const c of snap.counters) writeSeries(lines, c, "counter");
  for (const g of snap.gauges) writeSeries(lines, g, "gauge");
  return lines.join("\n") + "\n";
}
