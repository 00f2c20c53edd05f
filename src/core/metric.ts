export type Labels = Record<string, string>;

export interface SeriesSnapshot {
  name: string;
  help?: string;
  labelKeys: string[];
  values: Map<string, number>;
}

export type CounterSnapshot = SeriesSnapshot;
export type GaugeSnapshot = SeriesSnapshot;

const PAIR_SEP = "\x00";
const LABEL_SEP = "\x01";

/** Series key for a label set; decoded again by the exporters. */
export function encodeLabels(labelKeys: string[], labels: Labels): string {
  return labelKeys.map(k => `${k}${PAIR_SEP}${labels[k] ?? ""}`).join(LABEL_SEP);
}

export function decodeLabels(key: string, labelKeys: string[]): Labels {
  const parts = key ? key.split(LABEL_SEP) : [];
  const out: Labels = {};
  labelKeys.forEach((k, i) => {
    const part = parts[i];
    out[k] = part === undefined ? "" : part.slice(part.indexOf(PAIR_SEP) + 1);
  });
  return out;
}

abstract class LabeledSeries {
  protected values = new Map<string, number>();

  constructor(
    public readonly name: string,
    public readonly help?: string,
    public readonly labelKeys: string[] = []
  ) {}

  protected add(labels: Labels, v: number) {
    const k = encodeLabels(this.labelKeys, labels);
    this.values.set(k, (this.values.get(k) ?? 0) + v);
  }

  get(labels: Labels = {}): number {
    return this.values.get(encodeLabels(this.labelKeys, labels)) ?? 0;
  }

  snapshot(): SeriesSnapshot {
    return {
      name: this.name,
      help: this.help,
      labelKeys: this.labelKeys,
      values: new Map(this.values)
    };
  }
}

export class Counter extends LabeledSeries {
  inc(labels: Labels = {}, v = 1) {
    if (v < 0) throw new Error(`Counter ${this.name} cannot decrease`);
    this.add(labels, v);
  }
}

export class Gauge extends LabeledSeries {
  set(labels: Labels, v: number) {
    this.values.set(encodeLabels(this.labelKeys, labels), v);
  }

  inc(labels: Labels = {}, v = 1) { this.add(labels, v); }

  dec(labels: Labels = {}, v = 1) { this.add(labels, -v); }
}
