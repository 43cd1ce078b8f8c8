export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const labelsKey = (labels: MetricLabels) => JSON.stringify(normalizeLabels(labels));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export type MetricsRegistry = ReturnType<typeof createMetricsRegistry>;

export const createMetricsRegistry = (baseLabels: MetricLabels = {}) => {
  const entries = new Map<string, MetricEntry>();

  const keyOf = (name: string, labels: MetricLabels) =>
    `${name}:${labelsKey({ ...baseLabels, ...labels })}`;

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const key = keyOf(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, { name, labels: { ...baseLabels, ...labels }, value: delta, type: "counter" });
  };

  const setGauge = (name: string, labels: MetricLabels = {}, value: number) => {
    const key = keyOf(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    entries.set(key, { name, labels: { ...baseLabels, ...labels }, value, type: "gauge" });
  };

  const read = (name: string, labels: MetricLabels = {}) => entries.get(keyOf(name, labels))?.value ?? 0;

  // Series of one metric stay together so each family has a single TYPE line.
  const render = () => {
    const families = new Map<string, MetricEntry[]>();
    for (const entry of entries.values()) {
      const family = families.get(entry.name) ?? [];
      family.push(entry);
      families.set(entry.name, family);
    }
    const lines: string[] = [];
    for (const [name, family] of families) {
      lines.push(`# TYPE ${name} ${family[0].type}`);
      for (const entry of family) {
        lines.push(`${name}${formatLabels(entry.labels)} ${entry.value}`);
      }
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, read, render };
};
