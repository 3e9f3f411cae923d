export interface MetricDefinition {
  label: string;
  unit: string;
  /** Decimal places used when presenting values */
  precision: number;
}

export const METRIC_CATALOGUE: Record<string, MetricDefinition> = {
  sleep_hours: { label: 'Sleep duration', unit: 'h', precision: 1 },
  deep_sleep_hours: { label: 'Deep sleep', unit: 'h', precision: 1 },
  readiness: { label: 'Readiness score', unit: 'pts', precision: 0 },
  hrv: { label: 'Heart rate variability', unit: 'ms', precision: 0 },
  resting_hr: { label: 'Resting heart rate', unit: 'bpm', precision: 0 },
  steps: { label: 'Steps', unit: 'steps', precision: 0 },
  active_calories: { label: 'Active calories', unit: 'kcal', precision: 0 },
  energy: { label: 'Energy', unit: '/5', precision: 1 },
  mood: { label: 'Mood', unit: '/5', precision: 1 },
  meeting_hours: { label: 'Meeting time', unit: 'h', precision: 1 },
};

export function describeMetric(name: string): MetricDefinition {
  const known = METRIC_CATALOGUE[name];
  if (known) return known;

  const words = name.replace(/[_-]+/g, ' ').trim();
  return {
    label: words.charAt(0).toUpperCase() + words.slice(1),
    unit: '',
    precision: 1,
  };
}

export function metricLabel(name: string): string {
  return describeMetric(name).label;
}

/**
 * "7.2 h", "78 pts", or the bare number for unknown units
 */
export function formatMetricValue(name: string, value: number): string {
  const { unit, precision } = describeMetric(name);
  const text = value.toFixed(precision);
  return unit ? `${text} ${unit}` : text;
}
