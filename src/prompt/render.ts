import { formatMetricValue } from '../analysis/metrics.js';
import type { PersonalizationContext } from '../personalization/types.js';
import { LENGTH_GUIDANCE, TONE_GUIDANCE } from './templates/styles.js';
import type {
  CalendarDensity,
  DatedValue,
  DaySummary,
  MetricDelta,
  MetricStatistics,
  PatternSummary,
  RegressionHint,
  WeeklyMetricSummary,
} from './types.js';

/**
 * Replace `{name}` placeholders. Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function formatStyle(personalization: PersonalizationContext): string {
  return `## Style\n${TONE_GUIDANCE[personalization.toneStyle]} ${LENGTH_GUIDANCE[personalization.insightLength]}`;
}

export function formatMetricDeltas(metrics: MetricDelta[]): string {
  if (metrics.length === 0) return '- No readings available';
  return metrics
    .map(m => {
      const today = m.today === null ? 'n/a' : formatMetricValue(m.metric, m.today);
      return `- ${m.label}: ${today} (${m.deltaText})`;
    })
    .join('\n');
}

export function formatWeeklyMetrics(metrics: WeeklyMetricSummary[]): string {
  if (metrics.length === 0) return '- No readings this week';
  return metrics
    .map(m => {
      const parts = [`avg ${m.average === null ? 'n/a' : formatMetricValue(m.metric, m.average)}`, m.deltaText];
      if (m.best && m.worst && m.samples > 1) {
        parts.push(
          `best ${formatMetricValue(m.metric, m.best.value)} on ${m.best.date}`,
          `worst ${formatMetricValue(m.metric, m.worst.value)} on ${m.worst.date}`,
        );
      }
      return `- ${m.label}: ${parts.join('; ')}`;
    })
    .join('\n');
}

export function formatDays(days: DaySummary[]): string {
  return days
    .map(day => {
      const readings = Object.entries(day.values)
        .filter((entry): entry is [string, number] => entry[1] !== null)
        .map(([metric, value]) => `${metric}=${value}`);
      return `- ${day.dayOfWeek} ${day.date}: ${readings.length > 0 ? readings.join(', ') : 'no data'}`;
    })
    .join('\n');
}

export function formatPatterns(patterns: PatternSummary[]): string {
  if (patterns.length === 0) return '- None detected yet';
  return patterns.map(p => `- ${p.name}: ${p.description}`).join('\n');
}

export function formatCalendar(calendar: CalendarDensity | null): string {
  if (!calendar) return 'Unknown';
  return `${calendar.meetingCount} meetings, ${calendar.meetingHours} hours`;
}

export function formatRecentEnergy(values: DatedValue[]): string {
  if (values.length === 0) return '- No recent check-ins';
  return values.map(v => `- ${v.date}: ${v.value}`).join('\n');
}

export function formatRegression(hint: RegressionHint | null): string {
  if (!hint) return 'Not enough history for a statistical estimate.';
  return `Estimate ${hint.predicted}/10 from ${hint.sampleSize} labeled days (confidence ${Math.round(hint.confidence * 100)}%).`;
}

export function formatMetricStatistics(metrics: MetricStatistics[]): string {
  if (metrics.length === 0) return '- No data';
  return metrics
    .map(m => {
      const weekdays = Object.entries(m.weekdayMeans)
        .map(([day, value]) => `${day.slice(0, 3)} ${value}`)
        .join(', ');
      return `- ${m.metric} (${m.label}${m.unit ? `, ${m.unit}` : ''}): n=${m.samples}, mean ${m.mean}, ` +
        `min ${m.min}, max ${m.max}, sd ${m.stdDev}; by weekday: ${weekdays}`;
    })
    .join('\n');
}
