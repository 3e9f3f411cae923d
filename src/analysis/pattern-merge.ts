import type { PatternMergeConfig } from '../core/types.js';
import type { DetectionState, PatternCandidate, PatternDetails, PatternRecord } from './types.js';

export type PatternIdentity = Pick<PatternCandidate, 'patternType' | 'variables' | 'weekday'> & {
  details?: Pick<PatternDetails, 'method'>;
};

/**
 * Identity of a pattern: type, unordered variable set, the weekday for
 * weekday patterns and the method for sliding-window patterns (a recent trend
 * and a recent shift on one metric are different patterns). At most one
 * active record exists per key.
 */
export function patternKey(pattern: PatternIdentity): string {
  const variables = [...pattern.variables].sort().join('|');
  const weekday = pattern.weekday ? `@${pattern.weekday}` : '';
  const method = pattern.patternType === 'sliding_window' && pattern.details ? `#${pattern.details.method}` : '';
  return `${pattern.patternType}:${variables}${weekday}${method}`;
}

export function hasDrifted(
  stored: Pick<PatternCandidate, 'strength' | 'confidence'>,
  candidate: Pick<PatternCandidate, 'strength' | 'confidence'>,
  config: Pick<PatternMergeConfig, 'strengthDriftTolerance' | 'confidenceDriftTolerance'>,
): boolean {
  return (
    Math.abs(stored.strength - candidate.strength) > config.strengthDriftTolerance ||
    Math.abs(stored.confidence - candidate.confidence) > config.confidenceDriftTolerance
  );
}

export interface MergeResult {
  /** Active set after the merge */
  active: PatternRecord[];
  /** Records to insert */
  created: PatternRecord[];
  /** Previously active records to write back as inactive (replaced or stale) */
  deactivated: PatternRecord[];
  unchanged: PatternRecord[];
  state: DetectionState;
}

/**
 * Merge one run's candidates into the stored active set.
 *
 * - no stored record for the key → insert
 * - stored record within tolerance → leave it untouched
 * - stored record drifted → deactivate it and insert the replacement
 * - stored record not rediscovered for `staleAfterRuns` runs → deactivate
 */
export function mergePatterns(
  stored: PatternRecord[],
  candidates: PatternCandidate[],
  state: DetectionState,
  config: PatternMergeConfig,
  now: Date,
  newId: () => string,
): MergeResult {
  const run = state.runCount + 1;
  const timestamp = now.toISOString();
  const lastSeen: Record<string, number> = { ...state.lastSeen };

  const created: PatternRecord[] = [];
  const deactivated: PatternRecord[] = [];
  const unchanged: PatternRecord[] = [];

  const byKey = new Map<string, PatternRecord>();
  for (const record of stored) {
    if (!record.active) continue;
    const key = patternKey(record);
    if (byKey.has(key)) {
      // Duplicate active key from an earlier writer; keep the first
      deactivated.push({ ...record, active: false, deactivatedAt: timestamp });
      delete lastSeen[record.id];
      continue;
    }
    byKey.set(key, record);
  }

  const matched = new Set<string>();
  for (const candidate of candidates) {
    const key = patternKey(candidate);
    if (matched.has(key)) continue;
    matched.add(key);

    const existing = byKey.get(key);
    if (existing && !hasDrifted(existing, candidate, config)) {
      unchanged.push(existing);
      lastSeen[existing.id] = run;
      continue;
    }

    if (existing) {
      deactivated.push({ ...existing, active: false, deactivatedAt: timestamp });
      delete lastSeen[existing.id];
    }

    const record: PatternRecord = {
      ...candidate,
      variables: [...candidate.variables].sort(),
      id: newId(),
      active: true,
      discoveredAt: timestamp,
    };
    created.push(record);
    lastSeen[record.id] = run;
  }

  for (const [key, record] of byKey) {
    if (matched.has(key)) continue;
    const seenIn = lastSeen[record.id] ?? state.runCount;
    if (run - seenIn >= config.staleAfterRuns) {
      deactivated.push({ ...record, active: false, deactivatedAt: timestamp });
      delete lastSeen[record.id];
    } else {
      unchanged.push(record);
    }
  }

  return {
    active: [...unchanged, ...created],
    created,
    deactivated,
    unchanged,
    state: { runCount: run, lastRunAt: timestamp, lastSeen },
  };
}
