export type ResetSeverityLevel = 'none' | 'warning' | 'critical';

export type ResetSeverityThreshold = {
  consecutiveResets: number;
  staleMs: number;
};

export type ResetSeverityThresholds = {
  warning: ResetSeverityThreshold;
  critical: ResetSeverityThreshold;
};

export type ResetSeverityEvaluation = {
  severity: ResetSeverityLevel;
  triggeredBy: 'consecutive-resets' | 'stale-duration' | null;
  threshold: number | null;
  actual: number;
};

export const DEFAULT_RESET_SEVERITY_THRESHOLDS: ResetSeverityThresholds = {
  warning: {
    consecutiveResets: 3,
    staleMs: 60_000
  },
  critical: {
    consecutiveResets: 6,
    staleMs: 300_000
  }
};

export function evaluateResetSeverity(
  stats: { consecutiveResets: number; staleMs: number },
  thresholds: ResetSeverityThresholds = DEFAULT_RESET_SEVERITY_THRESHOLDS
): ResetSeverityEvaluation {
  const resets = stats.consecutiveResets;
  const staleMs = stats.staleMs;

  if (resets >= thresholds.critical.consecutiveResets) {
    return {
      severity: 'critical',
      triggeredBy: 'consecutive-resets',
      threshold: thresholds.critical.consecutiveResets,
      actual: resets
    };
  }

  if (staleMs >= thresholds.critical.staleMs) {
    return {
      severity: 'critical',
      triggeredBy: 'stale-duration',
      threshold: thresholds.critical.staleMs,
      actual: staleMs
    };
  }

  if (resets >= thresholds.warning.consecutiveResets) {
    return {
      severity: 'warning',
      triggeredBy: 'consecutive-resets',
      threshold: thresholds.warning.consecutiveResets,
      actual: resets
    };
  }

  if (staleMs >= thresholds.warning.staleMs) {
    return {
      severity: 'warning',
      triggeredBy: 'stale-duration',
      threshold: thresholds.warning.staleMs,
      actual: staleMs
    };
  }

  return { severity: 'none', triggeredBy: null, threshold: null, actual: staleMs };
}

export function formatResetSeverityReason(evaluation: ResetSeverityEvaluation): string | null {
  if (evaluation.severity === 'none' || !evaluation.triggeredBy || evaluation.threshold === null) {
    return null;
  }

  if (evaluation.triggeredBy === 'consecutive-resets') {
    return `camera resets ${evaluation.actual} ≥ ${evaluation.threshold}`;
  }

  return `no frame for ${evaluation.actual}ms ≥ ${evaluation.threshold}ms`;
}
