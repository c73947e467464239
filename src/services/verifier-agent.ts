// src/services/verifier-agent.ts: read-only cross-agent checks over a finished trip context
import { logger } from '@/services/logger';
import { computeBudgetLines } from '@/services/vertical/budget-rules';
import {
  AGENT_CATEGORIES,
  type BudgetCheck,
  type Severity,
  type TripRequest,
  type TripResults,
  type VerificationIssue,
  type VerificationResult,
} from '@/types/trip';
import { datesInRange } from '@/utils/dates';

export const ISSUE_PENALTY: Record<Severity, number> = {
  error: 20,
  warning: 5,
  info: 1,
};

/** Below this an ok result is flagged as low-quality data. */
export const LOW_CONFIDENCE_THRESHOLD = 50;

const MONEY_EPSILON = 0.01;

export interface VerifierOptions {
  /** Overage share of the budget tolerated before it becomes an error, e.g. 0.1. */
  budgetTolerance: number;
}

export function scoreIssues(issues: readonly VerificationIssue[]): number {
  const penalty = issues.reduce((sum, issue) => sum + ISSUE_PENALTY[issue.severity], 0);
  return Math.max(0, 100 - penalty);
}

export class VerifierAgent {
  constructor(private readonly options: VerifierOptions) {}

  verify(request: TripRequest, results: TripResults): VerificationResult {
    const issues: VerificationIssue[] = [];
    const budgetCheck = this.checkBudget(request, results, issues);
    this.checkItinerary(request, results, issues);
    this.checkProvenance(results, issues);
    this.checkConsistency(results, issues);
    this.checkDataQuality(results, issues);

    const score = scoreIssues(issues);
    const count = (s: Severity) => issues.filter((i) => i.severity === s).length;
    const passed = count('error') === 0;
    const summary =
      `Quality score ${score}/100 with ${count('error')} error(s), ${count('warning')} warning(s) ` +
      `and ${count('info')} note(s); ${passed ? 'all hard constraints met' : 'hard constraints violated'}`;

    logger.info('verifier:done', { score, passed, issues: issues.length });
    return { score, passed, issues, budgetCheck, summary };
  }

  private checkBudget(request: TripRequest, results: TripResults, issues: VerificationIssue[]): BudgetCheck {
    // Recomputed from the upstream payloads, never from the budget agent's own total.
    const recomputedTotal = computeBudgetLines(request, results).total;
    const budgetResult = results.budget;
    let reportedTotal: number | null = null;

    if (budgetResult?.status === 'ok') {
      reportedTotal = budgetResult.payload.total;
      if (Math.abs(reportedTotal - recomputedTotal) > MONEY_EPSILON) {
        issues.push({
          severity: 'warning',
          check: 'budget',
          category: 'budget',
          message: `Reported total ${reportedTotal} does not match the recomputed total ${recomputedTotal}`,
        });
      }
    } else {
      issues.push({
        severity: 'warning',
        check: 'budget',
        category: 'budget',
        message: 'No budget result; the total could not be cross-checked',
      });
    }

    if (recomputedTotal > request.budget) {
      const overage = (recomputedTotal - request.budget) / request.budget;
      const percent = Math.round(overage * 1000) / 10;
      const beyondTolerance = overage > this.options.budgetTolerance;
      issues.push({
        severity: beyondTolerance ? 'error' : 'warning',
        check: 'budget',
        message: beyondTolerance
          ? `Total ${recomputedTotal} exceeds the budget of ${request.budget} by ${percent}%, beyond the ${Math.round(this.options.budgetTolerance * 100)}% tolerance`
          : `Total ${recomputedTotal} exceeds the budget of ${request.budget} by ${percent}%`,
      });
    }

    return {
      budget: request.budget,
      recomputedTotal,
      reportedTotal,
      tolerance: this.options.budgetTolerance,
    };
  }

  private checkItinerary(request: TripRequest, results: TripResults, issues: VerificationIssue[]): void {
    const itinerary = results.itinerary;
    if (itinerary?.status !== 'ok') {
      issues.push({ severity: 'error', check: 'itinerary', category: 'itinerary', message: 'No itinerary was produced' });
      return;
    }

    const expected = datesInRange(request.startDate, request.endDate);
    const seen = new Map<string, number>();
    for (const day of itinerary.payload.days) seen.set(day.date, (seen.get(day.date) ?? 0) + 1);

    const missing = expected.filter((d) => !seen.has(d));
    const duplicated = [...seen].filter(([, n]) => n > 1).map(([d]) => d);
    const outside = [...seen.keys()].filter((d) => !expected.includes(d));
    const unmarked = itinerary.payload.days
      .filter((d) => d.attractions.length === 0 && !d.isRestDay)
      .map((d) => d.date);

    const report = (dates: string[], what: string) => {
      if (dates.length === 0) return;
      issues.push({
        severity: 'error',
        check: 'itinerary',
        category: 'itinerary',
        message: `${what}: ${dates.join(', ')}`,
      });
    };
    report(missing, 'Days missing from the itinerary');
    report(duplicated, 'Days scheduled more than once');
    report(outside, 'Days outside the trip dates');
    report(unmarked, 'Empty days not marked as rest days');
  }

  private checkProvenance(results: TripResults, issues: VerificationIssue[]): void {
    for (const category of AGENT_CATEGORIES) {
      const result = results[category];
      if (result?.status === 'ok' && result.provenance === 'generated') {
        issues.push({
          severity: 'info',
          check: 'provenance',
          category,
          message: `${category} data is AI-generated and unverified`,
        });
      }
    }
  }

  private checkConsistency(results: TripResults, issues: VerificationIssue[]): void {
    const { destination, itinerary } = results;
    if (destination?.status !== 'ok' || itinerary?.status !== 'ok') return;

    const available = new Set(destination.payload.attractions.map((a) => a.name));
    const scheduled = itinerary.payload.days.flatMap((d) => d.attractions.map((a) => a.name));
    if (scheduled.length > available.size) {
      issues.push({
        severity: 'warning',
        check: 'consistency',
        category: 'itinerary',
        message: `Itinerary schedules ${scheduled.length} attractions but the destination has ${available.size}`,
      });
    }
    const unknown = [...new Set(scheduled.filter((name) => !available.has(name)))];
    if (unknown.length > 0) {
      issues.push({
        severity: 'warning',
        check: 'consistency',
        category: 'itinerary',
        message: `Scheduled attractions not in the destination results: ${unknown.join(', ')}`,
      });
    }
  }

  private checkDataQuality(results: TripResults, issues: VerificationIssue[]): void {
    for (const category of AGENT_CATEGORIES) {
      const result = results[category];
      if (!result) continue;
      if (result.status === 'failed') {
        issues.push({
          severity: 'warning',
          check: 'data-quality',
          category,
          message: `${category} agent failed: ${result.error}`,
        });
      } else if (result.category === 'transport' && !result.payload.planned) {
        issues.push({
          severity: 'info',
          check: 'data-quality',
          category,
          message: 'transport was not planned: no origin given',
        });
      } else if (result.confidence < LOW_CONFIDENCE_THRESHOLD) {
        issues.push({
          severity: 'warning',
          check: 'data-quality',
          category,
          message: `${category} confidence is low (${result.confidence})`,
        });
      }
    }
  }
}
