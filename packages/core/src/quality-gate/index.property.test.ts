/**
 * Property-Based Tests for Quality Gate
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SEVERITIES, THRESHOLD_CATEGORIES } from '@quality-gate/shared';
import type { AnalysisRunCounts, QualityGateThresholds } from '@quality-gate/shared';
import { QualityGate, QualityGateBuilder, ThresholdSet } from './index.js';

// Disabled (0) about half the time
const limitArb = fc.oneof(fc.constant(0), fc.integer({ min: 1, max: 50 }));
const countArb = fc.nat({ max: 60 });

const thresholdSetArb = fc
  .tuple(limitArb, limitArb, limitArb, limitArb)
  .map(([total, high, normal, low]) => new ThresholdSet(total, high, normal, low));

const runArb: fc.Arbitrary<AnalysisRunCounts> = fc.record({
  totalSize: countArb,
  totalHighSize: countArb,
  totalNormalSize: countArb,
  totalLowSize: countArb,
  newSize: countArb,
  newHighSize: countArb,
  newNormalSize: countArb,
  newLowSize: countArb,
});

const thresholdsArb: fc.Arbitrary<QualityGateThresholds> = fc.record({
  failedTotalAll: limitArb,
  failedTotalHigh: limitArb,
  failedTotalNormal: limitArb,
  failedTotalLow: limitArb,
  unstableTotalAll: limitArb,
  unstableTotalHigh: limitArb,
  unstableTotalNormal: limitArb,
  unstableTotalLow: limitArb,
  failedNewAll: limitArb,
  failedNewHigh: limitArb,
  failedNewNormal: limitArb,
  failedNewLow: limitArb,
  unstableNewAll: limitArb,
  unstableNewHigh: limitArb,
  unstableNewNormal: limitArb,
  unstableNewLow: limitArb,
});

/**
 * **Property 1: Limit Reached Semantics**
 *
 * *For any* limit and count, a channel is reached iff the limit is non-zero
 * and the count is at least the limit.
 */
describe('Property 1: Limit Reached Semantics', () => {
  it('reached iff limit != 0 and count >= limit, per channel', () => {
    fc.assert(
      fc.property(
        thresholdSetArb,
        fc.tuple(countArb, countArb, countArb, countArb),
        (set, [total, high, normal, low]) => {
          const result = set.evaluate(total, high, normal, low);
          const counts = { all: total, high, normal, low };

          for (const severity of SEVERITIES) {
            const limit = set.limitFor(severity);
            expect(result.isReached(severity)).toBe(limit !== 0 && counts[severity] >= limit);
          }
          expect(result.success).toBe(SEVERITIES.every((severity) => !result.isReached(severity)));
        }
      ),
      { numRuns: 200 }
    );
  });

  it('a disabled set never reaches a limit', () => {
    fc.assert(
      fc.property(fc.tuple(countArb, countArb, countArb, countArb), ([total, high, normal, low]) => {
        expect(ThresholdSet.disabled().evaluate(total, high, normal, low).success).toBe(true);
      }),
      { numRuns: 50 }
    );
  });
});

/**
 * **Property 2: Verdict Aggregation**
 *
 * *For any* gate and run, the verdict is FAILURE iff a failed category is
 * violated, UNSTABLE iff only unstable categories are violated, and SUCCESS
 * otherwise.
 */
describe('Property 2: Verdict Aggregation', () => {
  it('FAILURE dominates UNSTABLE dominates SUCCESS', () => {
    fc.assert(
      fc.property(thresholdsArb, runArb, (thresholds, run) => {
        const result = QualityGate.fromThresholds(thresholds).evaluate(run);

        const failed = !result.totalFailed.success || !result.newFailed.success;
        const unstable = !result.totalUnstable.success || !result.newUnstable.success;

        if (failed) {
          expect(result.overallResult).toBe('FAILURE');
        } else if (unstable) {
          expect(result.overallResult).toBe('UNSTABLE');
        } else {
          expect(result.overallResult).toBe('SUCCESS');
        }
      }),
      { numRuns: 200 }
    );
  });

  it('a disabled gate always succeeds', () => {
    fc.assert(
      fc.property(runArb, (run) => {
        const result = QualityGate.disabled().evaluate(run);

        expect(result.overallResult).toBe('SUCCESS');
        expect(result.messages).toEqual([]);
      }),
      { numRuns: 50 }
    );
  });
});

/**
 * **Property 3: Violation Messages**
 *
 * *For any* gate and run, there is exactly one message per reached limit and
 * the failed categories' messages carry the FAILURE label.
 */
describe('Property 3: Violation Messages', () => {
  it('one message per reached limit, in category order', () => {
    fc.assert(
      fc.property(thresholdsArb, runArb, (thresholds, run) => {
        const result = QualityGate.fromThresholds(thresholds).evaluate(run);

        const expectedLabels = THRESHOLD_CATEGORIES.flatMap((category) =>
          SEVERITIES.filter((severity) => result.resultFor(category).isReached(severity)).map(() =>
            category.endsWith('Failed') ? 'FAILURE' : 'UNSTABLE'
          )
        );

        expect(result.messages.map((message) => message.split(' ')[0])).toEqual(expectedLabels);
      }),
      { numRuns: 200 }
    );
  });
});

/**
 * **Property 4: Construction Path Independence**
 *
 * *For any* thresholds, a gate built from the flat values and one assembled
 * with the builder are equal, hash identically and evaluate identically.
 */
describe('Property 4: Construction Path Independence', () => {
  it('direct and builder construction are equivalent', () => {
    fc.assert(
      fc.property(thresholdsArb, runArb, (thresholds, run) => {
        const direct = QualityGate.fromThresholds(thresholds);
        const built = new QualityGateBuilder()
          .setTotalFailedThreshold(new ThresholdSet(
            thresholds.failedTotalAll,
            thresholds.failedTotalHigh,
            thresholds.failedTotalNormal,
            thresholds.failedTotalLow
          ))
          .setTotalUnstableThreshold(new ThresholdSet(
            thresholds.unstableTotalAll,
            thresholds.unstableTotalHigh,
            thresholds.unstableTotalNormal,
            thresholds.unstableTotalLow
          ))
          .setNewFailedThreshold(new ThresholdSet(
            thresholds.failedNewAll,
            thresholds.failedNewHigh,
            thresholds.failedNewNormal,
            thresholds.failedNewLow
          ))
          .setNewUnstableThreshold(new ThresholdSet(
            thresholds.unstableNewAll,
            thresholds.unstableNewHigh,
            thresholds.unstableNewNormal,
            thresholds.unstableNewLow
          ))
          .build();

        expect(built.equals(direct)).toBe(true);
        expect(built.hashCode()).toBe(direct.hashCode());
        expect(built.enabled).toBe(direct.enabled);
        expect(built.evaluate(run).messages).toEqual(direct.evaluate(run).messages);
        expect(built.toThresholds()).toEqual(thresholds);
      }),
      { numRuns: 100 }
    );
  });
});
