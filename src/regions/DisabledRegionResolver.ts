/**
 * Answers "is this position suppressed for this rule?" against a list of
 * disabled regions.
 *
 * Regions are converted to offset intervals once; both the detection and
 * the correction engine call `contains` with the same arguments, so the
 * two can never disagree about what is suppressed.
 */

import type { LocationConverter } from '../syntax/LocationConverter.js';
import type { DisabledRegion, RegionRules } from './types.js';

interface Interval {
  start: number;
  end: number;
  rules: RegionRules;
}

export class DisabledRegionResolver {
  private readonly intervals: Interval[];

  constructor(
    readonly regions: readonly DisabledRegion[],
    converter: LocationConverter
  ) {
    this.intervals = regions
      .map(region => ({
        start: converter.clampedOffsetOf(region.range.start),
        end: converter.clampedOffsetOf(region.range.end),
        rules: region.rules,
      }))
      .filter(interval => interval.end > interval.start)
      .sort((a, b) => a.start - b.start || a.end - b.end);
  }

  static empty(converter: LocationConverter): DisabledRegionResolver {
    return new DisabledRegionResolver([], converter);
  }

  get isEmpty(): boolean {
    return this.intervals.length === 0;
  }

  /**
   * True when some region covering `position` names `ruleId` or all rules.
   */
  contains(position: number, ruleId: string): boolean {
    for (const interval of this.intervals) {
      if (interval.start > position) break;
      if (position < interval.end && (interval.rules === 'all' || interval.rules.includes(ruleId))) {
        return true;
      }
    }
    return false;
  }
}
