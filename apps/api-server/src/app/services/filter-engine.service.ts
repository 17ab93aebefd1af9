import { Injectable, Logger } from '@nestjs/common';
import {
  CallRecord,
  FILTER_DIMENSIONS,
  FilterDimension,
  FilteredViews,
  FilterSpec,
  ResolvedSchema,
} from '@talktime/shared-models';
import { TeamRosterService } from './team-roster.service';

interface CategoricalFilter {
  dimension: FilterDimension;
  selected: ReadonlySet<string>;
}

/**
 * Applies a FilterSpec to a record set. Pure: the input is never modified.
 *
 * All predicates are ANDed. Team membership is the exception: the base
 * team and every additive team are ORed together.
 */
@Injectable()
export class FilterEngineService {
  private readonly logger = new Logger(FilterEngineService.name);

  constructor(private readonly teamRoster: TeamRosterService) {}

  /**
   * Both subsets a dashboard needs: attempts (no duration threshold) and
   * the view (threshold applied in TALKTIME mode).
   */
  apply(
    records: readonly CallRecord[],
    spec: FilterSpec,
    schema: ResolvedSchema
  ): FilteredViews<CallRecord> {
    const attempts = this.applyFilters(records, spec, schema);
    const view = this.applyThreshold(attempts, spec);

    this.logger.debug(
      `Filtered ${records.length} records → ${attempts.length} attempts, ${view.length} in view (${spec.mode})`
    );
    return { attempts, view };
  }

  /**
   * Every filter except the duration threshold.
   */
  applyFilters(
    records: readonly CallRecord[],
    spec: FilterSpec,
    schema: ResolvedSchema
  ): CallRecord[] {
    const categorical = this.categoricalFilters(spec, schema);
    const teamMatch = this.teamMatcher(spec);

    return records.filter(
      (record) =>
        this.inDateWindow(record, spec) &&
        teamMatch(record) &&
        categorical.every((filter) => this.passesCategorical(record, filter, spec.includeMissing))
    );
  }

  /**
   * Keep calls whose duration meets the threshold (TALKTIME mode only).
   * Calls without a duration never qualify.
   */
  applyThreshold(records: readonly CallRecord[], spec: FilterSpec): CallRecord[] {
    if (spec.mode === 'ALL_CALLS') {
      return [...records];
    }
    return records.filter(
      (record) => record.durationSeconds !== null && record.durationSeconds >= spec.thresholdSeconds
    );
  }

  // --- Private ---

  private inDateWindow(record: CallRecord, spec: FilterSpec): boolean {
    const window = spec.dateWindow;
    if (window === null) {
      return true;
    }
    return record.localDate !== null && record.localDate >= window.start && record.localDate < window.end;
  }

  /**
   * Builds the team predicate for one pass. Membership is memoized per
   * distinct agent name since fuzzy matching is the costly step.
   */
  private teamMatcher(spec: FilterSpec): (record: CallRecord) => boolean {
    if (spec.teamBase === 'ALL') {
      return () => true;
    }

    const tags = [spec.teamBase, ...spec.additiveTeams];
    const memo = new Map<string, boolean>();

    return (record) => {
      if (record.agent === null) {
        return spec.includeMissing;
      }
      const cached = memo.get(record.agent);
      if (cached !== undefined) {
        return cached;
      }
      const agent = record.agent;
      const member = tags.some((tag) => this.teamRoster.isMember(agent, tag));
      memo.set(agent, member);
      return member;
    };
  }

  private categoricalFilters(spec: FilterSpec, schema: ResolvedSchema): CategoricalFilter[] {
    const selections: Record<FilterDimension, string[] | null> = {
      agent: spec.agents,
      country: spec.countries,
      callType: spec.callTypes,
      callStatus: spec.callStatuses,
    };

    const filters: CategoricalFilter[] = [];
    for (const dimension of FILTER_DIMENSIONS) {
      const selected = selections[dimension];
      // Empty selection means "no constraint"; unresolved columns cannot be filtered
      if (!selected || selected.length === 0 || schema.columns[dimension] === null) {
        continue;
      }
      filters.push({ dimension, selected: new Set(selected) });
    }
    return filters;
  }

  private passesCategorical(
    record: CallRecord,
    filter: CategoricalFilter,
    includeMissing: boolean
  ): boolean {
    const value = record[filter.dimension];
    if (value === null) {
      return includeMissing;
    }
    return filter.selected.has(value);
  }
}
