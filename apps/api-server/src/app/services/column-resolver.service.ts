import { Injectable, Logger } from '@nestjs/common';
import {
  COLUMN_ROLES,
  ColumnAliasMap,
  ColumnOverrides,
  ColumnRole,
  DEFAULT_COLUMN_ALIASES,
  ResolvedColumn,
  ResolvedSchema,
  TemporalShape,
} from '@talktime/shared-models';

/**
 * Maps logical column roles to the headers of an uploaded file.
 *
 * Per role: an explicit override (exact header match), else the alias
 * list - exact pass first, then a case-insensitive pass. A role with no
 * match is left unresolved; callers degrade the views that need it.
 */
@Injectable()
export class ColumnResolverService {
  private readonly logger = new Logger(ColumnResolverService.name);

  resolve(
    headers: readonly string[],
    overrides: ColumnOverrides = {},
    aliases: ColumnAliasMap = DEFAULT_COLUMN_ALIASES
  ): ResolvedSchema {
    const headerSet = new Set(headers);
    const lowerToHeader = new Map<string, string>();
    for (const header of headers) {
      const key = header.toLowerCase();
      // First occurrence wins, like the exact pass
      if (!lowerToHeader.has(key)) {
        lowerToHeader.set(key, header);
      }
    }

    const ignoredOverrides: Partial<Record<ColumnRole, string>> = {};
    const resolutions: ResolvedColumn[] = COLUMN_ROLES.map((role) => {
      const override = overrides[role]?.trim();
      if (override) {
        if (headerSet.has(override)) {
          return { role, column: override, matchedBy: 'override' };
        }
        ignoredOverrides[role] = override;
      }
      return this.matchAliases(role, aliases[role], headerSet, lowerToHeader);
    });

    const columnOf = (role: ColumnRole): string | null =>
      resolutions.find((r) => r.role === role)?.column ?? null;
    const columns: Record<ColumnRole, string | null> = {
      agent: columnOf('agent'),
      country: columnOf('country'),
      callType: columnOf('callType'),
      callStatus: columnOf('callStatus'),
      toName: columnOf('toName'),
      duration: columnOf('duration'),
      startTime: columnOf('startTime'),
      date: columnOf('date'),
      time: columnOf('time'),
    };

    const unresolved = resolutions.filter((r) => r.column === null).map((r) => r.role);
    const schema: ResolvedSchema = {
      columns,
      resolutions,
      temporalShape: this.temporalShape(columns),
      unresolved,
      ignoredOverrides,
    };

    this.logger.debug(
      `Resolved columns: ${resolutions
        .filter((r) => r.column !== null)
        .map((r) => `${r.role}=${r.column}`)
        .join(', ')} | unresolved: [${unresolved.join(', ')}]`
    );
    return schema;
  }

  /**
   * Prepend extra aliases (e.g. from a preset) to the default lists.
   */
  mergeAliases(
    extra: Partial<Record<ColumnRole, readonly string[]>>,
    base: ColumnAliasMap = DEFAULT_COLUMN_ALIASES
  ): ColumnAliasMap {
    const merged = { ...base };
    for (const role of COLUMN_ROLES) {
      const additions = extra[role];
      if (additions && additions.length > 0) {
        merged[role] = [...additions, ...base[role].filter((alias) => !additions.includes(alias))];
      }
    }
    return merged;
  }

  // --- Private ---

  private matchAliases(
    role: ColumnRole,
    candidates: readonly string[],
    headerSet: Set<string>,
    lowerToHeader: Map<string, string>
  ): ResolvedColumn {
    for (const alias of candidates) {
      if (headerSet.has(alias)) {
        return { role, column: alias, matchedBy: 'exact' };
      }
    }
    for (const alias of candidates) {
      const header = lowerToHeader.get(alias.toLowerCase());
      if (header !== undefined) {
        return { role, column: header, matchedBy: 'case-insensitive' };
      }
    }
    return { role, column: null, matchedBy: null };
  }

  /**
   * Separate date+time beats a combined timestamp, which beats a bare date.
   */
  private temporalShape(columns: Record<ColumnRole, string | null>): TemporalShape {
    if (columns.date !== null && columns.time !== null) return 'SEPARATE';
    if (columns.startTime !== null) return 'COMBINED';
    if (columns.date !== null) return 'DATE_ONLY';
    return 'NONE';
  }
}
