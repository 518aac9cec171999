/**
 * Filter/Search Index
 */

import type { ServiceRecord, ServiceSet } from "./types.js";

export interface FilterOptions {
  /** Also match against the program path (default true) */
  matchProgramPath?: boolean;
}

const matches = (record: ServiceRecord, needle: string, matchProgramPath: boolean): boolean => {
  if (record.definition.label.toLowerCase().includes(needle)) {
    return true;
  }
  return matchProgramPath && record.definition.programPath.toLowerCase().includes(needle);
};

/**
 * Records whose label (or program path) contains the query, case-insensitively.
 * An empty query returns every record; order is preserved.
 */
export const filterServices = (set: ServiceSet, query: string, options: FilterOptions = {}): ServiceSet => {
  const needle = query.toLowerCase();
  if (needle.length === 0) {
    return set;
  }
  const matchProgramPath = options.matchProgramPath ?? true;
  return set.filter((record) => matches(record, needle, matchProgramPath));
};

/**
 * Remembers the last query so a fresh scan can be narrowed the same way
 */
export class ServiceFilter {
  private query = "";
  private readonly options: FilterOptions;

  constructor(options: FilterOptions = {}) {
    this.options = options;
  }

  public getQuery(): string {
    return this.query;
  }

  public apply(set: ServiceSet, query: string = this.query): ServiceSet {
    this.query = query;
    return filterServices(set, query, this.options);
  }
}
