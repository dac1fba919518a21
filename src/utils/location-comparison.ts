import { type Location } from './location.js';
import { type SeeingReport } from './seeing-report.js';

export interface RankedLocation {
  readonly rank: number;
  readonly location: Location;
  readonly report: SeeingReport;
}

export interface LocationComparison {
  readonly timestamp: Date;
  readonly locations: readonly Location[];
  readonly reports: readonly SeeingReport[];
  ranked: () => RankedLocation[];
  best: () => RankedLocation | null;
}

export const createLocationComparison = (timestamp: Date, locations: readonly Location[], reports: readonly SeeingReport[]): LocationComparison => {
  if (locations.length !== reports.length) {
    throw new RangeError(`Expected one report per location (got ${locations.length} locations, ${reports.length} reports)`);
  }

  const ranked = (): RankedLocation[] =>
    locations
      .map((location, index) => ({ location, report: reports[index] }))
      .sort((left, right) => right.report.score.totalScore - left.report.score.totalScore)
      .map((entry, index) => ({ rank: index + 1, ...entry }));

  return {
    timestamp,
    locations,
    reports,
    ranked,
    best: () => ranked()[0] ?? null,
  };
};
