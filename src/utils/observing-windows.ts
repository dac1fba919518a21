import { type Location } from './location.js';
import { average } from './math.js';
import { type SeeingForecast } from './seeing-report.js';
import { MS_PER_HOUR } from './time.js';

export interface ObservingWindow {
  readonly start: Date;
  readonly end: Date;
  readonly averageScore: number;
  readonly peakScore: number;
  readonly peakTime: Date;
  readonly durationHours: number;
  readonly forecasts: readonly SeeingForecast[];
}

export interface ContiguousRunOptions<T> {
  timestampOf: (item: T) => Date;
  qualifies: (item: T) => boolean;
  /** Minimum length a run needs to be emitted, in hours per `measure`. */
  minDurationHours: number;
  /**
   * `count` takes one hour per member sample. `span` takes the time from the
   * first to the last sample, with a single sample counting as one hour.
   */
  measure?: 'count' | 'span';
  maxGapHours?: number;
  /**
   * When set, a non-qualifying sample closes the open run. Otherwise it is
   * skipped and only the gap between qualifying samples matters.
   */
  breakOnDisqualified?: boolean;
}

export const spanHours = (start: Date, end: Date): number => {
  const hours = (end.getTime() - start.getTime()) / MS_PER_HOUR;
  return hours > 0 ? hours : 1;
};

/**
 * Single pass over samples in ascending time order. Returns every maximal run
 * of qualifying samples whose neighbours are at most `maxGapHours` apart.
 */
export const findContiguousRuns = <T>(
  items: readonly T[],
  { timestampOf, qualifies, minDurationHours, maxGapHours = 2, breakOnDisqualified = false, measure = 'count' }: ContiguousRunOptions<T>,
): T[][] => {
  const runs: T[][] = [];
  const maxGapMs = maxGapHours * MS_PER_HOUR;
  let current: T[] = [];

  const runHours = (run: readonly T[]): number =>
    measure === 'span' ? spanHours(timestampOf(run[0]), timestampOf(run[run.length - 1])) : run.length;

  const close = () => {
    if (current.length > 0 && runHours(current) >= minDurationHours) {
      runs.push(current);
    }
    current = [];
  };

  for (const item of items) {
    if (!qualifies(item)) {
      if (breakOnDisqualified) close();
      continue;
    }

    const last = current[current.length - 1];
    if (last !== undefined && timestampOf(item).getTime() - timestampOf(last).getTime() > maxGapMs) {
      close();
    }
    current.push(item);
  }
  close();

  return runs;
};

export const createObservingWindow = (forecasts: readonly SeeingForecast[]): ObservingWindow => {
  if (forecasts.length === 0) {
    throw new RangeError('An observing window needs at least one forecast');
  }
  const first = forecasts[0];
  const last = forecasts[forecasts.length - 1];
  let peak = first;
  for (const forecast of forecasts) {
    if (forecast.score.totalScore > peak.score.totalScore) peak = forecast;
  }

  return {
    start: first.timestamp,
    end: last.timestamp,
    averageScore: average(forecasts.map((forecast) => forecast.score.totalScore)) ?? 0,
    peakScore: peak.score.totalScore,
    peakTime: peak.timestamp,
    durationHours: spanHours(first.timestamp, last.timestamp),
    forecasts,
  };
};

export interface WindowSearchOptions {
  minScore?: number;
  minDurationHours?: number;
}

export const findObservingWindows = (
  forecasts: readonly SeeingForecast[],
  { minScore = 50, minDurationHours = 2 }: WindowSearchOptions = {},
): ObservingWindow[] =>
  findContiguousRuns(forecasts, {
    timestampOf: (forecast) => forecast.timestamp,
    qualifies: (forecast) => forecast.isNight && forecast.score.totalScore >= minScore,
    minDurationHours,
  }).map(createObservingWindow);

/** Highest average score wins; the earlier window keeps a tie. */
export const findBestWindow = (forecasts: readonly SeeingForecast[], options: WindowSearchOptions = {}): ObservingWindow | null =>
  findObservingWindows(forecasts, options).reduce<ObservingWindow | null>(
    (best, window) => (best === null || window.averageScore > best.averageScore ? window : best),
    null,
  );

export interface BestNight {
  /** YYYY-MM-DD of the evening the night starts on (local solar time). */
  readonly date: string;
  readonly averageScore: number;
  readonly hours: number;
  readonly summary: string;
}

// Shift to local solar time, then back 12 h so a whole night shares one date.
const nightKey = (timestamp: Date, longitude: number): string =>
  new Date(timestamp.getTime() + (longitude / 15) * MS_PER_HOUR - 12 * MS_PER_HOUR).toISOString().slice(0, 10);

const describeNight = (averageScore: number, cloudAverage: number, windAverage: number): string => {
  const parts = [averageScore >= 80 ? 'Excellent' : averageScore >= 65 ? 'Very good' : 'Good'];
  parts.push(cloudAverage < 20 ? 'clear skies' : cloudAverage < 50 ? 'partly cloudy' : 'variable clouds');
  if (windAverage < 3) parts.push('calm');
  else if (windAverage < 7) parts.push('light wind');
  return parts.join('. ');
};

interface BestNightsOptions {
  location: Pick<Location, 'longitude'>;
  minScore?: number;
}

export const getBestNights = (forecasts: readonly SeeingForecast[], { location, minScore = 60 }: BestNightsOptions): BestNight[] => {
  const nights = new Map<string, SeeingForecast[]>();
  for (const forecast of forecasts) {
    if (!forecast.isNight) continue;
    const key = nightKey(forecast.timestamp, location.longitude);
    const bucket = nights.get(key);
    if (bucket) bucket.push(forecast);
    else nights.set(key, [forecast]);
  }

  const results: BestNight[] = [];
  for (const [date, nightForecasts] of nights) {
    const averageScore = average(nightForecasts.map((forecast) => forecast.score.totalScore)) ?? 0;
    if (averageScore < minScore) continue;
    const cloudAverage = average(nightForecasts.map((forecast) => forecast.weather.cloudCover)) ?? 0;
    const windAverage = average(nightForecasts.map((forecast) => forecast.weather.windSpeed10m)) ?? 0;
    results.push({
      date,
      averageScore,
      hours: nightForecasts.length,
      summary: describeNight(averageScore, cloudAverage, windAverage),
    });
  }

  return results.sort((left, right) => right.averageScore - left.averageScore);
};
