import { type AstronomyCalculator } from './astronomy.js';
import { type CelestialObject } from './celestial.js';
import { type Location } from './location.js';
import { average } from './math.js';
import { analyzeMoonInterference, type MoonInterference } from './moon-interference.js';
import { findContiguousRuns, spanHours } from './observing-windows.js';
import { type SeeingForecast } from './seeing-report.js';

const PROFILE_INTERVAL_MS = 15 * 60 * 1000;

export interface AltitudeSample {
  readonly time: Date;
  readonly altitude: number;
}

export interface ImagingWindow {
  readonly targetName: string;
  readonly targetDescription: string | null;
  /** UTC midnight of the day the window starts. */
  readonly date: Date;
  readonly start: Date;
  readonly end: Date;
  readonly startAltitude: number;
  readonly endAltitude: number;
  readonly startAzimuth: number;
  readonly endAzimuth: number;
  readonly peakAltitude: number;
  readonly peakTime: Date;
  readonly averageScore: number;
  readonly minScore: number;
  readonly maxScore: number;
  readonly durationHours: number;
  readonly durationLabel: string;
  readonly moonInterference: MoonInterference;
  readonly altitudeProfile: readonly AltitudeSample[];
  readonly forecasts: readonly SeeingForecast[];
}

interface PositionedForecast {
  forecast: SeeingForecast;
  altitude: number;
  azimuth: number;
}

export const formatDuration = (hours: number): string => {
  const whole = Math.floor(hours);
  const minutes = Math.floor((hours - whole) * 60);
  return `${whole}h ${String(minutes).padStart(2, '0')}m`;
};

const startOfUtcDay = (time: Date): Date => new Date(Date.UTC(time.getUTCFullYear(), time.getUTCMonth(), time.getUTCDate()));

const isoDate = (time: Date): string => time.toISOString().slice(0, 10);

export const buildAltitudeProfile = (
  target: CelestialObject,
  location: Location,
  start: Date,
  end: Date,
  astronomy: Pick<AstronomyCalculator, 'getTargetPosition'>,
): AltitudeSample[] => {
  const profile: AltitudeSample[] = [];
  for (let ms = start.getTime(); ms <= end.getTime(); ms += PROFILE_INTERVAL_MS) {
    const time = new Date(ms);
    profile.push({ time, altitude: astronomy.getTargetPosition(target, location, time).altitude });
  }
  return profile;
};

interface FindImagingWindowsOptions {
  target: CelestialObject;
  location: Location;
  forecasts: readonly SeeingForecast[];
  astronomy: Pick<AstronomyCalculator, 'getTargetPosition' | 'getMoonPosition' | 'getMoonIllumination'>;
  durationHours?: number;
  minAltitude?: number;
  minScore?: number;
  /** YYYY-MM-DD; limits the search to forecast hours on that UTC date. */
  date?: string | null;
}

const buildImagingWindow = (
  run: readonly PositionedForecast[],
  { target, location, astronomy }: Pick<FindImagingWindowsOptions, 'target' | 'location' | 'astronomy'>,
): ImagingWindow => {
  const first = run[0];
  const last = run[run.length - 1];
  const scores = run.map((entry) => entry.forecast.score.totalScore);
  let peak = first;
  for (const entry of run) {
    if (entry.altitude > peak.altitude) peak = entry;
  }

  const start = first.forecast.timestamp;
  const end = last.forecast.timestamp;
  const durationHours = spanHours(start, end);

  return {
    targetName: target.name,
    targetDescription: target.description,
    date: startOfUtcDay(start),
    start,
    end,
    startAltitude: first.altitude,
    endAltitude: last.altitude,
    startAzimuth: first.azimuth,
    endAzimuth: last.azimuth,
    peakAltitude: peak.altitude,
    peakTime: peak.forecast.timestamp,
    averageScore: average(scores) ?? 0,
    minScore: Math.min(...scores),
    maxScore: Math.max(...scores),
    durationHours,
    durationLabel: formatDuration(durationHours),
    moonInterference: analyzeMoonInterference({ target, location, start, end, astronomy }),
    altitudeProfile: buildAltitudeProfile(target, location, start, end, astronomy),
    forecasts: run.map((entry) => entry.forecast),
  };
};

/**
 * Every night-time run where the target stays above `minAltitude` with a
 * score of at least `minScore`, best average first. Any failing hour ends a run.
 */
export const findImagingWindows = ({
  target,
  location,
  forecasts,
  astronomy,
  durationHours = 4,
  minAltitude = 30,
  minScore = 40,
  date = null,
}: FindImagingWindowsOptions): ImagingWindow[] => {
  const positioned: PositionedForecast[] = forecasts
    .filter((forecast) => !date || isoDate(forecast.timestamp) === date)
    .map((forecast) => {
      const position = astronomy.getTargetPosition(target, location, forecast.timestamp);
      return { forecast, altitude: position.altitude, azimuth: position.azimuth };
    });

  const runs = findContiguousRuns(positioned, {
    timestampOf: (entry) => entry.forecast.timestamp,
    qualifies: (entry) => entry.forecast.isNight && entry.altitude >= minAltitude && entry.forecast.score.totalScore >= minScore,
    minDurationHours: durationHours,
    measure: 'span',
    breakOnDisqualified: true,
  });

  return runs
    .map((run) => buildImagingWindow(run, { target, location, astronomy }))
    .sort((left, right) => right.averageScore - left.averageScore);
};
