import { WeatherFetchError, describeError } from './errors.js';
import { findImagingWindows, type ImagingWindow } from './imaging-windows.js';
import { createLocationComparison, type LocationComparison } from './location-comparison.js';
import { type Location } from './location.js';
import { findBestWindow, getBestNights, type BestNight, type ObservingWindow } from './observing-windows.js';
import { type SeeingReport } from './seeing-report.js';
import { type SeeingService, type TargetInput } from './seeing-service.js';

export interface TargetVisibilityPoint {
  readonly time: Date;
  readonly altitude: number;
  readonly azimuth: number;
  readonly airmass: number;
  readonly isVisible: boolean;
  readonly score: number;
  readonly isNight: boolean;
  readonly cloudCover: number;
}

interface BestWindowOptions {
  hours?: number;
  minScore?: number;
  minDurationHours?: number;
}

interface BestNightsOptions {
  days?: number;
  minScore?: number;
}

interface ImagingWindowOptions {
  durationHours?: number;
  minAltitude?: number;
  minScore?: number;
  searchDays?: number;
  date?: string | null;
}

export interface ForecastService {
  findBestWindow: (location: Location, options?: BestWindowOptions) => Promise<ObservingWindow | null>;
  compareLocations: (locations: readonly Location[], timestamp?: Date) => Promise<LocationComparison>;
  getBestNights: (location: Location, options?: BestNightsOptions) => Promise<BestNight[]>;
  getTargetVisibility: (location: Location, target: TargetInput, hours?: number) => Promise<TargetVisibilityPoint[]>;
  findImagingWindows: (location: Location, target: TargetInput, options?: ImagingWindowOptions) => Promise<ImagingWindow[]>;
}

export const createForecastService = ({ seeingService }: { seeingService: SeeingService }): ForecastService => {
  const { astronomy } = seeingService;

  return {
    findBestWindow: async (location, { hours = 48, minScore = 50, minDurationHours = 2 } = {}) => {
      const forecasts = await seeingService.getForecast(location, hours);
      return findBestWindow(forecasts, { minScore, minDurationHours });
    },

    compareLocations: async (locations, timestamp = new Date()) => {
      const settled = await Promise.allSettled(locations.map((location) => seeingService.getCurrentConditions(location)));

      const kept: Location[] = [];
      const reports: SeeingReport[] = [];
      settled.forEach((result, index) => {
        const location = locations[index];
        if (result.status === 'fulfilled') {
          kept.push(location);
          reports.push(result.value);
        } else {
          console.warn(`[Compare] Dropping ${location.name}: ${describeError(result.reason)}`);
        }
      });

      if (locations.length > 0 && reports.length === 0) {
        throw new WeatherFetchError('Conditions unavailable for every location', 'compare');
      }
      return createLocationComparison(timestamp, kept, reports);
    },

    getBestNights: async (location, { days = 7, minScore = 60 } = {}) => {
      const forecasts = await seeingService.getForecast(location, days * 24);
      return getBestNights(forecasts, { location, minScore });
    },

    getTargetVisibility: async (location, target, hours = 24) => {
      const targetObject = seeingService.resolveTarget(target);
      if (!targetObject) return [];
      const forecasts = await seeingService.getForecast(location, hours, targetObject);
      return forecasts.map((forecast) => {
        const position = astronomy.getTargetPosition(targetObject, location, forecast.timestamp);
        return {
          time: forecast.timestamp,
          altitude: position.altitude,
          azimuth: position.azimuth,
          airmass: position.airmass,
          isVisible: position.isVisible,
          score: forecast.score.totalScore,
          isNight: forecast.isNight,
          cloudCover: forecast.weather.cloudCover,
        };
      });
    },

    findImagingWindows: async (location, target, { durationHours = 4, minAltitude = 30, minScore = 40, searchDays = 7, date = null } = {}) => {
      const targetObject = seeingService.resolveTarget(target);
      if (!targetObject) return [];
      // Plain seeing scores; the Moon is reported per window instead.
      const forecasts = await seeingService.getForecast(location, searchDays * 24);
      return findImagingWindows({
        target: targetObject,
        location,
        forecasts,
        astronomy,
        durationHours,
        minAltitude,
        minScore,
        date,
      });
    },
  };
};
