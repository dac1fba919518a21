import { debugLog } from '../server/runtime.js';
import { ASTRONOMICAL_NIGHT_SUN_ALTITUDE, type AstronomyCalculator } from './astronomy.js';
import { type CelestialCatalog } from './catalog.js';
import { isDeepSky, type CelestialObject } from './celestial.js';
import { WeatherFetchError, describeError } from './errors.js';
import { type Location } from './location.js';
import { type ScoringEngine } from './scoring.js';
import { type SeeingForecast, type SeeingReport } from './seeing-report.js';
import { addHours, findClosestTimeIndex } from './time.js';
import { type WeatherCache } from './weather-cache.js';
import { type JetStreamPoint, type JetStreamProvider, type WeatherProvider } from './weather-service.js';
import { withJetStreamSpeed, type WeatherSample } from './weather.js';

export type TargetInput = CelestialObject | string | null | undefined;

export interface SeeingService {
  readonly astronomy: AstronomyCalculator;
  readonly catalog: CelestialCatalog;
  readonly scoring: ScoringEngine;
  resolveTarget: (target: TargetInput) => CelestialObject | null;
  getCurrentConditions: (location: Location, target?: TargetInput) => Promise<SeeingReport>;
  getForecast: (location: Location, hours: number, target?: TargetInput) => Promise<SeeingForecast[]>;
}

interface CreateSeeingServiceOptions {
  weatherProvider: WeatherProvider;
  jetStreamProvider: JetStreamProvider;
  astronomy: AstronomyCalculator;
  catalog: CelestialCatalog;
  scoring: ScoringEngine;
  cache?: WeatherCache | null;
  cacheTtlMs: number;
  now?: () => Date;
}

// Nearest upper-air point no more than this far from the forecast hour.
const JET_STREAM_MATCH_WINDOW_MS = 90 * 60 * 1000;

const mergeJetStream = (samples: readonly WeatherSample[], series: readonly JetStreamPoint[]): WeatherSample[] => {
  if (series.length === 0) return [...samples];
  const times = series.map((point) => point.timestamp);
  return samples.map((sample) => {
    const index = findClosestTimeIndex(times, sample.timestamp);
    if (index < 0) return sample;
    const point = series[index];
    if (point.speed === null || Math.abs(point.timestamp.getTime() - sample.timestamp.getTime()) > JET_STREAM_MATCH_WINDOW_MS) {
      return sample;
    }
    return withJetStreamSpeed(sample, point.speed);
  });
};

export const createSeeingService = ({
  weatherProvider,
  jetStreamProvider,
  astronomy,
  catalog,
  scoring,
  cache = null,
  cacheTtlMs,
  now = () => new Date(),
}: CreateSeeingServiceOptions): SeeingService => {
  const resolveTarget = (target: TargetInput): CelestialObject | null => {
    if (!target) return null;
    return typeof target === 'string' ? catalog.get(target) : target;
  };

  const getWeather = async (location: Location, time: Date): Promise<WeatherSample> => {
    const { latitude: lat, longitude: lon } = location;
    const cached = cache?.get(lat, lon, time, { ttlMs: cacheTtlMs }) ?? null;
    if (cached) {
      debugLog(`Using cached weather for ${location.name}`);
      return cached;
    }

    try {
      const weather = await weatherProvider.getCurrent(lat, lon);
      cache?.set(lat, lon, weather);
      return weather;
    } catch (error) {
      if (!(error instanceof WeatherFetchError)) throw error;
      console.warn(`[Weather] Current conditions failed for ${location.name}: ${error.message}`);
      const stale = cache?.get(lat, lon, time, { ignoreTtl: true }) ?? null;
      if (stale) {
        console.log(`[Cache] Serving stale weather for ${location.name}`);
        return stale;
      }
      throw error;
    }
  };

  const getWeatherForecast = async (location: Location, hours: number): Promise<WeatherSample[]> => {
    const { latitude: lat, longitude: lon } = location;
    try {
      const forecast = await weatherProvider.getForecast(lat, lon, hours);
      if (forecast.length > 0) cache?.setBatch(lat, lon, forecast);
      return forecast;
    } catch (error) {
      if (!(error instanceof WeatherFetchError)) throw error;
      console.warn(`[Weather] Forecast failed for ${location.name}: ${error.message}`);
      const start = now();
      const cached = cache?.getRange(lat, lon, start, addHours(start, hours), { ttlMs: cacheTtlMs * 2 }) ?? [];
      if (cached.length > 0) {
        console.log(`[Cache] Serving ${cached.length} cached forecast hours for ${location.name}`);
        return cached;
      }
      throw error;
    }
  };

  const getJetStreamSpeed = async (location: Location, time: Date): Promise<number | null> => {
    try {
      return await jetStreamProvider.getJetStreamSpeed(location.latitude, location.longitude, time);
    } catch (error) {
      debugLog(`Jet stream lookup failed: ${describeError(error)}`);
      return null;
    }
  };

  const getJetStreamSeries = async (location: Location, hours: number): Promise<JetStreamPoint[]> => {
    try {
      return await jetStreamProvider.getJetStreamSeries(location.latitude, location.longitude, hours);
    } catch (error) {
      debugLog(`Jet stream series failed: ${describeError(error)}`);
      return [];
    }
  };

  const getCurrentConditions = async (location: Location, target?: TargetInput): Promise<SeeingReport> => {
    const timestamp = now();
    const targetObject = resolveTarget(target);

    const [baseWeather, jetSpeed] = await Promise.all([getWeather(location, timestamp), getJetStreamSpeed(location, timestamp)]);
    const weather = jetSpeed === null ? baseWeather : withJetStreamSpeed(baseWeather, jetSpeed);

    const frame = astronomy.getAstronomyFrame(location, timestamp);
    const targetPosition = targetObject ? astronomy.getTargetPosition(targetObject, location, timestamp) : null;

    const score = scoring.calculateScore(weather, {
      moonIllumination: frame.moonIllumination,
      moonAltitude: frame.moonAltitude,
      airmass: targetPosition?.airmass ?? null,
      isDeepSky: targetObject ? isDeepSky(targetObject) : false,
    });

    return {
      location,
      timestamp,
      weather,
      astronomy: frame,
      score,
      target: targetObject,
      targetPosition,
    };
  };

  const getForecast = async (location: Location, hours: number, target?: TargetInput): Promise<SeeingForecast[]> => {
    const targetObject = resolveTarget(target);
    const deepSky = targetObject ? isDeepSky(targetObject) : false;

    const [weatherList, jetSeries] = await Promise.all([getWeatherForecast(location, hours), getJetStreamSeries(location, hours)]);

    return mergeJetStream(weatherList, jetSeries).map((weather) => {
      const frame = astronomy.getAstronomyFrame(location, weather.timestamp);
      const airmass = targetObject ? astronomy.getTargetPosition(targetObject, location, weather.timestamp).airmass : null;
      return {
        timestamp: weather.timestamp,
        score: scoring.calculateScore(weather, {
          moonIllumination: frame.moonIllumination,
          moonAltitude: frame.moonAltitude,
          airmass,
          isDeepSky: deepSky,
        }),
        weather,
        moonIllumination: frame.moonIllumination,
        moonAltitude: frame.moonAltitude,
        isNight: frame.sunAltitude < ASTRONOMICAL_NIGHT_SUN_ALTITUDE,
      };
    });
  };

  return {
    astronomy,
    catalog,
    scoring,
    resolveTarget,
    getCurrentConditions,
    getForecast,
  };
};
