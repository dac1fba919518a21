import { z } from 'zod';
import { WeatherFetchError, describeError } from './errors.js';
import { type FetchWithTimeout } from './http-client.js';
import { findClosestTimeIndex, parseIsoTimeToMs } from './time.js';
import { createWeatherSample, kmhToMs, type WeatherSample } from './weather.js';

export interface WeatherProvider {
  getCurrent: (lat: number, lon: number) => Promise<WeatherSample>;
  /** One sample per hour, ascending; may come back shorter than requested. */
  getForecast: (lat: number, lon: number, hours: number) => Promise<WeatherSample[]>;
}

export interface JetStreamPoint {
  readonly timestamp: Date;
  /** m/s at 250 hPa */
  readonly speed: number | null;
}

export interface JetStreamProvider {
  getJetStreamSpeed: (lat: number, lon: number, time: Date) => Promise<number | null>;
  getJetStreamSeries: (lat: number, lon: number, hours: number) => Promise<JetStreamPoint[]>;
}

export const MAX_FORECAST_HOURS = 384;
const OPEN_METEO_SOURCE = 'OpenMeteo';
const GFS_SOURCE = 'OpenMeteo GFS';

const OPEN_METEO_HOURLY_FIELDS = [
  'temperature_2m',
  'dew_point_2m',
  'relative_humidity_2m',
  'pressure_msl',
  'cloud_cover',
  'cloud_cover_low',
  'cloud_cover_mid',
  'cloud_cover_high',
  'wind_speed_10m',
  'wind_speed_80m',
  'wind_gusts_10m',
  'wind_direction_10m',
  'precipitation',
  'precipitation_probability',
  'visibility',
  'temperature_850hPa',
].join(',');

const GFS_HOURLY_FIELDS = ['wind_speed_250hPa', 'wind_speed_500hPa', 'wind_speed_850hPa'].join(',');

const hourlyPayloadSchema = z.object({
  hourly: z
    .object({
      time: z.array(z.string()),
    })
    .catchall(z.array(z.number().nullable())),
});

type HourlySeries = z.infer<typeof hourlyPayloadSchema>['hourly'];

const clampForecastHours = (hours: number): number => Math.max(1, Math.min(Math.round(hours), MAX_FORECAST_HOURS));

export const buildOpenMeteoForecastUrl = (lat: number, lon: number, hours: number): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    hourly: OPEN_METEO_HOURLY_FIELDS,
    forecast_hours: String(clampForecastHours(hours)),
    timezone: 'UTC',
  });
  return `https://api.open-meteo.com/v1/forecast?${params.toString()}`;
};

export const buildOpenMeteoGfsUrl = (lat: number, lon: number, hours: number): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    hourly: GFS_HOURLY_FIELDS,
    forecast_hours: String(clampForecastHours(hours)),
    timezone: 'UTC',
  });
  return `https://api.open-meteo.com/v1/gfs?${params.toString()}`;
};

const valueAt = (hourly: HourlySeries, key: string, index: number): number | null => {
  const series = hourly[key];
  if (!Array.isArray(series) || index >= series.length) return null;
  const value = series[index];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

const speedAt = (hourly: HourlySeries, key: string, index: number): number | null => {
  const kmh = valueAt(hourly, key, index);
  return kmh === null ? null : kmhToMs(kmh);
};

/** Hours with an unreadable timestamp are skipped. Wind speeds arrive in km/h. */
export const parseOpenMeteoForecast = (payload: unknown): WeatherSample[] => {
  const parsed = hourlyPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new WeatherFetchError(`Unexpected forecast payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, OPEN_METEO_SOURCE);
  }
  const { hourly } = parsed.data;

  const samples: WeatherSample[] = [];
  hourly.time.forEach((rawTime, index) => {
    const timeMs = parseIsoTimeToMs(rawTime);
    if (timeMs === null) {
      console.warn(`[Weather] Skipping forecast hour with unreadable time "${rawTime}"`);
      return;
    }
    samples.push(
      createWeatherSample({
        timestamp: new Date(timeMs),
        temperature: valueAt(hourly, 'temperature_2m', index) ?? 0,
        temperature850hPa: valueAt(hourly, 'temperature_850hPa', index),
        dewPoint: valueAt(hourly, 'dew_point_2m', index) ?? 0,
        windSpeed10m: speedAt(hourly, 'wind_speed_10m', index) ?? 0,
        windSpeed80m: speedAt(hourly, 'wind_speed_80m', index),
        windGusts: speedAt(hourly, 'wind_gusts_10m', index) ?? 0,
        windDirection: valueAt(hourly, 'wind_direction_10m', index) ?? 0,
        humidity: valueAt(hourly, 'relative_humidity_2m', index) ?? 50,
        cloudCover: valueAt(hourly, 'cloud_cover', index) ?? 0,
        cloudCoverLow: valueAt(hourly, 'cloud_cover_low', index),
        cloudCoverMid: valueAt(hourly, 'cloud_cover_mid', index),
        cloudCoverHigh: valueAt(hourly, 'cloud_cover_high', index),
        pressure: valueAt(hourly, 'pressure_msl', index) ?? 1013.25,
        precipitation: valueAt(hourly, 'precipitation', index) ?? 0,
        precipitationProbability: valueAt(hourly, 'precipitation_probability', index),
        visibility: valueAt(hourly, 'visibility', index),
      }),
    );
  });
  return samples;
};

export const parseOpenMeteoJetStream = (payload: unknown): JetStreamPoint[] => {
  const parsed = hourlyPayloadSchema.safeParse(payload);
  if (!parsed.success) return [];
  const { hourly } = parsed.data;
  const points: JetStreamPoint[] = [];
  hourly.time.forEach((rawTime, index) => {
    const timeMs = parseIsoTimeToMs(rawTime);
    if (timeMs !== null) {
      points.push({ timestamp: new Date(timeMs), speed: speedAt(hourly, 'wind_speed_250hPa', index) });
    }
  });
  return points;
};

interface OpenMeteoClientOptions {
  fetchWithTimeout: FetchWithTimeout;
  headers?: Record<string, string>;
}

const fetchJson = async (fetchWithTimeout: FetchWithTimeout, url: string, headers: Record<string, string>, source: string): Promise<unknown> => {
  let response: Response;
  try {
    response = await fetchWithTimeout(url, { headers });
  } catch (error) {
    throw new WeatherFetchError(`Request failed: ${describeError(error)}`, source);
  }
  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new WeatherFetchError(`HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`, source);
  }
  try {
    return await response.json();
  } catch (error) {
    throw new WeatherFetchError(`Invalid JSON: ${describeError(error)}`, source);
  }
};

export const createOpenMeteoWeatherProvider = ({ fetchWithTimeout, headers = {} }: OpenMeteoClientOptions): WeatherProvider => {
  const getForecast = async (lat: number, lon: number, hours: number): Promise<WeatherSample[]> => {
    const payload = await fetchJson(fetchWithTimeout, buildOpenMeteoForecastUrl(lat, lon, hours), headers, OPEN_METEO_SOURCE);
    return parseOpenMeteoForecast(payload);
  };

  const getCurrent = async (lat: number, lon: number): Promise<WeatherSample> => {
    const [current] = await getForecast(lat, lon, 1);
    if (!current) {
      throw new WeatherFetchError('No forecast data available', OPEN_METEO_SOURCE);
    }
    return current;
  };

  return { getCurrent, getForecast };
};

/** Upper-air winds are optional input; every failure resolves to no data. */
export const createOpenMeteoJetStreamProvider = ({ fetchWithTimeout, headers = {} }: OpenMeteoClientOptions): JetStreamProvider => {
  const getJetStreamSeries = async (lat: number, lon: number, hours: number): Promise<JetStreamPoint[]> => {
    try {
      return parseOpenMeteoJetStream(await fetchJson(fetchWithTimeout, buildOpenMeteoGfsUrl(lat, lon, hours), headers, GFS_SOURCE));
    } catch (error) {
      console.warn(`[JetStream] GFS upper-air request failed: ${describeError(error)}`);
      return [];
    }
  };

  const getJetStreamSpeed = async (lat: number, lon: number, time: Date): Promise<number | null> => {
    const series = await getJetStreamSeries(lat, lon, 24);
    const index = findClosestTimeIndex(
      series.map((point) => point.timestamp),
      time,
    );
    return index >= 0 ? series[index].speed : null;
  };

  return { getJetStreamSpeed, getJetStreamSeries };
};
