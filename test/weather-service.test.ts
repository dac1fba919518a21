import { WeatherFetchError } from '../src/utils/errors.js';
import { createFetchWithTimeout, type FetchLike } from '../src/utils/http-client.js';
import {
  buildOpenMeteoForecastUrl,
  createOpenMeteoJetStreamProvider,
  createOpenMeteoWeatherProvider,
  parseOpenMeteoForecast,
} from '../src/utils/weather-service.js';
import { BASE_TIME, hoursAfterBase } from './helpers.js';

const forecastPayload = {
  hourly: {
    time: ['2024-03-10T00:00', 'not-a-time', '2024-03-10T02:00'],
    temperature_2m: [10, 11, null],
    dew_point_2m: [2, 3, 4],
    relative_humidity_2m: [60, 65, null],
    cloud_cover: [20, 30, 40],
    cloud_cover_low: [5, null, 10],
    wind_speed_10m: [36, 18, 7.2],
    wind_gusts_10m: [72, 0, null],
  },
};

const jetPayload = {
  hourly: {
    time: ['2024-03-10T00:00', '2024-03-10T01:00'],
    wind_speed_250hPa: [180, 90],
  },
};

const jsonResponse = (body: unknown, status = 200): Response => new Response(JSON.stringify(body), { status });

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

test('forecast URLs request UTC hourly data and clamp the horizon', () => {
  const params = new URL(buildOpenMeteoForecastUrl(40, -105, 500)).searchParams;
  expect(params.get('forecast_hours')).toBe('384');
  expect(params.get('timezone')).toBe('UTC');
  expect(params.get('hourly')).toContain('wind_speed_80m');
  expect(new URL(buildOpenMeteoForecastUrl(40, -105, 0)).searchParams.get('forecast_hours')).toBe('1');
});

test('forecast payloads become samples with speeds in m/s', () => {
  const samples = parseOpenMeteoForecast(forecastPayload);

  expect(samples.map((sample) => sample.timestamp)).toEqual([BASE_TIME, hoursAfterBase(2)]);
  expect(samples[0]).toMatchObject({
    temperature: 10,
    dewPoint: 2,
    humidity: 60,
    cloudCover: 20,
    cloudCoverLow: 5,
    windSpeed10m: 10,
    windGusts: 20,
    windSpeed80m: null,
    pressure: 1013.25,
  });
  expect(samples[1].temperature).toBe(0);
  expect(samples[1].humidity).toBe(50);
  expect(samples[1].windSpeed10m).toBeCloseTo(2, 10);
  expect(samples[1].windGusts).toBe(0);
  expect(console.warn).toHaveBeenCalledWith('[Weather] Skipping forecast hour with unreadable time "not-a-time"');
});

test('a payload without hourly data is rejected', () => {
  expect(() => parseOpenMeteoForecast({})).toThrow(WeatherFetchError);
});

test('the weather provider sends the configured headers', async () => {
  const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse(forecastPayload));
  const provider = createOpenMeteoWeatherProvider({
    fetchWithTimeout: createFetchWithTimeout(1000, fetchImpl),
    headers: { 'User-Agent': 'test-agent' },
  });

  const current = await provider.getCurrent(40, -105);

  expect(current.timestamp).toEqual(BASE_TIME);
  expect(fetchImpl).toHaveBeenCalledTimes(1);
  const [url, init] = fetchImpl.mock.calls[0];
  expect(new URL(url).searchParams.get('forecast_hours')).toBe('1');
  expect(init?.headers).toEqual({ 'User-Agent': 'test-agent' });
});

test('HTTP failures surface as WeatherFetchError', async () => {
  const provider = createOpenMeteoWeatherProvider({
    fetchWithTimeout: createFetchWithTimeout(
      1000,
      vi.fn<FetchLike>(async () => new Response('upstream down', { status: 503 })),
    ),
  });

  const error = await provider.getForecast(40, -105, 24).catch((caught: unknown) => caught);
  expect(error).toBeInstanceOf(WeatherFetchError);
  if (!(error instanceof WeatherFetchError)) return;
  expect(error.message).toBe('HTTP 503: upstream down');
  expect(error.source).toBe('OpenMeteo');
  expect(error.statusCode).toBe(502);
});

test('timeouts abort the request', async () => {
  const hangingFetch: FetchLike = (_url, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  const provider = createOpenMeteoWeatherProvider({ fetchWithTimeout: createFetchWithTimeout(10, hangingFetch) });

  await expect(provider.getForecast(40, -105, 24)).rejects.toThrow('Request failed: aborted');
});

test('an empty forecast has no current conditions', async () => {
  const provider = createOpenMeteoWeatherProvider({
    fetchWithTimeout: createFetchWithTimeout(
      1000,
      vi.fn<FetchLike>(async () => jsonResponse({ hourly: { time: [] } })),
    ),
  });

  await expect(provider.getCurrent(40, -105)).rejects.toThrow('No forecast data available');
});

test('jet stream speeds are converted and matched to the nearest hour', async () => {
  const provider = createOpenMeteoJetStreamProvider({
    fetchWithTimeout: createFetchWithTimeout(
      1000,
      vi.fn<FetchLike>(async () => jsonResponse(jetPayload)),
    ),
  });

  const series = await provider.getJetStreamSeries(40, -105, 2);
  expect(series.map((point) => point.speed)).toEqual([50, 25]);
  await expect(provider.getJetStreamSpeed(40, -105, new Date(BASE_TIME.getTime() + 50 * 60 * 1000))).resolves.toBe(25);
});

test('jet stream failures resolve to no data', async () => {
  const provider = createOpenMeteoJetStreamProvider({
    fetchWithTimeout: createFetchWithTimeout(
      1000,
      vi.fn<FetchLike>(async () => {
        throw new Error('offline');
      }),
    ),
  });

  await expect(provider.getJetStreamSeries(40, -105, 24)).resolves.toEqual([]);
  await expect(provider.getJetStreamSpeed(40, -105, BASE_TIME)).resolves.toBeNull();
  expect(console.warn).toHaveBeenCalledWith('[JetStream] GFS upper-air request failed: Request failed: offline');
});
