import { type AstronomyCalculator, type AstronomyFrame, type HorizontalPosition, type TargetPosition } from '../src/utils/astronomy.js';
import { celestialObjectSchema, type CelestialObject } from '../src/utils/celestial.js';
import { createLocation } from '../src/utils/location.js';
import { type SeeingScore } from '../src/utils/scoring.js';
import { type SeeingForecast, type SeeingReport } from '../src/utils/seeing-report.js';
import { MS_PER_HOUR, addHours } from '../src/utils/time.js';
import { type JetStreamProvider, type WeatherProvider } from '../src/utils/weather-service.js';
import { createWeatherSample, type WeatherSample } from '../src/utils/weather.js';

export const BASE_TIME = new Date('2024-03-10T00:00:00Z');

export const hoursAfterBase = (hours: number): Date => addHours(BASE_TIME, hours);

export const hourIndex = (time: Date): number => Math.floor((time.getTime() - BASE_TIME.getTime()) / MS_PER_HOUR);

export const testLocation = createLocation({ name: 'Test Site', latitude: 40, longitude: -105, elevation: 1600 });

export const makeObject = (fields: Partial<CelestialObject> & Pick<CelestialObject, 'name' | 'objectType'>): CelestialObject =>
  celestialObjectSchema.parse({ designation: fields.name, ra: 0, dec: 0, ...fields });

export const makeScore = (totalScore: number, timestamp: Date = BASE_TIME): SeeingScore => ({
  totalScore,
  componentScores: {
    temperature_differential: totalScore,
    wind_stability: totalScore,
    humidity: totalScore,
    cloud_cover: totalScore,
    jet_stream: totalScore,
  },
  penalties: {},
  timestamp,
});

interface ForecastFields {
  hour: number;
  score?: number;
  isNight?: boolean;
  cloudCover?: number;
  windSpeed?: number;
  moonIllumination?: number;
  moonAltitude?: number;
}

export const makeForecast = ({
  hour,
  score = 80,
  isNight = true,
  cloudCover = 10,
  windSpeed = 2,
  moonIllumination = 0,
  moonAltitude = -10,
}: ForecastFields): SeeingForecast => {
  const timestamp = hoursAfterBase(hour);
  return {
    timestamp,
    score: makeScore(score, timestamp),
    weather: createWeatherSample({ timestamp, cloudCover, windSpeed10m: windSpeed, windGusts: windSpeed }),
    moonIllumination,
    moonAltitude,
    isNight,
  };
};

export const makeFrame = (fields: Partial<AstronomyFrame> = {}): AstronomyFrame => ({
  moonIllumination: 0,
  moonAltitude: -20,
  moonAzimuth: 90,
  moonPhase: 'New Moon',
  sunAltitude: -30,
  ...fields,
});

interface ReportFields {
  score?: number;
  weather?: Partial<WeatherSample>;
  frame?: Partial<AstronomyFrame>;
}

export const makeReport = ({ score = 75, weather = {}, frame = {} }: ReportFields = {}): SeeingReport => ({
  location: testLocation,
  timestamp: BASE_TIME,
  weather: createWeatherSample({ timestamp: BASE_TIME, ...weather }),
  astronomy: makeFrame(frame),
  score: makeScore(score),
  target: null,
  targetPosition: null,
});

const toTargetPosition = (object: CelestialObject, position: HorizontalPosition): TargetPosition => ({
  object,
  altitude: position.altitude,
  azimuth: position.azimuth,
  airmass: position.altitude > 0 ? 1 / Math.sin((position.altitude * Math.PI) / 180) : Number.POSITIVE_INFINITY,
  isVisible: position.altitude > 0,
});

interface FakeAstronomyOptions {
  /** Target altitude per whole hour after BASE_TIME. */
  targetAltitude?: (hour: number) => number;
  moonAltitude?: (hour: number) => number;
  moonIllumination?: number;
  sunAltitude?: number;
}

/** Deterministic stand-in keyed on hours after BASE_TIME. Targets and Moon sit due south. */
export const createFakeAstronomy = ({
  targetAltitude = () => 50,
  moonAltitude = () => -20,
  moonIllumination = 0,
  sunAltitude = -30,
}: FakeAstronomyOptions = {}): AstronomyCalculator => {
  const getMoonPosition = (_location: unknown, time: Date): HorizontalPosition => ({ altitude: moonAltitude(hourIndex(time)), azimuth: 180 });
  const getAltitudeAzimuth = (_ra: number, _dec: number, _location: unknown, time: Date): HorizontalPosition => ({
    altitude: targetAltitude(hourIndex(time)),
    azimuth: 180,
  });

  return {
    getAstronomyFrame: (location, time) =>
      makeFrame({
        moonIllumination,
        moonAltitude: getMoonPosition(location, time).altitude,
        moonAzimuth: 180,
        sunAltitude,
      }),
    getTargetPosition: (object, location, time) => toTargetPosition(object, getAltitudeAzimuth(object.ra, object.dec, location, time)),
    getMoonPosition,
    getMoonIllumination: () => moonIllumination,
    getSunAltitude: () => sunAltitude,
    isAstronomicalNight: () => sunAltitude < -18,
    getAltitudeAzimuth,
  };
};

/** Mild, dry, nearly still air. Scores 88.8 with no penalties. */
export const makeCalmWeather = (timestamp: Date = BASE_TIME, fields: Partial<WeatherSample> = {}): WeatherSample =>
  createWeatherSample({
    temperature: 18.5,
    dewPoint: 10,
    windSpeed10m: 2.5,
    windGusts: 4.5,
    humidity: 55,
    cloudCover: 15,
    pressure: 1018,
    jetStreamSpeed: 25,
    ...fields,
    timestamp,
  });

/** Calm hourly samples starting at BASE_TIME. */
export const createFakeWeatherProvider = (sampleAt: (hour: number) => WeatherSample = (hour) => makeCalmWeather(hoursAfterBase(hour))) => {
  const provider = {
    getCurrent: vi.fn<WeatherProvider['getCurrent']>(async () => sampleAt(0)),
    getForecast: vi.fn<WeatherProvider['getForecast']>(async (_lat, _lon, hours) => Array.from({ length: hours }, (_, hour) => sampleAt(hour))),
  };
  return provider;
};

export const createFakeJetStreamProvider = (speed: number | null = 25) => ({
  getJetStreamSpeed: vi.fn<JetStreamProvider['getJetStreamSpeed']>(async () => speed),
  getJetStreamSeries: vi.fn<JetStreamProvider['getJetStreamSeries']>(async () => []),
});
