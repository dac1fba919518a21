import { clampScore, interpolateKnots, linearInterpolate, type Knot } from './math.js';
import { signal, temperatureDifferential, windShear, type WeatherSample } from './weather.js';

export const COMPONENT_NAMES = ['temperature_differential', 'wind_stability', 'humidity', 'cloud_cover', 'jet_stream'] as const;
export type ComponentName = (typeof COMPONENT_NAMES)[number];

export const PENALTY_NAMES = ['moon', 'airmass', 'precipitation'] as const;
export type PenaltyName = (typeof PENALTY_NAMES)[number];

// Score curves, ascending by signal.
const TEMPERATURE_DIFFERENTIAL_KNOTS: readonly Knot[] = [
  [0, 10],
  [2, 40],
  [5, 70],
  [10, 90],
  [15, 100],
];

const WIND_KNOTS: readonly Knot[] = [
  [2, 100],
  [5, 80],
  [10, 50],
  [20, 20],
];
const WIND_FLOOR = 10;

const HUMIDITY_KNOTS: readonly Knot[] = [
  [30, 100],
  [50, 85],
  [70, 60],
  [85, 35],
  [95, 15],
  [100, 0],
];

const CLOUD_KNOTS: readonly Knot[] = [
  [5, 100],
  [20, 85],
  [50, 50],
  [80, 20],
  [100, 0],
];

const JET_STREAM_KNOTS: readonly Knot[] = [
  [15, 100],
  [30, 85],
  [45, 60],
  [60, 35],
  [100, 10],
];
export const JET_STREAM_ABSENT_SCORE = 75;

const AIRMASS_KNOTS: readonly Knot[] = [
  [1.2, 1.0],
  [1.5, 0.95],
  [2.0, 0.85],
  [3.0, 0.65],
  [5.0, 0.5],
];

export const temperatureDifferentialScore = (weather: WeatherSample): number =>
  clampScore(interpolateKnots(temperatureDifferential(weather), TEMPERATURE_DIFFERENTIAL_KNOTS));

const baseWindScore = (windSpeed: number): number => {
  if (windSpeed > 20) {
    // keeps the 10-20 m/s slope until the floor
    return Math.max(WIND_FLOOR, linearInterpolate(windSpeed, 10, 20, 50, 20));
  }
  return interpolateKnots(windSpeed, WIND_KNOTS);
};

export const windStabilityScore = (weather: WeatherSample): number => {
  let score = baseWindScore(weather.windSpeed10m);

  const gustRatio = weather.windGusts / Math.max(weather.windSpeed10m, 0.1);
  if (gustRatio > 2) {
    score -= linearInterpolate(gustRatio, 2, 4, 0, 30);
  }

  const shear = windShear(weather);
  if (shear.present && shear.value > 5) {
    score -= linearInterpolate(shear.value, 5, 15, 0, 20);
  }

  return clampScore(score);
};

export const humidityScore = (weather: WeatherSample): number => clampScore(interpolateKnots(weather.humidity, HUMIDITY_KNOTS));

/**
 * Total cover sets the base. When both layer splits are reported, high thin
 * cloud over a clear low deck earns up to +10 and a dominant low deck costs up to 15.
 */
export const cloudCoverScore = (weather: WeatherSample): number => {
  let score = interpolateKnots(weather.cloudCover, CLOUD_KNOTS);

  const low = signal(weather.cloudCoverLow);
  const high = signal(weather.cloudCoverHigh);
  if (low.present && high.present) {
    if (high.value > low.value * 2) {
      score += Math.min(10, (high.value - low.value) * 0.2);
    } else if (low.value > high.value * 2) {
      score -= Math.min(15, (low.value - high.value) * 0.3);
    }
  }

  return clampScore(score);
};

export const jetStreamScore = (weather: WeatherSample): number => {
  const jet = signal(weather.jetStreamSpeed);
  if (!jet.present) return JET_STREAM_ABSENT_SCORE;
  return clampScore(interpolateKnots(jet.value, JET_STREAM_KNOTS));
};

/** Informational only; not part of the weighted total. */
export const pressureStabilityScore = (weather: WeatherSample): number => {
  const { pressure } = weather;
  if (pressure < 1000 || pressure > 1040) return 30;
  if (pressure >= 1020 && pressure <= 1030) return 100;
  if (pressure > 1030) return linearInterpolate(pressure, 1030, 1040, 100, 85);
  if (pressure >= 1015) return linearInterpolate(pressure, 1015, 1020, 85, 100);
  if (pressure >= 1005) return linearInterpolate(pressure, 1005, 1015, 60, 85);
  return linearInterpolate(pressure, 1000, 1005, 40, 60);
};

export const COMPONENT_SCORERS: Readonly<Record<ComponentName, (weather: WeatherSample) => number>> = {
  temperature_differential: temperatureDifferentialScore,
  wind_stability: windStabilityScore,
  humidity: humidityScore,
  cloud_cover: cloudCoverScore,
  jet_stream: jetStreamScore,
};

export const moonPenalty = (moonIllumination: number, moonAltitude: number, isDeepSky: boolean): number => {
  if (!isDeepSky || moonAltitude <= 0) return 1.0;
  const altitudeFactor = Math.min(1, moonAltitude / 45);
  const illuminationFactor = Math.min(100, Math.max(0, moonIllumination)) / 100;
  return Math.max(0.5, 1 - altitudeFactor * illuminationFactor * 0.5);
};

export const airmassPenalty = (airmass: number): number => {
  if (airmass <= 1.2) return 1.0;
  return interpolateKnots(Math.min(airmass, 5), AIRMASS_KNOTS);
};

export const precipitationPenalty = (weather: WeatherSample): number => {
  if (weather.precipitation > 0) return 0.1;

  const probability = signal(weather.precipitationProbability);
  if (!probability.present) return 1.0;

  const chance = probability.value;
  if (chance > 80) return 0.3;
  if (chance > 50) return linearInterpolate(chance, 50, 80, 0.6, 0.3);
  if (chance > 20) return linearInterpolate(chance, 20, 50, 0.9, 0.6);
  return 1.0;
};
