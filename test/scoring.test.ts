import { ConfigError } from '../src/utils/errors.js';
import {
  DEFAULT_WEIGHTS,
  createScoringEngine,
  createScoringWeights,
  getSeeingRating,
  parseScoringWeights,
} from '../src/utils/scoring.js';
import { createWeatherSample } from '../src/utils/weather.js';
import { BASE_TIME } from './helpers.js';

const calmNight = createWeatherSample({
  timestamp: BASE_TIME,
  temperature: 18.5,
  dewPoint: 10,
  windSpeed10m: 2.5,
  windGusts: 4.5,
  humidity: 55,
  cloudCover: 15,
  pressure: 1018,
  jetStreamSpeed: 25,
});

const stormyNight = createWeatherSample({
  timestamp: BASE_TIME,
  temperature: 15,
  dewPoint: 14,
  windSpeed10m: 8,
  windGusts: 18,
  humidity: 95,
  cloudCover: 85,
  pressure: 1005,
  jetStreamSpeed: 65,
});

const engine = createScoringEngine();

test('a calm dry night scores well', () => {
  const score = engine.calculateScore(calmNight, { moonIllumination: 10, moonAltitude: -10 });

  expect(score.totalScore).toBe(88.8);
  expect(getSeeingRating(score.totalScore)).toBe('Excellent');
  expect(score.componentScores.temperature_differential).toBeCloseTo(84, 6);
  expect(score.componentScores.wind_stability).toBeCloseTo(96.667, 3);
  expect(score.componentScores.humidity).toBeCloseTo(78.75, 6);
  expect(score.componentScores.cloud_cover).toBeCloseTo(90, 6);
  expect(score.componentScores.jet_stream).toBeCloseTo(90, 6);
  expect(score.penalties).toEqual({});
  expect(score.timestamp).toBe(BASE_TIME);
});

test('a wet windy night under a bright Moon scores poorly for deep-sky work', () => {
  const score = engine.calculateScore(stormyNight, { moonIllumination: 90, moonAltitude: 45, isDeepSky: true });

  expect(score.totalScore).toBe(17.7);
  expect(score.totalScore).toBeLessThan(40);
  expect(score.penalties.moon).toBeCloseTo(0.55, 6);
  expect(getSeeingRating(score.totalScore)).toBe('Bad');
});

test('the moon penalty leaves the total untouched for non deep-sky targets', () => {
  const withMoon = engine.calculateScore(stormyNight, { moonIllumination: 90, moonAltitude: 45, isDeepSky: false });
  const withoutMoon = engine.calculateScore(stormyNight);
  expect(withMoon.totalScore).toBe(withoutMoon.totalScore);
  expect(withMoon.penalties).toEqual({});
});

test('penalties are listed in moon, airmass, precipitation order', () => {
  const wet = { ...stormyNight, precipitationProbability: 90 };
  const score = engine.calculateScore(wet, { moonIllumination: 90, moonAltitude: 45, airmass: 3, isDeepSky: true });

  expect(Object.keys(score.penalties)).toEqual(['moon', 'airmass', 'precipitation']);
  expect(score.penalties.airmass).toBeCloseTo(0.65, 6);
  expect(score.penalties.precipitation).toBe(0.3);
});

test('falling rain cuts the total to a tenth', () => {
  const dry = engine.calculateScore(calmNight);
  const raining = engine.calculateScore({ ...calmNight, precipitation: 1.2 });
  expect(raining.penalties).toEqual({ precipitation: 0.1 });
  expect(raining.totalScore).toBe(8.9);
  expect(dry.totalScore).toBe(88.8);
});

test('total score stays within 0-100', () => {
  const extremes = [
    createWeatherSample({ timestamp: BASE_TIME, temperature: 40, dewPoint: -30, humidity: 0 }),
    createWeatherSample({ timestamp: BASE_TIME, temperature: 0, dewPoint: 5, windSpeed10m: 50, windGusts: 200, humidity: 100, cloudCover: 100 }),
  ];
  for (const weather of extremes) {
    const { totalScore } = engine.calculateScore(weather, { moonIllumination: 100, moonAltitude: 90, airmass: 40, isDeepSky: true });
    expect(totalScore).toBeGreaterThanOrEqual(0);
    expect(totalScore).toBeLessThanOrEqual(100);
  }
});

test('calculateSimpleScore ignores astronomy context', () => {
  expect(engine.calculateSimpleScore(calmNight)).toBe(88.8);
});

test('weights that do not sum to one are normalized', () => {
  const weights = createScoringWeights({ wind_stability: 0.6 });
  const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);

  expect(total).toBeCloseTo(1, 9);
  expect(weights.wind_stability).toBeCloseTo(0.6 / 1.3, 9);
  expect(weights.jet_stream).toBeCloseTo(0.1 / 1.3, 9);
});

test('weights within tolerance of one are kept as given', () => {
  expect(createScoringWeights({ wind_stability: 0.305 }).wind_stability).toBe(0.305);
  expect(createScoringWeights()).toEqual(DEFAULT_WEIGHTS);
});

test('invalid weights are rejected', () => {
  expect(() => createScoringWeights({ humidity: -0.1 })).toThrow(ConfigError);
  expect(() => createScoringWeights({ humidity: Number.NaN })).toThrow(ConfigError);
  expect(() =>
    createScoringWeights({ temperature_differential: 0, wind_stability: 0, humidity: 0, cloud_cover: 0, jet_stream: 0 }),
  ).toThrow('Scoring weights must not all be zero');
});

test('custom weights change the weighted total', () => {
  const thermalOnly = createScoringEngine({
    weights: { temperature_differential: 1, wind_stability: 0, humidity: 0, cloud_cover: 0, jet_stream: 0 },
  });
  expect(thermalOnly.calculateScore(calmNight).totalScore).toBe(84);
});

test('weight overrides parse from JSON and reject unknown names', () => {
  expect(parseScoringWeights(null)).toBe(DEFAULT_WEIGHTS);
  expect(parseScoringWeights('{"cloud_cover": 0.3}').cloud_cover).toBeCloseTo(0.3 / 1.1, 9);
  expect(() => parseScoringWeights('{"clouds": 0.3}')).toThrow(ConfigError);
  expect(() => parseScoringWeights('not json')).toThrow(ConfigError);
});

test('rating bands', () => {
  expect(getSeeingRating(85)).toBe('Excellent');
  expect(getSeeingRating(84.9)).toBe('Very Good');
  expect(getSeeingRating(55)).toBe('Good');
  expect(getSeeingRating(40)).toBe('Fair');
  expect(getSeeingRating(25)).toBe('Poor');
  expect(getSeeingRating(24.9)).toBe('Bad');
});

test('recommendations list the overall verdict first, then each weak factor', () => {
  const score = engine.calculateScore(stormyNight, { moonIllumination: 90, moonAltitude: 45, isDeepSky: true });
  expect(engine.getRecommendations(score, stormyNight)).toEqual([
    'Poor conditions. Consider rescheduling.',
    'Cloud cover at 85% may hide targets. Watch for clearing.',
    'Wind at 8.0 m/s may upset tracking. Shield the setup if possible.',
    'High humidity. Expect dew on optics.',
    'Low temperature differential. Optics will take longer to reach equilibrium.',
    'Bright Moon is washing out deep-sky targets. Switch to planets or wait for moonset.',
  ]);

  const good = engine.calculateScore(calmNight);
  expect(engine.getRecommendations(good, calmNight)).toEqual(['Outstanding conditions for every kind of observing and imaging.']);
});

test('best targets grade each kind of observing', () => {
  const good = engine.calculateScore(calmNight);
  expect(engine.getBestTargets(good, calmNight)).toEqual({
    planets: 'Excellent',
    moon: 'Excellent',
    deep_sky: 'Excellent',
    imaging: 'Excellent',
  });

  const poor = engine.calculateScore(stormyNight, { moonIllumination: 90, moonAltitude: 45, isDeepSky: true });
  expect(engine.getBestTargets(poor, stormyNight)).toEqual({
    planets: 'Poor',
    moon: 'Fair',
    deep_sky: 'Poor',
    imaging: 'Not recommended',
  });
});
