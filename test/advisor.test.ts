import { activityRating, createAdvisorService, getActivityRecommendations, getEquipmentSuggestions } from '../src/utils/advisor.js';
import { type VisibleObject } from '../src/utils/catalog.js';
import { BASE_TIME, makeObject, makeReport, testLocation } from './helpers.js';

test('activity scores account for wind, moonlight and cloud per activity', () => {
  const report = makeReport({
    score: 75,
    weather: { windSpeed10m: 6, windGusts: 6, cloudCover: 40 },
    frame: { moonIllumination: 90, moonAltitude: 30 },
  });
  const recommendations = getActivityRecommendations(report);

  expect(recommendations.map((entry) => entry.activity)).toEqual(['visual', 'widefield', 'deep_sky_imaging', 'planetary_imaging']);

  const [visual, widefield, deepSky, planetary] = recommendations;
  expect(visual.score).toBeCloseTo(82.5, 6);
  expect(visual.rating).toBe('Very Good');
  expect(visual.meetsMinimum).toBe(true);
  expect(visual.issues).toEqual([]);

  expect(widefield.score).toBeCloseTo(47.8125, 6);
  expect(widefield.rating).toBe('Fair');
  expect(widefield.meetsMinimum).toBe(false);
  expect(widefield.issues).toEqual(['Moon 90% may interfere', 'Cloud cover 40% limits visibility']);

  expect(deepSky.score).toBeCloseTo(35.4375, 6);
  expect(deepSky.issues).toEqual(['Wind 6.0 m/s exceeds ideal', 'Moon 90% may interfere', 'Cloud cover 40% limits visibility']);

  expect(planetary.score).toBeCloseTo(30, 6);
  expect(planetary.rating).toBe('Poor');
  expect(planetary.issues).toEqual(['Wind 6.0 m/s exceeds ideal', 'Cloud cover 40% limits visibility']);
});

test('a Moon below the horizon does not count against moon-sensitive activities', () => {
  const report = makeReport({ score: 60, frame: { moonIllumination: 100, moonAltitude: -10 } });
  const deepSky = getActivityRecommendations(report).find((entry) => entry.activity === 'deep_sky_imaging');
  expect(deepSky?.issues).toEqual([]);
  expect(deepSky?.score).toBe(60);
});

test('activity rating bands', () => {
  expect(activityRating(85)).toBe('Excellent');
  expect(activityRating(70)).toBe('Very Good');
  expect(activityRating(55)).toBe('Good');
  expect(activityRating(40)).toBe('Fair');
  expect(activityRating(39.9)).toBe('Poor');
});

test('equipment suggestions are ordered by priority', () => {
  const report = makeReport({
    weather: { temperature: 10, dewPoint: 8, windSpeed10m: 6, humidity: 95, cloudCover: 70 },
    frame: { moonIllumination: 90, moonAltitude: 30 },
  });

  expect(getEquipmentSuggestions(report)).toEqual([
    { key: 'dew', text: 'High dew risk. Run dew heaters on the optics.', priority: 'high' },
    { key: 'humidity', text: 'Very high humidity. Cover mirrors and lenses between sessions.', priority: 'high' },
    { key: 'wind', text: 'Moderate wind. Vibration dampers help.', priority: 'medium' },
    { key: 'moon', text: 'Bright Moon (90%). Narrowband filters recommended.', priority: 'medium' },
    { key: 'clouds', text: 'Heavy cloud cover. Keep an eye out for clearing.', priority: 'medium' },
  ]);
});

test('a calm dry moonless night gets low-priority notes only', () => {
  const report = makeReport({ weather: { windSpeed10m: 0, humidity: 50 }, frame: { moonAltitude: -20 } });
  expect(getEquipmentSuggestions(report)).toEqual([
    { key: 'wind', text: 'Calm air. Good night for high magnification.', priority: 'low' },
    { key: 'moon', text: 'Moon below the horizon. Prime time for deep-sky.', priority: 'low' },
  ]);
});

test('target recommendations weigh airmass and moonlight', () => {
  const visible: VisibleObject[] = [
    { object: makeObject({ name: 'High Galaxy', objectType: 'galaxy' }), altitude: 70, azimuth: 10 },
    { object: makeObject({ name: 'Mid Cluster', objectType: 'open_cluster' }), altitude: 35, azimuth: 90 },
    { object: makeObject({ name: 'Low Star', objectType: 'star' }), altitude: 25, azimuth: 200 },
  ];
  const getVisible = vi.fn(() => visible);
  const advisor = createAdvisorService({ catalog: { getVisible } });
  const report = makeReport({ score: 80, frame: { moonIllumination: 80, moonAltitude: 30 } });

  const targets = advisor.getTargetRecommendations(report, { location: testLocation, time: BASE_TIME, limit: 2 });

  expect(getVisible).toHaveBeenCalledWith(testLocation, BASE_TIME, 20);
  expect(targets.map((target) => [target.name, target.activityType])).toEqual([
    ['Low Star', 'visual'],
    ['High Galaxy', 'deep_sky'],
  ]);
  expect(targets[0].score).toBeCloseTo(64, 6);
  expect(targets[1].score).toBeCloseTo(48, 6);
});
