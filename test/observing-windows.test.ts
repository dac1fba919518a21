import { findBestWindow, findContiguousRuns, findObservingWindows, getBestNights, spanHours } from '../src/utils/observing-windows.js';
import { hoursAfterBase, makeForecast, testLocation } from './helpers.js';

test('a steady ten-hour night becomes one window', () => {
  const forecasts = Array.from({ length: 10 }, (_, hour) => makeForecast({ hour, score: 80 }));
  const windows = findObservingWindows(forecasts, { minScore: 50, minDurationHours: 2 });

  expect(windows).toHaveLength(1);
  const [window] = windows;
  expect(window.start).toEqual(hoursAfterBase(0));
  expect(window.end).toEqual(hoursAfterBase(9));
  expect(window.forecasts).toHaveLength(10);
  expect(window.averageScore).toBe(80);
  expect(window.peakScore).toBe(80);
  expect(window.peakTime).toEqual(hoursAfterBase(0));
  expect(window.durationHours).toBe(9);
});

test('a gap of more than two hours splits the run', () => {
  const forecasts = [0, 1, 2, 3, 4, 5, 6, 7].map((hour) => makeForecast({ hour, score: hour >= 6 ? 90 : 70, isNight: hour <= 2 || hour >= 6 }));
  const windows = findObservingWindows(forecasts);

  expect(windows.map((window) => [window.start, window.end])).toEqual([
    [hoursAfterBase(0), hoursAfterBase(2)],
    [hoursAfterBase(6), hoursAfterBase(7)],
  ]);
  expect(findBestWindow(forecasts)?.start).toEqual(hoursAfterBase(6));
});

test('one filtered hour inside a run is bridged by the gap tolerance', () => {
  const forecasts = [80, 80, 30, 80, 80].map((score, hour) => makeForecast({ hour, score }));
  const windows = findObservingWindows(forecasts);

  expect(windows).toHaveLength(1);
  expect(windows[0].forecasts.map((forecast) => forecast.timestamp)).toEqual([0, 1, 3, 4].map(hoursAfterBase));
});

test('runs shorter than the minimum duration are dropped', () => {
  const forecasts = [makeForecast({ hour: 0, score: 90 }), makeForecast({ hour: 5, score: 90 })];
  expect(findObservingWindows(forecasts, { minDurationHours: 2 })).toEqual([]);
  expect(findBestWindow(forecasts)).toBeNull();
  expect(findObservingWindows(forecasts, { minDurationHours: 1 })).toHaveLength(2);
});

test('empty input yields no window', () => {
  expect(findBestWindow([])).toBeNull();
  expect(findObservingWindows([])).toEqual([]);
});

test('the earlier window wins a tie', () => {
  const forecasts = [0, 1, 5, 6].map((hour) => makeForecast({ hour, score: 70 }));
  expect(findBestWindow(forecasts)?.start).toEqual(hoursAfterBase(0));
});

test('the peak is the highest-scoring hour', () => {
  const forecasts = [60, 75, 95, 70].map((score, hour) => makeForecast({ hour, score }));
  const best = findBestWindow(forecasts);
  expect(best?.peakScore).toBe(95);
  expect(best?.peakTime).toEqual(hoursAfterBase(2));
  expect(best?.averageScore).toBe(75);
});

test('window search is repeatable on the same input', () => {
  const forecasts = [80, 30, 30, 30, 85, 90, 20, 75].map((score, hour) => makeForecast({ hour, score }));
  expect(findObservingWindows(forecasts)).toEqual(findObservingWindows(forecasts));
});

test('breakOnDisqualified closes a run at the first failing sample', () => {
  const items = [1, 1, 0, 1, 1, 1];
  const runs = findContiguousRuns(
    items.map((value, hour) => ({ value, time: hoursAfterBase(hour) })),
    { timestampOf: (item) => item.time, qualifies: (item) => item.value === 1, minDurationHours: 2, breakOnDisqualified: true },
  );
  expect(runs.map((run) => run.length)).toEqual([2, 3]);
});

test('span measure keeps runs by first-to-last time rather than sample count', () => {
  const toItems = (values: number[]) => values.map((value, hour) => ({ value, time: hoursAfterBase(hour) }));
  const options = {
    timestampOf: (item: { time: Date }) => item.time,
    qualifies: (item: { value: number }) => item.value === 1,
    breakOnDisqualified: true,
    measure: 'span' as const,
  };

  expect(findContiguousRuns(toItems([1, 1, 0, 1, 1, 1]), { ...options, minDurationHours: 2 }).map((run) => run.length)).toEqual([3]);
  expect(findContiguousRuns(toItems([1, 0, 1, 1]), { ...options, minDurationHours: 1 }).map((run) => run.length)).toEqual([1, 2]);
});

test('a single-sample span counts as one hour', () => {
  expect(spanHours(hoursAfterBase(3), hoursAfterBase(3))).toBe(1);
  expect(spanHours(hoursAfterBase(3), hoursAfterBase(7))).toBe(4);
});

test('best nights group evening and early-morning hours under the evening date', () => {
  const firstNight = [4, 5, 6, 7, 8, 9, 10].map((hour) => makeForecast({ hour, score: 85, cloudCover: 10, windSpeed: 2 }));
  const daytime = [18, 19].map((hour) => makeForecast({ hour, score: 95, isNight: false }));
  const secondNight = [28, 29, 30].map((hour) => makeForecast({ hour, score: 62, cloudCover: 30, windSpeed: 5 }));
  const thirdNight = [52, 53].map((hour) => makeForecast({ hour, score: 40 }));

  const nights = getBestNights([...firstNight, ...daytime, ...secondNight, ...thirdNight], { location: testLocation });

  expect(nights).toEqual([
    { date: '2024-03-09', averageScore: 85, hours: 7, summary: 'Excellent. clear skies. calm' },
    { date: '2024-03-10', averageScore: 62, hours: 3, summary: 'Good. partly cloudy. light wind' },
  ]);
});

test('best nights honour the minimum score', () => {
  const forecasts = [4, 5].map((hour) => makeForecast({ hour, score: 70, cloudCover: 60, windSpeed: 9 }));
  expect(getBestNights(forecasts, { location: testLocation, minScore: 75 })).toEqual([]);
  expect(getBestNights(forecasts, { location: testLocation, minScore: 60 })[0].summary).toBe('Very good. variable clouds');
});
