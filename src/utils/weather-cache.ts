import { CacheError } from './errors.js';
import { MS_PER_HOUR, truncateToHour } from './time.js';
import { type WeatherSample } from './weather.js';

export interface CacheReadOptions {
  /** Overrides the cache's default TTL for this read. */
  ttlMs?: number;
  /** Return whatever is stored regardless of age (stale fallback). */
  ignoreTtl?: boolean;
}

export interface WeatherCache {
  readonly size: number;
  get: (lat: number, lon: number, time: Date, options?: CacheReadOptions) => WeatherSample | null;
  set: (lat: number, lon: number, sample: WeatherSample) => void;
  setBatch: (lat: number, lon: number, samples: readonly WeatherSample[]) => void;
  getRange: (lat: number, lon: number, start: Date, end: Date, options?: CacheReadOptions) => WeatherSample[];
  clear: () => void;
}

interface CacheEntry {
  fetchedAt: number;
  sample: WeatherSample;
}

interface CreateWeatherCacheOptions {
  ttlMs: number;
  now?: () => number;
  maxEntries?: number;
}

export const buildWeatherCacheKey = (lat: number, lon: number, time: Date): string =>
  `${lat.toFixed(2)}:${lon.toFixed(2)}:${truncateToHour(time).toISOString()}`;

export const createWeatherCache = ({ ttlMs, now = Date.now, maxEntries = 20000 }: CreateWeatherCacheOptions): WeatherCache => {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new CacheError(`Cache TTL must be a positive number of milliseconds (got ${ttlMs})`);
  }
  const entries = new Map<string, CacheEntry>();

  const isFresh = (entry: CacheEntry, options: CacheReadOptions): boolean =>
    options.ignoreTtl === true || now() - entry.fetchedAt <= (options.ttlMs ?? ttlMs);

  const set = (lat: number, lon: number, sample: WeatherSample) => {
    const key = buildWeatherCacheKey(lat, lon, sample.timestamp);
    entries.delete(key);
    entries.set(key, { fetchedAt: now(), sample });
    // Map keeps insertion order, so the first key is the oldest write.
    while (entries.size > maxEntries) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
    }
  };

  const get = (lat: number, lon: number, time: Date, options: CacheReadOptions = {}): WeatherSample | null => {
    const entry = entries.get(buildWeatherCacheKey(lat, lon, time));
    if (!entry || !isFresh(entry, options)) return null;
    return entry.sample;
  };

  const getRange = (lat: number, lon: number, start: Date, end: Date, options: CacheReadOptions = {}): WeatherSample[] => {
    const samples: WeatherSample[] = [];
    for (let ms = truncateToHour(start).getTime(); ms <= end.getTime(); ms += MS_PER_HOUR) {
      const sample = get(lat, lon, new Date(ms), options);
      if (sample) samples.push(sample);
    }
    return samples;
  };

  return {
    get size() {
      return entries.size;
    },
    get,
    set,
    setBatch: (lat, lon, samples) => {
      for (const sample of samples) set(lat, lon, sample);
    },
    getRange,
    clear: () => entries.clear(),
  };
};
