export interface WeatherSample {
  readonly timestamp: Date;
  /** °C at 2 m. */
  readonly temperature: number;
  readonly temperature850hPa: number | null;
  readonly dewPoint: number;
  /** m/s */
  readonly windSpeed10m: number;
  readonly windSpeed80m: number | null;
  readonly windGusts: number;
  readonly windDirection: number;
  readonly humidity: number;
  readonly cloudCover: number;
  readonly cloudCoverLow: number | null;
  readonly cloudCoverMid: number | null;
  readonly cloudCoverHigh: number | null;
  /** hPa */
  readonly pressure: number;
  /** 250 hPa wind speed in m/s. */
  readonly jetStreamSpeed: number | null;
  /** mm */
  readonly precipitation: number;
  readonly precipitationProbability: number | null;
  /** m */
  readonly visibility: number | null;
}

export type Signal<T> = { readonly present: true; readonly value: T } | { readonly present: false };

export const present = <T>(value: T): Signal<T> => ({ present: true, value });
export const absent: Signal<never> = { present: false };

export const signal = (value: number | null | undefined): Signal<number> =>
  typeof value === 'number' && Number.isFinite(value) ? present(value) : absent;

export const temperatureDifferential = (weather: WeatherSample): number => weather.temperature - weather.dewPoint;

export const windShear = (weather: WeatherSample): Signal<number> => {
  const upper = signal(weather.windSpeed80m);
  return upper.present ? present(Math.abs(upper.value - weather.windSpeed10m)) : absent;
};

export const KMH_PER_MS = 3.6;
export const kmhToMs = (kmh: number): number => kmh / KMH_PER_MS;

const DEFAULT_SAMPLE: Omit<WeatherSample, 'timestamp'> = {
  temperature: 10,
  temperature850hPa: null,
  dewPoint: 0,
  windSpeed10m: 0,
  windSpeed80m: null,
  windGusts: 0,
  windDirection: 0,
  humidity: 50,
  cloudCover: 0,
  cloudCoverLow: null,
  cloudCoverMid: null,
  cloudCoverHigh: null,
  pressure: 1013.25,
  jetStreamSpeed: null,
  precipitation: 0,
  precipitationProbability: null,
  visibility: null,
};

export const createWeatherSample = (fields: Partial<WeatherSample> & Pick<WeatherSample, 'timestamp'>): WeatherSample => ({
  ...DEFAULT_SAMPLE,
  ...fields,
});

export const withJetStreamSpeed = (weather: WeatherSample, jetStreamSpeed: number | null): WeatherSample => ({
  ...weather,
  jetStreamSpeed,
});
