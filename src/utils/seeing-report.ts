import { type AstronomyFrame, type TargetPosition } from './astronomy.js';
import { type CelestialObject } from './celestial.js';
import { type Location } from './location.js';
import { getSeeingRating, type SeeingScore } from './scoring.js';
import { type WeatherSample } from './weather.js';

export interface SeeingReport {
  readonly location: Location;
  readonly timestamp: Date;
  readonly weather: WeatherSample;
  readonly astronomy: AstronomyFrame;
  readonly score: SeeingScore;
  readonly target: CelestialObject | null;
  readonly targetPosition: TargetPosition | null;
}

export interface SeeingForecast {
  readonly timestamp: Date;
  readonly score: SeeingScore;
  readonly weather: WeatherSample;
  readonly moonIllumination: number;
  readonly moonAltitude: number;
  readonly isNight: boolean;
}

export const summarizeReport = (report: SeeingReport): string => {
  const targetInfo = report.target ? ` for ${report.target.name}` : '';
  return `Score: ${report.score.totalScore.toFixed(0)}/100 (${getSeeingRating(report.score.totalScore)})${targetInfo} at ${report.location.name}`;
};

export const isObservable = (forecast: SeeingForecast): boolean => forecast.isNight && forecast.weather.cloudCover < 80;
