import { z } from 'zod';
import { ConfigError } from './errors.js';
import { clampScore, roundTo } from './math.js';
import {
  COMPONENT_NAMES,
  COMPONENT_SCORERS,
  airmassPenalty,
  moonPenalty,
  precipitationPenalty,
  type ComponentName,
  type PenaltyName,
} from './scoring-components.js';
import { temperatureDifferential, type WeatherSample } from './weather.js';

export type ScoringWeights = Readonly<Record<ComponentName, number>>;
export type ComponentScores = Readonly<Record<ComponentName, number>>;
export type Penalties = Readonly<Partial<Record<PenaltyName, number>>>;

export interface SeeingScore {
  readonly totalScore: number;
  readonly componentScores: ComponentScores;
  readonly penalties: Penalties;
  readonly timestamp: Date;
}

export type SeeingRating = 'Excellent' | 'Very Good' | 'Good' | 'Fair' | 'Poor' | 'Bad';

export const DEFAULT_WEIGHTS: ScoringWeights = {
  temperature_differential: 0.25,
  wind_stability: 0.3,
  humidity: 0.15,
  cloud_cover: 0.2,
  jet_stream: 0.1,
};

const WEIGHT_SUM_TOLERANCE = 0.01;

/**
 * Missing components keep their default weight. A set that does not sum to 1
 * (within 0.01) is rescaled so it does.
 */
export const createScoringWeights = (overrides: Partial<Record<ComponentName, number>> = {}): ScoringWeights => {
  const merged = { ...DEFAULT_WEIGHTS, ...overrides };
  for (const name of COMPONENT_NAMES) {
    const weight = merged[name];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`Weight for ${name} must be a non-negative number (got ${weight})`);
    }
  }

  const total = COMPONENT_NAMES.reduce((sum, name) => sum + merged[name], 0);
  if (total <= 0) {
    throw new ConfigError('Scoring weights must not all be zero');
  }
  if (Math.abs(total - 1) <= WEIGHT_SUM_TOLERANCE) {
    return merged;
  }

  return {
    temperature_differential: merged.temperature_differential / total,
    wind_stability: merged.wind_stability / total,
    humidity: merged.humidity / total,
    cloud_cover: merged.cloud_cover / total,
    jet_stream: merged.jet_stream / total,
  };
};

const weightOverridesSchema = z
  .object({
    temperature_differential: z.number(),
    wind_stability: z.number(),
    humidity: z.number(),
    cloud_cover: z.number(),
    jet_stream: z.number(),
  })
  .partial()
  .strict();

export const parseScoringWeights = (rawJson: string | null): ScoringWeights => {
  if (!rawJson) return DEFAULT_WEIGHTS;
  let decoded: unknown;
  try {
    decoded = JSON.parse(rawJson);
  } catch (error) {
    throw new ConfigError(`SCORING_WEIGHTS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = weightOverridesSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ConfigError(`SCORING_WEIGHTS is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return createScoringWeights(parsed.data);
};

export const getSeeingRating = (totalScore: number): SeeingRating => {
  if (totalScore >= 85) return 'Excellent';
  if (totalScore >= 70) return 'Very Good';
  if (totalScore >= 55) return 'Good';
  if (totalScore >= 40) return 'Fair';
  if (totalScore >= 25) return 'Poor';
  return 'Bad';
};

export const getRatingRecommendation = (totalScore: number): string => {
  if (totalScore >= 85) return 'Outstanding conditions for imaging and visual work alike.';
  if (totalScore >= 70) return 'Very good conditions for most observing.';
  if (totalScore >= 55) return 'Good conditions for planets and brighter deep-sky objects.';
  if (totalScore >= 40) return 'Fair conditions; stick to planets and the Moon.';
  if (totalScore >= 25) return 'Poor conditions; only bright objects are worth a look.';
  return 'Not recommended for serious observing tonight.';
};

export interface ScoreContext {
  moonIllumination?: number;
  moonAltitude?: number;
  airmass?: number | null;
  isDeepSky?: boolean;
}

export interface TargetQuality {
  planets: string;
  moon: string;
  deep_sky: string;
  imaging: string;
}

export interface ScoringEngine {
  readonly weights: ScoringWeights;
  calculateScore: (weather: WeatherSample, context?: ScoreContext) => SeeingScore;
  calculateSimpleScore: (weather: WeatherSample) => number;
  getRecommendations: (score: SeeingScore, weather: WeatherSample) => string[];
  getBestTargets: (score: SeeingScore, weather: WeatherSample) => TargetQuality;
}

interface CreateScoringEngineOptions {
  weights?: ScoringWeights;
}

type PenaltyEntry = readonly [PenaltyName, number];
type PenaltyMap = Partial<Record<PenaltyName, number>>;

const withPenalty = (penalties: PenaltyMap, name: PenaltyName, multiplier: number): PenaltyMap => {
  const next = { ...penalties };
  next[name] = multiplier;
  return next;
};

const collectPenalties = (weather: WeatherSample, context: Required<ScoreContext>): PenaltyEntry[] => {
  const entries: PenaltyEntry[] = [['moon', moonPenalty(context.moonIllumination, context.moonAltitude, context.isDeepSky)]];
  if (context.airmass !== null) {
    entries.push(['airmass', airmassPenalty(context.airmass)]);
  }
  entries.push(['precipitation', precipitationPenalty(weather)]);
  return entries;
};

export const createScoringEngine = ({ weights = DEFAULT_WEIGHTS }: CreateScoringEngineOptions = {}): ScoringEngine => {
  const validatedWeights = createScoringWeights(weights);

  const computeComponents = (weather: WeatherSample): ComponentScores => ({
    temperature_differential: COMPONENT_SCORERS.temperature_differential(weather),
    wind_stability: COMPONENT_SCORERS.wind_stability(weather),
    humidity: COMPONENT_SCORERS.humidity(weather),
    cloud_cover: COMPONENT_SCORERS.cloud_cover(weather),
    jet_stream: COMPONENT_SCORERS.jet_stream(weather),
  });

  const weightedSum = (components: ComponentScores): number =>
    COMPONENT_NAMES.reduce((sum, name) => sum + components[name] * validatedWeights[name], 0);

  const calculateScore = (weather: WeatherSample, context: ScoreContext = {}): SeeingScore => {
    const componentScores = computeComponents(weather);
    const resolved: Required<ScoreContext> = {
      moonIllumination: context.moonIllumination ?? 0,
      moonAltitude: context.moonAltitude ?? -90,
      airmass: context.airmass ?? null,
      isDeepSky: context.isDeepSky ?? false,
    };

    const { total, penalties } = collectPenalties(weather, resolved).reduce<{ total: number; penalties: PenaltyMap }>(
      (acc, [name, multiplier]) =>
        multiplier < 1 ? { total: acc.total * multiplier, penalties: withPenalty(acc.penalties, name, multiplier) } : acc,
      { total: weightedSum(componentScores), penalties: {} },
    );

    return {
      totalScore: roundTo(clampScore(total), 1),
      componentScores,
      penalties,
      timestamp: weather.timestamp,
    };
  };

  const calculateSimpleScore = (weather: WeatherSample): number => calculateScore(weather).totalScore;

  const getRecommendations = (score: SeeingScore, weather: WeatherSample): string[] => {
    const recommendations: string[] = [];
    const total = score.totalScore;

    if (total >= 85) {
      recommendations.push('Outstanding conditions for every kind of observing and imaging.');
    } else if (total >= 70) {
      recommendations.push('Very good conditions. Planets and deep-sky targets should both show well.');
    } else if (total >= 55) {
      recommendations.push('Good conditions. Suitable for most visual observing.');
    } else if (total >= 40) {
      recommendations.push('Fair conditions. Favour the planets and the Moon.');
    } else {
      recommendations.push('Poor conditions. Consider rescheduling.');
    }

    const components = score.componentScores;
    if (components.cloud_cover < 50 && weather.cloudCover > 50) {
      recommendations.push(`Cloud cover at ${weather.cloudCover.toFixed(0)}% may hide targets. Watch for clearing.`);
    }
    if (components.wind_stability < 60) {
      recommendations.push(`Wind at ${weather.windSpeed10m.toFixed(1)} m/s may upset tracking. Shield the setup if possible.`);
    }
    if (components.humidity < 60 && temperatureDifferential(weather) < 3) {
      recommendations.push('High humidity. Expect dew on optics.');
    }
    if (components.temperature_differential < 50) {
      recommendations.push('Low temperature differential. Optics will take longer to reach equilibrium.');
    }
    const moon = score.penalties.moon;
    if (moon !== undefined && moon < 0.7) {
      recommendations.push('Bright Moon is washing out deep-sky targets. Switch to planets or wait for moonset.');
    }

    return recommendations;
  };

  const getBestTargets = (score: SeeingScore, weather: WeatherSample): TargetQuality => {
    const total = score.totalScore;

    let planets: string;
    if (total >= 60 || (total >= 40 && weather.cloudCover < 30)) {
      planets = total >= 80 ? 'Excellent' : 'Good';
    } else {
      planets = total >= 30 ? 'Fair' : 'Poor';
    }

    const moon = total >= 50 ? 'Excellent' : total >= 30 ? 'Good' : 'Fair';

    const effectiveDeepSky = total * (score.penalties.moon ?? 1);
    let deepSky = 'Poor';
    if (effectiveDeepSky >= 70) deepSky = 'Excellent';
    else if (effectiveDeepSky >= 50) deepSky = 'Good';
    else if (effectiveDeepSky >= 35) deepSky = 'Fair';

    let imaging = 'Not recommended';
    if (total >= 80 && weather.windSpeed10m < 3) imaging = 'Excellent';
    else if (total >= 65 && weather.windSpeed10m < 5) imaging = 'Good';
    else if (total >= 50) imaging = 'Fair';

    return { planets, moon, deep_sky: deepSky, imaging };
  };

  return {
    weights: validatedWeights,
    calculateScore,
    calculateSimpleScore,
    getRecommendations,
    getBestTargets,
  };
};
