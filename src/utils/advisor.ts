import { getAirmass } from './astronomy.js';
import { isDeepSky, type CelestialObject } from './celestial.js';
import { type CelestialCatalog } from './catalog.js';
import { type Location } from './location.js';
import { type SeeingReport } from './seeing-report.js';
import { temperatureDifferential } from './weather.js';

export type ActivityName = 'visual' | 'planetary_imaging' | 'deep_sky_imaging' | 'widefield';

interface ActivityProfile {
  minScore: number;
  idealScore: number;
  /** m/s */
  windTolerance: number;
  /** Moon illumination fraction (0-1) the activity tolerates. */
  moonTolerance: number;
  cloudMax: number;
  moonSensitive: boolean;
}

export const ACTIVITY_PROFILES: Readonly<Record<ActivityName, ActivityProfile>> = {
  visual: { minScore: 40, idealScore: 70, windTolerance: 10, moonTolerance: 0.8, cloudMax: 50, moonSensitive: false },
  planetary_imaging: { minScore: 70, idealScore: 90, windTolerance: 3, moonTolerance: 1.0, cloudMax: 20, moonSensitive: false },
  deep_sky_imaging: { minScore: 60, idealScore: 85, windTolerance: 5, moonTolerance: 0.3, cloudMax: 15, moonSensitive: true },
  widefield: { minScore: 50, idealScore: 75, windTolerance: 8, moonTolerance: 0.4, cloudMax: 25, moonSensitive: true },
};

const ACTIVITY_NAMES: readonly ActivityName[] = ['visual', 'planetary_imaging', 'deep_sky_imaging', 'widefield'];

export interface ActivityRecommendation {
  readonly activity: ActivityName;
  readonly score: number;
  readonly rating: string;
  readonly meetsMinimum: boolean;
  readonly issues: readonly string[];
}

export type SuggestionPriority = 'high' | 'medium' | 'low';

export interface EquipmentSuggestion {
  readonly key: string;
  readonly text: string;
  readonly priority: SuggestionPriority;
}

export type TargetActivity = 'planetary' | 'deep_sky' | 'visual';

export interface TargetRecommendation {
  readonly name: string;
  readonly designation: string;
  readonly description: string | null;
  readonly altitude: number;
  readonly score: number;
  readonly activityType: TargetActivity;
}

export const activityRating = (score: number): string => {
  if (score >= 85) return 'Excellent';
  if (score >= 70) return 'Very Good';
  if (score >= 55) return 'Good';
  if (score >= 40) return 'Fair';
  return 'Poor';
};

const scoreActivity = (report: SeeingReport, profile: ActivityProfile): { score: number; issues: string[] } => {
  const base = report.score.totalScore;
  const issues: string[] = [];
  let multiplier = 1;

  const wind = report.weather.windSpeed10m;
  if (wind > profile.windTolerance) {
    const over = (wind - profile.windTolerance) / profile.windTolerance;
    multiplier *= Math.max(0.3, 1 - over * 0.5);
    issues.push(`Wind ${wind.toFixed(1)} m/s exceeds ideal`);
  }

  if (profile.moonSensitive) {
    const moonFraction = report.astronomy.moonIllumination / 100;
    if (report.astronomy.moonAltitude > 0 && moonFraction > profile.moonTolerance) {
      multiplier *= Math.max(0.5, 1 - (moonFraction - profile.moonTolerance) * 0.5);
      issues.push(`Moon ${Math.trunc(moonFraction * 100)}% may interfere`);
    }
  }

  const clouds = report.weather.cloudCover;
  if (clouds > profile.cloudMax) {
    multiplier *= Math.max(0.2, 1 - (clouds - profile.cloudMax) / 100);
    issues.push(`Cloud cover ${clouds.toFixed(0)}% limits visibility`);
  }

  let score = base * multiplier;
  if (base >= profile.idealScore && issues.length === 0) {
    score = Math.min(100, score * 1.1);
  }
  return { score, issues };
};

export const getActivityRecommendations = (report: SeeingReport): ActivityRecommendation[] =>
  ACTIVITY_NAMES.map((activity) => {
    const profile = ACTIVITY_PROFILES[activity];
    const { score, issues } = scoreActivity(report, profile);
    return { activity, score, rating: activityRating(score), meetsMinimum: score >= profile.minScore, issues };
  }).sort((left, right) => right.score - left.score);

const PRIORITY_ORDER: Readonly<Record<SuggestionPriority, number>> = { high: 0, medium: 1, low: 2 };

export const getEquipmentSuggestions = (report: SeeingReport): EquipmentSuggestion[] => {
  const { weather, astronomy } = report;
  const suggestions: EquipmentSuggestion[] = [];
  const add = (key: string, text: string, priority: SuggestionPriority) => suggestions.push({ key, text, priority });

  const differential = temperatureDifferential(weather);
  if (differential < 3) {
    add('dew', 'High dew risk. Run dew heaters on the optics.', 'high');
  } else if (differential < 5) {
    add('dew', 'Moderate dew risk. Keep dew shields ready.', 'medium');
  }

  const wind = weather.windSpeed10m;
  if (wind > 8) {
    add('wind', `Strong wind (${wind.toFixed(0)} m/s). Use a wind shield.`, 'high');
  } else if (wind > 5) {
    add('wind', 'Moderate wind. Vibration dampers help.', 'medium');
  } else if (wind < 2) {
    add('wind', 'Calm air. Good night for high magnification.', 'low');
  }

  if (weather.humidity > 90) {
    add('humidity', 'Very high humidity. Cover mirrors and lenses between sessions.', 'high');
  } else if (weather.humidity < 40) {
    add('humidity', 'Low humidity. Optics should stay clear.', 'low');
  }

  if (astronomy.moonAltitude <= 0) {
    add('moon', 'Moon below the horizon. Prime time for deep-sky.', 'low');
  } else if (astronomy.moonIllumination > 70) {
    add('moon', `Bright Moon (${astronomy.moonIllumination.toFixed(0)}%). Narrowband filters recommended.`, 'medium');
  }

  if (weather.cloudCover > 60) {
    add('clouds', 'Heavy cloud cover. Keep an eye out for clearing.', 'medium');
  }

  return suggestions.sort((left, right) => PRIORITY_ORDER[left.priority] - PRIORITY_ORDER[right.priority]);
};

const targetActivity = (object: CelestialObject): TargetActivity => {
  if (object.objectType === 'planet') return 'planetary';
  if (object.objectType === 'galaxy' || object.objectType === 'nebula') return 'deep_sky';
  return 'visual';
};

const TARGET_MIN_ALTITUDE = 20;
const TARGET_CANDIDATES = 20;

interface TargetRecommendationOptions {
  location: Location;
  time: Date;
  limit?: number;
}

export interface AdvisorService {
  getActivityRecommendations: (report: SeeingReport) => ActivityRecommendation[];
  getEquipmentSuggestions: (report: SeeingReport) => EquipmentSuggestion[];
  getTargetRecommendations: (report: SeeingReport, options: TargetRecommendationOptions) => TargetRecommendation[];
}

export const createAdvisorService = ({ catalog }: { catalog: Pick<CelestialCatalog, 'getVisible'> }): AdvisorService => {
  const getTargetRecommendations = (report: SeeingReport, { location, time, limit = 5 }: TargetRecommendationOptions): TargetRecommendation[] => {
    const moonIllumination = report.astronomy.moonIllumination;
    const moonUp = report.astronomy.moonAltitude > 0;

    return catalog
      .getVisible(location, time, TARGET_MIN_ALTITUDE)
      .slice(0, TARGET_CANDIDATES)
      .map(({ object, altitude }) => {
        let score = report.score.totalScore;
        const airmass = getAirmass(altitude);
        if (airmass > 2) score *= 0.8;
        else if (airmass > 1.5) score *= 0.9;

        if (isDeepSky(object) && moonIllumination > 50 && moonUp) {
          score *= Math.max(0.5, 1 - moonIllumination / 200);
        }

        return {
          name: object.name,
          designation: object.designation,
          description: object.description,
          altitude,
          score,
          activityType: targetActivity(object),
        };
      })
      .sort((left, right) => right.score - left.score)
      .slice(0, limit);
  };

  return {
    getActivityRecommendations,
    getEquipmentSuggestions,
    getTargetRecommendations,
  };
};
