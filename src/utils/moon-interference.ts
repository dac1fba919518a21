import { type AstronomyCalculator } from './astronomy.js';
import { type CelestialObject } from './celestial.js';
import { type Location } from './location.js';
import { average, toDegrees, toRadians } from './math.js';
import { MS_PER_HOUR } from './time.js';

export type InterferenceSeverity = 'none' | 'minor' | 'moderate' | 'severe';

export interface MoonInterference {
  readonly risesAt: Date | null;
  readonly setsAt: Date | null;
  readonly illumination: number;
  readonly minAngularDistance: number;
  readonly avgAltitude: number;
  readonly severity: InterferenceSeverity;
}

/** Great-circle separation in degrees between two alt/az positions. */
export const angularDistance = (alt1: number, az1: number, alt2: number, az2: number): number => {
  const a1 = toRadians(alt1);
  const a2 = toRadians(alt2);
  const deltaAz = toRadians(Math.abs(az1 - az2));
  const cosDistance = Math.sin(a1) * Math.sin(a2) + Math.cos(a1) * Math.cos(a2) * Math.cos(deltaAz);
  return toDegrees(Math.acos(Math.max(-1, Math.min(1, cosDistance))));
};

export const classifyInterferenceSeverity = (illumination: number, avgAltitude: number, minAngularDistance: number): InterferenceSeverity => {
  if (avgAltitude <= 0) return 'none';
  if (illumination < 20) {
    return minAngularDistance > 30 ? 'none' : 'minor';
  }

  const illuminationFactor = illumination / 100;
  const altitudeFactor = Math.min(1, Math.max(0, avgAltitude / 45));
  const distanceFactor = Math.max(0, 1 - minAngularDistance / 90);
  const severityScore = illuminationFactor * altitudeFactor * (1 + distanceFactor);

  if (severityScore < 0.2) return 'none';
  if (severityScore < 0.4) return 'minor';
  if (severityScore < 0.7) return 'moderate';
  return 'severe';
};

interface AnalyzeMoonInterferenceOptions {
  target: CelestialObject;
  location: Location;
  start: Date;
  end: Date;
  astronomy: Pick<AstronomyCalculator, 'getMoonPosition' | 'getTargetPosition' | 'getMoonIllumination'>;
}

interface MoonSample {
  time: Date;
  altitude: number;
  separation: number;
}

export const analyzeMoonInterference = ({ target, location, start, end, astronomy }: AnalyzeMoonInterferenceOptions): MoonInterference => {
  const samples: MoonSample[] = [];
  for (let ms = start.getTime(); ms <= end.getTime(); ms += MS_PER_HOUR) {
    const time = new Date(ms);
    const moon = astronomy.getMoonPosition(location, time);
    const targetPosition = astronomy.getTargetPosition(target, location, time);
    samples.push({
      time,
      altitude: moon.altitude,
      separation: angularDistance(targetPosition.altitude, targetPosition.azimuth, moon.altitude, moon.azimuth),
    });
  }

  const midpoint = new Date(start.getTime() + (end.getTime() - start.getTime()) / 2);
  const illumination = astronomy.getMoonIllumination(midpoint);

  let risesAt: Date | null = null;
  let setsAt: Date | null = null;
  for (let index = 1; index < samples.length; index += 1) {
    const previous = samples[index - 1].altitude;
    const current = samples[index];
    if (previous <= 0 && current.altitude > 0) {
      risesAt = current.time;
    } else if (previous > 0 && current.altitude <= 0) {
      setsAt = current.time;
    }
  }

  const avgAltitude = average(samples.map((sample) => sample.altitude)) ?? 0;
  const minAngularDistance = samples.length > 0 ? Math.min(...samples.map((sample) => sample.separation)) : 180;

  return {
    risesAt,
    setsAt,
    illumination,
    minAngularDistance,
    avgAltitude,
    severity: classifyInterferenceSeverity(illumination, avgAltitude, minAngularDistance),
  };
};
