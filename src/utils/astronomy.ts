/**
 * Low-precision ephemeris for observing decisions.
 *
 * Sun: Meeus ch. 25. Moon: truncated Meeus ch. 47 series with a topocentric
 * parallax correction on altitude. Planets: Keplerian elements valid
 * 1800-2050 (Standish), heliocentric positions differenced against the
 * Earth-Moon barycentre. Accuracy is a few arcminutes for the Sun and planets
 * and a few tenths of a degree for the Moon, which is plenty for scoring.
 */
import { type CelestialObject } from './celestial.js';
import { type Location } from './location.js';
import { normalizeDegrees, toDegrees, toRadians } from './math.js';

export interface AstronomyFrame {
  readonly moonIllumination: number;
  readonly moonAltitude: number;
  readonly moonAzimuth: number;
  readonly moonPhase: string;
  readonly sunAltitude: number;
}

export interface HorizontalPosition {
  readonly altitude: number;
  readonly azimuth: number;
}

export interface TargetPosition extends HorizontalPosition {
  readonly object: CelestialObject;
  /** 1 at the zenith, Infinity at or below the horizon. */
  readonly airmass: number;
  readonly isVisible: boolean;
}

export interface AstronomyCalculator {
  getAstronomyFrame: (location: Location, time: Date) => AstronomyFrame;
  getTargetPosition: (object: CelestialObject, location: Location, time: Date) => TargetPosition;
  getMoonPosition: (location: Location, time: Date) => HorizontalPosition;
  getMoonIllumination: (time: Date) => number;
  getSunAltitude: (location: Location, time: Date) => number;
  isAstronomicalNight: (location: Location, time: Date) => boolean;
  getAltitudeAzimuth: (ra: number, dec: number, location: Location, time: Date) => HorizontalPosition;
}

interface EquatorialPosition {
  /** degrees */
  ra: number;
  dec: number;
}

interface EclipticPosition {
  longitude: number;
  latitude: number;
}

export const ASTRONOMICAL_NIGHT_SUN_ALTITUDE = -18;

const J2000 = 2451545.0;
const DAYS_PER_CENTURY = 36525;
const EARTH_RADIUS_KM = 6378.14;

export const toJulianDate = (time: Date): number => time.getTime() / 86400000 + 2440587.5;

const centuriesSinceJ2000 = (jd: number): number => (jd - J2000) / DAYS_PER_CENTURY;

const meanObliquity = (T: number): number => 23.439291111 - 0.013004167 * T - 0.0000001638 * T * T + 0.0000005036 * T * T * T;

const eclipticToEquatorial = ({ longitude, latitude }: EclipticPosition, obliquity: number): EquatorialPosition => {
  const lambda = toRadians(longitude);
  const beta = toRadians(latitude);
  const eps = toRadians(obliquity);
  const ra = Math.atan2(Math.sin(lambda) * Math.cos(eps) - Math.tan(beta) * Math.sin(eps), Math.cos(lambda));
  const dec = Math.asin(Math.sin(beta) * Math.cos(eps) + Math.cos(beta) * Math.sin(eps) * Math.sin(lambda));
  return { ra: normalizeDegrees(toDegrees(ra)), dec: toDegrees(dec) };
};

/** Greenwich mean sidereal time in degrees (Meeus 12.4). */
export const greenwichSiderealTime = (jd: number): number => {
  const T = centuriesSinceJ2000(jd);
  return normalizeDegrees(280.46061837 + 360.98564736629 * (jd - J2000) + 0.000387933 * T * T - (T * T * T) / 38710000);
};

export const equatorialToHorizontal = (ra: number, dec: number, latitude: number, longitude: number, jd: number): HorizontalPosition => {
  const hourAngle = toRadians(normalizeDegrees(greenwichSiderealTime(jd) + longitude - ra));
  const phi = toRadians(latitude);
  const delta = toRadians(dec);

  const sinAlt = Math.sin(phi) * Math.sin(delta) + Math.cos(phi) * Math.cos(delta) * Math.cos(hourAngle);
  const altitude = toDegrees(Math.asin(Math.max(-1, Math.min(1, sinAlt))));
  const azimuth = toDegrees(
    Math.atan2(-Math.cos(delta) * Math.sin(hourAngle), Math.sin(delta) * Math.cos(phi) - Math.cos(delta) * Math.cos(hourAngle) * Math.sin(phi)),
  );
  return { altitude, azimuth: normalizeDegrees(azimuth) };
};

const solarEclipticLongitude = (T: number): number => {
  const L0 = 280.46646 + 36000.76983 * T + 0.0003032 * T * T;
  const M = toRadians(357.52911 + 35999.05029 * T - 0.0001537 * T * T);
  const C =
    (1.914602 - 0.004817 * T - 0.000014 * T * T) * Math.sin(M) + (0.019993 - 0.000101 * T) * Math.sin(2 * M) + 0.000289 * Math.sin(3 * M);
  const omega = toRadians(125.04 - 1934.136 * T);
  return normalizeDegrees(L0 + C - 0.00569 - 0.00478 * Math.sin(omega));
};

// [D, M, M', F, longitude (1e-6 deg), distance (1e-3 km)], largest terms of Meeus table 47.A
const MOON_LONGITUDE_TERMS: ReadonlyArray<readonly [number, number, number, number, number, number]> = [
  [0, 0, 1, 0, 6288774, -20905355],
  [2, 0, -1, 0, 1274027, -3699111],
  [2, 0, 0, 0, 658314, -2955968],
  [0, 0, 2, 0, 213618, -569925],
  [0, 1, 0, 0, -185116, 48888],
  [0, 0, 0, 2, -114332, -3149],
  [2, 0, -2, 0, 58793, 246158],
  [2, -1, -1, 0, 57066, -152138],
  [2, 0, 1, 0, 53322, -170733],
  [2, -1, 0, 0, 45758, -204586],
  [0, 1, -1, 0, -40923, -129620],
  [1, 0, 0, 0, -34720, 108743],
  [0, 1, 1, 0, -30383, 104755],
  [2, 0, 0, -2, 15327, 10321],
];

// [D, M, M', F, latitude (1e-6 deg)], table 47.B
const MOON_LATITUDE_TERMS: ReadonlyArray<readonly [number, number, number, number, number]> = [
  [0, 0, 0, 1, 5128122],
  [0, 0, 1, 1, 280602],
  [0, 0, 1, -1, 277693],
  [2, 0, 0, -1, 173237],
  [2, 0, -1, 1, 55413],
  [2, 0, -1, -1, 46271],
  [2, 0, 0, 1, 32573],
  [0, 0, 2, 1, 17198],
];

interface LunarPosition extends EclipticPosition {
  distanceKm: number;
}

const lunarPosition = (T: number): LunarPosition => {
  const Lp = 218.3164477 + 481267.88123421 * T - 0.0015786 * T * T;
  const D = toRadians(297.8501921 + 445267.1114034 * T - 0.0018819 * T * T);
  const M = toRadians(357.5291092 + 35999.0502909 * T - 0.0001536 * T * T);
  const Mp = toRadians(134.9633964 + 477198.8675055 * T + 0.0087414 * T * T);
  const F = toRadians(93.272095 + 483202.0175233 * T - 0.0036539 * T * T);
  const E = 1 - 0.002516 * T - 0.0000074 * T * T;
  const eccentricity = (m: number): number => (Math.abs(m) === 2 ? E * E : Math.abs(m) === 1 ? E : 1);

  let sumL = 0;
  let sumR = 0;
  for (const [d, m, mp, f, l, r] of MOON_LONGITUDE_TERMS) {
    const arg = d * D + m * M + mp * Mp + f * F;
    sumL += l * eccentricity(m) * Math.sin(arg);
    sumR += r * eccentricity(m) * Math.cos(arg);
  }
  let sumB = 0;
  for (const [d, m, mp, f, b] of MOON_LATITUDE_TERMS) {
    sumB += b * eccentricity(m) * Math.sin(d * D + m * M + mp * Mp + f * F);
  }

  const A1 = toRadians(119.75 + 131.849 * T);
  const A3 = toRadians(313.45 + 481266.484 * T);
  sumL += 3958 * Math.sin(A1) + 1962 * Math.sin(toRadians(Lp) - F);
  sumB += -2235 * Math.sin(toRadians(Lp)) + 382 * Math.sin(A3);

  return {
    longitude: normalizeDegrees(Lp + sumL / 1e6),
    latitude: sumB / 1e6,
    distanceKm: 385000.56 + sumR / 1000,
  };
};

interface OrbitalElements {
  a: number;
  e: number;
  I: number;
  L: number;
  perihelion: number;
  node: number;
}

// J2000 value and rate per century for each element.
type ElementSeries = readonly [base: OrbitalElements, rate: OrbitalElements];

const elements = (a: number, e: number, I: number, L: number, perihelion: number, node: number): OrbitalElements => ({
  a,
  e,
  I,
  L,
  perihelion,
  node,
});

const PLANET_ELEMENTS: Readonly<Record<string, ElementSeries>> = {
  mercury: [elements(0.38709927, 0.20563593, 7.00497902, 252.2503235, 77.45779628, 48.33076593), elements(0.00000037, 0.00001906, -0.00594749, 149472.67411175, 0.16047689, -0.12534081)],
  venus: [elements(0.72333566, 0.00677672, 3.39467605, 181.9790995, 131.60246718, 76.67984255), elements(0.0000039, -0.00004107, -0.0007889, 58517.81538729, 0.00268329, -0.27769418)],
  earth: [elements(1.00000261, 0.01671123, -0.00001531, 100.46457166, 102.93768193, 0), elements(0.00000562, -0.00004392, -0.01294668, 35999.37244981, 0.32327364, 0)],
  mars: [elements(1.52371034, 0.0933941, 1.84969142, -4.55343205, -23.94362959, 49.55953891), elements(0.00001847, 0.00007882, -0.00813131, 19140.30268499, 0.44441088, -0.29257343)],
  jupiter: [elements(5.202887, 0.04838624, 1.30439695, 34.39644051, 14.72847983, 100.47390909), elements(-0.00011607, -0.00013253, -0.00183714, 3034.74612775, 0.21252668, 0.20469106)],
  saturn: [elements(9.53667594, 0.05386179, 2.48599187, 49.95424423, 92.59887831, 113.66242448), elements(-0.0012506, -0.00050991, 0.00193609, 1222.49362201, -0.41897216, -0.28867794)],
  uranus: [elements(19.18916464, 0.04725744, 0.77263783, 313.23810451, 170.9542763, 74.01692503), elements(-0.00196176, -0.00004397, -0.00242939, 428.48202785, 0.40805281, 0.04240589)],
  neptune: [elements(30.06992276, 0.00859048, 1.77004347, -55.12002969, 44.96476227, 131.78422574), elements(0.00026291, 0.00005105, 0.00035372, 218.45945325, -0.32241464, -0.01262724)],
};

type Vector3 = readonly [number, number, number];

const heliocentricEcliptic = ([base, rate]: ElementSeries, T: number): Vector3 => {
  const a = base.a + rate.a * T;
  const e = base.e + rate.e * T;
  const I = toRadians(base.I + rate.I * T);
  const L = base.L + rate.L * T;
  const perihelion = base.perihelion + rate.perihelion * T;
  const node = base.node + rate.node * T;

  const omega = toRadians(perihelion - node);
  const bigOmega = toRadians(node);
  let meanAnomaly = normalizeDegrees(L - perihelion);
  if (meanAnomaly > 180) meanAnomaly -= 360;
  const M = toRadians(meanAnomaly);

  let E = M + e * Math.sin(M);
  for (let iteration = 0; iteration < 10; iteration += 1) {
    const delta = (E - e * Math.sin(E) - M) / (1 - e * Math.cos(E));
    E -= delta;
    if (Math.abs(delta) < 1e-9) break;
  }

  const xp = a * (Math.cos(E) - e);
  const yp = a * Math.sqrt(1 - e * e) * Math.sin(E);
  const cosW = Math.cos(omega);
  const sinW = Math.sin(omega);
  const cosO = Math.cos(bigOmega);
  const sinO = Math.sin(bigOmega);
  const cosI = Math.cos(I);
  const sinI = Math.sin(I);

  return [
    (cosW * cosO - sinW * sinO * cosI) * xp + (-sinW * cosO - cosW * sinO * cosI) * yp,
    (cosW * sinO + sinW * cosO * cosI) * xp + (-sinW * sinO + cosW * cosO * cosI) * yp,
    sinW * sinI * xp + cosW * sinI * yp,
  ];
};

const planetEquatorial = (planet: string, T: number): EquatorialPosition | null => {
  const series = PLANET_ELEMENTS[planet];
  if (!series || planet === 'earth') return null;
  const [px, py, pz] = heliocentricEcliptic(series, T);
  const [ex, ey, ez] = heliocentricEcliptic(PLANET_ELEMENTS.earth, T);
  const x = px - ex;
  const y = py - ey;
  const z = pz - ez;
  return eclipticToEquatorial(
    { longitude: normalizeDegrees(toDegrees(Math.atan2(y, x))), latitude: toDegrees(Math.atan2(z, Math.hypot(x, y))) },
    meanObliquity(T),
  );
};

/** Pickering (2002); Infinity at or below the horizon. */
export const getAirmass = (altitude: number): number => {
  if (altitude <= 0) return Number.POSITIVE_INFINITY;
  const apparent = altitude + 244 / (165 + 47 * altitude ** 1.1);
  return Math.max(1, 1 / Math.sin(toRadians(apparent)));
};

export const getMoonPhaseName = (illumination: number): string => {
  if (illumination < 3) return 'New Moon';
  if (illumination < 25) return 'Waxing Crescent';
  if (illumination < 50) return 'First Quarter';
  if (illumination < 75) return 'Waxing Gibbous';
  if (illumination < 97) return illumination > 95 ? 'Full Moon' : 'Waning Gibbous';
  return 'Full Moon';
};

export const getAirmassQuality = (airmass: number): string => {
  if (airmass <= 1.2) return 'Excellent';
  if (airmass <= 1.5) return 'Good';
  if (airmass <= 2.0) return 'Fair';
  if (airmass <= 3.0) return 'Poor';
  return 'Very poor';
};

export const createAstronomyCalculator = (): AstronomyCalculator => {
  const getAltitudeAzimuth = (ra: number, dec: number, location: Location, time: Date): HorizontalPosition =>
    equatorialToHorizontal(ra, dec, location.latitude, location.longitude, toJulianDate(time));

  const getSunAltitude = (location: Location, time: Date): number => {
    const jd = toJulianDate(time);
    const T = centuriesSinceJ2000(jd);
    const sun = eclipticToEquatorial({ longitude: solarEclipticLongitude(T), latitude: 0 }, meanObliquity(T));
    return equatorialToHorizontal(sun.ra, sun.dec, location.latitude, location.longitude, jd).altitude;
  };

  const getMoonPosition = (location: Location, time: Date): HorizontalPosition => {
    const jd = toJulianDate(time);
    const T = centuriesSinceJ2000(jd);
    const moon = lunarPosition(T);
    const equatorial = eclipticToEquatorial(moon, meanObliquity(T));
    const geocentric = equatorialToHorizontal(equatorial.ra, equatorial.dec, location.latitude, location.longitude, jd);
    const parallax = toDegrees(Math.asin((EARTH_RADIUS_KM / moon.distanceKm) * Math.cos(toRadians(geocentric.altitude))));
    return { altitude: geocentric.altitude - parallax, azimuth: geocentric.azimuth };
  };

  const getMoonIllumination = (time: Date): number => {
    const T = centuriesSinceJ2000(toJulianDate(time));
    const phaseAngle = normalizeDegrees(lunarPosition(T).longitude - solarEclipticLongitude(T));
    return ((1 - Math.cos(toRadians(phaseAngle))) / 2) * 100;
  };

  const getAstronomyFrame = (location: Location, time: Date): AstronomyFrame => {
    const moonIllumination = getMoonIllumination(time);
    const moon = getMoonPosition(location, time);
    return {
      moonIllumination,
      moonAltitude: moon.altitude,
      moonAzimuth: moon.azimuth,
      moonPhase: getMoonPhaseName(moonIllumination),
      sunAltitude: getSunAltitude(location, time),
    };
  };

  const getTargetPosition = (object: CelestialObject, location: Location, time: Date): TargetPosition => {
    let position: HorizontalPosition;
    if (object.objectType === 'moon' || object.name.toLowerCase() === 'moon') {
      position = getMoonPosition(location, time);
    } else {
      const planet = object.objectType === 'planet' ? planetEquatorial(object.name.toLowerCase(), centuriesSinceJ2000(toJulianDate(time))) : null;
      position = planet
        ? getAltitudeAzimuth(planet.ra, planet.dec, location, time)
        : getAltitudeAzimuth(object.ra, object.dec, location, time);
    }

    return {
      object,
      altitude: position.altitude,
      azimuth: position.azimuth,
      airmass: getAirmass(position.altitude),
      isVisible: position.altitude > 0,
    };
  };

  return {
    getAstronomyFrame,
    getTargetPosition,
    getMoonPosition,
    getMoonIllumination,
    getSunAltitude,
    isAstronomicalNight: (location, time) => getSunAltitude(location, time) < ASTRONOMICAL_NIGHT_SUN_ALTITUDE,
    getAltitudeAzimuth,
  };
};
