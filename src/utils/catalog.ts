import { readFileSync } from 'node:fs';
import { z } from 'zod';
import bundledCatalog from '../../data/catalog.json' with { type: 'json' };
import { type AstronomyCalculator } from './astronomy.js';
import { celestialObjectSchema, isDeepSky, isSolarSystem, matchesSearch, type CelestialObject, type ObjectType } from './celestial.js';
import { CatalogNotFoundError, ConfigError } from './errors.js';
import { type Location } from './location.js';

const catalogFileSchema = z.object({
  objects: z.array(celestialObjectSchema),
});

export interface VisibleObject {
  readonly object: CelestialObject;
  readonly altitude: number;
  readonly azimuth: number;
}

export interface CelestialCatalog {
  readonly size: number;
  all: () => CelestialObject[];
  search: (query: string) => CelestialObject | null;
  get: (query: string) => CelestialObject;
  searchAll: (query: string) => CelestialObject[];
  getByType: (objectType: ObjectType) => CelestialObject[];
  getPlanets: () => CelestialObject[];
  getDeepSky: () => CelestialObject[];
  getByConstellation: (constellation: string) => CelestialObject[];
  getVisible: (location: Location, time: Date, minAltitude?: number) => VisibleObject[];
}

export const parseCatalogObjects = (raw: unknown, sourceLabel: string): CelestialObject[] => {
  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid catalog ${sourceLabel}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`);
  }
  return parsed.data.objects;
};

export const loadCatalogObjects = (catalogPath: string | null = null): CelestialObject[] => {
  if (!catalogPath) {
    return parseCatalogObjects(bundledCatalog, 'data/catalog.json');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(catalogPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Unable to read catalog ${catalogPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseCatalogObjects(raw, catalogPath);
};

interface CreateCelestialCatalogOptions {
  objects: CelestialObject[];
  astronomy: AstronomyCalculator;
}

export const createCelestialCatalog = ({ objects, astronomy }: CreateCelestialCatalogOptions): CelestialCatalog => {
  const entries = [...objects];

  const search = (query: string): CelestialObject | null => {
    const needle = query.trim().toLowerCase();
    if (!needle) return null;
    const exact = entries.find((object) => object.name.toLowerCase() === needle || object.designation.toLowerCase() === needle);
    return exact ?? entries.find((object) => matchesSearch(object, needle)) ?? null;
  };

  const get = (query: string): CelestialObject => {
    const found = search(query);
    if (!found) {
      throw new CatalogNotFoundError(query);
    }
    return found;
  };

  const getByType = (objectType: ObjectType) => entries.filter((object) => object.objectType === objectType);

  const getVisible = (location: Location, time: Date, minAltitude = 15): VisibleObject[] =>
    entries
      .filter((object) => !isSolarSystem(object))
      .map((object) => ({ object, ...astronomy.getAltitudeAzimuth(object.ra, object.dec, location, time) }))
      .filter((entry) => entry.altitude >= minAltitude)
      .sort((left, right) => right.altitude - left.altitude);

  return {
    size: entries.length,
    all: () => [...entries],
    search,
    get,
    searchAll: (query) => entries.filter((object) => matchesSearch(object, query)),
    getByType,
    getPlanets: () => getByType('planet'),
    getDeepSky: () => entries.filter(isDeepSky),
    getByConstellation: (constellation) => {
      const needle = constellation.trim().toLowerCase();
      return entries.filter((object) => object.constellation?.toLowerCase() === needle);
    },
    getVisible,
  };
};
