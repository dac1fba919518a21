import { createCelestialCatalog, loadCatalogObjects, parseCatalogObjects } from '../src/utils/catalog.js';
import { CatalogNotFoundError, ConfigError } from '../src/utils/errors.js';
import { BASE_TIME, createFakeAstronomy, testLocation } from './helpers.js';

// Altitude equals declination, so visibility is easy to predict.
const astronomy = { ...createFakeAstronomy(), getAltitudeAzimuth: (_ra: number, dec: number) => ({ altitude: dec, azimuth: 0 }) };
const catalog = createCelestialCatalog({ objects: loadCatalogObjects(), astronomy });

test('the bundled catalog loads and validates', () => {
  expect(catalog.size).toBe(50);
  expect(catalog.getPlanets()).toHaveLength(7);
  expect(catalog.getDeepSky()).toHaveLength(35);
});

test('search prefers exact name or designation matches', () => {
  expect(catalog.search('m31')?.name).toBe('Andromeda Galaxy');
  expect(catalog.search('andromeda')?.designation).toBe('M31');
  expect(catalog.search('Orion')?.designation).toBe('M42');
  expect(catalog.search('  ')).toBeNull();
});

test('get throws for unknown objects', () => {
  expect(() => catalog.get('Planet X')).toThrow(CatalogNotFoundError);
  try {
    catalog.get('Planet X');
  } catch (error) {
    expect(error).toBeInstanceOf(CatalogNotFoundError);
    if (error instanceof CatalogNotFoundError) {
      expect(error.statusCode).toBe(404);
      expect(error.objectName).toBe('Planet X');
    }
  }
});

test('searchAll matches names, designations and aliases', () => {
  expect(catalog.searchAll('ngc 65').map((object) => object.designation)).toEqual(['M8', 'M20']);
  expect(catalog.searchAll('dog star').map((object) => object.name)).toEqual(['Sirius']);
});

test('objects can be listed by type and constellation', () => {
  expect(catalog.getByType('planetary_nebula').map((object) => object.designation)).toEqual(['M57', 'M27', 'M97']);
  expect(catalog.getByConstellation('ursa major').map((object) => object.name)).toEqual([
    "Bode's Galaxy",
    'Cigar Galaxy',
    'Pinwheel Galaxy',
    'Owl Nebula',
    'Mizar',
  ]);
});

test('visible objects skip the solar system and sort by altitude', () => {
  expect(catalog.getVisible(testLocation, BASE_TIME, 60).map((entry) => entry.object.name)).toEqual(['Polaris', 'Cigar Galaxy', "Bode's Galaxy"]);
});

test('malformed catalogs are configuration errors', () => {
  expect(() => parseCatalogObjects({ objects: [{ name: 'Nameless' }] }, 'inline')).toThrow(ConfigError);
  expect(() => parseCatalogObjects({ objects: [{ name: 'Bad', designation: 'B', ra: 400, dec: 0, objectType: 'star' }] }, 'inline')).toThrow(
    'Invalid catalog inline: objects.0.ra',
  );
  expect(() => loadCatalogObjects('/nonexistent/catalog.json')).toThrow('Unable to read catalog /nonexistent/catalog.json');
});
