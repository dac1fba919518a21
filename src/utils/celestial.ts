import { z } from 'zod';

export const OBJECT_TYPES = [
  'planet',
  'moon',
  'galaxy',
  'nebula',
  'open_cluster',
  'globular_cluster',
  'planetary_nebula',
  'supernova_remnant',
  'star',
  'double_star',
  'asteroid',
  'comet',
  'other',
] as const;
export type ObjectType = (typeof OBJECT_TYPES)[number];

export const celestialObjectSchema = z.object({
  name: z.string().min(1),
  designation: z.string().min(1),
  ra: z.number().min(0).lt(360),
  dec: z.number().min(-90).max(90),
  magnitude: z.number().nullable().default(null),
  objectType: z.enum(OBJECT_TYPES),
  constellation: z.string().nullable().default(null),
  size: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  aliases: z.array(z.string()).default([]),
});

export type CelestialObject = Readonly<z.infer<typeof celestialObjectSchema>>;

const DEEP_SKY_TYPES: ReadonlySet<ObjectType> = new Set<ObjectType>([
  'galaxy',
  'nebula',
  'open_cluster',
  'globular_cluster',
  'planetary_nebula',
  'supernova_remnant',
]);

const SOLAR_SYSTEM_TYPES: ReadonlySet<ObjectType> = new Set<ObjectType>(['planet', 'moon', 'asteroid', 'comet']);

export const isDeepSky = (object: CelestialObject): boolean => DEEP_SKY_TYPES.has(object.objectType);

export const isSolarSystem = (object: CelestialObject): boolean => SOLAR_SYSTEM_TYPES.has(object.objectType);

export const matchesSearch = (object: CelestialObject, query: string): boolean => {
  const needle = query.trim().toLowerCase();
  if (!needle) return false;
  return (
    object.name.toLowerCase().includes(needle) ||
    object.designation.toLowerCase().includes(needle) ||
    object.aliases.some((alias) => alias.toLowerCase().includes(needle))
  );
};
