import { InvalidLocationError } from './errors.js';

export interface Location {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  /** m */
  readonly elevation: number;
  readonly timezone: string;
}

interface CreateLocationOptions {
  name?: string;
  latitude: number;
  longitude: number;
  elevation?: number;
  timezone?: string;
}

export const createLocation = ({ name, latitude, longitude, elevation = 0, timezone = 'UTC' }: CreateLocationOptions): Location => {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidLocationError(latitude, longitude, 'latitude must be between -90 and 90');
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidLocationError(latitude, longitude, 'longitude must be between -180 and 180');
  }
  if (!Number.isFinite(elevation) || elevation < 0) {
    throw new InvalidLocationError(latitude, longitude, 'elevation must be non-negative');
  }
  return {
    name: name?.trim() || `${latitude.toFixed(4)}, ${longitude.toFixed(4)}`,
    latitude,
    longitude,
    elevation,
    timezone,
  };
};
