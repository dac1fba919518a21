export class SeeingError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ConfigError extends SeeingError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class WeatherFetchError extends SeeingError {
  readonly source: string;

  constructor(message: string, source = 'unknown') {
    super(message, 502);
    this.source = source;
  }
}

export class CatalogNotFoundError extends SeeingError {
  readonly objectName: string;

  constructor(objectName: string) {
    super(`Object not found in catalog: ${objectName}`, 404);
    this.objectName = objectName;
  }
}

export class InvalidLocationError extends SeeingError {
  readonly latitude: number;
  readonly longitude: number;

  constructor(latitude: number, longitude: number, reason?: string) {
    super(reason ? `Invalid location (${latitude}, ${longitude}): ${reason}` : `Invalid location: (${latitude}, ${longitude})`, 400);
    this.latitude = latitude;
    this.longitude = longitude;
  }
}

export class CacheError extends SeeingError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class AlertConditionError extends SeeingError {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`, 400);
    this.position = position;
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
