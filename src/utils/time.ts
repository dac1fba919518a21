export const MS_PER_HOUR = 60 * 60 * 1000;

/** Open-Meteo returns zone-less UTC stamps; those are read as UTC. */
export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const truncateToHour = (time: Date): Date => new Date(Math.floor(time.getTime() / MS_PER_HOUR) * MS_PER_HOUR);

export const addHours = (time: Date, hours: number): Date => new Date(time.getTime() + hours * MS_PER_HOUR);

export const findClosestTimeIndex = (times: readonly Date[], target: Date): number => {
  let bestIdx = -1;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let i = 0; i < times.length; i += 1) {
    const distance = Math.abs(times[i].getTime() - target.getTime());
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIdx = i;
    }
  }
  return bestIdx;
};

export const isIsoDate = (value: string): boolean => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};
