import { DisplayMessage } from '../types/relay';
import { StravaActivity, StravaAthlete } from '../types/strava';

// See https://developers.strava.com/docs/reference/#api-models-ActivityType
export const ACTIVITY_COLOURS: Record<string, number> = {
  Run: 0xFC4C02, // orange
  Ride: 0x66C2FF, // pale blue
  Hike: 0x008000, // forest green
  RockClimbing: 0xFF8000,
  AlpineSki: 0xFEFEFE, // snow
  BackcountrySki: 0xFEFEFE,
  NordicSki: 0xFEFEFE,
  Snowboard: 0xFEFEFE,
};

export const DEFAULT_COLOUR = 0xFC4C02;

/** Activity types shown with average speed instead of pace. */
export const SPEED_BASED_TYPES: ReadonlySet<string> = new Set(['Ride']);

export const STRAVA_FOOTER = {
  text: 'Powered by Strava',
  iconUrl: 'https://d3nn82uaxijpm6.cloudfront.net/apple-touch-icon-144x144.png?v=dLlWydWlG8',
};

/**
 * Rounds to a number of decimal places using the exact binary value of the
 * input, so 2.675 rounds to 2.67. Values that sit exactly on a half go to the
 * even neighbour: 10.125 -> 10.12, 5.375 -> 5.38.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // toFixed(100) prints the exact decimal expansion of the double
  const expansion = Math.abs(value).toFixed(100);
  const dot = expansion.indexOf('.');
  const kept = expansion.slice(0, digits > 0 ? dot + 1 + digits : dot);

  if (/^50*$/.test(expansion.slice(dot + 1 + digits)) && Number(kept.slice(-1)) % 2 === 0) {
    return Math.sign(value) * Number(kept);
  }
  return Number(value.toFixed(digits));
}

/**
 * Prints a measurement with at least one decimal place: 10 -> "10.0", 10.25 -> "10.25".
 */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

const pad2 = (n: number): string => n.toString().padStart(2, '0');

export function distanceKm(meters: number): number {
  return roundTo(meters / 1000, 2);
}

export function formatDistance(meters: number): string {
  return `${formatDecimal(distanceKm(meters))} km`;
}

/**
 * H:MM:SS for an hour or more, M:SS below that.
 */
export function formatMovingTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const rem = seconds % 3600;
  const minutes = Math.floor(rem / 60);
  const secs = rem % 60;

  return hours
    ? `${hours}:${pad2(minutes)}:${pad2(secs)}`
    : `${minutes}:${pad2(secs)}`;
}

/**
 * Minutes per kilometre. The fractional minute is scaled by 0.6 and rounded to
 * hundredths before being read back as seconds; the truncation that follows is
 * part of the displayed value (0.29 * 100 shows as 28).
 */
export function formatPace(meters: number, movingTimeSeconds: number): string {
  const km = distanceKm(meters);
  // Stationary activities (weight training, yoga) report no distance
  if (km === 0) return '-:--/km';

  const activityMinutes = movingTimeSeconds / 60;
  const rawPace = activityMinutes / km;
  const paceMinutes = Math.floor(rawPace);
  const paceSeconds = roundTo((rawPace - paceMinutes) * 0.6, 2);

  return `${paceMinutes}:${pad2(Math.trunc(paceSeconds * 100))}/km`;
}

export function formatSpeed(metersPerSecond: number): string {
  return `${formatDecimal(roundTo(metersPerSecond * 3.6, 1))} km/h`;
}

export function formatElevation(meters: number): string {
  return `${formatDecimal(meters)} m`;
}

export function activityColour(type: string): number {
  return ACTIVITY_COLOURS[type] ?? DEFAULT_COLOUR;
}

/**
 * Builds the embed shown in Discord for an activity.
 */
export function buildDisplayMessage(activity: StravaActivity, athlete: StravaAthlete): DisplayMessage {
  const useSpeed = SPEED_BASED_TYPES.has(activity.type);

  return {
    title: activity.name,
    url: `https://strava.com/activities/${activity.id}`,
    color: activityColour(activity.type),
    timestamp: new Date(activity.start_date),
    author: {
      name: `${athlete.firstname} ${athlete.lastname}`,
      url: `https://strava.com/athletes/${athlete.id}`,
      iconUrl: athlete.profile_medium,
    },
    footer: STRAVA_FOOTER,
    fields: [
      { name: 'Distance', value: formatDistance(activity.distance), inline: true },
      { name: 'Moving Time', value: formatMovingTime(activity.moving_time), inline: true },
      useSpeed
        ? { name: 'Average Speed', value: formatSpeed(activity.average_speed), inline: true }
        : { name: 'Pace', value: formatPace(activity.distance, activity.moving_time), inline: true },
      { name: 'Elevation', value: formatElevation(activity.total_elevation_gain), inline: true },
    ],
  };
}
