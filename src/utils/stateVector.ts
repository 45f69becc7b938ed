import type { StateArray, StateVector } from '../types/opensky.types';

/**
 * Positions of the fields in an OpenSky state array.
 * CATEGORY is only present when the request sets `extended=1`.
 */
export const STATE_INDEX = {
  ICAO24: 0,
  CALLSIGN: 1,
  ORIGIN_COUNTRY: 2,
  TIME_POSITION: 3,
  LAST_CONTACT: 4,
  LONGITUDE: 5,
  LATITUDE: 6,
  BARO_ALTITUDE: 7,
  ON_GROUND: 8,
  VELOCITY: 9,
  TRUE_TRACK: 10,
  VERTICAL_RATE: 11,
  SENSORS: 12,
  GEO_ALTITUDE: 13,
  SQUAWK: 14,
  SPI: 15,
  POSITION_SOURCE: 16,
  CATEGORY: 17,
} as const;

const safeNumber = (value: unknown): number | null => (
  typeof value === 'number' && Number.isFinite(value) ? value : null
);

const safeString = (value: unknown): string | null => (
  typeof value === 'string' && value.trim() !== '' ? value.trim() : null
);

const safeBoolean = (value: unknown): boolean | null => (typeof value === 'boolean' ? value : null);

const safeSensors = (value: unknown): number[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter((sensor): sensor is number => typeof sensor === 'number');
};

export function mapStateArrayToVector(state: StateArray): StateVector {
  const icao24 = safeString(state[STATE_INDEX.ICAO24]);

  return {
    icao24: icao24 ? icao24.toLowerCase() : null,
    // callsigns are space-padded to 8 characters
    callsign: safeString(state[STATE_INDEX.CALLSIGN]),
    origin_country: safeString(state[STATE_INDEX.ORIGIN_COUNTRY]),
    time_position: safeNumber(state[STATE_INDEX.TIME_POSITION]),
    last_contact: safeNumber(state[STATE_INDEX.LAST_CONTACT]),
    longitude: safeNumber(state[STATE_INDEX.LONGITUDE]),
    latitude: safeNumber(state[STATE_INDEX.LATITUDE]),
    baro_altitude: safeNumber(state[STATE_INDEX.BARO_ALTITUDE]),
    on_ground: safeBoolean(state[STATE_INDEX.ON_GROUND]),
    velocity: safeNumber(state[STATE_INDEX.VELOCITY]),
    true_track: safeNumber(state[STATE_INDEX.TRUE_TRACK]),
    vertical_rate: safeNumber(state[STATE_INDEX.VERTICAL_RATE]),
    sensors: safeSensors(state[STATE_INDEX.SENSORS]),
    geo_altitude: safeNumber(state[STATE_INDEX.GEO_ALTITUDE]),
    squawk: safeString(state[STATE_INDEX.SQUAWK]),
    spi: safeBoolean(state[STATE_INDEX.SPI]),
    position_source: safeNumber(state[STATE_INDEX.POSITION_SOURCE]),
    category: safeNumber(state[STATE_INDEX.CATEGORY]),
  };
}
