/**
 * OpenSky Network data types
 */
import type { FlightData } from '../schemas/opensky.schemas';

export type { FlightData };

export type StateArray = unknown[];

/**
 * Live position report for one transponder.
 * Field names follow the OpenSky REST documentation.
 */
export interface StateVector {
  icao24: string | null;
  callsign: string | null;
  origin_country: string | null;
  time_position: number | null;
  last_contact: number | null;
  longitude: number | null;
  latitude: number | null;
  baro_altitude: number | null;
  on_ground: boolean | null;
  velocity: number | null;
  true_track: number | null;
  vertical_rate: number | null;
  sensors: number[] | null;
  geo_altitude: number | null;
  squawk: string | null;
  spi: boolean | null;
  position_source: number | null;
  category: number | null;
}

export interface OpenSkyStates {
  time: number;
  states: StateVector[];
}

export interface BoundingBox {
  lamin: number;
  lomin: number;
  lamax: number;
  lomax: number;
}

export interface GetStatesOptions {
  /** Epoch seconds; omitted means "now" */
  time?: number;
  icao24?: string | string[];
  bbox?: BoundingBox;
}

export type FlightConnectionsFetcher = (
  airport: string,
  begin: number,
  end: number,
) => Promise<FlightData[] | null>;

/**
 * The subset of the OpenSky API the traffic join depends on.
 */
export interface OpenSkyClient {
  getStates(options?: GetStatesOptions): Promise<OpenSkyStates | null>;
  getArrivalsByAirport: FlightConnectionsFetcher;
  getDeparturesByAirport: FlightConnectionsFetcher;
}
