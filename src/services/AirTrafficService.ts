import config from '../config';
import logger from '../utils/logger';
import { daysSpanInTimestamps } from '../utils/timeSpan';
import { getErrorMessage } from '../utils/errors';
import { ExpiringCache } from '../lib/cache/ExpiringCache';
import type {
  FlightConnectionsFetcher, FlightData, OpenSkyClient, StateVector,
} from '../types/opensky.types';
import type {
  AirTrafficData, DeliveryContext, Message, TrafficDirection,
} from '../types/airTraffic.types';
import { resolveOpenSkyAuth, type OpenSkyCredentialOptions } from './openSkyCredentials';
import { OpenSkyService } from './OpenSkyService';

export const UNKNOWN_AIRPORT = 'Unknown airport';
export const JSON_CONTENT_TYPE = 'application/json';

export type StatesDict = Map<string, StateVector>;

export interface AirTrafficOptions extends OpenSkyCredentialOptions {
  /** Days to look back when querying arrivals and departures */
  trafficTimeSpanInDays?: number;
  /** Pre-built client; skips credential resolution */
  client?: OpenSkyClient;
  statesTtlSeconds?: number;
  connectionsTtlSeconds?: number;
  cacheMaxEntries?: number;
}

const STATES_CACHE_KEY = 'states';

/**
 * Tracks flights to and from airports by joining OpenSky arrival/departure
 * records with the live state vectors of the aircraft flying them.
 *
 * Upstream failures never reach callers: they are logged and surface as
 * empty results, the same as "no traffic right now".
 */
export class AirTrafficService {
  readonly trafficTimeSpanInDays: number;

  private readonly client: OpenSkyClient;

  private readonly statesCache: ExpiringCache<StatesDict>;

  private readonly arrivalsCache: ExpiringCache<FlightData[]>;

  private readonly departuresCache: ExpiringCache<FlightData[]>;

  constructor(options: AirTrafficOptions = {}) {
    const {
      client,
      trafficTimeSpanInDays = config.traffic.timeSpanInDays,
      statesTtlSeconds = config.traffic.statesTtlSeconds,
      connectionsTtlSeconds = config.traffic.connectionsTtlSeconds,
      cacheMaxEntries = config.traffic.cacheMaxEntries,
      ...credentials
    } = options;

    this.trafficTimeSpanInDays = trafficTimeSpanInDays;
    this.client = client ?? new OpenSkyService({ auth: resolveOpenSkyAuth(credentials) });

    this.statesCache = new ExpiringCache('states', {
      ttlSeconds: statesTtlSeconds,
      maxEntries: 1,
    });
    this.arrivalsCache = new ExpiringCache('arrivals', {
      ttlSeconds: connectionsTtlSeconds,
      maxEntries: cacheMaxEntries,
    });
    this.departuresCache = new ExpiringCache('departures', {
      ttlSeconds: connectionsTtlSeconds,
      maxEntries: cacheMaxEntries,
    });
  }

  /**
   * Callback for arrival topics
   */
  arrivalsHandler = async (airport: string, context?: DeliveryContext): Promise<Message> => (
    this.handle('arrivals', airport, context)
  );

  /**
   * Callback for departure topics
   */
  departuresHandler = async (airport: string, context?: DeliveryContext): Promise<Message> => (
    this.handle('departures', airport, context)
  );

  /**
   * Snapshot of current states keyed by icao24, shared by all callers for the states TTL
   */
  async getStatesDict(): Promise<StatesDict> {
    return this.statesCache.getOrLoad(STATES_CACHE_KEY, async () => {
      const states = await this.getStates();
      const statesDict: StatesDict = new Map();
      states.forEach((state) => {
        if (state.icao24) {
          statesDict.set(state.icao24, state);
        }
      });
      return statesDict;
    });
  }

  async arrivalsToday(airport: string): Promise<FlightData[]> {
    return this.arrivalsCache.getOrLoad(airport, () => (
      this.flightConnectionsToday(airport, this.client.getArrivalsByAirport.bind(this.client))
    ));
  }

  async departuresToday(airport: string): Promise<FlightData[]> {
    return this.departuresCache.getOrLoad(airport, () => (
      this.flightConnectionsToday(airport, this.client.getDeparturesByAirport.bind(this.client))
    ));
  }

  async getTraffic(direction: TrafficDirection, airport: string): Promise<AirTrafficData[]> {
    const statesDict = await this.getStatesDict();
    const flightConnections = direction === 'arrivals'
      ? await this.arrivalsToday(airport)
      : await this.departuresToday(airport);

    return joinFlightConnections(statesDict, flightConnections);
  }

  private async handle(
    direction: TrafficDirection,
    airport: string,
    context?: DeliveryContext,
  ): Promise<Message> {
    const data = await this.getTraffic(direction, airport);

    logger.debug('Built air traffic payload', {
      direction,
      airport,
      flights: data.length,
      topic: context?.topic,
    });

    return { body: JSON.stringify(data), contentType: JSON_CONTENT_TYPE };
  }

  private async getStates(): Promise<StateVector[]> {
    try {
      const result = await this.client.getStates();
      return result?.states ?? [];
    } catch (error) {
      logger.error('OpenSky get states error', { error: getErrorMessage(error) });
      return [];
    }
  }

  private async flightConnectionsToday(
    airport: string,
    fetchConnections: FlightConnectionsFetcher,
  ): Promise<FlightData[]> {
    const { begin, end } = daysSpanInTimestamps(this.trafficTimeSpanInDays);

    try {
      return (await fetchConnections(airport, begin, end)) ?? [];
    } catch (error) {
      logger.error('OpenSky flight connections error', {
        airport,
        begin,
        end,
        error: getErrorMessage(error),
      });
      return [];
    }
  }
}

/**
 * Reduce a live state and a flight connection to the published record.
 * A missing state gives a record without position.
 */
export function toAirTrafficData(
  state: StateVector | undefined,
  flightConnection: FlightData,
): AirTrafficData {
  const from = flightConnection.estDepartureAirport || UNKNOWN_AIRPORT;
  const to = flightConnection.estArrivalAirport || UNKNOWN_AIRPORT;

  if (!state) {
    return {
      icao24: flightConnection.icao24,
      lat: null,
      lng: null,
      from,
      to,
      last_contact: null,
    };
  }

  return {
    icao24: state.icao24,
    lat: state.latitude,
    lng: state.longitude,
    from,
    to,
    last_contact: state.last_contact,
  };
}

/**
 * Match flight connections with current states and keep the ones being flown right now.
 * Duplicate icao24 entries resolve to the last connection seen.
 */
export function joinFlightConnections(
  statesDict: StatesDict,
  flightConnections: FlightData[],
): AirTrafficData[] {
  const connectionsDict = new Map<string, FlightData>();
  flightConnections.forEach((flightConnection) => {
    if (flightConnection.icao24) {
      connectionsDict.set(flightConnection.icao24, flightConnection);
    }
  });

  const data: AirTrafficData[] = [];
  connectionsDict.forEach((flightConnection, icao24) => {
    // Entries without a tracked state are dropped here; toAirTrafficData's
    // null-position branch only matters if this filter changes.
    if (statesDict.has(icao24)) {
      data.push(toAirTrafficData(statesDict.get(icao24), flightConnection));
    }
  });
  return data;
}

export default AirTrafficService;
