import {
  AirTrafficService, joinFlightConnections, toAirTrafficData, UNKNOWN_AIRPORT,
} from '../AirTrafficService';
import type {
  FlightData, OpenSkyStates, StateVector,
} from '../../types/opensky.types';
import { daysSpanInTimestamps } from '../../utils/timeSpan';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
}));

function createState(icao24: string | null, latitude: number, longitude: number, lastContact: number): StateVector {
  return {
    icao24,
    callsign: null,
    origin_country: null,
    time_position: null,
    last_contact: lastContact,
    longitude,
    latitude,
    baro_altitude: null,
    on_ground: false,
    velocity: null,
    true_track: null,
    vertical_rate: null,
    sensors: null,
    geo_altitude: null,
    squawk: null,
    spi: null,
    position_source: null,
    category: null,
  };
}

function createFlight(overrides: Partial<FlightData>): FlightData {
  return {
    icao24: null,
    firstSeen: null,
    estDepartureAirport: null,
    lastSeen: null,
    estArrivalAirport: null,
    callsign: null,
    estDepartureAirportHorizDistance: null,
    estDepartureAirportVertDistance: null,
    estArrivalAirportHorizDistance: null,
    estArrivalAirportVertDistance: null,
    departureAirportCandidatesCount: null,
    arrivalAirportCandidatesCount: null,
    ...overrides,
  };
}

function createClient(states: StateVector[] = []) {
  return {
    getStates: jest.fn<Promise<OpenSkyStates | null>, []>()
      .mockResolvedValue({ time: 1000, states }),
    getArrivalsByAirport: jest.fn<Promise<FlightData[] | null>, [string, number, number]>()
      .mockResolvedValue([]),
    getDeparturesByAirport: jest.fn<Promise<FlightData[] | null>, [string, number, number]>()
      .mockResolvedValue([]),
  };
}

const createService = (client: ReturnType<typeof createClient>) => new AirTrafficService({
  client,
  trafficTimeSpanInDays: 1,
  statesTtlSeconds: 30,
  connectionsTtlSeconds: 600,
  cacheMaxEntries: 16,
});

describe('AirTrafficService', () => {
  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date(2024, 4, 15, 12, 0, 0));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('departuresHandler', () => {
    it('joins a tracked departure with its live position', async () => {
      const client = createClient([createState('abc123', 10, 20, 1000)]);
      client.getDeparturesByAirport.mockResolvedValue([
        createFlight({ icao24: 'abc123', estDepartureAirport: 'EDDF', estArrivalAirport: null }),
      ]);
      const service = createService(client);

      const message = await service.departuresHandler('EDDF');

      expect(message.contentType).toBe('application/json');
      expect(JSON.parse(message.body)).toEqual([
        {
          icao24: 'abc123', lat: 10, lng: 20, from: 'EDDF', to: 'Unknown airport', last_contact: 1000,
        },
      ]);
      expect(client.getArrivalsByAirport).not.toHaveBeenCalled();
    });

    it('returns an empty array when the airport has no connections', async () => {
      const client = createClient([createState('abc123', 10, 20, 1000)]);
      const service = createService(client);

      const message = await service.departuresHandler('ZZZZ');

      expect(message.body).toBe('[]');
    });
  });

  describe('arrivalsHandler', () => {
    it('excludes connections without a current state', async () => {
      const client = createClient([createState('abc123', 50.1, 8.6, 2000)]);
      client.getArrivalsByAirport.mockResolvedValue([
        createFlight({ icao24: 'abc123', estDepartureAirport: 'EGLL', estArrivalAirport: 'EDDF' }),
        createFlight({ icao24: 'def456', estDepartureAirport: 'LFPG', estArrivalAirport: 'EDDF' }),
      ]);
      const service = createService(client);

      const message = await service.arrivalsHandler('EDDF');

      expect(JSON.parse(message.body)).toEqual([
        {
          icao24: 'abc123', lat: 50.1, lng: 8.6, from: 'EGLL', to: 'EDDF', last_contact: 2000,
        },
      ]);
    });

    it('passes the look-back window to the provider', async () => {
      const client = createClient();
      const service = createService(client);
      const { begin, end } = daysSpanInTimestamps(1, new Date(2024, 4, 15, 12, 0, 0));

      await service.arrivalsHandler('EDDF');

      expect(client.getArrivalsByAirport).toHaveBeenCalledWith('EDDF', begin, end);
    });
  });

  describe('upstream failures', () => {
    it('treats a failed state fetch as no traffic', async () => {
      const client = createClient();
      client.getStates.mockRejectedValue(new Error('socket hang up'));
      client.getDeparturesByAirport.mockResolvedValue([
        createFlight({ icao24: 'abc123', estDepartureAirport: 'EDDF' }),
      ]);
      const service = createService(client);

      const message = await service.departuresHandler('EDDF');

      expect(message.body).toBe('[]');
      expect(logger.error).toHaveBeenCalledWith('OpenSky get states error', { error: 'socket hang up' });
    });

    it('treats a null state response as empty', async () => {
      const client = createClient();
      client.getStates.mockResolvedValue(null);
      const service = createService(client);

      const states = await service.getStatesDict();

      expect(states.size).toBe(0);
    });

    it('treats a failed connections fetch as no traffic', async () => {
      const client = createClient([createState('abc123', 10, 20, 1000)]);
      client.getArrivalsByAirport.mockRejectedValue(new Error('OpenSky API rate limited'));
      const service = createService(client);

      await expect(service.arrivalsToday('EDDF')).resolves.toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        'OpenSky flight connections error',
        expect.objectContaining({ airport: 'EDDF', error: 'OpenSky API rate limited' }),
      );
    });

    it('treats a null connections response as empty', async () => {
      const client = createClient();
      client.getDeparturesByAirport.mockResolvedValue(null);
      const service = createService(client);

      await expect(service.departuresToday('EDDF')).resolves.toEqual([]);
    });
  });

  describe('caching', () => {
    it('shares one state snapshot for 30 seconds', async () => {
      const client = createClient([createState('abc123', 10, 20, 1000)]);
      const service = createService(client);

      const first = await service.getStatesDict();
      jest.setSystemTime(new Date(2024, 4, 15, 12, 0, 29));
      const second = await service.getStatesDict();

      expect(second).toBe(first);
      expect(client.getStates).toHaveBeenCalledTimes(1);

      jest.setSystemTime(new Date(2024, 4, 15, 12, 0, 31));
      const third = await service.getStatesDict();

      expect(third).not.toBe(first);
      expect(client.getStates).toHaveBeenCalledTimes(2);
    });

    it('keeps connections for 10 minutes per airport', async () => {
      const client = createClient();
      client.getArrivalsByAirport.mockImplementation(async (airport) => [
        createFlight({ icao24: 'abc123', estArrivalAirport: airport }),
      ]);
      const service = createService(client);

      const first = await service.arrivalsToday('EDDF');
      jest.setSystemTime(new Date(2024, 4, 15, 12, 9, 59));
      const second = await service.arrivalsToday('EDDF');
      await service.arrivalsToday('EHAM');

      expect(second).toBe(first);
      expect(client.getArrivalsByAirport).toHaveBeenCalledTimes(2);

      jest.setSystemTime(new Date(2024, 4, 15, 12, 10, 1));
      const third = await service.arrivalsToday('EDDF');

      expect(third).not.toBe(first);
      expect(client.getArrivalsByAirport).toHaveBeenCalledTimes(3);
    });

    it('caches arrivals and departures independently', async () => {
      const client = createClient();
      const service = createService(client);

      await service.arrivalsToday('EDDF');
      await service.departuresToday('EDDF');
      await service.arrivalsToday('EDDF');
      await service.departuresToday('EDDF');

      expect(client.getArrivalsByAirport).toHaveBeenCalledTimes(1);
      expect(client.getDeparturesByAirport).toHaveBeenCalledTimes(1);
    });

    it('keeps a failed fetch as an empty result until it expires', async () => {
      const client = createClient();
      client.getArrivalsByAirport.mockRejectedValueOnce(new Error('timeout'));
      const service = createService(client);

      await service.arrivalsToday('EDDF');
      await service.arrivalsToday('EDDF');

      expect(client.getArrivalsByAirport).toHaveBeenCalledTimes(1);
    });

    it('fetches states once for concurrent handlers', async () => {
      const client = createClient([createState('abc123', 10, 20, 1000)]);
      const service = createService(client);

      await Promise.all([
        service.arrivalsHandler('EDDF'),
        service.departuresHandler('EDDF'),
      ]);

      expect(client.getStates).toHaveBeenCalledTimes(1);
    });
  });

  describe('getStatesDict', () => {
    it('indexes states by icao24 and skips anonymous entries', async () => {
      const client = createClient([
        createState('abc123', 10, 20, 1000),
        createState(null, 30, 40, 1001),
        createState('def456', 50, 60, 1002),
      ]);
      const service = createService(client);

      const states = await service.getStatesDict();

      expect(Array.from(states.keys())).toEqual(['abc123', 'def456']);
    });
  });
});

describe('joinFlightConnections', () => {
  const statesDict = new Map<string, StateVector>([
    ['abc123', createState('abc123', 10, 20, 1000)],
    ['def456', createState('def456', 30, 40, 1100)],
  ]);

  it('keeps the last connection for a repeated aircraft in first-seen order', () => {
    const data = joinFlightConnections(statesDict, [
      createFlight({ icao24: 'def456', estDepartureAirport: 'EGLL', estArrivalAirport: 'EDDF' }),
      createFlight({ icao24: 'abc123', estDepartureAirport: 'LEMD', estArrivalAirport: 'EDDF' }),
      createFlight({ icao24: 'def456', estDepartureAirport: 'EHAM', estArrivalAirport: 'EDDF' }),
    ]);

    expect(data.map((record) => [record.icao24, record.from])).toEqual([
      ['def456', 'EHAM'],
      ['abc123', 'LEMD'],
    ]);
  });

  it('skips connections without an identifier', () => {
    const data = joinFlightConnections(statesDict, [
      createFlight({ icao24: null, estDepartureAirport: 'EDDF' }),
    ]);

    expect(data).toEqual([]);
  });

  it('falls back to the unknown airport label for empty codes', () => {
    const [record] = joinFlightConnections(statesDict, [
      createFlight({ icao24: 'abc123', estDepartureAirport: '', estArrivalAirport: null }),
    ]);

    expect(record.from).toBe(UNKNOWN_AIRPORT);
    expect(record.to).toBe(UNKNOWN_AIRPORT);
  });
});

describe('toAirTrafficData', () => {
  it('returns a record without position when no state is known', () => {
    const record = toAirTrafficData(
      undefined,
      createFlight({ icao24: 'abc123', estDepartureAirport: 'EDDF', estArrivalAirport: 'KJFK' }),
    );

    expect(record).toEqual({
      icao24: 'abc123', lat: null, lng: null, from: 'EDDF', to: 'KJFK', last_contact: null,
    });
  });
});
