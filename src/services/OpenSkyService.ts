import axios from 'axios';
import { z } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import httpClient from '../utils/httpClient';
import { getErrorMessage } from '../utils/errors';
import { mapStateArrayToVector } from '../utils/stateVector';
import { flightsResponseSchema, statesResponseSchema } from '../schemas/opensky.schemas';
import type {
  FlightData, GetStatesOptions, OpenSkyClient, OpenSkyStates,
} from '../types/opensky.types';
import type { OpenSkyAuth } from './openSkyCredentials';
import { OpenSkyError } from './OpenSkyError';
import { OpenSkyTokenManager } from './OpenSkyTokenManager';
import { RateLimitManager } from './RateLimitManager';

export interface OpenSkyServiceOptions {
  auth: OpenSkyAuth;
  baseUrl?: string;
  timeoutMs?: number;
  rateLimitManager?: RateLimitManager;
}

type QueryParams = Record<string, string | number | string[] | undefined>;

const MAX_FLIGHT_INTERVAL_SECONDS = 7 * 24 * 60 * 60;

/**
 * Client for the OpenSky Network REST API.
 * Requests are not retried; callers decide what a failure means.
 */
export class OpenSkyService implements OpenSkyClient {
  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly auth: OpenSkyAuth;

  private readonly tokenManager: OpenSkyTokenManager | null;

  private readonly rateLimitManager: RateLimitManager;

  constructor(options: OpenSkyServiceOptions) {
    this.auth = options.auth;
    this.baseUrl = options.baseUrl ?? config.external.opensky.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.external.opensky.timeoutMs;
    this.rateLimitManager = options.rateLimitManager ?? new RateLimitManager();
    this.tokenManager = this.auth.kind === 'oauth2' ? new OpenSkyTokenManager(this.auth) : null;
  }

  /**
   * Current state vectors, optionally narrowed by time, transponder or bounding box.
   * Resolves to null when the API answers with an empty body.
   */
  async getStates(options: GetStatesOptions = {}): Promise<OpenSkyStates | null> {
    const { time, icao24, bbox } = options;
    const params: QueryParams = {
      extended: 1,
      time,
      icao24: Array.isArray(icao24)
        ? icao24.map((address) => address.toLowerCase())
        : icao24?.toLowerCase(),
      ...(bbox && {
        lamin: bbox.lamin,
        lomin: bbox.lomin,
        lamax: bbox.lamax,
        lomax: bbox.lomax,
      }),
    };

    const data = await this.request('/states/all', params, statesResponseSchema);
    if (!data) {
      return null;
    }

    return {
      time: data.time,
      states: (data.states ?? []).map(mapStateArrayToVector),
    };
  }

  async getArrivalsByAirport(airport: string, begin: number, end: number): Promise<FlightData[]> {
    return this.getFlightsByAirport('/flights/arrival', airport, begin, end);
  }

  async getDeparturesByAirport(airport: string, begin: number, end: number): Promise<FlightData[]> {
    return this.getFlightsByAirport('/flights/departure', airport, begin, end);
  }

  private async getFlightsByAirport(
    path: string,
    airport: string,
    begin: number,
    end: number,
  ): Promise<FlightData[]> {
    if (begin >= end) {
      throw new OpenSkyError('The end parameter must be greater than begin');
    }
    if (end - begin > MAX_FLIGHT_INTERVAL_SECONDS) {
      throw new OpenSkyError('The time interval must be smaller than 7 days');
    }

    const flights = await this.request(path, { airport, begin, end }, flightsResponseSchema, {
      notFoundAsEmpty: true,
    });
    return flights ?? [];
  }

  private async getAuthHeader(): Promise<Record<string, string>> {
    switch (this.auth.kind) {
      case 'oauth2': {
        const token = this.tokenManager ? await this.getAccessToken(this.tokenManager) : null;
        return token ? { Authorization: `Bearer ${token}` } : {};
      }
      case 'basic': {
        const encoded = Buffer.from(`${this.auth.username}:${this.auth.password}`).toString('base64');
        return { Authorization: `Basic ${encoded}` };
      }
      default:
        return {};
    }
  }

  // Token endpoint failures must not reach the API status handling below.
  private async getAccessToken(tokenManager: OpenSkyTokenManager): Promise<string> {
    try {
      return await tokenManager.getAccessToken();
    } catch (error) {
      throw new OpenSkyError(`OpenSky token request failed: ${getErrorMessage(error)}`, {
        statusCode: axios.isAxiosError(error) ? error.response?.status ?? null : null,
      });
    }
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    params: QueryParams,
    schema: S,
    { notFoundAsEmpty = false }: { notFoundAsEmpty?: boolean } = {},
  ): Promise<z.infer<S> | null> {
    if (this.rateLimitManager.isRateLimited()) {
      const secondsRemaining = this.rateLimitManager.getSecondsUntilRetry();
      throw new OpenSkyError(`OpenSky API rate limited. Retry in ${secondsRemaining} seconds.`, {
        rateLimited: true,
        retryAfter: secondsRemaining,
      });
    }

    const headers = await this.getAuthHeader();

    let body: unknown;
    try {
      const response = await httpClient.get<unknown>(`${this.baseUrl}${path}`, {
        params,
        paramsSerializer: { indexes: null },
        headers,
        timeout: this.timeoutMs,
      });
      this.rateLimitManager.recordSuccess();
      body = response.data;
    } catch (error) {
      if (notFoundAsEmpty && axios.isAxiosError(error) && error.response?.status === 404) {
        logger.debug('OpenSky returned no flights (404)', { path, params });
        return null;
      }
      throw this.toOpenSkyError(error, path);
    }

    if (body === null || body === undefined || body === '') {
      return null;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new OpenSkyError(`Unexpected OpenSky response from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private toOpenSkyError(error: unknown, path: string): OpenSkyError {
    if (error instanceof OpenSkyError) {
      return error;
    }

    if (!axios.isAxiosError(error)) {
      return new OpenSkyError(`OpenSky request to ${path} failed: ${getErrorMessage(error)}`);
    }

    const status = error.response?.status ?? null;

    if (status === 429) {
      const rawRetryAfter = error.response?.headers['x-rate-limit-retry-after-seconds'];
      const parsedRetryAfter = rawRetryAfter === undefined || rawRetryAfter === null
        ? Number.NaN
        : parseInt(String(rawRetryAfter), 10);
      const retryAfter = this.rateLimitManager.recordRateLimit(
        Number.isNaN(parsedRetryAfter) ? null : parsedRetryAfter,
      );
      return new OpenSkyError('OpenSky API rate limited', {
        statusCode: status,
        rateLimited: true,
        retryAfter,
      });
    }

    if (status === 401 || status === 403) {
      this.tokenManager?.invalidate();
    }

    return new OpenSkyError(`OpenSky request to ${path} failed: ${error.message}`, {
      statusCode: status,
    });
  }
}

export default OpenSkyService;
