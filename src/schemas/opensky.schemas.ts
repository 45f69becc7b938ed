import { z } from 'zod';

const nullableNumber = z.number().nullable().default(null);
const nullableString = z.string().nullable().default(null);

/**
 * /states/all body. States are positional arrays; see utils/stateVector for the layout.
 */
export const statesResponseSchema = z.object({
  time: z.number(),
  states: z.array(z.array(z.unknown())).nullable().default(null),
});

export const flightDataSchema = z.object({
  icao24: nullableString,
  firstSeen: nullableNumber,
  estDepartureAirport: nullableString,
  lastSeen: nullableNumber,
  estArrivalAirport: nullableString,
  callsign: nullableString,
  estDepartureAirportHorizDistance: nullableNumber,
  estDepartureAirportVertDistance: nullableNumber,
  estArrivalAirportHorizDistance: nullableNumber,
  estArrivalAirportVertDistance: nullableNumber,
  departureAirportCandidatesCount: nullableNumber,
  arrivalAirportCandidatesCount: nullableNumber,
});

export const flightsResponseSchema = z.array(flightDataSchema);

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(300),
  token_type: z.string().optional(),
});

export const trafficParamsSchema = z.object({
  direction: z.enum(['arrivals', 'departures']),
  airport: z.string().trim().min(3).max(4)
    .transform((value) => value.toUpperCase()),
});

export type StatesResponse = z.infer<typeof statesResponseSchema>;
export type FlightData = z.infer<typeof flightDataSchema>;
export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type TrafficParams = z.infer<typeof trafficParamsSchema>;
