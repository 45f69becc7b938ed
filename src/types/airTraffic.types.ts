/**
 * Reduced per-flight record published for an airport topic
 */
export interface AirTrafficData {
  icao24: string | null;
  lat: number | null;
  lng: number | null;
  from: string;
  to: string;
  last_contact: number | null;
}

export type TrafficDirection = 'arrivals' | 'departures';

export interface DeliveryContext {
  topic: string;
  requestedAt: Date;
}

export interface Message {
  body: string;
  contentType: string;
}

export type TrafficHandler = (airport: string, context?: DeliveryContext) => Promise<Message>;
