import type { TrafficDirection } from '../types/airTraffic.types';

const TOPIC_PATTERN = /^(arrivals|departures)\.([A-Za-z0-9]{3,4})$/;

export interface TrafficTopic {
  direction: TrafficDirection;
  airport: string;
}

export const buildTopic = (direction: TrafficDirection, airport: string): string => (
  `${direction}.${airport.toUpperCase()}`
);

/**
 * `arrivals.EDDF` -> { direction: 'arrivals', airport: 'EDDF' }
 */
export function parseTopic(topic: string): TrafficTopic | null {
  const match = TOPIC_PATTERN.exec(topic.trim());
  if (!match) {
    return null;
  }
  const direction: TrafficDirection = match[1] === 'arrivals' ? 'arrivals' : 'departures';
  return { direction, airport: match[2].toUpperCase() };
}

export const topicsForAirports = (airports: string[]): string[] => airports.flatMap((airport) => [
  buildTopic('arrivals', airport),
  buildTopic('departures', airport),
]);
