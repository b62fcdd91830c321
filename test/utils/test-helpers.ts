import { ConfigService } from '@nestjs/config';
import { SensorMap } from '../../src/powerocean/interfaces/endpoint.interface';
import { TEST_ENV } from './mock-data';

/**
 * ConfigService preloaded with TEST_ENV plus overrides
 */
export function createConfigService(
  overrides: Record<string, unknown> = {},
): ConfigService {
  return new ConfigService({ ...TEST_ENV, ...overrides });
}

/**
 * Sorted ids of a sensor map, for set comparisons
 */
export function sensorIds(sensors: SensorMap): string[] {
  return [...sensors.keys()].sort();
}

/**
 * Look up a sensor by id and fail loudly when it is missing
 */
export function sensorValue(sensors: SensorMap, id: string): unknown {
  const sensor = sensors.get(id);
  if (!sensor) {
    throw new Error(`Sensor ${id} not found`);
  }
  return sensor.value;
}

/**
 * Build a fetch Response carrying a JSON body
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
