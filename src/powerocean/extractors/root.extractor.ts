import { Injectable, Logger } from '@nestjs/common';
import { createEndpoint } from '../endpoint.factory';
import { SensorMap } from '../interfaces/endpoint.interface';
import { JsonObject, isSensorValue } from '../interfaces/report.interface';

/**
 * System-wide values at the root of `data`. `bpSoc` is deliberately not
 * here: the change report carries it per inverter.
 */
export const ROOT_KEYS: readonly string[] = [
  'sysLoadPwr',
  'sysGridPwr',
  'mpptPwr',
  'bpPwr',
  'online',
  'todayElectricityGeneration',
  'monthElectricityGeneration',
  'yearElectricityGeneration',
  'totalElectricityGeneration',
  'systemName',
  'createTime',
];

const ICONS: Readonly<Record<string, string>> = {
  mpptPwr: 'mdi:solar-power',
};

/**
 * Root Extractor
 *
 * Pulls the top-level telemetry scalars straight from the response `data`.
 * Runs once per fetch regardless of topology and names its sensors after
 * the configured serial.
 */
@Injectable()
export class RootExtractor {
  private readonly logger = new Logger(RootExtractor.name);

  extract(data: JsonObject, serial: string): SensorMap {
    const sensors: SensorMap = new Map();

    for (const [key, value] of Object.entries(data)) {
      if (!ROOT_KEYS.includes(key)) {
        continue;
      }
      if (!isSensorValue(value)) {
        this.logger.debug(`Skipping non-scalar root value: ${key}`);
        continue;
      }

      const id = `${serial}_${key}`;
      sensors.set(
        id,
        createEndpoint({
          id,
          serial,
          name: id,
          friendlyName: key,
          value,
          key,
          icon: ICONS[key] ?? null,
        }),
      );
    }

    return sensors;
  }
}
