import { Injectable, Logger } from '@nestjs/common';
import { createEndpoint } from '../endpoint.factory';
import { SensorMap } from '../interfaces/endpoint.interface';
import { IReportExtractor } from '../interfaces/extractor.interface';
import {
  BP_STA_REPORT,
  InverterReport,
  JsonObject,
  ReportExtractionError,
  getSection,
  isJsonObject,
  isSensorValue,
} from '../interfaces/report.interface';
import { isBatteryPackKey } from '../lookups/key-patterns';

export const BATTERY_PACK_KEYS: readonly string[] = [
  'bpPwr',
  'bpSoc',
  'bpSoh',
  'bpVol',
  'bpAmp',
  'bpCycles',
  'bpSysState',
  'bpRemainWatth',
];

const TEMPERATURE_KEY = 'bpTemp';

/**
 * Battery-Pack Extractor (`JTS1_BP_STA_REPORT`)
 *
 * The section mixes short control keys with one entry per battery pack,
 * keyed by the pack serial. Each pack entry is itself a JSON document
 * encoded as a string. Packs are numbered `bpack1_`, `bpack2_`, ... in the
 * order they appear.
 *
 * Besides the allow-listed fields, one derived sensor per pack holds the
 * mean of its cell temperatures.
 */
@Injectable()
export class BatteryPackExtractor implements IReportExtractor {
  private readonly logger = new Logger(BatteryPackExtractor.name);

  readonly reportName = BP_STA_REPORT;

  extract(inverter: InverterReport): SensorMap {
    const sensors: SensorMap = new Map();
    const section = getSection(inverter.report, this.reportName);
    if (!section) {
      this.logger.debug(`${this.reportName} missing for ${inverter.serial}`);
      return sensors;
    }

    const packKeys = Object.keys(section).filter(isBatteryPackKey);

    packKeys.forEach((packKey, index) => {
      try {
        const pack = this.decodePack(packKey, section[packKey]);
        this.extractPack(inverter, packKey, index + 1, pack, sensors);
      } catch (error) {
        if (!(error instanceof ReportExtractionError)) {
          throw error;
        }
        this.logger.warn(`Skipping battery pack: ${error.message}`);
      }
    });

    this.logger.debug(
      `${this.reportName}: ${packKeys.length} pack(s), ${sensors.size} sensor(s) for ${inverter.serial}`,
    );
    return sensors;
  }

  /**
   * Decode the embedded pack document.
   *
   * @throws ReportExtractionError if the payload is not a JSON object
   */
  private decodePack(packKey: string, raw: unknown): JsonObject {
    if (isJsonObject(raw)) {
      return raw;
    }
    if (typeof raw !== 'string') {
      throw new ReportExtractionError(
        this.reportName,
        `pack ${packKey} payload is neither a string nor an object`,
      );
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      throw new ReportExtractionError(
        this.reportName,
        `pack ${packKey} payload is not valid JSON`,
        error instanceof Error ? error : undefined,
      );
    }

    if (!isJsonObject(decoded)) {
      throw new ReportExtractionError(
        this.reportName,
        `pack ${packKey} payload is not a JSON object`,
      );
    }
    return decoded;
  }

  private extractPack(
    { serial, suffix }: InverterReport,
    packKey: string,
    packNumber: number,
    pack: JsonObject,
    sensors: SensorMap,
  ): void {
    const prefix = `bpack${packNumber}_`;

    for (const [key, value] of Object.entries(pack)) {
      if (!BATTERY_PACK_KEYS.includes(key) || !isSensorValue(value)) {
        continue;
      }

      const id = `${serial}_${this.reportName}_${packKey}_${key}`;
      sensors.set(
        id,
        createEndpoint({
          id,
          serial,
          name: `${serial}_${prefix}${key}`,
          friendlyName: `${prefix}${key}${suffix}`,
          value,
          key,
          descriptionPrefix: prefix,
          icon: key === 'bpAmp' ? 'mdi:current-dc' : null,
        }),
      );
    }

    const meanTemperature = averageCellTemperature(pack[TEMPERATURE_KEY]);
    if (meanTemperature === null) {
      this.logger.debug(`No cell temperatures for pack ${packKey}`);
      return;
    }

    const id = `${serial}_${this.reportName}_${packKey}_${TEMPERATURE_KEY}`;
    sensors.set(
      id,
      createEndpoint({
        id,
        serial,
        name: `${serial}_${prefix}${TEMPERATURE_KEY}`,
        friendlyName: `${prefix}${TEMPERATURE_KEY}${suffix}`,
        value: meanTemperature,
        key: TEMPERATURE_KEY,
        descriptionPrefix: prefix,
      }),
    );
  }
}

/**
 * Arithmetic mean of a pack's cell temperatures.
 *
 * @returns null when the value is not a non-empty array of numbers
 */
export function averageCellTemperature(raw: unknown): number | null {
  if (!Array.isArray(raw) || raw.length === 0) {
    return null;
  }
  const temperatures = raw.filter(
    (value): value is number =>
      typeof value === 'number' && Number.isFinite(value),
  );
  if (temperatures.length !== raw.length) {
    return null;
  }
  return temperatures.reduce((sum, value) => sum + value, 0) / temperatures.length;
}
