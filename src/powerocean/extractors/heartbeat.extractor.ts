import { Injectable, Logger } from '@nestjs/common';
import { createEndpoint } from '../endpoint.factory';
import { SensorMap } from '../interfaces/endpoint.interface';
import { IReportExtractor } from '../interfaces/extractor.interface';
import {
  EMS_HEARTBEAT,
  InverterReport,
  JsonObject,
  JsonValue,
  getSection,
  isJsonObject,
  isSensorValue,
} from '../interfaces/report.interface';

export const HEARTBEAT_KEYS: readonly string[] = [
  'bpRemainWatth',
  'emsBpAliveNum',
  'emsBpPower',
  'pcsActPwr',
  'pcsMeterPower',
];

export const PHASES: readonly string[] = ['pcsAPhase', 'pcsBPhase', 'pcsCPhase'];

const PV_TOTAL_NAME = 'mpptPv_pwrTotal';
const SOLAR_ICON = 'mdi:solar-power';
const CURRENT_ICON = 'mdi:current-dc';

/**
 * Heartbeat Extractor (`JTS1_EMS_HEARTBEAT`)
 *
 * Emits:
 * - a handful of EMS/PCS scalars
 * - every field of the three PCS phase objects, as `{phase}_{field}`
 * - every field of each PV string in `mpptHeartBeat[0].mpptPv`, as
 *   `mpptPv{i}_{field}`
 * - `mpptPv_pwrTotal`, the summed `pwr` of all PV strings
 */
@Injectable()
export class HeartbeatExtractor implements IReportExtractor {
  private readonly logger = new Logger(HeartbeatExtractor.name);

  readonly reportName = EMS_HEARTBEAT;

  extract(inverter: InverterReport): SensorMap {
    const sensors: SensorMap = new Map();
    const section = getSection(inverter.report, this.reportName);
    if (!section) {
      this.logger.debug(`${this.reportName} missing for ${inverter.serial}`);
      return sensors;
    }

    this.extractScalars(inverter, section, sensors);
    this.extractPhases(inverter, section, sensors);
    this.extractPvStrings(inverter, section, sensors);

    this.logger.debug(
      `${this.reportName}: ${sensors.size} sensor(s) for ${inverter.serial}`,
    );
    return sensors;
  }

  private extractScalars(
    { serial, suffix }: InverterReport,
    section: JsonObject,
    sensors: SensorMap,
  ): void {
    for (const [key, value] of Object.entries(section)) {
      if (!HEARTBEAT_KEYS.includes(key) || !isSensorValue(value)) {
        continue;
      }
      const id = `${serial}_${this.reportName}_${key}`;
      sensors.set(
        id,
        createEndpoint({
          id,
          serial,
          name: `${serial}_${key}`,
          friendlyName: `${key}${suffix}`,
          value,
          key,
        }),
      );
    }
  }

  private extractPhases(
    { serial, suffix }: InverterReport,
    section: JsonObject,
    sensors: SensorMap,
  ): void {
    for (const phase of PHASES) {
      const phaseData = section[phase];
      if (!isJsonObject(phaseData)) {
        this.logger.debug(`${phase} missing for ${serial}`);
        continue;
      }

      for (const [key, value] of Object.entries(phaseData)) {
        if (!isSensorValue(value)) {
          continue;
        }
        const name = `${phase}_${key}`;
        const id = `${serial}_${this.reportName}_${name}`;
        sensors.set(
          id,
          createEndpoint({
            id,
            serial,
            name: `${serial}_${name}`,
            friendlyName: `${name}${suffix}`,
            value,
            key,
          }),
        );
      }
    }
  }

  private extractPvStrings(
    { serial, suffix }: InverterReport,
    section: JsonObject,
    sensors: SensorMap,
  ): void {
    const pvStrings = findPvStrings(section);
    if (pvStrings === null) {
      this.logger.debug(`mpptHeartBeat[0].mpptPv missing for ${serial}`);
      return;
    }

    let totalPower = 0;
    pvStrings.forEach((pvString, index) => {
      if (!isJsonObject(pvString)) {
        return;
      }
      const stringName = `mpptPv${index + 1}`;

      for (const [key, value] of Object.entries(pvString)) {
        if (!isSensorValue(value)) {
          continue;
        }
        const id = `${serial}_${this.reportName}_mpptHeartBeat_${stringName}_${key}`;
        sensors.set(
          id,
          createEndpoint({
            id,
            serial,
            name: `${serial}_${stringName}_${key}`,
            friendlyName: `${stringName}_${key}${suffix}`,
            value,
            key,
            icon: pvStringIcon(key),
          }),
        );

        if (key === 'pwr' && typeof value === 'number') {
          totalPower += value;
        }
      }
    });

    const id = `${serial}_${this.reportName}_mpptHeartBeat_${PV_TOTAL_NAME}`;
    sensors.set(
      id,
      createEndpoint({
        id,
        serial,
        name: `${serial}_${PV_TOTAL_NAME}`,
        friendlyName: `${PV_TOTAL_NAME}${suffix}`,
        value: totalPower,
        key: PV_TOTAL_NAME,
        unit: 'W',
        description: 'Solarertrag aller Strings',
        icon: SOLAR_ICON,
      }),
    );
  }
}

/**
 * The PV string array lives at `mpptHeartBeat[0].mpptPv`.
 */
function findPvStrings(section: JsonObject): JsonValue[] | null {
  const heartbeats = section.mpptHeartBeat;
  if (!Array.isArray(heartbeats) || heartbeats.length === 0) {
    return null;
  }
  const first = heartbeats[0];
  if (!isJsonObject(first) || !Array.isArray(first.mpptPv)) {
    return null;
  }
  return first.mpptPv;
}

function pvStringIcon(key: string): string | null {
  if (key.endsWith('pwr')) {
    return SOLAR_ICON;
  }
  if (key.endsWith('amp')) {
    return CURRENT_ICON;
  }
  return null;
}
