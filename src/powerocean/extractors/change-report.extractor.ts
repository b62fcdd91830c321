import { Injectable, Logger } from '@nestjs/common';
import { createEndpoint } from '../endpoint.factory';
import { SensorMap } from '../interfaces/endpoint.interface';
import { IReportExtractor } from '../interfaces/extractor.interface';
import {
  EMS_CHANGE_REPORT,
  InverterReport,
  getSection,
  isSensorValue,
} from '../interfaces/report.interface';
import { isFaultCodeKey } from '../lookups/key-patterns';

export const CHANGE_REPORT_KEYS: readonly string[] = [
  'bpTotalChgEnergy',
  'bpTotalDsgEnergy',
  'bpSoc',
  'bpOnlineSum', // number of battery packs
  'emsCtrlLedBright',
  'emsWordMode', // export / normal operation
];

/**
 * Change-Report Extractor (`JTS1_EMS_CHANGE_REPORT`)
 *
 * Battery totals, charge state, operating mode and the MPPT warning/fault
 * codes of one inverter.
 */
@Injectable()
export class ChangeReportExtractor implements IReportExtractor {
  private readonly logger = new Logger(ChangeReportExtractor.name);

  readonly reportName = EMS_CHANGE_REPORT;

  extract({ serial, suffix, report }: InverterReport): SensorMap {
    const sensors: SensorMap = new Map();
    const section = getSection(report, this.reportName);
    if (!section) {
      this.logger.debug(`${this.reportName} missing for ${serial}`);
      return sensors;
    }

    for (const [key, value] of Object.entries(section)) {
      if (!CHANGE_REPORT_KEYS.includes(key) && !isFaultCodeKey(key)) {
        continue;
      }
      if (!isSensorValue(value)) {
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

    this.logger.debug(
      `${this.reportName}: ${sensors.size} sensor(s) for ${serial}`,
    );
    return sensors;
  }
}
