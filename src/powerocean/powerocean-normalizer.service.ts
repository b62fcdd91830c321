import { Injectable, Logger } from '@nestjs/common';
import { mergeSensors } from './endpoint.factory';
import { BatteryPackExtractor } from './extractors/battery-pack.extractor';
import { ChangeReportExtractor } from './extractors/change-report.extractor';
import { HeartbeatExtractor } from './extractors/heartbeat.extractor';
import { RootExtractor } from './extractors/root.extractor';
import { SensorMap } from './interfaces/endpoint.interface';
import { IReportExtractor } from './interfaces/extractor.interface';
import { isJsonObject } from './interfaces/report.interface';
import { inverterReports, resolveTopology } from './topology.resolver';

/**
 * PowerOceanNormalizer - flattens one device detail response
 *
 * Pipeline:
 * 1. Resolve the topology (single, or dual master/slave)
 * 2. Extract root telemetry once
 * 3. Run every report extractor per inverter, master first
 * 4. Merge into one map keyed by internalUniqueId (last writer wins)
 *
 * All working state is local to one `normalize()` call, so overlapping
 * fetches never see each other's topology.
 */
@Injectable()
export class PowerOceanNormalizer {
  private readonly logger = new Logger(PowerOceanNormalizer.name);
  private readonly extractors: IReportExtractor[];

  constructor(
    private readonly rootExtractor: RootExtractor,
    changeReportExtractor: ChangeReportExtractor,
    batteryPackExtractor: BatteryPackExtractor,
    heartbeatExtractor: HeartbeatExtractor,
  ) {
    this.extractors = [
      changeReportExtractor,
      batteryPackExtractor,
      heartbeatExtractor,
    ];
  }

  /**
   * @param response - parsed device detail response (`{ data: {...} }`)
   * @param ownSerial - serial this instance is configured for
   * @returns the sensor map, or null when no sensors can be produced this
   *   cycle (the caller keeps its previous sensors)
   */
  normalize(response: unknown, ownSerial: string): SensorMap | null {
    const data = isJsonObject(response) ? response.data : undefined;
    if (!isJsonObject(data)) {
      this.logger.warn('Response has no data object, skipping this cycle');
      return null;
    }

    const topology = resolveTopology(data, ownSerial);
    if (topology.kind === 'unsupported') {
      this.logger.warn(
        `Neither single nor dual inverter system (${topology.reason}), skipping this cycle`,
      );
      return null;
    }

    if (topology.kind === 'dual' && !topology.masterMatched) {
      this.logger.warn(
        `Configured serial ${ownSerial} not found in parallel section, assuming master ${topology.master.serial}, slave ${topology.slave.serial}`,
      );
    } else if (topology.kind === 'dual') {
      this.logger.debug(
        `Dual inverter system: master ${topology.master.serial}, slave ${topology.slave.serial}`,
      );
    } else {
      this.logger.debug('Single inverter system');
    }

    const sensors: SensorMap = this.rootExtractor.extract(data, ownSerial);

    for (const inverter of inverterReports(topology)) {
      for (const extractor of this.extractors) {
        mergeSensors(sensors, extractor.extract(inverter));
      }
    }

    this.logger.debug(`Normalized ${sensors.size} sensor(s)`);
    return sensors;
  }
}
