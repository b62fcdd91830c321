import { SensorMap } from './endpoint.interface';
import { InverterReport, ReportName } from './report.interface';

/**
 * IReportExtractor - Strategy for one report section
 *
 * Each implementation turns one named section of an inverter report into
 * flat sensors. Extractors run once per inverter (twice on dual-inverter
 * installations) and must not keep state between calls.
 *
 * An absent section yields an empty map; it never aborts the whole pass.
 */
export interface IReportExtractor {
  /** Section of the inverter report this extractor reads. */
  readonly reportName: ReportName;

  extract(inverter: InverterReport): SensorMap;
}
