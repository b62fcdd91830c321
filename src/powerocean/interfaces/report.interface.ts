import { InverterSuffix, SensorValue } from './endpoint.interface';

/**
 * Parsed JSON, as handed over by the transport layer.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Report sections found under `data.quota` (or under each serial in
 * `data.parallel`).
 */
export const EMS_CHANGE_REPORT = 'JTS1_EMS_CHANGE_REPORT';
export const BP_STA_REPORT = 'JTS1_BP_STA_REPORT';
export const EMS_HEARTBEAT = 'JTS1_EMS_HEARTBEAT';

export type ReportName =
  | typeof EMS_CHANGE_REPORT
  | typeof BP_STA_REPORT
  | typeof EMS_HEARTBEAT;

/**
 * One inverter's report tree together with the identity used to name its
 * sensors.
 */
export interface InverterReport {
  serial: string;
  suffix: InverterSuffix;
  report: JsonObject;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSensorValue(value: unknown): value is SensorValue {
  return (
    (typeof value === 'number' && Number.isFinite(value)) ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

/**
 * Look up a named section of an inverter report.
 *
 * @returns the section, or null when it is absent or not an object
 */
export function getSection(
  report: JsonObject,
  name: ReportName,
): JsonObject | null {
  const section = report[name];
  return isJsonObject(section) ? section : null;
}

/**
 * Raised when a report carries a shape that cannot be decoded at all,
 * e.g. an embedded battery-pack payload that is not valid JSON.
 */
export class ReportExtractionError extends Error {
  constructor(
    public readonly reportName: ReportName,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${reportName}] ${message}`);
    this.name = 'ReportExtractionError';
  }
}
