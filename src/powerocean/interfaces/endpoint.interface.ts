/**
 * Scalar value carried by a sensor. Nested vendor structures are never
 * exposed as a value; extractors flatten or skip them.
 */
export type SensorValue = number | string | boolean;

/**
 * Units the unit lookup can infer from a vendor key.
 */
export type SensorUnit = 'W' | 'A' | '%' | 'V' | 'Wh' | 'kWh' | '°C';

/**
 * PowerOceanEndpoint - one flattened measurement
 *
 * The home-automation side creates or updates one entity per endpoint,
 * keyed by `internalUniqueId`, and reads unit/description/icon as
 * display metadata.
 */
export interface PowerOceanEndpoint {
  /**
   * Unique within one fetch result and stable across fetches for the same
   * physical quantity, so a series can be correlated over time.
   */
  readonly internalUniqueId: string;

  /** Serial of the inverter the measurement belongs to. */
  readonly serial: string;

  /** Machine identifier combining serial and field path. */
  readonly name: string;

  /**
   * Human-facing identifier. Carries a `_master`/`_slave` suffix on
   * dual-inverter installations.
   */
  readonly friendlyName: string;

  readonly value: SensorValue;
  readonly unit: SensorUnit | null;

  /** German label for known keys, the raw key otherwise. */
  readonly description: string;

  /** Material Design icon hint, e.g. 'mdi:solar-power'. */
  readonly icon: string | null;
}

/**
 * Flat sensor table keyed by `internalUniqueId`.
 *
 * A later insertion under an existing id replaces the earlier record.
 */
export type SensorMap = Map<string, PowerOceanEndpoint>;

/**
 * Friendly-name suffix for the inverter a report belongs to.
 */
export type InverterSuffix = '' | '_master' | '_slave';
