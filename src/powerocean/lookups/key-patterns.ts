/**
 * Predicates for vendor keys whose membership is decided by shape rather
 * than by a fixed list.
 */

const FAULT_CODE_KEY = /^mppt.*Code$/;

/**
 * Battery-pack serials are long vendor identifiers; the control keys that
 * share `JTS1_BP_STA_REPORT` with them are all shorter.
 */
const BATTERY_PACK_KEY_MIN_LENGTH = 13;

/**
 * Per-string MPPT warning/fault codes in `JTS1_EMS_CHANGE_REPORT`, e.g.
 * `mpptPv1WarningCode`. The vendor emits a variable number of them.
 */
export function isFaultCodeKey(key: string): boolean {
  return FAULT_CODE_KEY.test(key);
}

/**
 * Battery-pack entries in `JTS1_BP_STA_REPORT`.
 *
 * NOTE: length-based heuristic. It breaks if the vendor ever adds a control
 * key longer than 12 characters or ships shorter pack serials.
 */
export function isBatteryPackKey(key: string): boolean {
  return key.length >= BATTERY_PACK_KEY_MIN_LENGTH;
}
