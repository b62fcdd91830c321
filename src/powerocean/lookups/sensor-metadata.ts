import { SensorUnit } from '../interfaces/endpoint.interface';

/**
 * Suffix rules, checked in order. Matching is case-sensitive: the vendor
 * spells the same quantity both ways (`pwr` on PV strings, `Pwr` elsewhere).
 */
const UNIT_SUFFIXES: ReadonlyArray<[readonly string[], SensorUnit]> = [
  [['pwr', 'Pwr', 'Power'], 'W'],
  [['amp', 'Amp'], 'A'],
  [['soc', 'Soc', 'soh', 'Soh'], '%'],
  [['vol', 'Vol'], 'V'],
  [['Watth', 'Energy'], 'Wh'],
];

/**
 * German labels for the keys shown on the dashboard.
 */
const DESCRIPTIONS: Readonly<Record<string, string>> = {
  sysLoadPwr: 'Hausnetz',
  sysGridPwr: 'Stromnetz',
  mpptPwr: 'Solarertrag',
  bpPwr: 'Batterieleistung',
  bpSoc: 'Ladezustand der Batterie',
  bpSoh: 'Gesundheitszustand der Batterie',
  online: 'Online',
  systemName: 'System Name',
  createTime: 'Installations Datum',
  bpVol: 'Batteriespannung',
  bpAmp: 'Batteriestrom',
  bpCycles: 'Ladezyklen',
  bpTemp: 'Temperatur der Batteriezellen',
  bpRemainWatth: 'Restenergie der Batterie',
};

/**
 * Infer the unit of a vendor key from its name.
 *
 * @example
 * getUnit('sysLoadPwr');                 // 'W'
 * getUnit('totalElectricityGeneration'); // 'kWh'
 * getUnit('systemName');                 // null
 */
export function getUnit(key: string): SensorUnit | null {
  for (const [suffixes, unit] of UNIT_SUFFIXES) {
    if (suffixes.some((suffix) => key.endsWith(suffix))) {
      return unit;
    }
  }
  if (key.includes('Generation')) {
    return 'kWh';
  }
  if (key.startsWith('bpTemp')) {
    return '°C';
  }
  return null;
}

/**
 * Human-readable label for a vendor key, falling back to the key itself.
 */
export function getDescription(key: string): string {
  return Object.hasOwn(DESCRIPTIONS, key) ? DESCRIPTIONS[key] : key;
}
