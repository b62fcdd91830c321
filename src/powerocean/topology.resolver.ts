import {
  InverterReport,
  JsonObject,
  isJsonObject,
} from './interfaces/report.interface';

/**
 * Installation layout derived from one response.
 *
 * `parallelCount` is the number of serials found under `data.parallel`
 * (0 for a single-inverter installation).
 */
export type InstallationTopology =
  | { kind: 'single'; parallelCount: 0; inverter: InverterReport }
  | {
      kind: 'dual';
      parallelCount: 2;
      /** False when no parallel key equals the configured serial. */
      masterMatched: boolean;
      master: InverterReport;
      slave: InverterReport;
    };

export interface UnsupportedTopology {
  kind: 'unsupported';
  parallelCount: number;
  reason: string;
}

export type TopologyResolution = InstallationTopology | UnsupportedTopology;

/**
 * Decide between a single and a dual (master/slave) installation.
 *
 * A response without `parallel` is a single inverter whose reports live in
 * `data.quota`. With `parallel`, each key is an inverter serial mapping to
 * its own quota-shaped tree; the master is the key matching `ownSerial`.
 * When neither key matches, the second key in document order is the
 * master and `masterMatched` is false.
 *
 * @param data - the `data` object of the device detail response
 * @param ownSerial - serial this instance is configured for
 */
export function resolveTopology(
  data: JsonObject,
  ownSerial: string,
): TopologyResolution {
  if (!Object.hasOwn(data, 'parallel')) {
    const quota = data.quota;
    return {
      kind: 'single',
      parallelCount: 0,
      inverter: {
        serial: ownSerial,
        suffix: '',
        report: isJsonObject(quota) ? quota : {},
      },
    };
  }

  const parallel = data.parallel;
  if (!isJsonObject(parallel)) {
    return unsupported(0, 'parallel section is not an object');
  }

  const serials = Object.keys(parallel);
  if (serials.length !== 2) {
    return unsupported(
      serials.length,
      `expected 2 inverters in parallel section, found ${serials.length}`,
    );
  }

  // Without a matching key the second serial is taken as master.
  const [firstSerial, secondSerial] = serials;
  const masterMatched = serials.includes(ownSerial);
  const masterSerial = firstSerial === ownSerial ? firstSerial : secondSerial;
  const slaveSerial = masterSerial === firstSerial ? secondSerial : firstSerial;

  const masterReport = parallel[masterSerial];
  const slaveReport = parallel[slaveSerial];
  if (!isJsonObject(masterReport) || !isJsonObject(slaveReport)) {
    return unsupported(serials.length, 'inverter report is not an object');
  }

  return {
    kind: 'dual',
    parallelCount: 2,
    masterMatched,
    master: { serial: masterSerial, suffix: '_master', report: masterReport },
    slave: { serial: slaveSerial, suffix: '_slave', report: slaveReport },
  };
}

/**
 * Inverters of a resolved topology in extraction order (master first).
 */
export function inverterReports(
  topology: InstallationTopology,
): InverterReport[] {
  return topology.kind === 'single'
    ? [topology.inverter]
    : [topology.master, topology.slave];
}

function unsupported(
  parallelCount: number,
  reason: string,
): UnsupportedTopology {
  return { kind: 'unsupported', parallelCount, reason };
}
