import { JsonObject } from './interfaces/report.interface';
import { inverterReports, resolveTopology } from './topology.resolver';
import {
  OWN_SERIAL,
  PEER_SERIAL,
  THIRD_SERIAL,
} from '../../test/utils/mock-data';

describe('resolveTopology', () => {
  const masterTree: JsonObject = { JTS1_EMS_CHANGE_REPORT: { bpSoc: 61 } };
  const slaveTree: JsonObject = { JTS1_EMS_CHANGE_REPORT: { bpSoc: 55 } };

  describe('single inverter', () => {
    it('should use data.quota when there is no parallel section', () => {
      const quota: JsonObject = { JTS1_EMS_HEARTBEAT: { pcsActPwr: 1 } };

      const result = resolveTopology({ quota }, OWN_SERIAL);

      expect(result).toEqual({
        kind: 'single',
        parallelCount: 0,
        inverter: { serial: OWN_SERIAL, suffix: '', report: quota },
      });
    });

    it('should fall back to an empty report when quota is missing', () => {
      const result = resolveTopology({ sysLoadPwr: 10 }, OWN_SERIAL);

      expect(result.kind).toBe('single');
      if (result.kind === 'single') {
        expect(result.inverter.report).toEqual({});
      }
    });
  });

  describe('dual inverter', () => {
    it('should assign the configured serial to master when listed first', () => {
      const result = resolveTopology(
        { parallel: { [OWN_SERIAL]: masterTree, [PEER_SERIAL]: slaveTree } },
        OWN_SERIAL,
      );

      expect(result).toEqual({
        kind: 'dual',
        parallelCount: 2,
        masterMatched: true,
        master: { serial: OWN_SERIAL, suffix: '_master', report: masterTree },
        slave: { serial: PEER_SERIAL, suffix: '_slave', report: slaveTree },
      });
    });

    it('should assign the configured serial to master when listed second', () => {
      const result = resolveTopology(
        { parallel: { [PEER_SERIAL]: slaveTree, [OWN_SERIAL]: masterTree } },
        OWN_SERIAL,
      );

      expect(result.kind).toBe('dual');
      if (result.kind === 'dual') {
        expect(result.master.serial).toBe(OWN_SERIAL);
        expect(result.master.report).toBe(masterTree);
        expect(result.slave.serial).toBe(PEER_SERIAL);
        expect(result.slave.report).toBe(slaveTree);
      }
    });

    it('should ignore data.quota when a parallel section exists', () => {
      const result = resolveTopology(
        {
          quota: { JTS1_EMS_CHANGE_REPORT: { bpSoc: 1 } },
          parallel: { [OWN_SERIAL]: masterTree, [PEER_SERIAL]: slaveTree },
        },
        OWN_SERIAL,
      );

      expect(result.kind).toBe('dual');
      if (result.kind === 'dual') {
        expect(result.master.report).toBe(masterTree);
      }
    });
  });

  describe('unsupported layouts', () => {
    it.each([
      ['no inverters', {}, 0],
      ['one inverter', { [OWN_SERIAL]: masterTree }, 1],
      [
        'three inverters',
        {
          [OWN_SERIAL]: masterTree,
          [PEER_SERIAL]: slaveTree,
          [THIRD_SERIAL]: slaveTree,
        },
        3,
      ],
    ])('should reject a parallel section with %s', (_label, parallel, count) => {
      const result = resolveTopology({ parallel }, OWN_SERIAL);

      expect(result.kind).toBe('unsupported');
      expect(result.parallelCount).toBe(count);
    });

    it('should take the second serial as master when the configured serial is absent', () => {
      const result = resolveTopology(
        { parallel: { [PEER_SERIAL]: slaveTree, [THIRD_SERIAL]: masterTree } },
        OWN_SERIAL,
      );

      expect(result).toEqual({
        kind: 'dual',
        parallelCount: 2,
        masterMatched: false,
        master: { serial: THIRD_SERIAL, suffix: '_master', report: masterTree },
        slave: { serial: PEER_SERIAL, suffix: '_slave', report: slaveTree },
      });
    });

    it('should reject a parallel section that is not an object', () => {
      expect(resolveTopology({ parallel: [] }, OWN_SERIAL).kind).toBe(
        'unsupported',
      );
      expect(resolveTopology({ parallel: null }, OWN_SERIAL).kind).toBe(
        'unsupported',
      );
    });

    it('should reject inverter reports that are not objects', () => {
      const result = resolveTopology(
        { parallel: { [OWN_SERIAL]: masterTree, [PEER_SERIAL]: 'offline' } },
        OWN_SERIAL,
      );

      expect(result.kind).toBe('unsupported');
    });
  });
});

describe('inverterReports', () => {
  it('should list master before slave', () => {
    const result = resolveTopology(
      { parallel: { [PEER_SERIAL]: {}, [OWN_SERIAL]: {} } },
      OWN_SERIAL,
    );
    if (result.kind === 'unsupported') {
      throw new Error('expected a supported topology');
    }

    expect(inverterReports(result).map((inv) => inv.suffix)).toEqual([
      '_master',
      '_slave',
    ]);
  });
});
