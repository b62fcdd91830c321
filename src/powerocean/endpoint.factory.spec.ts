import { createEndpoint, mergeSensors } from './endpoint.factory';
import { SensorMap } from './interfaces/endpoint.interface';

describe('endpoint factory', () => {
  describe('createEndpoint', () => {
    it('should derive unit and description from the key', () => {
      const endpoint = createEndpoint({
        id: 'SN_sysLoadPwr',
        serial: 'SN',
        name: 'SN_sysLoadPwr',
        friendlyName: 'sysLoadPwr',
        value: 512,
        key: 'sysLoadPwr',
      });

      expect(endpoint).toEqual({
        internalUniqueId: 'SN_sysLoadPwr',
        serial: 'SN',
        name: 'SN_sysLoadPwr',
        friendlyName: 'sysLoadPwr',
        value: 512,
        unit: 'W',
        description: 'Hausnetz',
        icon: null,
      });
    });

    it('should prepend the description prefix', () => {
      const endpoint = createEndpoint({
        id: 'id',
        serial: 'SN',
        name: 'SN_bpack2_bpVol',
        friendlyName: 'bpack2_bpVol',
        value: 52.1,
        key: 'bpVol',
        descriptionPrefix: 'bpack2_',
      });

      expect(endpoint.description).toBe('bpack2_Batteriespannung');
    });

    it('should keep explicit unit, description and icon', () => {
      const endpoint = createEndpoint({
        id: 'id',
        serial: 'SN',
        name: 'n',
        friendlyName: 'f',
        value: 0,
        key: 'pwrTotal',
        unit: 'W',
        description: 'Summe',
        icon: 'mdi:solar-power',
      });

      expect(endpoint.unit).toBe('W');
      expect(endpoint.description).toBe('Summe');
      expect(endpoint.icon).toBe('mdi:solar-power');
    });

    it('should allow an explicit null unit', () => {
      const endpoint = createEndpoint({
        id: 'id',
        serial: 'SN',
        name: 'n',
        friendlyName: 'f',
        value: 1,
        key: 'bpPwr',
        unit: null,
      });

      expect(endpoint.unit).toBeNull();
    });

    it('should return a frozen record', () => {
      const endpoint = createEndpoint({
        id: 'id',
        serial: 'SN',
        name: 'n',
        friendlyName: 'f',
        value: true,
        key: 'online',
      });

      expect(Object.isFrozen(endpoint)).toBe(true);
    });
  });

  describe('mergeSensors', () => {
    const endpoint = (id: string, value: number) =>
      createEndpoint({
        id,
        serial: 'SN',
        name: id,
        friendlyName: id,
        value,
        key: id,
      });

    it('should keep the later record on id collision (last writer wins)', () => {
      const first: SensorMap = new Map([['dup', endpoint('dup', 1)]]);
      const second: SensorMap = new Map([['dup', endpoint('dup', 2)]]);

      const merged = mergeSensors(first, second);

      expect(merged.size).toBe(1);
      expect(merged.get('dup')?.value).toBe(2);
    });

    it('should keep records that do not collide', () => {
      const target: SensorMap = new Map([['a', endpoint('a', 1)]]);
      mergeSensors(target, new Map([['b', endpoint('b', 2)]]));

      expect([...target.keys()]).toEqual(['a', 'b']);
    });
  });
});
