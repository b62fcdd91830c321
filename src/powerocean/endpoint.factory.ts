import {
  PowerOceanEndpoint,
  SensorMap,
  SensorUnit,
  SensorValue,
} from './interfaces/endpoint.interface';
import { getDescription, getUnit } from './lookups/sensor-metadata';

export interface EndpointInit {
  id: string;
  serial: string;
  name: string;
  friendlyName: string;
  value: SensorValue;
  /** Vendor key the unit and description are derived from. */
  key: string;
  /** Prepended to the derived description, e.g. 'bpack1_'. */
  descriptionPrefix?: string;
  unit?: SensorUnit | null;
  description?: string;
  icon?: string | null;
}

/**
 * Build an immutable endpoint. Unit and description come from the lookups
 * unless given explicitly.
 */
export function createEndpoint(init: EndpointInit): PowerOceanEndpoint {
  const description =
    init.description ??
    `${init.descriptionPrefix ?? ''}${getDescription(init.key)}`;

  return Object.freeze({
    internalUniqueId: init.id,
    serial: init.serial,
    name: init.name,
    friendlyName: init.friendlyName,
    value: init.value,
    unit: init.unit === undefined ? getUnit(init.key) : init.unit,
    description,
    icon: init.icon ?? null,
  });
}

/**
 * Copy `additions` into `target`. An id already present in `target` is
 * overwritten: the last writer wins.
 */
export function mergeSensors(target: SensorMap, additions: SensorMap): SensorMap {
  for (const [id, endpoint] of additions) {
    target.set(id, endpoint);
  }
  return target;
}
