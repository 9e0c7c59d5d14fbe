import type { Address } from "../enumeration/types";

function isBoundToInstance(address: Address): boolean {
  return Boolean(address.instanceId);
}

function isBoundToNetworkInterface(address: Address): boolean {
  return Boolean(address.networkInterfaceId);
}

/**
 * An address is unassociated when neither an instance nor a network
 * interface holds it and it is not on the exclusion list.
 */
export function isUnassociated(address: Address, exclusions: ReadonlySet<string>): boolean {
  return (
    !isBoundToInstance(address) &&
    !isBoundToNetworkInterface(address) &&
    !exclusions.has(address.publicIp)
  );
}

/**
 * True for an address that would count as unassociated but is excluded.
 */
export function isExcluded(address: Address, exclusions: ReadonlySet<string>): boolean {
  return (
    !isBoundToInstance(address) &&
    !isBoundToNetworkInterface(address) &&
    exclusions.has(address.publicIp)
  );
}
