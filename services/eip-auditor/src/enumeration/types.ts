export interface Address {
  publicIp: string;
  /** Absent for legacy EC2-Classic addresses. */
  allocationId?: string;
  instanceId?: string;
  networkInterfaceId?: string;
}

/**
 * Lists the addresses allocated to the account in one region.
 * Rejects with a RegionServiceError when the provider refuses the request.
 */
export interface AddressSource {
  describeAddresses(region: string): Promise<Address[]>;
}
