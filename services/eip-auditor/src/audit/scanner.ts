import { isExcluded, isUnassociated } from "../classification/classifier";
import type { AddressSource, Address } from "../enumeration/types";
import { RegionServiceError } from "../errors";
import type { AuditLogger } from "../logger";
import { estimateDailyCost, formatUsd } from "./cost";
import type { RegionScan } from "./types";

export interface ScanOptions {
  source: AddressSource;
  logger: AuditLogger;
  dailyCostPerAddress: number;
}

const MISSING_ALLOCATION_ID = "not present (legacy EC2-Classic addresses have none)";

function reportAddress(region: string, address: Address, logger: AuditLogger): void {
  const allocationId = address.allocationId || null;
  logger.warn(
    `Unassociated EIP found in [${region}]: public IP ${address.publicIp}, allocation ID ${allocationId ?? MISSING_ALLOCATION_ID}`,
    { region, publicIp: address.publicIp, allocationId },
  );
}

/**
 * Scan one region. A service error from the provider skips the region;
 * any other error propagates.
 */
export async function scanRegion(
  region: string,
  exclusions: ReadonlySet<string>,
  options: ScanOptions,
): Promise<RegionScan> {
  const { source, logger, dailyCostPerAddress } = options;
  logger.info(`Checking for unassociated EIPs in the [${region}] region`);

  let addresses: Address[];
  try {
    addresses = await source.describeAddresses(region);
  } catch (err) {
    if (!(err instanceof RegionServiceError)) throw err;
    logger.warn(
      `Failed to describe addresses in [${region}] (${err.code}): ${err.message}. ` +
        "Make sure the credentials have ec2:DescribeAddresses permission and the region is enabled. Skipping region.",
      { region, code: err.code },
    );
    return { status: "skipped", failure: { region, code: err.code, reason: err.message } };
  }

  if (addresses.length === 0) {
    logger.info(`There are no EIPs in [${region}]`);
  }

  const unassociated: Address[] = [];
  for (const address of addresses) {
    if (isUnassociated(address, exclusions)) {
      unassociated.push(address);
      reportAddress(region, address, logger);
    } else if (isExcluded(address, exclusions)) {
      logger.info(`EIP ${address.publicIp} in [${region}] is unassociated but excluded from the check`);
    }
  }

  const estimatedDailyCost = estimateDailyCost(unassociated.length, dailyCostPerAddress);
  if (unassociated.length > 0) {
    logger.warn(
      `${unassociated.length} unassociated EIP(s) found in [${region}]. ` +
        `Releasing them could save ${formatUsd(estimatedDailyCost)} a day.`,
      { region, count: unassociated.length, estimatedDailyCost },
    );
  }

  return {
    status: "scanned",
    result: { region, unassociatedCount: unassociated.length, unassociated, estimatedDailyCost },
  };
}
