import type { AddressSource } from "../enumeration/types";
import { AuditExecutionError } from "../errors";
import type { AuditLogger } from "../logger";
import { DEFAULT_DAILY_COST_PER_ADDRESS, estimateDailyCost, formatUsd } from "./cost";
import { scanRegion, type ScanOptions } from "./scanner";
import type { AuditOutcome, RegionScan } from "./types";

export interface AuditOptions {
  source: AddressSource;
  logger: AuditLogger;
  dailyCostPerAddress?: number;
  /** Scan all regions concurrently instead of one after another. */
  parallel?: boolean;
}

async function scanAll(
  regions: readonly string[],
  exclusions: ReadonlySet<string>,
  options: ScanOptions,
  parallel: boolean,
): Promise<RegionScan[]> {
  if (parallel) {
    // Let every scan finish before failing so no report lines trail the error.
    const settled = await Promise.allSettled(regions.map((region) => scanRegion(region, exclusions, options)));
    const scans: RegionScan[] = [];
    for (const result of settled) {
      if (result.status === "rejected") throw result.reason;
      scans.push(result.value);
    }
    return scans;
  }

  const scans: RegionScan[] = [];
  for (const region of regions) {
    scans.push(await scanRegion(region, exclusions, options));
  }
  return scans;
}

function fold(scans: RegionScan[], dailyCostPerAddress: number): AuditOutcome {
  const outcome = scans.reduce<AuditOutcome>(
    (acc, scan) => {
      if (scan.status === "skipped") {
        acc.skippedRegions.push(scan.failure);
      } else {
        acc.regions.push(scan.result);
        acc.totalUnassociated += scan.result.unassociatedCount;
      }
      return acc;
    },
    {
      status: "passed",
      totalUnassociated: 0,
      estimatedDailyCost: 0,
      dailyCostPerAddress,
      regions: [],
      skippedRegions: [],
    },
  );

  outcome.estimatedDailyCost = estimateDailyCost(outcome.totalUnassociated, dailyCostPerAddress);
  outcome.status = outcome.totalUnassociated > 0 ? "failed" : "passed";
  return outcome;
}

/**
 * Audit every region once and aggregate the findings. Regions the provider
 * refuses to list are skipped and reported, never retried.
 */
export async function runAudit(
  regions: readonly string[],
  exclusions: ReadonlySet<string>,
  options: AuditOptions,
): Promise<AuditOutcome> {
  const { source, logger, dailyCostPerAddress = DEFAULT_DAILY_COST_PER_ADDRESS, parallel = false } = options;
  const unique = [...new Set(regions)];

  if (unique.length === 0) {
    throw new AuditExecutionError("No regions to audit");
  }

  const scans = await scanAll(unique, exclusions, { source, logger, dailyCostPerAddress }, parallel);
  const outcome = fold(scans, dailyCostPerAddress);

  if (outcome.skippedRegions.length > 0) {
    logger.warn(
      `Skipped ${outcome.skippedRegions.length} region(s) that could not be queried: ` +
        outcome.skippedRegions.map((f) => f.region).join(", "),
    );
  }

  if (outcome.regions.length === 0) {
    throw new AuditExecutionError(
      `Could not query addresses in any of the ${unique.length} region(s); the audit did not run`,
    );
  }

  if (outcome.status === "failed") {
    logger.warn(
      `${outcome.totalUnassociated} unassociated EIP(s) found in all regions. ` +
        `Releasing them could save ${formatUsd(outcome.estimatedDailyCost)} a day.`,
      { count: outcome.totalUnassociated, estimatedDailyCost: outcome.estimatedDailyCost },
    );
  } else {
    logger.info(`No unassociated EIPs found in ${outcome.regions.length} region(s)`);
  }

  return outcome;
}
