import type { Address } from "../enumeration/types";

export interface RegionResult {
  region: string;
  unassociatedCount: number;
  unassociated: Address[];
  estimatedDailyCost: number;
}

export interface ScanFailure {
  region: string;
  code: string;
  reason: string;
}

export type RegionScan =
  | { status: "scanned"; result: RegionResult }
  | { status: "skipped"; failure: ScanFailure };

export type AuditStatus = "passed" | "failed";

export interface AuditOutcome {
  status: AuditStatus;
  totalUnassociated: number;
  estimatedDailyCost: number;
  dailyCostPerAddress: number;
  /** Successfully scanned regions only. */
  regions: RegionResult[];
  skippedRegions: ScanFailure[];
}
