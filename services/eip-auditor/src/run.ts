import type { Config } from "./config";
import { runAudit } from "./audit/orchestrator";
import type { AuditOutcome } from "./audit/types";
import { createAwsAddressSource, listRegions, validateAwsCredentials } from "./enumeration/aws";
import { AuditExecutionError } from "./errors";
import { loadExclusionSet } from "./exclusions/loader";
import { consoleLogger, type AuditLogger } from "./logger";

export interface RunOptions {
  logger?: AuditLogger;
}

export async function runConfiguredAudit(config: Config, options: RunOptions = {}): Promise<AuditOutcome> {
  const logger = options.logger ?? consoleLogger;
  logger.info("Running unassociated EIP audit...");

  // 1. Credentials
  const identity = await validateAwsCredentials(config.AWS_REGION);
  if (!identity) {
    throw new AuditExecutionError("AWS credentials not available, cannot audit the account");
  }
  logger.info(`Auditing AWS account ${identity.account}`);

  // 2. Exclusions
  const exclusions = await loadExclusionSet(config.EIP_EXCLUSION_FILE, logger);

  // 3. Regions
  let regions: string[];
  if (config.AUDIT_REGIONS) {
    regions = config.AUDIT_REGIONS;
  } else {
    try {
      regions = await listRegions(config.AWS_REGION);
    } catch (err) {
      throw new AuditExecutionError(`Region discovery failed: ${(err as Error).message}`, { cause: err });
    }
  }

  // 4. Audit
  return runAudit(regions, exclusions, {
    source: createAwsAddressSource(),
    logger,
    dailyCostPerAddress: config.EIP_DAILY_COST_USD,
    parallel: config.AUDIT_PARALLEL,
  });
}
