import { Command, CommanderError } from "commander";
import { formatUsd } from "./audit/cost";
import { loadConfig } from "./config";
import { consoleLogger, type AuditLogger } from "./logger";
import { runConfiguredAudit } from "./run";

export const EXIT_PASSED = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

interface CliOptions {
  exclusions?: string;
  regions?: string;
  dailyCost?: string;
  parallel?: boolean;
}

export interface CliDeps {
  run?: typeof runConfiguredAudit;
  logger?: AuditLogger;
  env?: Record<string, string | undefined>;
}

function toEnvOverrides(opts: CliOptions): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (opts.exclusions !== undefined) overrides.EIP_EXCLUSION_FILE = opts.exclusions;
  if (opts.regions !== undefined) overrides.AUDIT_REGIONS = opts.regions;
  if (opts.dailyCost !== undefined) overrides.EIP_DAILY_COST_USD = opts.dailyCost;
  if (opts.parallel) overrides.AUDIT_PARALLEL = "true";
  return overrides;
}

async function execute(opts: CliOptions, deps: Required<CliDeps>): Promise<number> {
  const { run, logger, env } = deps;
  try {
    const config = loadConfig({ ...env, ...toEnvOverrides(opts) });
    const outcome = await run(config, { logger });

    if (outcome.status === "failed") {
      logger.error(
        `Audit failed: ${outcome.totalUnassociated} unassociated EIP(s) found, ` +
          `costing an estimated ${formatUsd(outcome.estimatedDailyCost)} a day`,
      );
      return EXIT_FINDINGS;
    }
    return EXIT_PASSED;
  } catch (err) {
    logger.error(`Audit could not run: ${(err as Error).message}`);
    return EXIT_ERROR;
  }
}

/**
 * Run the audit as a pipeline step and resolve to the process exit code:
 * 0 clean, 1 unassociated EIPs found, 2 the audit could not run.
 */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const resolved: Required<CliDeps> = {
    run: deps.run ?? runConfiguredAudit,
    logger: deps.logger ?? consoleLogger,
    env: deps.env ?? process.env,
  };
  let exitCode = EXIT_ERROR;

  const program = new Command()
    .name("eip-auditor")
    .description("Fail when the AWS account holds Elastic IPs that nothing uses")
    .option("--exclusions <path>", "exclusion file listing public IPs to ignore (excludeFromCheck)")
    .option("--regions <list>", "comma-separated regions to audit (default: every enabled region)")
    .option("--daily-cost <usd>", "estimated cost of one unassociated EIP per day")
    .option("--parallel", "scan regions concurrently")
    .exitOverride()
    .action(async (opts: CliOptions) => {
      exitCode = await execute(opts, resolved);
    });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_PASSED : EXIT_ERROR;
    }
    throw err;
  }
  return exitCode;
}
