import { z } from "zod";
import { DEFAULT_DAILY_COST_PER_ADDRESS } from "./audit/cost";

const regionList = z
  .string()
  .optional()
  .transform((raw) => {
    const regions = (raw ?? "")
      .split(",")
      .map((r) => r.trim())
      .filter((r) => r.length > 0);
    return regions.length > 0 ? regions : undefined;
  });

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  AUDIT_REGIONS: regionList,
  EIP_EXCLUSION_FILE: z.string().min(1).default("/etc/eip-auditor/eip-exclusions.properties"),
  EIP_DAILY_COST_USD: z.coerce.number().nonnegative().default(DEFAULT_DAILY_COST_PER_ADDRESS),
  AUDIT_PARALLEL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}
