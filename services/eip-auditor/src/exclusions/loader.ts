import { readFile } from "node:fs/promises";
import { parseLines } from "dot-properties";
import { z } from "zod";
import type { AuditLogger } from "../logger";

export const EXCLUSION_KEY = "excludeFromCheck";

const exclusionListSchema = z.array(z.string().ip());

/**
 * Values of every `excludeFromCheck` line, in file order. Comments, blank
 * lines and other keys are skipped.
 */
function collectValues(content: string): string[] {
  return parseLines(content)
    .flatMap((line) => (Array.isArray(line) && line[0] === EXCLUSION_KEY ? [line[1] ?? ""] : []))
    .flatMap((value) => value.split(","))
    .map((ip) => ip.trim())
    .filter((ip) => ip.length > 0);
}

/**
 * Parse exclusion file contents in properties format. Accepts
 * `excludeFromCheck = a, b`, `excludeFromCheck: a, b` and the key repeated on
 * several lines. Any entry that is not an IP address makes the file
 * malformed, which yields an empty set.
 */
export function parseExclusionSet(content: string, logger: AuditLogger): ReadonlySet<string> {
  const ips = collectValues(content);

  const parsed = exclusionListSchema.safeParse(ips);
  if (!parsed.success) {
    const index = parsed.error.issues[0].path[0];
    const value = typeof index === "number" ? ips[index] : "";
    logger.error(`Malformed EIP exclusion file, continuing without exclusions: "${value}" is not an IP address`);
    return new Set();
  }

  if (parsed.data.length === 0) {
    logger.info("No excluded EIPs found");
  }
  return new Set(parsed.data);
}

/**
 * Load the optional exclusion file. A missing or unreadable file is not an
 * error: the audit runs without exclusions.
 */
export async function loadExclusionSet(
  path: string | undefined,
  logger: AuditLogger,
): Promise<ReadonlySet<string>> {
  if (!path) {
    logger.info("No EIP exclusion file configured");
    return new Set();
  }

  logger.info(`Loading EIP exclusion file (optional) from [${path}]`);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    logger.info(
      code === "ENOENT"
        ? `EIP exclusion file [${path}] not found, no EIPs excluded`
        : `EIP exclusion file [${path}] could not be read (${code ?? "unknown error"}), no EIPs excluded`,
    );
    return new Set();
  }

  return parseExclusionSet(content, logger);
}
