/**
 * The cloud provider rejected a request scoped to one region
 * (permission denied, region not enabled, service fault).
 */
export class RegionServiceError extends Error {
  readonly region: string;
  readonly code: string;

  constructor(region: string, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegionServiceError";
    this.region = region;
    this.code = code;
  }
}

/**
 * The audit could not run at all. Distinct from an audit that ran and
 * found unassociated addresses.
 */
export class AuditExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditExecutionError";
  }
}
