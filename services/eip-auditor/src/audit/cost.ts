/**
 * Estimated USD cost of keeping one Elastic IP allocated but unassociated
 * for a day. Pricing differs by account and changes over time, so callers
 * pass their own figure through EIP_DAILY_COST_USD or --daily-cost.
 */
export const DEFAULT_DAILY_COST_PER_ADDRESS = 0.12;

export function estimateDailyCost(count: number, dailyCostPerAddress: number): number {
  return count * dailyCostPerAddress;
}

export function formatUsd(amount: number): string {
  return `USD$${amount.toFixed(2)}`;
}
