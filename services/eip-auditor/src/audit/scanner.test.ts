import { describe, it, expect, vi } from "vitest";
import { scanRegion } from "./scanner";
import { RegionServiceError } from "../errors";
import type { Address, AddressSource } from "../enumeration/types";
import type { AuditLogger } from "../logger";

function mockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies AuditLogger;
}

function sourceReturning(addresses: Address[]): AddressSource {
  return { describeAddresses: vi.fn().mockResolvedValue(addresses) };
}

const addresses: Address[] = [
  { publicIp: "203.0.113.1", allocationId: "eipalloc-1" },
  { publicIp: "203.0.113.2" },
  { publicIp: "203.0.113.3", allocationId: "eipalloc-3", instanceId: "i-0abc" },
];

describe("scanRegion", () => {
  it("counts and reports unassociated addresses", async () => {
    const logger = mockLogger();
    const scan = await scanRegion("us-east-1", new Set(), {
      source: sourceReturning(addresses),
      logger,
      dailyCostPerAddress: 0.12,
    });

    expect(scan.status).toBe("scanned");
    if (scan.status !== "scanned") return;
    expect(scan.result.region).toBe("us-east-1");
    expect(scan.result.unassociatedCount).toBe(2);
    expect(scan.result.unassociated.map((a) => a.publicIp)).toEqual(["203.0.113.1", "203.0.113.2"]);
    expect(scan.result.estimatedDailyCost).toBeCloseTo(0.24);

    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenNthCalledWith(
      1,
      "Unassociated EIP found in [us-east-1]: public IP 203.0.113.1, allocation ID eipalloc-1",
      { region: "us-east-1", publicIp: "203.0.113.1", allocationId: "eipalloc-1" },
    );
    expect(logger.warn).toHaveBeenNthCalledWith(
      2,
      "Unassociated EIP found in [us-east-1]: public IP 203.0.113.2, allocation ID not present (legacy EC2-Classic addresses have none)",
      { region: "us-east-1", publicIp: "203.0.113.2", allocationId: null },
    );
    expect(logger.warn.mock.calls[2][0]).toBe(
      "2 unassociated EIP(s) found in [us-east-1]. Releasing them could save USD$0.24 a day.",
    );
  });

  it("skips excluded addresses and notes them", async () => {
    const logger = mockLogger();
    const scan = await scanRegion("us-east-1", new Set(["203.0.113.2"]), {
      source: sourceReturning(addresses),
      logger,
      dailyCostPerAddress: 0.12,
    });

    expect(scan.status === "scanned" && scan.result.unassociatedCount).toBe(1);
    expect(logger.info).toHaveBeenCalledWith(
      "EIP 203.0.113.2 in [us-east-1] is unassociated but excluded from the check",
    );
  });

  it("reports an empty allocation id as not present", async () => {
    const logger = mockLogger();
    await scanRegion("us-east-1", new Set(), {
      source: sourceReturning([{ publicIp: "203.0.113.5", allocationId: "" }]),
      logger,
      dailyCostPerAddress: 0.12,
    });

    expect(logger.warn).toHaveBeenNthCalledWith(
      1,
      "Unassociated EIP found in [us-east-1]: public IP 203.0.113.5, allocation ID not present (legacy EC2-Classic addresses have none)",
      { region: "us-east-1", publicIp: "203.0.113.5", allocationId: null },
    );
  });

  it("returns a zero count for an empty region", async () => {
    const logger = mockLogger();
    const scan = await scanRegion("eu-west-1", new Set(), {
      source: sourceReturning([]),
      logger,
      dailyCostPerAddress: 0.12,
    });

    expect(scan).toEqual({
      status: "scanned",
      result: { region: "eu-west-1", unassociatedCount: 0, unassociated: [], estimatedDailyCost: 0 },
    });
    expect(logger.info).toHaveBeenCalledWith("There are no EIPs in [eu-west-1]");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("marks the region skipped on a service error", async () => {
    const logger = mockLogger();
    const source: AddressSource = {
      describeAddresses: vi
        .fn()
        .mockRejectedValue(new RegionServiceError("ap-east-1", "AuthFailure", "AWS was not able to validate the provided access credentials")),
    };

    const scan = await scanRegion("ap-east-1", new Set(), { source, logger, dailyCostPerAddress: 0.12 });

    expect(scan).toEqual({
      status: "skipped",
      failure: {
        region: "ap-east-1",
        code: "AuthFailure",
        reason: "AWS was not able to validate the provided access credentials",
      },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toContain("[ap-east-1] (AuthFailure)");
  });

  it("propagates errors that are not service errors", async () => {
    const source: AddressSource = {
      describeAddresses: vi.fn().mockRejectedValue(new Error("Could not load credentials from any providers")),
    };

    await expect(
      scanRegion("us-east-1", new Set(), { source, logger: mockLogger(), dailyCostPerAddress: 0.12 }),
    ).rejects.toThrow("Could not load credentials from any providers");
  });
});
