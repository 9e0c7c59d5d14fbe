import {
  EC2Client,
  EC2ServiceException,
  DescribeAddressesCommand,
  DescribeRegionsCommand,
} from "@aws-sdk/client-ec2";
import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { RegionServiceError } from "../errors";
import type { Address, AddressSource } from "./types";

export async function validateAwsCredentials(region: string): Promise<{ account: string } | null> {
  try {
    const sts = new STSClient({ region });
    const identity = await sts.send(new GetCallerIdentityCommand({}));
    return { account: identity.Account ?? "unknown" };
  } catch {
    return null;
  }
}

/**
 * Regions enabled for the account, sorted by name.
 */
export async function listRegions(homeRegion: string): Promise<string[]> {
  const ec2 = new EC2Client({ region: homeRegion });
  const response = await ec2.send(new DescribeRegionsCommand({ AllRegions: false }));
  return (response.Regions ?? [])
    .map((r) => r.RegionName)
    .filter((name): name is string => Boolean(name))
    .sort();
}

/**
 * Address source backed by EC2 DescribeAddresses. Each call gets its own
 * client so concurrent scans never share region state.
 */
export function createAwsAddressSource(): AddressSource {
  return {
    async describeAddresses(region: string): Promise<Address[]> {
      const ec2 = new EC2Client({ region });
      try {
        const response = await ec2.send(new DescribeAddressesCommand({}));
        return (response.Addresses ?? []).flatMap((a) =>
          a.PublicIp
            ? [
                {
                  publicIp: a.PublicIp,
                  allocationId: a.AllocationId,
                  instanceId: a.InstanceId,
                  networkInterfaceId: a.NetworkInterfaceId,
                },
              ]
            : [],
        );
      } catch (err) {
        if (err instanceof EC2ServiceException) {
          throw new RegionServiceError(region, err.name, err.message, { cause: err });
        }
        throw err;
      } finally {
        ec2.destroy();
      }
    },
  };
}
