import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { AWS_REGION } from "@scratchfleet/core";

export interface STSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface CallerIdentity {
  accountId: string;
  arn: string;
  userId: string;
}

export interface STSServiceOptions {
  region?: string;
  credentials?: STSCredentials;
  /** Pre-built client, mostly for tests */
  client?: STSClient;
}

/**
 * Derive a principal name from a caller ARN.
 *
 * `arn:aws:iam::123456789012:user/alice` → `alice`
 * `arn:aws:iam::123456789012:user/division/alice` → `alice`
 * `arn:aws:sts::123456789012:assumed-role/Deployer/ci-run` → `Deployer/ci-run`
 * `arn:aws:iam::123456789012:root` → `root`
 */
export function principalFromArn(arn: string): string {
  const parts = arn.split(":");
  if (parts.length < 6 || parts[0] !== "arn") {
    throw new Error(`Not an ARN: "${arn}"`);
  }
  const resource = parts.slice(5).join(":");
  const segments = resource.split("/");
  const [type, ...rest] = segments;

  if (rest.length === 0) return type;
  if (type === "assumed-role" || type === "federated-user") return rest.join("/");
  return rest[rest.length - 1];
}

export class STSService {
  private client: STSClient;

  constructor(options: STSServiceOptions = {}) {
    this.client =
      options.client ??
      new STSClient({
        region: options.region ?? AWS_REGION,
        credentials: options.credentials
          ? {
              accessKeyId: options.credentials.accessKeyId,
              secretAccessKey: options.credentials.secretAccessKey,
              sessionToken: options.credentials.sessionToken,
            }
          : undefined,
      });
  }

  /**
   * Get the AWS account ID and identity of the caller.
   */
  async getCallerIdentity(): Promise<CallerIdentity> {
    const result = await this.client.send(new GetCallerIdentityCommand({}));

    if (!result.Arn) {
      throw new Error("GetCallerIdentity returned no ARN");
    }

    return {
      accountId: result.Account || "",
      arn: result.Arn,
      userId: result.UserId || "",
    };
  }

  /**
   * Name of the IAM identity behind the current credentials. Used as the
   * ownership tag value, so it must be stable for the lifetime of the credentials.
   */
  async getPrincipalName(): Promise<string> {
    const identity = await this.getCallerIdentity();
    return principalFromArn(identity.arn);
  }
}
