/**
 * Provider client construction.
 *
 * One EC2 and one S3 client per region, created lazily and reused for
 * every scan in that region.
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-provider-ini';

export interface ClientFactory {
  ec2(region: string): EC2Client;
  s3(region: string): S3Client;
}

export interface ClientFactoryOptions {
  /** Named profile from the shared AWS config/credentials files. */
  profile?: string;
  /** SDK retry attempts per call. The SDK default applies when unset. */
  maxAttempts?: number;
}

/**
 * Create a caching client factory.
 *
 * Without a profile, the SDK's default credential chain applies
 * (environment, shared files, SSO, instance/task role).
 */
export function createClientFactory(options: ClientFactoryOptions = {}): ClientFactory {
  const credentials = options.profile ? fromIni({ profile: options.profile }) : undefined;
  const ec2Clients = new Map<string, EC2Client>();
  const s3Clients = new Map<string, S3Client>();

  const baseConfig = (region: string) => ({
    region,
    ...(credentials ? { credentials } : {}),
    ...(options.maxAttempts ? { maxAttempts: options.maxAttempts } : {}),
  });

  return {
    ec2(region: string): EC2Client {
      let client = ec2Clients.get(region);
      if (!client) {
        client = new EC2Client(baseConfig(region));
        ec2Clients.set(region, client);
      }
      return client;
    },
    s3(region: string): S3Client {
      let client = s3Clients.get(region);
      if (!client) {
        client = new S3Client(baseConfig(region));
        s3Clients.set(region, client);
      }
      return client;
    },
  };
}
