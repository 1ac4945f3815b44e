/**
 * Object store (S3 bucket) scanner.
 *
 * Buckets are listed once for the whole account. Each bucket's region
 * and approximate size are looked up individually; a failed lookup
 * affects only that bucket.
 */

import {
  GetBucketLocationCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  type Bucket,
} from '@aws-sdk/client-s3';
import type { ObjectStoreResource } from '@shared/types';
import { normalizeObjectStore } from '../normalizers';
import { BaseScanner, type ScannerContext } from './base';
import { describeProviderError } from './errors';

/**
 * Region reported for buckets without a location constraint.
 */
export const DEFAULT_BUCKET_REGION = 'us-east-1';

/**
 * Region recorded when a bucket's location lookup fails.
 */
export const UNKNOWN_BUCKET_REGION = 'unknown';

/**
 * Translate a GetBucketLocation constraint into a region code.
 * An empty constraint means us-east-1; "EU" is the legacy name of eu-west-1.
 */
export function regionFromLocationConstraint(constraint: string | undefined): string {
  if (!constraint) {
    return DEFAULT_BUCKET_REGION;
  }
  if (constraint === 'EU') {
    return 'eu-west-1';
  }
  return constraint;
}

export class ObjectStoreScanner extends BaseScanner<'object-store'> {
  readonly isGlobal = true;

  constructor(context: ScannerContext) {
    super('object-store', context);
  }

  protected async collect(_region: string, found: ObjectStoreResource[]): Promise<void> {
    const buckets = await this.listBuckets();

    for (const bucket of buckets) {
      this.throwIfAborted();
      found.push(await this.describeBucket(bucket));
    }
  }

  private async listBuckets(): Promise<Bucket[]> {
    const client = this.context.clients.s3(DEFAULT_BUCKET_REGION);
    const buckets: Bucket[] = [];
    let continuationToken: string | undefined;

    do {
      this.throwIfAborted();
      const response = await client.send(
        new ListBucketsCommand({ ContinuationToken: continuationToken }),
        this.sendOptions
      );
      buckets.push(...(response.Buckets ?? []));
      continuationToken = response.ContinuationToken;
    } while (continuationToken);

    return buckets;
  }

  private async describeBucket(bucket: Bucket): Promise<ObjectStoreResource> {
    const name = bucket.Name;
    if (!name) {
      return normalizeObjectStore(
        { creationDate: bucket.CreationDate, totalBytes: 0 },
        UNKNOWN_BUCKET_REGION,
        this.context.pricing
      );
    }

    const region = await this.bucketRegion(name);
    const totalBytes = await this.firstPageBytes(name, region);

    return normalizeObjectStore(
      { name, creationDate: bucket.CreationDate, totalBytes },
      region,
      this.context.pricing
    );
  }

  private async bucketRegion(name: string): Promise<string> {
    try {
      const response = await this.context.clients
        .s3(DEFAULT_BUCKET_REGION)
        .send(new GetBucketLocationCommand({ Bucket: name }), this.sendOptions);
      return regionFromLocationConstraint(response.LocationConstraint);
    } catch (error) {
      this.throwIfAborted();
      this.logger.warn(
        { bucket: name, error: describeProviderError(error).message },
        `Could not get region for bucket ${name}`
      );
      return UNKNOWN_BUCKET_REGION;
    }
  }

  /**
   * Sum of object sizes on the first ListObjectsV2 page (up to 1000 keys).
   * Larger buckets are understated; the result is an approximation.
   */
  private async firstPageBytes(name: string, region: string): Promise<number> {
    const clientRegion = region === UNKNOWN_BUCKET_REGION ? DEFAULT_BUCKET_REGION : region;

    try {
      const response = await this.context.clients
        .s3(clientRegion)
        .send(new ListObjectsV2Command({ Bucket: name }), this.sendOptions);
      return (response.Contents ?? []).reduce((total, object) => total + (object.Size ?? 0), 0);
    } catch (error) {
      this.throwIfAborted();
      this.logger.warn(
        { bucket: name, error: describeProviderError(error).message },
        `Could not get size for bucket ${name}`
      );
      return 0;
    }
  }
}
