import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { awsCredentials, type AwsClientOptions } from '../lib/aws.js';
import logger from '../lib/logger.js';

export interface DocumentStore {
  readonly bucket: string;
  put(bytes: Uint8Array, locator: string, contentType?: string): Promise<void>;
}

export class S3DocumentStore implements DocumentStore {
  private readonly client: S3Client;

  constructor(
    readonly bucket: string,
    options: AwsClientOptions,
    client?: S3Client,
  ) {
    this.client = client ?? new S3Client({
      region: options.region,
      credentials: awsCredentials(options),
    });
  }

  async put(bytes: Uint8Array, locator: string, contentType?: string): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: locator,
      Body: bytes,
      ...(contentType && { ContentType: contentType }),
    }));
    logger.info({ bucket: this.bucket, key: locator, bytes: bytes.byteLength }, 'Stored resume document');
  }

  destroy(): void {
    this.client.destroy();
  }
}
