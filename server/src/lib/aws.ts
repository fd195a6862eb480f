export interface AwsClientOptions {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Static credentials when both keys are configured; otherwise undefined so the
 * SDK falls back to its default provider chain (instance role, shared profile).
 */
export function awsCredentials(options: AwsClientOptions): { accessKeyId: string; secretAccessKey: string } | undefined {
  return options.accessKeyId && options.secretAccessKey
    ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
    : undefined;
}
