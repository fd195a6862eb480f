/**
 * Tests for the S3 document store.
 *
 * S3Client.send is spied on; no request leaves the process.
 */
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { S3DocumentStore } from '../services/document-store.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('S3DocumentStore', () => {
  it('puts the bytes under the locator', async () => {
    const client = new S3Client({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
    });
    const commands: unknown[] = [];
    vi.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      commands.push(command);
      return { $metadata: {} };
    });
    const store = new S3DocumentStore('resumes-bucket', { region: 'us-east-1' }, client);
    const bytes = new TextEncoder().encode('%PDF-1.4');

    await store.put(bytes, 'resumes/abc_cv.pdf', 'application/pdf');

    const command = commands[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    if (!(command instanceof PutObjectCommand)) return;
    expect(command.input).toEqual({
      Bucket: 'resumes-bucket',
      Key: 'resumes/abc_cv.pdf',
      Body: bytes,
      ContentType: 'application/pdf',
    });
  });
});
