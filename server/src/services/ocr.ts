import {
  GetDocumentAnalysisCommand,
  StartDocumentAnalysisCommand,
  TextractClient,
  type Block,
} from '@aws-sdk/client-textract';
import type { OcrBlock } from '../layout/types.js';
import { awsCredentials, type AwsClientOptions } from '../lib/aws.js';
import logger from '../lib/logger.js';

export type OcrJobStatus = 'IN_PROGRESS' | 'SUCCEEDED' | 'FAILED';

export interface OcrResultPage {
  status: OcrJobStatus;
  blocks: OcrBlock[];
  nextToken?: string;
  statusMessage?: string;
}

export interface OcrClient {
  /** Starts asynchronous analysis of a stored document and returns the job handle. */
  start(bucket: string, key: string): Promise<string>;
  poll(jobId: string, nextToken?: string): Promise<OcrResultPage>;
}

export function toOcrBlock(block: Block): OcrBlock {
  const box = block.Geometry?.BoundingBox;
  const polygon = block.Geometry?.Polygon;
  return {
    blockType: block.BlockType,
    text: block.Text,
    page: block.Page,
    confidence: block.Confidence,
    boundingBox: box
      ? { top: box.Top, left: box.Left, width: box.Width, height: box.Height }
      : undefined,
    polygon: polygon?.map((point) => ({ x: point.X, y: point.Y })),
  };
}

function toJobStatus(jobId: string, status: string | undefined): OcrJobStatus {
  switch (status) {
    case 'SUCCEEDED':
    case 'IN_PROGRESS':
    case 'FAILED':
      return status;
    case 'PARTIAL_SUCCESS':
      logger.warn({ jobId }, 'Textract job finished with partial success; using available blocks');
      return 'SUCCEEDED';
    default:
      throw new Error(`Unexpected Textract job status: ${status ?? 'missing'}`);
  }
}

export class TextractOcrClient implements OcrClient {
  private readonly client: TextractClient;

  constructor(options: AwsClientOptions, client?: TextractClient) {
    this.client = client ?? new TextractClient({
      region: options.region,
      credentials: awsCredentials(options),
    });
  }

  async start(bucket: string, key: string): Promise<string> {
    const response = await this.client.send(new StartDocumentAnalysisCommand({
      DocumentLocation: { S3Object: { Bucket: bucket, Name: key } },
      FeatureTypes: ['LAYOUT', 'FORMS'],
    }));
    if (!response.JobId) {
      throw new Error('Textract did not return a job id');
    }
    logger.info({ jobId: response.JobId, key }, 'Started Textract job');
    return response.JobId;
  }

  async poll(jobId: string, nextToken?: string): Promise<OcrResultPage> {
    const response = await this.client.send(new GetDocumentAnalysisCommand({
      JobId: jobId,
      ...(nextToken && { NextToken: nextToken }),
    }));
    return {
      status: toJobStatus(jobId, response.JobStatus),
      blocks: (response.Blocks ?? []).map(toOcrBlock),
      nextToken: response.NextToken,
      statusMessage: response.StatusMessage,
    };
  }

  destroy(): void {
    this.client.destroy();
  }
}
