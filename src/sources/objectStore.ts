import { GetObjectCommand, HeadObjectCommand, ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import { AwsSettings } from "../config";

export interface ObjectSummary {
  key: string;
  size?: number;
  lastModified?: Date;
  etag?: string;
}

export interface ObjectListingPage {
  objects: ObjectSummary[];
  nextToken?: string;
}

export interface ObjectHead {
  size?: number;
  lastModified?: Date;
  etag?: string;
  contentType?: string;
}

/** The object-store calls the mirror needs; the AWS client below is the production one. */
export interface ObjectStoreClient {
  listObjects(bucket: string, prefix: string, continuationToken?: string): Promise<ObjectListingPage>;
  headObject(bucket: string, key: string): Promise<ObjectHead>;
  /** `end` is inclusive, as in an HTTP Range header. */
  getObjectRange(bucket: string, key: string, start: number, end: number): Promise<Uint8Array>;
}

export class AwsS3ObjectStoreClient implements ObjectStoreClient {
  private readonly client: S3Client;

  constructor(client: S3Client) {
    this.client = client;
  }

  static fromSettings(aws: AwsSettings): AwsS3ObjectStoreClient {
    const credentials =
      aws.accessKeyId && aws.secretAccessKey
        ? { accessKeyId: aws.accessKeyId, secretAccessKey: aws.secretAccessKey }
        : undefined;

    return new AwsS3ObjectStoreClient(
      new S3Client({
        region: aws.region,
        credentials,
        requestHandler: {
          connectionTimeout: aws.connectTimeoutMs,
          requestTimeout: aws.requestTimeoutMs,
        },
      }),
    );
  }

  async listObjects(bucket: string, prefix: string, continuationToken?: string): Promise<ObjectListingPage> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      }),
    );

    const objects: ObjectSummary[] = [];
    for (const item of response.Contents ?? []) {
      if (!item.Key) {
        continue;
      }
      objects.push({
        key: item.Key,
        size: item.Size,
        lastModified: item.LastModified,
        etag: item.ETag,
      });
    }

    return {
      objects,
      nextToken: response.IsTruncated ? response.NextContinuationToken : undefined,
    };
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead> {
    const response = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
    return {
      size: response.ContentLength,
      lastModified: response.LastModified,
      etag: response.ETag,
      contentType: response.ContentType,
    };
  }

  async getObjectRange(bucket: string, key: string, start: number, end: number): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
        Range: `bytes=${start}-${end}`,
      }),
    );

    if (!response.Body) {
      throw new Error(`Empty response body for ${key}`);
    }
    return response.Body.transformToByteArray();
  }
}
