import { Readable } from "node:stream";
import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { StorageConfig } from "../config";
import { recordReportUpload } from "../metrics";

export interface StoredObject {
  stream: Readable;
  contentType?: string;
  contentLength?: number;
}

/** Archive for rendered reports. */
export interface ReportStorage {
  putObject(key: string, body: string | Uint8Array, contentType: string): Promise<string>;
  getObjectStream(objectUrl: string): Promise<StoredObject>;
  getSignedUrlForStoredObject(objectUrl: string): Promise<string>;
}

export class S3ReportStorage implements ReportStorage {
  private readonly s3: S3Client;
  private readonly endpointUrl: URL;

  constructor(private readonly storage: StorageConfig) {
    this.endpointUrl = new URL(storage.endpoint);
    this.s3 = new S3Client({
      region: "us-east-1",
      endpoint: storage.endpoint,
      forcePathStyle: true,
      credentials: {
        accessKeyId: storage.accessKey,
        secretAccessKey: storage.secretKey,
      },
    });
  }

  async putObject(key: string, body: string | Uint8Array, contentType: string) {
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.storage.bucket,
          Key: key,
          Body: typeof body === "string" ? Buffer.from(body) : body,
          ContentType: contentType,
        }),
      );
      recordReportUpload("success");
    } catch (error) {
      recordReportUpload("error");
      throw error;
    }
    const protocol = this.storage.useSSL ? "https" : "http";
    return `${protocol}://${this.endpointUrl.host}/${this.storage.bucket}/${key}`;
  }

  async getObjectStream(objectUrl: string): Promise<StoredObject> {
    const key = this.extractKeyFromUrl(objectUrl);
    if (!key) {
      throw new Error("Invalid object URL");
    }
    const object = await this.s3.send(new GetObjectCommand({ Bucket: this.storage.bucket, Key: key }));
    if (!(object.Body instanceof Readable)) {
      throw new Error("Object body is not a readable stream");
    }
    return {
      stream: object.Body,
      contentType: object.ContentType,
      contentLength: object.ContentLength,
    };
  }

  async getSignedUrlForStoredObject(objectUrl: string) {
    const key = this.extractKeyFromUrl(objectUrl);
    if (!key) {
      return objectUrl;
    }
    const command = new GetObjectCommand({ Bucket: this.storage.bucket, Key: key });
    return getSignedUrl(this.s3, command, { expiresIn: clampExpiry(this.storage.signedUrlTTL) });
  }

  extractKeyFromUrl(objectUrl: string): string | null {
    let parsed: URL;
    try {
      parsed = new URL(objectUrl);
    } catch {
      return null;
    }
    const pathname = decodeURIComponent(parsed.pathname);
    const bucketPrefix = `/${this.storage.bucket}/`;
    if (pathname.startsWith(bucketPrefix)) {
      return pathname.slice(bucketPrefix.length);
    }
    return pathname.replace(/^\//, "") || null;
  }
}

function clampExpiry(value: number) {
  const max = 604800; // 7 days
  const min = 60;
  if (!Number.isFinite(value)) return max;
  return Math.max(min, Math.min(max, Math.floor(value)));
}
