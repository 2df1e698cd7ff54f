/**
 * S3 source data freshness
 *
 * Dataset import jobs read either one CSV object or every CSV object under a
 * prefix. The newest object's modification time decides whether an import
 * older than its staleness window can be replaced by a fresh one.
 */

import { S3Client, HeadObjectCommand, ListObjectsV2Command } from "@aws-sdk/client-s3";

export type S3Sender = Pick<S3Client, "send">;

export type S3Location = {
  bucket: string;
  key: string;
};

export class SourceDataNotFoundError extends Error {
  constructor(readonly url: string) {
    super(`no data found at ${url}`);
    this.name = "SourceDataNotFoundError";
  }
}

export function parseS3Url(url: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(url);
  if (!match) {
    throw new Error(`invalid S3 URL ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === "NotFound" || err.name === "NoSuchKey") return true;
  if (!("$metadata" in err)) return false;
  const metadata = err.$metadata;
  return (
    typeof metadata === "object" &&
    metadata !== null &&
    "httpStatusCode" in metadata &&
    metadata.httpStatusCode === 404
  );
}

export class S3DataSource {
  readonly location: S3Location;
  private resolved?: Promise<Date | undefined>;

  constructor(
    readonly url: string,
    private client: S3Sender = new S3Client({}),
  ) {
    this.location = parseS3Url(url);
  }

  async exists(): Promise<boolean> {
    return (await this.resolve()) !== undefined;
  }

  /**
   * Modification time of the object, or of the newest CSV under the prefix.
   */
  async lastModified(): Promise<Date> {
    const modified = await this.resolve();
    if (!modified) throw new SourceDataNotFoundError(this.url);
    return modified;
  }

  async newDataSince(date: Date): Promise<boolean> {
    return (await this.lastModified()).getTime() > date.getTime();
  }

  private resolve(): Promise<Date | undefined> {
    this.resolved ??= this.location.key.endsWith(".csv") ? this.headObject() : this.newestUnderPrefix();
    return this.resolved;
  }

  private async headObject(): Promise<Date | undefined> {
    try {
      const head = await this.client.send(
        new HeadObjectCommand({ Bucket: this.location.bucket, Key: this.location.key }),
      );
      return head.LastModified;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  private async newestUnderPrefix(): Promise<Date | undefined> {
    const key = this.location.key;
    const prefix = key === "" || key.endsWith("/") ? key : `${key}/`;
    let newest: Date | undefined;
    let continuationToken: string | undefined;

    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.location.bucket,
          Prefix: prefix,
          Delimiter: "/",
          ContinuationToken: continuationToken,
        }),
      );
      for (const object of page.Contents ?? []) {
        if (!object.Key?.endsWith(".csv") || !object.LastModified) continue;
        if (!newest || object.LastModified.getTime() > newest.getTime()) {
          newest = object.LastModified;
        }
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return newest;
  }
}
