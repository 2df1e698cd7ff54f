import { describe, it, expect, vi } from "vitest";
import { HeadObjectCommand, ListObjectsV2Command } from "@aws-sdk/client-s3";
import { S3DataSource, SourceDataNotFoundError, parseS3Url } from "./s3-freshness.js";

describe("parseS3Url", () => {
  it("should split bucket and key", () => {
    expect(parseS3Url("s3://data-bucket/train/interactions.csv")).toEqual({
      bucket: "data-bucket",
      key: "train/interactions.csv",
    });
    expect(() => parseS3Url("https://example.com/x")).toThrow("invalid S3 URL https://example.com/x");
  });
});

describe("S3DataSource", () => {
  it("should head a single CSV object once", async () => {
    const modified = new Date("2024-03-01T00:00:00Z");
    const send = vi.fn().mockResolvedValue({ LastModified: modified });
    const source = new S3DataSource("s3://data-bucket/train/interactions.csv", { send });

    expect(await source.exists()).toBe(true);
    expect(await source.lastModified()).toEqual(modified);
    expect(await source.newDataSince(new Date("2024-02-01T00:00:00Z"))).toBe(true);
    expect(await source.newDataSince(new Date("2024-04-01T00:00:00Z"))).toBe(false);

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadObjectCommand);
  });

  it("should treat a missing object as absent", async () => {
    const send = vi.fn().mockRejectedValue(Object.assign(new Error("not found"), { name: "NotFound" }));
    const source = new S3DataSource("s3://data-bucket/missing.csv", { send });

    expect(await source.exists()).toBe(false);
    await expect(source.lastModified()).rejects.toBeInstanceOf(SourceDataNotFoundError);
  });

  it("should propagate other head errors", async () => {
    const send = vi.fn().mockRejectedValue(Object.assign(new Error("denied"), { name: "AccessDenied" }));
    const source = new S3DataSource("s3://data-bucket/items.csv", { send });

    await expect(source.exists()).rejects.toThrow("denied");
  });

  it("should take the newest CSV under a prefix across pages", async () => {
    const send = vi
      .fn()
      .mockResolvedValueOnce({
        Contents: [
          { Key: "train/a.csv", LastModified: new Date("2024-01-01T00:00:00Z") },
          { Key: "train/notes.txt", LastModified: new Date("2024-06-01T00:00:00Z") },
        ],
        IsTruncated: true,
        NextContinuationToken: "next",
      })
      .mockResolvedValueOnce({
        Contents: [{ Key: "train/b.csv", LastModified: new Date("2024-02-01T00:00:00Z") }],
        IsTruncated: false,
      });
    const source = new S3DataSource("s3://data-bucket/train", { send });

    expect(await source.lastModified()).toEqual(new Date("2024-02-01T00:00:00Z"));
    const first = send.mock.calls[0][0];
    expect(first).toBeInstanceOf(ListObjectsV2Command);
    expect(first.input).toEqual({
      Bucket: "data-bucket",
      Prefix: "train/",
      Delimiter: "/",
      ContinuationToken: undefined,
    });
    expect(send.mock.calls[1][0].input.ContinuationToken).toBe("next");
  });

  it("should report a prefix without CSV objects as absent", async () => {
    const send = vi.fn().mockResolvedValue({ Contents: [] });
    const source = new S3DataSource("s3://data-bucket/empty/", { send });

    expect(await source.exists()).toBe(false);
  });
});
