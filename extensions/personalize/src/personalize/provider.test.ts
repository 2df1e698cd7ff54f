/**
 * Personalize resource provider tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  CreateCampaignCommand,
  DescribeCampaignCommand,
  GetSolutionMetricsCommand,
  ListDatasetImportJobsCommand,
  ListFiltersCommand,
  UpdateRecommenderCommand,
} from "@aws-sdk/client-personalize";
import { PersonalizeResourceProvider, EmptyResponseError, resourceArnOf } from "./provider.js";
import { InputValidationError } from "./schemas.js";

function createProvider() {
  const send = vi.fn();
  const provider = new PersonalizeResourceProvider({ client: { send } });
  return { send, provider };
}

describe("PersonalizeResourceProvider", () => {
  it("should describe a resource and return its body", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({ campaign: { campaignArn: "cmp-arn", status: "ACTIVE" } });

    const campaign = await provider.describe("campaign", "cmp-arn");

    expect(campaign).toEqual({ campaignArn: "cmp-arn", status: "ACTIVE" });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DescribeCampaignCommand);
    expect(command.input).toEqual({ campaignArn: "cmp-arn" });
  });

  it("should reject an empty describe response", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({});

    await expect(provider.describe("solution", "sol-arn")).rejects.toBeInstanceOf(EmptyResponseError);
  });

  it("should follow next tokens when listing", async () => {
    const { send, provider } = createProvider();
    send
      .mockResolvedValueOnce({ datasetImportJobs: [{ datasetImportJobArn: "a" }], nextToken: "t1" })
      .mockResolvedValueOnce({ datasetImportJobs: [{ datasetImportJobArn: "b" }] });

    const jobs = await provider.list("datasetImportJob", "ds-arn");

    expect(jobs.map((job) => resourceArnOf("datasetImportJob", job))).toEqual(["a", "b"]);
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[0][0]).toBeInstanceOf(ListDatasetImportJobsCommand);
    expect(send.mock.calls[1][0].input).toEqual({ datasetArn: "ds-arn", nextToken: "t1" });
  });

  it("should read filters from the capitalized response key", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({ Filters: [{ filterArn: "f1" }] });

    const filters = await provider.list("filter", "dsg-arn");

    expect(filters).toEqual([{ filterArn: "f1" }]);
    expect(send.mock.calls[0][0]).toBeInstanceOf(ListFiltersCommand);
  });

  it("should validate create input before calling the service", async () => {
    const { send, provider } = createProvider();

    await expect(provider.create("campaign", { name: "top-picks" })).rejects.toBeInstanceOf(InputValidationError);
    expect(send).not.toHaveBeenCalled();
  });

  it("should create a resource and return its ARN", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({ campaignArn: "cmp-arn" });

    const arn = await provider.create("campaign", {
      name: "top-picks",
      solutionVersionArn: "sv-arn",
      minProvisionedTPS: 1,
    });

    expect(arn).toBe("cmp-arn");
    expect(send.mock.calls[0][0]).toBeInstanceOf(CreateCampaignCommand);
  });

  it("should pass the ARN into update calls", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({});

    await provider.update("recommender", "rec-arn", { recommenderConfig: { minRecommendationRequestsPerSecond: 2 } });

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(UpdateRecommenderCommand);
    expect(command.input).toEqual({
      recommenderArn: "rec-arn",
      recommenderConfig: { minRecommendationRequestsPerSecond: 2 },
    });
  });

  it("should refuse to update kinds without an update call", async () => {
    const { provider } = createProvider();

    await expect(provider.update("solution", "sol-arn", {})).rejects.toThrow("solution does not support update");
  });

  it("should return offline solution metrics", async () => {
    const { send, provider } = createProvider();
    send.mockResolvedValueOnce({ metrics: { coverage: 0.5, precision_at_25: 0.1 } });

    const metrics = await provider.getSolutionMetrics("sv-arn");

    expect(metrics).toEqual({ coverage: 0.5, precision_at_25: 0.1 });
    expect(send.mock.calls[0][0]).toBeInstanceOf(GetSolutionMetricsCommand);
  });
});
