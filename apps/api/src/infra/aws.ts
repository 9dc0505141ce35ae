import { S3Client } from "@aws-sdk/client-s3";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { SQSClient } from "@aws-sdk/client-sqs";
import type { Config } from "../config.js";

const endpointConfig = (endpoint: string | undefined) =>
  endpoint
    ? {
        endpoint,
        credentials: {
          accessKeyId: process.env.AWS_ACCESS_KEY_ID ?? "test",
          secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY ?? "test"
        }
      }
    : {};

export type AwsClients = {
  s3: S3Client;
  ddb: DynamoDBDocumentClient;
  sqs: SQSClient;
};

export const makeAwsClients = (config: Config): AwsClients => {
  const requestHandler = {
    requestTimeout: config.storeRequestTimeoutMs,
    connectionTimeout: config.storeRequestTimeoutMs
  };
  return {
    s3: new S3Client({
      region: config.awsRegion,
      requestHandler,
      forcePathStyle: config.s3Endpoint !== undefined,
      ...endpointConfig(config.s3Endpoint)
    }),
    ddb: DynamoDBDocumentClient.from(
      new DynamoDBClient({
        region: config.awsRegion,
        requestHandler,
        ...endpointConfig(config.dynamoEndpoint)
      }),
      { marshallOptions: { removeUndefinedValues: true } }
    ),
    sqs: new SQSClient({
      region: config.awsRegion,
      requestHandler,
      ...endpointConfig(config.sqsEndpoint)
    })
  };
};
