import { fileURLToPath } from "node:url";

type Env = Record<string, string | undefined>;

export type StorageDriver = "aws" | "memory";

const parseStorageDriver = (value: string | undefined): StorageDriver =>
  value === "memory" ? "memory" : "aws";

const parseNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isFinite(parsed) ? parsed : fallback;
};

// Reference data ships with the package, beside src/ and dist/.
const packagedFile = (name: string) => fileURLToPath(new URL(`../config/${name}`, import.meta.url));

const defaultLogLevel = (nodeEnv: string | undefined) =>
  nodeEnv === "test" ? "silent" : nodeEnv === "production" ? "info" : "debug";

export const makeConfig = (env: Env) => ({
  port: parseNumber(env.PORT, 3000),
  storageDriver: parseStorageDriver(env.STORAGE_DRIVER),
  logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
  awsRegion: env.AWS_REGION ?? "us-east-1",
  s3Endpoint: env.S3_ENDPOINT,
  s3BucketEvents: env.S3_BUCKET_EVENTS ?? "campus-housing-events",
  dynamoEndpoint: env.DYNAMO_ENDPOINT,
  sqsEndpoint: env.SQS_ENDPOINT,
  notificationsQueueUrl: env.NOTIFICATIONS_QUEUE_URL ?? "",
  accommodationsTable: env.ACCOMMODATIONS_TABLE ?? "accommodations",
  membersTable: env.MEMBERS_TABLE ?? "members",
  specialistsTable: env.SPECIALISTS_TABLE ?? "specialists",
  reservationsProjectionTable: env.RESERVATIONS_PROJECTION_TABLE ?? "reservations_projection",
  ratingsProjectionTable: env.RATINGS_PROJECTION_TABLE ?? "ratings_projection",
  idempotencyTable: env.IDEMPOTENCY_TABLE ?? "idempotency_table",
  universitiesFile: env.UNIVERSITIES_FILE ?? packagedFile("universities.json"),
  seedFile: env.SEED_FILE ?? packagedFile("seed.json"),
  pageLimitDefault: parseNumber(env.PAGE_LIMIT_DEFAULT, 20),
  versionConflictMaxRetries: parseNumber(env.VERSION_CONFLICT_MAX_RETRIES, 3),
  storeRequestTimeoutMs: parseNumber(env.STORE_REQUEST_TIMEOUT_MS, 5000),
  completionSweepIntervalMs: parseNumber(env.COMPLETION_SWEEP_INTERVAL_MS, 0)
});

export type Config = ReturnType<typeof makeConfig>;

export const config = makeConfig(process.env);
