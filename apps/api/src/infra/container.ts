import { v7 as uuidv7 } from "uuid";
import type { Config } from "../config.js";
import type { AccommodationEvent } from "../domain/types.js";
import type { Logger } from "../logger.js";
import { makeAccommodationWorkflow } from "../application/accommodation-workflow.js";
import { makeCommandDispatchers } from "../application/command-dispatchers.js";
import { makeCompletionSweeper } from "../application/completion-sweeper.js";
import { makeNotifier, type NotificationDispatcher } from "../application/notifications.js";
import { nowUtc as systemNowUtc } from "../application/pipeline.js";
import { makeQueries } from "../application/queries.js";
import type {
  Directory,
  EventStore,
  IdempotencyStore,
  ReadModel,
  ReferenceData,
  StreamIndex
} from "../application/ports.js";
import { makeAwsClients } from "./aws.js";
import { loadSeed, makeDynamoDirectory, makeMemoryDirectory } from "./directory.js";
import { makeEventStore } from "./event-store.js";
import { makeDynamoIdempotencyStore, makeMemoryIdempotencyStore } from "./idempotency.js";
import { makeLoggingNotificationDispatcher, makeSqsNotificationDispatcher } from "./notifications.js";
import { makeMemoryBucket, makeS3Bucket, type ObjectBucket } from "./object-bucket.js";
import { makeDynamoReadModel, makeMemoryReadModel } from "./read-model.js";
import { recordedAccommodationEventSchema, type Seed } from "./records.js";
import { loadReferenceData } from "./reference-data.js";
import { makeBucketStreamIndex } from "./stream-index.js";

type Ports = {
  eventStore: EventStore<AccommodationEvent>;
  streamIndex: StreamIndex;
  readModel: ReadModel;
  directory: Directory;
  idempotency: IdempotencyStore;
  dispatcher: NotificationDispatcher;
};

export type ServiceOverrides = Partial<Ports> & {
  referenceData?: ReferenceData;
  seed?: Seed;
  uuid?: () => string;
  nowUtc?: () => string;
};

const parseEvent = (raw: unknown) => recordedAccommodationEventSchema.parse(raw);

// Streams and their id index share one bucket.
const bucketPorts = (bucket: ObjectBucket) => ({
  eventStore: makeEventStore<AccommodationEvent>({ bucket, parseEvent }),
  streamIndex: makeBucketStreamIndex({ bucket })
});

const awsPorts = (config: Config, logger: Logger): Ports => {
  const clients = makeAwsClients(config);
  return {
    ...bucketPorts(makeS3Bucket({ s3: clients.s3, bucket: config.s3BucketEvents })),
    readModel: makeDynamoReadModel({
      ddb: clients.ddb,
      tables: { reservations: config.reservationsProjectionTable, ratings: config.ratingsProjectionTable }
    }),
    directory: makeDynamoDirectory({
      ddb: clients.ddb,
      tables: {
        accommodations: config.accommodationsTable,
        members: config.membersTable,
        specialists: config.specialistsTable
      }
    }),
    idempotency: makeDynamoIdempotencyStore({ ddb: clients.ddb, tableName: config.idempotencyTable }),
    dispatcher: config.notificationsQueueUrl
      ? makeSqsNotificationDispatcher({
          send: (command) => clients.sqs.send(command),
          queueUrl: config.notificationsQueueUrl,
          logger
        })
      : makeLoggingNotificationDispatcher(logger)
  };
};

const memoryPorts = (seed: Seed, logger: Logger): Ports => ({
  ...bucketPorts(makeMemoryBucket()),
  readModel: makeMemoryReadModel(),
  directory: makeMemoryDirectory(seed),
  idempotency: makeMemoryIdempotencyStore(),
  dispatcher: makeLoggingNotificationDispatcher(logger)
});

export const buildServices = async (config: Config, logger: Logger, overrides: ServiceOverrides = {}) => {
  const referenceData = overrides.referenceData ?? (await loadReferenceData(config.universitiesFile));
  const basePorts =
    config.storageDriver === "memory"
      ? memoryPorts(overrides.seed ?? (await loadSeed(config.seedFile)), logger)
      : awsPorts(config, logger);
  const ports: Ports = {
    eventStore: overrides.eventStore ?? basePorts.eventStore,
    streamIndex: overrides.streamIndex ?? basePorts.streamIndex,
    readModel: overrides.readModel ?? basePorts.readModel,
    directory: overrides.directory ?? basePorts.directory,
    idempotency: overrides.idempotency ?? basePorts.idempotency,
    dispatcher: overrides.dispatcher ?? basePorts.dispatcher
  };
  const uuid = overrides.uuid ?? uuidv7;
  const nowUtc = overrides.nowUtc ?? systemNowUtc;

  const workflow = makeAccommodationWorkflow({
    eventStore: ports.eventStore,
    readModel: ports.readModel,
    streamIndex: ports.streamIndex,
    notifier: makeNotifier({ directory: ports.directory, dispatcher: ports.dispatcher, logger }),
    uuid,
    nowUtc,
    versionConflictMaxRetries: config.versionConflictMaxRetries,
    logger
  });

  logger.info({ storageDriver: config.storageDriver, universities: referenceData.universities.length }, "services ready");

  return {
    config,
    logger,
    referenceData,
    idempotency: ports.idempotency,
    workflow,
    commands: makeCommandDispatchers({
      workflow,
      streamIndex: ports.streamIndex,
      directory: ports.directory,
      uuid,
      nowUtc
    }),
    queries: makeQueries({
      readModel: ports.readModel,
      workflow,
      streamIndex: ports.streamIndex,
      referenceData,
      pageLimitDefault: config.pageLimitDefault
    }),
    sweeper: makeCompletionSweeper({
      workflow,
      readModel: ports.readModel,
      nowUtc,
      pageLimit: config.pageLimitDefault,
      logger
    })
  };
};

export type Services = Awaited<ReturnType<typeof buildServices>>;
