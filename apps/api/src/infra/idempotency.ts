import { createHash } from "node:crypto";
import { GetCommand, PutCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import type { IdempotencyDecision, IdempotencyRecord, IdempotencyStore } from "../application/ports.js";
import { domainError } from "../domain/error.js";

export class IdempotencyKeyTakenError extends Error {
  readonly type = "IDEMPOTENCY_ALREADY_EXISTS";
}

export const hashContent = (content: unknown) =>
  createHash("sha256").update(JSON.stringify(content)).digest("hex");

const idempotencyRecordSchema = z.object({
  idempotencyKey: z.string(),
  contentHash: z.string(),
  statusCode: z.number().int(),
  responseBody: z.unknown(),
  createdAtUtc: z.string()
});

const toRecord = (item: unknown): IdempotencyRecord => {
  const parsed = idempotencyRecordSchema.parse(item);
  return { ...parsed, responseBody: parsed.responseBody };
};

const makeDecision =
  (hash: (content: unknown) => string) =>
  (existing: IdempotencyRecord | null, idempotencyKey: string, content: unknown): IdempotencyDecision => {
    const contentHash = hash(content);
    return existing === null
      ? { kind: "new", contentHash }
      : existing.contentHash === contentHash
        ? { kind: "replay", record: existing }
        : {
            kind: "mismatch",
            error: domainError(
              "ValidationError",
              "IDEMPOTENCY_HASH_MISMATCH",
              "Idempotency-Key was used with a different payload",
              { idempotencyKey }
            )
          };
  };

export const makeDynamoIdempotencyStore = ({
  ddb,
  tableName,
  hash = hashContent
}: {
  ddb: DynamoDBDocumentClient;
  tableName: string;
  hash?: (content: unknown) => string;
}): IdempotencyStore => ({
  loadIdempotency: (idempotencyKey) =>
    ddb
      .send(new GetCommand({ TableName: tableName, Key: { idempotencyKey } }))
      .then(({ Item }) => (Item ? toRecord(Item) : null)),
  saveIdempotency: (record) =>
    ddb
      .send(
        new PutCommand({
          TableName: tableName,
          Item: record,
          ConditionExpression: "attribute_not_exists(idempotencyKey)"
        })
      )
      .then(() => record)
      .catch((error: unknown) =>
        error instanceof Error && error.name === "ConditionalCheckFailedException"
          ? Promise.reject(new IdempotencyKeyTakenError(record.idempotencyKey))
          : Promise.reject(error)
      ),
  idempotencyDecision: makeDecision(hash)
});

export const makeMemoryIdempotencyStore = (hash = hashContent): IdempotencyStore => {
  const records = new Map<string, IdempotencyRecord>();

  return {
    loadIdempotency: (idempotencyKey) => Promise.resolve(records.get(idempotencyKey) ?? null),
    saveIdempotency: (record) => {
      if (records.has(record.idempotencyKey)) {
        return Promise.reject(new IdempotencyKeyTakenError(record.idempotencyKey));
      }
      records.set(record.idempotencyKey, record);
      return Promise.resolve(record);
    },
    idempotencyDecision: makeDecision(hash)
  };
};
