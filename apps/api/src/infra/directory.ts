import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { GetCommand, ScanCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { Directory } from "../application/ports.js";
import { canonicalUniversity } from "../domain/index.js";
import {
  listingRecordSchema,
  memberRecordSchema,
  seedSchema,
  specialistRecordSchema,
  type Seed
} from "./records.js";

/**
 * Accommodations, members and specialists are owned by other services; this adapter only
 * reads them.
 */
export const makeDynamoDirectory = ({
  ddb,
  tables
}: {
  ddb: DynamoDBDocumentClient;
  tables: { accommodations: string; members: string; specialists: string };
}): Directory => ({
  getAccommodation: (accommodationId) =>
    ddb
      .send(new GetCommand({ TableName: tables.accommodations, Key: { accommodationId } }))
      .then(({ Item }) => (Item ? listingRecordSchema.parse(Item) : null)),
  getMember: (uid) =>
    ddb
      .send(new GetCommand({ TableName: tables.members, Key: { uid } }))
      .then(({ Item }) => (Item ? memberRecordSchema.parse(Item) : null)),
  listSpecialists: (university) => {
    const loop = async (
      exclusiveStartKey: Record<string, unknown> | undefined,
      acc: Seed["specialists"]
    ): Promise<Seed["specialists"]> => {
      const page = await ddb.send(
        new ScanCommand({
          TableName: tables.specialists,
          ExclusiveStartKey: exclusiveStartKey,
          FilterExpression: "#university = :university",
          ExpressionAttributeNames: { "#university": "university" },
          ExpressionAttributeValues: { ":university": canonicalUniversity(university) }
        })
      );
      const items = [...acc, ...(page.Items ?? []).map((item) => specialistRecordSchema.parse(item))];
      return page.LastEvaluatedKey ? loop(page.LastEvaluatedKey, items) : items;
    };
    return loop(undefined, []);
  }
});

export const makeMemoryDirectory = (seed: Seed): Directory => {
  const accommodations = new Map(seed.accommodations.map((listing) => [listing.accommodationId, listing]));
  const members = new Map(seed.members.map((member) => [member.uid, member]));

  return {
    getAccommodation: (accommodationId) => Promise.resolve(accommodations.get(accommodationId) ?? null),
    getMember: (uid) => Promise.resolve(members.get(uid) ?? null),
    listSpecialists: (university) =>
      Promise.resolve(
        seed.specialists.filter(
          (specialist) => canonicalUniversity(specialist.university) === canonicalUniversity(university)
        )
      )
  };
};

export const loadSeed = (seedFile: string): Promise<Seed> =>
  readFile(resolve(process.cwd(), seedFile), "utf8").then((text) => seedSchema.parse(JSON.parse(text)));
