import {
  GetCommand,
  PutCommand,
  ScanCommand,
  type DynamoDBDocumentClient
} from "@aws-sdk/lib-dynamodb";
import { match } from "ts-pattern";
import { z } from "zod";
import type {
  PageRequest,
  ProjectionOp,
  RatingFilter,
  ReadModel,
  ReservationFilter
} from "../application/ports.js";
import { InvalidCursorError } from "../application/ports.js";
import type { Rating, Reservation } from "../domain/types.js";
import { decodeCursor, encodeCursor } from "./cursor.js";
import { ratingRecordSchema, reservationRecordSchema } from "./records.js";

type Clause = {
  expression: string;
  names: Record<string, string>;
  values: Record<string, unknown>;
};

// DynamoDB rejects an empty ExpressionAttributeValues map.
const valuesOf = (clauses: Clause[]) => {
  const values = Object.fromEntries(clauses.flatMap(({ values }) => Object.entries(values)));
  return Object.keys(values).length === 0 ? {} : { ExpressionAttributeValues: values };
};

const toScanFilter = (clauses: Clause[]) =>
  clauses.length === 0
    ? {}
    : {
        FilterExpression: clauses.map(({ expression }) => expression).join(" AND "),
        ExpressionAttributeNames: Object.fromEntries(clauses.flatMap(({ names }) => Object.entries(names))),
        ...valuesOf(clauses)
      };

const equals = (attribute: string, value: string | undefined): Clause[] =>
  value === undefined
    ? []
    : [
        {
          expression: `#${attribute} = :${attribute}`,
          names: { [`#${attribute}`]: attribute },
          values: { [`:${attribute}`]: value }
        }
      ];

const reservationClauses = (filter: ReservationFilter): Clause[] => [
  ...equals("university", filter.university),
  ...equals("memberUid", filter.memberUid),
  ...equals("accommodationId", filter.accommodationId),
  ...(filter.statuses && filter.statuses.length > 0
    ? [
        {
          expression: `#status IN (${filter.statuses.map((_, index) => `:status${index}`).join(", ")})`,
          names: { "#status": "status" },
          values: Object.fromEntries(filter.statuses.map((status, index) => [`:status${index}`, status]))
        }
      ]
    : []),
  ...(filter.endingOnOrBefore === undefined
    ? []
    : [
        {
          expression: "#endDate <= :endingOnOrBefore",
          names: { "#endDate": "endDate" },
          values: { ":endingOnOrBefore": filter.endingOnOrBefore }
        }
      ])
];

const notRemoved: Clause = {
  expression: "attribute_not_exists(#removed)",
  names: { "#removed": "removed" },
  values: {}
};

const ratingClauses = (filter: RatingFilter): Clause[] => [
  notRemoved,
  ...equals("university", filter.university),
  ...equals("memberUid", filter.memberUid),
  ...equals("accommodationId", filter.accommodationId)
];

export const makeDynamoReadModel = ({
  ddb,
  tables
}: {
  ddb: DynamoDBDocumentClient;
  tables: { reservations: string; ratings: string };
}): ReadModel => {
  const getReservation = (reservationId: string) =>
    ddb
      .send(new GetCommand({ TableName: tables.reservations, Key: { reservationId } }))
      .then(({ Item }) => (Item ? reservationRecordSchema.parse(Item) : null));

  const getRating = (ratingId: string) =>
    ddb
      .send(new GetCommand({ TableName: tables.ratings, Key: { ratingId } }))
      .then(({ Item }) => (Item && Item.removed !== true ? ratingRecordSchema.parse(Item) : null));

  const scanPage = <T>(
    tableName: string,
    clauses: Clause[],
    page: PageRequest,
    parse: (item: unknown) => T
  ) =>
    Promise.resolve()
      .then(() =>
        ddb.send(
          new ScanCommand({
            TableName: tableName,
            Limit: page.limit,
            ExclusiveStartKey: decodeCursor(page.nextCursor),
            ...toScanFilter(clauses)
          })
        )
      )
      .then(({ Items, LastEvaluatedKey }) => ({
        items: (Items ?? []).map(parse),
        nextCursor: encodeCursor(LastEvaluatedKey)
      }));

  const listReservations = (filter: ReservationFilter, page: PageRequest) =>
    scanPage(tables.reservations, reservationClauses(filter), page, (item) =>
      reservationRecordSchema.parse(item)
    );

  const listRatings = (filter: RatingFilter, page: PageRequest) =>
    scanPage(tables.ratings, ratingClauses(filter), page, (item) => ratingRecordSchema.parse(item));

  // Rows remember the stream version they were written at; an older write loses the condition.
  const putIfNewer = (tableName: string, item: Record<string, unknown>, version: number) =>
    ddb
      .send(
        new PutCommand({
          TableName: tableName,
          Item: { ...item, version },
          ConditionExpression: "attribute_not_exists(#version) OR #version < :version",
          ExpressionAttributeNames: { "#version": "version" },
          ExpressionAttributeValues: { ":version": version }
        })
      )
      .then(() => undefined)
      .catch((error: unknown) =>
        error instanceof Error && error.name === "ConditionalCheckFailedException"
          ? undefined
          : Promise.reject(error)
      );

  const applyProjectionOps = (ops: ProjectionOp[]) =>
    ops.reduce<Promise<void>>(
      (promise, op) =>
        promise.then(() =>
          match(op)
            .with({ kind: "putReservation" }, ({ item, version }) => putIfNewer(tables.reservations, item, version))
            .with({ kind: "putRating" }, ({ item, version }) => putIfNewer(tables.ratings, item, version))
            // A tombstone rather than a delete, so a late put of the rating cannot bring it back.
            .with({ kind: "deleteRating" }, ({ ratingId, version }) =>
              putIfNewer(tables.ratings, { ratingId, removed: true }, version)
            )
            .exhaustive()
        ),
      Promise.resolve()
    );

  return { getReservation, listReservations, getRating, listRatings, applyProjectionOps };
};

// ==================== In-memory ====================

const offsetCursorSchema = z.object({ offset: z.number().int().nonnegative() });

const offsetOf = (cursor: string | undefined) => {
  const key = decodeCursor(cursor);
  if (key === undefined) {
    return 0;
  }
  const parsed = offsetCursorSchema.safeParse(key);
  if (!parsed.success) {
    throw new InvalidCursorError("nextCursor is not a cursor issued by this service");
  }
  return parsed.data.offset;
};

const pageOf = <T>(items: T[], page: PageRequest) => {
  const offset = offsetOf(page.nextCursor);
  const end = offset + page.limit;
  return {
    items: items.slice(offset, end),
    nextCursor: end < items.length ? encodeCursor({ offset: end }) : null
  };
};

const reservationMatches = (filter: ReservationFilter) => (reservation: Reservation) =>
  (filter.university === undefined || reservation.university === filter.university) &&
  (filter.memberUid === undefined || reservation.memberUid === filter.memberUid) &&
  (filter.accommodationId === undefined || reservation.accommodationId === filter.accommodationId) &&
  (filter.statuses === undefined || filter.statuses.length === 0 || filter.statuses.includes(reservation.status)) &&
  (filter.endingOnOrBefore === undefined || reservation.endDate <= filter.endingOnOrBefore);

const ratingMatches = (filter: RatingFilter) => (rating: Rating) =>
  (filter.university === undefined || rating.university === filter.university) &&
  (filter.memberUid === undefined || rating.memberUid === filter.memberUid) &&
  (filter.accommodationId === undefined || rating.accommodationId === filter.accommodationId);

const byCreation = (a: Reservation, b: Reservation) =>
  a.createdAtUtc.localeCompare(b.createdAtUtc) || a.reservationId.localeCompare(b.reservationId);

const byRatedAt = (a: Rating, b: Rating) =>
  a.ratedAtUtc.localeCompare(b.ratedAtUtc) || a.ratingId.localeCompare(b.ratingId);

type VersionedRow<T> = { version: number; item: T | null };

const writeIfNewer = <T>(rows: Map<string, VersionedRow<T>>, key: string, version: number, item: T | null) => {
  const current = rows.get(key);
  if (current === undefined || current.version < version) {
    rows.set(key, { version, item });
  }
};

const liveItems = <T>(rows: Map<string, VersionedRow<T>>) =>
  [...rows.values()].flatMap(({ item }) => (item === null ? [] : [item]));

export const makeMemoryReadModel = (): ReadModel => {
  const reservations = new Map<string, VersionedRow<Reservation>>();
  const ratings = new Map<string, VersionedRow<Rating>>();

  const applyProjectionOps = (ops: ProjectionOp[]) => {
    ops.forEach((op) =>
      match(op)
        .with({ kind: "putReservation" }, ({ item, version }) =>
          writeIfNewer(reservations, item.reservationId, version, item)
        )
        .with({ kind: "putRating" }, ({ item, version }) => writeIfNewer(ratings, item.ratingId, version, item))
        .with({ kind: "deleteRating" }, ({ ratingId, version }) => writeIfNewer(ratings, ratingId, version, null))
        .exhaustive()
    );
    return Promise.resolve();
  };

  return {
    getReservation: (reservationId) => Promise.resolve(reservations.get(reservationId)?.item ?? null),
    listReservations: (filter, page) =>
      Promise.resolve().then(() =>
        pageOf(liveItems(reservations).filter(reservationMatches(filter)).sort(byCreation), page)
      ),
    getRating: (ratingId) => Promise.resolve(ratings.get(ratingId)?.item ?? null),
    listRatings: (filter, page) =>
      Promise.resolve().then(() => pageOf(liveItems(ratings).filter(ratingMatches(filter)).sort(byRatedAt), page)),
    applyProjectionOps
  };
};
