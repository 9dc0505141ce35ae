import type { CursorPage, UniversityView } from "@campus-housing/shared";
import type {
  AccommodationListing,
  DomainError,
  DomainEvent,
  MemberRecord,
  Rating,
  RecordedEvent,
  Reservation,
  ReservationStatus,
  SpecialistRecord,
  StreamType
} from "../domain/types.js";

// ==================== Event store ====================

export class VersionConflictError extends Error {
  readonly type = "VERSION_CONFLICT";
}

export type EventStore<TEvent extends DomainEvent> = {
  loadStream: (streamType: StreamType, streamId: string) => Promise<RecordedEvent<TEvent>[]>;
  /** Rejects with VersionConflictError when the stream is no longer at `expectedVersion`. */
  appendEvent: (recordedEvent: RecordedEvent<TEvent>, expectedVersion: number) => Promise<void>;
};

// ==================== Read model ====================

export type ReservationFilter = {
  university?: string;
  memberUid?: string;
  accommodationId?: string;
  statuses?: readonly ReservationStatus[];
  endingOnOrBefore?: string;
};

export type RatingFilter = {
  university?: string;
  memberUid?: string;
  accommodationId?: string;
};

export type PageRequest = { limit: number; nextCursor?: string };

export class InvalidCursorError extends Error {
  readonly type = "INVALID_CURSOR";
}

/**
 * Every op carries the stream version it was projected at. Adapters drop an op when the row
 * already holds that version or a newer one, so late writes cannot roll a row back.
 */
export type ProjectionOp =
  | { kind: "putReservation"; item: Reservation; version: number }
  | { kind: "putRating"; item: Rating; version: number }
  | { kind: "deleteRating"; ratingId: string; version: number };

export type ReadModel = {
  getReservation: (reservationId: string) => Promise<Reservation | null>;
  listReservations: (filter: ReservationFilter, page: PageRequest) => Promise<CursorPage<Reservation>>;
  getRating: (ratingId: string) => Promise<Rating | null>;
  listRatings: (filter: RatingFilter, page: PageRequest) => Promise<CursorPage<Rating>>;
  applyProjectionOps: (ops: ProjectionOp[]) => Promise<void>;
};

// ==================== Stream index ====================

export type IndexedEntity = "reservation" | "rating";

/** Maps reservation and rating ids to the accommodation stream that owns them. */
export type StreamIndex = {
  recordStream: (entity: IndexedEntity, entityId: string, accommodationId: string) => Promise<void>;
  locateStream: (entity: IndexedEntity, entityId: string) => Promise<string | null>;
};

// ==================== Collaborators ====================

export type Directory = {
  getAccommodation: (accommodationId: string) => Promise<AccommodationListing | null>;
  getMember: (uid: string) => Promise<MemberRecord | null>;
  listSpecialists: (university: string) => Promise<SpecialistRecord[]>;
};

export type ReferenceData = {
  universities: UniversityView[];
};

// ==================== Idempotency ====================

export type IdempotencyRecord = {
  idempotencyKey: string;
  contentHash: string;
  statusCode: number;
  responseBody: unknown;
  createdAtUtc: string;
};

export type IdempotencyDecision =
  | { kind: "new"; contentHash: string }
  | { kind: "replay"; record: IdempotencyRecord }
  | { kind: "mismatch"; error: DomainError };

export type IdempotencyStore = {
  loadIdempotency: (idempotencyKey: string) => Promise<IdempotencyRecord | null>;
  saveIdempotency: (record: IdempotencyRecord) => Promise<IdempotencyRecord>;
  idempotencyDecision: (
    existing: IdempotencyRecord | null,
    idempotencyKey: string,
    content: unknown
  ) => IdempotencyDecision;
};
