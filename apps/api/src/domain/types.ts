import type {
  ActorKind,
  ErrorKind,
  ErrorShape,
  RatingView,
  ReservationStatus,
  ReservationView,
  RoleKind
} from "@campus-housing/shared";

export type { ActorKind, ErrorKind, ReservationStatus, RoleKind };
export type DomainError = ErrorShape;

export type Decision<T> =
  | { kind: "accepted"; event: T }
  | { kind: "rejected"; error: DomainError };

export type StreamType = "accommodation";

export type DomainEvent = { type: string; payload: unknown };

export type EventMetadata = {
  eventId: string;
  streamId: string;
  streamType: StreamType;
  version: number;
  occurredAtUtc: string;
  meta: Record<string, unknown>;
};

export type RecordedEvent<TEvent extends DomainEvent> = TEvent & EventMetadata;

export type Principal =
  | { kind: "member"; university: string; uid: string }
  | { kind: "specialist"; university: string; specialistId: string | null };

export type DateRange = { startDate: string; endDate: string };

export type Reservation = ReservationView;

export type Rating = RatingView;

export type AccommodationListing = {
  accommodationId: string;
  universities: string[];
  availableFrom: string;
  availableUntil: string;
  type?: string;
  address?: string;
  dailyPrice?: number;
  beds?: number;
  bedrooms?: number;
};

export type MemberRecord = {
  uid: string;
  name: string;
  university: string;
};

export type SpecialistRecord = {
  specialistId: string;
  name: string;
  email?: string;
  university: string;
};

export type AccommodationState = {
  accommodationId: string;
  reservations: Reservation[];
  ratings: Rating[];
};

export type TransitionTarget = Exclude<ReservationStatus, "pending">;

export type AccommodationCommand =
  | {
      type: "CreateReservation";
      reservationId: string;
      principal: Principal;
      listing: AccommodationListing;
      member: MemberRecord;
      startDate: string;
      endDate: string;
      nowUtc: string;
    }
  | {
      type: "TransitionReservation";
      reservationId: string;
      principal: Principal;
      toStatus: TransitionTarget;
      nowUtc: string;
    }
  | {
      type: "CompleteElapsedReservation";
      reservationId: string;
      today: string;
      nowUtc: string;
    }
  | {
      type: "SubmitRating";
      ratingId: string;
      reservationId: string;
      principal: Principal;
      score: number;
      comment: string | null;
      today: string;
      nowUtc: string;
    }
  | {
      type: "RemoveRating";
      ratingId: string;
      principal: Principal;
      nowUtc: string;
    };

export type AccommodationEvent =
  | {
      type: "ReservationCreated";
      payload: { reservation: Reservation };
    }
  | {
      type: "ReservationStatusChanged";
      payload: {
        reservationId: string;
        fromStatus: ReservationStatus;
        toStatus: ReservationStatus;
        actor: ActorKind;
        changedAtUtc: string;
      };
    }
  | {
      type: "RatingSubmitted";
      payload: {
        rating: Rating;
        completedReservation: boolean;
      };
    }
  | {
      type: "RatingRemoved";
      payload: {
        ratingId: string;
        reservationId: string;
        removedAtUtc: string;
      };
    };

export type RecordedAccommodationEvent = RecordedEvent<AccommodationEvent>;
