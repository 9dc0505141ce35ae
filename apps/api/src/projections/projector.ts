import type { ProjectionOp } from "../application/ports.js";
import type { AccommodationState, RecordedAccommodationEvent } from "../domain/types.js";

/**
 * Every reservation and rating of the accommodation as of `version`. Each commit writes the
 * whole stream, so rows a failed projection missed are written by the next commit.
 */
export const projectState = (state: AccommodationState, version: number): ProjectionOp[] => [
  ...state.reservations.map((item): ProjectionOp => ({ kind: "putReservation", item, version })),
  ...state.ratings.map((item): ProjectionOp => ({ kind: "putRating", item, version }))
];

export const projectEvent = (
  event: RecordedAccommodationEvent,
  stateAfter: AccommodationState
): ProjectionOp[] => [
  ...projectState(stateAfter, event.version),
  ...(event.type === "RatingRemoved"
    ? [{ kind: "deleteRating", ratingId: event.payload.ratingId, version: event.version } satisfies ProjectionOp]
    : [])
];
