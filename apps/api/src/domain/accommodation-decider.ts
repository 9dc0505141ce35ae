import { match } from "ts-pattern";
import { decideRemoveRating, decideSubmitRating } from "./rating-decider.js";
import { decideCompleteElapsed, decideCreateReservation, decideTransition } from "./reservation-decider.js";
import type {
  AccommodationCommand,
  AccommodationEvent,
  AccommodationState,
  Decision,
  Reservation
} from "./types.js";

export const emptyAccommodation = (accommodationId: string): AccommodationState => ({
  accommodationId,
  reservations: [],
  ratings: []
});

const updateReservation = (
  state: AccommodationState,
  reservationId: string,
  update: (reservation: Reservation) => Reservation
): Reservation[] =>
  state.reservations.map((reservation) =>
    reservation.reservationId === reservationId ? update(reservation) : reservation
  );

export const foldAccommodation = (
  state: AccommodationState,
  event: AccommodationEvent
): AccommodationState =>
  match<AccommodationEvent, AccommodationState>(event)
    .with({ type: "ReservationCreated" }, ({ payload }) => ({
      ...state,
      reservations: [...state.reservations, payload.reservation]
    }))
    .with({ type: "ReservationStatusChanged" }, ({ payload }) => ({
      ...state,
      reservations: updateReservation(state, payload.reservationId, (reservation) => ({
        ...reservation,
        status: payload.toStatus,
        cancelledBy:
          payload.toStatus === "cancelled" && payload.actor !== "system" ? payload.actor : reservation.cancelledBy,
        updatedAtUtc: payload.changedAtUtc
      }))
    }))
    .with({ type: "RatingSubmitted" }, ({ payload: { rating, completedReservation } }) => ({
      ...state,
      reservations: completedReservation
        ? updateReservation(state, rating.reservationId, (reservation) => ({
            ...reservation,
            status: "completed",
            updatedAtUtc: rating.ratedAtUtc
          }))
        : state.reservations,
      ratings: [...state.ratings, rating]
    }))
    .with({ type: "RatingRemoved" }, ({ payload }) => ({
      ...state,
      ratings: state.ratings.filter((rating) => rating.ratingId !== payload.ratingId)
    }))
    .exhaustive();

export const decideAccommodation = (
  state: AccommodationState,
  command: AccommodationCommand
): Decision<AccommodationEvent> =>
  match<AccommodationCommand, Decision<AccommodationEvent>>(command)
    .with({ type: "CreateReservation" }, (cmd) => decideCreateReservation(state, cmd))
    .with({ type: "TransitionReservation" }, (cmd) => decideTransition(state, cmd))
    .with({ type: "CompleteElapsedReservation" }, (cmd) => decideCompleteElapsed(state, cmd))
    .with({ type: "SubmitRating" }, (cmd) => decideSubmitRating(state, cmd))
    .with({ type: "RemoveRating" }, (cmd) => decideRemoveRating(state, cmd))
    .exhaustive();
