import { canAccessReservation } from "./access.js";
import { hasEnded, isActive } from "./availability.js";
import { accepted, domainError, forbidden, invalid, notFound, rejected } from "./error.js";
import { findReservation, reservationNotFound } from "./reservation-decider.js";
import { sameUniversity } from "./role-resolver.js";
import type { AccommodationCommand, AccommodationEvent, AccommodationState, Decision, DomainError } from "./types.js";

type SubmitRating = Extract<AccommodationCommand, { type: "SubmitRating" }>;
type RemoveRating = Extract<AccommodationCommand, { type: "RemoveRating" }>;

export const MIN_SCORE = 0;
export const MAX_SCORE = 5;

export const scoreViolation = (score: number): DomainError | null =>
  !Number.isInteger(score)
    ? domainError("ScoreRangeError", "SCORE_NOT_INTEGER", "Score must be a whole number", { score })
    : score < MIN_SCORE || score > MAX_SCORE
      ? domainError("ScoreRangeError", "SCORE_OUT_OF_RANGE", `Score must be between ${MIN_SCORE} and ${MAX_SCORE}`, {
          score
        })
      : null;

// Score first, then the duplicate check, so a second rating is always reported as a duplicate
// whoever sends it.
export const decideSubmitRating = (
  state: AccommodationState,
  command: SubmitRating
): Decision<AccommodationEvent> => {
  const invalidScore = scoreViolation(command.score);
  if (invalidScore !== null) {
    return rejected(invalidScore);
  }
  const reservation = findReservation(state, command.reservationId);
  if (reservation === undefined) {
    return rejected(reservationNotFound(command.reservationId));
  }
  if (state.ratings.some((rating) => rating.reservationId === reservation.reservationId)) {
    return rejected(
      domainError("DuplicateRatingError", "DUPLICATE_RATING", "This reservation has already been rated", {
        reservationId: reservation.reservationId
      })
    );
  }
  const { principal } = command;
  if (principal.kind !== "member") {
    return rejected(forbidden("MEMBER_ROLE_REQUIRED", "Only members can rate reservations"));
  }
  if (!canAccessReservation(principal, reservation)) {
    return rejected(
      forbidden("RATING_NOT_OWNER", "You can only rate your own reservations", {
        reservationId: reservation.reservationId
      })
    );
  }
  const lazilyCompleted = isActive(reservation.status) && hasEnded(reservation, command.today);
  if (reservation.status !== "completed" && !lazilyCompleted) {
    return rejected(
      invalid("RESERVATION_NOT_COMPLETED", "You can only rate completed reservations", {
        reservationId: reservation.reservationId,
        status: reservation.status
      })
    );
  }
  return accepted({
    type: "RatingSubmitted",
    payload: {
      rating: {
        ratingId: command.ratingId,
        reservationId: reservation.reservationId,
        accommodationId: reservation.accommodationId,
        memberUid: reservation.memberUid,
        university: reservation.university,
        score: command.score,
        comment: command.comment,
        ratedAtUtc: command.nowUtc
      },
      completedReservation: lazilyCompleted
    }
  });
};

export const decideRemoveRating = (
  state: AccommodationState,
  command: RemoveRating
): Decision<AccommodationEvent> => {
  const rating = state.ratings.find((candidate) => candidate.ratingId === command.ratingId);
  if (rating === undefined) {
    return rejected(notFound("RATING_NOT_FOUND", "Rating does not exist", { ratingId: command.ratingId }));
  }
  const { principal } = command;
  return principal.kind !== "specialist"
    ? rejected(forbidden("SPECIALIST_ROLE_REQUIRED", "Only specialists can remove ratings"))
    : !sameUniversity(rating.university, principal.university)
      ? rejected(
          forbidden("RATING_ACCESS_DENIED", "Specialists can only remove ratings of their university", {
            ratingId: rating.ratingId
          })
        )
      : accepted({
          type: "RatingRemoved",
          payload: {
            ratingId: rating.ratingId,
            reservationId: rating.reservationId,
            removedAtUtc: command.nowUtc
          }
        });
};
