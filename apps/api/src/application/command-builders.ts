import { invalid, notFound } from "../domain/error.js";
import type {
  AccommodationCommand,
  AccommodationListing,
  DomainError,
  MemberRecord,
  Principal,
  TransitionTarget
} from "../domain/types.js";

export type BuildResult<T> = { kind: "ok"; value: T } | { kind: "error"; error: DomainError };

const ok = <T>(value: T): BuildResult<T> => ({ kind: "ok", value });

const failed = <T>(error: DomainError): BuildResult<T> => ({ kind: "error", error });

/** The member a create request is for: the principal itself, or the `memberUid` a specialist names. */
export const reservationMemberUid = (principal: Principal, memberUid: string | undefined) =>
  principal.kind === "member" ? principal.uid : memberUid;

export const buildCreateReservationCommand = ({
  principal,
  accommodationId,
  memberUid,
  member,
  listing,
  startDate,
  endDate,
  reservationId,
  nowUtc
}: {
  principal: Principal;
  accommodationId: string;
  memberUid: string | undefined;
  member: MemberRecord | null;
  listing: AccommodationListing | null;
  startDate: string;
  endDate: string;
  reservationId: string;
  nowUtc: string;
}): BuildResult<AccommodationCommand> => {
  if (memberUid === undefined) {
    return failed(invalid("MEMBER_UID_REQUIRED", "Specialists must name the member the reservation is for"));
  }
  if (member === null) {
    return failed(notFound("MEMBER_NOT_FOUND", "Member does not exist", { memberUid }));
  }
  if (listing === null) {
    return failed(notFound("ACCOMMODATION_NOT_FOUND", "Accommodation does not exist", { accommodationId }));
  }
  return ok({
    type: "CreateReservation",
    reservationId,
    principal,
    listing,
    member,
    startDate,
    endDate,
    nowUtc
  });
};

export const buildTransitionCommand = ({
  principal,
  reservationId,
  toStatus,
  nowUtc
}: {
  principal: Principal;
  reservationId: string;
  toStatus: TransitionTarget;
  nowUtc: string;
}): AccommodationCommand => ({
  type: "TransitionReservation",
  reservationId,
  principal,
  toStatus,
  nowUtc
});

export const buildCompleteElapsedCommand = ({
  reservationId,
  nowUtc
}: {
  reservationId: string;
  nowUtc: string;
}): AccommodationCommand => ({
  type: "CompleteElapsedReservation",
  reservationId,
  today: nowUtc.slice(0, 10),
  nowUtc
});

export const buildSubmitRatingCommand = ({
  principal,
  ratingId,
  reservationId,
  score,
  comment,
  nowUtc
}: {
  principal: Principal;
  ratingId: string;
  reservationId: string;
  score: number;
  comment: string | undefined;
  nowUtc: string;
}): AccommodationCommand => ({
  type: "SubmitRating",
  ratingId,
  reservationId,
  principal,
  score,
  comment: comment === undefined || comment.trim().length === 0 ? null : comment.trim(),
  today: nowUtc.slice(0, 10),
  nowUtc
});

export const buildRemoveRatingCommand = ({
  principal,
  ratingId,
  nowUtc
}: {
  principal: Principal;
  ratingId: string;
  nowUtc: string;
}): AccommodationCommand => ({
  type: "RemoveRating",
  ratingId,
  principal,
  nowUtc
});
