import { match } from "ts-pattern";
import { canAccessReservation } from "./access.js";
import { checkAvailability, checkWindow, hasEnded, isRangeOrdered, isTerminal } from "./availability.js";
import { accepted, domainError, forbidden, illegalTransition, invalid, notFound, rejected } from "./error.js";
import { canonicalUniversity, sameUniversity } from "./role-resolver.js";
import type {
  AccommodationCommand,
  AccommodationEvent,
  AccommodationState,
  Decision,
  DomainError,
  Principal,
  Reservation,
  ReservationStatus,
  RoleKind,
  TransitionTarget
} from "./types.js";

type CreateReservation = Extract<AccommodationCommand, { type: "CreateReservation" }>;
type TransitionReservation = Extract<AccommodationCommand, { type: "TransitionReservation" }>;
type CompleteElapsedReservation = Extract<AccommodationCommand, { type: "CompleteElapsedReservation" }>;

export const findReservation = (state: AccommodationState, reservationId: string) =>
  state.reservations.find((reservation) => reservation.reservationId === reservationId);

export const reservationNotFound = (reservationId: string) =>
  notFound("RESERVATION_NOT_FOUND", "Reservation does not exist", { reservationId });

export const terminalStatus = (reservation: Reservation) =>
  illegalTransition("TERMINAL_STATUS", `Cannot change status from '${reservation.status}'`, {
    reservationId: reservation.reservationId,
    status: reservation.status
  });

/**
 * Role-dependent rules for leaving a non-terminal status. Returns the violated rule, or null
 * when the actor may move the reservation from `from` to `to`.
 */
export const transitionRuleViolation = (
  actor: RoleKind,
  from: ReservationStatus,
  to: TransitionTarget
): DomainError | null =>
  match<[RoleKind, TransitionTarget], DomainError | null>([actor, to])
    .with(["member", "cancelled"], () =>
      from === "pending"
        ? null
        : illegalTransition(
            "MEMBER_CANCEL_REQUIRES_PENDING",
            "Members can only cancel pending reservations; ask a specialist to cancel a confirmed one",
            { from, to }
          )
    )
    .with(["specialist", "cancelled"], () => null)
    .with(["member", "confirmed"], () =>
      illegalTransition("MEMBER_CANNOT_CONFIRM", "Only specialists can confirm reservations", { from, to })
    )
    .with(["specialist", "confirmed"], () =>
      from === "pending"
        ? null
        : illegalTransition("CONFIRM_REQUIRES_PENDING", "Only pending reservations can be confirmed", { from, to })
    )
    .with(["member", "completed"], () =>
      illegalTransition("MEMBER_CANNOT_COMPLETE", "Members cannot complete reservations", { from, to })
    )
    .with(["specialist", "completed"], () =>
      from === "confirmed"
        ? null
        : illegalTransition("COMPLETE_REQUIRES_CONFIRMED", "Only confirmed reservations can be completed", {
            from,
            to
          })
    )
    .exhaustive();

const memberScopeViolation = (principal: Principal, command: CreateReservation) =>
  match(principal)
    .with({ kind: "member" }, ({ uid, university }) =>
      command.member.uid !== uid || !sameUniversity(command.member.university, university)
        ? forbidden("MEMBER_UNIVERSITY_MISMATCH", "Role token does not match the member record", {
            memberUid: command.member.uid
          })
        : null
    )
    .with({ kind: "specialist" }, ({ university }) =>
      sameUniversity(command.member.university, university)
        ? null
        : forbidden("MEMBER_OUTSIDE_UNIVERSITY", "Specialists can only reserve for members of their university", {
            memberUid: command.member.uid,
            university
          })
    )
    .exhaustive();

export const decideCreateReservation = (
  state: AccommodationState,
  command: CreateReservation
): Decision<AccommodationEvent> => {
  const { listing, member, startDate, endDate } = command;
  const range = { startDate, endDate };
  const scopeError = memberScopeViolation(command.principal, command);
  if (scopeError !== null) {
    return rejected(scopeError);
  }
  if (!isRangeOrdered(range)) {
    return rejected(
      domainError("DateRangeError", "INVALID_DATE_RANGE", "End date must be after start date", range)
    );
  }
  if (!listing.universities.some((code) => sameUniversity(code, member.university))) {
    return rejected(
      invalid("ACCOMMODATION_NOT_OFFERED", "Accommodation is not offered at the member's university", {
        accommodationId: listing.accommodationId,
        university: member.university
      })
    );
  }
  const windowError = checkWindow(listing, range);
  if (windowError !== null) {
    return rejected(windowError);
  }
  const availability = checkAvailability(state.reservations, range);
  if (!availability.free) {
    return rejected(
      domainError(
        "OverlapConflictError",
        "RESERVATION_OVERLAP",
        "Accommodation is not available for the selected dates due to an existing reservation",
        {
          accommodationId: listing.accommodationId,
          conflictingReservationId: availability.conflictingReservationId
        }
      )
    );
  }
  return accepted({
    type: "ReservationCreated",
    payload: {
      reservation: {
        reservationId: command.reservationId,
        accommodationId: listing.accommodationId,
        memberUid: member.uid,
        university: canonicalUniversity(member.university),
        startDate,
        endDate,
        status: "pending",
        cancelledBy: null,
        createdAtUtc: command.nowUtc,
        updatedAtUtc: command.nowUtc
      }
    }
  });
};

export const decideTransition = (
  state: AccommodationState,
  command: TransitionReservation
): Decision<AccommodationEvent> => {
  const reservation = findReservation(state, command.reservationId);
  if (reservation === undefined) {
    return rejected(reservationNotFound(command.reservationId));
  }
  if (isTerminal(reservation.status)) {
    return rejected(terminalStatus(reservation));
  }
  if (!canAccessReservation(command.principal, reservation)) {
    return rejected(
      forbidden(
        "RESERVATION_ACCESS_DENIED",
        "You cannot access reservations belonging to other users or universities",
        { reservationId: reservation.reservationId }
      )
    );
  }
  const violation = transitionRuleViolation(command.principal.kind, reservation.status, command.toStatus);
  return violation !== null
    ? rejected(violation)
    : accepted({
        type: "ReservationStatusChanged",
        payload: {
          reservationId: reservation.reservationId,
          fromStatus: reservation.status,
          toStatus: command.toStatus,
          actor: command.principal.kind,
          changedAtUtc: command.nowUtc
        }
      });
};

export const decideCompleteElapsed = (
  state: AccommodationState,
  command: CompleteElapsedReservation
): Decision<AccommodationEvent> => {
  const reservation = findReservation(state, command.reservationId);
  return reservation === undefined
    ? rejected(reservationNotFound(command.reservationId))
    : isTerminal(reservation.status)
      ? rejected(terminalStatus(reservation))
      : !hasEnded(reservation, command.today)
        ? rejected(
            illegalTransition("COMPLETION_NOT_DUE", "Reservation has not ended yet", {
              reservationId: reservation.reservationId,
              endDate: reservation.endDate,
              today: command.today
            })
          )
        : accepted({
            type: "ReservationStatusChanged",
            payload: {
              reservationId: reservation.reservationId,
              fromStatus: reservation.status,
              toStatus: "completed",
              actor: "system",
              changedAtUtc: command.nowUtc
            }
          });
};
