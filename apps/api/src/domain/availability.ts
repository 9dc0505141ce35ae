import { domainError } from "./error.js";
import type { AccommodationListing, DateRange, DomainError, Reservation, ReservationStatus } from "./types.js";

const ACTIVE_STATUSES: readonly ReservationStatus[] = ["pending", "confirmed"];

const toDay = (isoDate: string) => Date.parse(`${isoDate}T00:00:00.000Z`);

export const isActive = (status: ReservationStatus) => ACTIVE_STATUSES.includes(status);

export const isTerminal = (status: ReservationStatus) => !isActive(status);

/** Half-open ranges `[a1, a2)` and `[b1, b2)` overlap iff `a1 < b2 && b1 < a2`. */
export const overlaps = (left: DateRange, right: DateRange) =>
  toDay(left.startDate) < toDay(right.endDate) && toDay(right.startDate) < toDay(left.endDate);

export const isRangeOrdered = ({ startDate, endDate }: DateRange) => toDay(startDate) < toDay(endDate);

export const hasEnded = ({ endDate }: DateRange, today: string) => toDay(endDate) <= toDay(today);

export type Availability =
  | { free: true }
  | { free: false; conflictingReservationId: string };

export const checkAvailability = (
  reservations: readonly Reservation[],
  range: DateRange,
  excludeReservationId?: string
): Availability => {
  const conflict = reservations.find(
    (reservation) =>
      reservation.reservationId !== excludeReservationId &&
      isActive(reservation.status) &&
      overlaps(range, reservation)
  );
  return conflict === undefined
    ? { free: true }
    : { free: false, conflictingReservationId: conflict.reservationId };
};

export const checkWindow = (
  listing: Pick<AccommodationListing, "accommodationId" | "availableFrom" | "availableUntil">,
  range: DateRange
): DomainError | null =>
  toDay(range.startDate) < toDay(listing.availableFrom)
    ? domainError("DateRangeError", "START_BEFORE_AVAILABILITY", "Start date is before the accommodation is available", {
        accommodationId: listing.accommodationId,
        startDate: range.startDate,
        availableFrom: listing.availableFrom
      })
    : toDay(range.endDate) > toDay(listing.availableUntil)
      ? domainError("DateRangeError", "END_AFTER_AVAILABILITY", "End date is after the accommodation stops being available", {
          accommodationId: listing.accommodationId,
          endDate: range.endDate,
          availableUntil: listing.availableUntil
        })
      : null;
