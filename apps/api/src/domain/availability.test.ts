import { describe, expect, it } from "vitest";
import { checkAvailability, checkWindow, hasEnded, overlaps } from "./availability.js";
import type { Reservation, ReservationStatus } from "./types.js";

const reservation = (
  reservationId: string,
  startDate: string,
  endDate: string,
  status: ReservationStatus = "pending"
): Reservation => ({
  reservationId,
  accommodationId: "acc-1",
  memberUid: "m-1",
  university: "HKU",
  startDate,
  endDate,
  status,
  cancelledBy: null,
  createdAtUtc: "2026-01-01T00:00:00.000Z",
  updatedAtUtc: "2026-01-01T00:00:00.000Z"
});

describe("overlaps", () => {
  it("usa rangos semiabiertos [inicio, fin)", () => {
    const first = { startDate: "2026-05-01", endDate: "2026-05-05" };
    expect(overlaps(first, { startDate: "2026-05-05", endDate: "2026-05-08" })).toBe(false);
    expect(overlaps(first, { startDate: "2026-04-28", endDate: "2026-05-01" })).toBe(false);
    expect(overlaps(first, { startDate: "2026-05-04", endDate: "2026-05-06" })).toBe(true);
    expect(overlaps(first, { startDate: "2026-05-02", endDate: "2026-05-03" })).toBe(true);
  });

  it("es simétrica", () => {
    const left = { startDate: "2026-05-01", endDate: "2026-05-05" };
    const right = { startDate: "2026-05-03", endDate: "2026-05-10" };
    expect(overlaps(left, right)).toBe(overlaps(right, left));
  });
});

describe("checkAvailability", () => {
  const existing = [
    reservation("res-pending", "2026-05-01", "2026-05-05"),
    reservation("res-cancelled", "2026-06-01", "2026-06-05", "cancelled"),
    reservation("res-completed", "2026-07-01", "2026-07-05", "completed")
  ];

  it("informa la reserva activa en conflicto", () => {
    expect(checkAvailability(existing, { startDate: "2026-05-03", endDate: "2026-05-07" })).toEqual({
      free: false,
      conflictingReservationId: "res-pending"
    });
  });

  it("ignora reservas canceladas o completadas", () => {
    expect(checkAvailability(existing, { startDate: "2026-06-02", endDate: "2026-06-04" })).toEqual({ free: true });
    expect(checkAvailability(existing, { startDate: "2026-07-02", endDate: "2026-07-04" })).toEqual({ free: true });
  });

  it("puede excluir una reserva propia", () => {
    expect(
      checkAvailability(existing, { startDate: "2026-05-03", endDate: "2026-05-07" }, "res-pending")
    ).toEqual({ free: true });
  });
});

describe("checkWindow", () => {
  const listing = { accommodationId: "acc-1", availableFrom: "2026-03-01", availableUntil: "2026-08-31" };

  it("acepta rangos dentro de la ventana, incluidos los bordes", () => {
    expect(checkWindow(listing, { startDate: "2026-03-01", endDate: "2026-08-31" })).toBeNull();
  });

  it("distingue inicio temprano de fin tardío", () => {
    expect(checkWindow(listing, { startDate: "2026-02-28", endDate: "2026-03-05" })?.error.code).toBe(
      "START_BEFORE_AVAILABILITY"
    );
    expect(checkWindow(listing, { startDate: "2026-08-20", endDate: "2026-09-01" })?.error.code).toBe(
      "END_AFTER_AVAILABILITY"
    );
  });
});

describe("hasEnded", () => {
  it("considera terminada una reserva el mismo día de su fin", () => {
    const range = { startDate: "2026-05-01", endDate: "2026-05-05" };
    expect(hasEnded(range, "2026-05-04")).toBe(false);
    expect(hasEnded(range, "2026-05-05")).toBe(true);
    expect(hasEnded(range, "2026-06-01")).toBe(true);
  });
});
