import { describe, expect, it } from "vitest";
import { decideAccommodation, emptyAccommodation, foldAccommodation } from "./accommodation-decider.js";
import { scoreViolation } from "./rating-decider.js";
import type {
  AccommodationCommand,
  AccommodationEvent,
  AccommodationState,
  Decision,
  Principal,
  Rating,
  Reservation,
  ReservationStatus
} from "./types.js";

const NOW = "2026-06-10T09:30:00.000Z";
const TODAY = "2026-06-10";

const owner: Principal = { kind: "member", university: "HKU", uid: "m-1" };
const stranger: Principal = { kind: "member", university: "HKU", uid: "m-2" };
const specialist: Principal = { kind: "specialist", university: "HKU", specialistId: "s-1" };
const foreignSpecialist: Principal = { kind: "specialist", university: "CUHK", specialistId: "s-9" };

const reservation = (status: ReservationStatus, endDate = "2026-06-01"): Reservation => ({
  reservationId: "res-1",
  accommodationId: "acc-1",
  memberUid: "m-1",
  university: "HKU",
  startDate: "2026-05-25",
  endDate,
  status,
  cancelledBy: null,
  createdAtUtc: "2026-05-01T00:00:00.000Z",
  updatedAtUtc: "2026-05-01T00:00:00.000Z"
});

const existingRating: Rating = {
  ratingId: "rat-1",
  reservationId: "res-1",
  accommodationId: "acc-1",
  memberUid: "m-1",
  university: "HKU",
  score: 4,
  comment: null,
  ratedAtUtc: "2026-06-02T00:00:00.000Z"
};

const stateWith = (reservations: Reservation[], ratings: Rating[] = []): AccommodationState => ({
  ...emptyAccommodation("acc-1"),
  reservations,
  ratings
});

const submit = (principal: Principal, score = 5, reservationId = "res-1"): AccommodationCommand => ({
  type: "SubmitRating",
  ratingId: "rat-new",
  reservationId,
  principal,
  score,
  comment: "Quiet and close to campus",
  today: TODAY,
  nowUtc: NOW
});

const remove = (principal: Principal, ratingId = "rat-1"): AccommodationCommand => ({
  type: "RemoveRating",
  ratingId,
  principal,
  nowUtc: NOW
});

const codeOf = (decision: Decision<AccommodationEvent>) =>
  decision.kind === "rejected" ? decision.error.error.code : "accepted";

describe("scoreViolation", () => {
  it("acepta enteros de 0 a 5", () => {
    expect([0, 1, 2, 3, 4, 5].map(scoreViolation)).toEqual([null, null, null, null, null, null]);
  });

  it("distingue fuera de rango de no entero", () => {
    expect(scoreViolation(6)?.error.code).toBe("SCORE_OUT_OF_RANGE");
    expect(scoreViolation(-1)?.error.code).toBe("SCORE_OUT_OF_RANGE");
    expect(scoreViolation(3.5)?.error.code).toBe("SCORE_NOT_INTEGER");
    expect(scoreViolation(3.5)?.error.kind).toBe("ScoreRangeError");
  });
});

describe("decideAccommodation: SubmitRating", () => {
  it("el dueño califica una reserva completada", () => {
    const decision = decideAccommodation(stateWith([reservation("completed")]), submit(owner));
    expect(decision).toEqual({
      kind: "accepted",
      event: {
        type: "RatingSubmitted",
        payload: {
          rating: {
            ratingId: "rat-new",
            reservationId: "res-1",
            accommodationId: "acc-1",
            memberUid: "m-1",
            university: "HKU",
            score: 5,
            comment: "Quiet and close to campus",
            ratedAtUtc: NOW
          },
          completedReservation: false
        }
      }
    });
  });

  it("completa de forma diferida una reserva activa que ya terminó", () => {
    const state = stateWith([reservation("confirmed")]);
    const decision = decideAccommodation(state, submit(owner));
    expect(decision.kind === "accepted" && decision.event.type === "RatingSubmitted"
      ? decision.event.payload.completedReservation
      : null).toBe(true);
    if (decision.kind === "accepted") {
      const after = foldAccommodation(state, decision.event);
      expect(after.reservations[0]?.status).toBe("completed");
      expect(after.reservations[0]?.updatedAtUtc).toBe(NOW);
      expect(after.ratings.map((rating) => rating.ratingId)).toEqual(["rat-new"]);
    }
  });

  it("no califica reservas activas que no han terminado", () => {
    expect(codeOf(decideAccommodation(stateWith([reservation("pending", "2026-06-20")]), submit(owner)))).toBe(
      "RESERVATION_NOT_COMPLETED"
    );
  });

  it("no califica reservas canceladas aunque hayan terminado", () => {
    expect(codeOf(decideAccommodation(stateWith([reservation("cancelled")]), submit(owner)))).toBe(
      "RESERVATION_NOT_COMPLETED"
    );
  });

  it("rechaza una segunda calificación", () => {
    const decision = decideAccommodation(stateWith([reservation("completed")], [existingRating]), submit(owner));
    expect(decision.kind === "rejected" ? decision.error.error : null).toEqual({
      kind: "DuplicateRatingError",
      code: "DUPLICATE_RATING",
      reason: "This reservation has already been rated",
      meta: { reservationId: "res-1" }
    });
  });

  it("informa el puntaje inválido antes que el duplicado", () => {
    expect(
      codeOf(decideAccommodation(stateWith([reservation("completed")], [existingRating]), submit(owner, 9)))
    ).toBe("SCORE_OUT_OF_RANGE");
  });

  it("informa el duplicado antes que el rol", () => {
    expect(
      codeOf(decideAccommodation(stateWith([reservation("completed")], [existingRating]), submit(specialist)))
    ).toBe("DUPLICATE_RATING");
  });

  it("solo miembros califican", () => {
    expect(codeOf(decideAccommodation(stateWith([reservation("completed")]), submit(specialist)))).toBe(
      "MEMBER_ROLE_REQUIRED"
    );
  });

  it("solo el dueño califica su reserva", () => {
    expect(codeOf(decideAccommodation(stateWith([reservation("completed")]), submit(stranger)))).toBe(
      "RATING_NOT_OWNER"
    );
  });

  it("informa reservas inexistentes", () => {
    expect(codeOf(decideAccommodation(stateWith([]), submit(owner, 4, "missing")))).toBe("RESERVATION_NOT_FOUND");
  });
});

describe("decideAccommodation: RemoveRating", () => {
  const state = stateWith([reservation("completed")], [existingRating]);

  it("un especialista de la universidad elimina la calificación", () => {
    const decision = decideAccommodation(state, remove(specialist));
    expect(decision).toEqual({
      kind: "accepted",
      event: {
        type: "RatingRemoved",
        payload: { ratingId: "rat-1", reservationId: "res-1", removedAtUtc: NOW }
      }
    });
    if (decision.kind === "accepted") {
      expect(foldAccommodation(state, decision.event).ratings).toEqual([]);
    }
  });

  it("permite calificar de nuevo tras eliminar", () => {
    const decision = decideAccommodation(state, remove(specialist));
    const after = decision.kind === "accepted" ? foldAccommodation(state, decision.event) : state;
    expect(codeOf(decideAccommodation(after, submit(owner, 3)))).toBe("accepted");
  });

  it("los miembros no eliminan calificaciones", () => {
    expect(codeOf(decideAccommodation(state, remove(owner)))).toBe("SPECIALIST_ROLE_REQUIRED");
  });

  it("especialistas de otra universidad no eliminan", () => {
    expect(codeOf(decideAccommodation(state, remove(foreignSpecialist)))).toBe("RATING_ACCESS_DENIED");
  });

  it("informa calificaciones inexistentes", () => {
    expect(codeOf(decideAccommodation(state, remove(specialist, "rat-missing")))).toBe("RATING_NOT_FOUND");
  });
});
