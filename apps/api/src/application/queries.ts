import type { RatingSummary, ReservationStatus } from "@campus-housing/shared";
import { canAccessReservation, readScopeOf } from "../domain/index.js";
import { forbidden, notFound } from "../domain/error.js";
import type { Principal } from "../domain/types.js";
import { badRequest, domainErrorResponse, response, type HttpResponse } from "./pipeline.js";
import type { AccommodationWorkflow } from "./accommodation-workflow.js";
import { InvalidCursorError, type ReadModel, type ReferenceData, type StreamIndex } from "./ports.js";

export type QueryDeps = {
  readModel: Pick<ReadModel, "getReservation" | "listReservations" | "getRating" | "listRatings">;
  workflow: Pick<AccommodationWorkflow, "loadState" | "refreshProjection">;
  streamIndex: Pick<StreamIndex, "locateStream">;
  referenceData: ReferenceData;
  pageLimitDefault: number;
};

export type ReservationListQuery = {
  memberUid?: string;
  accommodationId?: string;
  status?: ReservationStatus;
  limit?: number;
  nextCursor?: string;
};

export type RatingListQuery = {
  memberUid?: string;
  accommodationId?: string;
  limit?: number;
  nextCursor?: string;
};

const withCursorErrors = (promise: Promise<HttpResponse>) =>
  promise.catch((error: unknown) =>
    error instanceof InvalidCursorError
      ? domainErrorResponse(badRequest(error.message, { field: "nextCursor" }))
      : Promise.reject(error)
  );

/** Rounded to two decimals; null when nothing has been rated. */
export const summarizeScores = (accommodationId: string, scores: number[]): RatingSummary => ({
  accommodationId,
  average:
    scores.length === 0
      ? null
      : Math.round((scores.reduce((sum, score) => sum + score, 0) / scores.length) * 100) / 100,
  count: scores.length
});

export const makeQueries = (deps: QueryDeps) => {
  const pageOf = (limit: number | undefined, nextCursor: string | undefined) => ({
    limit: limit ?? deps.pageLimitDefault,
    nextCursor
  });

  // A row missing from the read model is looked up in its stream, and the stream is projected again.
  const recoverReservation = (reservationId: string) =>
    deps.streamIndex
      .locateStream("reservation", reservationId)
      .then((accommodationId) =>
        accommodationId === null
          ? null
          : deps.workflow
              .refreshProjection(accommodationId)
              .then(({ reservations }) => reservations.find((item) => item.reservationId === reservationId) ?? null)
      );

  const recoverRating = (ratingId: string) =>
    deps.streamIndex
      .locateStream("rating", ratingId)
      .then((accommodationId) =>
        accommodationId === null
          ? null
          : deps.workflow
              .refreshProjection(accommodationId)
              .then(({ ratings }) => ratings.find((item) => item.ratingId === ratingId) ?? null)
      );

  const getReservation = (principal: Principal, reservationId: string): Promise<HttpResponse> =>
    deps.readModel
      .getReservation(reservationId)
      .then((found) => found ?? recoverReservation(reservationId))
      .then((reservation) =>
        reservation === null
          ? domainErrorResponse(notFound("RESERVATION_NOT_FOUND", "Reservation does not exist", { reservationId }))
          : canAccessReservation(principal, reservation)
            ? response(200, { item: reservation })
            : domainErrorResponse(
                forbidden(
                  "RESERVATION_ACCESS_DENIED",
                  "You cannot access reservations belonging to other users or universities",
                  { reservationId }
                )
              )
      );

  // A member asking for someone else's reservations gets an empty page, not an error.
  const listReservations = (principal: Principal, query: ReservationListQuery): Promise<HttpResponse> => {
    const scope = readScopeOf(principal);
    if (scope.memberUid !== undefined && query.memberUid !== undefined && query.memberUid !== scope.memberUid) {
      return Promise.resolve(response(200, { items: [], nextCursor: null }));
    }
    return withCursorErrors(
      deps.readModel
        .listReservations(
          {
            university: scope.university,
            memberUid: scope.memberUid ?? query.memberUid,
            accommodationId: query.accommodationId,
            statuses: query.status === undefined ? undefined : [query.status]
          },
          pageOf(query.limit, query.nextCursor)
        )
        .then((page) => response(200, page))
    );
  };

  const getRating = (principal: Principal, ratingId: string): Promise<HttpResponse> =>
    deps.readModel
      .getRating(ratingId)
      .then((found) => found ?? recoverRating(ratingId))
      .then((rating) =>
        rating === null
          ? domainErrorResponse(notFound("RATING_NOT_FOUND", "Rating does not exist", { ratingId }))
          : canAccessReservation(principal, rating)
            ? response(200, { item: rating })
            : domainErrorResponse(
                forbidden("RATING_ACCESS_DENIED", "You cannot access ratings belonging to other users or universities", {
                  ratingId
                })
              )
      );

  const listRatings = (principal: Principal, query: RatingListQuery): Promise<HttpResponse> => {
    const scope = readScopeOf(principal);
    if (scope.memberUid !== undefined && query.memberUid !== undefined && query.memberUid !== scope.memberUid) {
      return Promise.resolve(response(200, { items: [], nextCursor: null }));
    }
    return withCursorErrors(
      deps.readModel
        .listRatings(
          {
            university: scope.university,
            memberUid: scope.memberUid ?? query.memberUid,
            accommodationId: query.accommodationId
          },
          pageOf(query.limit, query.nextCursor)
        )
        .then((page) => response(200, page))
    );
  };

  // Folded from the event stream rather than the read model, so it never lags a committed rating.
  const ratingSummary = (accommodationId: string): Promise<HttpResponse> =>
    deps.workflow
      .loadState(accommodationId)
      .then(({ state }) =>
        response(200, summarizeScores(accommodationId, state.ratings.map(({ score }) => score)))
      );

  const listUniversities = (): Promise<HttpResponse> =>
    Promise.resolve(response(200, { items: deps.referenceData.universities }));

  return { getReservation, listReservations, getRating, listRatings, ratingSummary, listUniversities };
};

export type Queries = ReturnType<typeof makeQueries>;
