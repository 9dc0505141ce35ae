import type { Express } from "express";
import type { Services } from "../../infra/container.js";
import { response, validated } from "../../application/pipeline.js";
import type { RoleGuard } from "../security.js";
import { ratingListQuerySchema, reservationListQuerySchema } from "../schemas.js";

export const registerQueryRoutes = (
  app: Express,
  { services, guard }: { services: Pick<Services, "queries">; guard: RoleGuard }
) => {
  const { queries } = services;

  app.get("/health", guard.handle(() => Promise.resolve(response(200, { status: "ok" }))));

  app.get("/universities", guard.handle(() => queries.listUniversities()));

  app.get(
    "/reservations",
    guard.withPrincipal((principal, req) =>
      validated(reservationListQuerySchema, req.query, "Invalid reservation query").then((parsed) =>
        "statusCode" in parsed ? parsed : queries.listReservations(principal, parsed)
      )
    )
  );

  app.get(
    "/reservations/:reservationId",
    guard.withPrincipal((principal, req) => queries.getReservation(principal, req.params.reservationId))
  );

  app.get(
    "/ratings",
    guard.withPrincipal((principal, req) =>
      validated(ratingListQuerySchema, req.query, "Invalid rating query").then((parsed) =>
        "statusCode" in parsed ? parsed : queries.listRatings(principal, parsed)
      )
    )
  );

  app.get(
    "/ratings/:ratingId",
    guard.withPrincipal((principal, req) => queries.getRating(principal, req.params.ratingId))
  );

  app.get(
    "/accommodations/:accommodationId/rating-summary",
    guard.withPrincipal((_principal, req) => queries.ratingSummary(req.params.accommodationId))
  );
};
