import type { Express, Request } from "express";
import type { Services } from "../../infra/container.js";
import { runIdempotent, validated } from "../../application/pipeline.js";
import type { HttpResponse } from "../../application/pipeline.js";
import type { Principal } from "../../domain/types.js";
import type { RoleGuard } from "../security.js";
import { createReservationBodySchema, submitRatingBodySchema, transitionBodySchema } from "../schemas.js";

const idempotencyKeyOf = (req: Request) => {
  const value = req.header("Idempotency-Key");
  return value && value.length > 0 ? value : undefined;
};

export const registerCommandRoutes = (
  app: Express,
  { services, guard }: { services: Pick<Services, "commands" | "idempotency" | "logger">; guard: RoleGuard }
) => {
  const { commands } = services;

  // The principal is part of the idempotent content: the same key from another caller is a mismatch.
  const idempotent = (req: Request, principal: Principal, body: unknown, action: () => Promise<HttpResponse>) =>
    runIdempotent({
      store: services.idempotency,
      logger: services.logger,
      idempotencyKey: idempotencyKeyOf(req),
      content: { path: req.path, principal, body },
      action
    });

  app.post(
    "/reservations",
    guard.withPrincipal((principal, req) =>
      validated(createReservationBodySchema, req.body, "Invalid reservation payload").then((parsed) =>
        "statusCode" in parsed
          ? parsed
          : idempotent(req, principal, parsed, () => commands.createReservation(principal, parsed))
      )
    )
  );

  app.patch(
    "/reservations/:reservationId",
    guard.withPrincipal((principal, req) =>
      validated(transitionBodySchema, req.body, "Invalid status change payload").then((parsed) =>
        "statusCode" in parsed
          ? parsed
          : commands.transitionReservation(principal, req.params.reservationId, parsed.status)
      )
    )
  );

  app.delete(
    "/reservations/:reservationId",
    guard.withPrincipal((principal, req) =>
      commands.cancelReservation(principal, req.params.reservationId)
    )
  );

  app.post(
    "/ratings",
    guard.withPrincipal((principal, req) =>
      validated(submitRatingBodySchema, req.body, "Invalid rating payload").then((parsed) =>
        "statusCode" in parsed
          ? parsed
          : idempotent(req, principal, parsed, () => commands.submitRating(principal, parsed))
      )
    )
  );

  app.delete(
    "/ratings/:ratingId",
    guard.withPrincipal((principal, req) => commands.removeRating(principal, req.params.ratingId))
  );
};
