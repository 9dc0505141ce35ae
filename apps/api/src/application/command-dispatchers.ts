import { reservationNotFound } from "../domain/reservation-decider.js";
import { scoreViolation } from "../domain/rating-decider.js";
import { notFound } from "../domain/error.js";
import type { AccommodationCommand, Principal, TransitionTarget } from "../domain/types.js";
import type { AccommodationWorkflow, CommandOutcome } from "./accommodation-workflow.js";
import {
  buildCreateReservationCommand,
  buildRemoveRatingCommand,
  buildSubmitRatingCommand,
  buildTransitionCommand,
  reservationMemberUid,
  type BuildResult
} from "./command-builders.js";
import { domainErrorResponse, noContent, response, type HttpResponse } from "./pipeline.js";
import type { Directory, StreamIndex } from "./ports.js";

export type CommandDispatcherDeps = {
  workflow: AccommodationWorkflow;
  streamIndex: Pick<StreamIndex, "locateStream">;
  directory: Pick<Directory, "getAccommodation" | "getMember">;
  uuid: () => string;
  nowUtc: () => string;
};

export type CreateReservationInput = {
  accommodationId: string;
  startDate: string;
  endDate: string;
  memberUid?: string;
};

export type SubmitRatingInput = { reservationId: string; score: number; comment?: string };

const fromBuild = <T>(built: BuildResult<T>, onOk: (value: T) => Promise<HttpResponse>) =>
  built.kind === "error" ? Promise.resolve(domainErrorResponse(built.error)) : onOk(built.value);

const fromOutcome = (
  outcome: CommandOutcome,
  onAccepted: (outcome: Extract<CommandOutcome, { kind: "accepted" }>) => HttpResponse
) => (outcome.kind === "rejected" ? domainErrorResponse(outcome.error) : onAccepted(outcome));

const reservationIn = ({ state }: Extract<CommandOutcome, { kind: "accepted" }>, reservationId: string) =>
  state.reservations.find((reservation) => reservation.reservationId === reservationId) ?? null;

export const makeCommandDispatchers = (deps: CommandDispatcherDeps) => {
  const createReservation = (principal: Principal, input: CreateReservationInput): Promise<HttpResponse> => {
    const memberUid = reservationMemberUid(principal, input.memberUid);
    const reservationId = deps.uuid();
    return Promise.all([
      memberUid === undefined ? Promise.resolve(null) : deps.directory.getMember(memberUid),
      deps.directory.getAccommodation(input.accommodationId)
    ])
      .then(([member, listing]) =>
        buildCreateReservationCommand({
          principal,
          accommodationId: input.accommodationId,
          memberUid,
          member,
          listing,
          startDate: input.startDate,
          endDate: input.endDate,
          reservationId,
          nowUtc: deps.nowUtc()
        })
      )
      .then((built) =>
        fromBuild(built, (command) =>
          deps.workflow
            .applyCommand({
              accommodationId: input.accommodationId,
              commandOf: () => command,
              commandName: "CreateReservation",
              meta: { actor: principal.kind }
            })
            .then((outcome) =>
              fromOutcome(outcome, (accepted) => response(201, { item: reservationIn(accepted, reservationId) }))
            )
        )
      );
  };

  /** Commands addressed by reservation id run against the accommodation stream that owns it. */
  const onReservationStream = (
    reservationId: string,
    commandName: string,
    principal: Principal,
    command: AccommodationCommand
  ) =>
    deps.streamIndex.locateStream("reservation", reservationId).then((accommodationId) =>
      accommodationId === null
        ? Promise.resolve<CommandOutcome>({ kind: "rejected", error: reservationNotFound(reservationId) })
        : deps.workflow.applyCommand({
            accommodationId,
            commandOf: () => command,
            commandName,
            meta: { actor: principal.kind }
          })
    );

  const transitionReservation = (
    principal: Principal,
    reservationId: string,
    toStatus: TransitionTarget
  ): Promise<HttpResponse> =>
    onReservationStream(
      reservationId,
      "TransitionReservation",
      principal,
      buildTransitionCommand({ principal, reservationId, toStatus, nowUtc: deps.nowUtc() })
    ).then((outcome) =>
      fromOutcome(outcome, (accepted) => response(200, { item: reservationIn(accepted, reservationId) }))
    );

  const cancelReservation = (principal: Principal, reservationId: string): Promise<HttpResponse> =>
    transitionReservation(principal, reservationId, "cancelled").then((result) =>
      result.statusCode === 200 ? noContent() : result
    );

  const submitRating = (principal: Principal, input: SubmitRatingInput): Promise<HttpResponse> => {
    const invalidScore = scoreViolation(input.score);
    if (invalidScore !== null) {
      return Promise.resolve(domainErrorResponse(invalidScore));
    }
    const ratingId = deps.uuid();
    return onReservationStream(
      input.reservationId,
      "SubmitRating",
      principal,
      buildSubmitRatingCommand({
        principal,
        ratingId,
        reservationId: input.reservationId,
        score: input.score,
        comment: input.comment,
        nowUtc: deps.nowUtc()
      })
    ).then((outcome) =>
      fromOutcome(outcome, ({ state }) =>
        response(201, { item: state.ratings.find((rating) => rating.ratingId === ratingId) ?? null })
      )
    );
  };

  const removeRating = (principal: Principal, ratingId: string): Promise<HttpResponse> =>
    deps.streamIndex.locateStream("rating", ratingId).then((accommodationId) =>
      accommodationId === null
        ? domainErrorResponse(notFound("RATING_NOT_FOUND", "Rating does not exist", { ratingId }))
        : deps.workflow
            .applyCommand({
              accommodationId,
              commandOf: () => buildRemoveRatingCommand({ principal, ratingId, nowUtc: deps.nowUtc() }),
              commandName: "RemoveRating",
              meta: { actor: principal.kind }
            })
            .then((outcome) => fromOutcome(outcome, () => noContent()))
    );

  return { createReservation, transitionReservation, cancelReservation, submitRating, removeRating };
};

export type CommandDispatchers = ReturnType<typeof makeCommandDispatchers>;
