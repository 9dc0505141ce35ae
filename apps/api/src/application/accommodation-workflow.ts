import { decideAccommodation, emptyAccommodation, foldAccommodation } from "../domain/index.js";
import { domainError } from "../domain/error.js";
import type {
  AccommodationCommand,
  AccommodationEvent,
  AccommodationState,
  DomainError,
  RecordedAccommodationEvent
} from "../domain/types.js";
import type { Logger } from "../logger.js";
import { projectEvent, projectState } from "../projections/projector.js";
import type { Notifier } from "./notifications.js";
import { VersionConflictError, type EventStore, type IndexedEntity, type ReadModel, type StreamIndex } from "./ports.js";

export type AccommodationWorkflowDeps = {
  eventStore: EventStore<AccommodationEvent>;
  readModel: Pick<ReadModel, "applyProjectionOps">;
  streamIndex: Pick<StreamIndex, "recordStream">;
  notifier: Notifier;
  uuid: () => string;
  nowUtc: () => string;
  versionConflictMaxRetries: number;
  logger: Logger;
};

export type CommandOutcome =
  | { kind: "accepted"; event: RecordedAccommodationEvent; state: AccommodationState }
  | { kind: "rejected"; error: DomainError };

type LoadedState = { state: AccommodationState; lastEventVersion: number };

type Attempt = { outcome: CommandOutcome; stateBefore: AccommodationState };

/** Ids an event introduces; each gets a stream pointer before the event is appended. */
const introducedIds = (event: AccommodationEvent): Array<[IndexedEntity, string]> =>
  event.type === "ReservationCreated"
    ? [["reservation", event.payload.reservation.reservationId]]
    : event.type === "RatingSubmitted"
      ? [["rating", event.payload.rating.ratingId]]
      : [];

export const makeAccommodationWorkflow = (deps: AccommodationWorkflowDeps) => {
  const log = deps.logger.child({ component: "accommodation-workflow" });

  const loadState = async (accommodationId: string): Promise<LoadedState> => {
    const events = await deps.eventStore.loadStream("accommodation", accommodationId);
    return {
      state: events.reduce(foldAccommodation, emptyAccommodation(accommodationId)),
      lastEventVersion: events.at(-1)?.version ?? 0
    };
  };

  const recordEvent = ({
    accommodationId,
    version,
    event,
    meta
  }: {
    accommodationId: string;
    version: number;
    event: AccommodationEvent;
    meta: Record<string, unknown>;
  }): RecordedAccommodationEvent => ({
    ...event,
    eventId: deps.uuid(),
    streamId: accommodationId,
    streamType: "accommodation",
    version,
    occurredAtUtc: deps.nowUtc(),
    meta
  });

  const withVersionConflictRetries =
    (remainingRetries: number) =>
    <T>(action: () => Promise<T>): Promise<T> =>
      action().catch((error: unknown) => {
        if (error instanceof VersionConflictError && remainingRetries > 0) {
          log.debug({ remainingRetries }, "version conflict, retrying");
          return withVersionConflictRetries(remainingRetries - 1)(action);
        }
        return Promise.reject(error);
      });

  // Both steps run strictly after the append committed; neither can fail the command.
  const afterCommit = (
    event: RecordedAccommodationEvent,
    state: AccommodationState,
    stateBefore: AccommodationState
  ) =>
    deps.readModel
      .applyProjectionOps(projectEvent(event, state))
      .catch((error: unknown) =>
        log.error({ err: error, eventId: event.eventId, type: event.type }, "projection failed")
      )
      .then(() => deps.notifier.notify(event, state, stateBefore));

  /** Rewrites the read-model rows of one accommodation from its stream. */
  const refreshProjection = async (accommodationId: string): Promise<AccommodationState> => {
    const { state, lastEventVersion } = await loadState(accommodationId);
    await deps.readModel
      .applyProjectionOps(projectState(state, lastEventVersion))
      .catch((error: unknown) => log.error({ err: error, accommodationId }, "projection refresh failed"));
    return state;
  };

  const retries =
    Number.isFinite(deps.versionConflictMaxRetries) && deps.versionConflictMaxRetries >= 0
      ? deps.versionConflictMaxRetries
      : 3;

  /**
   * Load, decide and append against one accommodation stream. The decision only commits if
   * the stream is still at the version it was decided against; otherwise the whole attempt
   * runs again, up to `versionConflictMaxRetries` more times.
   */
  const applyCommand = ({
    accommodationId,
    commandOf,
    commandName,
    meta = {}
  }: {
    accommodationId: string;
    commandOf: (state: AccommodationState) => AccommodationCommand;
    commandName: string;
    meta?: Record<string, unknown>;
  }): Promise<CommandOutcome> => {
    const runAttempt = (): Promise<Attempt> =>
      loadState(accommodationId).then(async ({ state, lastEventVersion }) => {
        const decision = decideAccommodation(state, commandOf(state));
        if (decision.kind === "rejected") {
          return { outcome: decision, stateBefore: state };
        }
        await Promise.all(
          introducedIds(decision.event).map(([entity, entityId]) =>
            deps.streamIndex.recordStream(entity, entityId, accommodationId)
          )
        );
        const recorded = recordEvent({
          accommodationId,
          version: lastEventVersion + 1,
          event: decision.event,
          meta: { command: commandName, ...meta }
        });
        return deps.eventStore.appendEvent(recorded, lastEventVersion).then(
          (): Attempt => ({
            outcome: { kind: "accepted", event: recorded, state: foldAccommodation(state, decision.event) },
            stateBefore: state
          })
        );
      });

    return withVersionConflictRetries(retries)(runAttempt)
      .then(async ({ outcome, stateBefore }): Promise<CommandOutcome> => {
        if (outcome.kind === "accepted") {
          log.info(
            { accommodationId, command: commandName, type: outcome.event.type, version: outcome.event.version },
            "event committed"
          );
          await afterCommit(outcome.event, outcome.state, stateBefore);
        }
        return outcome;
      })
      .catch((error: unknown) => {
        if (!(error instanceof VersionConflictError)) {
          return Promise.reject(error);
        }
        log.warn({ accommodationId, command: commandName, attempts: retries + 1 }, "contention unresolved");
        return {
          kind: "rejected",
          error: domainError(
            "ContentionError",
            "CONTENTION",
            "The accommodation is being changed concurrently; retry the request",
            { accommodationId, commandName, attempts: retries + 1, retryable: true }
          )
        } satisfies CommandOutcome;
      });
  };

  return { loadState, refreshProjection, applyCommand };
};

export type AccommodationWorkflow = ReturnType<typeof makeAccommodationWorkflow>;
