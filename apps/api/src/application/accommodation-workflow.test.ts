import { describe, expect, it, vi } from "vitest";
import type { AccommodationEvent, AccommodationListing, MemberRecord, Principal } from "../domain/types.js";
import { makeEventStore } from "../infra/event-store.js";
import { makeMemoryBucket } from "../infra/object-bucket.js";
import { makeMemoryReadModel } from "../infra/read-model.js";
import { makeBucketStreamIndex } from "../infra/stream-index.js";
import { recordedAccommodationEventSchema } from "../infra/records.js";
import { makeLogger } from "../logger.js";
import { makeAccommodationWorkflow } from "./accommodation-workflow.js";
import { buildCreateReservationCommand, buildTransitionCommand } from "./command-builders.js";
import { makeNotifier, type NotificationDispatcher } from "./notifications.js";
import { VersionConflictError, type EventStore, type ReadModel } from "./ports.js";

const NOW = "2026-04-01T08:00:00.000Z";

const listing: AccommodationListing = {
  accommodationId: "acc-1",
  universities: ["HKU"],
  availableFrom: "2026-01-01",
  availableUntil: "2026-12-31"
};

const member: MemberRecord = { uid: "m-1", name: "Member One", university: "HKU" };
const principal: Principal = { kind: "member", university: "HKU", uid: "m-1" };
const specialist: Principal = { kind: "specialist", university: "HKU", specialistId: "s-1" };

const setup = ({
  wrapStore = (store) => store,
  readModel = makeMemoryReadModel(),
  versionConflictMaxRetries = 3
}: {
  wrapStore?: (store: EventStore<AccommodationEvent>) => EventStore<AccommodationEvent>;
  readModel?: ReadModel;
  versionConflictMaxRetries?: number;
} = {}) => {
  const bucket = makeMemoryBucket();
  const eventStore = wrapStore(
    makeEventStore<AccommodationEvent>({
      bucket,
      parseEvent: (raw) => recordedAccommodationEventSchema.parse(raw)
    })
  );
  const streamIndex = makeBucketStreamIndex({ bucket });
  const emit = vi.fn<NotificationDispatcher["emit"]>();
  const logger = makeLogger("silent");
  let sequence = 0;
  const workflow = makeAccommodationWorkflow({
    eventStore,
    readModel,
    streamIndex,
    notifier: makeNotifier({ directory: { listSpecialists: () => Promise.resolve([]) }, dispatcher: { emit }, logger }),
    uuid: () => `id-${++sequence}`,
    nowUtc: () => NOW,
    versionConflictMaxRetries,
    logger
  });
  return { workflow, eventStore, readModel, streamIndex, emit };
};

const createCommand = (reservationId: string, startDate: string, endDate: string) => () => {
  const built = buildCreateReservationCommand({
    principal,
    accommodationId: "acc-1",
    memberUid: "m-1",
    member,
    listing,
    startDate,
    endDate,
    reservationId,
    nowUtc: NOW
  });
  if (built.kind === "error") {
    throw new Error(built.error.error.code);
  }
  return built.value;
};

const create = (
  workflow: ReturnType<typeof setup>["workflow"],
  reservationId: string,
  startDate = "2026-05-01",
  endDate = "2026-05-05"
) =>
  workflow.applyCommand({
    accommodationId: "acc-1",
    commandOf: createCommand(reservationId, startDate, endDate),
    commandName: "CreateReservation"
  });

describe("accommodation workflow", () => {
  it("registra el evento, proyecta la reserva y notifica tras confirmar", async () => {
    const { workflow, eventStore, readModel, emit } = setup();

    const outcome = await create(workflow, "res-1");

    expect(outcome.kind).toBe("accepted");
    const events = await eventStore.loadStream("accommodation", "acc-1");
    expect(events.map(({ type, version, meta }) => ({ type, version, meta }))).toEqual([
      { type: "ReservationCreated", version: 1, meta: { command: "CreateReservation" } }
    ]);
    expect((await readModel.getReservation("res-1"))?.status).toBe("pending");
    expect(emit).toHaveBeenCalledTimes(2);
  });

  it("reconstruye el estado desde el stream", async () => {
    const { workflow } = setup();
    await create(workflow, "res-1");
    await workflow.applyCommand({
      accommodationId: "acc-1",
      commandOf: () =>
        buildTransitionCommand({ principal: specialist, reservationId: "res-1", toStatus: "confirmed", nowUtc: NOW }),
      commandName: "TransitionReservation"
    });

    const { state, lastEventVersion } = await workflow.loadState("acc-1");

    expect(lastEventVersion).toBe(2);
    expect(state.reservations.map(({ reservationId, status }) => ({ reservationId, status }))).toEqual([
      { reservationId: "res-1", status: "confirmed" }
    ]);
  });

  it("un rechazo no escribe eventos ni notifica", async () => {
    const { workflow, eventStore, emit } = setup();
    await create(workflow, "res-1");
    emit.mockClear();

    const outcome = await create(workflow, "res-2", "2026-05-03", "2026-05-08");

    expect(outcome.kind === "rejected" ? outcome.error.error.code : null).toBe("RESERVATION_OVERLAP");
    expect(await eventStore.loadStream("accommodation", "acc-1")).toHaveLength(1);
    expect(emit).not.toHaveBeenCalled();
  });

  it("reintenta tras un conflicto de versión", async () => {
    const conflicts = { remaining: 1 };
    const { workflow, eventStore } = setup({
      wrapStore: (store) => ({
        ...store,
        appendEvent: (recorded, expectedVersion) => {
          if (conflicts.remaining > 0) {
            conflicts.remaining -= 1;
            return Promise.reject(new VersionConflictError("simulated conflict"));
          }
          return store.appendEvent(recorded, expectedVersion);
        }
      })
    });

    const outcome = await create(workflow, "res-1");

    expect(outcome.kind).toBe("accepted");
    expect(conflicts.remaining).toBe(0);
    expect(await eventStore.loadStream("accommodation", "acc-1")).toHaveLength(1);
  });

  it("devuelve CONTENTION al agotar los reintentos", async () => {
    const appendEvent = vi.fn(() => Promise.reject(new VersionConflictError("always behind")));
    const { workflow, emit } = setup({
      versionConflictMaxRetries: 2,
      wrapStore: (store) => ({ ...store, appendEvent })
    });

    const outcome = await create(workflow, "res-1");

    expect(appendEvent).toHaveBeenCalledTimes(3);
    expect(outcome.kind === "rejected" ? outcome.error : null).toEqual({
      error: {
        kind: "ContentionError",
        code: "CONTENTION",
        reason: "The accommodation is being changed concurrently; retry the request",
        meta: { accommodationId: "acc-1", commandName: "CreateReservation", attempts: 3, retryable: true }
      }
    });
    expect(emit).not.toHaveBeenCalled();
  });

  it("de dos reservas concurrentes que se solapan solo una se acepta", async () => {
    const { workflow, eventStore } = setup();

    const outcomes = await Promise.all([
      create(workflow, "res-a", "2026-05-01", "2026-05-05"),
      create(workflow, "res-b", "2026-05-03", "2026-05-07")
    ]);

    expect(outcomes.filter(({ kind }) => kind === "accepted")).toHaveLength(1);
    const rejection = outcomes.find((outcome) => outcome.kind === "rejected");
    expect(rejection?.kind === "rejected" ? rejection.error.error.code : null).toBe("RESERVATION_OVERLAP");
    expect(await eventStore.loadStream("accommodation", "acc-1")).toHaveLength(1);
  });

  it("un fallo de proyección no revierte el comando", async () => {
    const readModel: ReadModel = {
      ...makeMemoryReadModel(),
      applyProjectionOps: () => Promise.reject(new Error("projection table unavailable"))
    };
    const { workflow, eventStore, emit } = setup({ readModel });

    const outcome = await create(workflow, "res-1");

    expect(outcome.kind).toBe("accepted");
    expect(await eventStore.loadStream("accommodation", "acc-1")).toHaveLength(1);
    expect(emit).toHaveBeenCalledTimes(2);
  });

  it("registra el stream de la reserva antes de confirmar el evento", async () => {
    const { workflow, streamIndex } = setup();

    await create(workflow, "res-1");
    await create(workflow, "res-2", "2026-05-03", "2026-05-08");

    expect(await streamIndex.locateStream("reservation", "res-1")).toBe("acc-1");
    expect(await streamIndex.locateStream("reservation", "res-2")).toBeNull();
  });

  it("el siguiente commit vuelve a proyectar lo que faltó", async () => {
    const readModel = makeMemoryReadModel();
    const failures = { remaining: 1 };
    const { workflow } = setup({
      readModel: {
        ...readModel,
        applyProjectionOps: (ops) => {
          if (failures.remaining > 0) {
            failures.remaining -= 1;
            return Promise.reject(new Error("projection table unavailable"));
          }
          return readModel.applyProjectionOps(ops);
        }
      }
    });

    await create(workflow, "res-1");
    expect(await readModel.getReservation("res-1")).toBeNull();
    await create(workflow, "res-2", "2026-06-01", "2026-06-05");

    expect((await readModel.getReservation("res-1"))?.status).toBe("pending");
    expect((await readModel.getReservation("res-2"))?.status).toBe("pending");
  });

  it("refreshProjection escribe el estado actual del stream", async () => {
    const readModel = makeMemoryReadModel();
    const failing: ReadModel = { ...readModel, applyProjectionOps: () => Promise.reject(new Error("down")) };
    const { workflow, eventStore } = setup({ readModel: failing });
    await create(workflow, "res-1");

    const refreshed = makeAccommodationWorkflow({
      eventStore,
      readModel,
      streamIndex: { recordStream: () => Promise.resolve() },
      notifier: { notify: () => Promise.resolve(undefined) },
      uuid: () => "unused",
      nowUtc: () => NOW,
      versionConflictMaxRetries: 3,
      logger: makeLogger("silent")
    });
    const state = await refreshed.refreshProjection("acc-1");

    expect(state.reservations.map(({ reservationId }) => reservationId)).toEqual(["res-1"]);
    expect((await readModel.getReservation("res-1"))?.reservationId).toBe("res-1");
  });

  it("propaga errores que no son de concurrencia", async () => {
    const { workflow } = setup({
      wrapStore: (store) => ({ ...store, loadStream: () => Promise.reject(new Error("bucket unreachable")) })
    });

    await expect(create(workflow, "res-1")).rejects.toThrow("bucket unreachable");
  });
});
