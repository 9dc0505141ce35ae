import type { Reservation } from "../domain/types.js";
import type { Logger } from "../logger.js";
import type { AccommodationWorkflow } from "./accommodation-workflow.js";
import { buildCompleteElapsedCommand } from "./command-builders.js";
import type { ReadModel } from "./ports.js";

export type CompletionSweeperDeps = {
  workflow: Pick<AccommodationWorkflow, "applyCommand">;
  readModel: Pick<ReadModel, "listReservations">;
  nowUtc: () => string;
  pageLimit: number;
  logger: Logger;
};

export type SweepReport = { completed: number; skipped: number; failed: number };

/**
 * Completes active reservations whose end date has passed, acting as the system. Each
 * reservation is decided against its accommodation stream, so a concurrent cancel or an
 * earlier sweep simply turns into a skipped rejection.
 */
export const makeCompletionSweeper = (deps: CompletionSweeperDeps) => {
  const log = deps.logger.child({ component: "completion-sweeper" });

  const dueReservations = async (today: string) => {
    const loop = async (nextCursor: string | undefined, acc: Reservation[]): Promise<Reservation[]> => {
      const page = await deps.readModel.listReservations(
        { statuses: ["pending", "confirmed"], endingOnOrBefore: today },
        { limit: deps.pageLimit, nextCursor }
      );
      const items = [...acc, ...page.items];
      return page.nextCursor === null ? items : loop(page.nextCursor, items);
    };
    return loop(undefined, []);
  };

  const completeOne = (reservation: Reservation) => {
    const nowUtc = deps.nowUtc();
    return deps.workflow
      .applyCommand({
        accommodationId: reservation.accommodationId,
        commandOf: () => buildCompleteElapsedCommand({ reservationId: reservation.reservationId, nowUtc }),
        commandName: "CompleteElapsedReservation",
        meta: { actor: "system" }
      })
      .then((outcome) => outcome.kind)
      .catch((error: unknown) => {
        log.error({ err: error, reservationId: reservation.reservationId }, "completion failed");
        return "failed" as const;
      });
  };

  const sweep = async (): Promise<SweepReport> => {
    const today = deps.nowUtc().slice(0, 10);
    const due = await dueReservations(today);
    // One at a time: reservations of one accommodation share a stream and would only contend.
    const results = await due.reduce<Promise<Array<"accepted" | "rejected" | "failed">>>(
      (promise, reservation) =>
        promise.then((acc) => completeOne(reservation).then((result) => [...acc, result])),
      Promise.resolve([])
    );
    const report: SweepReport = {
      completed: results.filter((result) => result === "accepted").length,
      skipped: results.filter((result) => result === "rejected").length,
      failed: results.filter((result) => result === "failed").length
    };
    if (due.length > 0) {
      log.info({ today, ...report }, "completion sweep finished");
    }
    return report;
  };

  return { sweep };
};

export type CompletionSweeper = ReturnType<typeof makeCompletionSweeper>;
