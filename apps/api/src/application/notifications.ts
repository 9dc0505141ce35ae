import { match } from "ts-pattern";
import type { Logger } from "../logger.js";
import type {
  AccommodationState,
  RecordedAccommodationEvent,
  Reservation,
  ReservationStatus,
  RoleKind
} from "../domain/types.js";
import type { Directory } from "./ports.js";

export type NotificationKind = "reservation.created" | "reservation.cancelled" | "reservation.status_changed";

export type Audience =
  | { kind: "specialists"; university: string; specialistIds: string[] }
  | { kind: "member"; uid: string };

export type NotificationPayload = {
  reservationId: string;
  accommodationId: string;
  member: { uid: string; university: string };
  startDate: string;
  endDate: string;
  status: ReservationStatus;
  previousStatus?: ReservationStatus;
  cancelledBy?: RoleKind | null;
  audience: Audience;
};

/** Fire-and-forget: implementations log their own failures and never throw. */
export type NotificationDispatcher = {
  emit: (kind: NotificationKind, payload: NotificationPayload) => void;
};

type Recipient = { kind: "specialists" } | { kind: "member" };

export type NotificationPlan = {
  kind: NotificationKind;
  recipient: Recipient;
  reservation: Reservation;
  previousStatus?: ReservationStatus;
};

const SPECIALISTS: Recipient = { kind: "specialists" };
const MEMBER: Recipient = { kind: "member" };

const statusChangedPlans = (reservation: Reservation, previousStatus: ReservationStatus | undefined) =>
  [MEMBER, SPECIALISTS].map(
    (recipient): NotificationPlan => ({
      kind: "reservation.status_changed",
      recipient,
      reservation,
      ...(previousStatus === undefined ? {} : { previousStatus })
    })
  );

/**
 * Which notifications a committed event produces, and for whom. A rating that completes its
 * reservation is announced like any other completion; ratings themselves are not.
 */
export const planNotifications = (
  event: RecordedAccommodationEvent,
  stateAfter: AccommodationState,
  stateBefore?: AccommodationState
): NotificationPlan[] => {
  const reservationOf = (reservationId: string) =>
    stateAfter.reservations.find((reservation) => reservation.reservationId === reservationId);

  return match<RecordedAccommodationEvent, NotificationPlan[]>(event)
    .with({ type: "ReservationCreated" }, ({ payload }) =>
      [SPECIALISTS, MEMBER].map(
        (recipient): NotificationPlan => ({
          kind: "reservation.created",
          recipient,
          reservation: payload.reservation
        })
      )
    )
    .with({ type: "ReservationStatusChanged" }, ({ payload }) => {
      const reservation = reservationOf(payload.reservationId);
      if (reservation === undefined) {
        return [];
      }
      const previousStatus = payload.fromStatus;
      return payload.toStatus === "cancelled"
        ? [SPECIALISTS, ...(payload.actor === "member" ? [] : [MEMBER])].map(
            (recipient): NotificationPlan => ({
              kind: "reservation.cancelled",
              recipient,
              reservation,
              previousStatus
            })
          )
        : statusChangedPlans(reservation, previousStatus);
    })
    .with({ type: "RatingSubmitted" }, ({ payload: { rating, completedReservation } }) => {
      const reservation = reservationOf(rating.reservationId);
      return completedReservation && reservation !== undefined
        ? statusChangedPlans(
            reservation,
            stateBefore?.reservations.find(({ reservationId }) => reservationId === rating.reservationId)?.status
          )
        : [];
    })
    .with({ type: "RatingRemoved" }, () => [])
    .exhaustive();
};

const payloadOf = (plan: NotificationPlan, audience: Audience): NotificationPayload => ({
  reservationId: plan.reservation.reservationId,
  accommodationId: plan.reservation.accommodationId,
  member: { uid: plan.reservation.memberUid, university: plan.reservation.university },
  startDate: plan.reservation.startDate,
  endDate: plan.reservation.endDate,
  status: plan.reservation.status,
  ...(plan.previousStatus === undefined ? {} : { previousStatus: plan.previousStatus }),
  ...(plan.kind === "reservation.cancelled" ? { cancelledBy: plan.reservation.cancelledBy } : {}),
  audience
});

export const makeNotifier = ({
  directory,
  dispatcher,
  logger
}: {
  directory: Pick<Directory, "listSpecialists">;
  dispatcher: NotificationDispatcher;
  logger: Logger;
}) => {
  const log = logger.child({ component: "notifier" });

  const audienceOf = (plan: NotificationPlan): Promise<Audience> =>
    match<Recipient, Promise<Audience>>(plan.recipient)
      .with({ kind: "member" }, () =>
        Promise.resolve<Audience>({ kind: "member", uid: plan.reservation.memberUid })
      )
      .with({ kind: "specialists" }, () =>
        directory.listSpecialists(plan.reservation.university).then((specialists): Audience => ({
          kind: "specialists",
          university: plan.reservation.university,
          specialistIds: specialists.map(({ specialistId }) => specialistId)
        }))
      )
      .exhaustive();

  const deliver = (plans: NotificationPlan[]) =>
    Promise.all(
      plans.map((plan) =>
        audienceOf(plan)
          .then((audience) => dispatcher.emit(plan.kind, payloadOf(plan, audience)))
          .catch((error: unknown) =>
            log.warn(
              { err: error, kind: plan.kind, reservationId: plan.reservation.reservationId },
              "notification dropped"
            )
          )
      )
    );

  /** Returns once every planned notification was handed to the dispatcher or dropped. */
  const notify = (
    event: RecordedAccommodationEvent,
    stateAfter: AccommodationState,
    stateBefore?: AccommodationState
  ) => deliver(planNotifications(event, stateAfter, stateBefore)).then(() => undefined);

  return { notify };
};

export type Notifier = ReturnType<typeof makeNotifier>;
