import { SendMessageCommand } from "@aws-sdk/client-sqs";
import type { NotificationDispatcher } from "../application/notifications.js";
import type { Logger } from "../logger.js";

export const makeSqsNotificationDispatcher = ({
  send,
  queueUrl,
  logger
}: {
  send: (command: SendMessageCommand) => Promise<unknown>;
  queueUrl: string;
  logger: Logger;
}): NotificationDispatcher => {
  const log = logger.child({ component: "sqs-notifications" });

  return {
    emit: (kind, payload) => {
      void send(
        new SendMessageCommand({
          QueueUrl: queueUrl,
          MessageBody: JSON.stringify({ kind, payload }),
          MessageAttributes: {
            kind: { DataType: "String", StringValue: kind }
          }
        })
      )
        .then(() => log.debug({ kind, reservationId: payload.reservationId }, "notification queued"))
        .catch((error: unknown) =>
          log.warn({ err: error, kind, reservationId: payload.reservationId }, "notification not queued")
        );
    }
  };
};

/** Used when no queue is configured: notifications only reach the log. */
export const makeLoggingNotificationDispatcher = (logger: Logger): NotificationDispatcher => {
  const log = logger.child({ component: "notifications" });

  return {
    emit: (kind, payload) => log.info({ kind, payload }, "notification")
  };
};
