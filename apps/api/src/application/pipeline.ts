import type { z } from "zod";
import { match } from "ts-pattern";
import type { Response } from "express";
import { domainError } from "../domain/error.js";
import type { DomainError, ErrorKind } from "../domain/types.js";
import type { Logger } from "../logger.js";
import type { IdempotencyStore } from "./ports.js";

export type HttpResponse = { statusCode: number; body: unknown };

export const response = (statusCode: number, body: unknown): HttpResponse => ({ statusCode, body });

export const noContent = (): HttpResponse => response(204, undefined);

export const send = (res: Response) => ({ statusCode, body }: HttpResponse) =>
  body === undefined ? res.status(statusCode).end() : res.status(statusCode).json(body);

export const nowUtc = () => new Date().toISOString();

export const statusOf = ({ error: { kind, code } }: DomainError) =>
  match<ErrorKind, number>(kind)
    .with("RoleFormatError", "AuthorizationError", () => 403)
    .with("NotFoundError", () => 404)
    .with("OverlapConflictError", () => 409)
    .with("ContentionError", () => 503)
    .with("InternalError", () => 500)
    .with("ValidationError", () => (code === "IDEMPOTENCY_HASH_MISMATCH" ? 409 : 400))
    .with("DateRangeError", "IllegalTransitionError", "DuplicateRatingError", "ScoreRangeError", () => 400)
    .exhaustive();

export const domainErrorResponse = (error: DomainError) => response(statusOf(error), error);

export const badRequest = (reason: string, meta: Record<string, unknown> = {}) =>
  domainError("ValidationError", "INVALID_REQUEST", reason, meta);

export const internalError = (logger: Logger) => (error: unknown) => {
  logger.error({ err: error }, "unhandled error");
  return domainErrorResponse(
    domainError("InternalError", "INTERNAL_ERROR", "Unhandled server error", {
      message: error instanceof Error ? error.message : String(error)
    })
  );
};

export const safe = (logger: Logger) => (promise: Promise<HttpResponse>) =>
  promise.catch(internalError(logger));

export const validated = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  reason: string
): Promise<T | HttpResponse> =>
  Promise.resolve(schema.safeParse(payload)).then((parsed) =>
    parsed.success ? parsed.data : domainErrorResponse(badRequest(reason, parsed.error.flatten()))
  );

/**
 * Runs `action` at most once per Idempotency-Key. Replays return the stored response; a key
 * reused with different content is rejected. Server-side failures are not stored, so a retry
 * after a 5xx runs the action again.
 */
export const runIdempotent = ({
  store,
  logger,
  idempotencyKey,
  content,
  action
}: {
  store: IdempotencyStore;
  logger: Logger;
  idempotencyKey: string | undefined;
  content: unknown;
  action: () => Promise<HttpResponse>;
}): Promise<HttpResponse> =>
  idempotencyKey === undefined
    ? action()
    : store.loadIdempotency(idempotencyKey).then((existing) =>
        match(store.idempotencyDecision(existing, idempotencyKey, content))
          .with({ kind: "replay" }, ({ record }) =>
            Promise.resolve(response(record.statusCode, record.responseBody))
          )
          .with({ kind: "mismatch" }, ({ error }) => Promise.resolve(domainErrorResponse(error)))
          .with({ kind: "new" }, ({ contentHash }) =>
            action().then((result) =>
              result.statusCode >= 500
                ? result
                : store
                    .saveIdempotency({
                      idempotencyKey,
                      contentHash,
                      statusCode: result.statusCode,
                      responseBody: result.body,
                      createdAtUtc: nowUtc()
                    })
                    .then(() => result)
                    .catch((error: unknown) => {
                      logger.warn({ err: error, idempotencyKey }, "idempotency record not saved");
                      return result;
                    })
            )
          )
          .exhaustive()
      );
