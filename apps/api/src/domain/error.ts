import type { Decision, DomainError, ErrorKind } from "./types.js";

export const domainError = (
  kind: ErrorKind,
  code: string,
  reason: string,
  meta: Record<string, unknown> = {}
): DomainError => ({
  error: { kind, code, reason, meta }
});

export const rejected = <T>(error: DomainError): Decision<T> => ({ kind: "rejected", error });

export const accepted = <T>(event: T): Decision<T> => ({ kind: "accepted", event });

export const notFound = (code: string, reason: string, meta: Record<string, unknown> = {}) =>
  domainError("NotFoundError", code, reason, meta);

export const forbidden = (code: string, reason: string, meta: Record<string, unknown> = {}) =>
  domainError("AuthorizationError", code, reason, meta);

export const illegalTransition = (code: string, reason: string, meta: Record<string, unknown> = {}) =>
  domainError("IllegalTransitionError", code, reason, meta);

export const invalid = (code: string, reason: string, meta: Record<string, unknown> = {}) =>
  domainError("ValidationError", code, reason, meta);
