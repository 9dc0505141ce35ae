import { describe, expect, it, vi } from "vitest";
import { makeMemoryIdempotencyStore } from "../infra/idempotency.js";
import { makeLogger } from "../logger.js";
import { domainError } from "../domain/error.js";
import { response, runIdempotent, statusOf } from "./pipeline.js";

const logger = makeLogger("silent");

describe("statusOf", () => {
  it("asigna el código HTTP por tipo de error", () => {
    const statusFor = (kind: Parameters<typeof domainError>[0], code = "X") => statusOf(domainError(kind, code, "r"));
    expect(statusFor("RoleFormatError")).toBe(403);
    expect(statusFor("AuthorizationError")).toBe(403);
    expect(statusFor("NotFoundError")).toBe(404);
    expect(statusFor("OverlapConflictError")).toBe(409);
    expect(statusFor("ContentionError")).toBe(503);
    expect(statusFor("ScoreRangeError")).toBe(400);
    expect(statusFor("ValidationError")).toBe(400);
    expect(statusFor("ValidationError", "IDEMPOTENCY_HASH_MISMATCH")).toBe(409);
    expect(statusFor("InternalError")).toBe(500);
  });
});

describe("runIdempotent", () => {
  it("sin clave ejecuta la acción siempre", async () => {
    const action = vi.fn(() => Promise.resolve(response(201, { n: 1 })));
    const store = makeMemoryIdempotencyStore();
    const run = () => runIdempotent({ store, logger, idempotencyKey: undefined, content: {}, action });
    await run();
    await run();
    expect(action).toHaveBeenCalledTimes(2);
  });

  it("repite la respuesta guardada para la misma clave y contenido", async () => {
    const action = vi.fn(() => Promise.resolve(response(201, { item: "res-1" })));
    const store = makeMemoryIdempotencyStore();
    const run = (content: unknown) => runIdempotent({ store, logger, idempotencyKey: "key-1", content, action });

    expect(await run({ a: 1 })).toEqual({ statusCode: 201, body: { item: "res-1" } });
    expect(await run({ a: 1 })).toEqual({ statusCode: 201, body: { item: "res-1" } });
    expect(action).toHaveBeenCalledTimes(1);
    expect((await run({ a: 2 })).statusCode).toBe(409);
  });

  it("no guarda errores del servidor", async () => {
    const action = vi
      .fn(() => Promise.resolve(response(201, { ok: true })))
      .mockResolvedValueOnce(response(503, { error: "busy" }));
    const store = makeMemoryIdempotencyStore();
    const run = () => runIdempotent({ store, logger, idempotencyKey: "key-1", content: { a: 1 }, action });

    expect((await run()).statusCode).toBe(503);
    expect(await store.loadIdempotency("key-1")).toBeNull();
    expect((await run()).statusCode).toBe(201);
    expect(action).toHaveBeenCalledTimes(2);
  });

  it("guarda rechazos del cliente para repetirlos", async () => {
    const action = vi.fn(() => Promise.resolve(response(409, { error: "overlap" })));
    const store = makeMemoryIdempotencyStore();
    const run = () => runIdempotent({ store, logger, idempotencyKey: "key-1", content: { a: 1 }, action });

    await run();
    expect(await run()).toEqual({ statusCode: 409, body: { error: "overlap" } });
    expect(action).toHaveBeenCalledTimes(1);
  });
});
