import type { Request, Response } from "express";
import { resolveRole } from "../domain/index.js";
import type { Principal } from "../domain/types.js";
import { domainErrorResponse, send, type HttpResponse } from "../application/pipeline.js";

type Handler = (req: Request) => Promise<HttpResponse>;

/** The role token travels in the `role` query parameter or, failing that, the X-Role header. */
export const roleTokenOf = (req: Request) => {
  const fromQuery = req.query.role;
  return typeof fromQuery === "string" && fromQuery.length > 0 ? fromQuery : req.header("x-role");
};

export const makeRoleGuard = ({
  universities,
  safe
}: {
  universities: ReadonlySet<string>;
  safe: (promise: Promise<HttpResponse>) => Promise<HttpResponse>;
}) => {
  const handle = (handler: Handler) => (req: Request, res: Response) => {
    void safe(handler(req)).then(send(res));
  };

  /** Resolves the caller's principal; an unusable token answers 403 before the handler runs. */
  const withPrincipal = (handler: (principal: Principal, req: Request) => Promise<HttpResponse>) =>
    handle((req) => {
      const resolution = resolveRole(roleTokenOf(req), { universities });
      return resolution.kind === "failed"
        ? Promise.resolve(domainErrorResponse(resolution.error))
        : handler(resolution.principal, req);
    });

  return { handle, withPrincipal };
};

export type RoleGuard = ReturnType<typeof makeRoleGuard>;
