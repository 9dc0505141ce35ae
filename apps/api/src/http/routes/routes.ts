import type { Express, NextFunction, Request, Response } from "express";
import type { Services } from "../../infra/container.js";
import { badRequest, domainErrorResponse, internalError, safe, send } from "../../application/pipeline.js";
import { makeRoleGuard } from "../security.js";
import { registerCommandRoutes } from "./command-routes.js";
import { registerQueryRoutes } from "./query-routes.js";

const isBodyParseError = (error: unknown) =>
  error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";

export const registerRoutes = (app: Express, services: Services) => {
  const guard = makeRoleGuard({
    universities: new Set(services.referenceData.universities.map(({ code }) => code)),
    safe: safe(services.logger)
  });

  registerQueryRoutes(app, { services, guard });
  registerCommandRoutes(app, { services, guard });

  // Errors thrown before a route runs, such as a malformed JSON body.
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    send(res)(
      isBodyParseError(error)
        ? domainErrorResponse(badRequest("Request body is not valid JSON"))
        : internalError(services.logger)(error)
    );
  });
};
