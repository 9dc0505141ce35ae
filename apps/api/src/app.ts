import express from "express";
import type { Services } from "./infra/container.js";
import { registerRoutes } from "./http/routes/routes.js";

export const createApp = (services: Services) => {
  const app = express();
  app.use(express.json());

  registerRoutes(app, services);

  return app;
};
