import express from "express";
import type { Express } from "express";
import type { Server } from "node:http";

export type ReadinessProbe = () => boolean;

export const createHealthApp = (isReady: ReadinessProbe): Express => {
  const app = express();

  const health: express.RequestHandler = (_req, res) => {
    if (isReady()) {
      res.status(200).type("text/plain").send("OK");
      return;
    }
    res.status(503).type("text/plain").send("Service Unavailable");
  };

  app.get("/health", health);
  app.get("/", health);
  return app;
};

/** Resolves once the server is listening. */
export const startHealthServer = (port: number, isReady: ReadinessProbe): Promise<Server> => {
  return new Promise((resolve, reject) => {
    const server = createHealthApp(isReady).listen(port, () => {
      console.log(`Health check server listening on port ${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
};

export const stopHealthServer = (server: Server): Promise<void> => {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
};
