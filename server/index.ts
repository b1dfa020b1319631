import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { createLogger } from "./log";

const log = createLogger("express");

const app = express();
app.use(express.json({ limit: "5mb" }));

const httpServer = createServer(app);
await registerRoutes(httpServer, app);

const port = parseInt(process.env.PORT || "5000", 10);
httpServer.listen(port, "0.0.0.0", () => {
  log.info(`serving on port ${port}`);
});
