import { Server } from "colyseus";
import { WebSocketTransport } from "@colyseus/ws-transport";
import { createServer } from "http";
import express from "express";
import { MEMORY_PROFILES, MapServer, logger } from "@shared";
import { MapQueryApi } from "./api/handlers";
import { createMapRouter, errorHandler } from "./api/routes";
import { loadConfig } from "./config";
import { createVehicleRoom } from "./rooms/vehicle";

function main(): Promise<unknown> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const mapServer = new MapServer({ constraints: MEMORY_PROFILES[config.memoryProfile] });
  if (config.mapFile && !mapServer.loadFromFile(config.mapFile)) {
    logger.error(`Startup map ${config.mapFile} not loaded: ${mapServer.getLastError()}`);
  }

  const app = express();
  app.use(express.json());
  app.use("/api", createMapRouter(new MapQueryApi(mapServer, config.mapDir)));
  app.use(errorHandler);

  const gameServer = new Server({
    transport: new WebSocketTransport({ server: createServer(app) }),
  });

  // Register the vehicle room
  gameServer.define("vehicle", createVehicleRoom(mapServer, config.snapshotRadius));

  return gameServer.listen(config.port).then(() => {
    logger.info(`Server listening on http://localhost:${config.port} (profile ${config.memoryProfile})`);
  });
}

try {
  main().catch(error => {
    logger.error("Server failed to start", error);
    process.exitCode = 1;
  });
} catch (error) {
  logger.error("Invalid configuration", error);
  process.exitCode = 1;
}
