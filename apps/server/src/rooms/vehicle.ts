import { Room, type Client } from "colyseus";
import { logger, type MapServer } from "@shared";
import { buildVehicleSnapshot, parsePositionMessage } from "./snapshot";

const log = logger.scoped("vehicle-room");

/**
 * Room class bound to a map server. Clients send `position` and receive a
 * `snapshot` of the map around them; map reloads are broadcast to everyone.
 */
export function createVehicleRoom(mapServer: MapServer, defaultRadius: number) {
  return class VehicleRoom extends Room {
    private stopMapListener: (() => void) | undefined;

    onCreate() {
      log.info(`Room ${this.roomId} created`);

      this.onMessage("position", (client: Client, message: unknown) => {
        const position = parsePositionMessage(message, defaultRadius);
        if (!position) {
          client.send("error", { message: "Invalid position message" });
          return;
        }
        client.send("snapshot", buildVehicleSnapshot(mapServer, position));
      });

      this.stopMapListener = mapServer.events.on("loaded", (filePath, counts) => {
        this.broadcast("mapReloaded", { filePath, counts });
      });
    }

    onJoin(client: Client) {
      log.info(`${client.sessionId} joined`);
    }

    onLeave(client: Client, consented: boolean) {
      log.info(`${client.sessionId} left${consented ? "" : " unexpectedly"}`);
    }

    onDispose() {
      this.stopMapListener?.();
      log.info(`Room ${this.roomId} disposing`);
    }
  };
}
