import { Point2D, type ElementId, type LaneType, type MapServer, type TrafficLightState, type TrafficSignType } from "@shared";

/** Upper bound on the radius a client may ask for (meters) */
export const MAX_SNAPSHOT_RADIUS = 500;

export interface VehiclePosition {
  x: number;
  y: number;
  radius: number;
}

export interface VehicleSnapshot {
  closestLaneId: ElementId | null;
  lanes: { id: ElementId; type: LaneType; speedLimit: number }[];
  trafficLights: { id: ElementId; state: TrafficLightState; distance: number }[];
  trafficSigns: { id: ElementId; type: TrafficSignType; value: string; distance: number }[];
}

function finiteField(message: object, key: string): number | undefined {
  const value: unknown = Reflect.get(message, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Validate a `position` message; null when it is malformed.
 * A missing radius falls back to the default, larger ones are capped.
 */
export function parsePositionMessage(message: unknown, defaultRadius: number): VehiclePosition | null {
  if (typeof message !== "object" || message === null) return null;

  const x = finiteField(message, "x");
  const y = finiteField(message, "y");
  if (x === undefined || y === undefined) return null;

  let radius = defaultRadius;
  if (Reflect.has(message, "radius")) {
    const requested = finiteField(message, "radius");
    if (requested === undefined || requested < 0) return null;
    radius = requested;
  }

  return { x, y, radius: Math.min(radius, MAX_SNAPSHOT_RADIUS) };
}

/**
 * Everything a vehicle needs around its position, nearest regulatory elements first
 */
export function buildVehicleSnapshot(mapServer: MapServer, position: VehiclePosition): VehicleSnapshot {
  const center = new Point2D(position.x, position.y);
  const result = mapServer.queryRadius(center, position.radius);

  return {
    closestLaneId: mapServer.getClosestLane(center)?.id ?? null,
    lanes: result.lanes.map(lane => ({ id: lane.id, type: lane.type, speedLimit: lane.speedLimit })),
    trafficLights: result.trafficLights
      .map(light => ({ id: light.id, state: light.state, distance: center.distanceTo(light.position) }))
      .sort((a, b) => a.distance - b.distance),
    trafficSigns: result.trafficSigns
      .map(sign => ({ id: sign.id, type: sign.type, value: sign.value, distance: center.distanceTo(sign.position) }))
      .sort((a, b) => a.distance - b.distance),
  };
}
