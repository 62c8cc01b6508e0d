import path from "node:path";
import {
  BoundingBox,
  Point2D,
  type ElementId,
  type LaneView,
  type MapServer,
  type MapServerStats,
  type QueryResult,
  type TrafficLightView,
  type TrafficSignView,
} from "@shared";
import { RequestError } from "./errors";

export type QueryParams = Record<string, unknown>;

export interface QueryResultBody {
  lanes: LaneView[];
  trafficLights: TrafficLightView[];
  trafficSigns: TrafficSignView[];
  totalCount: number;
}

export interface ClosestLaneBody {
  lane: LaneView;
  distance: number;
}

/**
 * Read a required finite number from the query string
 */
export function requireNumber(params: QueryParams, name: string): number {
  const raw = params[name];
  if (typeof raw !== "string" || raw.trim() === "") {
    throw new RequestError(400, `Missing query parameter "${name}"`);
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new RequestError(400, `Query parameter "${name}" must be a number`);
  }
  return value;
}

function requireRadius(params: QueryParams): number {
  const radius = requireNumber(params, "radius");
  if (radius < 0) {
    throw new RequestError(400, `Query parameter "radius" must not be negative`);
  }
  return radius;
}

export function parseElementId(raw: string): ElementId {
  const id = /^-?\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id)) {
    throw new RequestError(400, `Invalid element id "${raw}"`);
  }
  return id;
}

/**
 * Resolve a map path against the map directory, refusing paths that leave it
 */
export function resolveMapPath(mapDir: string, requested: string): string {
  const root = path.resolve(mapDir);
  const resolved = path.resolve(root, requested);
  if (resolved !== root && resolved.startsWith(root + path.sep)) {
    return resolved;
  }
  throw new RequestError(400, `Map path "${requested}" is outside the map directory`);
}

function toBody(result: QueryResult): QueryResultBody {
  return {
    lanes: result.lanes,
    trafficLights: result.trafficLights,
    trafficSigns: result.trafficSigns,
    totalCount: result.totalCount(),
  };
}

function found<T>(value: T | undefined, what: string, id: ElementId): T {
  if (value === undefined) {
    throw new RequestError(404, `${what} ${id} not found`);
  }
  return value;
}

/**
 * HTTP facing operations on a MapServer. Inputs are raw request values;
 * invalid input raises RequestError with the status to answer with.
 */
export class MapQueryApi {
  constructor(private readonly mapServer: MapServer, private readonly mapDir: string) {}

  getStats(): MapServerStats {
    return this.mapServer.getStats();
  }

  getLane(idParam: string): LaneView {
    const id = parseElementId(idParam);
    return found(this.mapServer.getLaneById(id), "Lane", id);
  }

  getTrafficLight(idParam: string): TrafficLightView {
    const id = parseElementId(idParam);
    return found(this.mapServer.getTrafficLightById(id), "Traffic light", id);
  }

  getTrafficSign(idParam: string): TrafficSignView {
    const id = parseElementId(idParam);
    return found(this.mapServer.getTrafficSignById(id), "Traffic sign", id);
  }

  getLaneTrafficLights(idParam: string): TrafficLightView[] {
    return this.mapServer.getTrafficLightsForLane(parseElementId(idParam));
  }

  getLaneTrafficSigns(idParam: string): TrafficSignView[] {
    return this.mapServer.getTrafficSignsForLane(parseElementId(idParam));
  }

  getClosestLane(params: QueryParams): ClosestLaneBody {
    const position = new Point2D(requireNumber(params, "x"), requireNumber(params, "y"));
    const lane = this.mapServer.getClosestLane(position);
    if (!lane) {
      throw new RequestError(404, `No lane near (${position.x}, ${position.y})`);
    }

    const distance = lane.centerline.reduce(
      (nearest, point) => Math.min(nearest, position.distanceTo(point)),
      Infinity
    );
    return { lane, distance };
  }

  getNearbyLanes(params: QueryParams): LaneView[] {
    const position = new Point2D(requireNumber(params, "x"), requireNumber(params, "y"));
    return this.mapServer.getNearbyLanes(position, requireRadius(params));
  }

  queryRegion(params: QueryParams): QueryResultBody {
    const min = new Point2D(requireNumber(params, "minX"), requireNumber(params, "minY"));
    const max = new Point2D(requireNumber(params, "maxX"), requireNumber(params, "maxY"));
    if (min.x > max.x || min.y > max.y) {
      throw new RequestError(400, "Region minimum must not exceed its maximum");
    }
    return toBody(this.mapServer.queryRegion(new BoundingBox(min, max)));
  }

  queryRadius(params: QueryParams): QueryResultBody {
    const center = new Point2D(requireNumber(params, "x"), requireNumber(params, "y"));
    return toBody(this.mapServer.queryRadius(center, requireRadius(params)));
  }

  loadMap(body: unknown): MapServerStats {
    const requested: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "path") : undefined;
    if (typeof requested !== "string" || requested.trim() === "") {
      throw new RequestError(400, `Body must contain a "path" string`);
    }

    const filePath = resolveMapPath(this.mapDir, requested);
    if (!this.mapServer.loadFromFile(filePath)) {
      throw new RequestError(422, this.mapServer.getLastError());
    }
    return this.mapServer.getStats();
  }

  clearMap(): MapServerStats {
    this.mapServer.clear();
    return this.mapServer.getStats();
  }
}
