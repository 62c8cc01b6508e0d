import { BoundingBox, Point2D } from '../geometry';
import { EventBus } from '../eventBus';
import { logger } from '../logger';
import { QueryProfiler, type OperationTiming } from '../performance';
import { Lanelet2Parser, type MapParser } from './lanelet2/Lanelet2Parser';
import { MapElementStore } from './MapElementStore';
import { estimateIndexBytes, estimateStoreBytes } from './memory';
import { RTree } from './RTree';
import {
  MEMORY_PROFILES,
  QueryResult,
  computeLaneBoundingBox,
  type ElementId,
  type LaneRef,
  type LaneView,
  type MemoryConstraints,
  type TrafficLightRef,
  type TrafficLightView,
  type TrafficSignRef,
  type TrafficSignView,
} from './types';

/** First and second search radius of getClosestLane (meters) */
export const CLOSEST_LANE_SEARCH_RADII = [50, 200] as const;

export type MapServerState = 'empty' | 'loading' | 'loaded';

export interface MapCounts {
  lanes: number;
  trafficLights: number;
  trafficSigns: number;
}

export interface MapServerStats {
  state: MapServerState;
  counts: MapCounts;
  memoryUsage: number;
  constraints: MemoryConstraints;
  indexHeights: { lanes: number; trafficLights: number; trafficSigns: number };
  timings: Record<string, OperationTiming>;
}

export type MapServerEvents = {
  loaded: [filePath: string, counts: MapCounts];
  loadFailed: [filePath: string, reason: string];
  cleared: [];
};

export interface MapServerOptions {
  constraints?: MemoryConstraints;
  parser?: MapParser;
}

const log = logger.scoped('map-server');

/**
 * HD map query API.
 *
 * Owns the element store and one R-tree per element kind. A load is
 * all-or-nothing: on any failure the server is left empty. Queries on an
 * empty server return empty results.
 */
export class MapServer {
  readonly events = new EventBus<MapServerEvents>();
  readonly profiler = new QueryProfiler();

  private readonly constraints: MemoryConstraints;
  private readonly parser: MapParser;
  private readonly store = new MapElementStore();
  private readonly laneIndex = new RTree<LaneRef>();
  private readonly trafficLightIndex = new RTree<TrafficLightRef>();
  private readonly trafficSignIndex = new RTree<TrafficSignRef>();
  private state: MapServerState = 'empty';
  private lastError = '';

  constructor(options: MapServerOptions = {}) {
    this.constraints = { ...(options.constraints ?? MEMORY_PROFILES.default) };
    this.parser = options.parser ?? new Lanelet2Parser();
  }

  /**
   * Replace the current map with the contents of a file
   */
  loadFromFile(filePath: string): boolean {
    return this.profiler.measure('load', () => {
      this.reset();
      this.state = 'loading';

      let parsed: boolean;
      try {
        parsed = this.parser.parse(filePath, this.store);
      } catch (error) {
        return this.failLoad(filePath, error instanceof Error ? error.message : 'Unknown error');
      }
      if (!parsed) {
        return this.failLoad(filePath, this.parser.getLastError() || 'Parse failed');
      }

      const violation = this.checkMemoryConstraints();
      if (violation) {
        return this.failLoad(filePath, violation);
      }

      this.buildSpatialIndices();
      this.state = 'loaded';

      const counts = this.getCounts();
      log.info(
        `Loaded ${filePath}: ${counts.lanes} lanes, ${counts.trafficLights} lights, ` +
        `${counts.trafficSigns} signs, ~${this.getMemoryUsage()} bytes`
      );
      this.events.emit('loaded', filePath, counts);
      return true;
    });
  }

  queryRegion(region: BoundingBox): QueryResult {
    return this.profiler.measure('queryRegion', () => {
      const result = new QueryResult();
      result.lanes = this.resolveLanes(this.laneIndex.query(region));
      result.trafficLights = this.resolveTrafficLights(this.trafficLightIndex.query(region));
      result.trafficSigns = this.resolveTrafficSigns(this.trafficSignIndex.query(region));
      return result;
    });
  }

  /**
   * Elements within `radius` of `center`.
   *
   * The indices return everything inside the bounding square; candidates are
   * then kept only if a centerline point (lanes) or the position (lights and
   * signs) lies within the circle.
   */
  queryRadius(center: Point2D, radius: number): QueryResult {
    return this.profiler.measure('queryRadius', () => {
      const result = new QueryResult();
      if (!Number.isFinite(radius) || radius < 0) return result;

      result.lanes = this.resolveLanes(this.laneIndex.queryRadius(center, radius)).filter(lane =>
        lane.centerline.some(point => center.distanceTo(point) <= radius)
      );
      result.trafficLights = this.resolveTrafficLights(this.trafficLightIndex.queryRadius(center, radius)).filter(
        light => center.distanceTo(light.position) <= radius
      );
      result.trafficSigns = this.resolveTrafficSigns(this.trafficSignIndex.queryRadius(center, radius)).filter(
        sign => center.distanceTo(sign.position) <= radius
      );
      return result;
    });
  }

  getLaneById(id: ElementId): LaneView | undefined {
    return this.store.getLane(id);
  }

  getTrafficLightById(id: ElementId): TrafficLightView | undefined {
    return this.store.getTrafficLight(id);
  }

  getTrafficSignById(id: ElementId): TrafficSignView | undefined {
    return this.store.getTrafficSign(id);
  }

  getNearbyLanes(position: Point2D, maxDistance: number): LaneView[] {
    return this.queryRadius(position, maxDistance).lanes;
  }

  /**
   * Lane owning the centerline point nearest to `position`.
   *
   * Local search only: looks within 50 m, then 200 m, and gives up after
   * that even if a lane exists farther away.
   */
  getClosestLane(position: Point2D): LaneView | undefined {
    let candidates: LaneView[] = [];
    for (const radius of CLOSEST_LANE_SEARCH_RADII) {
      candidates = this.getNearbyLanes(position, radius);
      if (candidates.length > 0) break;
    }

    let closestLane: LaneView | undefined;
    let minDistance = Infinity;

    for (const lane of candidates) {
      for (const point of lane.centerline) {
        const distance = position.distanceTo(point);
        if (distance < minDistance) {
          minDistance = distance;
          closestLane = lane;
        }
      }
    }

    return closestLane;
  }

  getTrafficLightsForLane(laneId: ElementId): TrafficLightView[] {
    return this.store.trafficLightsForLane(laneId);
  }

  getTrafficSignsForLane(laneId: ElementId): TrafficSignView[] {
    return this.store.trafficSignsForLane(laneId);
  }

  getLaneCount(): number {
    return this.store.laneCount;
  }

  getTrafficLightCount(): number {
    return this.store.trafficLightCount;
  }

  getTrafficSignCount(): number {
    return this.store.trafficSignCount;
  }

  /**
   * Estimated bytes of all records plus a fixed cost per index entry
   */
  getMemoryUsage(): number {
    const indexEntries = this.laneIndex.size() + this.trafficLightIndex.size() + this.trafficSignIndex.size();
    return estimateStoreBytes(this.store) + estimateIndexBytes(indexEntries);
  }

  /**
   * Describe the first violated limit, or null when the parsed map fits.
   * Index overhead is counted for the entries the map will get once indexed.
   */
  checkMemoryConstraints(): string | null {
    const { maxLanes, maxTrafficLights, maxTrafficSigns, maxTotalMemory } = this.constraints;

    if (this.store.laneCount > maxLanes) {
      return `Lane count ${this.store.laneCount} exceeds limit ${maxLanes}`;
    }
    if (this.store.trafficLightCount > maxTrafficLights) {
      return `Traffic light count ${this.store.trafficLightCount} exceeds limit ${maxTrafficLights}`;
    }
    if (this.store.trafficSignCount > maxTrafficSigns) {
      return `Traffic sign count ${this.store.trafficSignCount} exceeds limit ${maxTrafficSigns}`;
    }

    const projected = estimateStoreBytes(this.store) + estimateIndexBytes(this.store.elementCount);
    if (projected > maxTotalMemory) {
      return `Estimated memory ${projected} bytes exceeds limit ${maxTotalMemory}`;
    }

    return null;
  }

  clear(): void {
    this.reset();
    this.events.emit('cleared');
  }

  getState(): MapServerState {
    return this.state;
  }

  getLastError(): string {
    return this.lastError;
  }

  getConstraints(): MemoryConstraints {
    return { ...this.constraints };
  }

  getCounts(): MapCounts {
    return {
      lanes: this.store.laneCount,
      trafficLights: this.store.trafficLightCount,
      trafficSigns: this.store.trafficSignCount,
    };
  }

  getStats(): MapServerStats {
    return {
      state: this.state,
      counts: this.getCounts(),
      memoryUsage: this.getMemoryUsage(),
      constraints: this.getConstraints(),
      indexHeights: {
        lanes: this.laneIndex.height(),
        trafficLights: this.trafficLightIndex.height(),
        trafficSigns: this.trafficSignIndex.height(),
      },
      timings: this.profiler.snapshot(),
    };
  }

  /**
   * Rebuild all three indices from the store
   */
  private buildSpatialIndices(): void {
    this.laneIndex.clear();
    for (const lane of this.store.allLanes()) {
      this.laneIndex.insert(computeLaneBoundingBox(lane), { kind: 'lane', id: lane.id });
    }

    this.trafficLightIndex.clear();
    for (const light of this.store.allTrafficLights()) {
      this.trafficLightIndex.insert(BoundingBox.ofPoint(light.position), { kind: 'trafficLight', id: light.id });
    }

    this.trafficSignIndex.clear();
    for (const sign of this.store.allTrafficSigns()) {
      this.trafficSignIndex.insert(BoundingBox.ofPoint(sign.position), { kind: 'trafficSign', id: sign.id });
    }
  }

  private failLoad(filePath: string, reason: string): false {
    this.reset();
    this.lastError = reason;
    log.warn(`Failed to load ${filePath}: ${reason}`);
    this.events.emit('loadFailed', filePath, reason);
    return false;
  }

  private reset(): void {
    this.store.clear();
    this.laneIndex.clear();
    this.trafficLightIndex.clear();
    this.trafficSignIndex.clear();
    this.state = 'empty';
    this.lastError = '';
  }

  private resolveLanes(refs: LaneRef[]): LaneView[] {
    const lanes: LaneView[] = [];
    for (const ref of refs) {
      const lane = this.store.getLane(ref.id);
      if (lane) lanes.push(lane);
    }
    return lanes;
  }

  private resolveTrafficLights(refs: TrafficLightRef[]): TrafficLightView[] {
    const lights: TrafficLightView[] = [];
    for (const ref of refs) {
      const light = this.store.getTrafficLight(ref.id);
      if (light) lights.push(light);
    }
    return lights;
  }

  private resolveTrafficSigns(refs: TrafficSignRef[]): TrafficSignView[] {
    const signs: TrafficSignView[] = [];
    for (const ref of refs) {
      const sign = this.store.getTrafficSign(ref.id);
      if (sign) signs.push(sign);
    }
    return signs;
  }
}
