// Core types for the HD map element model

import { BoundingBox, Point2D } from '../geometry';

/**
 * Element IDs are integers; values must stay within Number.MAX_SAFE_INTEGER.
 */
export type ElementId = number;

export type LaneType = 'driving' | 'sidewalk' | 'bike' | 'parking' | 'shoulder' | 'restricted';
export type TrafficLightState = 'red' | 'yellow' | 'green' | 'red_yellow' | 'unknown';
export type TrafficSignType =
  | 'stop'
  | 'yield'
  | 'speed_limit'
  | 'no_entry'
  | 'one_way'
  | 'parking'
  | 'pedestrian_crossing'
  | 'school_zone'
  | 'other';

/**
 * Single lanelet with centerline, boundaries and lane graph edges
 */
export interface Lane {
  id: ElementId;
  type: LaneType;
  centerline: Point2D[];
  leftBoundary: Point2D[];
  rightBoundary: Point2D[];
  predecessorIds: ElementId[];  // lane graph edges, not checked for existence
  successorIds: ElementId[];
  adjacentLeftIds: ElementId[];
  adjacentRightIds: ElementId[];
  speedLimit: number;           // m/s
  bbox: BoundingBox;            // cache, see computeLaneBoundingBox
}

export interface TrafficLight {
  id: ElementId;
  position: Point2D;
  state: TrafficLightState;
  controlledLaneIds: ElementId[];
  height: number;               // meters above ground
}

export interface TrafficSign {
  id: ElementId;
  position: Point2D;
  type: TrafficSignType;
  value: string;                // e.g. "50" for a speed limit
  affectedLaneIds: ElementId[];
  height: number;               // meters above ground
}

export type LaneInit = Partial<Omit<Lane, 'id' | 'bbox'>> & { id: ElementId };
export type TrafficLightInit = Partial<Omit<TrafficLight, 'id'>> & { id: ElementId };
export type TrafficSignInit = Partial<Omit<TrafficSign, 'id'>> & { id: ElementId };

export function createLane(init: LaneInit): Lane {
  const lane: Lane = {
    id: init.id,
    type: init.type ?? 'driving',
    centerline: init.centerline ?? [],
    leftBoundary: init.leftBoundary ?? [],
    rightBoundary: init.rightBoundary ?? [],
    predecessorIds: init.predecessorIds ?? [],
    successorIds: init.successorIds ?? [],
    adjacentLeftIds: init.adjacentLeftIds ?? [],
    adjacentRightIds: init.adjacentRightIds ?? [],
    speedLimit: init.speedLimit ?? 0,
    bbox: new BoundingBox(),
  };
  computeLaneBoundingBox(lane);
  return lane;
}

export function createTrafficLight(init: TrafficLightInit): TrafficLight {
  return {
    id: init.id,
    position: init.position ?? new Point2D(),
    state: init.state ?? 'unknown',
    controlledLaneIds: init.controlledLaneIds ?? [],
    height: init.height ?? 0,
  };
}

export function createTrafficSign(init: TrafficSignInit): TrafficSign {
  return {
    id: init.id,
    position: init.position ?? new Point2D(),
    type: init.type ?? 'other',
    value: init.value ?? '',
    affectedLaneIds: init.affectedLaneIds ?? [],
    height: init.height ?? 0,
  };
}

/**
 * Recompute the cached box from centerline and both boundaries.
 * A lane without a centerline gets the zero box.
 */
export function computeLaneBoundingBox(lane: Lane): BoundingBox {
  if (lane.centerline.length === 0) {
    lane.bbox = new BoundingBox();
    return lane.bbox;
  }

  lane.bbox = BoundingBox.fromPoints([
    ...lane.centerline,
    ...lane.leftBoundary,
    ...lane.rightBoundary,
  ]);
  return lane.bbox;
}

/**
 * Non-owning references stored in the spatial indices
 */
export type LaneRef = { kind: 'lane'; id: ElementId };
export type TrafficLightRef = { kind: 'trafficLight'; id: ElementId };
export type TrafficSignRef = { kind: 'trafficSign'; id: ElementId };
export type ElementRef = LaneRef | TrafficLightRef | TrafficSignRef;

/**
 * Deeply read-only view of a record. The store keeps the only writable
 * reference, so the spatial indices stay in step with the geometry.
 */
export type Immutable<T> = T extends (...args: never[]) => unknown
  ? T
  : T extends object
    ? { readonly [K in keyof T]: Immutable<T[K]> }
    : T;

export type LaneView = Immutable<Lane>;
export type TrafficLightView = Immutable<TrafficLight>;
export type TrafficSignView = Immutable<TrafficSign>;

/**
 * Elements returned by a spatial query, in index traversal order
 */
export class QueryResult {
  lanes: LaneView[] = [];
  trafficLights: TrafficLightView[] = [];
  trafficSigns: TrafficSignView[] = [];

  clear(): void {
    this.lanes = [];
    this.trafficLights = [];
    this.trafficSigns = [];
  }

  totalCount(): number {
    return this.lanes.length + this.trafficLights.length + this.trafficSigns.length;
  }
}

/**
 * Admission limits checked after every parse
 */
export interface MemoryConstraints {
  maxTotalMemory: number;       // bytes
  maxLanes: number;
  maxTrafficLights: number;
  maxTrafficSigns: number;
}

export type MemoryProfile = 'default' | 'large';

export const MEMORY_PROFILES: Readonly<Record<MemoryProfile, Readonly<MemoryConstraints>>> = {
  default: {
    maxTotalMemory: 64 * 1024 * 1024,
    maxLanes: 10000,
    maxTrafficLights: 5000,
    maxTrafficSigns: 5000,
  },
  large: {
    maxTotalMemory: 128 * 1024 * 1024,
    maxLanes: 20000,
    maxTrafficLights: 10000,
    maxTrafficSigns: 10000,
  },
};

export function isMemoryProfile(value: string): value is MemoryProfile {
  return value === 'default' || value === 'large';
}
