import type { ElementId, Lane, TrafficLight, TrafficSign } from './types';

/**
 * Receiver for records produced by a map parser
 */
export interface MapElementSink {
  addLane(lane: Lane): void;
  addTrafficLight(light: TrafficLight): void;
  addTrafficSign(sign: TrafficSign): void;
}

/**
 * Owns every loaded element, keyed by ID.
 *
 * The spatial indices only keep IDs into this store. Adding an element
 * with an ID that is already present replaces the previous record.
 */
export class MapElementStore implements MapElementSink {
  private lanes = new Map<ElementId, Lane>();
  private trafficLights = new Map<ElementId, TrafficLight>();
  private trafficSigns = new Map<ElementId, TrafficSign>();

  addLane(lane: Lane): void {
    this.lanes.set(lane.id, lane);
  }

  addTrafficLight(light: TrafficLight): void {
    this.trafficLights.set(light.id, light);
  }

  addTrafficSign(sign: TrafficSign): void {
    this.trafficSigns.set(sign.id, sign);
  }

  getLane(id: ElementId): Lane | undefined {
    return this.lanes.get(id);
  }

  getTrafficLight(id: ElementId): TrafficLight | undefined {
    return this.trafficLights.get(id);
  }

  getTrafficSign(id: ElementId): TrafficSign | undefined {
    return this.trafficSigns.get(id);
  }

  allLanes(): IterableIterator<Lane> {
    return this.lanes.values();
  }

  allTrafficLights(): IterableIterator<TrafficLight> {
    return this.trafficLights.values();
  }

  allTrafficSigns(): IterableIterator<TrafficSign> {
    return this.trafficSigns.values();
  }

  get laneCount(): number {
    return this.lanes.size;
  }

  get trafficLightCount(): number {
    return this.trafficLights.size;
  }

  get trafficSignCount(): number {
    return this.trafficSigns.size;
  }

  get elementCount(): number {
    return this.lanes.size + this.trafficLights.size + this.trafficSigns.size;
  }

  /**
   * Lights whose controlled lanes include the given lane (linear scan)
   */
  trafficLightsForLane(laneId: ElementId): TrafficLight[] {
    return [...this.trafficLights.values()].filter(light => light.controlledLaneIds.includes(laneId));
  }

  /**
   * Signs whose affected lanes include the given lane (linear scan)
   */
  trafficSignsForLane(laneId: ElementId): TrafficSign[] {
    return [...this.trafficSigns.values()].filter(sign => sign.affectedLaneIds.includes(laneId));
  }

  clear(): void {
    this.lanes.clear();
    this.trafficLights.clear();
    this.trafficSigns.clear();
  }
}
