import type { MapElementStore } from './MapElementStore';
import type { Lane, TrafficLight, TrafficSign } from './types';

/**
 * Byte costs used for admission control.
 * These model a packed native layout, not the JS heap.
 */
export const MEMORY_COST = {
  lane: 224,
  trafficLight: 64,
  trafficSign: 96,
  point: 16,
  id: 8,
  indexEntry: 64,
} as const;

export function estimateLaneBytes(lane: Lane): number {
  const points = lane.centerline.length + lane.leftBoundary.length + lane.rightBoundary.length;
  const ids =
    lane.predecessorIds.length +
    lane.successorIds.length +
    lane.adjacentLeftIds.length +
    lane.adjacentRightIds.length;

  return MEMORY_COST.lane + points * MEMORY_COST.point + ids * MEMORY_COST.id;
}

export function estimateTrafficLightBytes(light: TrafficLight): number {
  return MEMORY_COST.trafficLight + light.controlledLaneIds.length * MEMORY_COST.id;
}

export function estimateTrafficSignBytes(sign: TrafficSign): number {
  return (
    MEMORY_COST.trafficSign +
    Buffer.byteLength(sign.value, 'utf8') +
    sign.affectedLaneIds.length * MEMORY_COST.id
  );
}

/**
 * Estimated bytes of every record in the store, without index overhead
 */
export function estimateStoreBytes(store: MapElementStore): number {
  let total = 0;

  for (const lane of store.allLanes()) total += estimateLaneBytes(lane);
  for (const light of store.allTrafficLights()) total += estimateTrafficLightBytes(light);
  for (const sign of store.allTrafficSigns()) total += estimateTrafficSignBytes(sign);

  return total;
}

export function estimateIndexBytes(entryCount: number): number {
  return entryCount * MEMORY_COST.indexEntry;
}
