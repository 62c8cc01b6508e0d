import { Point2D } from '../src/geometry';
import { MapElementStore } from '../src/hd-map/MapElementStore';
import { createLane, createTrafficLight, createTrafficSign } from '../src/hd-map/types';

describe('MapElementStore', () => {
  let store: MapElementStore;

  beforeEach(() => {
    store = new MapElementStore();
    store.addLane(createLane({ id: 1, centerline: [new Point2D(0, 0)] }));
    store.addLane(createLane({ id: 2, centerline: [new Point2D(5, 0)] }));
    store.addTrafficLight(createTrafficLight({ id: 10, controlledLaneIds: [1, 2] }));
    store.addTrafficLight(createTrafficLight({ id: 11, controlledLaneIds: [2] }));
    store.addTrafficSign(createTrafficSign({ id: 20, affectedLaneIds: [1, 404] }));
  });

  it('should count elements by kind', () => {
    expect(store.laneCount).toBe(2);
    expect(store.trafficLightCount).toBe(2);
    expect(store.trafficSignCount).toBe(1);
    expect(store.elementCount).toBe(5);
  });

  it('should return undefined for unknown ids', () => {
    expect(store.getLane(3)).toBeUndefined();
    expect(store.getTrafficLight(1)).toBeUndefined();
    expect(store.getTrafficSign(10)).toBeUndefined();
  });

  it('should replace an element added twice', () => {
    store.addLane(createLane({ id: 1, type: 'bike' }));
    expect(store.laneCount).toBe(2);
    expect(store.getLane(1)?.type).toBe('bike');
  });

  it('should find regulatory elements by lane', () => {
    expect(store.trafficLightsForLane(2).map(l => l.id)).toEqual([10, 11]);
    expect(store.trafficLightsForLane(1).map(l => l.id)).toEqual([10]);
    expect(store.trafficSignsForLane(404).map(s => s.id)).toEqual([20]);
    expect(store.trafficSignsForLane(2)).toEqual([]);
  });

  it('should iterate in insertion order', () => {
    expect([...store.allLanes()].map(l => l.id)).toEqual([1, 2]);
    expect([...store.allTrafficLights()].map(l => l.id)).toEqual([10, 11]);
    expect([...store.allTrafficSigns()].map(s => s.id)).toEqual([20]);
  });

  it('should clear every collection', () => {
    store.clear();
    expect(store.elementCount).toBe(0);
    expect(store.getLane(1)).toBeUndefined();
  });
});
