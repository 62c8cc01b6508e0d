import path from 'node:path';
import { BoundingBox, Point2D } from '../src/geometry';
import type { MapParser } from '../src/hd-map/lanelet2/Lanelet2Parser';
import type { MapElementSink } from '../src/hd-map/MapElementStore';
import { MapServer } from '../src/hd-map/MapServer';
import {
  MEMORY_PROFILES,
  createLane,
  createTrafficLight,
  createTrafficSign,
  type MemoryConstraints,
} from '../src/hd-map/types';

const SAMPLE_MAP = path.join(__dirname, 'fixtures', 'sample_map.osm');

/**
 * In-process parser that feeds fixed records into the store
 */
class FakeParser implements MapParser {
  constructor(private readonly fill: (sink: MapElementSink) => boolean, private readonly error = '') {}

  parse(_filePath: string, sink: MapElementSink): boolean {
    return this.fill(sink);
  }

  getLastError(): string {
    return this.error;
  }
}

function serverWith(fill: (sink: MapElementSink) => void, constraints?: MemoryConstraints): MapServer {
  const server = new MapServer({
    constraints,
    parser: new FakeParser(sink => {
      fill(sink);
      return true;
    }),
  });
  expect(server.loadFromFile('fake.osm')).toBe(true);
  return server;
}

const p = (x: number, y: number) => new Point2D(x, y);
const ids = (elements: { id: number }[]) => elements.map(e => e.id).sort((a, b) => a - b);

describe('MapServer', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe('with the sample Lanelet2 map', () => {
    let server: MapServer;

    beforeEach(() => {
      server = new MapServer();
      expect(server.loadFromFile(SAMPLE_MAP)).toBe(true);
    });

    it('should load lanes, lights and signs', () => {
      expect(server.getState()).toBe('loaded');
      expect(server.getLaneCount()).toBe(2);
      expect(server.getTrafficLightCount()).toBe(1);
      expect(server.getTrafficSignCount()).toBe(1);
    });

    it('should return only the lane inside a region', () => {
      const result = server.queryRegion(new BoundingBox(p(0, 0), p(50, 50)));
      expect(ids(result.lanes)).toEqual([100]);
      expect(result.trafficLights).toEqual([]);
      expect(result.trafficSigns).toEqual([]);
      expect(result.totalCount()).toBe(1);
    });

    it('should return every element for a region covering the map', () => {
      const result = server.queryRegion(new BoundingBox(p(-1, -1), p(101, 101)));
      expect(ids(result.lanes)).toEqual([100, 101]);
      expect(ids(result.trafficLights)).toEqual([200]);
      expect(ids(result.trafficSigns)).toEqual([300]);
    });

    it('should find the closest lane', () => {
      expect(server.getClosestLane(p(2, 2))?.id).toBe(100);
      expect(server.getClosestLane(p(97, 60))?.id).toBe(101);
    });

    it('should look up elements by id', () => {
      const lane = server.getLaneById(100);
      expect(lane?.centerline).toEqual([p(0, 0), p(0, 100)]);
      expect(lane?.successorIds).toEqual([101]);
      expect(lane?.speedLimit).toBe(13.89);
      expect(server.getTrafficLightById(200)?.position).toEqual(p(0, 100));
      expect(server.getTrafficSignById(300)?.value).toBe('50');
      expect(server.getLaneById(999)).toBeUndefined();
      expect(server.getTrafficLightById(999)).toBeUndefined();
      expect(server.getTrafficSignById(999)).toBeUndefined();
    });

    it('should find regulatory elements for a lane', () => {
      expect(ids(server.getTrafficLightsForLane(100))).toEqual([200]);
      expect(server.getTrafficLightsForLane(101)).toEqual([]);
      expect(ids(server.getTrafficSignsForLane(101))).toEqual([300]);
      expect(server.getTrafficSignsForLane(100)).toEqual([]);
    });

    it('should estimate memory usage deterministically', () => {
      // lanes 2 x (224 + 2 points + 1 id), light 64 + 1 id, sign 96 + "50" + 1 id, 4 index entries
      expect(server.getMemoryUsage()).toBe(528 + 72 + 106 + 256);
    });

    it('should report stats', () => {
      server.queryRegion(new BoundingBox(p(0, 0), p(1, 1)));
      const stats = server.getStats();
      expect(stats.state).toBe('loaded');
      expect(stats.counts).toEqual({ lanes: 2, trafficLights: 1, trafficSigns: 1 });
      expect(stats.indexHeights).toEqual({ lanes: 1, trafficLights: 1, trafficSigns: 1 });
      expect(stats.timings.load.calls).toBe(1);
      expect(stats.timings.queryRegion.calls).toBe(1);
    });

    it('should empty everything on clear', () => {
      const cleared = jest.fn();
      server.events.on('cleared', cleared);

      server.clear();

      expect(cleared).toHaveBeenCalledTimes(1);
      expect(server.getState()).toBe('empty');
      expect(server.getLaneCount()).toBe(0);
      expect(server.getTrafficLightCount()).toBe(0);
      expect(server.getTrafficSignCount()).toBe(0);
      expect(server.getMemoryUsage()).toBe(0);
      expect(server.queryRegion(new BoundingBox(p(-1, -1), p(101, 101))).totalCount()).toBe(0);
    });
  });

  describe('queryRadius', () => {
    it('should exclude elements inside the bounding square but outside the circle', () => {
      // (7.1, 7.1) is 10.04 from the origin
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 1, centerline: [p(7.1, 7.1)] }));
        sink.addLane(createLane({ id: 2, centerline: [p(10, 0)] }));
        sink.addTrafficLight(createTrafficLight({ id: 10, position: p(7.1, 7.1) }));
        sink.addTrafficLight(createTrafficLight({ id: 11, position: p(7, 7) }));
        sink.addTrafficSign(createTrafficSign({ id: 20, position: p(-7.1, 7.1) }));
        sink.addTrafficSign(createTrafficSign({ id: 21, position: p(0, -9.5) }));
      });

      const result = server.queryRadius(p(0, 0), 10);
      expect(ids(result.lanes)).toEqual([2]);
      expect(ids(result.trafficLights)).toEqual([11]);
      expect(ids(result.trafficSigns)).toEqual([21]);
    });

    it('should keep a lane if any centerline point is within the radius', () => {
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 1, centerline: [p(-50, 0), p(3, 0), p(50, 0)] }));
        // Crosses the circle between points, but no point lies inside it
        sink.addLane(createLane({ id: 2, centerline: [p(-50, 1), p(50, 1)] }));
      });

      expect(ids(server.getNearbyLanes(p(0, 0), 5))).toEqual([1]);
    });

    it('should return nothing for a negative radius', () => {
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 1, centerline: [p(0, 0)] }));
      });

      expect(server.queryRadius(p(0, 0), -1).totalCount()).toBe(0);
      expect(server.queryRadius(p(0, 0), 0).lanes).toHaveLength(1);
    });
  });

  describe('getClosestLane', () => {
    it('should widen the search to 200 when nothing is within 50', () => {
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 7, centerline: [p(120, 0), p(180, 0)] }));
      });

      expect(server.getClosestLane(p(0, 0))?.id).toBe(7);
    });

    it('should give up when no lane is within 200', () => {
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 7, centerline: [p(250, 0)] }));
      });

      expect(server.getClosestLane(p(0, 0))).toBeUndefined();
    });

    it('should stop at the first radius that finds candidates', () => {
      // Lane 2 is closer to (0, 0) by its box, but only lane 1 has a point within 50
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 1, centerline: [p(40, 0)] }));
        sink.addLane(createLane({ id: 2, centerline: [p(-60, -60), p(60, 60)] }));
      });

      expect(server.getClosestLane(p(0, 0))?.id).toBe(1);
    });

    it('should pick the lane with the nearest centerline point', () => {
      const server = serverWith(sink => {
        sink.addLane(createLane({ id: 1, centerline: [p(0, 10), p(30, 10)] }));
        sink.addLane(createLane({ id: 2, centerline: [p(0, -4), p(30, -40)] }));
      });

      expect(server.getClosestLane(p(0, 0))?.id).toBe(2);
    });

    it('should keep the first lane seen when two are equally close', () => {
      const upFirst = serverWith(sink => {
        sink.addLane(createLane({ id: 5, centerline: [p(0, 10), p(0, 30)] }));
        sink.addLane(createLane({ id: 3, centerline: [p(0, -10), p(0, -30)] }));
      });
      expect(upFirst.getClosestLane(p(0, 0))?.id).toBe(5);

      const downFirst = serverWith(sink => {
        sink.addLane(createLane({ id: 3, centerline: [p(0, -10), p(0, -30)] }));
        sink.addLane(createLane({ id: 5, centerline: [p(0, 10), p(0, 30)] }));
      });
      expect(downFirst.getClosestLane(p(0, 0))?.id).toBe(3);
    });

    it('should return nothing on an empty server', () => {
      expect(new MapServer().getClosestLane(p(0, 0))).toBeUndefined();
    });
  });

  describe('loading', () => {
    const tight: MemoryConstraints = { ...MEMORY_PROFILES.default, maxLanes: 2 };

    it('should discard a map with too many lanes', () => {
      const server = new MapServer({
        constraints: tight,
        parser: new FakeParser(sink => {
          for (let id = 1; id <= 3; id++) {
            sink.addLane(createLane({ id, centerline: [p(id, id)] }));
          }
          return true;
        }),
      });

      expect(server.loadFromFile('big.osm')).toBe(false);
      expect(server.getLaneCount()).toBe(0);
      expect(server.getState()).toBe('empty');
      expect(server.getLastError()).toBe('Lane count 3 exceeds limit 2');
      expect(server.queryRegion(new BoundingBox(p(0, 0), p(10, 10))).totalCount()).toBe(0);
    });

    it('should discard a map over the memory ceiling', () => {
      const server = new MapServer({
        constraints: { ...MEMORY_PROFILES.default, maxTotalMemory: 100 },
        parser: new FakeParser(sink => {
          sink.addLane(createLane({ id: 1, centerline: [p(0, 0)] }));
          return true;
        }),
      });

      expect(server.loadFromFile('heavy.osm')).toBe(false);
      // 224 + 1 point + 1 index entry
      expect(server.getLastError()).toBe('Estimated memory 304 bytes exceeds limit 100');
    });

    it('should count index overhead against the memory ceiling', () => {
      // One lane with one point: 240 record bytes, 304 once indexed
      const oneLane = (maxTotalMemory: number) => new MapServer({
        constraints: { ...MEMORY_PROFILES.default, maxTotalMemory },
        parser: new FakeParser(sink => {
          sink.addLane(createLane({ id: 1, centerline: [p(0, 0)] }));
          return true;
        }),
      });

      const recordsOnly = oneLane(240);
      expect(recordsOnly.loadFromFile('edge.osm')).toBe(false);
      expect(recordsOnly.getLastError()).toBe('Estimated memory 304 bytes exceeds limit 240');

      const oneShort = oneLane(303);
      expect(oneShort.loadFromFile('edge.osm')).toBe(false);
      expect(oneShort.getLastError()).toBe('Estimated memory 304 bytes exceeds limit 303');

      const exact = oneLane(304);
      expect(exact.loadFromFile('edge.osm')).toBe(true);
      expect(exact.getMemoryUsage()).toBe(304);
    });

    it('should drop the previous map when a new load fails', () => {
      const server = new MapServer();
      expect(server.loadFromFile(SAMPLE_MAP)).toBe(true);

      expect(server.loadFromFile('/nonexistent/path/map.osm')).toBe(false);
      expect(server.getLaneCount()).toBe(0);
      expect(server.getLastError()).toBe('Cannot open file: /nonexistent/path/map.osm');
    });

    it('should report the parser error', () => {
      const server = new MapServer({ parser: new FakeParser(() => false, 'broken input') });
      expect(server.loadFromFile('x.osm')).toBe(false);
      expect(server.getLastError()).toBe('broken input');
    });

    it('should treat a throwing parser as a failed load', () => {
      const server = new MapServer({
        parser: new FakeParser(sink => {
          sink.addLane(createLane({ id: 1, centerline: [p(0, 0)] }));
          throw new Error('unexpected token');
        }),
      });

      expect(server.loadFromFile('x.osm')).toBe(false);
      expect(server.getLastError()).toBe('unexpected token');
      expect(server.getLaneCount()).toBe(0);
    });

    it('should emit load events', () => {
      const loaded = jest.fn();
      const failed = jest.fn();
      const server = new MapServer();
      server.events.on('loaded', loaded);
      server.events.on('loadFailed', failed);

      server.loadFromFile(SAMPLE_MAP);
      server.loadFromFile('/nonexistent/map.osm');

      expect(loaded).toHaveBeenCalledWith(SAMPLE_MAP, { lanes: 2, trafficLights: 1, trafficSigns: 1 });
      expect(failed).toHaveBeenCalledWith('/nonexistent/map.osm', 'Cannot open file: /nonexistent/map.osm');
    });

    it('should give the same outcome when a load is repeated', () => {
      const server = new MapServer();
      expect(server.loadFromFile(SAMPLE_MAP)).toBe(true);
      const firstUsage = server.getMemoryUsage();

      expect(server.loadFromFile(SAMPLE_MAP)).toBe(true);
      expect(server.getLaneCount()).toBe(2);
      expect(server.getMemoryUsage()).toBe(firstUsage);
    });

    it('should index a large map and answer queries from it', () => {
      const server = serverWith(sink => {
        for (let i = 0; i < 400; i++) {
          const x = (i % 20) * 10;
          const y = Math.floor(i / 20) * 10;
          sink.addLane(createLane({ id: i, centerline: [p(x, y), p(x + 5, y)] }));
        }
      });

      expect(server.getStats().indexHeights.lanes).toBeGreaterThan(2);
      expect(ids(server.queryRegion(new BoundingBox(p(0, 0), p(4, 4))).lanes)).toEqual([0]);
      expect(server.queryRegion(new BoundingBox(p(-1, -1), p(300, 300))).lanes).toHaveLength(400);
    });
  });

  it('should return empty results before anything is loaded', () => {
    const server = new MapServer();
    expect(server.getState()).toBe('empty');
    expect(server.queryRegion(new BoundingBox(p(-1e6, -1e6), p(1e6, 1e6))).totalCount()).toBe(0);
    expect(server.queryRadius(p(0, 0), 1000).totalCount()).toBe(0);
    expect(server.getNearbyLanes(p(0, 0), 1000)).toEqual([]);
    expect(server.getMemoryUsage()).toBe(0);
  });
});
