import { readFileSync } from 'node:fs';
import { Point2D } from '../../geometry';
import { logger } from '../../logger';
import type { MapElementSink } from '../MapElementStore';
import {
  createLane,
  createTrafficLight,
  createTrafficSign,
  type ElementId,
  type LaneType,
  type TrafficLightState,
  type TrafficSignType,
} from '../types';
import { OsmXmlReader, type OSMDocument, type OSMRelation, type OSMWay } from './osm-xml';

/**
 * Producer of map records. Implementations resolve a file format into typed
 * elements and hand them to the sink before the spatial indices are built.
 */
export interface MapParser {
  parse(filePath: string, sink: MapElementSink): boolean;
  getLastError(): string;
}

const DEFAULT_SPEED_LIMIT = 13.89; // 50 km/h in m/s
const DEFAULT_LIGHT_HEIGHT = 5.0;
const DEFAULT_SIGN_HEIGHT = 3.0;

const LANE_SUBTYPES: Record<string, LaneType> = {
  road: 'driving',
  highway: 'driving',
  walkway: 'sidewalk',
  crosswalk: 'sidewalk',
  sidewalk: 'sidewalk',
  bicycle_lane: 'bike',
  parking: 'parking',
  shoulder: 'shoulder',
  restricted: 'restricted',
  bus_lane: 'restricted',
  emergency_lane: 'restricted',
};

const LIGHT_STATES: readonly TrafficLightState[] = ['red', 'yellow', 'green', 'red_yellow', 'unknown'];

const SIGN_TYPES: readonly TrafficSignType[] = [
  'stop',
  'yield',
  'speed_limit',
  'no_entry',
  'one_way',
  'parking',
  'pedestrian_crossing',
  'school_zone',
  'other',
];

const log = logger.scoped('lanelet2');

/**
 * Parser for the simplified Lanelet2 OSM XML format.
 *
 * Ways carrying a `subtype` tag are lanes; relations tagged
 * `type=regulatory_element` become traffic lights or signs. Coordinates are
 * taken as already projected: x = lon, y = lat.
 */
export class Lanelet2Parser implements MapParser {
  private lastError = '';
  private reader = new OsmXmlReader();

  getLastError(): string {
    return this.lastError;
  }

  parse(filePath: string, sink: MapElementSink): boolean {
    let content: string;
    try {
      content = readFileSync(filePath, 'utf8');
    } catch (error) {
      log.debug(`readFileSync failed for ${filePath}`, error);
      this.lastError = `Cannot open file: ${filePath}`;
      return false;
    }

    return this.parseContent(content, sink);
  }

  /**
   * Parse map XML that is already in memory
   */
  parseContent(content: string, sink: MapElementSink): boolean {
    this.lastError = '';

    let document: OSMDocument;
    try {
      document = this.reader.read(content);
    } catch (error) {
      this.lastError = error instanceof Error ? error.message : 'Unknown error';
      return false;
    }

    if (document.nodes.size === 0) {
      this.lastError = 'No nodes found in map file';
      return false;
    }

    const laneCount = this.buildLanes(document, sink);
    const { lights, signs } = this.buildRegulatoryElements(document, sink);

    log.debug(`Parsed ${document.nodes.size} nodes into ${laneCount} lanes, ${lights} lights, ${signs} signs`);
    return true;
  }

  private buildLanes(document: OSMDocument, sink: MapElementSink): number {
    const waysById = new Map<number, OSMWay>();
    for (const way of document.ways) {
      waysById.set(way.id, way);
    }

    let count = 0;
    for (const way of document.ways) {
      const tags = way.tags ?? {};
      if (tags.subtype === undefined) continue;

      const centerline = this.wayToPolyline(way, document);
      if (centerline.length === 0) continue;

      sink.addLane(createLane({
        id: way.id,
        type: LANE_SUBTYPES[tags.subtype] ?? 'driving',
        centerline,
        leftBoundary: this.boundaryPolyline(tags.left_boundary, waysById, document),
        rightBoundary: this.boundaryPolyline(tags.right_boundary, waysById, document),
        predecessorIds: this.parseIdList(tags.predecessors),
        successorIds: this.parseIdList(tags.successors),
        adjacentLeftIds: this.parseIdList(tags.adjacent_left),
        adjacentRightIds: this.parseIdList(tags.adjacent_right),
        speedLimit: tags.speed_limit ? this.parseSpeedLimit(tags.speed_limit) : DEFAULT_SPEED_LIMIT,
      }));
      count++;
    }

    return count;
  }

  private buildRegulatoryElements(document: OSMDocument, sink: MapElementSink): { lights: number; signs: number } {
    let lights = 0;
    let signs = 0;

    for (const relation of document.relations) {
      const tags = relation.tags ?? {};
      if (tags.type !== 'regulatory_element') continue;

      if (tags.subtype === 'traffic_light') {
        sink.addTrafficLight(createTrafficLight({
          id: relation.id,
          position: this.relationPosition(relation, document),
          state: this.parseLightState(tags.state),
          controlledLaneIds: this.wayMembers(relation),
          height: this.parseNumber(tags.height) ?? DEFAULT_LIGHT_HEIGHT,
        }));
        lights++;
      } else if (tags.subtype === 'traffic_sign') {
        sink.addTrafficSign(createTrafficSign({
          id: relation.id,
          position: this.relationPosition(relation, document),
          type: this.parseSignType(tags.sign_type),
          value: tags.value ?? '',
          affectedLaneIds: this.wayMembers(relation),
          height: this.parseNumber(tags.height) ?? DEFAULT_SIGN_HEIGHT,
        }));
        signs++;
      }
    }

    return { lights, signs };
  }

  /**
   * Convert a way to a polyline, skipping node refs that do not resolve
   */
  private wayToPolyline(way: OSMWay, document: OSMDocument): Point2D[] {
    const polyline: Point2D[] = [];

    for (const nodeId of way.nodes) {
      const node = document.nodes.get(nodeId);
      if (node) {
        polyline.push(new Point2D(node.lon, node.lat));
      }
    }

    return polyline;
  }

  private boundaryPolyline(
    wayIdTag: string | undefined,
    waysById: Map<number, OSMWay>,
    document: OSMDocument
  ): Point2D[] {
    if (wayIdTag === undefined) return [];

    const way = waysById.get(Number(wayIdTag.trim()));
    return way ? this.wayToPolyline(way, document) : [];
  }

  /**
   * Position of the first resolvable node member; the origin otherwise
   */
  private relationPosition(relation: OSMRelation, document: OSMDocument): Point2D {
    for (const member of relation.members) {
      if (member.type !== 'node') continue;
      const node = document.nodes.get(member.ref);
      if (node) return new Point2D(node.lon, node.lat);
    }

    log.warn(`Regulatory element ${relation.id} has no positioned node member, using origin`);
    return new Point2D(0, 0);
  }

  private wayMembers(relation: OSMRelation): ElementId[] {
    return relation.members.filter(member => member.type === 'way').map(member => member.ref);
  }

  /**
   * Split a `;` separated ID list, dropping entries that are not integers
   */
  private parseIdList(value: string | undefined): ElementId[] {
    if (!value) return [];

    return value
      .split(';')
      .map(part => part.trim())
      .filter(part => /^-?\d+$/.test(part))
      .map(part => Number(part))
      .filter(id => Number.isSafeInteger(id));
  }

  /**
   * Parse speed_limit tag to m/s ("50", "50 km/h", "30 mph")
   */
  private parseSpeedLimit(tag: string): number {
    const match = tag.match(/(\d+(?:\.\d+)?)\s*(kmh|km\/h|mph)?/i);
    if (!match) return DEFAULT_SPEED_LIMIT;

    const value = parseFloat(match[1]);
    const unit = match[2]?.toLowerCase();

    if (unit === 'mph') {
      return value * 0.44704;
    }
    return value / 3.6;
  }

  private parseLightState(value: string | undefined): TrafficLightState {
    return LIGHT_STATES.find(state => state === value) ?? 'unknown';
  }

  private parseSignType(value: string | undefined): TrafficSignType {
    return SIGN_TYPES.find(type => type === value) ?? 'other';
  }

  private parseNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
}
