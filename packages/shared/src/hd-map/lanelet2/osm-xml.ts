/**
 * OSM XML data structures
 */
export interface OSMNode {
  type: 'node';
  id: number;
  lat: number;
  lon: number;
  tags?: Record<string, string>;
}

export interface OSMWay {
  type: 'way';
  id: number;
  nodes: number[];
  tags?: Record<string, string>;
}

export interface OSMMember {
  type: 'node' | 'way' | 'relation';
  ref: number;
  role: string;
}

export interface OSMRelation {
  type: 'relation';
  id: number;
  members: OSMMember[];
  tags?: Record<string, string>;
}

export type OSMElement = OSMNode | OSMWay | OSMRelation;

export interface OSMDocument {
  nodes: Map<number, OSMNode>;
  ways: OSMWay[];
  relations: OSMRelation[];
}

export class OsmXmlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OsmXmlError';
  }
}

const NODE_PATTERN = /<node\b([^>]*?)(?:\/>|>([\s\S]*?)<\/node>)/g;
const WAY_PATTERN = /<way\b([^>]*?)(?:\/>|>([\s\S]*?)<\/way>)/g;
const RELATION_PATTERN = /<relation\b([^>]*?)(?:\/>|>([\s\S]*?)<\/relation>)/g;
const ATTRIBUTE_PATTERN = /([\w:-]+)\s*=\s*"([^"]*)"/g;
const ND_PATTERN = /<nd\b([^>]*?)\/?>/g;
const TAG_PATTERN = /<tag\b([^>]*?)\/?>/g;
const MEMBER_PATTERN = /<member\b([^>]*?)\/?>/g;

const ENTITIES: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&amp;': '&',
};

/**
 * String-scanning reader for the simplified OSM XML used by Lanelet2 maps.
 *
 * Only `<node>`, `<way>` and `<relation>` with their `<nd>`, `<tag>` and
 * `<member>` children are read. Elements lacking a usable id (or lat/lon for
 * nodes) are skipped; an id beyond the safe integer range is an error.
 */
export class OsmXmlReader {
  read(content: string): OSMDocument {
    const nodes = new Map<number, OSMNode>();
    const ways: OSMWay[] = [];
    const relations: OSMRelation[] = [];

    for (const [, attrText, body] of content.matchAll(NODE_PATTERN)) {
      const attrs = this.parseAttributes(attrText);
      const id = this.parseId(attrs.id);
      const lat = this.parseCoordinate(attrs.lat);
      const lon = this.parseCoordinate(attrs.lon);
      if (id === undefined || lat === undefined || lon === undefined) continue;

      nodes.set(id, { type: 'node', id, lat, lon, tags: this.parseTags(body) });
    }

    for (const [, attrText, body] of content.matchAll(WAY_PATTERN)) {
      const id = this.parseId(this.parseAttributes(attrText).id);
      if (id === undefined) continue;

      const nodeRefs: number[] = [];
      for (const [, ndAttrs] of (body ?? '').matchAll(ND_PATTERN)) {
        const ref = this.parseId(this.parseAttributes(ndAttrs).ref);
        if (ref !== undefined) nodeRefs.push(ref);
      }

      ways.push({ type: 'way', id, nodes: nodeRefs, tags: this.parseTags(body) });
    }

    for (const [, attrText, body] of content.matchAll(RELATION_PATTERN)) {
      const id = this.parseId(this.parseAttributes(attrText).id);
      if (id === undefined) continue;

      const members: OSMMember[] = [];
      for (const [, memberAttrText] of (body ?? '').matchAll(MEMBER_PATTERN)) {
        const memberAttrs = this.parseAttributes(memberAttrText);
        const ref = this.parseId(memberAttrs.ref);
        const type = memberAttrs.type;
        if (ref === undefined || (type !== 'node' && type !== 'way' && type !== 'relation')) continue;

        members.push({ type, ref, role: memberAttrs.role ?? '' });
      }

      relations.push({ type: 'relation', id, members, tags: this.parseTags(body) });
    }

    return { nodes, ways, relations };
  }

  private parseAttributes(text: string): Record<string, string | undefined> {
    const attrs: Record<string, string | undefined> = {};
    for (const [, name, value] of text.matchAll(ATTRIBUTE_PATTERN)) {
      attrs[name] = this.decode(value);
    }
    return attrs;
  }

  private parseTags(body: string | undefined): Record<string, string> | undefined {
    if (!body) return undefined;

    const tags: Record<string, string> = {};
    let found = false;
    for (const [, tagAttrText] of body.matchAll(TAG_PATTERN)) {
      const attrs = this.parseAttributes(tagAttrText);
      if (attrs.k === undefined || attrs.v === undefined) continue;
      tags[attrs.k] = attrs.v;
      found = true;
    }
    return found ? tags : undefined;
  }

  private parseId(value: string | undefined): number | undefined {
    if (value === undefined || !/^-?\d+$/.test(value.trim())) return undefined;

    const id = Number(value);
    if (!Number.isSafeInteger(id)) {
      throw new OsmXmlError(`Element id ${value} exceeds the supported integer range`);
    }
    return id;
  }

  private parseCoordinate(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  private decode(value: string): string {
    return value.replace(/&(lt|gt|quot|apos|amp);/g, entity => ENTITIES[entity] ?? entity);
  }
}
