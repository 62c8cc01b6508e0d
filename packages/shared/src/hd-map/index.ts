// HD map element model and query API
export * from './types';
export { RTree, MAX_NODE_ENTRIES, MIN_NODE_ENTRIES, NO_PARENT } from './RTree';
export type { EntryPayload, RTreeEntry, RTreeNode, NodeIndex } from './RTree';
export { MapElementStore, type MapElementSink } from './MapElementStore';
export { MEMORY_COST, estimateStoreBytes } from './memory';
export { MapServer, CLOSEST_LANE_SEARCH_RADII } from './MapServer';
export type { MapServerOptions, MapServerState, MapServerStats, MapServerEvents, MapCounts } from './MapServer';

// Lanelet2 map file ingestion
export { Lanelet2Parser, type MapParser } from './lanelet2/Lanelet2Parser';
export { OsmXmlReader, OsmXmlError } from './lanelet2/osm-xml';
export type { OSMDocument, OSMElement, OSMNode, OSMWay, OSMRelation, OSMMember } from './lanelet2/osm-xml';
