import assert from 'node:assert';
import { BoundingBox, Point2D } from '../geometry';

export const MAX_NODE_ENTRIES = 8;
export const MIN_NODE_ENTRIES = 4; // split target, not enforced

/** Parent index of the root node */
export const NO_PARENT = -1;

export type NodeIndex = number;

/**
 * Entry payload: a child node in the arena, or an element stored in a leaf
 */
export type EntryPayload<T> =
  | { kind: 'child'; node: NodeIndex }
  | { kind: 'element'; value: T };

export interface RTreeEntry<T> {
  bbox: BoundingBox;
  payload: EntryPayload<T>;
}

export interface RTreeNode<T> {
  type: 'leaf' | 'internal';
  entries: RTreeEntry<T>[];
  parent: NodeIndex;
}

/**
 * Height-balanced R-tree over bounding boxes.
 *
 * Nodes live in an arena and refer to each other by index, so the
 * child -> parent back-reference needs no shared ownership. Values are
 * opaque to the tree; the map server stores element references in it.
 */
export class RTree<T> {
  private nodes: RTreeNode<T>[] = [];
  private root: NodeIndex = 0;
  private elementCount = 0;

  constructor() {
    this.clear();
  }

  /**
   * Insert a value under its bounding box
   */
  insert(bbox: BoundingBox, value: T): void {
    const entry: RTreeEntry<T> = { bbox: bbox.clone(), payload: { kind: 'element', value } };
    const root = this.nodes[this.root];

    // Nothing to enlarge against yet
    if (root.entries.length === 0) {
      root.entries.push(entry);
      this.elementCount++;
      return;
    }

    const leaf = this.chooseLeaf(bbox);
    if (this.nodes[leaf].entries.length < MAX_NODE_ENTRIES) {
      this.nodes[leaf].entries.push(entry);
      this.adjustTree(leaf);
    } else {
      this.splitNode(leaf, entry);
    }

    this.elementCount++;
  }

  /**
   * Values whose stored box intersects the query box, in traversal order
   */
  query(bbox: BoundingBox): T[] {
    const results: T[] = [];
    this.queryNode(this.root, bbox, results);
    return results;
  }

  /**
   * Broad phase only: returns everything inside the square of side 2 * radius.
   * Callers filter by true distance.
   */
  queryRadius(center: Point2D, radius: number): T[] {
    return this.query(BoundingBox.around(center, radius));
  }

  clear(): void {
    this.nodes = [{ type: 'leaf', entries: [], parent: NO_PARENT }];
    this.root = 0;
    this.elementCount = 0;
  }

  size(): number {
    return this.elementCount;
  }

  /**
   * Levels along the first-child path; a lone root leaf has height 1
   */
  height(): number {
    let h = 1;
    let current = this.nodes[this.root];
    while (current.type === 'internal' && current.entries.length > 0) {
      current = this.nodes[this.childOf(current.entries[0])];
      h++;
    }
    return h;
  }

  /**
   * Box covering everything in the tree (zero box when empty)
   */
  bounds(): BoundingBox {
    return this.nodeBounds(this.root);
  }

  /**
   * Entry count of every leaf, in traversal order
   */
  leafOccupancy(): number[] {
    const counts: number[] = [];
    const visit = (index: NodeIndex): void => {
      const node = this.nodes[index];
      if (node.type === 'leaf') {
        counts.push(node.entries.length);
        return;
      }
      for (const entry of node.entries) {
        visit(this.childOf(entry));
      }
    };

    visit(this.root);
    return counts;
  }

  /**
   * Walk the whole tree and describe every broken structural invariant.
   * An empty array means the tree is consistent.
   */
  validate(): string[] {
    const problems: string[] = [];
    const leafDepths = new Set<number>();
    let elements = 0;

    if (this.nodes[this.root].parent !== NO_PARENT) {
      problems.push(`root ${this.root} has parent ${this.nodes[this.root].parent}`);
    }

    const visit = (index: NodeIndex, depth: number): void => {
      const node = this.nodes[index];

      if (node.entries.length > MAX_NODE_ENTRIES) {
        problems.push(`node ${index} holds ${node.entries.length} entries`);
      }

      if (node.type === 'leaf') {
        leafDepths.add(depth);
        for (const entry of node.entries) {
          if (entry.payload.kind !== 'element') {
            problems.push(`leaf ${index} references a child node`);
          } else {
            elements++;
          }
        }
        return;
      }

      if (node.entries.length === 0) {
        problems.push(`internal node ${index} is empty`);
      }

      for (const entry of node.entries) {
        if (entry.payload.kind !== 'child') {
          problems.push(`internal node ${index} holds an element`);
          continue;
        }

        const child = entry.payload.node;
        if (this.nodes[child].parent !== index) {
          problems.push(`node ${child} points to parent ${this.nodes[child].parent}, expected ${index}`);
        }
        if (!entry.bbox.equals(this.nodeBounds(child))) {
          problems.push(`entry for node ${child} in node ${index} is not the union of its entries`);
        }

        visit(child, depth + 1);
      }
    };

    visit(this.root, 1);

    if (leafDepths.size > 1) {
      problems.push(`leaves at different depths: ${[...leafDepths].join(', ')}`);
    }
    if (elements !== this.elementCount) {
      problems.push(`found ${elements} elements, size() reports ${this.elementCount}`);
    }

    return problems;
  }

  /**
   * Descend by least area enlargement; ties keep the lowest index
   */
  private chooseLeaf(bbox: BoundingBox): NodeIndex {
    let current = this.root;

    while (this.nodes[current].type === 'internal') {
      const entries = this.nodes[current].entries;
      let bestIdx = 0;
      let minEnlargement = Infinity;

      for (let i = 0; i < entries.length; i++) {
        const enlargement = entries[i].bbox.enlargement(bbox);
        if (enlargement < minEnlargement) {
          minEnlargement = enlargement;
          bestIdx = i;
        }
      }

      current = this.childOf(entries[bestIdx]);
    }

    return current;
  }

  /**
   * Split an overflowing node into itself and a new sibling.
   *
   * Seeds are the two entries whose centers lie farthest apart; every other
   * entry joins the group that grows least, the first group on ties.
   */
  private splitNode(index: NodeIndex, newEntry: RTreeEntry<T>): void {
    const node = this.nodes[index];
    const allEntries = [...node.entries, newEntry];

    let seed1 = 0;
    let seed2 = 1;
    let maxDistance = 0;
    for (let i = 0; i < allEntries.length; i++) {
      const center1 = allEntries[i].bbox.center();
      for (let j = i + 1; j < allEntries.length; j++) {
        const distance = center1.distanceTo(allEntries[j].bbox.center());
        if (distance > maxDistance) {
          maxDistance = distance;
          seed1 = i;
          seed2 = j;
        }
      }
    }

    const siblingIndex = this.allocate(node.type, node.parent);
    const sibling = this.nodes[siblingIndex];

    node.entries = [allEntries[seed1]];
    sibling.entries = [allEntries[seed2]];
    let bbox1 = allEntries[seed1].bbox.clone();
    let bbox2 = allEntries[seed2].bbox.clone();

    for (let i = 0; i < allEntries.length; i++) {
      if (i === seed1 || i === seed2) continue;

      const entry = allEntries[i];
      if (bbox1.enlargement(entry.bbox) <= bbox2.enlargement(entry.bbox)) {
        node.entries.push(entry);
        bbox1 = bbox1.union(entry.bbox);
      } else {
        sibling.entries.push(entry);
        bbox2 = bbox2.union(entry.bbox);
      }
    }

    assert.ok(node.entries.length <= MAX_NODE_ENTRIES && sibling.entries.length <= MAX_NODE_ENTRIES);

    if (node.type === 'internal') {
      this.reparent(index);
      this.reparent(siblingIndex);
    }

    if (index === this.root) {
      const newRoot = this.allocate('internal', NO_PARENT);
      this.nodes[newRoot].entries.push(
        { bbox: bbox1, payload: { kind: 'child', node: index } },
        { bbox: bbox2, payload: { kind: 'child', node: siblingIndex } }
      );
      node.parent = newRoot;
      sibling.parent = newRoot;
      this.root = newRoot;
      return;
    }

    // The node shrank; refresh its entry before the parent is touched
    const parentIndex = node.parent;
    this.entryFor(parentIndex, index).bbox = bbox1;

    const siblingEntry: RTreeEntry<T> = { bbox: bbox2, payload: { kind: 'child', node: siblingIndex } };
    if (this.nodes[parentIndex].entries.length < MAX_NODE_ENTRIES) {
      this.nodes[parentIndex].entries.push(siblingEntry);
      sibling.parent = parentIndex;
      this.adjustTree(parentIndex);
    } else {
      this.splitNode(parentIndex, siblingEntry);
    }
  }

  /**
   * Propagate box changes from a node up to the root
   */
  private adjustTree(index: NodeIndex): void {
    let current = index;

    while (current !== this.root) {
      const parent = this.nodes[current].parent;
      this.entryFor(parent, current).bbox = this.nodeBounds(current);
      current = parent;
    }
  }

  private queryNode(index: NodeIndex, bbox: BoundingBox, results: T[]): void {
    for (const entry of this.nodes[index].entries) {
      if (!entry.bbox.intersects(bbox)) continue;

      if (entry.payload.kind === 'element') {
        results.push(entry.payload.value);
      } else {
        this.queryNode(entry.payload.node, bbox, results);
      }
    }
  }

  private nodeBounds(index: NodeIndex): BoundingBox {
    const entries = this.nodes[index].entries;
    if (entries.length === 0) return new BoundingBox();

    let result = entries[0].bbox.clone();
    for (let i = 1; i < entries.length; i++) {
      result = result.union(entries[i].bbox);
    }
    return result;
  }

  private allocate(type: RTreeNode<T>['type'], parent: NodeIndex): NodeIndex {
    this.nodes.push({ type, entries: [], parent });
    return this.nodes.length - 1;
  }

  private reparent(index: NodeIndex): void {
    for (const entry of this.nodes[index].entries) {
      this.nodes[this.childOf(entry)].parent = index;
    }
  }

  private entryFor(parent: NodeIndex, child: NodeIndex): RTreeEntry<T> {
    const entry = this.nodes[parent].entries.find(
      e => e.payload.kind === 'child' && e.payload.node === child
    );
    assert.ok(entry, `node ${parent} has no entry for child ${child}`);
    return entry;
  }

  private childOf(entry: RTreeEntry<T>): NodeIndex {
    assert.ok(entry.payload.kind === 'child', 'expected a child node entry');
    return entry.payload.node;
  }
}
