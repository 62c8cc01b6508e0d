/**
 * Planar point in projected map coordinates (meters).
 */
export class Point2D {
  x: number;
  y: number;

  constructor(x = 0, y = 0) {
    this.x = x;
    this.y = y;
  }

  clone(): Point2D {
    return new Point2D(this.x, this.y);
  }

  equals(other: Point2D): boolean {
    return this.x === other.x && this.y === other.y;
  }

  distanceTo(other: Point2D): number {
    const dx = this.x - other.x;
    const dy = this.y - other.y;
    return Math.sqrt(dx * dx + dy * dy);
  }
}

/**
 * Axis-aligned bounding box.
 *
 * A default-constructed box is the zero box at the origin. Every operation is
 * defined for degenerate (zero-area) boxes, e.g. a box around a single point.
 */
export class BoundingBox {
  min: Point2D;
  max: Point2D;

  constructor(min = new Point2D(), max = new Point2D()) {
    this.min = min;
    this.max = max;
  }

  /**
   * Smallest box covering every point; the zero box when there are none
   */
  static fromPoints(points: readonly Point2D[]): BoundingBox {
    if (points.length === 0) return new BoundingBox();

    let minX = points[0].x;
    let minY = points[0].y;
    let maxX = minX;
    let maxY = minY;

    for (const point of points) {
      minX = Math.min(minX, point.x);
      minY = Math.min(minY, point.y);
      maxX = Math.max(maxX, point.x);
      maxY = Math.max(maxY, point.y);
    }

    return new BoundingBox(new Point2D(minX, minY), new Point2D(maxX, maxY));
  }

  static ofPoint(point: Point2D): BoundingBox {
    return new BoundingBox(point.clone(), point.clone());
  }

  /**
   * Square of side 2 * radius centered on the point
   */
  static around(center: Point2D, radius: number): BoundingBox {
    return new BoundingBox(
      new Point2D(center.x - radius, center.y - radius),
      new Point2D(center.x + radius, center.y + radius)
    );
  }

  clone(): BoundingBox {
    return new BoundingBox(this.min.clone(), this.max.clone());
  }

  equals(other: BoundingBox): boolean {
    return this.min.equals(other.min) && this.max.equals(other.max);
  }

  contains(point: Point2D): boolean {
    return (
      point.x >= this.min.x &&
      point.x <= this.max.x &&
      point.y >= this.min.y &&
      point.y <= this.max.y
    );
  }

  containsBox(other: BoundingBox): boolean {
    return (
      other.min.x >= this.min.x &&
      other.min.y >= this.min.y &&
      other.max.x <= this.max.x &&
      other.max.y <= this.max.y
    );
  }

  /**
   * Edges are inclusive: boxes that only touch still intersect
   */
  intersects(other: BoundingBox): boolean {
    return !(
      this.max.x < other.min.x ||
      this.min.x > other.max.x ||
      this.max.y < other.min.y ||
      this.min.y > other.max.y
    );
  }

  area(): number {
    return (this.max.x - this.min.x) * (this.max.y - this.min.y);
  }

  center(): Point2D {
    return new Point2D((this.min.x + this.max.x) / 2, (this.min.y + this.max.y) / 2);
  }

  union(other: BoundingBox): BoundingBox {
    return new BoundingBox(
      new Point2D(Math.min(this.min.x, other.min.x), Math.min(this.min.y, other.min.y)),
      new Point2D(Math.max(this.max.x, other.max.x), Math.max(this.max.y, other.max.y))
    );
  }

  /**
   * Area this box would gain by also covering `other`
   */
  enlargement(other: BoundingBox): number {
    return this.union(other).area() - this.area();
  }
}
