/**
 * Deduplicated, capacity-bounded point collection
 */

import { pointKey, type Point3 } from '../models/point-cloud.js';

/**
 * Insertion-ordered set of points with a fixed capacity.
 *
 * The ordered array is what readers copy; the key set is the dedup index.
 * Capacity is greedy in arrival order: once full, new points are rejected and
 * nothing already stored is evicted.
 */
export class PointStore {
  private points: Point3[] = [];
  private index = new Set<string>();
  readonly capacity: number;

  constructor(maxPoints: number) {
    if (!Number.isInteger(maxPoints) || maxPoints < 1) {
      throw new RangeError(`maxPoints must be a positive integer, got ${maxPoints}`);
    }
    this.capacity = maxPoints;
  }

  /**
   * Add points not already present, until the store is full.
   * Returns the number of points actually added.
   */
  insertMany(points: readonly Point3[]): number {
    let added = 0;

    for (const point of points) {
      if (this.points.length >= this.capacity) break;

      const key = pointKey(point);
      if (this.index.has(key)) continue;

      this.index.add(key);
      this.points.push(point);
      added++;
    }

    return added;
  }

  /**
   * Swap the whole contents for `points` (clear, then insert)
   */
  replace(points: readonly Point3[]): number {
    this.clear();
    return this.insertMany(points);
  }

  clear(): void {
    this.points = [];
    this.index = new Set();
  }

  /**
   * Copy of the stored points in insertion order
   */
  snapshot(): Point3[] {
    return this.points.slice();
  }

  has(point: Point3): boolean {
    return this.index.has(pointKey(point));
  }

  size(): number {
    return this.points.length;
  }

  isFull(): boolean {
    return this.points.length >= this.capacity;
  }
}
