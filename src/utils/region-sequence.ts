import type { Region } from '@/types/pipeline';
import type { Box } from '@/types/raster';
import { clipBox } from './raster';

/**
 * Detector output: a finite, restartable sequence of regions. Boxes are
 * clipped to the page, empty ones dropped, and the rest ordered top-to-bottom
 * then left-to-right; `index` follows that order and never changes between
 * iterations.
 */
export class RegionSequence implements Iterable<Region> {
  private readonly boxes: readonly Box[];

  constructor(boxes: Iterable<Box>, bounds: { width: number; height: number }) {
    this.boxes = Object.freeze(
      Array.from(boxes)
        .map((box) => clipBox(box, bounds.width, bounds.height))
        .filter((box) => box.width > 0 && box.height > 0)
        .sort((a, b) => a.y - b.y || a.x - b.x)
    );
  }

  static empty(): RegionSequence {
    return new RegionSequence([], { width: 0, height: 0 });
  }

  get size(): number {
    return this.boxes.length;
  }

  *[Symbol.iterator](): Iterator<Region> {
    for (let index = 0; index < this.boxes.length; index += 1) {
      const box = this.boxes[index];
      yield Object.freeze({ x: box.x, y: box.y, width: box.width, height: box.height, index });
    }
  }

  toArray(): Region[] {
    return Array.from(this);
  }
}
