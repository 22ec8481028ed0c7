import { InconsistentRecordError, OutOfBoundsError } from './errors';
import { isCellPosition, slotKind, translate } from './geometry';
import {
  CellSlot,
  Direction,
  Hazard,
  KnowledgeView,
  Point,
  Slot,
  WallSlot,
} from './types';

function isWallSlot(slot: Slot): slot is WallSlot {
  return slot === 'unknown' || slot === 'wall' || slot === 'no-wall';
}

function isCellSlot(slot: Slot): slot is CellSlot {
  return slot === 'unknown' || slot === 'cell' || slot === 'pit' || slot === 'goal';
}

export function gridSizeFor(dimension: number): number {
  return dimension * 2 + 1;
}

/**
 * The agent's partial map in doubled coordinates.
 *
 * Intersections and the outer wall ring are known from the start; everything
 * else begins `unknown` and may be written exactly once.
 */
export class KnowledgeGrid implements KnowledgeView {
  public readonly dimension: number;
  public readonly size: number;
  private readonly slots: Slot[][];

  constructor(dimension: number, start: Point) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Maze dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.size = gridSizeFor(dimension);
    const last = this.size - 1;
    this.slots = Array.from({ length: this.size }, (_, y) =>
      Array.from({ length: this.size }, (_unused, x): Slot => {
        const kind = slotKind(x, y);
        if (kind === 'intersection') {
          return 'intersection';
        }
        if (kind === 'wall-segment' && (x === 0 || y === 0 || x === last || y === last)) {
          return 'wall';
        }
        return 'unknown';
      }),
    );
    this.assertCell(start);
    this.write(start.x, start.y, 'cell');
  }

  isInside(x: number, y: number): boolean {
    return x >= 0 && x < this.size && y >= 0 && y < this.size;
  }

  slotAt(x: number, y: number): Slot {
    const row = this.slots[y];
    const slot = this.isInside(x, y) ? row?.[x] : undefined;
    if (slot === undefined) {
      throw new OutOfBoundsError(x, y, this.size);
    }
    return slot;
  }

  wallBetween(pos: Point, direction: Direction): WallSlot {
    this.assertCell(pos);
    const { x, y } = translate(pos, direction, 'wall');
    const slot = this.slotAt(x, y);
    if (!isWallSlot(slot)) {
      throw new Error(`Slot (${x}, ${y}) holds '${slot}' where a wall segment belongs`);
    }
    return slot;
  }

  recordWall(pos: Point, direction: Direction, present: boolean): void {
    this.assertCell(pos);
    const { x, y } = translate(pos, direction, 'wall');
    this.write(x, y, present ? 'wall' : 'no-wall');
  }

  cellAt(pos: Point, direction: Direction): CellSlot {
    this.assertCell(pos);
    const { x, y } = translate(pos, direction, 'cell');
    const slot = this.slotAt(x, y);
    if (!isCellSlot(slot)) {
      throw new Error(`Slot (${x}, ${y}) holds '${slot}' where a cell belongs`);
    }
    return slot;
  }

  recordCell(pos: Point, direction: Direction, hazard: Hazard): void {
    this.assertCell(pos);
    const { x, y } = translate(pos, direction, 'cell');
    this.write(x, y, hazard === 'pit' ? 'pit' : 'cell');
  }

  markVisited(pos: Point): void {
    this.assertCell(pos);
    this.write(pos.x, pos.y, 'cell');
  }

  isPathOpen(pos: Point, direction: Direction): boolean {
    return (
      this.wallBetween(pos, direction) === 'no-wall' &&
      this.cellAt(pos, direction) !== 'pit'
    );
  }

  directionRecorded(pos: Point, direction: Direction): boolean {
    const wall = this.wallBetween(pos, direction);
    if (wall === 'wall') {
      return true;
    }
    if (wall === 'no-wall') {
      return this.cellAt(pos, direction) !== 'unknown';
    }
    return false;
  }

  countSlots(value: Slot): number {
    let count = 0;
    for (const row of this.slots) {
      for (const slot of row) {
        if (slot === value) {
          count += 1;
        }
      }
    }
    return count;
  }

  toRows(): Slot[][] {
    return this.slots.map((row) => [...row]);
  }

  private assertCell(pos: Point): void {
    if (!isCellPosition(pos)) {
      throw new Error(`(${pos.x}, ${pos.y}) is not a cell position`);
    }
    if (!this.isInside(pos.x, pos.y)) {
      throw new OutOfBoundsError(pos.x, pos.y, this.size);
    }
  }

  private write(x: number, y: number, value: Slot): void {
    const current = this.slotAt(x, y);
    if (current === value) {
      return;
    }
    if (current !== 'unknown') {
      throw new InconsistentRecordError(x, y, current, value);
    }
    const row = this.slots[y];
    if (!row) {
      throw new OutOfBoundsError(x, y, this.size);
    }
    row[x] = value;
  }
}
