import { MapFormatError } from '../core/errors';
import { slotKind } from '../core/geometry';
import { Pose, Slot } from '../core/types';
import {
  CELL_CHAR,
  directionForArrow,
  GOAL_CHAR,
  HORIZONTAL_WALL_CHAR,
  INTERSECTION_CHAR,
  NO_WALL_CHAR,
  PIT_CHAR,
  VERTICAL_WALL_CHAR,
} from './notation';

/** Ground truth for a maze: every slot concrete, optional start marker. */
export interface WorldMap {
  readonly dimension: number;
  readonly size: number;
  readonly slots: readonly (readonly Slot[])[];
  readonly start: Pose | null;
}

function parseWallChar(char: string): Slot | null {
  if (char === HORIZONTAL_WALL_CHAR || char === VERTICAL_WALL_CHAR) {
    return 'wall';
  }
  if (char === NO_WALL_CHAR) {
    return 'no-wall';
  }
  return null;
}

function parseCellChar(char: string): Slot | null {
  switch (char) {
    case CELL_CHAR:
      return 'cell';
    case PIT_CHAR:
      return 'pit';
    case GOAL_CHAR:
      return 'goal';
    default:
      return null;
  }
}

/**
 * Parses the textual maze notation. Whitespace is ignored, blank lines are
 * skipped, and every remaining line is one row of the doubled grid.
 */
export function parseWorldMap(text: string): WorldMap {
  const rows = text
    .split(/\r?\n/)
    .map((line) => Array.from(line.replace(/\s+/g, '')))
    .filter((symbols) => symbols.length > 0);

  const size = rows.length;
  if (size < 3 || size % 2 === 0) {
    throw new MapFormatError(
      `Map must have an odd number of rows, at least 3; found ${size}`,
      size,
      1,
    );
  }

  const last = size - 1;
  let start: Pose | null = null;
  const slots: Slot[][] = rows.map((symbols, y) => {
    if (symbols.length !== size) {
      throw new MapFormatError(
        `Row has ${symbols.length} symbols, expected ${size}`,
        y + 1,
        1,
      );
    }
    return symbols.map((char, x): Slot => {
      const kind = slotKind(x, y);
      if (kind === 'intersection') {
        if (char !== INTERSECTION_CHAR) {
          throw new MapFormatError(`Expected '${INTERSECTION_CHAR}', found '${char}'`, y + 1, x + 1);
        }
        return 'intersection';
      }
      if (kind === 'wall-segment') {
        const wall = parseWallChar(char);
        if (wall === null) {
          throw new MapFormatError(`Expected a wall symbol, found '${char}'`, y + 1, x + 1);
        }
        if (wall !== 'wall' && (x === 0 || y === 0 || x === last || y === last)) {
          throw new MapFormatError('Map is not enclosed by walls', y + 1, x + 1);
        }
        return wall;
      }
      const cell = parseCellChar(char);
      if (cell !== null) {
        return cell;
      }
      const direction = directionForArrow(char);
      if (direction === null) {
        throw new MapFormatError(`Expected a cell symbol, found '${char}'`, y + 1, x + 1);
      }
      if (start !== null) {
        throw new MapFormatError('Map marks more than one start pose', y + 1, x + 1);
      }
      start = { x, y, direction };
      return 'cell';
    });
  });

  return {
    dimension: (size - 1) / 2,
    size,
    slots,
    start,
  };
}

export function worldSlotAt(world: WorldMap, x: number, y: number): Slot | undefined {
  return world.slots[y]?.[x];
}
