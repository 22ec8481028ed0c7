import {
  Direction,
  Offset,
  Point,
  RotationSense,
  SlotKind,
  StepGranularity,
} from './types';

const LEFT_OF: Record<Direction, Direction> = {
  north: 'west',
  east: 'north',
  south: 'east',
  west: 'south',
};

const RIGHT_OF: Record<Direction, Direction> = {
  north: 'east',
  east: 'south',
  south: 'west',
  west: 'north',
};

const DIRECTION_INDEX: Record<Direction, number> = {
  north: 0,
  east: 1,
  south: 2,
  west: 3,
};

const STEP: Record<StepGranularity, number> = {
  wall: 1,
  cell: 2,
};

export function rotateLeft(direction: Direction): Direction {
  return LEFT_OF[direction];
}

export function rotateRight(direction: Direction): Direction {
  return RIGHT_OF[direction];
}

export function opposite(direction: Direction): Direction {
  return rotateLeft(rotateLeft(direction));
}

export function offsetFor(
  direction: Direction,
  granularity: StepGranularity,
): Offset {
  const step = STEP[granularity];
  switch (direction) {
    case 'north':
      return { dx: 0, dy: -step };
    case 'east':
      return { dx: step, dy: 0 };
    case 'south':
      return { dx: 0, dy: step };
    case 'west':
      return { dx: -step, dy: 0 };
  }
}

export function translate(
  point: Point,
  direction: Direction,
  granularity: StepGranularity,
): Point {
  const { dx, dy } = offsetFor(direction, granularity);
  return { x: point.x + dx, y: point.y + dy };
}

/**
 * Quarter turns needed to go from one facing to another.
 * Three lefts collapse into a single right; a half turn stays as two lefts.
 */
export function planRotation(from: Direction, to: Direction): RotationSense[] {
  const leftTurns = (DIRECTION_INDEX[from] - DIRECTION_INDEX[to] + 4) % 4;
  switch (leftTurns) {
    case 1:
      return ['left'];
    case 2:
      return ['left', 'left'];
    case 3:
      return ['right'];
    default:
      return [];
  }
}

export function slotKind(x: number, y: number): SlotKind {
  const evenX = x % 2 === 0;
  const evenY = y % 2 === 0;
  if (evenX && evenY) {
    return 'intersection';
  }
  if (evenX || evenY) {
    return 'wall-segment';
  }
  return 'cell';
}

export function isCellPosition(point: Point): boolean {
  return (
    Number.isInteger(point.x) &&
    Number.isInteger(point.y) &&
    slotKind(point.x, point.y) === 'cell'
  );
}

export function parseDirection(value: string): Direction | null {
  switch (value.trim().toLowerCase()) {
    case 'n':
    case 'north':
      return 'north';
    case 'e':
    case 'east':
      return 'east';
    case 's':
    case 'south':
      return 'south';
    case 'w':
    case 'west':
      return 'west';
    default:
      return null;
  }
}
