import { Direction, Slot } from '../core/types';

// Textual maze notation shared by the map parser and the renderers.
//   + intersection   - | wall   . no wall
//   o cell           x pit      w goal      ? unknown

export const INTERSECTION_CHAR = '+';
export const HORIZONTAL_WALL_CHAR = '-';
export const VERTICAL_WALL_CHAR = '|';
export const NO_WALL_CHAR = '.';
export const CELL_CHAR = 'o';
export const PIT_CHAR = 'x';
export const GOAL_CHAR = 'w';
export const UNKNOWN_CHAR = '?';

export const POSE_ARROWS: Record<Direction, string> = {
  north: '↑',
  east: '→',
  south: '↓',
  west: '←',
};

const ARROW_DIRECTIONS: Record<string, Direction> = {
  '↑': 'north',
  '→': 'east',
  '↓': 'south',
  '←': 'west',
  '^': 'north',
  '>': 'east',
  v: 'south',
  '<': 'west',
};

export function directionForArrow(char: string): Direction | null {
  return ARROW_DIRECTIONS[char] ?? null;
}

/** Symbol for a slot; wall segments on even rows run horizontally. */
export function charForSlot(slot: Slot, y: number): string {
  switch (slot) {
    case 'intersection':
      return INTERSECTION_CHAR;
    case 'wall':
      return y % 2 === 0 ? HORIZONTAL_WALL_CHAR : VERTICAL_WALL_CHAR;
    case 'no-wall':
      return NO_WALL_CHAR;
    case 'cell':
      return CELL_CHAR;
    case 'pit':
      return PIT_CHAR;
    case 'goal':
      return GOAL_CHAR;
    case 'unknown':
      return UNKNOWN_CHAR;
  }
}
