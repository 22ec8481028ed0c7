export type Direction = 'north' | 'east' | 'south' | 'west';

export const DIRECTIONS: readonly Direction[] = ['north', 'east', 'south', 'west'];

export type StepGranularity = 'wall' | 'cell';

export type RotationSense = 'left' | 'right';

export interface Point {
  x: number;
  y: number;
}

export interface Offset {
  dx: number;
  dy: number;
}

export interface Pose extends Point {
  direction: Direction;
}

export type WallSlot = 'unknown' | 'wall' | 'no-wall';

export type CellSlot = 'unknown' | 'cell' | 'pit' | 'goal';

export type Slot = WallSlot | CellSlot | 'intersection';

export type SlotKind = 'intersection' | 'wall-segment' | 'cell';

export type Hazard = 'none' | 'pit';

// Read-only surface of the agent's map, handed to renderers and heuristics.
export interface KnowledgeView {
  readonly dimension: number;
  readonly size: number;
  isInside(x: number, y: number): boolean;
  slotAt(x: number, y: number): Slot;
  wallBetween(pos: Point, direction: Direction): WallSlot;
  cellAt(pos: Point, direction: Direction): CellSlot;
  isPathOpen(pos: Point, direction: Direction): boolean;
  directionRecorded(pos: Point, direction: Direction): boolean;
}

export interface EnvironmentOracle {
  isWallAhead(pose: Readonly<Pose>): boolean;
  isPitAhead(pose: Readonly<Pose>): boolean;
  isGoalAhead(pose: Readonly<Pose>): boolean;
  /** Whether the agent already stands on the goal. Oracles that cannot tell leave it out. */
  isGoalUnder?(pose: Readonly<Pose>): boolean;
}

export interface ExplorationRenderer {
  render(grid: KnowledgeView, pose: Readonly<Pose>): void;
}
