import { Pose, Slot } from './types';

function describePose(pose: Readonly<Pose>): string {
  return `(${pose.x}, ${pose.y}) facing ${pose.direction}`;
}

export class OutOfBoundsError extends Error {
  public readonly x: number;
  public readonly y: number;
  public readonly size: number;

  constructor(x: number, y: number, size: number) {
    super(`Slot (${x}, ${y}) is outside of the ${size}x${size} grid`);
    this.name = 'OutOfBoundsError';
    this.x = x;
    this.y = y;
    this.size = size;
  }
}

export class InconsistentRecordError extends Error {
  public readonly x: number;
  public readonly y: number;
  public readonly recorded: Slot;
  public readonly attempted: Slot;

  constructor(x: number, y: number, recorded: Slot, attempted: Slot) {
    super(
      `Slot (${x}, ${y}) already holds '${recorded}', refusing to overwrite with '${attempted}'`,
    );
    this.name = 'InconsistentRecordError';
    this.x = x;
    this.y = y;
    this.recorded = recorded;
    this.attempted = attempted;
  }
}

export class StuckError extends Error {
  public readonly pose: Pose;

  constructor(pose: Readonly<Pose>) {
    super(`No open direction from ${describePose(pose)}`);
    this.name = 'StuckError';
    this.pose = { ...pose };
  }
}

export class GoalUnreachableError extends Error {
  public readonly pose: Pose;
  public readonly cellsExplored: number;

  constructor(pose: Readonly<Pose>, cellsExplored: number) {
    super(
      `Goal is unreachable: every reachable cell is mapped (${cellsExplored} cells explored), stopped at ${describePose(pose)}`,
    );
    this.name = 'GoalUnreachableError';
    this.pose = { ...pose };
    this.cellsExplored = cellsExplored;
  }
}

export class MoveLimitError extends Error {
  public readonly limit: number;
  public readonly pose: Pose;

  constructor(limit: number, pose: Readonly<Pose>) {
    super(`Move limit of ${limit} reached at ${describePose(pose)}`);
    this.name = 'MoveLimitError';
    this.limit = limit;
    this.pose = { ...pose };
  }
}

export class MapFormatError extends Error {
  public readonly row: number;
  public readonly column: number;

  constructor(message: string, row: number, column: number) {
    super(`${message} (row ${row}, column ${column})`);
    this.name = 'MapFormatError';
    this.row = row;
    this.column = column;
  }
}
