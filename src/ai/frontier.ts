import { StuckError } from '../core/errors';
import { opposite, rotateLeft, rotateRight, translate } from '../core/geometry';
import {
  DIRECTIONS,
  Direction,
  KnowledgeView,
  Point,
  Pose,
} from '../core/types';

export interface MoveCandidate {
  readonly direction: Direction;
  readonly target: Point;
  readonly score: number;
}

/** Forward, left, back, right: the order cells are inspected while turning in place. */
export function scanningOrder(facing: Direction): Direction[] {
  return [facing, rotateLeft(facing), opposite(facing), rotateRight(facing)];
}

/**
 * Forward, left, right, back relative to the logical forward.
 * A completed scan leaves the agent a quarter turn clockwise of where it
 * started, so the logical forward is one left of the current facing.
 */
export function pathfindingOrder(facing: Direction): Direction[] {
  const forward = rotateLeft(facing);
  return [forward, rotateLeft(forward), rotateRight(forward), opposite(forward)];
}

export function unexploredScore(grid: KnowledgeView, cell: Point): number {
  let score = 0;
  for (const direction of DIRECTIONS) {
    if (grid.wallBetween(cell, direction) === 'wall') {
      continue;
    }
    if (grid.cellAt(cell, direction) === 'unknown') {
      score += 1;
    }
  }
  return score;
}

export function rankMoves(
  grid: KnowledgeView,
  pose: Readonly<Pose>,
): MoveCandidate[] {
  const candidates: MoveCandidate[] = [];
  for (const direction of pathfindingOrder(pose.direction)) {
    if (!grid.isPathOpen(pose, direction)) {
      continue;
    }
    const target = translate(pose, direction, 'cell');
    candidates.push({
      direction,
      target,
      score: unexploredScore(grid, target),
    });
  }
  return candidates;
}

export function selectBestMove(
  grid: KnowledgeView,
  pose: Readonly<Pose>,
): MoveCandidate {
  let best: MoveCandidate | null = null;
  for (const candidate of rankMoves(grid, pose)) {
    if (best === null || candidate.score > best.score) {
      best = candidate;
    }
  }
  if (best === null) {
    throw new StuckError(pose);
  }
  return best;
}

/**
 * True while some cell reachable over known open paths still has a direction
 * left to scan. Once this is false the goal cannot be reached.
 */
export function hasReachableFrontier(grid: KnowledgeView, from: Point): boolean {
  const seen = new Set<string>([`${from.x},${from.y}`]);
  const queue: Point[] = [{ x: from.x, y: from.y }];
  for (let index = 0; index < queue.length; index += 1) {
    const cell = queue[index];
    if (!cell) {
      break;
    }
    for (const direction of DIRECTIONS) {
      if (!grid.directionRecorded(cell, direction)) {
        return true;
      }
      if (!grid.isPathOpen(cell, direction)) {
        continue;
      }
      const next = translate(cell, direction, 'cell');
      const key = `${next.x},${next.y}`;
      if (!seen.has(key)) {
        seen.add(key);
        queue.push(next);
      }
    }
  }
  return false;
}
