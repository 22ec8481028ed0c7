import {
  GoalUnreachableError,
  MoveLimitError,
  StuckError,
} from '../core/errors';
import { ExplorationRenderer, Pose } from '../core/types';
import { renderKnowledge } from '../render/ascii';
import { WorldOracle } from '../world/oracle';
import { WorldMap, worldSlotAt } from '../world/text_map';
import { MazeExplorer } from './explorer';
import { ExplorationTelemetry, TelemetrySummary } from './telemetry';

export type EpisodeOutcome = 'goal-found' | 'stuck' | 'unreachable' | 'move-limit';

export interface EpisodeOptions {
  start?: Pose;
  maxMoves?: number;
  detectUnreachable?: boolean;
  renderer?: ExplorationRenderer;
  telemetry?: ExplorationTelemetry;
}

export interface EpisodeSummary {
  outcome: EpisodeOutcome;
  start: Pose;
  pose: Pose;
  moves: number;
  turns: number;
  iterations: number;
  percepts: number;
  cellsMapped: number;
  pitsFound: number;
  knowledge: string;
  telemetry: TelemetrySummary;
  message: string | null;
}

/** Bottom-left cell, facing east. */
export function defaultStartPose(dimension: number): Pose {
  return { x: 1, y: dimension * 2 - 1, direction: 'east' };
}

export function resolveStartPose(world: WorldMap, start?: Pose): Pose {
  const pose = start ?? world.start ?? defaultStartPose(world.dimension);
  const slot = worldSlotAt(world, pose.x, pose.y);
  if (slot === undefined) {
    throw new Error(`Start (${pose.x}, ${pose.y}) lies outside the ${world.size}x${world.size} map`);
  }
  if (slot === 'pit') {
    throw new Error(`Start (${pose.x}, ${pose.y}) is a pit`);
  }
  if (slot !== 'cell' && slot !== 'goal') {
    throw new Error(`Start (${pose.x}, ${pose.y}) is not a cell`);
  }
  return { ...pose };
}

function classifyFailure(error: unknown): EpisodeOutcome | null {
  if (error instanceof StuckError) {
    return 'stuck';
  }
  if (error instanceof GoalUnreachableError) {
    return 'unreachable';
  }
  if (error instanceof MoveLimitError) {
    return 'move-limit';
  }
  return null;
}

/**
 * Runs one exploration of `world` to completion. Stuck, unreachable and
 * move-limit endings are reported as outcomes; anything else propagates.
 */
export function runEpisode(world: WorldMap, options: EpisodeOptions = {}): EpisodeSummary {
  const start = resolveStartPose(world, options.start);
  const telemetry = options.telemetry ?? new ExplorationTelemetry();
  const explorer = new MazeExplorer(new WorldOracle(world), {
    dimension: world.dimension,
    start,
    telemetry,
    renderer: options.renderer,
    maxMoves: options.maxMoves,
    detectUnreachable: options.detectUnreachable,
  });

  let outcome: EpisodeOutcome = 'goal-found';
  let message: string | null = null;
  try {
    explorer.run();
  } catch (error) {
    const failure = classifyFailure(error);
    if (failure === null) {
      throw error;
    }
    outcome = failure;
    message = error instanceof Error ? error.message : String(error);
  }

  const result = explorer.getResult();
  return {
    outcome,
    start,
    pose: result.pose,
    moves: result.moves,
    turns: result.turns,
    iterations: result.iterations,
    percepts: result.percepts,
    cellsMapped: result.cellsMapped,
    pitsFound: result.pitsFound,
    knowledge: renderKnowledge(explorer.getGrid(), result.pose),
    telemetry: telemetry.getSummary(),
    message,
  };
}
