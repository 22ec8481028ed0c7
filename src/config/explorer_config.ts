/**
 * Explorer configuration
 *
 * Defaults, overridden by `MAZE_EXPLORER_*` environment variables, overridden
 * by command-line flags. Malformed values are reported and ignored.
 */

import { parseDirection } from '../core/geometry';
import { Pose } from '../core/types';

export interface ExplorerConfig {
  /** Map file, relative to the working directory */
  mapPath: string;

  /** Explicit start pose; falls back to the map's marker, then the bottom-left cell */
  start: Pose | null;

  /** Moves allowed before the run is abandoned */
  maxMoves: number;

  /** Print the knowledge grid after every action */
  render: boolean;

  /** Where to write the telemetry JSON, if anywhere */
  tracePath: string | null;
}

export const DEFAULT_EXPLORER_CONFIG: ExplorerConfig = {
  mapPath: 'maps/classic.txt',
  start: null,
  maxMoves: 1000,
  render: false,
  tracePath: null,
};

type Warn = (message: string) => void;

// eslint-disable-next-line no-console
const defaultWarn: Warn = (message) => console.warn(message);

/** Parses `x,y,direction`, e.g. `1,7,east`. */
export function parseStartPose(value: string): Pose | null {
  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 3) {
    return null;
  }
  const [rawX, rawY, rawDirection] = parts;
  const x = Number(rawX);
  const y = Number(rawY);
  const direction = parseDirection(rawDirection ?? '');
  if (!Number.isInteger(x) || !Number.isInteger(y) || direction === null) {
    return null;
  }
  return { x, y, direction };
}

export function parseMaxMoves(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

export function loadExplorerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  warn: Warn = defaultWarn,
): Partial<ExplorerConfig> {
  const config: Partial<ExplorerConfig> = {};

  const mapEnv = env.MAZE_EXPLORER_MAP;
  if (mapEnv) {
    config.mapPath = mapEnv;
  }

  const startEnv = env.MAZE_EXPLORER_START;
  if (startEnv) {
    const start = parseStartPose(startEnv);
    if (start) {
      config.start = start;
    } else {
      warn(`Ignoring MAZE_EXPLORER_START='${startEnv}': expected x,y,direction`);
    }
  }

  const maxMovesEnv = env.MAZE_EXPLORER_MAX_MOVES;
  if (maxMovesEnv) {
    const maxMoves = parseMaxMoves(maxMovesEnv);
    if (maxMoves !== null) {
      config.maxMoves = maxMoves;
    } else {
      warn(`Ignoring MAZE_EXPLORER_MAX_MOVES='${maxMovesEnv}': expected a non-negative integer`);
    }
  }

  const renderEnv = env.MAZE_EXPLORER_RENDER;
  if (renderEnv) {
    config.render = renderEnv.toLowerCase() === 'true' || renderEnv === '1';
  }

  const traceEnv = env.MAZE_EXPLORER_TRACE;
  if (traceEnv) {
    config.tracePath = traceEnv;
  }

  return config;
}

export function resolveExplorerConfig(
  overrides: Partial<ExplorerConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
  warn: Warn = defaultWarn,
): ExplorerConfig {
  return {
    ...DEFAULT_EXPLORER_CONFIG,
    ...loadExplorerConfigFromEnv(env, warn),
    ...overrides,
  };
}
