import { EpisodeSummary } from '../ai/episode';
import {
  ExplorerConfig,
  parseMaxMoves,
  parseStartPose,
} from '../config/explorer_config';

export function parseCliOverrides(args: readonly string[]): Partial<ExplorerConfig> {
  const getString = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      return args[index + 1];
    }
    return undefined;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);

  const overrides: Partial<ExplorerConfig> = {};
  const mapPath = getString('--map');
  if (mapPath !== undefined) {
    overrides.mapPath = mapPath;
  }
  const startValue = getString('--start');
  if (startValue !== undefined) {
    const start = parseStartPose(startValue);
    if (!start) {
      throw new Error(`Invalid --start '${startValue}': expected x,y,direction`);
    }
    overrides.start = start;
  }
  const maxMovesValue = getString('--max-moves');
  if (maxMovesValue !== undefined) {
    const maxMoves = parseMaxMoves(maxMovesValue);
    if (maxMoves === null) {
      throw new Error(`Invalid --max-moves '${maxMovesValue}'`);
    }
    overrides.maxMoves = maxMoves;
  }
  if (hasFlag('--render')) {
    overrides.render = true;
  }
  const tracePath = getString('--trace');
  if (tracePath !== undefined) {
    overrides.tracePath = tracePath;
  }
  return overrides;
}

export function formatSummary(summary: EpisodeSummary): string {
  const { pose } = summary;
  const head =
    summary.outcome === 'goal-found'
      ? `Goal reached at (${pose.x}, ${pose.y})`
      : `Exploration ended (${summary.outcome}) at (${pose.x}, ${pose.y})`;
  return `${head}: moves=${summary.moves} turns=${summary.turns} percepts=${summary.percepts} cells=${summary.cellsMapped} pits=${summary.pitsFound}`;
}
