import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';

import { GoalUnreachableError, MoveLimitError, StuckError } from '../../core/errors';
import { EnvironmentOracle, ExplorationRenderer, KnowledgeView, Pose } from '../../core/types';
import { renderKnowledge } from '../../render/ascii';
import { WorldOracle } from '../../world/oracle';
import { parseWorldMap, WorldMap } from '../../world/text_map';
import { MazeExplorer } from '../explorer';
import { ExplorationTelemetry } from '../telemetry';

const MAPS_DIR = path.resolve(__dirname, '..', '..', '..', 'maps');

function loadMap(name: string): WorldMap {
  return parseWorldMap(fs.readFileSync(path.join(MAPS_DIR, `${name}.txt`), 'utf-8'));
}

const GOAL_UNDER_START = ['+ - +', '| w |', '+ - +'].join('\n');

const GOAL_AHEAD = ['+ - + - +', '| o | o |', '+ . + - +', '| o . w |', '+ - + - +'].join('\n');

const DEAD_END = ['+ - + - +', '| o . w |', '+ - + . +', '| o | o |', '+ - + - +'].join('\n');

function explorerFor(world: WorldMap, extra: Partial<{ maxMoves: number }> = {}) {
  const telemetry = new ExplorationTelemetry();
  const explorer = new MazeExplorer(new WorldOracle(world), {
    dimension: world.dimension,
    start: { x: 1, y: world.dimension * 2 - 1, direction: 'east' },
    telemetry,
    maxMoves: extra.maxMoves,
  });
  return { explorer, telemetry };
}

class RecordingRenderer implements ExplorationRenderer {
  public readonly poses: Pose[] = [];

  render(_grid: KnowledgeView, pose: Readonly<Pose>): void {
    this.poses.push({ ...pose });
  }
}

describe('MazeExplorer termination', () => {
  it('finishes at once when the goal is under the start', () => {
    const { explorer } = explorerFor(parseWorldMap(GOAL_UNDER_START));
    const result = explorer.run();
    expect(explorer.isFinished()).toBe(true);
    expect(result).toEqual({
      pose: { x: 1, y: 1, direction: 'east' },
      moves: 0,
      turns: 0,
      iterations: 1,
      percepts: 1,
      cellsMapped: 1,
      pitsFound: 0,
    });
  });

  it('steps onto a goal spotted straight ahead', () => {
    const { explorer, telemetry } = explorerFor(parseWorldMap(GOAL_AHEAD));
    const result = explorer.run();
    expect(result.pose).toEqual({ x: 3, y: 3, direction: 'east' });
    expect(result.moves).toBe(1);
    expect(result.turns).toBe(0);
    expect(result.iterations).toBe(1);
    expect(result.percepts).toBe(3);
    expect(telemetry.getEvents().map((event) => event.kind)).toEqual([
      'percept',
      'percept',
      'percept',
      'goal',
    ]);
  });

  it('does not count the final step onto the goal against the move limit', () => {
    const { explorer } = explorerFor(parseWorldMap(GOAL_AHEAD), { maxMoves: 0 });
    expect(explorer.run().pose).toEqual({ x: 3, y: 3, direction: 'east' });
  });

  it('stops stepping once the goal is reached', () => {
    const { explorer } = explorerFor(parseWorldMap(GOAL_AHEAD));
    explorer.run();
    expect(explorer.step().phase).toBe('goal-found');
    expect(explorer.getResult().iterations).toBe(1);
    expect(() => explorer.decide()).toThrow('Exploration already reached the goal');
  });

  it('works without a goal-under query on the oracle', () => {
    const world = parseWorldMap(GOAL_AHEAD);
    const inner = new WorldOracle(world);
    const oracle: EnvironmentOracle = {
      isWallAhead: (pose) => inner.isWallAhead(pose),
      isPitAhead: (pose) => inner.isPitAhead(pose),
      isGoalAhead: (pose) => inner.isGoalAhead(pose),
    };
    const explorer = new MazeExplorer(oracle, {
      dimension: 2,
      start: { x: 1, y: 3, direction: 'east' },
    });
    const result = explorer.run();
    expect(result.moves).toBe(1);
    expect(result.percepts).toBe(2);
  });
});

describe('MazeExplorer scanning', () => {
  it('records every direction of the current cell before deciding', () => {
    const { explorer } = explorerFor(loadMap('classic'));
    expect(explorer.scan()).toBe(false);
    const grid = explorer.getGrid();
    const pose = explorer.getPose();
    for (const direction of ['north', 'east', 'south', 'west'] as const) {
      expect(grid.directionRecorded(pose, direction)).toBe(true);
    }
    expect(explorer.getState()).toEqual({
      phase: 'deciding',
      pose: { x: 1, y: 7, direction: 'north' },
      target: null,
    });
  });

  it('has every direction recorded before each move of a full run', () => {
    const { explorer } = explorerFor(loadMap('classic'));
    let movesChecked = 0;
    while (!explorer.scan()) {
      const pose = explorer.getPose();
      for (const direction of ['north', 'east', 'south', 'west'] as const) {
        expect(explorer.getGrid().directionRecorded(pose, direction)).toBe(true);
      }
      const best = explorer.decide();
      expect(explorer.getState().target).toBe(best.direction);
      explorer.turnToFace(best.direction);
      explorer.moveForward();
      movesChecked += 1;
    }
    expect(movesChecked).toBe(6);
    expect(explorer.isFinished()).toBe(true);
  });

  it('hands the oracle a snapshot of the pose', () => {
    const world = parseWorldMap(GOAL_AHEAD);
    const inner = new WorldOracle(world);
    const seen: Readonly<Pose>[] = [];
    const oracle: EnvironmentOracle = {
      isWallAhead: (pose) => {
        seen.push(pose);
        return inner.isWallAhead(pose);
      },
      isPitAhead: (pose) => inner.isPitAhead(pose),
      isGoalAhead: (pose) => {
        seen.push(pose);
        return inner.isGoalAhead(pose);
      },
    };
    const explorer = new MazeExplorer(oracle, {
      dimension: 2,
      start: { x: 1, y: 3, direction: 'east' },
    });
    explorer.run();
    expect(seen).toEqual([
      { x: 1, y: 3, direction: 'east' },
      { x: 1, y: 3, direction: 'east' },
    ]);
    expect(seen[0]).not.toBe(seen[1]);
  });

  it('renders after each scanned direction and each move', () => {
    const renderer = new RecordingRenderer();
    const world = parseWorldMap(DEAD_END);
    const explorer = new MazeExplorer(new WorldOracle(world), {
      dimension: 2,
      start: { x: 1, y: 3, direction: 'east' },
      renderer,
    });
    expect(() => explorer.run()).toThrow(StuckError);
    expect(renderer.poses).toEqual([
      { x: 1, y: 3, direction: 'east' },
      { x: 1, y: 3, direction: 'north' },
    ]);
  });
});

describe('MazeExplorer turning and moving', () => {
  it('turns through the shortest rotation and counts every quarter turn', () => {
    const { explorer, telemetry } = explorerFor(parseWorldMap(DEAD_END));
    explorer.turnToFace('west');
    expect(explorer.getPose().direction).toBe('west');
    explorer.turnToFace('south');
    explorer.turnRight();
    explorer.turnLeft();
    expect(explorer.getPose().direction).toBe('south');
    expect(explorer.getResult().turns).toBe(5);
    expect(telemetry.getSummary().turns).toBe(5);
  });

  it('refuses to move through a path that is not known to be open', () => {
    const { explorer } = explorerFor(parseWorldMap(GOAL_AHEAD));
    expect(() => explorer.moveForward()).toThrow(
      'Cannot move east from (1, 3): path is not known to be open',
    );
  });

  it('rejects a negative move limit', () => {
    expect(() => explorerFor(parseWorldMap(GOAL_AHEAD), { maxMoves: -1 })).toThrow(
      'maxMoves must be a non-negative number, got -1',
    );
  });
});

describe('MazeExplorer on the classic map', () => {
  it('reaches the goal in seven moves', () => {
    const { explorer, telemetry } = explorerFor(loadMap('classic'));
    const result = explorer.run();
    expect(result).toEqual({
      pose: { x: 5, y: 1, direction: 'west' },
      moves: 7,
      turns: 20,
      iterations: 7,
      percepts: 40,
      cellsMapped: 9,
      pitsFound: 2,
    });

    const summary = telemetry.getSummary();
    expect(summary.decisions).toBe(6);
    expect(summary.moves).toBe(6);
    expect(summary.turns).toBe(20);
    expect(summary.goalFound).toBe(true);
    expect(summary.percepts['goal-under']).toBe(1);
    expect(
      summary.percepts.wall + summary.percepts.pit + summary.percepts.goal + summary.percepts['goal-under'],
    ).toBe(40);
  });

  it('chooses north first when both open neighbours tie', () => {
    const { explorer, telemetry } = explorerFor(loadMap('classic'));
    explorer.step();
    const decision = telemetry.getEvents().find((event) => event.kind === 'decision');
    expect(decision).toMatchObject({
      kind: 'decision',
      position: { x: 1, y: 7 },
      chosen: 'north',
      candidates: [
        { direction: 'north', target: { x: 1, y: 5 }, score: 2 },
        { direction: 'east', target: { x: 3, y: 7 }, score: 2 },
      ],
    });
    expect(explorer.getPose()).toEqual({ x: 1, y: 5, direction: 'north' });
  });

  it('leaves the expected partial map behind', () => {
    const { explorer } = explorerFor(loadMap('classic'));
    const result = explorer.run();
    expect(renderKnowledge(explorer.getGrid(), result.pose)).toBe(
      [
        '+ - + - + - + - +',
        '| ? ? ? ? ← . o |',
        '+ ? + ? + - + . +',
        '| ? ? x . o . o |',
        '+ - + . + . + . +',
        '| o . o . o | o |',
        '+ . + - + . + ? +',
        '| o . o ? x ? ? |',
        '+ - + - + - + - +',
      ].join('\n'),
    );
  });

  it('stops with MoveLimitError when the budget runs out', () => {
    const { explorer } = explorerFor(loadMap('classic'), { maxMoves: 3 });
    expect(() => explorer.run()).toThrow(MoveLimitError);
    expect(explorer.getResult()).toEqual({
      pose: { x: 5, y: 5, direction: 'north' },
      moves: 3,
      turns: 11,
      iterations: 4,
      percepts: 25,
      cellsMapped: 6,
      pitsFound: 2,
    });
  });
});

describe('MazeExplorer failure modes', () => {
  it('throws StuckError when the start cell is closed in', () => {
    const { explorer } = explorerFor(parseWorldMap(DEAD_END));
    expect(() => explorer.run()).toThrow('No open direction from (1, 3) facing north');
    expect(explorer.getResult()).toMatchObject({ moves: 0, turns: 1, percepts: 3 });
  });

  it('throws GoalUnreachableError once every reachable cell is mapped', () => {
    const { explorer } = explorerFor(loadMap('enclosed'));
    let caught: unknown = null;
    try {
      explorer.run();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GoalUnreachableError);
    if (caught instanceof GoalUnreachableError) {
      expect(caught.cellsExplored).toBe(6);
      expect(caught.pose).toEqual({ x: 5, y: 5, direction: 'west' });
    }
    expect(explorer.getResult()).toMatchObject({
      moves: 4,
      turns: 10,
      iterations: 5,
      percepts: 23,
    });
  });
});
