import { GoalUnreachableError, MoveLimitError } from '../core/errors';
import { planRotation, rotateLeft, rotateRight, translate } from '../core/geometry';
import { KnowledgeGrid } from '../core/knowledge_grid';
import {
  DIRECTIONS,
  Direction,
  EnvironmentOracle,
  ExplorationRenderer,
  KnowledgeView,
  Pose,
  RotationSense,
} from '../core/types';
import {
  hasReachableFrontier,
  MoveCandidate,
  rankMoves,
  scanningOrder,
  selectBestMove,
} from './frontier';
import { ExplorationTelemetry, PerceptQuery } from './telemetry';

export type ExplorerPhase = 'scanning' | 'deciding' | 'moving' | 'goal-found';

export interface ExplorerState {
  readonly phase: ExplorerPhase;
  readonly pose: Pose;
  readonly target: Direction | null;
}

export interface ExplorerOptions {
  dimension: number;
  start: Pose;
  renderer?: ExplorationRenderer;
  telemetry?: ExplorationTelemetry;
  maxMoves?: number;
  detectUnreachable?: boolean;
}

export interface ExplorationResult {
  pose: Pose;
  moves: number;
  turns: number;
  iterations: number;
  percepts: number;
  cellsMapped: number;
  pitsFound: number;
}

/**
 * Scan-then-move controller.
 *
 * Each iteration turns through every unrecorded direction of the current
 * cell, asks the oracle what lies ahead, records the answers, then moves one
 * cell towards the open neighbour bordering the most unknown cells.
 */
export class MazeExplorer {
  private readonly oracle: EnvironmentOracle;
  private readonly grid: KnowledgeGrid;
  private readonly renderer: ExplorationRenderer | null;
  private readonly telemetry: ExplorationTelemetry | null;
  private readonly maxMoves: number;
  private readonly detectUnreachable: boolean;
  private pose: Pose;
  private phase: ExplorerPhase = 'scanning';
  private target: Direction | null = null;
  private startChecked = false;
  private moves = 0;
  private turns = 0;
  private iterations = 0;
  private percepts = 0;

  constructor(oracle: EnvironmentOracle, options: ExplorerOptions) {
    const maxMoves = options.maxMoves ?? Number.POSITIVE_INFINITY;
    if (Number.isNaN(maxMoves) || maxMoves < 0) {
      throw new Error(`maxMoves must be a non-negative number, got ${maxMoves}`);
    }
    this.oracle = oracle;
    this.grid = new KnowledgeGrid(options.dimension, options.start);
    this.pose = { ...options.start };
    this.renderer = options.renderer ?? null;
    this.telemetry = options.telemetry ?? null;
    this.maxMoves = maxMoves;
    this.detectUnreachable = options.detectUnreachable ?? true;
  }

  getPose(): Pose {
    return { ...this.pose };
  }

  getGrid(): KnowledgeView {
    return this.grid;
  }

  getState(): ExplorerState {
    return {
      phase: this.phase,
      pose: this.getPose(),
      target: this.target,
    };
  }

  isFinished(): boolean {
    return this.phase === 'goal-found';
  }

  getResult(): ExplorationResult {
    return {
      pose: this.getPose(),
      moves: this.moves,
      turns: this.turns,
      iterations: this.iterations,
      percepts: this.percepts,
      cellsMapped: this.grid.countSlots('cell'),
      pitsFound: this.grid.countSlots('pit'),
    };
  }

  turnLeft(): void {
    this.rotate('left');
  }

  turnRight(): void {
    this.rotate('right');
  }

  turnToFace(target: Direction): void {
    for (const sense of planRotation(this.pose.direction, target)) {
      this.rotate(sense);
    }
  }

  /**
   * Scans every unrecorded direction of the current cell.
   * Returns true when the goal turned up, in which case the agent has
   * already stepped onto it.
   */
  scan(): boolean {
    this.checkStartCell();
    if (this.phase === 'goal-found') {
      return true;
    }
    this.phase = 'scanning';
    this.target = null;

    for (const direction of scanningOrder(this.pose.direction)) {
      if (this.grid.directionRecorded(this.pose, direction)) {
        continue;
      }
      this.turnToFace(direction);
      const wallAhead = this.query('wall', (pose) => this.oracle.isWallAhead(pose));
      this.grid.recordWall(this.pose, direction, wallAhead);
      if (!wallAhead) {
        if (this.query('goal', (pose) => this.oracle.isGoalAhead(pose))) {
          this.enterGoal();
          return true;
        }
        const pitAhead = this.query('pit', (pose) => this.oracle.isPitAhead(pose));
        this.grid.recordCell(this.pose, direction, pitAhead ? 'pit' : 'none');
      }
      this.renderFrame();
    }

    this.phase = 'deciding';
    return false;
  }

  decide(): MoveCandidate {
    if (this.phase === 'goal-found') {
      throw new Error('Exploration already reached the goal');
    }
    const best = selectBestMove(this.grid, this.pose);
    if (this.detectUnreachable && !hasReachableFrontier(this.grid, this.pose)) {
      throw new GoalUnreachableError(this.pose, this.grid.countSlots('cell'));
    }
    this.telemetry?.record({
      kind: 'decision',
      position: { x: this.pose.x, y: this.pose.y },
      candidates: rankMoves(this.grid, this.pose),
      chosen: best.direction,
    });
    this.phase = 'moving';
    this.target = best.direction;
    return best;
  }

  moveForward(): void {
    const direction = this.pose.direction;
    if (!this.grid.isPathOpen(this.pose, direction)) {
      throw new Error(
        `Cannot move ${direction} from (${this.pose.x}, ${this.pose.y}): path is not known to be open`,
      );
    }
    if (this.moves >= this.maxMoves) {
      throw new MoveLimitError(this.maxMoves, this.pose);
    }
    const from = { x: this.pose.x, y: this.pose.y };
    this.advance();
    this.grid.markVisited(this.pose);
    this.telemetry?.record({
      kind: 'move',
      from,
      to: { x: this.pose.x, y: this.pose.y },
      direction,
    });
    this.renderFrame();
  }

  /** One outer iteration: scan, decide, turn, move. */
  step(): ExplorerState {
    if (this.phase === 'goal-found') {
      return this.getState();
    }
    this.iterations += 1;
    if (this.scan()) {
      return this.getState();
    }

    const unrecorded = DIRECTIONS.filter(
      (direction) => !this.grid.directionRecorded(this.pose, direction),
    );
    if (unrecorded.length > 0) {
      throw new Error(
        `Scan left ${unrecorded.join(', ')} unrecorded at (${this.pose.x}, ${this.pose.y})`,
      );
    }

    const best = this.decide();
    this.turnToFace(best.direction);
    this.moveForward();
    this.phase = 'scanning';
    this.target = null;
    return this.getState();
  }

  run(): ExplorationResult {
    while (this.phase !== 'goal-found') {
      this.step();
    }
    return this.getResult();
  }

  private checkStartCell(): void {
    if (this.startChecked) {
      return;
    }
    this.startChecked = true;
    const oracle = this.oracle;
    if (!oracle.isGoalUnder) {
      return;
    }
    if (this.query('goal-under', (pose) => oracle.isGoalUnder?.(pose) ?? false)) {
      this.phase = 'goal-found';
      this.telemetry?.record({
        kind: 'goal',
        position: { x: this.pose.x, y: this.pose.y },
      });
      this.renderFrame();
    }
  }

  private enterGoal(): void {
    this.advance();
    this.phase = 'goal-found';
    this.target = null;
    this.telemetry?.record({
      kind: 'goal',
      position: { x: this.pose.x, y: this.pose.y },
    });
    this.renderFrame();
  }

  private advance(): void {
    const next = translate(this.pose, this.pose.direction, 'cell');
    this.pose = { ...next, direction: this.pose.direction };
    this.moves += 1;
  }

  private rotate(sense: RotationSense): void {
    const from = this.pose.direction;
    const to = sense === 'left' ? rotateLeft(from) : rotateRight(from);
    this.pose = { ...this.pose, direction: to };
    this.turns += 1;
    this.telemetry?.record({ kind: 'turn', from, to, sense });
  }

  private query(
    kind: PerceptQuery,
    ask: (pose: Readonly<Pose>) => boolean,
  ): boolean {
    const snapshot = this.getPose();
    const result = ask(snapshot);
    this.percepts += 1;
    this.telemetry?.record({
      kind: 'percept',
      query: kind,
      position: { x: snapshot.x, y: snapshot.y },
      direction: snapshot.direction,
      result,
    });
    return result;
  }

  private renderFrame(): void {
    this.renderer?.render(this.grid, this.getPose());
  }
}
