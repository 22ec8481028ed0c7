/**
 * Exploration telemetry
 *
 * Append-only record of what the explorer did and why: every quarter turn,
 * every percept query with its answer, every move decision with the ranked
 * candidates it was chosen from.
 */

import fs from 'fs';

import { Direction, Point, RotationSense } from '../core/types';
import { MoveCandidate } from './frontier';

export type PerceptQuery = 'wall' | 'pit' | 'goal' | 'goal-under';

export type ExplorationEvent =
  | {
      kind: 'turn';
      sequence: number;
      from: Direction;
      to: Direction;
      sense: RotationSense;
    }
  | {
      kind: 'percept';
      sequence: number;
      query: PerceptQuery;
      position: Point;
      direction: Direction;
      result: boolean;
    }
  | {
      kind: 'decision';
      sequence: number;
      position: Point;
      candidates: MoveCandidate[];
      chosen: Direction;
    }
  | {
      kind: 'move';
      sequence: number;
      from: Point;
      to: Point;
      direction: Direction;
    }
  | {
      kind: 'goal';
      sequence: number;
      position: Point;
    };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type ExplorationEventInput = DistributiveOmit<ExplorationEvent, 'sequence'>;

export interface TelemetrySummary {
  turns: number;
  moves: number;
  decisions: number;
  percepts: Record<PerceptQuery, number>;
  goalFound: boolean;
  elapsedMs: number;
}

export class ExplorationTelemetry {
  private events: ExplorationEvent[] = [];
  private sequence = 0;
  private startTime = Date.now();

  record(event: ExplorationEventInput): ExplorationEvent {
    this.sequence += 1;
    const entry: ExplorationEvent = { ...event, sequence: this.sequence };
    this.events.push(entry);
    return entry;
  }

  getEvents(): ExplorationEvent[] {
    return [...this.events];
  }

  getRecentEvents(count: number = 10): ExplorationEvent[] {
    if (count <= 0) {
      return [];
    }
    return this.events.slice(-count);
  }

  getSummary(): TelemetrySummary {
    const summary: TelemetrySummary = {
      turns: 0,
      moves: 0,
      decisions: 0,
      percepts: { wall: 0, pit: 0, goal: 0, 'goal-under': 0 },
      goalFound: false,
      elapsedMs: Date.now() - this.startTime,
    };
    for (const event of this.events) {
      switch (event.kind) {
        case 'turn':
          summary.turns += 1;
          break;
        case 'move':
          summary.moves += 1;
          break;
        case 'decision':
          summary.decisions += 1;
          break;
        case 'percept':
          summary.percepts[event.query] += 1;
          break;
        case 'goal':
          summary.goalFound = true;
          break;
      }
    }
    return summary;
  }

  exportJSON(): string {
    return JSON.stringify(
      {
        summary: this.getSummary(),
        events: this.events,
      },
      null,
      2,
    );
  }

  async saveToFile(filepath: string): Promise<void> {
    await fs.promises.writeFile(filepath, this.exportJSON(), 'utf-8');
  }

  clear(): void {
    this.events = [];
    this.sequence = 0;
    this.startTime = Date.now();
  }
}
