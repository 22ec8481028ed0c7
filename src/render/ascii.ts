import { ExplorationRenderer, KnowledgeView, Pose } from '../core/types';
import { WorldMap } from '../world/text_map';
import { charForSlot, POSE_ARROWS } from '../world/notation';

export function renderKnowledge(grid: KnowledgeView, pose?: Readonly<Pose>): string {
  const lines: string[] = [];
  for (let y = 0; y < grid.size; y += 1) {
    const symbols: string[] = [];
    for (let x = 0; x < grid.size; x += 1) {
      if (pose && pose.x === x && pose.y === y) {
        symbols.push(POSE_ARROWS[pose.direction]);
        continue;
      }
      symbols.push(charForSlot(grid.slotAt(x, y), y));
    }
    lines.push(symbols.join(' '));
  }
  return lines.join('\n');
}

export function renderWorld(world: WorldMap): string {
  return world.slots
    .map((row, y) =>
      row
        .map((slot, x) => {
          if (world.start && world.start.x === x && world.start.y === y) {
            return POSE_ARROWS[world.start.direction];
          }
          return charForSlot(slot, y);
        })
        .join(' '),
    )
    .join('\n');
}

export interface ConsoleRendererOptions {
  /** Print only every n-th frame. */
  every?: number;
  log?: (message: string) => void;
}

export class ConsoleRenderer implements ExplorationRenderer {
  private readonly every: number;
  private readonly log: (message: string) => void;
  private frames = 0;

  constructor(options: ConsoleRendererOptions = {}) {
    this.every = Math.max(1, Math.floor(options.every ?? 1));
    // eslint-disable-next-line no-console
    this.log = options.log ?? ((message) => console.log(message));
  }

  render(grid: KnowledgeView, pose: Readonly<Pose>): void {
    this.frames += 1;
    if (this.frames % this.every !== 0) {
      return;
    }
    this.log(`----- frame ${this.frames} -----\n${renderKnowledge(grid, pose)}\n`);
  }

  getFrameCount(): number {
    return this.frames;
  }
}
