import { OutOfBoundsError } from '../core/errors';
import { translate } from '../core/geometry';
import { EnvironmentOracle, Pose, Slot, StepGranularity } from '../core/types';
import { WorldMap, worldSlotAt } from './text_map';

/** Answers percept queries against a parsed ground-truth map. */
export class WorldOracle implements EnvironmentOracle {
  private readonly world: WorldMap;

  constructor(world: WorldMap) {
    this.world = world;
  }

  isWallAhead(pose: Readonly<Pose>): boolean {
    return this.slotAhead(pose, 'wall') === 'wall';
  }

  isPitAhead(pose: Readonly<Pose>): boolean {
    return this.slotAhead(pose, 'cell') === 'pit';
  }

  isGoalAhead(pose: Readonly<Pose>): boolean {
    return this.slotAhead(pose, 'cell') === 'goal';
  }

  isGoalUnder(pose: Readonly<Pose>): boolean {
    return this.slotAt(pose.x, pose.y) === 'goal';
  }

  private slotAhead(pose: Readonly<Pose>, granularity: StepGranularity): Slot {
    const { x, y } = translate(pose, pose.direction, granularity);
    return this.slotAt(x, y);
  }

  private slotAt(x: number, y: number): Slot {
    const slot = worldSlotAt(this.world, x, y);
    if (slot === undefined) {
      throw new OutOfBoundsError(x, y, this.world.size);
    }
    return slot;
  }
}
