#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs';
import path from 'path';

import { runEpisode } from '../ai/episode';
import { ExplorationTelemetry } from '../ai/telemetry';
import { resolveExplorerConfig } from '../config/explorer_config';
import { ConsoleRenderer } from '../render/ascii';
import { parseWorldMap } from '../world/text_map';
import { formatSummary, parseCliOverrides } from './options';

async function main(): Promise<void> {
  const config = resolveExplorerConfig(parseCliOverrides(process.argv.slice(2)));
  const mapFile = path.resolve(process.cwd(), config.mapPath);
  const world = parseWorldMap(await fs.promises.readFile(mapFile, 'utf-8'));
  const telemetry = new ExplorationTelemetry();

  const summary = runEpisode(world, {
    start: config.start ?? undefined,
    maxMoves: config.maxMoves,
    renderer: config.render ? new ConsoleRenderer() : undefined,
    telemetry,
  });

  // eslint-disable-next-line no-console
  console.log(summary.knowledge);
  // eslint-disable-next-line no-console
  console.log(formatSummary(summary));
  if (summary.message) {
    // eslint-disable-next-line no-console
    console.error(summary.message);
  }
  if (config.tracePath) {
    await telemetry.saveToFile(path.resolve(process.cwd(), config.tracePath));
  }
  process.exitCode = summary.outcome === 'goal-found' ? 0 : 1;
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
