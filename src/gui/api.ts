import fs from 'fs';
import path from 'path';

import { EpisodeSummary, resolveStartPose, runEpisode } from '../ai/episode';
import { parseStartPose } from '../config/explorer_config';
import { Pose } from '../core/types';
import { parseWorldMap, WorldMap } from '../world/text_map';

const MAP_EXTENSION = '.txt';
const MAP_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export class ApiError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

export interface ExploreRequest {
  name?: string;
  map?: string;
  start?: Pose;
  maxMoves?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

export function parseExploreRequest(body: unknown): ExploreRequest {
  if (!isRecord(body)) {
    throw new ApiError(400, 'Request body must be a JSON object');
  }
  const request: ExploreRequest = {};

  const { name, map, start, maxMoves } = body;
  if (typeof name === 'string') {
    request.name = name;
  } else if (name !== undefined) {
    throw new ApiError(400, "'name' must be a string");
  }
  if (typeof map === 'string') {
    request.map = map;
  } else if (map !== undefined) {
    throw new ApiError(400, "'map' must be a string");
  }
  if (request.name === undefined && request.map === undefined) {
    throw new ApiError(400, "Provide either 'name' or 'map'");
  }

  if (typeof start === 'string') {
    const pose = parseStartPose(start);
    if (!pose) {
      throw new ApiError(400, "'start' must look like x,y,direction");
    }
    request.start = pose;
  } else if (start !== undefined) {
    throw new ApiError(400, "'start' must be a string");
  }

  if (typeof maxMoves === 'number' && Number.isInteger(maxMoves) && maxMoves >= 0) {
    request.maxMoves = maxMoves;
  } else if (maxMoves !== undefined) {
    throw new ApiError(400, "'maxMoves' must be a non-negative integer");
  }
  return request;
}

export async function listMaps(mapsDir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(mapsDir);
  return entries
    .filter((entry) => entry.endsWith(MAP_EXTENSION))
    .map((entry) => entry.slice(0, -MAP_EXTENSION.length))
    .sort();
}

export async function readNamedMap(mapsDir: string, name: string): Promise<string> {
  if (!MAP_NAME_PATTERN.test(name)) {
    throw new ApiError(400, `Invalid map name '${name}'`);
  }
  try {
    return await fs.promises.readFile(path.join(mapsDir, `${name}${MAP_EXTENSION}`), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ApiError(404, `Unknown map '${name}'`);
    }
    throw error;
  }
}

export async function handleExplore(
  body: unknown,
  mapsDir: string,
  defaultMaxMoves: number,
): Promise<EpisodeSummary> {
  const request = parseExploreRequest(body);
  const text = request.map ?? (await readNamedMap(mapsDir, request.name ?? ''));

  let world: WorldMap;
  let start: Pose;
  try {
    world = parseWorldMap(text);
    start = resolveStartPose(world, request.start);
  } catch (error) {
    if (error instanceof Error) {
      throw new ApiError(400, error.message);
    }
    throw error;
  }

  // Requests may lower the server's move budget, never raise it.
  return runEpisode(world, {
    start,
    maxMoves: Math.min(request.maxMoves ?? defaultMaxMoves, defaultMaxMoves),
  });
}
