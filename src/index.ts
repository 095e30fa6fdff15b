export * from "./types";
export * from "./world/types";
export { canHold, isWalkable, maxQuantity, CONTENT_PROPERTIES, TERRAIN_PROPERTIES } from "./world/tile-properties";
export type { ContentProperties, TerrainProperties } from "./world/tile-properties";
export { checkWorld, contentShares, terrainShares } from "./world/stats";
export { defaultEnvironmentalConditions } from "./world/environment";
export * from "./gen/config";
export { ConfigurationError, GeometryError, WorldGenError } from "./gen/errors";
export { validateGeneratorConfig } from "./gen/validation";
export { createRidgedNoise, generateElevationField, sampleElevationRow } from "./gen/elevation";
export type { ElevationField, NoiseSampler } from "./gen/elevation";
export { classifyElevation, classifyTerrain, fieldBounds, thresholdValue, TERRAIN_RANK } from "./gen/terrain";
export { placeRoads, RoadNetworkGenerator } from "./gen/roads/road-generator";
export type { RoadEdge, RoadNetwork } from "./gen/roads/road-generator";
export { rasterizeEdge } from "./gen/roads/rasterize";
export { buildVoronoiCells } from "./gen/roads/voronoi";
export { flowLava, spawnLava } from "./gen/lava";
export { checkBlobSettings, spawnBlobs } from "./gen/content/blob";
export type { BlobSpawnReport } from "./gen/content/blob";
export { buildRingMatrix, spawnGarbage } from "./gen/content/garbage";
export { scatterContent, spawnCoins, spawnRocks, spawnStorage } from "./gen/content/scatter";
export { dedupeSpawnOrder, findSpawnPoint, generateWorld, WorldGenerator } from "./gen/generator";
export type { GeneratedWorld } from "./gen/generator";
export { digestWorld } from "./gen/digest";
export { Logger } from "./util/logger";
export type { LogLevel } from "./util/log-config";
