import path from "node:path";
import { LogLevel, isMemoryProfile, parseLogLevel, type MemoryProfile } from "@shared";

export interface ServerConfig {
  port: number;
  mapFile: string | undefined;  // loaded at startup when set
  mapDir: string;               // root for maps loaded through the API
  memoryProfile: MemoryProfile;
  logLevel: LogLevel;
  snapshotRadius: number;       // meters, default radius for vehicle snapshots
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_PORT = 3000;
const DEFAULT_SNAPSHOT_RADIUS = 50;

/**
 * Read server settings from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const memoryProfile = env.MEMORY_PROFILE?.trim() || "default";
  if (!isMemoryProfile(memoryProfile)) {
    throw new ConfigError(`MEMORY_PROFILE must be "default" or "large", got "${memoryProfile}"`);
  }

  const snapshotRadius = env.SNAPSHOT_RADIUS === undefined ? DEFAULT_SNAPSHOT_RADIUS : Number(env.SNAPSHOT_RADIUS);
  if (!Number.isFinite(snapshotRadius) || snapshotRadius <= 0) {
    throw new ConfigError(`SNAPSHOT_RADIUS must be a positive number, got "${env.SNAPSHOT_RADIUS}"`);
  }

  return {
    port: Number(env.PORT) || DEFAULT_PORT,
    mapFile: env.MAP_FILE?.trim() || undefined,
    mapDir: path.resolve(env.MAP_DIR?.trim() || "data"),
    memoryProfile,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    snapshotRadius,
  };
}
