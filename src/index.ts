export * from "./engine";

export { Campaign } from "./app/campaign";
export type { CampaignOptions } from "./app/campaign";
export { BUNDLED_LEVELS_DIR, loadLevelDirectory } from "./app/levels";
export {
  DEFAULT_PLAYER_NAME,
  JsonFileProgressStore,
  MemoryProgressStore,
  ProgressTracker,
  beginSession,
  emptySaveFile,
  parseSaveFile,
  playerNameExists,
  rankSessions,
  recordLevelPassed,
  serializeSaveFile,
} from "./app/progress";
export type { ProgressStore, SaveFile, SessionRecord } from "./app/progress";
export {
  SETTINGS_ENV_KEYS,
  defaultRuntimeSettings,
  loadSettings,
  resolveSettings,
} from "./app/settings";
export type { RuntimeSettings } from "./app/settings";

export {
  createDurationMs,
  createGridCoord,
  createLevelIndex,
  createSwitchId,
} from "./types/brands";
export type { DurationMs, GridCoord, LevelIndex, SwitchId } from "./types/brands";
export { debugLog, isDebugEnabled } from "./utils/debug";
export type { DebugTopic } from "./utils/debug";
