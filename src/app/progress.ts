// Session progress records, ranking and persistence

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { debugLog } from "../utils/debug";
import { isInteger, isRecord, isString } from "../utils/guards";

export type SessionRecord = Readonly<{
  playerName: string;
  levelsPassed: number; // highest level number completed (1-based)
  totalSteps: number; // steps summed over every completed run
}>;

export type SaveFile = Readonly<{
  allSessions: ReadonlyArray<SessionRecord>;
}>;

export const DEFAULT_PLAYER_NAME = "Player";

export const emptySaveFile = (): SaveFile => ({ allSessions: [] });

export function beginSession(
  file: SaveFile,
  playerName: string = DEFAULT_PLAYER_NAME,
): SaveFile {
  return {
    allSessions: [
      ...file.allSessions,
      { levelsPassed: 0, playerName, totalSteps: 0 },
    ],
  };
}

/** levelNumber is 1-based: passing the first level records 1. */
export function recordLevelPassed(
  record: SessionRecord,
  levelNumber: number,
  steps: number,
): SessionRecord {
  return {
    ...record,
    levelsPassed: Math.max(record.levelsPassed, levelNumber),
    totalSteps: record.totalSteps + steps,
  };
}

export function playerNameExists(file: SaveFile, name: string): boolean {
  const wanted = name.toLowerCase();
  return file.allSessions.some((s) => s.playerName.toLowerCase() === wanted);
}

/** Most levels first; ties go to the fewer total steps. */
export function rankSessions(file: SaveFile): ReadonlyArray<SessionRecord> {
  return [...file.allSessions].sort(
    (a, b) => b.levelsPassed - a.levelsPassed || a.totalSteps - b.totalSteps,
  );
}

function toSessionRecord(raw: unknown): SessionRecord | undefined {
  if (!isRecord(raw)) return undefined;
  const { levelsPassed, playerName, totalSteps } = raw;
  if (
    !isString(playerName) ||
    !isInteger(levelsPassed) ||
    !isInteger(totalSteps)
  ) {
    return undefined;
  }
  return { levelsPassed, playerName, totalSteps };
}

// Malformed sessions are dropped, the rest are kept
export function parseSaveFile(raw: unknown): SaveFile {
  const entries = isRecord(raw) ? raw["allSessions"] : undefined;
  if (!Array.isArray(entries)) {
    debugLog("progress", "Save file has no allSessions list, starting empty");
    return emptySaveFile();
  }
  const allSessions: Array<SessionRecord> = [];
  for (const entry of entries) {
    const record = toSessionRecord(entry);
    if (record === undefined) {
      debugLog("progress", "Dropping malformed session record", entry);
      continue;
    }
    allSessions.push(record);
  }
  return { allSessions };
}

export function serializeSaveFile(file: SaveFile): string {
  return JSON.stringify(file, null, 2);
}

export type ProgressStore = {
  load(): Promise<SaveFile>;
  save(file: SaveFile): Promise<void>;
};

export class MemoryProgressStore implements ProgressStore {
  private file: SaveFile;

  constructor(initial: SaveFile = emptySaveFile()) {
    this.file = initial;
  }

  load(): Promise<SaveFile> {
    return Promise.resolve(this.file);
  }

  save(file: SaveFile): Promise<void> {
    this.file = file;
    return Promise.resolve();
  }
}

function isMissingFile(e: unknown): boolean {
  return isRecord(e) && e["code"] === "ENOENT";
}

/**
 * Stores every session in one JSON file. A missing or corrupt file loads
 * as empty; write failures propagate.
 */
export class JsonFileProgressStore implements ProgressStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<SaveFile> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) return emptySaveFile();
      throw e;
    }
    try {
      return parseSaveFile(JSON.parse(text));
    } catch (e) {
      debugLog("progress", `Unreadable save file ${this.filePath}`, e);
      return emptySaveFile();
    }
  }

  async save(file: SaveFile): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, serializeSaveFile(file), "utf8");
  }
}

/** The save file plus the session being played; every change is saved. */
export class ProgressTracker {
  private file: SaveFile;
  private sessionIndex: number | undefined;

  private constructor(
    private readonly store: ProgressStore,
    file: SaveFile,
  ) {
    this.file = file;
  }

  static async open(store: ProgressStore): Promise<ProgressTracker> {
    return new ProgressTracker(store, await store.load());
  }

  get saveFile(): SaveFile {
    return this.file;
  }

  get current(): SessionRecord | undefined {
    return this.sessionIndex === undefined
      ? undefined
      : this.file.allSessions[this.sessionIndex];
  }

  async beginSession(
    playerName: string = DEFAULT_PLAYER_NAME,
  ): Promise<SessionRecord> {
    this.file = beginSession(this.file, playerName);
    this.sessionIndex = this.file.allSessions.length - 1;
    debugLog("progress", `Session started for ${playerName}`);
    await this.store.save(this.file);
    return this.requireCurrent();
  }

  async setPlayerName(playerName: string): Promise<SessionRecord> {
    return this.updateCurrent((s) => ({ ...s, playerName }));
  }

  /** Starts a default session first if none is active. */
  async recordLevelPassed(
    levelNumber: number,
    steps: number,
  ): Promise<SessionRecord> {
    if (this.sessionIndex === undefined) await this.beginSession();
    return this.updateCurrent((s) => recordLevelPassed(s, levelNumber, steps));
  }

  playerNameExists(name: string): boolean {
    return playerNameExists(this.file, name);
  }

  ranking(): ReadonlyArray<SessionRecord> {
    return rankSessions(this.file);
  }

  private requireCurrent(): SessionRecord {
    const record = this.current;
    if (record === undefined) throw new Error("No active progress session");
    return record;
  }

  private async updateCurrent(
    update: (record: SessionRecord) => SessionRecord,
  ): Promise<SessionRecord> {
    const next = update(this.requireCurrent());
    const index = this.sessionIndex;
    this.file = {
      allSessions: this.file.allSessions.map((s, i) =>
        i === index ? next : s,
      ),
    };
    await this.store.save(this.file);
    return next;
  }
}
