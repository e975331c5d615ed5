import { homedir } from "node:os";
import { join } from "node:path";

export type TasklaneConfig = {
  cache: {
    enabled: boolean;
    dbPath: string;
    memoryTtlMs: number;
    memoryMaxEntries: number;
  };
  output: {
    /** Lines kept per captured stream; the oldest are dropped first. */
    maxCapturedLines: number;
  };
  runner: {
    /** `true` runs commands through the platform shell, a string names one. */
    shell: boolean | string;
    outputEnvVar: string;
    inputsEnvVar: string;
  };
  ui: {
    statusWidth: number;
    nameWidth: number;
    durationWidth: number;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TasklaneConfig = {
  cache: {
    enabled: true,
    dbPath: join(homedir(), ".tasklane", "cache.db"),
    memoryTtlMs: 60 * 60 * 1000, // 1 hour
    memoryMaxEntries: 1_000,
  },
  output: {
    maxCapturedLines: 1_000,
  },
  runner: {
    shell: true,
    outputEnvVar: "TASKLANE_OUTPUT_FILE",
    inputsEnvVar: "TASKLANE_INPUTS",
  },
  ui: {
    statusWidth: 17,
    nameWidth: 40,
    durationWidth: 10,
  },
};

let current: TasklaneConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides?: Partial<T>): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/** Override config values. Merges each section with the defaults. */
export function configure(overrides: DeepPartial<TasklaneConfig>): void {
  current = {
    cache: mergeSection(DEFAULTS.cache, overrides.cache),
    output: mergeSection(DEFAULTS.output, overrides.output),
    runner: mergeSection(DEFAULTS.runner, overrides.runner),
    ui: mergeSection(DEFAULTS.ui, overrides.ui),
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TasklaneConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TasklaneConfig> = Object.freeze(structuredClone(DEFAULTS));
