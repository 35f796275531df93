export interface EngineConfig {
  /** Headers must be strictly shorter than this (in characters). */
  headerMaxLength: number
  headerPrefixes: readonly string[]
  /** Paragraphs must be strictly longer than this. */
  paragraphMinLength: number
  minTableRows: number
  minTableColumns: number
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  headerMaxLength: 100,
  headerPrefixes: Object.freeze(["Chapter", "Section", "Part"]),
  paragraphMinLength: 50,
  minTableRows: 2,
  minTableColumns: 2,
})

export const DEFAULT_UPLOAD_LIMIT_BYTES = 25 * 1024 * 1024

type Env = Record<string, string | undefined>

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  caller = "loadEngineConfig"
): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === "") {
    return fallback
  }
  const value = Number(raw.trim())
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${caller}: ${name} must be an integer >= ${min} (got "${raw}")`)
  }
  return value
}

function readList(env: Env, name: string, fallback: readonly string[]): readonly string[] {
  const raw = env[name]
  if (raw === undefined) {
    return fallback
  }
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  if (items.length === 0) {
    throw new Error(`loadEngineConfig: ${name} must list at least one prefix`)
  }
  return items
}

/**
 * Reads engine thresholds from environment variables, falling back to
 * DEFAULT_ENGINE_CONFIG for anything unset.
 *
 * Table minimums below 2 are rejected: a single row or a single column is
 * never a table.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    headerMaxLength: readInteger(
      env,
      "DOC_ENGINE_HEADER_MAX_LENGTH",
      DEFAULT_ENGINE_CONFIG.headerMaxLength,
      1
    ),
    headerPrefixes: readList(env, "DOC_ENGINE_HEADER_PREFIXES", DEFAULT_ENGINE_CONFIG.headerPrefixes),
    paragraphMinLength: readInteger(
      env,
      "DOC_ENGINE_PARAGRAPH_MIN_LENGTH",
      DEFAULT_ENGINE_CONFIG.paragraphMinLength,
      0
    ),
    minTableRows: readInteger(env, "DOC_ENGINE_MIN_TABLE_ROWS", DEFAULT_ENGINE_CONFIG.minTableRows, 2),
    minTableColumns: readInteger(
      env,
      "DOC_ENGINE_MIN_TABLE_COLUMNS",
      DEFAULT_ENGINE_CONFIG.minTableColumns,
      2
    ),
  }
}

export function loadUploadLimitBytes(env: Env = process.env): number {
  return readInteger(
    env,
    "DOC_ENGINE_MAX_UPLOAD_BYTES",
    DEFAULT_UPLOAD_LIMIT_BYTES,
    1,
    "loadUploadLimitBytes"
  )
}
