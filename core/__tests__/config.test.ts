import { describe, it, expect } from "vitest"
import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_UPLOAD_LIMIT_BYTES,
  loadEngineConfig,
  loadUploadLimitBytes,
} from "../config"

describe("loadEngineConfig", () => {
  it("uses the defaults when nothing is set", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG)
  })

  it("treats blank values as unset", () => {
    expect(loadEngineConfig({ DOC_ENGINE_HEADER_MAX_LENGTH: "  " }).headerMaxLength).toBe(100)
  })

  it("reads every threshold from the environment", () => {
    expect(
      loadEngineConfig({
        DOC_ENGINE_HEADER_MAX_LENGTH: "80",
        DOC_ENGINE_HEADER_PREFIXES: "Kapitel, Abschnitt ,,",
        DOC_ENGINE_PARAGRAPH_MIN_LENGTH: "0",
        DOC_ENGINE_MIN_TABLE_ROWS: "3",
        DOC_ENGINE_MIN_TABLE_COLUMNS: " 4 ",
      })
    ).toEqual({
      headerMaxLength: 80,
      headerPrefixes: ["Kapitel", "Abschnitt"],
      paragraphMinLength: 0,
      minTableRows: 3,
      minTableColumns: 4,
    })
  })

  it("rejects values that are not integers", () => {
    expect(() => loadEngineConfig({ DOC_ENGINE_HEADER_MAX_LENGTH: "1.5" })).toThrow(
      'loadEngineConfig: DOC_ENGINE_HEADER_MAX_LENGTH must be an integer >= 1 (got "1.5")'
    )
  })

  it("rejects table minimums below two", () => {
    expect(() => loadEngineConfig({ DOC_ENGINE_MIN_TABLE_ROWS: "1" })).toThrow(
      'loadEngineConfig: DOC_ENGINE_MIN_TABLE_ROWS must be an integer >= 2 (got "1")'
    )
  })

  it("rejects an empty prefix list", () => {
    expect(() => loadEngineConfig({ DOC_ENGINE_HEADER_PREFIXES: " , " })).toThrow(
      "loadEngineConfig: DOC_ENGINE_HEADER_PREFIXES must list at least one prefix"
    )
  })
})

describe("loadUploadLimitBytes", () => {
  it("defaults to 25 MiB", () => {
    expect(loadUploadLimitBytes({})).toBe(DEFAULT_UPLOAD_LIMIT_BYTES)
    expect(DEFAULT_UPLOAD_LIMIT_BYTES).toBe(26214400)
  })

  it("reads the limit from the environment", () => {
    expect(loadUploadLimitBytes({ DOC_ENGINE_MAX_UPLOAD_BYTES: "1024" })).toBe(1024)
  })

  it("rejects a limit of zero", () => {
    expect(() => loadUploadLimitBytes({ DOC_ENGINE_MAX_UPLOAD_BYTES: "0" })).toThrow(
      'loadUploadLimitBytes: DOC_ENGINE_MAX_UPLOAD_BYTES must be an integer >= 1 (got "0")'
    )
  })
})
