import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import { tmpdir } from "node:os"

import { afterEach, describe, expect, it } from "vitest"

import {
  buildDefaultKeeperConfig,
  ensureKeeperConfigFile,
  resolveKeeperConfigPath,
} from "../../src/config/keeper-config.js"

const TEMP_PREFIX = path.join(tmpdir(), "keeper-config-")
const cleanupPaths: string[] = []

afterEach(async () => {
  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

describe("resolveKeeperConfigPath", () => {
  it("resolves under ~/.config/keeper", () => {
    expect(resolveKeeperConfigPath("/tmp/test-home")).toBe(
      "/tmp/test-home/.config/keeper/config.json"
    )
  })
})

describe("buildDefaultKeeperConfig", () => {
  it("places keeper home in the home directory", () => {
    expect(buildDefaultKeeperConfig("/tmp/test-home")).toEqual({
      version: 1,
      keeperHome: "/tmp/test-home/.keeper",
      defaultSessionId: "scheduler",
    })
  })
})

describe("ensureKeeperConfigFile", () => {
  it("creates the config file with defaults when missing", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)

    // Act
    const result = await ensureKeeperConfigFile(homeDirectory)
    const saved = await readFile(result.configPath, "utf8")

    // Assert
    expect(result.created).toBe(true)
    expect(result.config).toEqual(buildDefaultKeeperConfig(homeDirectory))
    expect(JSON.parse(saved)).toEqual(buildDefaultKeeperConfig(homeDirectory))
  })

  it("loads existing config without rewriting it", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const configPath = resolveKeeperConfigPath(homeDirectory)
    const custom = {
      version: 1,
      keeperHome: path.join(homeDirectory, "custom-keeper-home"),
      defaultSessionId: "reminders",
    }
    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(configPath, `${JSON.stringify(custom, null, 2)}\n`, "utf8")

    // Act
    const result = await ensureKeeperConfigFile(homeDirectory)

    // Assert
    expect(result.created).toBe(false)
    expect(result.config).toEqual(custom)
  })

  it("throws when existing config is not JSON", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const configPath = resolveKeeperConfigPath(homeDirectory)
    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(configPath, "not-json", "utf8")

    // Act
    const result = ensureKeeperConfigFile(homeDirectory)

    // Assert
    await expect(result).rejects.toThrow(`Invalid JSON in keeper config: ${configPath}`)
  })

  it("names the offending field when the schema does not match", async () => {
    // Arrange
    const homeDirectory = await mkdtemp(TEMP_PREFIX)
    cleanupPaths.push(homeDirectory)
    const configPath = resolveKeeperConfigPath(homeDirectory)
    await mkdir(path.dirname(configPath), { recursive: true })
    await writeFile(
      configPath,
      JSON.stringify({ version: 1, keeperHome: "/tmp/k", defaultSessionId: "" }),
      "utf8"
    )

    // Act
    const result = ensureKeeperConfigFile(homeDirectory)

    // Assert
    await expect(result).rejects.toThrow(
      `Invalid keeper config in ${configPath}: defaultSessionId: defaultSessionId must be a non-empty string`
    )
  })
})
