import { homedir } from "node:os"
import path from "node:path"
import { mkdir, readFile, writeFile } from "node:fs/promises"
import { z } from "zod"

const keeperConfigSchema = z.object({
  version: z.literal(1),
  keeperHome: z.string().min(1, "keeperHome must be a non-empty string"),
  defaultSessionId: z.string().min(1, "defaultSessionId must be a non-empty string"),
})

export type KeeperConfig = z.infer<typeof keeperConfigSchema>

export type ResolvedKeeperConfig = {
  config: KeeperConfig
  configPath: string
  created: boolean
}

const CONFIG_RELATIVE_PATH = path.join(".config", "keeper", "config.json")

/**
 * Anchors keeper config under the standard user config location so it does not depend on the
 * current working directory.
 *
 * @param homeDirectory Home directory override used by tests and custom runtimes.
 * @returns Absolute path to the persistent config file.
 */
export const resolveKeeperConfigPath = (homeDirectory = homedir()): string => {
  return path.join(homeDirectory, CONFIG_RELATIVE_PATH)
}

export const buildDefaultKeeperConfig = (homeDirectory = homedir()): KeeperConfig => {
  return {
    version: 1,
    keeperHome: path.join(homeDirectory, ".keeper"),
    defaultSessionId: "scheduler",
  }
}

const parseKeeperConfig = (source: string, configPath: string): KeeperConfig => {
  let parsed: unknown

  try {
    parsed = JSON.parse(source)
  } catch {
    throw new Error(`Invalid JSON in keeper config: ${configPath}`)
  }

  const validated = keeperConfigSchema.safeParse(parsed)

  if (!validated.success) {
    const detail = validated.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")

    throw new Error(`Invalid keeper config in ${configPath}: ${detail}`)
  }

  return validated.data
}

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/**
 * Loads the persistent config, writing defaults on first start.
 *
 * @param homeDirectory Home directory override used by tests and custom runtimes.
 * @param configPath Optional explicit config path.
 * @returns Loaded or newly created config metadata.
 */
export const ensureKeeperConfigFile = async (
  homeDirectory = homedir(),
  configPath = resolveKeeperConfigPath(homeDirectory)
): Promise<ResolvedKeeperConfig> => {
  try {
    const existing = await readFile(configPath, "utf8")

    return {
      config: parseKeeperConfig(existing, configPath),
      configPath,
      created: false,
    }
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error
    }
  }

  const defaults = buildDefaultKeeperConfig(homeDirectory)

  await mkdir(path.dirname(configPath), { recursive: true })
  await writeFile(configPath, `${JSON.stringify(defaults, null, 2)}\n`, "utf8")

  return {
    config: defaults,
    configPath,
    created: true,
  }
}
