import { randomUUID } from "node:crypto"
import { constants } from "node:fs"
import { access } from "node:fs/promises"
import path from "node:path"

import { z } from "zod"

import { InvalidInputError } from "../persistence/errors.js"
import type {
  ArtifactRecord,
  createArtifactsRepository,
  JsonObject,
} from "../persistence/repositories.js"

const registerInputSchema = z.object({
  type: z.string().min(1, "type must be a non-empty string"),
  path: z.string().min(1, "path must be a non-empty string"),
  metadata: z.record(z.string(), z.unknown()).nullable(),
})

type ArtifactsRepository = Pick<
  ReturnType<typeof createArtifactsRepository>,
  "insert" | "getById" | "list"
>

type ArtifactRegistryDependencies = {
  repository: ArtifactsRepository
  now?: () => number
  createId?: () => string
}

export type ListArtifactsOptions = {
  type?: string
}

/**
 * Creates the artifact registry, a catalog of generated files with no lifecycle coupling to the
 * sessions or tasks that produced them.
 *
 * @param dependencies Artifact repository plus clock and id overrides.
 * @returns Artifact registry operations.
 */
export const createArtifactRegistry = (dependencies: ArtifactRegistryDependencies) => {
  const now = dependencies.now ?? Date.now
  const createId = dependencies.createId ?? randomUUID

  return {
    /**
     * Catalogs a file. The path is stored absolute and must be readable at registration time.
     */
    register: async (
      type: string,
      artifactPath: string,
      metadata: JsonObject | null = null
    ): Promise<ArtifactRecord> => {
      const validated = registerInputSchema.safeParse({ type, path: artifactPath, metadata })
      if (!validated.success) {
        const detail = validated.error.issues.map((issue) => issue.message).join("; ")
        throw new InvalidInputError(`Invalid artifact: ${detail}`)
      }

      const resolvedPath = path.resolve(artifactPath)

      await access(resolvedPath, constants.R_OK).catch(() => {
        throw new InvalidInputError(`Artifact path is not readable: ${resolvedPath}`)
      })

      const record: ArtifactRecord = {
        id: createId(),
        type,
        path: resolvedPath,
        metadata,
        ts: now(),
      }

      dependencies.repository.insert(record)
      return record
    },
    get: (id: string): ArtifactRecord | null => {
      return dependencies.repository.getById(id)
    },
    list: (options: ListArtifactsOptions = {}): ArtifactRecord[] => {
      return dependencies.repository.list(options.type)
    },
  }
}

export type ArtifactRegistry = ReturnType<typeof createArtifactRegistry>
