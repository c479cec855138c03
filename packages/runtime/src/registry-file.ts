// @scantoken/runtime — Component allocation file loading

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { createStaticRegistry, isValidComponent } from '@scantoken/core'
import type { ComponentRegistry } from '@scantoken/core'

/**
 * Allocation file schema:
 *
 * ```json
 * { "components": ["sample", "infra"] }
 * ```
 */
export const RegistryDocumentSchema = z
  .object({
    components: z.array(
      z.string().refine(isValidComponent, { message: 'expected 3-6 lowercase ASCII letters' }),
    ),
  })
  .strict()

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>

/**
 * Thrown when an allocation file cannot be read or does not match the schema.
 */
export class RegistryFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RegistryFileError'
  }
}

/**
 * Validates a parsed allocation document and returns its distinct components
 * in first-seen order.
 *
 * @throws {RegistryFileError} Listing every schema issue as `path: message`
 */
export function parseRegistryDocument(input: unknown): readonly string[] {
  const result = RegistryDocumentSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    throw new RegistryFileError(`Invalid registry document: ${issues.join('; ')}`)
  }
  return [...new Set(result.data.components)]
}

/**
 * Reads a JSON allocation file and builds a static registry from it.
 *
 * @throws {RegistryFileError} If the file is unreadable, not JSON, or invalid
 */
export async function loadRegistryFile(path: string): Promise<ComponentRegistry> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    throw new RegistryFileError(`Cannot read registry file ${path}`, { cause: error })
  }

  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch (error) {
    throw new RegistryFileError(`Registry file ${path} is not valid JSON`, { cause: error })
  }

  return createStaticRegistry(parseRegistryDocument(document))
}
