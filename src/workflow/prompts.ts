import fs from 'fs/promises'
import path from 'path'
import { createLogger } from '@/lib/logger'
import { errorMessage, isRecord } from '@/lib/utils'

const log = createLogger('Prompts')

/** Pulls page texts out of a `{ pages: [{ image: "..." }] }` document; null if it has no pages list. */
export function extractPagePrompts(doc: unknown): string[] | null {
  if (!isRecord(doc) || !Array.isArray(doc.pages)) return null
  const prompts: string[] = []
  for (const page of doc.pages) {
    if (isRecord(page) && typeof page.image === 'string') {
      prompts.push(page.image)
    }
  }
  return prompts
}

/**
 * Collect the `image` text of every page in every `*.json` document under
 * `dir`, files taken in name order. Bad files are logged and skipped.
 */
export async function loadPagePrompts(dir: string): Promise<string[]> {
  let entries: string[]
  try {
    const stat = await fs.stat(dir)
    if (!stat.isDirectory()) {
      log.warn(`'${dir}' is not a directory`)
      return []
    }
    entries = await fs.readdir(dir)
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      log.warn(`Folder '${dir}' does not exist`)
      return []
    }
    throw error
  }

  const prompts: string[] = []
  for (const filename of entries.filter((name) => name.endsWith('.json')).sort()) {
    const filePath = path.join(dir, filename)
    try {
      const doc: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'))
      const pagePrompts = extractPagePrompts(doc)
      if (pagePrompts === null) {
        log.warn(`File ${filename} has no valid 'pages' list`)
        continue
      }
      prompts.push(...pagePrompts)
    } catch (error) {
      log.error(`Failed to load ${filename}:`, errorMessage(error))
    }
  }
  return prompts
}
