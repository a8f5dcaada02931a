import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { extractPagePrompts, loadPagePrompts } from '@/workflow/prompts'

describe('loadPagePrompts', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'comfy-prompts-'))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('should collect page images from every document in name order', async () => {
    fs.writeFileSync(path.join(dir, 'b.json'), JSON.stringify({ pages: [{ image: 'a turtle learning to fly' }] }))
    fs.writeFileSync(
      path.join(dir, 'a.json'),
      JSON.stringify({ pages: [{ image: 'a small star' }, { text: 'no image here' }, { image: 'friends gather' }] })
    )
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored')

    await expect(loadPagePrompts(dir)).resolves.toEqual(['a small star', 'friends gather', 'a turtle learning to fly'])
  })

  it('should skip documents without pages and unreadable files', async () => {
    fs.writeFileSync(path.join(dir, 'a.json'), JSON.stringify({ title: 'no pages' }))
    fs.writeFileSync(path.join(dir, 'b.json'), 'not json')
    fs.writeFileSync(path.join(dir, 'c.json'), JSON.stringify({ pages: [{ image: 'kept' }] }))

    await expect(loadPagePrompts(dir)).resolves.toEqual(['kept'])
    expect(console.warn).toHaveBeenCalledWith('[Prompts]', "File a.json has no valid 'pages' list")
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('should warn and return nothing for a missing folder', async () => {
    const missing = path.join(dir, 'stories')

    await expect(loadPagePrompts(missing)).resolves.toEqual([])
    expect(console.warn).toHaveBeenCalledWith('[Prompts]', `Folder '${missing}' does not exist`)
  })
})

describe('extractPagePrompts', () => {
  it('should return null when pages is not a list', () => {
    expect(extractPagePrompts({ pages: 'one' })).toBeNull()
    expect(extractPagePrompts(['one'])).toBeNull()
  })
})
