import { afterEach, describe, expect, it, vi } from 'vitest'
import { NotFoundError, ReadError, SchemaError } from './errors'
import { httpSource, loadRecords, type DataSource } from './loader'
import { topicSchema, typeSchema } from './records'
import { memorySource } from '../test/fixtures'

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('loadRecords', () => {
  it('reads and parses the schema file', async () => {
    const source = memorySource({ 'type.txt': 'name\tcount\nJournal\t50\nConference\t30\n' })
    await expect(loadRecords(source, typeSchema)).resolves.toEqual([
      { name: 'Journal', count: 50 },
      { name: 'Conference', count: 30 },
    ])
  })

  it('fails with NotFoundError when the file is missing', async () => {
    await expect(loadRecords(memorySource({}), topicSchema)).rejects.toBeInstanceOf(NotFoundError)
  })

  it('passes parse errors through unchanged', async () => {
    const source = memorySource({ 'topic.txt': 'topic\tcount\nAI\t1\n' })
    await expect(loadRecords(source, topicSchema)).rejects.toBeInstanceOf(SchemaError)
  })

  it('wraps unexpected read failures as ReadError', async () => {
    const cause = new Error('disk unplugged')
    const source: DataSource = {
      describe: file => file,
      readText: async () => Promise.reject(cause),
    }

    const err = await loadRecords(source, topicSchema).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ReadError)
    expect(err instanceof ReadError && err.message).toBe('topic.txt: disk unplugged')
    expect(err instanceof ReadError && err.cause).toBe(cause)
  })
})

describe('httpSource', () => {
  it('resolves files against the base URL', async () => {
    const fetchMock = vi.fn(
      async (_url: string) => new Response('name\tcount\nAI\t3\n', { headers: { 'content-type': 'text/plain' } })
    )
    vi.stubGlobal('fetch', fetchMock)

    const source = httpSource('/analytics')
    expect(source.describe('topic.txt')).toBe('/analytics/topic.txt')
    await expect(loadRecords(source, topicSchema)).resolves.toEqual([{ name: 'AI', count: 3 }])
    expect(fetchMock.mock.calls[0][0]).toBe('/analytics/topic.txt')
  })

  it('names the file, not the URL, in errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404 })))

    const err = await loadRecords(httpSource('/'), typeSchema).catch((e: unknown) => e)
    expect(err instanceof NotFoundError && err.message).toBe('type.txt: file not found')
  })
})
