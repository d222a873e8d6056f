import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { main } from '../src/cli'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BASE_URL = 'http://127.0.0.1:9999/v1'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'llm-digest-cli-'))
})

afterEach(() => {
  vi.unstubAllGlobals()
  process.exitCode = undefined
  rmSync(root, { recursive: true, force: true })
})

async function withCapturedLogs(run: () => Promise<void>): Promise<string[]> {
  const logs: string[] = []
  const original = console.log
  console.log = (...args: unknown[]) => {
    logs.push(args.map((arg) => String(arg)).join(' '))
  }
  try {
    await run()
  } finally {
    console.log = original
  }
  return logs
}

async function runJson(args: string[]): Promise<unknown> {
  const logs = await withCapturedLogs(async () => {
    await main(['node', 'llm-digest', '--json', ...args])
  })
  expect(logs).toHaveLength(1)
  return JSON.parse(logs[0])
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  })
}

/** Local model server stand-in: /models plus a fixed chat completion. */
function stubModelServer(
  reply: string,
  bodies: Record<string, unknown>[] = [],
): string[] {
  const urls: string[] = []
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = typeof input === 'string' ? input : input.toString()
      urls.push(url)
      if (typeof init?.body === 'string') {
        bodies.push(JSON.parse(init.body))
      }
      if (url.endsWith('/models')) {
        return jsonResponse({ data: [{ id: 'test-model' }] })
      }
      return jsonResponse({
        choices: [{ message: { content: reply }, finish_reason: 'stop' }],
      })
    }),
  )
  return urls
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

describe('check CLI', () => {
  test('reports served models as JSON', async () => {
    const urls = stubModelServer('unused')

    const payload = await runJson([
      'check',
      '--base-url',
      BASE_URL,
      '-m',
      'test-model',
    ])

    expect(payload).toMatchObject({
      ok: true,
      data: { baseUrl: BASE_URL, model: 'test-model', models: ['test-model'] },
    })
    expect(urls).toEqual([`${BASE_URL}/models`])
    expect(process.exitCode).toBeUndefined()
  })

  test('fails with a coded error when the server is down', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      }),
    )

    const payload = await runJson(['check', '--base-url', BASE_URL])

    expect(payload).toMatchObject({
      ok: false,
      error: {
        code: 'SERVICE_UNAVAILABLE',
        message: `Language model API is not available at ${BASE_URL} (fetch failed).`,
      },
    })
    expect(process.exitCode).toBe(1)
  })
})

// ---------------------------------------------------------------------------
// summarize
// ---------------------------------------------------------------------------

describe('summarize CLI', () => {
  test('writes the summary and reports each file', async () => {
    stubModelServer('# Notes\n\nShort summary.')
    const input = join(root, 'notes.md')
    writeFileSync(input, 'Meeting notes.\n')

    const payload = await runJson([
      'summarize',
      input,
      '--base-url',
      BASE_URL,
      '--no-tags',
    ])

    const outputPath = join(root, 'notes.summary.md')
    expect(payload).toMatchObject({
      ok: true,
      data: {
        interrupted: false,
        entries: [{ ok: true, inputPath: input, outputPath, tags: null }],
      },
    })
    expect(readFileSync(outputPath, 'utf-8')).toBe('# Notes\n\nShort summary.')
    expect(process.exitCode).toBeUndefined()
  })

  test('keeps going after a failed file and exits 1', async () => {
    stubModelServer('Summary')
    const missing = join(root, 'missing.md')
    const present = join(root, 'present.txt')
    writeFileSync(present, 'Some text.\n')

    const payload = await runJson([
      'summarize',
      missing,
      present,
      '--base-url',
      BASE_URL,
      '--no-tags',
    ])

    expect(payload).toMatchObject({
      ok: true,
      data: {
        entries: [
          {
            ok: false,
            inputPath: missing,
            error: {
              code: 'INVALID_INPUT',
              message: `Input file not found: ${missing}`,
            },
          },
          { ok: true, inputPath: present },
        ],
      },
    })
    expect(process.exitCode).toBe(1)
  })

  test('rejects a malformed --max-depth', async () => {
    const payload = await runJson([
      'summarize',
      join(root, 'notes.md'),
      '--max-depth',
      'deep',
    ])

    expect(payload).toMatchObject({
      ok: false,
      error: {
        code: 'UNKNOWN_ERROR',
        message: 'Max depth must be a non-negative integer.',
      },
    })
    expect(process.exitCode).toBe(1)
  })

  test('accepts --max-depth 0 like the config file does', async () => {
    stubModelServer('unused')
    const input = join(root, 'notes.md')
    writeFileSync(input, 'aaaaaaaaa\nbbbbbbbbb\n')

    const payload = await runJson([
      'summarize',
      input,
      '--base-url',
      BASE_URL,
      '--max-depth',
      '0',
      '--max-chars',
      '10',
    ])

    expect(payload).toMatchObject({
      ok: true,
      data: {
        entries: [
          {
            ok: false,
            error: {
              code: 'MAX_DEPTH_EXCEEDED',
              message:
                'Maximum recursion depth (0) reached. A segment of 20 chars is still longer than 10 after 0 levels of splitting.',
            },
          },
        ],
      },
    })
    expect(process.exitCode).toBe(1)
  })

  test('sends --max-tokens with every model call', async () => {
    const bodies: Record<string, unknown>[] = []
    stubModelServer('Summary', bodies)
    const input = join(root, 'notes.md')
    writeFileSync(input, 'Meeting notes.\n')

    await runJson([
      'summarize',
      input,
      '--base-url',
      BASE_URL,
      '--max-tokens',
      '800',
      '--no-tags',
    ])

    expect(bodies).toHaveLength(1)
    expect(bodies[0].max_tokens).toBe(800)
  })
})
