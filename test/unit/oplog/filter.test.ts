import { describe, it, expect } from 'vitest'
import { ObjectId, Timestamp } from 'bson'
import { buildOplogFilter, matchesTailQuery, subscribe, WRITE_OPERATIONS } from '../../../src/oplog/filter'
import type { ChangeSource } from '../../../src/oplog/source'
import { NotFoundError, StreamBrokenError } from '../../../src/errors'
import type { OplogEntry } from '../../../src/types/oplog'
import { MemoryOplog } from '../../helpers/memory-oplog'

const AFTER = new Timestamp({ t: 1_700_000_000, i: 5 })

function entryAt(t: number, i: number, fields: Partial<OplogEntry> = {}): OplogEntry {
  return { ts: new Timestamp({ t, i }), v: 2, op: 'i', ns: 'metrics.raw', o: {}, ...fields }
}

async function take<T>(iterator: AsyncIterator<T>, count: number): Promise<T[]> {
  const items: T[] = []
  while (items.length < count) {
    const result = await iterator.next()
    if (result.done) break
    items.push(result.value)
  }
  return items
}

describe('buildOplogFilter', () => {
  it('requests entries strictly after the position, in one namespace, for the given ops', () => {
    const filter = buildOplogFilter({ after: AFTER, namespace: 'metrics.raw', operations: WRITE_OPERATIONS })
    expect(filter).toEqual({ ts: { $gt: AFTER }, ns: 'metrics.raw', op: { $in: ['i', 'u'] } })
  })

  it('uses $gte for inclusive queries and omits absent criteria', () => {
    expect(buildOplogFilter({ after: AFTER, inclusive: true })).toEqual({ ts: { $gte: AFTER } })
  })
})

describe('matchesTailQuery', () => {
  const query = { after: AFTER, namespace: 'metrics.raw', operations: WRITE_OPERATIONS }

  it('excludes the resume position itself', () => {
    expect(matchesTailQuery(entryAt(1_700_000_000, 5), query)).toBe(false)
    expect(matchesTailQuery(entryAt(1_700_000_000, 5), { ...query, inclusive: true })).toBe(true)
  })

  it('orders by seconds before increment', () => {
    expect(matchesTailQuery(entryAt(1_700_000_000, 6), query)).toBe(true)
    expect(matchesTailQuery(entryAt(1_700_000_001, 1), query)).toBe(true)
    expect(matchesTailQuery(entryAt(1_699_999_999, 99), query)).toBe(false)
  })

  it('filters on namespace and operation', () => {
    expect(matchesTailQuery(entryAt(1_700_000_001, 1, { ns: 'metrics.summary' }), query)).toBe(false)
    expect(matchesTailQuery(entryAt(1_700_000_001, 1, { op: 'd' }), query)).toBe(false)
    expect(matchesTailQuery(entryAt(1_700_000_001, 1, { op: 'u' }), query)).toBe(true)
  })
})

describe('subscribe', () => {
  it('delivers matching entries after the position in log order', async () => {
    const oplog = new MemoryOplog()
    const resumeAt = oplog.insert({ _id: new ObjectId(), n: 0 })
    const first = oplog.insert({ _id: new ObjectId(), n: 1 })
    oplog.insert({ _id: new ObjectId() }, 'metrics.summary')
    oplog.operation('d', 'metrics.raw')
    const second = oplog.update(new ObjectId(), { $set: { n: 2 } })

    const controller = new AbortController()
    const entries = subscribe(oplog, {
      after: resumeAt.ts,
      namespace: 'metrics.raw',
      operations: WRITE_OPERATIONS,
      signal: controller.signal,
    })

    await expect(take(entries, 2)).resolves.toEqual([first, second])
    controller.abort()
  })

  it('waits for entries appended after subscribing', async () => {
    const oplog = new MemoryOplog()
    const resumeAt = oplog.insert({ _id: new ObjectId() })
    const controller = new AbortController()
    const entries = subscribe(oplog, { after: resumeAt.ts, signal: controller.signal })

    const pending = entries.next()
    const appended = oplog.insert({ _id: new ObjectId() })

    await expect(pending).resolves.toEqual({ value: appended, done: false })
    controller.abort()
  })

  it('ends quietly once aborted', async () => {
    const oplog = new MemoryOplog()
    const resumeAt = oplog.insert({ _id: new ObjectId() })
    const controller = new AbortController()
    const entries = subscribe(oplog, { after: resumeAt.ts, signal: controller.signal })

    const pending = entries.next()
    controller.abort()

    await expect(pending).resolves.toEqual({ value: undefined, done: true })
  })

  it('reports StreamBroken when the source fails', async () => {
    const oplog = new MemoryOplog()
    const resumeAt = oplog.insert({ _id: new ObjectId() })
    const entries = subscribe(oplog, { after: resumeAt.ts })

    const pending = entries.next()
    const failure = new Error('cursor killed')
    oplog.breakStream(failure)

    const error = await pending.catch((e: unknown) => e)
    expect(error).toBeInstanceOf(StreamBrokenError)
    expect((error as Error).message).toBe('STREAM_BROKEN: oplog tail failed: cursor killed')
    expect((error as Error).cause).toBe(failure)
  })

  it('passes pipeline errors raised by the source through', async () => {
    const failure = new NotFoundError('65a1b2c3d4e5f60718293a4b')
    const source: ChangeSource = {
      latest: async () => null,
      tail: async function* () {
        throw failure
      },
    }

    await expect(subscribe(source, { after: AFTER }).next()).rejects.toBe(failure)
  })

  it('reports StreamBroken when the source ends on its own', async () => {
    const only = entryAt(1_700_000_001, 1)
    const source: ChangeSource = {
      latest: async () => only,
      tail: async function* () {
        yield only
      },
    }
    const entries = subscribe(source, { after: AFTER })

    await expect(entries.next()).resolves.toEqual({ value: only, done: false })
    await expect(entries.next()).rejects.toBeInstanceOf(StreamBrokenError)
  })
})
