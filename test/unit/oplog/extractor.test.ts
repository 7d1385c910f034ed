import { describe, it, expect } from 'vitest'
import { ObjectId, Timestamp } from 'bson'
import { extractEntityId } from '../../../src/oplog/extractor'
import type { OplogEntry } from '../../../src/types/oplog'

const ID_HEX = '65a1b2c3d4e5f60718293a4b'

function entry(fields: Pick<OplogEntry, 'op' | 'o'> & Partial<OplogEntry>): OplogEntry {
  return {
    ts: new Timestamp({ t: 1_700_000_000, i: 1 }),
    v: 2,
    ns: 'metrics.raw',
    ...fields,
  }
}

describe('extractEntityId', () => {
  describe('inserts', () => {
    it('takes the id from the inserted document', () => {
      const result = extractEntityId(entry({ op: 'i', o: { _id: new ObjectId(ID_HEX), value: 5 } }))
      expect(result).toEqual({ ok: true, id: ID_HEX })
    })

    it('drops inserts without an _id', () => {
      expect(extractEntityId(entry({ op: 'i', o: { value: 5 } }))).toEqual({ ok: false, reason: 'missing-id' })
    })

    it('drops inserts whose _id is not an ObjectId', () => {
      expect(extractEntityId(entry({ op: 'i', o: { _id: 'abc', value: 5 } }))).toEqual({
        ok: false,
        reason: 'unsupported-id-type',
      })
      expect(extractEntityId(entry({ op: 'i', o: { _id: 42 } }))).toEqual({
        ok: false,
        reason: 'unsupported-id-type',
      })
    })
  })

  describe('updates', () => {
    it('takes the id from the selector, not the payload', () => {
      const result = extractEntityId(
        entry({ op: 'u', o: { $set: { value: 7 } }, o2: { _id: new ObjectId(ID_HEX) } })
      )
      expect(result).toEqual({ ok: true, id: ID_HEX })
    })

    it('ignores an _id that only appears in the payload', () => {
      const result = extractEntityId(entry({ op: 'u', o: { _id: new ObjectId(ID_HEX), value: 7 } }))
      expect(result).toEqual({ ok: false, reason: 'missing-id' })
    })

    it('drops updates whose selector id is not an ObjectId', () => {
      const result = extractEntityId(entry({ op: 'u', o: { $set: { value: 7 } }, o2: { _id: 'abc' } }))
      expect(result).toEqual({ ok: false, reason: 'unsupported-id-type' })
    })
  })

  it('drops any other operation', () => {
    expect(extractEntityId(entry({ op: 'd', o: { _id: new ObjectId(ID_HEX) } }))).toEqual({
      ok: false,
      reason: 'unsupported-operation',
    })
    expect(extractEntityId(entry({ op: 'n', o: { msg: 'periodic noop' } }))).toEqual({
      ok: false,
      reason: 'unsupported-operation',
    })
  })
})
