import { describe, expect, test } from "vitest"
import { checkEvent, computeId, finalizeEvent, getPublicKey, serializeEvent, verify } from "./EventCodec.js"
import { TEST_PUBKEY, TEST_SECRET_KEY, secretKeyFrom, signed, tampered, zeroSignature } from "../testing/fixtures.js"

describe("EventCodec", () => {
  describe("serializeEvent", () => {
    test("produces compact JSON in field order", () => {
      const serialized = serializeEvent({
        pubkey: "ab",
        created_at: 1,
        kind: 1,
        tags: [["t", "x"]],
        content: "hi\n\"there\"",
      })
      expect(serialized).toBe('[0,"ab",1,1,[["t","x"]],"hi\\n\\"there\\""]')
    })
  })

  describe("computeId", () => {
    test("is deterministic", () => {
      const fields = { pubkey: TEST_PUBKEY, created_at: 1700000000, kind: 1, tags: [["t", "nostr"]], content: "hello" }
      const copy = { ...fields, tags: [["t", "nostr"]] }
      expect(computeId(fields)).toBe(computeId(copy))
      expect(computeId(fields)).toMatch(/^[a-f0-9]{64}$/)
    })

    test("changes when any hashed field changes", () => {
      const base = { pubkey: TEST_PUBKEY, created_at: 1700000000, kind: 1, tags: [], content: "hello" }
      const id = computeId(base)
      expect(computeId({ ...base, content: "hello!" })).not.toBe(id)
      expect(computeId({ ...base, created_at: 1700000001 })).not.toBe(id)
      expect(computeId({ ...base, kind: 2 })).not.toBe(id)
      expect(computeId({ ...base, tags: [["t", "x"]] })).not.toBe(id)
    })
  })

  describe("verify", () => {
    test("accepts a freshly signed event", () => {
      const event = finalizeEvent({ kind: 1, created_at: 1700000000, tags: [], content: "hi" }, TEST_SECRET_KEY)
      expect(event.pubkey).toBe(TEST_PUBKEY)
      expect(verify(event)).toBe(true)
      expect(checkEvent(event)).toBeNull()
    })

    test("rejects tampered content, tags and created_at", () => {
      const event = signed({ content: "original", tags: [["t", "a"]] })
      expect(verify(tampered(event))).toBe(false)
      expect(verify({ ...event, tags: [["t", "b"]] })).toBe(false)
      expect(verify({ ...event, created_at: event.created_at + 1 })).toBe(false)
      expect(checkEvent(tampered(event))).toBe("id-mismatch")
    })

    test("rejects a zero signature", () => {
      const event = signed({ content: "zero" })
      expect(verify(zeroSignature(event))).toBe(false)
      expect(checkEvent(zeroSignature(event))).toBe("bad-signature")
    })

    test("rejects a signature from another key", () => {
      const event = signed({ content: "whose?" })
      const otherPubkey = getPublicKey(secretKeyFrom("other-secret"))
      const fields = { ...event, pubkey: otherPubkey }
      const forged = { ...fields, id: computeId(fields) }
      expect(checkEvent(forged)).toBe("bad-signature")
    })

    test("returns false on malformed hex instead of throwing", () => {
      const event = signed()
      expect(verify({ ...event, sig: "zz" })).toBe(false)
      expect(verify({ ...event, sig: "ab" })).toBe(false)
    })
  })
})
