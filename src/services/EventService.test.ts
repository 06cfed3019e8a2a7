import { describe, expect, test } from "vitest"
import { Effect, Either } from "effect"
import { EventService, EventServiceLive, rawEventId } from "./EventService.js"
import { signed, tampered, zeroSignature } from "../testing/fixtures.js"

const runWithServices = <A, E>(effect: Effect.Effect<A, E, EventService>): Promise<A> =>
  Effect.runPromise(Effect.provide(effect, EventServiceLive))

const validate = (raw: unknown) =>
  runWithServices(
    Effect.gen(function* () {
      const events = yield* EventService
      return yield* Effect.either(events.validate(raw))
    })
  )

describe("EventService", () => {
  describe("validate", () => {
    test("accepts a signed event", async () => {
      const event = signed({ kind: 30023, tags: [["d", "intro"]], content: "body" })
      const result = await validate(JSON.parse(JSON.stringify(event)))
      expect(Either.getOrThrow(result)).toEqual(event)
    })

    test("rejects a non-object payload as malformed", async () => {
      const result = await validate(["EVENT"])
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("InvalidEventError")
        if (result.left._tag === "InvalidEventError") expect(result.left.reason).toBe("malformed")
      }
    })

    test("names the missing fields", async () => {
      const { id: _id, ...withoutId } = signed()
      const result = await validate(withoutId)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result) && result.left._tag === "InvalidEventError") {
        expect(result.left.reason).toBe("missing-field")
        expect(result.left.message).toBe("Event missing required fields (id)")
      }
    })

    test("rejects a string kind as malformed", async () => {
      const event = signed()
      const result = await validate({ ...event, kind: "1" })
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result) && result.left._tag === "InvalidEventError") {
        expect(result.left.reason).toBe("malformed")
        expect(result.left.eventId).toBe(event.id)
      }
    })

    test("reports an id mismatch for tampered content", async () => {
      const event = signed({ content: "original" })
      const result = await validate(tampered(event))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result) && result.left._tag === "VerificationError") {
        expect(result.left.reason).toBe("id-mismatch")
        expect(result.left.eventId).toBe(event.id)
      }
    })

    test("reports a bad signature for a zero signature", async () => {
      const result = await validate(zeroSignature(signed({ content: "zero" })))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("VerificationError")
        if (result.left._tag === "VerificationError") expect(result.left.reason).toBe("bad-signature")
      }
    })
  })

  test("rawEventId reads only string ids", () => {
    expect(rawEventId({ id: "abc" })).toBe("abc")
    expect(rawEventId({ id: 5 })).toBeUndefined()
    expect(rawEventId("abc")).toBeUndefined()
  })
})
