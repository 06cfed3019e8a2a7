/**
 * RecordStore
 *
 * Persistence port for projected records with a SQLite implementation.
 * The primary key on the event id is the final word on duplicates: inserts
 * are INSERT OR IGNORE, so two projectors racing on one id leave one row.
 */
import { Context, Effect, Either, Exit, FiberRef, Layer, Option } from "effect"
import { ParseResult, Schema, TreeFormatter } from "@effect/schema"
import Database from "better-sqlite3"
import { StorageError } from "../core/Errors.js"
import { DomainRecord, encodeStoredRecord } from "./Records.js"

// =============================================================================
// Service Interface
// =============================================================================

export interface RecordStore {
  readonly _tag: "RecordStore"

  /**
   * Look up a record by event id
   */
  findById(id: string): Effect.Effect<Option.Option<DomainRecord>, StorageError>

  /**
   * Insert unless a record with the same id exists. Returns true if inserted.
   */
  insertOrIgnore(record: DomainRecord): Effect.Effect<boolean, StorageError>

  /**
   * Run an effect inside one transaction: committed when it succeeds,
   * rolled back when it fails. Nested calls join the outer transaction.
   */
  batch<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E | StorageError, R>

  /**
   * Get record count
   */
  count(): Effect.Effect<number, StorageError>

  /**
   * Record counts per kind, optionally restricted to some kinds
   */
  countByKind(kinds?: ReadonlyArray<number>): Effect.Effect<ReadonlyMap<number, number>, StorageError>
}

// =============================================================================
// Service Tag
// =============================================================================

export const RecordStore = Context.GenericTag<RecordStore>("RecordStore")

// =============================================================================
// SQLite Implementation
// =============================================================================

const initSchema = (db: Database.Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS records (
      id TEXT PRIMARY KEY,
      record_type TEXT NOT NULL,
      kind INTEGER NOT NULL,
      pubkey TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      source_relay TEXT NOT NULL,
      projected_at INTEGER NOT NULL,
      record TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_records_kind ON records(kind);
    CREATE INDEX IF NOT EXISTS idx_records_pubkey_kind ON records(pubkey, kind);
    CREATE INDEX IF NOT EXISTS idx_records_created_at ON records(created_at);
  `)
  db.pragma("journal_mode = WAL")
}

const RecordRow = Schema.Struct({ record: Schema.parseJson(DomainRecord) })
const CountRow = Schema.Struct({ n: Schema.Number })
const KindCountRows = Schema.Array(Schema.Struct({ kind: Schema.Number, n: Schema.Number }))

const decodeRecordRow = Schema.decodeUnknownEither(RecordRow)
const decodeCountRow = Schema.decodeUnknownEither(CountRow)
const decodeKindCountRows = Schema.decodeUnknownEither(KindCountRows)

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error))

const queryError = (error: ParseResult.ParseError) =>
  new StorageError({
    message: `Unreadable row: ${TreeFormatter.formatErrorSync(error)}`,
    operation: "query",
  })

const makeSqliteStore = (db: Database.Database): RecordStore => {
  const insertStmt = db.prepare(`
    INSERT OR IGNORE INTO records (id, record_type, kind, pubkey, created_at, source_relay, projected_at, record)
    VALUES (@id, @recordType, @kind, @pubkey, @createdAt, @sourceRelay, @projectedAt, @record)
  `)
  const findStmt = db.prepare("SELECT record FROM records WHERE id = ?")
  const countStmt = db.prepare("SELECT COUNT(*) AS n FROM records")

  // one connection: a transaction belongs to the fiber that opened it
  // (and the fibers it forks); everyone else waits for the lock
  const lock = Effect.unsafeMakeSemaphore(1)
  const inTransaction = FiberRef.unsafeMake(false)

  const guarded = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.flatMap(FiberRef.get(inTransaction), (inside) => (inside ? effect : lock.withPermits(1)(effect)))

  const exec = (sql: string) =>
    Effect.try({
      try: () => db.exec(sql),
      catch: (error) =>
        new StorageError({ message: `${sql} failed: ${errorMessage(error)}`, operation: "batch" }),
    })

  return {
    _tag: "RecordStore",

    findById: (id) =>
      guarded(Effect.gen(function* () {
        const row = yield* Effect.try({
          try: (): unknown => findStmt.get(id),
          catch: (error) =>
            new StorageError({ message: `Failed to read record: ${errorMessage(error)}`, operation: "query" }),
        })
        if (row === undefined) return Option.none()
        const decoded = decodeRecordRow(row)
        if (Either.isLeft(decoded)) return yield* Effect.fail(queryError(decoded.left))
        return Option.some(decoded.right.record)
      })),

    insertOrIgnore: (record) =>
      guarded(Effect.try({
        try: () =>
          insertStmt.run({
            id: record.id,
            recordType: record._tag,
            kind: record.kind,
            pubkey: record.pubkey,
            createdAt: record.createdAt,
            sourceRelay: record.sourceRelay,
            projectedAt: record.projectedAt,
            record: encodeStoredRecord(record),
          }).changes === 1,
        catch: (error) =>
          new StorageError({ message: `Failed to store record: ${errorMessage(error)}`, operation: "insert" }),
      })),

    batch: (effect) =>
      Effect.flatMap(FiberRef.get(inTransaction), (inside) =>
        inside
          ? effect
          : lock.withPermits(1)(
              Effect.uninterruptibleMask((restore) =>
                Effect.gen(function* () {
                  yield* exec("BEGIN")
                  const exit = yield* Effect.exit(restore(Effect.locally(effect, inTransaction, true)))
                  if (Exit.isSuccess(exit)) {
                    yield* exec("COMMIT")
                  } else {
                    yield* exec("ROLLBACK").pipe(
                      Effect.catchAll((error) => Effect.logError(`Rollback failed: ${error.message}`))
                    )
                  }
                  return yield* exit
                })
              )
            )
      ),

    count: () =>
      guarded(Effect.gen(function* () {
        const row = yield* Effect.try({
          try: (): unknown => countStmt.get(),
          catch: (error) =>
            new StorageError({ message: `Failed to count records: ${errorMessage(error)}`, operation: "query" }),
        })
        const decoded = decodeCountRow(row)
        if (Either.isLeft(decoded)) return yield* Effect.fail(queryError(decoded.left))
        return decoded.right.n
      })),

    countByKind: (kinds) =>
      guarded(Effect.gen(function* () {
        const filter = kinds && kinds.length > 0 ? `WHERE kind IN (${kinds.map(() => "?").join(", ")})` : ""
        const rows = yield* Effect.try({
          try: (): unknown =>
            db.prepare(`SELECT kind, COUNT(*) AS n FROM records ${filter} GROUP BY kind ORDER BY kind`).all(...(kinds ?? [])),
          catch: (error) =>
            new StorageError({ message: `Failed to count records: ${errorMessage(error)}`, operation: "query" }),
        })
        const decoded = decodeKindCountRows(rows)
        if (Either.isLeft(decoded)) return yield* Effect.fail(queryError(decoded.left))
        return new Map(decoded.right.map((row) => [row.kind, row.n] as const))
      })),
  }
}

// =============================================================================
// Layers
// =============================================================================

const openDatabase = (path: string) =>
  Effect.acquireRelease(
    Effect.try({
      try: () => {
        const db = new Database(path)
        initSchema(db)
        return db
      },
      catch: (error) =>
        new StorageError({ message: `Failed to open ${path}: ${errorMessage(error)}`, operation: "init" }),
    }),
    (db) => Effect.sync(() => db.close())
  )

/**
 * SQLite store at the given path; the database is closed with the layer
 */
export const SqliteRecordStoreLive = (path: string): Layer.Layer<RecordStore, StorageError> =>
  Layer.scoped(
    RecordStore,
    Effect.gen(function* () {
      const db = yield* openDatabase(path)
      yield* Effect.logDebug("Record store opened").pipe(Effect.annotateLogs({ path }))
      return makeSqliteStore(db)
    })
  )

/**
 * In-memory store for tests
 */
export const MemoryRecordStoreLive: Layer.Layer<RecordStore, StorageError> = SqliteRecordStoreLive(":memory:")
