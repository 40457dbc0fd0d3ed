// src/store/labels.ts
import path from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { asc, eq, sql } from "drizzle-orm";

import { CREATE_LABELS_TABLE, labels, type LabelRow } from "./schema.js";
import { ensureDir, errorCode, errorMessage, errorProp, isJsonObject, log, logError, type JsonObject } from "../lib/utils.js";

export type LabelDocument = JsonObject;

export type StoredLabel = {
  id: string;
  document: LabelDocument;
  /** SQLite の CURRENT_TIMESTAMP（UTC, "YYYY-MM-DD HH:MM:SS"） */
  createdAt: string;
};

export type LabelLookup =
  | { status: "found"; label: StoredLabel }
  | { status: "missing" }
  | { status: "corrupt"; error: Error };

export class DuplicateLabelError extends Error {
  constructor(readonly labelId: string, cause?: unknown) {
    super(`Label ${labelId} already exists`);
    this.name = "DuplicateLabelError";
    this.cause = cause;
  }
}

export class CorruptLabelError extends Error {
  constructor(readonly labelId: string, cause?: unknown) {
    super(`Stored data for label ${labelId} is not a valid JSON object: ${errorMessage(cause)}`);
    this.name = "CorruptLabelError";
    this.cause = cause;
  }
}

/* better-sqlite3 の SqliteError.code（drizzle が cause に包む版もある） */
function sqliteCode(err: unknown): string | undefined {
  let cur: unknown = err;
  for (let depth = 0; depth < 3 && cur !== undefined; depth++) {
    const code = errorCode(cur);
    if (code) return code;
    cur = errorProp(cur, "cause");
  }
  return undefined;
}

function isPrimaryKeyViolation(err: unknown): boolean {
  const code = sqliteCode(err);
  return code === "SQLITE_CONSTRAINT_PRIMARYKEY" || code === "SQLITE_CONSTRAINT_UNIQUE";
}

function toStored(row: LabelRow): StoredLabel {
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.data);
  } catch (err) {
    throw new CorruptLabelError(row.id, err);
  }
  if (!isJsonObject(parsed)) throw new CorruptLabelError(row.id, "top-level value is not an object");
  return { id: row.id, document: parsed, createdAt: row.createdAt };
}

/**
 * labels テーブル 1 枚だけの永続ストア。
 * 接続はインスタンスごとに 1 本（better-sqlite3 は同期 API なので文単位でアトミック）。
 * 終了時は close() を必ず呼ぶ。
 */
export class LabelStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;

  constructor(readonly file: string) {
    if (file !== ":memory:") ensureDir(path.dirname(file));
    this.sqlite = new Database(file);
    this.db = drizzle(this.sqlite);
  }

  init(): void {
    this.sqlite.exec(CREATE_LABELS_TABLE);
    log(`database ready: ${this.file}`);
  }

  create(id: string, document: LabelDocument): void {
    const data = JSON.stringify(document);
    try {
      this.db.insert(labels).values({ id, data }).run();
    } catch (err) {
      if (isPrimaryKeyViolation(err)) throw new DuplicateLabelError(id, err);
      throw err;
    }
  }

  lookup(id: string): LabelLookup {
    const row = this.db.select().from(labels).where(eq(labels.id, id)).get();
    if (!row) return { status: "missing" };
    try {
      return { status: "found", label: toStored(row) };
    } catch (err) {
      if (err instanceof CorruptLabelError) return { status: "corrupt", error: err };
      throw err;
    }
  }

  /** 壊れた JSON も「なし」と同じ扱い（区別が要るなら lookup を使う） */
  fetch(id: string): LabelDocument | undefined {
    const res = this.lookup(id);
    if (res.status === "corrupt") logError(res.error.message);
    return res.status === "found" ? res.label.document : undefined;
  }

  exists(id: string): boolean {
    return this.db.select({ id: labels.id }).from(labels).where(eq(labels.id, id)).get() !== undefined;
  }

  /** サイドバー用：全件（作成順）。壊れた行はスキップ */
  fetchAllSummaries(): StoredLabel[] {
    const rows = this.db.select().from(labels).orderBy(asc(labels.createdAt), sql`rowid`).all();
    const out: StoredLabel[] = [];
    for (const row of rows) {
      try {
        out.push(toStored(row));
      } catch (err) {
        logError(`skip label in listing: ${errorMessage(err)}`);
      }
    }
    return out;
  }

  count(): number {
    const row = this.db.select({ n: sql<number>`count(*)` }).from(labels).get();
    return Number(row?.n ?? 0);
  }

  /** 参照先のメディアファイルは消さない */
  delete(id: string): boolean {
    const res = this.db.delete(labels).where(eq(labels.id, id)).run();
    return res.changes > 0;
  }

  close(): void {
    if (this.sqlite.open) this.sqlite.close();
  }
}
