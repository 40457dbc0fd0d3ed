// src/lib/utils.ts
import fs from "fs";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function log(...a: unknown[]) { console.log("[web]", ...a); }
export function logError(...a: unknown[]) { console.error("[web]", ...a); }

export function ensureDir(p: string) { fs.mkdirSync(p, { recursive: true }); }

/* instanceof Error は使わない（ネイティブモジュールや Jest では別 realm の Error が来る） */
export function errorProp(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null && key in err ? Reflect.get(err, key) : undefined;
}

export function errorCode(err: unknown): string | undefined {
  const code = errorProp(err, "code");
  return typeof code === "string" ? code : undefined;
}

export function errorMessage(err: unknown): string {
  const msg = errorProp(err, "message");
  return typeof msg === "string" ? msg : String(err);
}

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function normSpace(s?: string) { return (s || "").replace(/\u3000/g, " ").trim(); }

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};
export function escapeHtml(v: unknown): string {
  return String(v ?? "").replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/** 文字列フィールドだけを取り出す（空白のみは無視） */
export function strField(obj: JsonObject, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string" && normSpace(v)) return normSpace(v);
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
  }
  return undefined;
}
