import path from "path";

export type AppConfig = {
  port: number;
  /** 例: https://labels.example.org（末尾スラッシュなし）。空ならリクエストの Host から組み立てる */
  publicBaseUrl: string;
  databaseFile: string;
  uploadDir: string;
  publicDir: string;
  uploadMaxBytes: number;
};

/* ====== ENV 既定値 ====== */
export const DEFAULT_PORT = 5000;
export const DEFAULT_UPLOAD_MAX_BYTES = 16 * 1024 * 1024;

function resolvePath(v: string | undefined, def: string): string {
  const s = String(v || "").trim();
  return path.resolve(process.cwd(), s || def);
}

function positiveInt(v: string | undefined, def: number): number {
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : def;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    publicBaseUrl: String(env.PUBLIC_BASE_URL || env.BASE_URL || "").trim().replace(/\/+$/, ""),
    // ":memory:" はそのまま通す（テスト用）
    databaseFile: env.DATABASE_FILE === ":memory:" ? ":memory:" : resolvePath(env.DATABASE_FILE, "data/labels.db"),
    uploadDir: resolvePath(env.UPLOAD_DIR, "data/uploads"),
    publicDir: resolvePath(env.PUBLIC_DIR, "public"),
    uploadMaxBytes: positiveInt(env.UPLOAD_MAX_BYTES, DEFAULT_UPLOAD_MAX_BYTES),
  };
}
