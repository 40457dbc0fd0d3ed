// src/features/uploads.ts
import type { IncomingMessage } from "http";
import path from "path";
import { promises as fs } from "fs";
import { randomBytes } from "crypto";
import Busboy from "busboy";

import { BadRequestException, BaseException } from "../lib/errors.js";
import { errorCode, errorMessage, log } from "../lib/utils.js";

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set(["png", "jpg", "jpeg", "gif", "mp3", "wav"]);
export const UPLOADS_ROUTE = "/uploads";
export const UPLOAD_FIELD = "file";

export class UploadRejectedError extends BadRequestException {}

export class UploadWriteError extends BaseException {
  constructor(cause?: unknown) {
    super(500, "Could not save uploaded file.", cause);
  }
}

export class MalformedMultipartError extends BadRequestException {
  constructor(cause?: unknown) {
    super("Malformed multipart body", cause);
  }
}

export type AcceptedUpload = {
  filename: string;
  mediaUri: string;
  size: number;
};

export type UploadPayload =
  | { kind: "file"; filename: string; bytes: Buffer }
  | { kind: "missing" }
  | { kind: "too-large" };

/** 最後の "." 以降（小文字）。"." がなければ undefined */
export function fileExtension(name: string): string | undefined {
  const i = name.lastIndexOf(".");
  return i >= 0 ? name.slice(i + 1).toLowerCase() : undefined;
}

export function isAllowedFile(name: string): boolean {
  const ext = fileExtension(name);
  return ext !== undefined && ALLOWED_EXTENSIONS.has(ext);
}

/**
 * クライアント由来のファイル名を安全な ASCII 名にする。
 * パス区切りは "_" 扱い、[A-Za-z0-9_.-] 以外は削除、先頭末尾の "." "_" も落とす。
 */
export function sanitizeFilename(name: string): string {
  const ascii = name.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  const joined = ascii.replace(/[/\\]/g, " ").trim().split(/\s+/).join("_");
  return joined.replace(/[^A-Za-z0-9_.-]/g, "").replace(/^[._]+|[._]+$/g, "");
}

/* サニタイズで拡張子が消えた場合は upload.<ext> */
function storedBaseName(original: string): string {
  const safe = sanitizeFilename(original);
  if (isAllowedFile(safe)) return safe;
  return `upload.${fileExtension(original)}`;
}

function newToken(): string {
  return randomBytes(16).toString("hex");
}

/**
 * アップロードディレクトリへの保存と取り出し。
 * 保存名は "<token>_<sanitized name>"、トークンで一意になる。
 */
export class UploadStore {
  constructor(readonly dir: string, private readonly token: () => string = newToken) {}

  async accept(bytes: Buffer, clientFilename: string): Promise<AcceptedUpload> {
    const original = String(clientFilename || "").trim();
    if (!original) throw new UploadRejectedError("No selected file");
    if (!isAllowedFile(original)) throw new UploadRejectedError("File type not allowed");

    const filename = `${this.token()}_${storedBaseName(original)}`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(path.join(this.dir, filename), bytes, { flag: "wx" });
    } catch (err) {
      throw new UploadWriteError(err);
    }
    log(`upload saved: ${filename} (${bytes.length} bytes)`);
    return { filename, mediaUri: `${UPLOADS_ROUTE}/${filename}`, size: bytes.length };
  }

  /** 保存済みファイルの絶対パス。ディレクトリ外・隠しファイル・存在しないものは undefined */
  async resolve(filename: string): Promise<string | undefined> {
    if (!filename || filename.includes("\0") || filename.startsWith(".")) return undefined;
    if (/[/\\]/.test(filename) || path.basename(filename) !== filename) return undefined;

    const root = path.resolve(this.dir);
    const full = path.resolve(root, filename);
    if (path.dirname(full) !== root) return undefined;

    try {
      const st = await fs.stat(full);
      return st.isFile() ? full : undefined;
    } catch (err) {
      if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return undefined;
      throw err;
    }
  }
}

/* ============================================================
 *  multipart/form-data から "file" パートを 1 つだけ取り出す
 * ============================================================ */
export async function readUploadFromReq(
  req: IncomingMessage,
  maxBytes: number,
  field: string = UPLOAD_FIELD
): Promise<UploadPayload> {
  const ct = String(req.headers["content-type"] || "").toLowerCase();
  if (!ct.includes("multipart/form-data")) return { kind: "missing" };

  let bb: Busboy.Busboy;
  try {
    // ファイル名は RFC 2231 指定がなくても UTF-8 として読む（ブラウザはそのまま送ってくる）
    bb = Busboy({ headers: req.headers, defParamCharset: "utf8", limits: { fileSize: maxBytes, files: 1 } });
  } catch (err) {
    // boundary なし等。ファイルなしとして扱う
    log(`multipart rejected: ${errorMessage(err)}`);
    req.resume();
    return { kind: "missing" };
  }

  return await new Promise<UploadPayload>((resolve, reject) => {
    let payload: UploadPayload = { kind: "missing" };
    let taken = false;
    let settled = false;
    let fileDone: Promise<void> = Promise.resolve();

    /* 途中で切れた・壊れた本文は 400。残りは読み捨てる */
    const fail = (err: unknown) => {
      if (settled) return;
      settled = true;
      log(`multipart rejected: ${errorMessage(err)}`);
      req.unpipe(bb);
      req.resume();
      reject(new MalformedMultipartError(err));
    };

    bb.on("file", (name, file, info) => {
      if (taken || name !== field) {
        file.once("error", fail);
        file.resume();
        return;
      }
      taken = true;
      const chunks: Buffer[] = [];
      let truncated = false;
      fileDone = new Promise<void>((done, failed) => {
        file.on("data", (d: Buffer) => chunks.push(d));
        file.on("limit", () => { truncated = true; });
        file.once("error", failed);
        file.once("end", () => {
          payload = truncated
            ? { kind: "too-large" }
            : { kind: "file", filename: info.filename ?? "", bytes: Buffer.concat(chunks) };
          done();
        });
      });
      fileDone.catch(fail);
    });
    bb.once("error", fail);
    bb.once("close", () => {
      fileDone.then(
        () => {
          if (settled) return;
          settled = true;
          resolve(payload);
        },
        fail
      );
    });
    req.pipe(bb);
  });
}
