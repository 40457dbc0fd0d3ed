// src/routes/uploads.ts
import express, { type Router } from "express";

import {
  UPLOADS_ROUTE,
  readUploadFromReq,
  type UploadStore,
} from "../features/uploads.js";
import { BadRequestException, PayloadTooLargeException, sendError } from "../lib/errors.js";
import { errorMessage, logError } from "../lib/utils.js";
import { renderNotFound } from "../views/notFound.js";

export function uploadsRouter(uploads: UploadStore, maxBytes: number): Router {
  const router = express.Router();

  router.post("/api/upload", async (req, res) => {
    try {
      const payload = await readUploadFromReq(req, maxBytes);
      if (payload.kind === "missing") throw new BadRequestException("No file part");
      if (payload.kind === "too-large") throw new PayloadTooLargeException("File too large");
      const saved = await uploads.accept(payload.bytes, payload.filename);
      res.json({ success: true, filename: saved.filename, media_uri: saved.mediaUri });
    } catch (err) {
      sendError(res, err, "upload");
    }
  });

  /* 保存名ぴったりのファイルだけ返す（resolve がディレクトリ外を弾く） */
  router.get(`${UPLOADS_ROUTE}/:filename`, async (req, res, next) => {
    try {
      const full = await uploads.resolve(req.params.filename);
      if (!full) {
        res.status(404).type("html").send(renderNotFound(req.params.filename));
        return;
      }
      res.sendFile(full, (err) => {
        if (!err) return;
        logError(`send upload failed: ${errorMessage(err)}`);
        if (!res.headersSent) next(err);
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
