// src/web/server.ts
import express, { type ErrorRequestHandler, type Express } from "express";
import path from "path";

import type { AppConfig } from "../lib/env.js";
import type { LabelStore } from "../store/labels.js";
import type { UploadStore } from "../features/uploads.js";
import { InternalServerErrorException } from "../lib/errors.js";
import { errorProp, logError } from "../lib/utils.js";
import { labelsRouter } from "../routes/labels.js";
import { uploadsRouter } from "../routes/uploads.js";
import { exhibitRouter } from "../routes/exhibit.js";
import { renderNotFound } from "../views/notFound.js";

export type AppDeps = {
  config: AppConfig;
  store: LabelStore;
  uploads: UploadStore;
};

/* body-parser 等が付ける status / type を読む */
function httpStatusOf(err: unknown): number | undefined {
  const status = errorProp(err, "status") ?? errorProp(err, "statusCode");
  return typeof status === "number" && status >= 400 && status < 600 ? status : undefined;
}

function errorTypeOf(err: unknown): string | undefined {
  const type = errorProp(err, "type");
  return typeof type === "string" ? type : undefined;
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status = httpStatusOf(err);
  const type = errorTypeOf(err);
  if (type === "entity.parse.failed") {
    res.status(400).json({ error: "Malformed JSON body." });
    return;
  }
  if (type === "entity.too.large") {
    res.status(413).json({ error: "Request body too large." });
    return;
  }
  if (status === 404) {
    res.status(404).type("html").send(renderNotFound());
    return;
  }
  if (status !== undefined && status < 500) {
    res.status(status).json({ error: "Bad request." });
    return;
  }
  logError(`${req.method} ${req.path} failed:`, err);
  const ex = new InternalServerErrorException(err);
  res.status(status ?? ex.statusCode).json(ex.toBody());
};

export function createApp({ config, store, uploads }: AppDeps): Express {
  const app = express();
  app.set("x-powered-by", false);
  app.set("trust proxy", true);

  /* 入力フォーム（静的 HTML） */
  app.get("/", (_req, res, next) => {
    res.sendFile(path.join(config.publicDir, "index.html"), (err) => {
      if (err) next(err);
    });
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, labels: store.count() });
  });

  app.use(labelsRouter(store));
  app.use(uploadsRouter(uploads, config.uploadMaxBytes));
  app.use(exhibitRouter(store, config));

  /* どのルートにも当たらなければ 404 ページ */
  app.use((_req, res) => {
    res.status(404).type("html").send(renderNotFound());
  });
  app.use(errorHandler);

  return app;
}
