// src/routes/exhibit.ts
import express, { type Request, type Router } from "express";

import type { AppConfig } from "../lib/env.js";
import type { LabelStore } from "../store/labels.js";
import { generateQrDataUri } from "../features/qr.js";
import { logError } from "../lib/utils.js";
import { renderExhibitPage, viewerPath } from "../views/exhibit.js";
import { renderNotFound, renderServerError } from "../views/notFound.js";

/** QR に載せる外部 URL。PUBLIC_BASE_URL があればそれ、なければリクエストの Host */
export function externalViewerUrl(req: Request, publicBaseUrl: string, labelId: string): string {
  const base = publicBaseUrl || `${req.protocol}://${req.get("host") ?? "localhost"}`;
  return `${base}${viewerPath(labelId)}`;
}

export function exhibitRouter(store: LabelStore, config: Pick<AppConfig, "publicBaseUrl">): Router {
  const router = express.Router();

  router.get("/exhibit/:label_id", async (req, res) => {
    const labelId = req.params.label_id;
    try {
      const found = store.lookup(labelId);
      if (found.status === "missing") {
        res.status(404).type("html").send(renderNotFound(labelId));
        return;
      }
      if (found.status === "corrupt") throw found.error;

      const summaries = store.fetchAllSummaries();
      const viewerUrl = externalViewerUrl(req, config.publicBaseUrl, labelId);
      const qrDataUri = await generateQrDataUri(viewerUrl);
      const page = renderExhibitPage({ label: found.label, summaries, qrDataUri, viewerUrl });
      res.type("html").send(page.html);
    } catch (err) {
      logError(`render exhibit ${labelId} failed:`, err);
      res.status(500).type("html").send(renderServerError());
    }
  });

  /* 旧 URL（/label/<id>）は恒久リダイレクト */
  router.get("/label/:label_id", (req, res) => {
    res.redirect(301, viewerPath(req.params.label_id));
  });

  return router;
}
