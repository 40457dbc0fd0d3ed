// src/routes/labels.ts
import express, { type Router } from "express";

import type { LabelStore } from "../store/labels.js";
import { BadRequestException, NotFoundException, sendError } from "../lib/errors.js";
import { isJsonObject, log } from "../lib/utils.js";
import { generateLabelId } from "../utils/ids.js";
import { labelTitle, resolveTemplate } from "../views/templates.js";
import { viewerPath } from "../views/exhibit.js";

const jsonParser = express.json({ limit: "1mb" });

export function labelsRouter(store: LabelStore): Router {
  const router = express.Router();

  /* 作成：ID 発行 → 保存 → 閲覧 URL を返す */
  router.post("/api/create_label", jsonParser, (req, res) => {
    try {
      const body: unknown = req.body;
      if (!isJsonObject(body) || Object.keys(body).length === 0) {
        throw new BadRequestException("No JSON data provided in request body.");
      }
      const labelId = generateLabelId((id) => store.exists(id));
      store.create(labelId, body);
      const url = viewerPath(labelId);
      log(`label created: ${labelId} url=${url}`);
      res.status(201).json({
        message: "Exhibit label data successfully saved.",
        label_id: labelId,
        url,
      });
    } catch (err) {
      sendError(res, err, "create_label");
    }
  });

  router.get("/api/labels", (_req, res) => {
    try {
      const labels = store.fetchAllSummaries().map((s) => ({
        label_id: s.id,
        title: labelTitle(s.document),
        template: resolveTemplate(s.document.template),
        created_at: s.createdAt,
        url: viewerPath(s.id),
      }));
      res.json({ labels });
    } catch (err) {
      sendError(res, err, "list_labels");
    }
  });

  router.get("/api/labels/:label_id", (req, res) => {
    try {
      const found = store.lookup(req.params.label_id);
      if (found.status === "missing") throw new NotFoundException("Label not found.");
      if (found.status === "corrupt") throw found.error;
      const { id, document, createdAt } = found.label;
      res.json({ label_id: id, data: document, created_at: createdAt });
    } catch (err) {
      sendError(res, err, "get_label");
    }
  });

  /* 削除：メディアファイルは残る */
  router.delete("/api/delete_label/:label_id", (req, res) => {
    try {
      const labelId = req.params.label_id;
      if (!store.delete(labelId)) throw new NotFoundException("Label not found.");
      log(`label deleted: ${labelId}`);
      res.json({ message: `Label ${labelId} deleted.` });
    } catch (err) {
      sendError(res, err, "delete_label");
    }
  });

  return router;
}
