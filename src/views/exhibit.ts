import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";

import type { StoredLabel } from "../store/labels.js";
import { escapeHtml } from "../lib/utils.js";
import { renderPage } from "./layout.js";
import { labelTitle, renderTemplate, type TemplateName } from "./templates.js";

dayjs.extend(utc);

export const viewerPath = (labelId: string) => `/exhibit/${encodeURIComponent(labelId)}`;

/* created_at は UTC の "YYYY-MM-DD HH:MM:SS" */
export function formatCreatedAt(createdAt: string): string {
  const d = dayjs.utc(createdAt);
  return d.isValid() ? d.format("YYYY-MM-DD HH:mm [UTC]") : createdAt;
}

export function renderSidebar(summaries: StoredLabel[], currentId?: string): string {
  const items = summaries
    .map((s) => {
      const cls = s.id === currentId ? ` class="current"` : "";
      return `<li${cls}><a href="${viewerPath(s.id)}">${escapeHtml(labelTitle(s.document))}</a>` +
        `<small>${escapeHtml(formatCreatedAt(s.createdAt))}</small></li>`;
    })
    .join("");
  return `<aside class="sidebar"><h2>Exhibits</h2>` +
    (items ? `<ul>${items}</ul>` : `<p class="label-empty">No exhibits yet.</p>`) +
    `<p><a href="/">+ New label</a></p></aside>`;
}

export type ExhibitView = {
  label: StoredLabel;
  summaries: StoredLabel[];
  qrDataUri: string;
  viewerUrl: string;
};

/** サイドバー + テンプレ本体 + QR を 1 ページに */
export function renderExhibitPage(view: ExhibitView): { template: TemplateName; html: string } {
  const { label, summaries, qrDataUri, viewerUrl } = view;
  const content = renderTemplate(label.document);
  const qr = `<section class="qr"><img src="${escapeHtml(qrDataUri)}" alt="QR code linking to this exhibit">` +
    `<p><a href="${escapeHtml(viewerUrl)}">${escapeHtml(viewerUrl)}</a></p></section>`;
  const body = `<div class="shell">${renderSidebar(summaries, label.id)}<main>${content.html}${qr}</main></div>`;
  return { template: content.template, html: renderPage(labelTitle(label.document), body) };
}
