// src/views/templates.ts
import type { LabelDocument } from "../store/labels.js";
import { escapeHtml, isJsonObject, strField, type JsonValue } from "../lib/utils.js";

export const TEMPLATE_NAMES = ["minimalist", "timeline", "gallery"] as const;
export type TemplateName = (typeof TEMPLATE_NAMES)[number];
export const DEFAULT_TEMPLATE: TemplateName = "minimalist";

export const UNTITLED = "Untitled exhibit";

type TemplateRenderer = (doc: LabelDocument) => string;

export function isTemplateName(v: unknown): v is TemplateName {
  return typeof v === "string" && TEMPLATE_NAMES.some((n) => n === v);
}

/** template フィールド → テンプレ名。未指定・未知の値は minimalist */
export function resolveTemplate(v: JsonValue | undefined): TemplateName {
  const key = typeof v === "string" ? v.trim().toLowerCase() : "";
  return isTemplateName(key) ? key : DEFAULT_TEMPLATE;
}

export function labelTitle(doc: LabelDocument): string {
  return strField(doc, "title") ?? UNTITLED;
}

/* ====== 共通パーツ ====== */

/** 相対パス（/uploads/...）か http(s) のみ許可 */
export function safeMediaUri(v: JsonValue | undefined): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  if (s.startsWith("/") && !s.startsWith("//")) return s;
  if (/^https?:\/\//i.test(s)) return s;
  return undefined;
}

function paragraphs(text: string | undefined): string {
  if (!text) return "";
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => `<p>${escapeHtml(p).replace(/\r?\n/g, "<br>")}</p>`)
    .join("");
}

function header(doc: LabelDocument): string {
  const meta = [strField(doc, "subtitle"), strField(doc, "artist"), strField(doc, "date")].filter(Boolean);
  return `<h1 class="label-title">${escapeHtml(labelTitle(doc))}</h1>` +
    (meta.length ? `<p class="label-meta">${meta.map(escapeHtml).join(" · ")}</p>` : "");
}

function description(doc: LabelDocument): string {
  const body = paragraphs(strField(doc, "description"));
  return body ? `<div class="label-description">${body}</div>` : "";
}

function audio(doc: LabelDocument): string {
  const src = safeMediaUri(doc.audio) ?? safeMediaUri(doc.audio_uri);
  return src ? `<audio class="label-audio" controls preload="none" src="${escapeHtml(src)}"></audio>` : "";
}

function heroUri(doc: LabelDocument): string | undefined {
  return safeMediaUri(doc.media_uri) ?? safeMediaUri(doc.image);
}

/* ====== minimalist ====== */
function renderMinimalist(doc: LabelDocument): string {
  const hero = heroUri(doc);
  const figure = hero
    ? `<figure class="label-hero"><img src="${escapeHtml(hero)}" alt="${escapeHtml(labelTitle(doc))}"></figure>`
    : "";
  return `<article class="label label-minimalist" data-template="minimalist">${header(doc)}${figure}${description(doc)}${audio(doc)}</article>`;
}

/* ====== gallery ====== */
type GalleryItem = { uri: string; caption?: string };

export function galleryItems(doc: LabelDocument): GalleryItem[] {
  const items: GalleryItem[] = [];
  const hero = heroUri(doc);
  if (hero) items.push({ uri: hero });
  const list = Array.isArray(doc.images) ? doc.images : [];
  for (const raw of list) {
    const uri = isJsonObject(raw) ? safeMediaUri(raw.uri) ?? safeMediaUri(raw.media_uri) : safeMediaUri(raw);
    if (!uri || items.some((it) => it.uri === uri)) continue;
    items.push({ uri, caption: isJsonObject(raw) ? strField(raw, "caption") : undefined });
  }
  return items;
}

function renderGallery(doc: LabelDocument): string {
  const items = galleryItems(doc);
  const grid = items.length
    ? `<section class="gallery-grid">${items
        .map(
          (it) =>
            `<figure class="gallery-item"><img src="${escapeHtml(it.uri)}" alt="${escapeHtml(it.caption ?? labelTitle(doc))}">` +
            (it.caption ? `<figcaption>${escapeHtml(it.caption)}</figcaption>` : "") +
            `</figure>`
        )
        .join("")}</section>`
    : `<p class="label-empty">No images yet.</p>`;
  return `<article class="label label-gallery" data-template="gallery">${header(doc)}${description(doc)}${grid}${audio(doc)}</article>`;
}

/* ====== timeline ====== */
function renderTimeline(doc: LabelDocument): string {
  const events = (Array.isArray(doc.events) ? doc.events : []).filter(isJsonObject);
  const list = events.length
    ? `<ol class="timeline">${events
        .map((ev) => {
          const when = strField(ev, "date");
          const title = strField(ev, "title");
          const img = safeMediaUri(ev.media_uri) ?? safeMediaUri(ev.image);
          return `<li class="timeline-event">` +
            (when ? `<time>${escapeHtml(when)}</time>` : "") +
            (title ? `<h3>${escapeHtml(title)}</h3>` : "") +
            paragraphs(strField(ev, "description")) +
            (img ? `<img src="${escapeHtml(img)}" alt="${escapeHtml(title ?? when ?? "")}">` : "") +
            `</li>`;
        })
        .join("")}</ol>`
    : `<p class="label-empty">No timeline events yet.</p>`;
  return `<article class="label label-timeline" data-template="timeline">${header(doc)}${description(doc)}${list}${audio(doc)}</article>`;
}

export const TEMPLATES = {
  minimalist: renderMinimalist,
  timeline: renderTimeline,
  gallery: renderGallery,
} satisfies Record<TemplateName, TemplateRenderer>;

export function renderTemplate(doc: LabelDocument): { template: TemplateName; html: string } {
  const template = resolveTemplate(doc.template);
  return { template, html: TEMPLATES[template](doc) };
}
