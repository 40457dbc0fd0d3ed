import { escapeHtml } from "../lib/utils.js";
import { renderPage } from "./layout.js";

export const NOT_FOUND_PLACEHOLDER = "N/A";

export function renderNotFound(labelId: string = NOT_FOUND_PLACEHOLDER): string {
  return renderPage(
    "Exhibit not found",
    `<div class="notice"><h1>Exhibit not found</h1>` +
      `<p>No exhibit label exists for <code>${escapeHtml(labelId)}</code>.</p>` +
      `<p><a href="/">Create a new label</a></p></div>`
  );
}

export function renderServerError(): string {
  return renderPage(
    "Something went wrong",
    `<div class="notice"><h1>Something went wrong</h1>` +
      `<p>This exhibit could not be displayed. Please try again later.</p>` +
      `<p><a href="/">Back to the form</a></p></div>`
  );
}
