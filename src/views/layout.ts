import { escapeHtml } from "../lib/utils.js";

const BASE_CSS = `
  *{box-sizing:border-box}
  body{font-family:system-ui,-apple-system,"Segoe UI",sans-serif;margin:0;color:#1d1d1f;background:#fafafa}
  a{color:#0b5cad}
  .shell{display:flex;min-height:100vh}
  .sidebar{width:260px;flex-shrink:0;background:#fff;border-right:1px solid #e3e3e3;padding:1.25rem 1rem;overflow-y:auto}
  .sidebar h2{font-size:.8rem;text-transform:uppercase;letter-spacing:.08em;color:#777;margin:0 0 .75rem}
  .sidebar ul{list-style:none;margin:0;padding:0}
  .sidebar li{padding:.4rem .5rem;border-radius:6px}
  .sidebar li.current{background:#eef4fb}
  .sidebar small{display:block;color:#888;font-size:.75rem}
  main{flex:1;padding:2.5rem 3rem;max-width:960px}
  .label-title{font-size:2.2rem;margin:0 0 .25rem}
  .label-meta{color:#666;margin:0 0 1.5rem}
  .label-hero img{max-width:100%;border-radius:4px}
  .label-description p{line-height:1.6}
  .label-empty{color:#888;font-style:italic}
  .gallery-grid{display:grid;grid-template-columns:repeat(auto-fill,minmax(200px,1fr));gap:1rem}
  .gallery-item img{width:100%;border-radius:4px}
  .timeline{list-style:none;padding-left:1.25rem;border-left:3px solid #d0d7de}
  .timeline-event{margin:0 0 1.5rem;position:relative}
  .timeline-event time{font-weight:600;color:#0b5cad}
  .timeline-event img{max-width:320px;display:block;margin-top:.5rem}
  .qr{margin-top:3rem;padding-top:1.5rem;border-top:1px solid #e3e3e3}
  .qr img{width:180px;height:180px;image-rendering:pixelated}
  .qr p{font-size:.85rem;word-break:break-all}
  .notice{max-width:560px;margin:15vh auto;text-align:center}
`;

export function renderPage(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>${BASE_CSS}</style>
</head>
<body>
${body}
</body>
</html>`;
}
