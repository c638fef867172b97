/**
 * HTML documents for the embeddable level widget.
 * The ring is a circle of radius 15.9155 (circumference 100), so the bar's
 * dash length is the progress percentage itself.
 */

export const RELOAD_INTERVAL_MS = 5 * 60 * 1000;

export const ERROR_HINT =
  'Check API_TOKEN / DATABASE_ID and that the integration has access to the database.';

const RING_PATH = `M18 2.0845
         a 15.9155 15.9155 0 0 1 0 31.831
         a 15.9155 15.9155 0 0 1 0 -31.831`;

export interface WidgetView {
  title: string;
  total: number;
  level: number;
  progressPct: number;
  pointsPerLevel: number;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatDashArray(progressPct: number): string {
  return `${progressPct.toFixed(2)}, 100`;
}

export function renderWidget(view: WidgetView): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <meta http-equiv="Cache-Control" content="no-cache, no-store, must-revalidate" />
  <meta http-equiv="Pragma" content="no-cache" />
  <meta http-equiv="Expires" content="0" />
  <title>${escapeHtml(view.title)}</title>
  <script>
    setInterval(function () {
      window.location.reload();
    }, ${RELOAD_INTERVAL_MS});
  </script>
  <style>
    html, body {
      height: 100%;
      background: #0f1226;
      color: #eaf0ff;
      margin: 0;
      font-family: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif;
    }
    .wrap {
      height: 100%;
      display: flex;
      align-items: center;
      justify-content: center;
      gap: 18px;
      flex-direction: column;
      padding: 16px;
      box-sizing: border-box;
    }
    .title { font-weight: 600; opacity: .9; }
    .meta { opacity: .8; font-size: 14px; }
    svg { filter: drop-shadow(0 6px 16px rgba(0,0,0,.4)); }
    .track { stroke: #2a2f58; }
    .bar {
      stroke: #7aa2ff;
      transition: stroke-dasharray 1s ease-out;
    }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="title">${escapeHtml(view.title)}</div>
    <svg viewBox="0 0 36 36" width="180" height="180">
      <path class="track"
        d="${RING_PATH}"
        fill="none" stroke-width="2"/>
      <path class="bar"
        d="${RING_PATH}"
        fill="none" stroke-width="2"
        stroke-dasharray="${formatDashArray(view.progressPct)}" />
      <text x="18" y="19.5" fill="#eaf0ff" font-size="5" text-anchor="middle" style="font-weight:700">Level ${view.level}</text>
    </svg>
    <div class="meta">${view.total} XP total • ${view.pointsPerLevel} XP / level</div>
  </div>
</body>
</html>
`;
}

export function renderError(message: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <meta http-equiv="Cache-Control" content="no-cache, no-store, must-revalidate" />
  <title>Widget error</title>
</head>
<body style="background:#111;color:#eee;font-family:system-ui;padding:24px">
  <h3>Widget error</h3>
  <p>${escapeHtml(message)}</p>
  <p>${ERROR_HINT}</p>
</body>
</html>
`;
}
