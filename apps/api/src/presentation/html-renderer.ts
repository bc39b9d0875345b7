import { MonitorView, Segment, Tone } from './view-model.types';

// Readable on a dark background
export const TONE_COLORS: Record<Tone, string> = {
  default: '#FAFAFA',
  muted: '#808080',
  positive: '#32CD32',
  negative: '#FF4500',
  warning: '#FFD700',
  extreme: '#FFA500',
  bullish: '#00FFFF',
  bearish: '#FF00FF',
};

const FLASH_COLORS = {
  up: '50, 205, 50',
  down: '255, 69, 0',
};

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITIES[ch] ?? ch);
}

export function renderSegment(segment: Segment): string {
  const style = [`color: ${TONE_COLORS[segment.tone]};`];
  if (segment.strong) style.push('font-weight: 600;');
  if (segment.small) style.push('font-size: 0.9em;');
  return `<span style="${style.join(' ')}">${escapeHtml(segment.text)}</span>`;
}

function renderPrice(view: MonitorView): string {
  if (view.price) {
    const [s, m, l] = view.price.movingAverages.map(escapeHtml);
    return (
      `<span style="font-size: 1.1em; color: ${TONE_COLORS.default};"> P: <code>${escapeHtml(view.price.close)}</code></span>` +
      `<span style="font-size: 0.8em; color: ${TONE_COLORS.muted};"> @${escapeHtml(view.price.candleTime)} | ` +
      `MA:<code>${s}</code>/<code>${m}</code>/<code>${l}</code></span>`
    );
  }
  if (view.priceError) {
    return ` <span style="color: ${TONE_COLORS.warning}; font-size: 0.9em;">${escapeHtml(view.priceError)}</span>`;
  }
  return '';
}

function renderFlash(view: MonitorView): string {
  if (view.priceDirection !== 'up' && view.priceDirection !== 'down') return '';
  const rgb = FLASH_COLORS[view.priceDirection];
  return (
    `<style>@keyframes price-${view.priceDirection} {` +
    ` 0% { background-color: rgba(${rgb}, 0); }` +
    ` 30% { background-color: rgba(${rgb}, 0.2); }` +
    ` 100% { background-color: rgba(${rgb}, 0); } }` +
    ` #price-display { animation: price-${view.priceDirection} 1s ease-out; }</style>`
  );
}

/** Body fragment for one view; used by the HTML page and pushed over SSE. */
export function renderView(view: MonitorView): string {
  return [
    renderFlash(view),
    '<div class="monitor">',
    `<div><span style="color: ${TONE_COLORS.muted}; font-size: 0.7em;">${escapeHtml(view.clock)}</span></div>`,
    `<div style="margin-bottom: 10px;"><span style="font-size: 1.2em; font-weight: 600; color: ${TONE_COLORS.default};">${escapeHtml(view.ticker)}</span>${renderPrice(view)}</div>`,
    `<div id="price-display" style="margin-bottom: 10px;">${renderSegment(view.trend)}</div>`,
    `<div>${renderSegment(view.momentum)}</div>`,
    '</div>',
  ].join('\n');
}

export function renderPage(view: MonitorView | null, refreshSeconds: number): string {
  const body = view
    ? renderView(view)
    : `<div class="monitor"><span style="color: ${TONE_COLORS.warning};">Waiting for first refresh...</span></div>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="${refreshSeconds}">
<title>Stock Monitor</title>
<style>
  body { background: #0E1117; color: ${TONE_COLORS.default}; font-family: sans-serif; margin: 0; }
  .monitor { display: flex; flex-direction: column; justify-content: center; align-items: center;
    text-align: center; height: 70vh; font-size: 2.5em; line-height: 1.4; }
</style>
</head>
<body>
${body}
</body>
</html>
`;
}
