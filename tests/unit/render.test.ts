import { describe, expect, it } from 'vitest';
import {
  ERROR_HINT,
  RELOAD_INTERVAL_MS,
  escapeHtml,
  formatDashArray,
  renderError,
  renderWidget,
} from '@/lib/widget/render';

describe('renderWidget', () => {
  const html = renderWidget({
    title: 'Morning routine',
    total: 450,
    level: 2,
    progressPct: 25,
    pointsPerLevel: 200,
  });

  it('draws the progress arc from the percentage', () => {
    expect(html).toContain('stroke-dasharray="25.00, 100"');
    expect(html).toContain('<path class="track"');
  });

  it('labels the level and the totals', () => {
    expect(html).toContain('>Level 2</text>');
    expect(html).toContain('<div class="meta">450 XP total • 200 XP / level</div>');
    expect(html).toContain('<div class="title">Morning routine</div>');
  });

  it('reloads itself every five minutes', () => {
    expect(RELOAD_INTERVAL_MS).toBe(300000);
    expect(html).toContain('}, 300000);');
  });

  it('forbids caching through meta tags', () => {
    expect(html).toContain('<meta http-equiv="Cache-Control" content="no-cache, no-store, must-revalidate" />');
    expect(html).toContain('<meta http-equiv="Pragma" content="no-cache" />');
    expect(html).toContain('<meta http-equiv="Expires" content="0" />');
  });

  it('escapes the configured title', () => {
    const escaped = renderWidget({
      title: '<b>XP & Co</b>',
      total: 0,
      level: 0,
      progressPct: 0,
      pointsPerLevel: 200,
    });
    expect(escaped).toContain('<div class="title">&lt;b&gt;XP &amp; Co&lt;/b&gt;</div>');
  });
});

describe('formatDashArray', () => {
  it('rounds to two decimals', () => {
    expect(formatDashArray(100 / 3)).toBe('33.33, 100');
    expect(formatDashArray(0)).toBe('0.00, 100');
  });
});

describe('renderError', () => {
  it('shows the message and the credentials hint', () => {
    const html = renderError('Notion API request failed with status 404');
    expect(html).toContain('<h3>Widget error</h3>');
    expect(html).toContain('<p>Notion API request failed with status 404</p>');
    expect(html).toContain(`<p>${ERROR_HINT}</p>`);
  });

  it('escapes the message', () => {
    expect(renderError('bad "input" <x>')).toContain('<p>bad &quot;input&quot; &lt;x&gt;</p>');
  });
});

describe('escapeHtml', () => {
  it('escapes the five HTML metacharacters', () => {
    expect(escapeHtml(`<a href="x">Tom's & Jerry</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom&#39;s &amp; Jerry&lt;/a&gt;'
    );
  });
});
