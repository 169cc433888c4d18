import { Injectable } from '@nestjs/common';
import { LIVE_PATHS } from '../live/constants/live.constants';
import { Target } from '../live/target';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}

export function formatTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad2).join(':');
}

/**
 * Markup for the demo pages. Kept to the few elements the live patches need.
 */
@Injectable()
export class ExamplesService {
  layout(title: string, body: string): string {
    return [
      '<!doctype html>',
      '<html lang="en">',
      '<head>',
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<title>${escapeHtml(title)}</title>`,
      '</head>',
      '<body>',
      '<nav><a href="/">Home</a> <a href="/clock">Clock</a> <a href="/deferred">Deferred</a> <a href="/append">Append</a></nav>',
      `<main><h1>${escapeHtml(title)}</h1>${body}</main>`,
      `<script src="${LIVE_PATHS.CLIENT_SCRIPT}"></script>`,
      '</body>',
      '</html>',
    ].join('\n');
  }

  index(): string {
    return this.layout(
      'Live patches',
      '<p>Pages whose content the server keeps updating after load.</p>' +
        '<ul>' +
        '<li><a href="/clock">Clock</a>: server time, replaced every second</li>' +
        '<li><a href="/deferred">Deferred</a>: a skeleton swapped for content once it is ready</li>' +
        '<li><a href="/append">Append</a>: rows added to a feed</li>' +
        '</ul>',
    );
  }

  clock(target: Target, now: Date): string {
    return `<div id="${target.id}" class="clock">${formatTime(now)}</div>`;
  }

  clockPage(target: Target, now: Date): string {
    return this.layout(
      'Clock',
      '<p>Live server time, updated every second.</p>' + this.clock(target, now),
    );
  }

  deferredSkeleton(target: Target): string {
    return `<div id="${target.id}" class="skeleton" aria-busy="true">Loading…</div>`;
  }

  deferredContent(target: Target): string {
    return (
      `<div id="${target.id}" class="loaded">` +
      '<strong>Deferred content loaded</strong>' +
      '<p>This block replaced the skeleton through a live patch.</p>' +
      '</div>'
    );
  }

  deferredPage(target: Target): string {
    return this.layout(
      'Deferred',
      '<p>The server answers at once and sends the slow part later.</p>' +
        this.deferredSkeleton(target),
    );
  }

  appendEntry(now: Date): string {
    return `<li>${escapeHtml('Appended at ' + formatTime(now))}</li>`;
  }

  appendPage(target: Target): string {
    return this.layout(
      'Append',
      '<p>New rows arrive at the end of the list.</p>' + `<ul id="${target.id}"></ul>`,
    );
  }
}
