import { readFileSync } from 'node:fs';
import { Hono } from 'hono';
import type { AppEnv } from '../types.js';

const INDEX_HTML_URL = new URL('../static/index.html', import.meta.url);

let cachedHtml: string | undefined;

function loadIndexHtml(): string {
  cachedHtml ??= readFileSync(INDEX_HTML_URL, 'utf-8');
  return cachedHtml;
}

export function createIndexPageRoutes(): Hono<AppEnv> {
  const page = new Hono<AppEnv>();

  page.get('/', (c) => c.html(loadIndexHtml()));

  return page;
}
