/**
 * Serving of the dashboard's static assets
 */

import * as fs from 'fs';
import * as path from 'path';
import { ServerResponse } from 'http';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
  '.txt': 'text/plain; charset=utf-8',
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Maps a URL path onto a file under root.
 * "/" maps to index.html; paths escaping root yield null.
 */
export function resolveStaticPath(root: string, urlPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath);
  } catch {
    return null;
  }

  const relative = decoded === '/' ? 'index.html' : decoded.replace(/^\/+/, '');
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relative);

  if (resolved !== resolvedRoot && !resolved.startsWith(resolvedRoot + path.sep)) {
    return null;
  }
  return resolved;
}

/**
 * Writes the file for urlPath, or a 404 when it does not exist
 */
export async function serveStatic(root: string, urlPath: string, res: ServerResponse): Promise<void> {
  const filePath = resolveStaticPath(root, urlPath);
  const stat = filePath ? await fs.promises.stat(filePath).catch(() => null) : null;

  if (!filePath || !stat?.isFile()) {
    res.statusCode = 404;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify({ error: 'Not Found', path: urlPath }));
    return;
  }

  const body = await fs.promises.readFile(filePath);
  res.statusCode = 200;
  res.setHeader('Content-Type', contentTypeFor(filePath));
  res.setHeader('Content-Length', body.length);
  res.end(body);
}
