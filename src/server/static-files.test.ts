/**
 * Tests for static-files module
 */

import * as path from 'path';
import { contentTypeFor, resolveStaticPath } from './static-files';

describe('static-files', () => {
  const root = path.resolve('/srv/dashboard');

  describe('resolveStaticPath', () => {
    it('should map the root path to index.html', () => {
      expect(resolveStaticPath(root, '/')).toBe(path.join(root, 'index.html'));
    });

    it('should resolve nested assets under the root', () => {
      expect(resolveStaticPath(root, '/css/site.css')).toBe(path.join(root, 'css', 'site.css'));
    });

    it('should decode percent-encoded names', () => {
      expect(resolveStaticPath(root, '/my%20file.txt')).toBe(path.join(root, 'my file.txt'));
    });

    it('should refuse paths that escape the root', () => {
      expect(resolveStaticPath(root, '/../etc/passwd')).toBeNull();
      expect(resolveStaticPath(root, '/%2e%2e/secret')).toBeNull();
    });

    it('should refuse malformed encodings', () => {
      expect(resolveStaticPath(root, '/%E0%A4%A')).toBeNull();
    });
  });

  describe('contentTypeFor', () => {
    it('should pick the type from the extension', () => {
      expect(contentTypeFor('index.HTML')).toBe('text/html; charset=utf-8');
      expect(contentTypeFor('logo.svg')).toBe('image/svg+xml');
    });

    it('should fall back to octet-stream', () => {
      expect(contentTypeFor('archive.tar.zst')).toBe('application/octet-stream');
    });
  });
});
