/**
 * Tests for status-formatter module
 */

import { formatStatus, formatStatusJson, formatStatusPretty, StatusReport } from './status-formatter';

describe('status-formatter', () => {
  const report: StatusReport = {
    services: { tor: 'running', haproxy: 'stopped', redis: 'unknown' },
    mirror_onion: 'mirrorexample.onion',
    backend_onion: '',
  };

  describe('formatStatusPretty', () => {
    it('should align service states and describe missing onions', () => {
      expect(formatStatusPretty(report, false)).toBe([
        'Services',
        '  tor      running',
        '  haproxy  stopped',
        '  redis    unknown',
        '',
        'Mirror onion:  mirrorexample.onion',
        'Backend onion: (not configured)',
      ].join('\n'));
    });

    it('should mark an unavailable mirror onion', () => {
      const output = formatStatusPretty({ ...report, mirror_onion: null, backend_onion: 'backendexample.onion' }, false);

      expect(output.split('\n').slice(-2)).toEqual([
        'Mirror onion:  (unavailable)',
        'Backend onion: backendexample.onion',
      ]);
    });

    it('should handle an empty service list', () => {
      expect(formatStatusPretty({ ...report, services: {} }, false).split('\n')[1]).toBe('');
    });
  });

  describe('formatStatusJson', () => {
    it('should produce indented JSON', () => {
      expect(JSON.parse(formatStatusJson(report))).toEqual(report);
      expect(formatStatusJson(report)).toContain('\n  "services": {');
    });
  });

  describe('formatStatus', () => {
    it('should dispatch on format', () => {
      expect(formatStatus(report, 'json')).toBe(formatStatusJson(report));
      expect(formatStatus(report, 'pretty')).toBe(formatStatusPretty(report, false));
    });
  });
});
