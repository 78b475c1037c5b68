/**
 * Tests for stats-aggregator module
 */

import { StatsAggregator, matchCounters } from './stats-aggregator';
import { LogEntry } from '../types';

function createEntry(message: string): LogEntry {
  return { time: '10:00:00', level: 'info', source: 'haproxy', message };
}

describe('stats-aggregator', () => {
  describe('matchCounters', () => {
    it('should match nothing for unrelated messages', () => {
      expect(matchCounters('Bootstrapped 100%: Done')).toEqual([]);
    });

    it('should match several counters at once', () => {
      expect(matchCounters('FATAL: request blocked')).toEqual(['requests', 'blocked']);
      expect(matchCounters('Captcha rejected for request')).toEqual(['requests', 'blocked', 'captchas']);
    });

    it('should be case-insensitive', () => {
      expect(matchCounters('REQUEST DENIED')).toEqual(['requests', 'blocked']);
    });

    it('should count a message once per counter even with several keywords', () => {
      expect(matchCounters('blocked denied 403')).toEqual(['blocked']);
    });
  });

  describe('StatsAggregator', () => {
    it('should start at zero', () => {
      expect(new StatsAggregator().snapshot()).toEqual({ requests: 0, blocked: 0, captchas: 0 });
    });

    it('should increment every matching counter for one entry', () => {
      const stats = new StatsAggregator();
      stats.observe(createEntry('FATAL: request blocked'));

      expect(stats.snapshot()).toEqual({ requests: 1, blocked: 1, captchas: 0 });
    });

    it('should accumulate across entries', () => {
      const stats = new StatsAggregator();
      stats.observe(createEntry('GET /a request'));
      stats.observe(createEntry('GET /b request'));
      stats.observe(createEntry('captcha issued'));
      stats.observe(createEntry('connection rejected'));

      expect(stats.snapshot()).toEqual({ requests: 2, blocked: 1, captchas: 1 });
    });

    it('should never decrease any counter', () => {
      const stats = new StatsAggregator();
      const messages = ['request', 'idle', 'denied', 'captcha ok', 'nothing', 'request rejected'];
      let previous = stats.snapshot();

      for (const message of messages) {
        stats.observe(createEntry(message));
        const current = stats.snapshot();
        expect(current.requests).toBeGreaterThanOrEqual(previous.requests);
        expect(current.blocked).toBeGreaterThanOrEqual(previous.blocked);
        expect(current.captchas).toBeGreaterThanOrEqual(previous.captchas);
        previous = current;
      }

      expect(previous).toEqual({ requests: 2, blocked: 2, captchas: 1 });
    });

    it('should return snapshots detached from the live counters', () => {
      const stats = new StatsAggregator();
      const snapshot = stats.snapshot();
      snapshot.requests = 99;

      stats.observe(createEntry('request'));
      expect(stats.snapshot().requests).toBe(1);
    });
  });
});
