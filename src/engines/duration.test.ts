import { describe, it, expect } from 'vitest';
import {
  parseDurationDays,
  formatDays,
  scaleDuration,
  parseEffortDays,
  estimateVerificationEffort,
  formatEffortTotal,
} from './duration.js';

describe('duration', () => {
  describe('parseDurationDays', () => {
    it('should read days, weeks and months', () => {
      expect(parseDurationDays('5 days')).toBe(5);
      expect(parseDurationDays('1 day')).toBe(1);
      expect(parseDurationDays('2 weeks')).toBe(14);
      expect(parseDurationDays('1.5 weeks')).toBe(10);
      expect(parseDurationDays('1.5 months')).toBe(45);
    });

    it('should take the lower bound of a range', () => {
      expect(parseDurationDays('2-3 days')).toBe(2);
      expect(parseDurationDays('1-2 weeks')).toBe(7);
    });

    it('should fall back to one day', () => {
      expect(parseDurationDays('a while')).toBe(1);
      expect(parseDurationDays('some days')).toBe(1);
      expect(parseDurationDays('6 hours')).toBe(1);
    });
  });

  describe('formatDays', () => {
    it('should pick the unit by magnitude', () => {
      expect(formatDays(0)).toBe('0 days');
      expect(formatDays(1)).toBe('1 day');
      expect(formatDays(6)).toBe('6 days');
      expect(formatDays(7)).toBe('1.0 weeks');
      expect(formatDays(10)).toBe('1.4 weeks');
      expect(formatDays(30)).toBe('1.0 months');
      expect(formatDays(45)).toBe('1.5 months');
    });
  });

  describe('scaleDuration', () => {
    it('should scale and truncate to whole days', () => {
      expect(scaleDuration('5 days', 1.5)).toBe('1.0 weeks');
      expect(scaleDuration('3 days', 0.7)).toBe('2 days');
      expect(scaleDuration('4 days', 1)).toBe('4 days');
    });

    it('should never go below one day', () => {
      expect(scaleDuration('1 day', 0.5)).toBe('1 day');
    });
  });

  describe('parseEffortDays', () => {
    it('should convert hours at eight per day', () => {
      expect(parseEffortDays('4 hours')).toBe(0.5);
      expect(parseEffortDays('1 hour')).toBe(0.125);
    });

    it('should read fractional days', () => {
      expect(parseEffortDays('1.5 days')).toBe(1.5);
    });

    it('should default unparseable estimates', () => {
      expect(parseEffortDays('a few days')).toBe(1);
      expect(parseEffortDays('some hours')).toBe(0.125);
      expect(parseEffortDays('unknown')).toBe(1);
    });
  });

  describe('estimateVerificationEffort', () => {
    it('should take 40% of hour estimates', () => {
      expect(estimateVerificationEffort('8 hours')).toBe('3 hours');
      expect(estimateVerificationEffort('2 hours')).toBe('1 hour');
    });

    it('should take 30% of day estimates', () => {
      expect(estimateVerificationEffort('1 day')).toBe('2 hours');
      expect(estimateVerificationEffort('3 days')).toBe('7 hours');
      expect(estimateVerificationEffort('5 days')).toBe('1.5 days');
    });

    it('should default missing or unreadable estimates', () => {
      expect(estimateVerificationEffort(undefined)).toBe('0.5 days');
      expect(estimateVerificationEffort('several hours')).toBe('2 hours');
      expect(estimateVerificationEffort('a sprint')).toBe('0.5 days');
    });
  });

  describe('formatEffortTotal', () => {
    it('should pick hours, days, weeks or months', () => {
      expect(formatEffortTotal(0.5)).toBe('4 hours');
      expect(formatEffortTotal(3.25)).toBe('3.3 days');
      expect(formatEffortTotal(10)).toBe('2.0 weeks');
      expect(formatEffortTotal(40)).toBe('2.0 months');
    });
  });
});
