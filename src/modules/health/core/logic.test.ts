import { describe, it, expect } from 'vitest';

import { determineOverallStatus, evaluateReadiness, mapCheckResults } from './logic.js';
import { type HealthCheckResult } from './types.js';

describe('Health Core Logic', () => {
  describe('mapCheckResults', () => {
    it('returns values for fulfilled promises', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'fulfilled', value: { name: 'database', status: 'healthy' } },
        { status: 'fulfilled', value: { name: 'refresh', status: 'unhealthy', critical: false } },
      ];
      const result = mapCheckResults(input);
      expect(result).toEqual([
        { name: 'database', status: 'healthy' },
        { name: 'refresh', status: 'unhealthy', critical: false },
      ]);
    });

    it('maps rejected promises to critical unhealthy results', () => {
      const input: PromiseSettledResult<HealthCheckResult>[] = [
        { status: 'rejected', reason: new Error('Connection timed out') },
      ];
      const result = mapCheckResults(input);
      expect(result).toEqual([
        {
          name: 'unknown',
          status: 'unhealthy',
          message: 'Connection timed out',
          critical: true,
        },
      ]);
    });
  });

  describe('determineOverallStatus', () => {
    it('is degraded when only non-critical checks fail', () => {
      expect(
        determineOverallStatus([
          { name: 'database', status: 'healthy', critical: true },
          { name: 'refresh', status: 'unhealthy', critical: false },
        ])
      ).toBe('degraded');
    });

    it('treats checks without a critical flag as critical', () => {
      expect(determineOverallStatus([{ name: 'database', status: 'unhealthy' }])).toBe(
        'unhealthy'
      );
    });
  });

  describe('evaluateReadiness', () => {
    const timestamp = '2023-01-01T00:00:00Z';
    const uptime = 100;

    it('returns ok when all checks are healthy', () => {
      const checks: HealthCheckResult[] = [
        { name: 'database', status: 'healthy' },
        { name: 'refresh', status: 'healthy', critical: false },
      ];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result.status).toBe('ok');
      expect(result.checks).toEqual(checks);
    });

    it('returns unhealthy when a critical check is unhealthy', () => {
      const checks: HealthCheckResult[] = [
        { name: 'database', status: 'unhealthy', critical: true },
        { name: 'refresh', status: 'healthy', critical: false },
      ];

      const result = evaluateReadiness(checks, uptime, timestamp);

      expect(result.status).toBe('unhealthy');
    });

    it('includes version if provided', () => {
      const result = evaluateReadiness([], uptime, timestamp, '1.0.0');
      expect(result.version).toBe('1.0.0');
    });

    it('omits version when not provided', () => {
      const result = evaluateReadiness([], uptime, timestamp);
      expect(result).not.toHaveProperty('version');
    });
  });
});
