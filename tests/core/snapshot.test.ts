/**
 * Tests for installed-package snapshot parsing
 */

import { latestInstalled, parseInstalledQuery, versionString } from '../../src/core/snapshot.js';

const row = (...fields: string[]) => fields.join('_|-');

describe('Installed Snapshot', () => {
  describe('parseInstalledQuery', () => {
    it('should join version and release', () => {
      const text = [row('bash', '4.2.46', '34.el7', 'x86_64'), row('gpg-pubkey', 'f4a80eb5', '', '(none)')].join('\n');

      expect(parseInstalledQuery(text, { cpuArch: 'x86_64' })).toEqual({
        bash: '4.2.46-34.el7',
        'gpg-pubkey': 'f4a80eb5',
      });
    });

    it('should key 32-bit packages separately on x86_64', () => {
      const text = [
        row('glibc', '2.17', '317.el7', 'x86_64'),
        row('glibc', '2.17', '317.el7', 'i686'),
      ].join('\n');

      expect(parseInstalledQuery(text, { cpuArch: 'x86_64' })).toEqual({
        glibc: '2.17-317.el7',
        'glibc.i686': '2.17-317.el7',
      });
    });

    it('should not add the suffix on a 32-bit host', () => {
      const text = row('glibc', '2.17', '317.el7', 'i686');

      expect(parseInstalledQuery(text, { cpuArch: 'i686' })).toEqual({ glibc: '2.17-317.el7' });
    });

    it('should collect multiple installed versions in ascending order', () => {
      const text = [
        row('kernel', '3.10.0', '1160.el7', 'x86_64'),
        row('kernel', '3.10.0', '957.el7', 'x86_64'),
      ].join('\n');

      expect(parseInstalledQuery(text, { cpuArch: 'x86_64', versionsAsList: true })).toEqual({
        kernel: ['3.10.0-957.el7', '3.10.0-1160.el7'],
      });
      expect(parseInstalledQuery(text, { cpuArch: 'x86_64' })).toEqual({
        kernel: '3.10.0-957.el7,3.10.0-1160.el7',
      });
    });

    it('should skip rows with the wrong number of fields', () => {
      const text = ['', 'garbage', row('a', '1', '2'), row('vim', '7.4', '1.el7', 'x86_64')].join('\n');

      expect(parseInstalledQuery(text, { cpuArch: 'x86_64' })).toEqual({ vim: '7.4-1.el7' });
    });
  });

  describe('latestInstalled', () => {
    it('should take the last version of a list or joined string', () => {
      expect(latestInstalled(['1.0-1', '2.0-1'])).toBe('2.0-1');
      expect(latestInstalled('1.0-1,2.0-1')).toBe('2.0-1');
      expect(latestInstalled('1.0-1')).toBe('1.0-1');
      expect(latestInstalled(undefined)).toBeUndefined();
    });
  });

  describe('versionString', () => {
    it('should join list entries', () => {
      expect(versionString(['1', '2'])).toBe('1,2');
      expect(versionString(undefined)).toBe('');
    });
  });
});
