/**
 * Tests for diffing installed-package snapshots
 */

import { diffChanges, diffRemoved } from '../../src/core/state-comparison.js';

describe('Snapshot Diff', () => {
  const base = { bash: '4.2.46-34.el7', vim: '7.4-1.el7', kernel: ['3.10.0-957', '3.10.0-1160'] };

  describe('diffChanges', () => {
    it('should be empty for identical snapshots', () => {
      expect(diffChanges(base, base)).toEqual({});
      expect(diffChanges(base, { ...base, kernel: ['3.10.0-957', '3.10.0-1160'] })).toEqual({});
    });

    it('should report a new package with an empty old version', () => {
      const after = { ...base, git: '1.8.3-23' };

      expect(diffChanges(base, after)).toEqual({ git: { old: '', new: '1.8.3-23' } });
      expect(diffRemoved(base, after)).toEqual([]);
    });

    it('should report a version change', () => {
      const after = { ...base, vim: '7.4-2.el7' };

      expect(diffChanges(base, after)).toEqual({ vim: { old: '7.4-1.el7', new: '7.4-2.el7' } });
    });

    it('should report a new kernel alongside the old ones', () => {
      const after = { ...base, kernel: ['3.10.0-957', '3.10.0-1160', '3.10.0-1062'] };

      expect(diffChanges(base, after)).toEqual({
        kernel: { old: '3.10.0-957,3.10.0-1160', new: '3.10.0-957,3.10.0-1160,3.10.0-1062' },
      });
    });

    it('should not mention removed packages', () => {
      const { vim: _vim, ...after } = base;

      expect(diffChanges(base, after)).toEqual({});
    });
  });

  describe('diffRemoved', () => {
    it('should list removed names in the order of the first snapshot', () => {
      expect(diffRemoved(base, { vim: '7.4-1.el7' })).toEqual(['bash', 'kernel']);
    });

    it('should report a removed package', () => {
      const { vim: _vim, ...after } = base;

      expect(diffRemoved(base, after)).toEqual(['vim']);
    });

    it('should treat architecture-qualified names as separate keys', () => {
      expect(diffRemoved({ glibc: '2.17', 'glibc.i686': '2.17' }, { glibc: '2.17' })).toEqual([
        'glibc.i686',
      ]);
    });
  });
});
