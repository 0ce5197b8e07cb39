/**
 * Tests for the lenient package listing parser
 */

import { parseListing, recordsToVersions, stripArch } from '../../src/core/listing-parser.js';

describe('Listing Parser', () => {
  describe('parseListing', () => {
    it('should parse a row and skip the plugin notice', () => {
      const records = parseListing('foo.x86_64  1.2.3  installed\nLoaded plugins: fastestmirror\n');

      expect(records).toEqual([{ name: 'foo', version: '1.2.3', status: 'installed' }]);
    });

    it('should skip headers, blank lines and rows of other shapes', () => {
      const text = [
        'Available Packages',
        '',
        'bash.x86_64                 4.2.46-34.el7           base',
        'Obsoleting Packages',
        'python-libs.x86_64          2.7.5-90.el7    updates   extra',
        'kernel-headers.x86_64',
        '    3.10.0-1160.el7   base',
      ].join('\n');

      expect(parseListing(text)).toEqual([
        { name: 'bash', version: '4.2.46-34.el7', status: 'base' },
      ]);
    });

    it('should keep everything before the last dot as the name', () => {
      expect(parseListing('python3.9-libs.i686 3.9.1-1 epel')).toEqual([
        { name: 'python3.9-libs', version: '3.9.1-1', status: 'epel' },
      ]);
    });

    it('should accept Windows line endings', () => {
      expect(parseListing('vim.x86_64 8.0-1 base\r\n')).toEqual([
        { name: 'vim', version: '8.0-1', status: 'base' },
      ]);
    });

    it('should return nothing for empty output', () => {
      expect(parseListing('')).toEqual([]);
    });
  });

  describe('stripArch', () => {
    it('should leave a token without a dot unchanged', () => {
      expect(stripArch('foo')).toBe('foo');
    });
  });

  describe('recordsToVersions', () => {
    it('should keep the last version seen for a name', () => {
      expect(
        recordsToVersions([
          { name: 'git', version: '1.8.3-1', status: 'base' },
          { name: 'git', version: '1.8.3-23', status: 'updates' },
          { name: 'curl', version: '7.29.0-59', status: 'base' },
        ]),
      ).toEqual({ git: '1.8.3-23', curl: '7.29.0-59' });
    });
  });
});
