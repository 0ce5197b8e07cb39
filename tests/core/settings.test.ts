/**
 * Tests for settings loading and flag coercion
 */

import { defaultSettings, isTrue, loadSettings } from '../../src/core/settings.js';

describe('Settings', () => {
  describe('isTrue', () => {
    it.each([true, 1, -2, '1', 'true', 'YES', ' on ', 'y'])('should treat %p as true', (value) => {
      expect(isTrue(value)).toBe(true);
    });

    it.each([false, 0, NaN, '', '0', 'false', 'no', 'off', null, undefined, {}])(
      'should treat %p as false',
      (value) => {
        expect(isTrue(value)).toBe(false);
      },
    );
  });

  describe('loadSettings', () => {
    it('should use defaults with an empty environment', () => {
      expect(loadSettings({})).toEqual(defaultSettings);
    });

    it('should read YUMKIT_* variables', () => {
      const settings = loadSettings({
        YUMKIT_VERBOSE: '1',
        YUMKIT_PRETTY_LOGS: 'false',
        YUMKIT_YUM_BIN: '/usr/bin/yum',
        YUMKIT_RPM_BIN: '/bin/rpm',
        YUMKIT_SUDO: 'yes',
        YUMKIT_VERSIONS_AS_LIST: 'on',
        YUMKIT_FAIL_ON_ERROR: 'true',
      });

      expect(settings).toEqual({
        verbose: true,
        prettyLogs: false,
        yumBin: '/usr/bin/yum',
        rpmBin: '/bin/rpm',
        sudo: true,
        versionsAsList: true,
        failOnError: true,
      });
    });

    it('should let explicit overrides win and skip undefined ones', () => {
      const settings = loadSettings({ YUMKIT_SUDO: '1', YUMKIT_VERBOSE: '1' }, { sudo: false, verbose: undefined });

      expect(settings.sudo).toBe(false);
      expect(settings.verbose).toBe(true);
    });
  });
});
