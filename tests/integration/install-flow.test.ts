/**
 * End-to-end package operations against an in-process yum/rpm stand-in
 */

import { YumPackageManager } from '../../src/modules/packages/yum.js';
import { createMockContext, FakeRpmHost, type FakePackage } from '../mocks/index.js';

const pkg = (name: string, version: string, release: string, arch = 'x86_64'): FakePackage => ({
  name,
  version,
  release,
  arch,
});

const repository = [
  pkg('foo', '1.0', '1'),
  pkg('foo', '2.0', '1'),
  pkg('foo', '3.0', '1'),
  pkg('bar', '1.5', '2'),
  pkg('glibc', '2.17', '317.el7', 'i686'),
  pkg('bash', '4.2.46', '35.el7'),
];

describe('Install Flow Integration', () => {
  let host: FakeRpmHost;
  let yum: YumPackageManager;

  beforeEach(() => {
    host = new FakeRpmHost(
      [pkg('bash', '4.2.46', '34.el7'), pkg('foo', '1.0', '1')],
      repository,
    );
    yum = new YumPackageManager(createMockContext({ executor: host }));
  });

  it('should show the pinned version in the snapshot after install', async () => {
    const changes = await yum.install({ name: 'foo', version: '2.0-1' });

    expect(changes).toEqual({ foo: { old: '1.0-1', new: '2.0-1' } });
    expect((await yum.snapshot()).foo).toBe('2.0-1');
  });

  it('should install then downgrade back', async () => {
    await yum.install({ name: 'foo', version: '3.0-1' });
    const changes = await yum.install({ name: 'foo', version: '1.0-1' });

    expect(host.commands).toContain('yum -y downgrade "foo-1.0-1"');
    expect(changes).toEqual({ foo: { old: '3.0-1', new: '1.0-1' } });
  });

  it('should install a 32-bit compat package under its qualified name', async () => {
    const changes = await yum.install({ name: 'glibc.i686', version: '2.17-317.el7' });

    expect(host.commands).toContain('yum -y install "glibc-2.17-317.el7.i686"');
    expect(changes).toEqual({ 'glibc.i686': { old: '', new: '2.17-317.el7' } });
  });

  it('should leave the snapshot unchanged when the tool fails', async () => {
    const changes = await yum.install({ name: 'missing' });

    expect(changes).toEqual({});
    expect(await yum.installedVersion('missing')).toBe('');
  });

  it('should report what an upgrade changed and list nothing afterwards', async () => {
    expect(await yum.listUpgrades()).toEqual({ bash: '4.2.46-35.el7', foo: '3.0-1' });

    const changes = await yum.upgrade();

    expect(changes).toEqual({
      bash: { old: '4.2.46-34.el7', new: '4.2.46-35.el7' },
      foo: { old: '1.0-1', new: '3.0-1' },
    });
    expect(await yum.upgrade()).toEqual({});
    expect(await yum.listUpgrades()).toEqual({});
  });

  it('should remove a package and report it', async () => {
    await yum.install({ pkgs: ['bar'] });

    expect(await yum.remove('bar')).toEqual(['bar']);
    expect(await yum.remove('bar')).toEqual([]);
  });

  it('should find available versions for packages not at the newest', async () => {
    expect(await yum.latestVersions(['foo', 'bar', 'nothing'])).toEqual({
      foo: '3.0-1',
      bar: '1.5-2',
      nothing: '',
    });
    expect(await yum.isUpgradeAvailable('foo')).toBe(true);
  });
});
