/**
 * End-to-end workflow tests against a fake control panel and scripted toolchains
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildNoticeContent, runInstall } from './workflow.js';
import type { WorkflowDependencies } from './workflow.js';
import type { HostEnvironment, InstallRequestInput } from '../config/types.js';
import { HugoProvisioner } from '../provisioners/hugo.js';
import { JekyllDockerProvisioner } from '../provisioners/jekyll-docker.js';
import { JekyllNativeProvisioner } from '../provisioners/jekyll-native.js';
import { FakeCommandRunner, FakeControlPanel } from '../testing/fake-runner.js';
import { ApiCallFailedError, MissingParameterError, ProvisioningFailedError } from '../utils/errors.js';

describe('runInstall', () => {
  let home: string;
  let host: HostEnvironment;
  let panel: FakeControlPanel;
  let runner: FakeCommandRunner;
  let deps: WorkflowDependencies;
  let input: InstallRequestInput;
  const now = new Date(2026, 9, 18, 9, 15, 0);

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'workflow-test-'));
    host = { user: 'alice', home, path: '/usr/bin:/bin' };
    panel = new FakeControlPanel();
    runner = new FakeCommandRunner();
    deps = {
      fetch: panel.fetch,
      runner,
      download: async (_url, destination) => fs.writeFile(destination, 'tarball'),
      now: () => now,
      random: () => 0,
    };
    input = {
      uuid: 'app-uuid-1',
      appName: 'myblog',
      authToken: 'test-secret',
      apiBaseUrl: panel.baseUrl,
    };
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(home, { recursive: true, force: true });
  });

  describe('parameter validation', () => {
    const missingCases: [string, InstallRequestInput][] = [
      ['uuid', { uuid: undefined }],
      ['appName', { appName: '' }],
      ['authToken', { authToken: undefined }],
      ['apiBaseUrl', { apiBaseUrl: '' }],
    ];

    it.each(missingCases)('aborts without network calls or writes when %s is missing', async (_field, override) => {
      await expect(
        runInstall({ ...input, ...override }, host, new HugoProvisioner(), deps)
      ).rejects.toBeInstanceOf(MissingParameterError);

      expect(panel.requests).toHaveLength(0);
      expect(runner.calls).toHaveLength(0);
      await expect(fs.readdir(home)).resolves.toEqual([]);
    });
  });

  describe('control panel lookups', () => {
    it('aborts before provisioning when the app lookup fails', async () => {
      panel.route('GET /app/read/app-uuid-1', { status: 404, json: { detail: 'Not found.' } });

      await expect(runInstall(input, host, new HugoProvisioner(), deps)).rejects.toBeInstanceOf(ApiCallFailedError);

      expect(runner.calls).toHaveLength(0);
      expect(panel.requests.map((r) => r.url)).toEqual(['https://panel.test/api/v1/app/read/app-uuid-1']);
    });

    it('aborts before provisioning when the account lookup fails', async () => {
      panel.route('GET /account/info/', { status: 401, json: { detail: 'Invalid token.' } });

      await expect(runInstall(input, host, new HugoProvisioner(), deps)).rejects.toThrow('Admin email lookup failed.');
      expect(runner.calls).toHaveLength(0);
      expect(panel.requestsTo('/app/installed/')).toHaveLength(0);
    });
  });

  it('appends a start line to the install log on every run', async () => {
    await runInstall(input, host, new JekyllDockerProvisioner(), deps);
    await runInstall(input, host, new JekyllDockerProvisioner(), deps);

    const log = await fs.readFile(path.join(home, 'logs', 'apps', 'myblog', 'install.log'), 'utf-8');
    expect(log).toBe('Started at 2026-10-18 09:15:00\nStarted at 2026-10-18 09:15:00\n');
  });

  describe('Hugo scenario', () => {
    beforeEach(() => {
      runner
        .on('hugo', async (spec) => {
          await fs.mkdir(path.join(spec.cwd ?? '', 'public'), { recursive: true });
          await fs.writeFile(path.join(spec.cwd ?? '', 'public', 'index.html'), '<html></html>');
        })
        .on('tar', () => fs.mkdir(path.join(home, 'go', 'bin'), { recursive: true }).then(() => undefined))
        .on('go install', () => fs.writeFile(path.join(home, '.gopath', 'bin', 'hugo'), 'binary'))
        .on('hugo version', () => undefined)
        .on('hugo new site', (spec) =>
          fs.mkdir(path.join(spec.cwd ?? '', 'demo-site'), { recursive: true }).then(() => undefined)
        )
        .on('hugo new posts/', () => undefined)
        .on('git init', () => undefined)
        .on('git submodule add', (spec) =>
          fs.mkdir(path.join(spec.cwd ?? '', 'themes', 'ananke'), { recursive: true }).then(() => undefined)
        );
    });

    it('produces the themed demo site and reports it', async () => {
      const result = await runInstall(input, host, new HugoProvisioner(), deps);
      const siteDir = path.join(home, 'apps', 'myblog', 'demo-site');

      await expect(fs.stat(path.join(siteDir, 'themes', 'ananke'))).resolves.toBeDefined();
      const config = await fs.readFile(path.join(siteDir, 'config.toml'), 'utf-8');
      expect(config.split('\n')).toContain('theme = "ananke"');
      await expect(fs.stat(path.join(siteDir, 'public', 'index.html'))).resolves.toBeDefined();

      expect(result.server).toEqual({ serverId: 's1' });
      expect(result.account).toEqual({ email: 'a@x.com' });
      expect(result.noticeContent).toBe(
        'Created Hugo demo site myblog on server s1 with Admin: alice and email: a@x.com'
      );
      expect(panel.requestsTo('/notice/create/')[0].body).toEqual([
        { type: 'D', content: 'Created Hugo demo site myblog on server s1 with Admin: alice and email: a@x.com' },
      ]);
    });

    it('sends no notifications when the build fails', async () => {
      runner.on('hugo', (spec) => (spec.args === undefined ? { exitCode: 255 } : undefined));
      await fs.mkdir(path.join(home, 'apps', 'myblog', 'demo-site', 'themes', 'ananke'), { recursive: true });

      await expect(runInstall(input, host, new HugoProvisioner(), deps)).rejects.toBeInstanceOf(
        ProvisioningFailedError
      );
      expect(panel.requestsTo('/app/installed/')).toHaveLength(0);
      expect(panel.requestsTo('/notice/create/')).toHaveLength(0);
    });
  });

  describe('Jekyll container scenario', () => {
    it('builds through a disposable container and reports a Jekyll app', async () => {
      const result = await runInstall(input, host, new JekyllDockerProvisioner(), deps);
      const appDir = path.join(home, 'apps', 'myblog');

      expect(runner.commandLines()).toContain(
        `docker run --rm -v ${path.join(appDir, 'demo-site')}:/srv/jekyll jekyll/jekyll:latest jekyll build`
      );
      expect(result.noticeContent).toContain('Created Jekyll app');
      expect(result.provision.siteDir).toBe(path.join(appDir, 'demo-site'));
    });
  });

  describe('Jekyll native scenario', () => {
    beforeEach(() => {
      runner
        .on('ruby', () => ({ stdout: '/home/alice/.gem/ruby/3.2.0' }))
        .on('crontab -l', () => ({ exitCode: 1 }))
        .on('jekyll new', (spec) =>
          fs.mkdir(path.join(spec.cwd ?? '', 'demo-site'), { recursive: true }).then(() => undefined)
        );
    });

    it("writes today's welcome post and reports a Jekyll demo site", async () => {
      const result = await runInstall(input, host, new JekyllNativeProvisioner(), deps);

      const post = await fs.readFile(
        path.join(home, 'apps', 'myblog', 'demo-site', '_posts', '2026-10-18-welcome-to-jekyll.md'),
        'utf-8'
      );
      expect(post).toContain("Let's get jek yas!");
      expect(result.noticeContent).toContain('Created Jekyll demo site');
    });

    it('still notifies exactly once each when the crontab cannot be written', async () => {
      runner.on('crontab /', () => ({ exitCode: 1, stderr: 'crontab: not allowed' }));

      const result = await runInstall(input, host, new JekyllNativeProvisioner(), deps);

      expect(result.provision.steps.find((s) => s.step === 'cron job')?.status).toBe('failed');
      expect(result.notifications).toEqual({
        installed: { ok: true, status: 200 },
        notice: { ok: true, status: 200 },
      });
      expect(panel.requestsTo('/app/installed/')).toHaveLength(1);
      expect(panel.requestsTo('/notice/create/')).toHaveLength(1);
    });

    it('still notifies exactly once each when the build fails', async () => {
      runner.on('bundle exec jekyll build', () => ({ exitCode: 1 }));

      const result = await runInstall(input, host, new JekyllNativeProvisioner(), deps);

      expect(result.provision.build).toEqual({ ok: false, exitCode: 1 });
      expect(result.notifications.installed).toEqual({ ok: true, status: 200 });
      expect(panel.requestsTo('/app/installed/')).toHaveLength(1);
      expect(panel.requestsTo('/app/installed/')[0].body).toEqual([{ id: 'app-uuid-1' }]);
      expect(panel.requestsTo('/notice/create/')).toHaveLength(1);
    });
  });

  it('completes even when both notifications fail', async () => {
    panel.route('POST /app/installed/', { status: 500, text: 'down' });
    panel.route('POST /notice/create/', { networkError: 'connection reset' });

    const result = await runInstall(input, host, new JekyllDockerProvisioner(), deps);

    expect(result.notifications).toEqual({
      installed: { ok: false, status: 500 },
      notice: { ok: false, error: 'connection reset' },
    });
  });

  it('makes the second run a no-op for scaffold and demo content', async () => {
    await runInstall(input, host, new JekyllDockerProvisioner(), deps);
    const second = await runInstall(input, host, new JekyllDockerProvisioner(), deps);

    expect(second.provision.steps.map((s) => s.status)).toEqual(['skipped', 'skipped']);
    expect(panel.requestsTo('/notice/create/')).toHaveLength(2);
  });
});

describe('buildNoticeContent', () => {
  it('names the app, server, admin and email', () => {
    expect(
      buildNoticeContent('Created Jekyll app', 'blog', 'alice', { serverId: 'web7' }, { email: 'alice@example.com' })
    ).toBe('Created Jekyll app blog on server web7 with Admin: alice and email: alice@example.com');
  });
});
