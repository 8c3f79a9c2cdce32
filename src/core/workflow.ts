import { ControlPanelClient } from '../api/index.js';
import type { AccountInfo, FetchLike, NotificationResult, ServerInfo } from '../api/index.js';
import { validateInstallRequest } from '../config/request.js';
import type { HostEnvironment, InstallRequestInput } from '../config/types.js';
import type { Provisioner, ProvisionOutcome, Downloader, StepStatus } from '../provisioners/types.js';
import { downloadToFile } from '../utils/download.js';
import { ExecaCommandRunner } from '../utils/exec.js';
import type { CommandRunner } from '../utils/exec.js';
import { recordInstallStart } from '../utils/install-log.js';
import { getLogger } from '../utils/logger.js';

export interface WorkflowDependencies {
  fetch?: FetchLike;
  runner?: CommandRunner;
  download?: Downloader;
  now?: () => Date;
  random?: () => number;
}

export interface NotificationResults {
  installed: NotificationResult;
  notice: NotificationResult;
}

/**
 * Everything the run produced. `provision.build` and `notifications` are
 * reported but never turn a completed run into a failure.
 */
export interface WorkflowResult {
  server: ServerInfo;
  account: AccountInfo;
  provision: ProvisionOutcome;
  notifications: NotificationResults;
  noticeContent: string;
  installLog: string;
}

export function buildNoticeContent(
  lead: string,
  appName: string,
  user: string,
  server: ServerInfo,
  account: AccountInfo
): string {
  return `${lead} ${appName} on server ${server.serverId} with Admin: ${user} and email: ${account.email}`;
}

export async function runInstall(
  input: InstallRequestInput,
  host: HostEnvironment,
  provisioner: Provisioner,
  deps: WorkflowDependencies = {}
): Promise<WorkflowResult> {
  const logger = getLogger();

  // nothing touches the network or disk before this passes
  const request = validateInstallRequest(input);
  const now = (deps.now ?? (() => new Date()))();

  const installLog = await recordInstallStart(host.home, request.appName, now);
  logger.info(`Started ${provisioner.id} install of ${request.appName}`);

  const client = new ControlPanelClient({
    apiBaseUrl: request.apiBaseUrl,
    authToken: request.authToken,
    fetch: deps.fetch,
  });

  logger.phaseStart('control panel lookup');
  const server = await client.lookupApp(request.uuid);
  const account = await client.lookupAccount();

  logger.phaseStart('provisioning');
  const provision = await provisioner.provision({
    request,
    host,
    runner: deps.runner ?? new ExecaCommandRunner(),
    download: deps.download ?? ((url, destination) => downloadToFile(url, destination)),
    now,
    random: deps.random ?? Math.random,
  });

  if (!provision.build.ok) {
    logger.warn(
      `Site build exited with code ${provision.build.exitCode}; reporting the install as complete anyway.`
    );
  }

  logger.phaseStart('notifications');
  const noticeContent = buildNoticeContent(
    provisioner.noticeLead,
    request.appName,
    host.user,
    server,
    account
  );
  const installed = await client.markInstalled(request.uuid);
  const notice = await client.createNotice(noticeContent);

  const count = (status: StepStatus): number => provision.steps.filter((s) => s.status === status).length;
  const failed = count('failed');
  logger.phaseComplete(
    'Install',
    `${request.appName} (${count('created')} created, ${count('skipped')} skipped${
      failed > 0 ? `, ${failed} failed` : ''
    })`
  );

  return {
    server,
    account,
    provision,
    notifications: { installed, notice },
    noticeContent,
    installLog,
  };
}
