import { homedir, userInfo } from 'os';
import { MissingParameterError } from '../utils/errors.js';
import type { HostEnvironment, InstallRequest, InstallRequestInput } from './types.js';

export interface RequestOptions {
  uuid?: string;
  name?: string;
  token?: string;
}

/** Label printed for each field when it is missing */
const FIELD_LABELS: Record<keyof InstallRequest, string> = {
  uuid: '-i (app UUID)',
  appName: '-n (app name)',
  authToken: 'OPAL_TOKEN',
  apiBaseUrl: 'API_URL',
};

const FIELD_ORDER: (keyof InstallRequest)[] = ['uuid', 'appName', 'authToken', 'apiBaseUrl'];

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Collect request fields from CLI flags and the environment.
 * The token flag wins over OPAL_TOKEN.
 */
export function buildInstallRequest(options: RequestOptions, env: NodeJS.ProcessEnv): InstallRequestInput {
  const apiBaseUrl = present(env.API_URL)?.replace(/\/+$/, '');
  return {
    uuid: present(options.uuid),
    appName: present(options.name),
    authToken: present(options.token) ?? present(env.OPAL_TOKEN),
    apiBaseUrl: apiBaseUrl || undefined,
  };
}

/**
 * Fail fast unless every field is present. The error names all missing
 * fields, not just the first.
 */
export function validateInstallRequest(input: InstallRequestInput): InstallRequest {
  const uuid = present(input.uuid);
  const appName = present(input.appName);
  const authToken = present(input.authToken);
  const apiBaseUrl = present(input.apiBaseUrl);
  if (uuid && appName && authToken && apiBaseUrl) {
    return { uuid, appName, authToken, apiBaseUrl };
  }

  const missing = FIELD_ORDER.filter((field) => !present(input[field])).map(
    (field) => FIELD_LABELS[field]
  );
  throw MissingParameterError.fromMissing(missing);
}

export function captureHostEnvironment(env: NodeJS.ProcessEnv): HostEnvironment {
  return {
    user: present(env.USER) ?? userInfo().username,
    home: present(env.HOME) ?? homedir(),
    path: env.PATH ?? '/usr/local/bin:/usr/bin:/bin',
  };
}
