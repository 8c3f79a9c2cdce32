/**
 * Invocation-scoped configuration, built once at process start
 */

export interface InstallRequest {
  uuid: string;
  appName: string;
  authToken: string;
  apiBaseUrl: string;
}

export interface HostEnvironment {
  user: string;
  home: string;
  /** PATH inherited by the installer; provisioners prepend to it */
  path: string;
}

/** Raw values before validation; any of them may be absent */
export type InstallRequestInput = {
  [K in keyof InstallRequest]?: string;
};
