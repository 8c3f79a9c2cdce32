/**
 * Install request assembly and validation
 */

export type { InstallRequest, InstallRequestInput, HostEnvironment } from './types.js';
export {
  buildInstallRequest,
  validateInstallRequest,
  captureHostEnvironment,
} from './request.js';
export type { RequestOptions } from './request.js';
