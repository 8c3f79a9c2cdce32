/**
 * Control-panel API client and wire types
 */

export { ControlPanelClient } from './client.js';
export type { ControlPanelClientOptions } from './client.js';
export {
  API_BASE_PATH,
  NOTICE_TYPE_DEFAULT,
  AppReadResponseSchema,
  AccountInfoResponseSchema,
} from './types.js';
export type { ServerInfo, AccountInfo, NotificationResult, FetchLike } from './types.js';
