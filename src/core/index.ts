/**
 * Install workflow: Validator → Client (read) → Provisioner → Client (write)
 */

export { runInstall, buildNoticeContent } from './workflow.js';
export type { WorkflowDependencies, WorkflowResult, NotificationResults } from './workflow.js';
