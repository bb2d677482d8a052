export { NotificationDispatcher, CHECK_MESSAGE } from './NotificationDispatcher.js';
export {
  formatNotification,
  formatMessageText,
  buildMessageLink,
  formatTimestamp,
  formatDuration,
} from './formatter.js';
export type { DispatchResult, DispatchPlan, PayloadOptions } from './types.js';
