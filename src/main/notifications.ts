import type { NotificationSink } from './platform/interface';

/**
 * Notification sink used when no UI toast surface is attached: messages go
 * to the main-process log.
 */
export const consoleNotifications: NotificationSink = {
  showError(message: string): void {
    console.warn(`[Toast] ${message}`);
  },
  showSuccess(message: string): void {
    console.log(`[Toast] ${message}`);
  },
};
