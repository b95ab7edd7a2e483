import type { CommandOutcome, Notification, NotificationLevel } from '../src/types';

const ICON: Record<NotificationLevel, string> = {
    success: '✅',
    info: 'ℹ️',
    warning: '⚠️',
    error: '❌'
};

export const EXIT_CODES: Record<CommandOutcome, number> = {
    succeeded: 0,
    failed: 1,
    cancelled: 2
};

export function formatNotification(notification: Notification): string {
    return `${ICON[notification.level]} ${notification.title}\n${notification.message}`;
}

export function notify(notification: Notification, write: (text: string) => void = text => console.log(text)): void {
    write(formatNotification(notification));
}
