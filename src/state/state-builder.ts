/**
 * State Builder
 *
 * Rebuilds component state on startup by replaying the persisted
 * notification log. Each component folds back only the notifications it
 * produced; replay writes state directly and emits nothing.
 */

import { NotificationLog } from '../notifications/notification-log';
import { Notification } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';

export interface Restorable {
  /** Apply one committed notification without journaling or emitting. */
  restore(notification: Notification): void;
}

export function rebuildState(
  log: NotificationLog,
  components: readonly Restorable[],
  logger: StructuredLogger
): number {
  const notifications = log.all();

  for (const notification of notifications) {
    for (const component of components) {
      component.restore(notification);
    }
  }

  logger.info('state', 'State rebuilt from notification log', {
    replayed: notifications.length,
    headHash: log.headHash,
  });
  return notifications.length;
}
