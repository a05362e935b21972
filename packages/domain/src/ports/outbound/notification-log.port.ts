import type { NotificationRecord } from '../../entities/notification-record.js';

export interface RecentNotificationQuery {
  userId: string;
  vehicleId: string;
  since: Date;
  /** Restrict to successfully dispatched notifications. */
  successOnly?: boolean;
}

export interface NotificationLogPort {
  append(record: NotificationRecord): Promise<void>;
  findRecent(query: RecentNotificationQuery): Promise<NotificationRecord | null>;
  listByUser(userId: string, limit: number): Promise<NotificationRecord[]>;
}
