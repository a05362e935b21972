export type NotificationKind = 'proximity';

export interface NotificationRecord {
  readonly userId: string;
  readonly vehicleId: string;
  readonly ts: Date;
  readonly success: boolean;
  readonly distanceMeters: number;
  readonly kind: NotificationKind;
  readonly message?: string;
}
