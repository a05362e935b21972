import type {
  CorrectedPosition,
  EtaEstimate,
  GeoPoint,
  NotificationRecord,
  RealtimeCounts,
  RealtimePublisherPort,
  VehicleSummary,
} from '@transit-pulse/domain';
import { toEtaResponse, type EtaResponse } from '../services/eta/eta-response.js';
import type { BroadcastHub } from './broadcast-hub.js';
import { topicKeys } from './channels.js';

export interface NotificationMessage {
  user_id: string;
  vehicle_id: string;
  distance: number;
  timestamp: string;
  notification_type: string;
  success: boolean;
  message?: string;
}

export interface CountsMessage {
  total_vehicles: number;
  available_vehicles: number;
  total_users: number;
}

export type RealtimeMessage =
  | { type: 'location_changed'; vehicleId: string; data: { latitude: number; longitude: number; snapped: boolean } }
  | { type: 'location_snapshot'; vehicleId: string; data: GeoPoint | null }
  | { type: 'eta_update'; vehicleId: string; data: EtaResponse }
  | { type: 'connected'; channel: string; message: string }
  | { type: 'vehicle_list'; fleetId: string; data: VehicleSummary[] }
  | { type: 'notification'; data: NotificationMessage }
  | { type: 'notification_history'; data: NotificationMessage[] }
  | { type: 'stats'; data: CountsMessage };

export function toNotificationMessage(record: NotificationRecord): NotificationMessage {
  return {
    user_id: record.userId,
    vehicle_id: record.vehicleId,
    distance: Math.round(record.distanceMeters * 100) / 100,
    timestamp: record.ts.toISOString(),
    notification_type: record.kind,
    success: record.success,
    message: record.message,
  };
}

export function toCountsMessage(counts: RealtimeCounts): CountsMessage {
  return {
    total_vehicles: counts.totalVehicles,
    available_vehicles: counts.availableVehicles,
    total_users: counts.totalUsers,
  };
}

/** RealtimePublisherPort over the hub; knows topic keys and wire shapes. */
export class HubPublisher implements RealtimePublisherPort {
  constructor(private readonly hub: BroadcastHub) {}

  private send(message: RealtimeMessage, key: string): void {
    this.hub.publish(message, key);
  }

  publishVehicleLocation(vehicleId: string, position: CorrectedPosition): void {
    this.send(
      {
        type: 'location_changed',
        vehicleId,
        data: { latitude: position.latitude, longitude: position.longitude, snapped: position.snapped },
      },
      topicKeys.vehicleLocation(vehicleId),
    );
  }

  publishFleetVehicles(fleetId: string, vehicles: VehicleSummary[]): void {
    this.send({ type: 'vehicle_list', fleetId, data: vehicles }, topicKeys.fleetVehicles(fleetId));
  }

  publishNotification(userId: string, record: NotificationRecord): void {
    this.send({ type: 'notification', data: toNotificationMessage(record) }, topicKeys.userNotifications(userId));
  }

  publishEta(vehicleId: string, eta: EtaEstimate): void {
    this.send({ type: 'eta_update', vehicleId, data: toEtaResponse(eta) }, topicKeys.vehicleEta(vehicleId));
  }

  publishCounts(counts: RealtimeCounts): void {
    this.send({ type: 'stats', data: toCountsMessage(counts) }, topicKeys.stats());
  }
}
