import type { CorrectedPosition } from '../../entities/telemetry-reading.js';
import type { VehicleSummary } from '../../entities/vehicle.js';
import type { NotificationRecord } from '../../entities/notification-record.js';
import type { EtaEstimate } from '../../entities/eta.js';

export interface RealtimeCounts {
  totalVehicles: number;
  availableVehicles: number;
  totalUsers: number;
}

export interface RealtimePublisherPort {
  publishVehicleLocation(vehicleId: string, position: CorrectedPosition): void;
  publishFleetVehicles(fleetId: string, vehicles: VehicleSummary[]): void;
  publishNotification(userId: string, record: NotificationRecord): void;
  publishEta(vehicleId: string, eta: EtaEstimate): void;
  publishCounts(counts: RealtimeCounts): void;
}
