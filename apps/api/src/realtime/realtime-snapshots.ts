import type {
  GeoPoint,
  NotificationLogPort,
  NotificationRecord,
  RealtimeCounts,
  UserDirectoryPort,
  VehicleRegistryPort,
  VehicleSummary,
} from '@transit-pulse/domain';
import { toVehicleSummary } from '@transit-pulse/domain';

const NOTIFICATION_HISTORY_LIMIT = 20;

/** Current-state reads sent to a client right after it connects. */
export class RealtimeSnapshots {
  constructor(
    private readonly vehicles: VehicleRegistryPort,
    private readonly users: UserDirectoryPort,
    private readonly notifications: NotificationLogPort,
  ) {}

  async vehicleLocation(vehicleId: string): Promise<GeoPoint | null> {
    const vehicle = await this.vehicles.findById(vehicleId);
    return vehicle?.location ?? null;
  }

  async fleetVehicles(fleetId: string): Promise<VehicleSummary[]> {
    const vehicles = await this.vehicles.listByFleet(fleetId, { status: ['available'], withLocation: true });
    return vehicles.map(toVehicleSummary);
  }

  recentNotifications(userId: string, limit = NOTIFICATION_HISTORY_LIMIT): Promise<NotificationRecord[]> {
    return this.notifications.listByUser(userId, limit);
  }

  async counts(): Promise<RealtimeCounts> {
    const [vehicles, totalUsers] = await Promise.all([this.vehicles.counts(), this.users.count()]);
    return { totalVehicles: vehicles.total, availableVehicles: vehicles.available, totalUsers };
  }
}
