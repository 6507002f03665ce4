import type { TrackedVehicle } from '../entities/vehicle-observation.js';

/** Vehicle id → last at-rest sample. Mutated only by the tracker's reconciliation pass. */
export class FleetState {
  private readonly vehicles = new Map<string, TrackedVehicle>();

  get(vehicleId: string): TrackedVehicle | undefined {
    return this.vehicles.get(vehicleId);
  }

  has(vehicleId: string): boolean {
    return this.vehicles.has(vehicleId);
  }

  set(vehicle: TrackedVehicle): void {
    this.vehicles.set(vehicle.id, vehicle);
  }

  get size(): number {
    return this.vehicles.size;
  }

  /** Copy of all entries in first-tracked order */
  snapshot(): TrackedVehicle[] {
    return [...this.vehicles.values()];
  }
}
