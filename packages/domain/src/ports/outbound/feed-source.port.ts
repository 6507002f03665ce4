import type { Station } from '../../entities/station.js';
import type { FleetSnapshot } from '../../entities/fleet-snapshot.js';

export interface FeedSourcePort {
  /** Full station list; rejects when the feed is unreachable or malformed */
  loadStations(): Promise<Station[]>;
  /** One fully decoded vehicle snapshot; never a partial one */
  fetchSnapshot(): Promise<FleetSnapshot>;
}
