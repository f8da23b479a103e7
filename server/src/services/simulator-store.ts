import type {
  AcquisitionMetadata,
  CommandState,
  CommandTransition,
  GroundStation,
  ProductMetadata,
  RequestProfile,
  Satellite,
} from '@satsim/shared';

// ─── Types ───────────────────────────────────────────────────────────────────

/** Mutable server-side command entity. API callers only ever see snapshots. */
export interface CommandRecord {
  id: string;
  satelliteId: string;
  missionName: string;
  aoiName: string;
  width: number;
  height: number;
  cloudPercent: number;
  failProbability: number;
  requestProfile: RequestProfile;
  state: CommandState;
  message: string | null;
  imagePath: string | null;
  acquisitionMetadata: AcquisitionMetadata | null;
  productMetadata: ProductMetadata | null;
  createdAt: Date;
  updatedAt: Date;
  transitions: CommandTransition[];
}

export interface SimulatorState {
  satellites: Map<string, Satellite>;
  groundStations: Map<string, GroundStation>;
  commands: Map<string, CommandRecord>;
}

// ─── Store ───────────────────────────────────────────────────────────────────

/**
 * Owns the three keyed collections and the single exclusive region that
 * guards them. The region is synchronous: callers inspect or mutate state
 * and leave, so nothing is ever held across a sleep, fetch or disk call.
 */
export class SimulatorStore {
  private readonly state: SimulatorState = {
    satellites: new Map(),
    groundStations: new Map(),
    commands: new Map(),
  };

  private locked = false;

  withLock<T>(fn: (state: SimulatorState) => T): T {
    if (this.locked) {
      throw new Error('simulator store lock is not re-entrant');
    }
    this.locked = true;
    try {
      const result = fn(this.state);
      if (isPromiseLike(result)) {
        throw new Error('simulator store lock cannot be held across an await');
      }
      return result;
    } finally {
      this.locked = false;
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}
