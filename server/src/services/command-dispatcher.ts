import {
  CommandState,
  GroundStationStatus,
  type ClearImagesResult,
  type CommandStatus,
  type RequestProfile,
  type SaveLocalResult,
} from '@satsim/shared';
import path from 'path';
import type { CommandPipeline } from './command-pipeline.js';
import { IN_PROGRESS_STATES, transitionCommand } from './command-state.js';
import { toCommandStatus } from './command-status.js';
import type { ImageStore } from './image-store.js';
import { buildExternalMapImage, type TileSource } from './map-tiles.js';
import { encodePng } from './raster.js';
import { shortId } from './registry.js';
import type { ExternalMapPreviewQuery, UplinkRequest } from './request-schemas.js';
import type { CommandRecord, SimulatorState, SimulatorStore } from './simulator-store.js';
import type { TaskSupervisor } from './task-supervisor.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type DispatchErrorCode = 'NOT_FOUND' | 'CONFLICT';

export type DispatchResult<T> =
  | { success: true; data: T }
  | { success: false; code: DispatchErrorCode; error: string };

export interface CommandDispatcherDeps {
  store: SimulatorStore;
  images: ImageStore;
  tiles: TileSource;
  pipeline: CommandPipeline;
  supervisor: TaskSupervisor;
  onUpdate?: (commandId: string) => void;
}

export const DISPATCH_MESSAGES = {
  accepted: 'uplink command accepted',
  groundStationNotFound: 'ground station not found',
  groundStationNotOperational: 'ground station is not operational',
  commandNotFound: 'command not found',
  alreadyInProgress: 'command is already in progress',
  onlyFailedRerun: 'only FAILED commands can be rerun',
  rerunRequested: 're-run requested by operator',
  imageNotReady: 'image is not ready',
  imageFileNotFound: 'image file not found',
  imageSaved: 'image is saved in the local image directory',
  imageCleared: 'image cleared by operator',
  imagesCleared: 'all generated images were cleared',
} as const;

function ok<T>(data: T): DispatchResult<T> {
  return { success: true, data };
}

function notFound<T>(error: string): DispatchResult<T> {
  return { success: false, code: 'NOT_FOUND', error };
}

function conflict<T>(error: string): DispatchResult<T> {
  return { success: false, code: 'CONFLICT', error };
}

type ReadyImage = DispatchResult<{ imagePath: string }>;

// ─── Dispatcher ──────────────────────────────────────────────────────────────

/**
 * Entry point for every command operation the API exposes. Reads and writes
 * go through the store lock; artifact I/O and task spawning happen after the
 * lock is released.
 */
export class CommandDispatcher {
  private readonly store: SimulatorStore;
  private readonly images: ImageStore;
  private readonly tiles: TileSource;
  private readonly pipeline: CommandPipeline;
  private readonly supervisor: TaskSupervisor;
  private readonly onUpdate?: (commandId: string) => void;

  constructor(deps: CommandDispatcherDeps) {
    this.store = deps.store;
    this.images = deps.images;
    this.tiles = deps.tiles;
    this.pipeline = deps.pipeline;
    this.supervisor = deps.supervisor;
    this.onUpdate = deps.onUpdate;
  }

  // ── Submission ───────────────────────────────────────────────────────────

  submit(request: UplinkRequest): CommandStatus {
    const { status, spawn } = this.store.withLock(state => {
      const now = new Date();
      let fault: string | null = null;

      const station = request.groundStationId ? state.groundStations.get(request.groundStationId) : undefined;
      if (request.groundStationId) {
        if (!station) fault = DISPATCH_MESSAGES.groundStationNotFound;
        else if (station.status !== GroundStationStatus.OPERATIONAL) fault = DISPATCH_MESSAGES.groundStationNotOperational;
      }

      const initialState = fault ? CommandState.FAILED : CommandState.QUEUED;
      const message = fault ?? DISPATCH_MESSAGES.accepted;
      const command: CommandRecord = {
        id: shortId('cmd', 10),
        satelliteId: request.satelliteId,
        missionName: request.missionName,
        aoiName: request.aoiName,
        width: request.width,
        height: request.height,
        cloudPercent: request.cloudPercent,
        failProbability: request.failProbability,
        requestProfile: buildRequestProfile(request, station ? { ...station } : null),
        state: initialState,
        message,
        imagePath: null,
        acquisitionMetadata: null,
        productMetadata: null,
        createdAt: now,
        updatedAt: now,
        transitions: [{ state: initialState, message, at: now.toISOString() }],
      };
      state.commands.set(command.id, command);

      return { status: snapshot(state, command), spawn: fault === null };
    });

    this.notify(status.id);
    if (spawn) {
      this.supervisor.spawn(`pipeline:${status.id}`, () => this.pipeline.run(status.id));
      console.log(`[DISPATCH] ${status.id} accepted for ${status.satelliteId} (${status.missionName})`);
    } else {
      console.warn(`[DISPATCH] ${status.id} rejected: ${status.message}`);
    }
    return status;
  }

  async rerun(commandId: string): Promise<DispatchResult<CommandStatus>> {
    const outcome = this.store.withLock((state): DispatchResult<CommandStatus> => {
      const command = state.commands.get(commandId);
      if (!command) return notFound(DISPATCH_MESSAGES.commandNotFound);
      if (IN_PROGRESS_STATES.includes(command.state)) return conflict(DISPATCH_MESSAGES.alreadyInProgress);
      if (command.state !== CommandState.FAILED) return conflict(DISPATCH_MESSAGES.onlyFailedRerun);

      transitionCommand(command, CommandState.QUEUED, DISPATCH_MESSAGES.rerunRequested);
      command.imagePath = null;
      command.acquisitionMetadata = null;
      command.productMetadata = null;
      return ok(snapshot(state, command));
    });
    if (!outcome.success) return outcome;

    // A post-capture failure can leave a written artifact behind. The command
    // is already QUEUED, so the pipeline must be spawned whatever happens here.
    try {
      await this.images.remove(this.images.pathFor(commandId));
    } catch (err) {
      console.warn(`[DISPATCH] ${commandId} could not remove previous artifact:`, err);
    }

    this.notify(commandId);
    this.supervisor.spawn(`pipeline:${commandId}`, () => this.pipeline.run(commandId));
    console.log(`[DISPATCH] ${commandId} re-run requested`);
    return outcome;
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  getStatus(commandId: string): DispatchResult<CommandStatus> {
    const found = this.store.withLock(state => {
      const command = state.commands.get(commandId);
      return command ? { status: snapshot(state, command), imagePath: command.imagePath } : null;
    });
    if (!found) return notFound(DISPATCH_MESSAGES.commandNotFound);
    return ok(this.verifyArtifact(found.status, found.imagePath));
  }

  listStatus(): CommandStatus[] {
    const found = this.store.withLock(state =>
      Array.from(state.commands.values()).map(command => ({
        status: snapshot(state, command),
        imagePath: command.imagePath,
      })),
    );
    return found
      .map(({ status, imagePath }) => this.verifyArtifact(status, imagePath))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  // ── Artifacts ────────────────────────────────────────────────────────────

  async download(commandId: string): Promise<DispatchResult<Buffer>> {
    const ready = this.readyImage(commandId);
    if (!ready.success) return ready;

    const bytes = await this.images.read(ready.data.imagePath);
    if (!bytes) return notFound(DISPATCH_MESSAGES.imageFileNotFound);
    return ok(bytes);
  }

  async saveLocal(commandId: string): Promise<DispatchResult<SaveLocalResult>> {
    const ready = this.readyImage(commandId);
    if (!ready.success) return ready;

    const savedPath = path.resolve(ready.data.imagePath);
    const fileSizeBytes = await this.images.size(savedPath);
    if (fileSizeBytes === null) return notFound(DISPATCH_MESSAGES.imageFileNotFound);
    return ok({ commandId, savedPath, fileSizeBytes, message: DISPATCH_MESSAGES.imageSaved });
  }

  async clearImages(): Promise<ClearImagesResult> {
    const deletedCount = await this.images.clear();

    const cleared = this.store.withLock(({ commands }) => {
      const now = new Date();
      const ids: string[] = [];
      for (const command of commands.values()) {
        if (command.imagePath === null) continue;
        command.imagePath = null;
        command.message = DISPATCH_MESSAGES.imageCleared;
        command.updatedAt = now;
        ids.push(command.id);
      }
      return ids;
    });

    cleared.forEach(id => this.notify(id));
    console.log(`[DISPATCH] cleared ${deletedCount} image file(s), ${cleared.length} command reference(s)`);
    return { deletedCount, clearedCommandCount: cleared.length, message: DISPATCH_MESSAGES.imagesCleared };
  }

  async previewExternalMap(query: ExternalMapPreviewQuery): Promise<Buffer> {
    const raster = await buildExternalMapImage({
      centerLat: query.lat,
      centerLon: query.lon,
      zoom: query.zoom,
      width: query.width,
      height: query.height,
      mapSource: query.source,
      tiles: this.tiles,
    });
    return encodePng(raster);
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private readyImage(commandId: string): ReadyImage {
    return this.store.withLock(({ commands }): ReadyImage => {
      const command = commands.get(commandId);
      if (!command) return notFound(DISPATCH_MESSAGES.commandNotFound);
      if (command.state !== CommandState.DOWNLINK_READY || command.imagePath === null) {
        return conflict(DISPATCH_MESSAGES.imageNotReady);
      }
      return ok({ imagePath: command.imagePath });
    });
  }

  private verifyArtifact(status: CommandStatus, imagePath: string | null): CommandStatus {
    if (status.downloadUrl && (imagePath === null || !this.images.exists(imagePath))) {
      return { ...status, downloadUrl: null };
    }
    return status;
  }

  private notify(commandId: string): void {
    if (!this.onUpdate) return;
    try {
      this.onUpdate(commandId);
    } catch (err) {
      console.error(`[DISPATCH] update listener failed for ${commandId}:`, err);
    }
  }
}

// ─── Request Profile ─────────────────────────────────────────────────────────

function snapshot(state: SimulatorState, command: CommandRecord): CommandStatus {
  return toCommandStatus(command, state.satellites.get(command.satelliteId)?.type ?? null);
}

export function buildRequestProfile(
  request: UplinkRequest,
  groundStation: RequestProfile['groundStation'],
): RequestProfile {
  return {
    groundStation,
    aoiCenter:
      request.aoiCenterLat != null && request.aoiCenterLon != null
        ? { lat: request.aoiCenterLat, lon: request.aoiCenterLon }
        : null,
    aoiBbox: request.aoiBbox ? [...request.aoiBbox] : null,
    windowOpenUtc: request.windowOpenUtc ?? null,
    windowCloseUtc: request.windowCloseUtc ?? null,
    priority: request.priority,
    eoConstraints: {
      maxCloudCoverPercent: request.maxCloudCoverPercent ?? null,
      maxOffNadirDeg: request.maxOffNadirDeg ?? null,
      minSunElevationDeg: request.minSunElevationDeg ?? null,
    },
    sarConstraints: {
      incidenceMinDeg: request.incidenceMinDeg ?? null,
      incidenceMaxDeg: request.incidenceMaxDeg ?? null,
      lookSide: request.lookSide,
      passDirection: request.passDirection,
      polarization: request.polarization ?? null,
    },
    delivery: {
      method: request.deliveryMethod,
      path: request.deliveryPath ?? null,
    },
    generation: {
      mode: request.generationMode,
      externalMapSource: request.externalMapSource,
      externalMapZoom: request.externalMapZoom,
    },
  };
}
