import {
  CommandState,
  ExternalMapSource,
  GenerationMode,
  SatelliteStatus,
  SatelliteType,
  type RequestProfile,
} from '@satsim/shared';
import { buildCaptureMetadata } from './capture-metadata.js';
import { transitionCommand } from './command-state.js';
import type { ImageStore } from './image-store.js';
import { selectSynthesisStrategy, synthesizeImage } from './image-synthesis.js';
import type { TileSource } from './map-tiles.js';
import { uniform, type RandomSource } from './random-source.js';
import { encodePng } from './raster.js';
import type { SimulatorStore } from './simulator-store.js';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Uniform stage durations, in seconds. */
export const STAGE_DURATIONS = {
  contactWindow: [0.7, 1.8],
  commandPrep: [0.6, 1.6],
  capture: [1.5, 3.8],
} as const satisfies Record<string, readonly [number, number]>;

export const TRANSMISSION_FAULT_WEIGHT = 0.6;
export const CAPTURE_FAULT_WEIGHT = 0.4;

export const PIPELINE_MESSAGES = {
  satelliteNotFound: 'satellite not found',
  satelliteUnavailable: 'satellite is not available',
  queued: 'queued for next contact window',
  acked: 'uplink ACK received',
  transmissionFailed: 'uplink transmission failed',
  capturing: 'satellite is capturing image',
  captureAborted: 'capture aborted due to onboard condition',
  downlinkReady: 'image downlinked and ready',
  postCaptureFailed: 'post-capture pipeline failed',
} as const;

const SUPPORTED_MAP_SOURCES: readonly string[] = [ExternalMapSource.OSM];

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CommandPipelineDeps {
  store: SimulatorStore;
  images: ImageStore;
  tiles: TileSource;
  random: RandomSource;
  /** Multiplies every stage duration; 0 runs stages back to back. */
  timeScale?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Called after every state mutation, outside the store lock. */
  onUpdate?: (commandId: string) => void;
}

interface RunContext {
  commandId: string;
  satelliteType: SatelliteType;
  failProbability: number;
  aoiName: string;
  width: number;
  height: number;
  cloudPercent: number;
  requestProfile: RequestProfile;
}

type EntryCheck =
  | { kind: 'missing' }
  | { kind: 'rejected'; reason: string }
  | { kind: 'queued'; context: RunContext };

// ─── Fault Model ─────────────────────────────────────────────────────────────

/**
 * A stage fault fires when a fresh draw u ∈ [0, 1) satisfies
 * u < failProbability × weight, so 0 never faults. failProbability ≥ 1
 * faults without drawing.
 */
export function rollStageFault(random: RandomSource, failProbability: number, weight: number): boolean {
  if (failProbability >= 1) return true;
  return random.next() < failProbability * weight;
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

/**
 * Drives one command from QUEUED to a terminal state. The store lock is
 * taken only to inspect preconditions or write a transition; every sleep,
 * tile fetch and file write happens outside it.
 */
export class CommandPipeline {
  private readonly store: SimulatorStore;
  private readonly images: ImageStore;
  private readonly tiles: TileSource;
  private readonly random: RandomSource;
  private readonly timeScale: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onUpdate?: (commandId: string) => void;

  constructor(deps: CommandPipelineDeps) {
    this.store = deps.store;
    this.images = deps.images;
    this.tiles = deps.tiles;
    this.random = deps.random;
    this.timeScale = deps.timeScale ?? 1;
    this.sleep = deps.sleep ?? sleep;
    this.onUpdate = deps.onUpdate;
  }

  async run(commandId: string): Promise<void> {
    const entry = this.checkEntry(commandId);

    if (entry.kind === 'missing') {
      console.warn(`[PIPELINE] ${commandId} not found, nothing to run`);
      return;
    }
    this.notify(commandId);

    if (entry.kind === 'rejected') {
      console.warn(`[PIPELINE] ${commandId} FAILED before contact: ${entry.reason}`);
      return;
    }

    const ctx = entry.context;
    console.log(`[PIPELINE] ${commandId} QUEUED (${ctx.satelliteType}, failProbability=${ctx.failProbability})`);

    // Waiting for a contact window, then the satellite acknowledges the uplink
    await this.pause(STAGE_DURATIONS.contactWindow);
    this.advance(commandId, CommandState.ACKED, PIPELINE_MESSAGES.acked);

    // On-board command validation / prep
    await this.pause(STAGE_DURATIONS.commandPrep);
    if (rollStageFault(this.random, ctx.failProbability, TRANSMISSION_FAULT_WEIGHT)) {
      this.fail(commandId, PIPELINE_MESSAGES.transmissionFailed);
      return;
    }

    this.advance(commandId, CommandState.CAPTURING, PIPELINE_MESSAGES.capturing);
    await this.pause(STAGE_DURATIONS.capture);
    if (rollStageFault(this.random, ctx.failProbability, CAPTURE_FAULT_WEIGHT)) {
      this.fail(commandId, PIPELINE_MESSAGES.captureAborted);
      return;
    }

    await this.postCapture(ctx);
  }

  // ── Stages ───────────────────────────────────────────────────────────────

  private checkEntry(commandId: string): EntryCheck {
    return this.store.withLock(({ commands, satellites }): EntryCheck => {
      const command = commands.get(commandId);
      if (!command) return { kind: 'missing' };

      const reject = (reason: string): EntryCheck => {
        transitionCommand(command, CommandState.FAILED, reason);
        return { kind: 'rejected', reason };
      };

      const satellite = satellites.get(command.satelliteId);
      if (!satellite) return reject(PIPELINE_MESSAGES.satelliteNotFound);
      if (satellite.status !== SatelliteStatus.AVAILABLE) return reject(PIPELINE_MESSAGES.satelliteUnavailable);

      const generation = command.requestProfile.generation;
      if (generation.mode === GenerationMode.EXTERNAL && !SUPPORTED_MAP_SOURCES.includes(generation.externalMapSource)) {
        return reject(`unsupported external map source: ${generation.externalMapSource}`);
      }

      transitionCommand(command, CommandState.QUEUED, PIPELINE_MESSAGES.queued);
      return {
        kind: 'queued',
        context: {
          commandId,
          satelliteType: satellite.type,
          failProbability: command.failProbability,
          aoiName: command.aoiName,
          width: command.width,
          height: command.height,
          cloudPercent: command.cloudPercent,
          requestProfile: command.requestProfile,
        },
      };
    });
  }

  private async postCapture(ctx: RunContext): Promise<void> {
    try {
      const strategy = selectSynthesisStrategy(ctx.satelliteType, ctx.requestProfile);
      const raster = await synthesizeImage(
        strategy,
        { width: ctx.width, height: ctx.height, cloudPercent: ctx.cloudPercent },
        { random: this.random, tiles: this.tiles },
      );
      const imagePath = await this.images.write(ctx.commandId, encodePng(raster));
      const metadata = buildCaptureMetadata(ctx.satelliteType, ctx, new Date(), this.random);

      this.store.withLock(({ commands }) => {
        const command = commands.get(ctx.commandId);
        if (!command) throw new Error(`command ${ctx.commandId} vanished during capture`);
        transitionCommand(command, CommandState.DOWNLINK_READY, PIPELINE_MESSAGES.downlinkReady);
        command.imagePath = imagePath;
        command.acquisitionMetadata = metadata.acquisition;
        command.productMetadata = metadata.product;
      });
      this.notify(ctx.commandId);
      console.log(`[PIPELINE] ${ctx.commandId} DOWNLINK_READY (${strategy.kind}, ${ctx.width}x${ctx.height})`);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.fail(ctx.commandId, `${PIPELINE_MESSAGES.postCaptureFailed}: ${detail}`);
    }
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private async pause(range: readonly [number, number]): Promise<void> {
    const seconds = uniform(this.random, range[0], range[1]);
    await this.sleep(seconds * 1000 * this.timeScale);
  }

  private apply(commandId: string, state: CommandState, message: string): void {
    this.store.withLock(({ commands }) => {
      const command = commands.get(commandId);
      if (!command) throw new Error(`command ${commandId} vanished before ${state}`);
      transitionCommand(command, state, message);
    });
    this.notify(commandId);
  }

  private advance(commandId: string, state: CommandState, message: string): void {
    this.apply(commandId, state, message);
    console.log(`[PIPELINE] ${commandId} ${state}`);
  }

  private fail(commandId: string, message: string): void {
    this.apply(commandId, CommandState.FAILED, message);
    console.warn(`[PIPELINE] ${commandId} FAILED: ${message}`);
  }

  private notify(commandId: string): void {
    if (!this.onUpdate) return;
    try {
      this.onUpdate(commandId);
    } catch (err) {
      console.error(`[PIPELINE] update listener failed for ${commandId}:`, err);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
