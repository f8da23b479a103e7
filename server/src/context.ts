import type { CommandStatus } from '@satsim/shared';
import { config } from './config.js';
import { CommandDispatcher } from './services/command-dispatcher.js';
import { CommandPipeline } from './services/command-pipeline.js';
import { ImageStore } from './services/image-store.js';
import { createOsmTileSource, type TileSource } from './services/map-tiles.js';
import { createRandomSource, type RandomSource } from './services/random-source.js';
import { SimulatorStore } from './services/simulator-store.js';
import { TaskSupervisor } from './services/task-supervisor.js';

export interface SimulatorContext {
  store: SimulatorStore;
  images: ImageStore;
  supervisor: TaskSupervisor;
  pipeline: CommandPipeline;
  dispatcher: CommandDispatcher;
}

export interface SimulatorContextOptions {
  imageDir?: string;
  random?: RandomSource;
  tiles?: TileSource;
  timeScale?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Receives a fresh snapshot after every command mutation; the server broadcasts it. */
  onCommandUpdate?: (status: CommandStatus) => void;
}

/** Builds one simulator instance. Anything not overridden comes from config. */
export function createSimulatorContext(options: SimulatorContextOptions = {}): SimulatorContext {
  const store = new SimulatorStore();
  const images = new ImageStore(options.imageDir ?? config.imageDir);
  const tiles = options.tiles ?? createOsmTileSource(config.tiles);
  const supervisor = new TaskSupervisor();

  const listener = options.onCommandUpdate;
  const onUpdate = listener
    ? (commandId: string) => {
        const result = dispatcher.getStatus(commandId);
        if (result.success) listener(result.data);
      }
    : undefined;

  const pipeline = new CommandPipeline({
    store,
    images,
    tiles,
    random: options.random ?? createRandomSource(config.pipeline.randomSeed),
    timeScale: options.timeScale ?? config.pipeline.timeScale,
    sleep: options.sleep,
    onUpdate,
  });

  const dispatcher = new CommandDispatcher({
    store,
    images,
    tiles,
    pipeline,
    supervisor,
    onUpdate,
  });

  return { store, images, supervisor, pipeline, dispatcher };
}
