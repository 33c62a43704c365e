/**
 * Engine configuration
 */

import { getEntityStore } from "./entity/context";
import { EntityStore } from "./entity/EntityStore";
import type { Renderer } from "./layer/types";
import { consoleLogger, type Logger } from "./log";
import type { Size } from "./math/rect";
import { TimerScheduler, type FrameScheduler } from "./scheduler";

export interface EngineOptions {
  /** Surface size in logical pixels */
  size?: Size;
  /** Physical pixels per logical pixel */
  scaleFactor?: number;
  /** Compositor for the per-layer outputs; frames are still produced without one */
  renderer?: Renderer | null;
  scheduler?: FrameScheduler;
  /** Defaults to the process-wide store */
  entityStore?: EntityStore;
  logger?: Logger;
  /** Log a frame summary once per second */
  debug?: boolean;
  /** Capacity of a private store, used only when no entityStore is given */
  maxEntities?: number;
}

export interface ResolvedEngineOptions {
  size: Size;
  scaleFactor: number;
  renderer: Renderer | null;
  scheduler: FrameScheduler;
  entityStore: EntityStore;
  logger: Logger;
  debug: boolean;
}

export const DEFAULT_ENGINE_OPTIONS = Object.freeze({
  size: Object.freeze({ width: 800, height: 600 }),
  scaleFactor: 1,
  debug: false,
});

export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const logger = options.logger ?? consoleLogger;

  let scaleFactor = options.scaleFactor ?? DEFAULT_ENGINE_OPTIONS.scaleFactor;
  if (!(scaleFactor > 0)) {
    logger.warn(`[Engine] Ignoring invalid scaleFactor ${scaleFactor}, using 1`);
    scaleFactor = 1;
  }

  let entityStore = options.entityStore;
  if (!entityStore) {
    entityStore =
      options.maxEntities !== undefined
        ? new EntityStore({ maxEntities: options.maxEntities })
        : getEntityStore();
  }

  return {
    size: { ...(options.size ?? DEFAULT_ENGINE_OPTIONS.size) },
    scaleFactor,
    renderer: options.renderer ?? null,
    scheduler: options.scheduler ?? new TimerScheduler(),
    entityStore,
    logger,
    debug: options.debug ?? DEFAULT_ENGINE_OPTIONS.debug,
  };
}
