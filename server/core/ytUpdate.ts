import type { Extractor, UpdateResult } from './Extractor.js';
import { toExtractionError } from './errors.js';
import type { Logger } from './logger.js';

const MIN_INTERVAL_HOURS = 0.5;

export type ToolUpdater = {
  /** Concurrent callers share one in-flight update. */
  run(trigger: string): Promise<UpdateResult>;
  startAuto(hours: number): boolean;
  stop(): void;
};

export function createToolUpdater(extractor: Pick<Extractor, 'update'>, log: Logger): ToolUpdater {
  let updating: Promise<UpdateResult> | null = null;
  let timer: NodeJS.Timeout | null = null;

  const run = (trigger: string): Promise<UpdateResult> => {
    updating ??= extractor
      .update()
      .then((result) => {
        log.info('ytdlp_update_done', { trigger, success: result.success, message: result.message });
        return result;
      })
      .finally(() => {
        updating = null;
      });
    return updating;
  };

  const runQuietly = (trigger: string) => {
    run(trigger).catch((err: unknown) => {
      log.warn('ytdlp_update_exception', { trigger, error: toExtractionError(err).message });
    });
  };

  return {
    run,
    startAuto(hours: number): boolean {
      if (timer || !Number.isFinite(hours) || hours <= 0) return false;
      const intervalMs = Math.max(MIN_INTERVAL_HOURS, hours) * 60 * 60 * 1000;
      runQuietly('startup');
      timer = setInterval(() => {
        if (updating) return;
        runQuietly('interval');
      }, intervalMs);
      timer.unref();
      log.info('ytdlp_auto_update_started', { hours: intervalMs / 3_600_000 });
      return true;
    },
    stop(): void {
      if (timer) clearInterval(timer);
      timer = null;
    },
  };
}
