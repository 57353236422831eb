// Scheduler: regenerate the feed on a fixed interval, first run immediately

import { generateFeed } from "../feeder/index.js";
import type { FeederConfig, FeederResult } from "../feeder/index.js";
import type { RefreshInterval } from "../utils/refreshInterval.js";
import { refreshIntervalToMs } from "../utils/refreshInterval.js";
import { logger, errorMessage } from "../logger/index.js";


let timer: NodeJS.Timeout | null = null;


/** One scheduled run; failures are logged and the next tick tries again */
async function tick(config: FeederConfig): Promise<FeederResult | null> {
  try {
    return await generateFeed(config);
  } catch (err) {
    logger.error("scheduler", "scheduled generation failed", { err: errorMessage(err) });
    return null;
  }
}


/** Start periodic regeneration; resolves after the first run */
export async function initScheduler(config: FeederConfig, interval: RefreshInterval): Promise<FeederResult | null> {
  stopScheduler();
  const intervalMs = refreshIntervalToMs(interval);
  timer = setInterval(() => {
    tick(config).catch((err: unknown) => {
      logger.warn("scheduler", "scheduled tick threw", { err: errorMessage(err) });
    });
  }, intervalMs);
  logger.info("scheduler", "scheduler started", { interval });
  return tick(config);
}


export function stopScheduler(): void {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }
}
