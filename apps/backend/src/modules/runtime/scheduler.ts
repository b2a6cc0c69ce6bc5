import { logger } from '../../utils/logger';

export type ScheduledTaskStop = () => void;

export interface ScheduleOptions {
    /** Fire once right away instead of waiting for the first interval. */
    runImmediately?: boolean;
}

/**
 * Runs `task` every `intervalMs`, skipping ticks while a previous run is still
 * in flight. Failures are logged and never stop the schedule.
 */
export function scheduleNonOverlappingTask(
    taskName: string,
    intervalMs: number,
    task: () => Promise<void>,
    options: ScheduleOptions = {},
): ScheduledTaskStop {
    const safeIntervalMs = Number.isFinite(intervalMs) && intervalMs > 0
        ? Math.floor(intervalMs)
        : 1000;
    if (safeIntervalMs !== intervalMs) {
        logger.warn(`[${taskName}] invalid interval "${intervalMs}", defaulting to ${safeIntervalMs}ms`);
    }

    let inFlight = false;
    let stopped = false;
    const tick = (): void => {
        if (inFlight || stopped) {
            return;
        }
        inFlight = true;
        void Promise.resolve()
            .then(() => task())
            .catch((error) => {
                logger.error(`[${taskName}] interval error: ${String(error)}`);
            })
            .finally(() => {
                inFlight = false;
            });
    };

    const intervalId = setInterval(tick, safeIntervalMs);
    if (options.runImmediately) {
        tick();
    }

    return () => {
        if (stopped) {
            return;
        }
        stopped = true;
        clearInterval(intervalId);
    };
}
