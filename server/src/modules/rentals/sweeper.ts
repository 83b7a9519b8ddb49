/**
 * Expiry sweeper: on a fixed interval, cancels PENDING_PAYMENT rentals whose payment
 * window has lapsed. Each cancel is its own transaction; one failure never blocks the
 * rest of the batch. A tick that fires while the previous sweep is still running is
 * skipped.
 */
import type { RentalLifecycle } from "./lifecycle.js";
import type { RentalStore } from "./store.js";
import { logger } from "../../config/logger.js";
import { isPaymentExpired } from "../../domain/rentalTransitions.js";
import { NotFoundError } from "../../utils/errors.js";

export type SweepReport = {
  scanned: number;
  expired: number;
  cancelled: number;
  /** gone or paid between the scan and the cancel */
  skipped: number;
  failed: number;
};

export interface ExpirySweeper {
  sweepOnce(): Promise<SweepReport>;
  /** Runs a sweep unless one is already in flight; never rejects. */
  tick(): Promise<SweepReport | null>;
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
}

export function createExpirySweeper(deps: {
  store: RentalStore;
  lifecycle: Pick<RentalLifecycle, "cancelRental">;
  windowMinutes: number;
  intervalMs: number;
  now?: () => Date;
}): ExpirySweeper {
  const now = deps.now ?? (() => new Date());
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<SweepReport | null> | null = null;

  async function sweepOnce(): Promise<SweepReport> {
    const at = now();
    const pending = await deps.store.listPendingPayment();
    const report: SweepReport = { scanned: pending.length, expired: 0, cancelled: 0, skipped: 0, failed: 0 };

    for (const rental of pending) {
      if (!isPaymentExpired(rental.createdAt, at, deps.windowMinutes)) continue;
      report.expired += 1;

      try {
        const res = await deps.lifecycle.cancelRental(rental.id, { expectStatus: "PENDING_PAYMENT" });
        if (res.outcome === "skipped") report.skipped += 1;
        else report.cancelled += 1;
      } catch (err: unknown) {
        if (err instanceof NotFoundError) {
          // cancelled by its owner meanwhile
          report.skipped += 1;
          logger.debug("rental.sweep.gone", { rentalId: rental.id });
          continue;
        }
        report.failed += 1;
        logger.error("rental.sweep.cancel_failed", {
          rentalId: rental.id,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }

    if (report.expired > 0) logger.info("rental.sweep.done", report);
    return report;
  }

  function tick(): Promise<SweepReport | null> {
    if (inFlight) {
      logger.debug("rental.sweep.overlap_skipped");
      return Promise.resolve(null);
    }
    const run = sweepOnce()
      .then((report): SweepReport | null => report)
      .catch((err: unknown) => {
        logger.error("rental.sweep.failed", { message: err instanceof Error ? err.message : String(err) });
        return null;
      })
      .finally(() => {
        inFlight = null;
      });
    inFlight = run;
    return run;
  }

  function start() {
    if (timer) return;
    timer = setInterval(() => {
      void tick();
    }, deps.intervalMs);
    timer.unref();
    logger.info("rental.sweep.started", { intervalMs: deps.intervalMs, windowMinutes: deps.windowMinutes });
  }

  async function stop() {
    if (timer) {
      clearInterval(timer);
      timer = null;
      logger.info("rental.sweep.stopped");
    }
    if (inFlight) await inFlight;
  }

  return { sweepOnce, tick, start, stop, isRunning: () => timer !== null };
}
